/** Character limits applied to every free-text field before an event is stored. */
export const FIELD_LIMITS = {
    text: 150,
    toolSummary: 250,
    thinking: 500,
    toolResult: 300,
    toolName: 100,
    rawType: 100,
} as const

export interface ToolInvocation {
    name: string
    summary: string
}

export interface AssistantMessage {
    kind: 'assistant'
    text: string
    toolInvocations: ToolInvocation[]
    thinkingText: string
    inputTokens: number
    outputTokens: number
}

export interface ToolResult {
    kind: 'tool_result'
    content: string
    isError: boolean
}

export interface TerminalResult {
    kind: 'result'
    isError: boolean
    inputTokens: number
    outputTokens: number
}

export interface OtherEvent {
    kind: 'other'
    rawType: string
}

export type HarnessEvent = AssistantMessage | ToolResult | TerminalResult | OtherEvent

export function truncate(value: string, max: number): string {
    return value.length > max ? value.slice(0, max) : value
}
