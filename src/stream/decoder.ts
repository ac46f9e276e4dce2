import {
    AnyRecord,
    AssistantRecord,
    ResultRecord,
    type StreamMessage,
    TextBlock,
    ThinkingBlock,
    ToolResultBlock,
    ToolUseBlock,
    UserRecord,
} from './schemas.js'
import { summarizeToolCall } from './tool-summary.js'
import {
    type AssistantMessage,
    FIELD_LIMITS,
    type HarnessEvent,
    type TerminalResult,
    type ToolResult,
    truncate,
} from './types.js'

const KIND_MARKER = '"type"'

function contentBlocks(message: StreamMessage | null | undefined): unknown[] {
    if (!message) return []
    return typeof message.content === 'string' ? [{ type: 'text', text: message.content }] : message.content
}

function stringify(content: unknown): string {
    if (content === undefined || content === null || content === false) return ''
    return typeof content === 'string' ? content : JSON.stringify(content)
}

function decodeAssistant(message: StreamMessage | null | undefined): AssistantMessage {
    const texts: string[] = []
    const thoughts: string[] = []
    const toolInvocations: AssistantMessage['toolInvocations'] = []

    for (const block of contentBlocks(message)) {
        const text = TextBlock.safeParse(block)
        if (text.success) {
            texts.push(text.data.text)
            continue
        }
        const thinking = ThinkingBlock.safeParse(block)
        if (thinking.success) {
            thoughts.push(thinking.data.thinking)
            continue
        }
        const toolUse = ToolUseBlock.safeParse(block)
        if (toolUse.success) {
            toolInvocations.push({
                name: truncate(toolUse.data.name, FIELD_LIMITS.toolName),
                summary: summarizeToolCall(toolUse.data.name, toolUse.data.input),
            })
        }
    }

    return {
        kind: 'assistant',
        text: truncate(texts.join(' '), FIELD_LIMITS.text),
        toolInvocations,
        thinkingText: truncate(thoughts.join(' '), FIELD_LIMITS.thinking),
        inputTokens: message?.usage?.input_tokens ?? 0,
        outputTokens: message?.usage?.output_tokens ?? 0,
    }
}

function decodeToolResults(message: StreamMessage | null | undefined): ToolResult {
    const contents: string[] = []
    let isError = false

    for (const block of contentBlocks(message)) {
        const result = ToolResultBlock.safeParse(block)
        if (!result.success) continue
        contents.push(truncate(stringify(result.data.content), FIELD_LIMITS.toolResult))
        if (result.data.is_error) isError = true
    }

    return {
        kind: 'tool_result',
        content: truncate(contents.join('\n'), FIELD_LIMITS.toolResult),
        isError,
    }
}

function decodeTerminal(record: unknown): TerminalResult | null {
    const parsed = ResultRecord.safeParse(record)
    if (!parsed.success) return null
    return {
        kind: 'result',
        isError: parsed.data.is_error,
        inputTokens: parsed.data.usage?.input_tokens ?? 0,
        outputTokens: parsed.data.usage?.output_tokens ?? 0,
    }
}

function parseJson(line: string): unknown {
    try {
        return JSON.parse(line)
    } catch {
        return undefined
    }
}

/**
 * Decodes one line of the agent's stream-json output. Lines without a kind marker or with malformed
 * JSON yield `null`; this function never throws.
 */
export function decodeLine(line: string): HarnessEvent | null {
    if (!line.includes(KIND_MARKER)) return null

    const record = parseJson(line)
    const header = AnyRecord.safeParse(record)
    if (!header.success) return null

    switch (header.data.type) {
        case 'assistant': {
            const parsed = AssistantRecord.safeParse(record)
            return parsed.success ? decodeAssistant(parsed.data.message) : null
        }
        case 'user': {
            const parsed = UserRecord.safeParse(record)
            return parsed.success ? decodeToolResults(parsed.data.message) : null
        }
        case 'result':
            return decodeTerminal(record)
        default:
            return { kind: 'other', rawType: truncate(header.data.type, FIELD_LIMITS.rawType) }
    }
}
