import { FIELD_LIMITS, truncate } from './types.js'

export type ToolKind = 'Bash' | 'Read' | 'Edit' | 'Write' | 'Grep' | 'Glob' | 'Task'

type ToolInput = Record<string, unknown>

type Formatter = (input: ToolInput) => string

function field(input: ToolInput, key: string, fallback = ''): string {
    const value = input[key]
    return typeof value === 'string' ? value : fallback
}

const FORMATTERS: Record<ToolKind, Formatter> = {
    Bash: (input) => `Bash: ${truncate(field(input, 'command'), 120)}`,
    Read: (input) => `Read: ${field(input, 'file_path')}`,
    Edit: (input) => `Edit: ${field(input, 'file_path')}`,
    Write: (input) => `Write: ${field(input, 'file_path')}`,
    Grep: (input) => `Grep: ${field(input, 'pattern')} in ${field(input, 'path', '.')}`,
    Glob: (input) => `Glob: ${field(input, 'pattern')}`,
    Task: (input) => `Task: ${field(input, 'description')}`,
}

export function isToolKind(name: string): name is ToolKind {
    return Object.hasOwn(FORMATTERS, name)
}

/** One-line description of a tool call: kind plus its most relevant argument, or the bare name. */
export function summarizeToolCall(name: string, input: ToolInput): string {
    const summary = isToolKind(name) ? FORMATTERS[name](input) : name
    return truncate(summary, FIELD_LIMITS.toolSummary)
}
