import { z } from 'zod'
import { errorMessage, isNotFoundError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { LoggedEvent } from '../core/types.js'
import { TokenTally } from '../supervisor/classify.js'
import type { LiveState } from '../supervisor/state-snapshot.js'

const Tokens = z.number().int().nonnegative()

const LoggedEventSchema = z.discriminatedUnion('kind', [
    z.object({
        ts: z.string(),
        kind: z.literal('assistant'),
        text: z.string(),
        toolInvocations: z.array(z.object({ name: z.string(), summary: z.string() })),
        thinkingText: z.string(),
        inputTokens: Tokens,
        outputTokens: Tokens,
    }),
    z.object({ ts: z.string(), kind: z.literal('tool_result'), content: z.string(), isError: z.boolean() }),
    z.object({
        ts: z.string(),
        kind: z.literal('result'),
        isError: z.boolean(),
        inputTokens: Tokens,
        outputTokens: Tokens,
    }),
    z.object({ ts: z.string(), kind: z.literal('other'), rawType: z.string() }),
])

const LiveStateSchema = z.object({
    thinking: z.string().catch(''),
    tool: z.string().catch(''),
    detail: z.string().catch(''),
    result: z.string().catch(''),
    error: z.boolean().catch(false),
})

export interface LiveLogStats {
    events: number
    tokensIn: number
    tokensOut: number
    toolCalls: number
    thoughts: number
    /** Timestamp of the first record, in ms. */
    startedAt: number | null
}

function parseRecord(line: string): LoggedEvent | null {
    let raw: unknown
    try {
        raw = JSON.parse(line)
    } catch {
        return null
    }
    const parsed = LoggedEventSchema.safeParse(raw)
    return parsed.success ? parsed.data : null
}

/**
 * Parses the live event log. The writer may be mid-append, so a final line without its newline is
 * treated as not yet written.
 */
export function parseLiveLog(text: string): LoggedEvent[] {
    const complete = text.endsWith('\n') ? text : text.slice(0, text.lastIndexOf('\n') + 1)
    const events: LoggedEvent[] = []
    for (const line of complete.split('\n')) {
        if (!line.trim()) continue
        const event = parseRecord(line)
        if (event) events.push(event)
    }
    return events
}

export async function readLiveLog(fs: FileSystem, path: string): Promise<LoggedEvent[]> {
    try {
        return parseLiveLog(await fs.readText(path))
    } catch (error) {
        if (isNotFoundError(error)) return []
        throw new Error(`Cannot read live log ${path}: ${errorMessage(error)}`)
    }
}

export function summarizeLiveLog(events: LoggedEvent[]): LiveLogStats {
    const tally = new TokenTally()
    let toolCalls = 0
    let thoughts = 0
    for (const event of events) {
        tally.add(event)
        if (event.kind === 'assistant') {
            toolCalls += event.toolInvocations.length
            if (event.thinkingText) thoughts++
        }
    }
    const first = events[0] ? Date.parse(events[0].ts) : Number.NaN
    return {
        events: events.length,
        ...tally.totals(),
        toolCalls,
        thoughts,
        startedAt: Number.isNaN(first) ? null : first,
    }
}

/** `null` while no session has written a snapshot, or when it is not a snapshot at all. */
export async function readLiveState(fs: FileSystem, path: string): Promise<LiveState | null> {
    let raw: unknown
    try {
        raw = await fs.readJSON(path)
    } catch {
        return null
    }
    if (typeof raw !== 'object' || raw === null || Object.keys(raw).length === 0) return null
    const parsed = LiveStateSchema.safeParse(raw)
    return parsed.success ? parsed.data : null
}
