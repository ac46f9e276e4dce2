import type { TypedEventEmitter } from '../core/events.js'
import type { HarnessEvent } from '../stream/types.js'
import { truncate } from '../stream/types.js'
import { colors } from './ui.js'

const CONSOLE_LIMITS = {
    thinking: 120,
    text: 200,
    error: 100,
} as const

/** Console lines for one decoded event; empty when the event has nothing worth showing. */
export function formatEventLines(event: HarnessEvent): string[] {
    switch (event.kind) {
        case 'assistant': {
            const lines: string[] = []
            if (event.thinkingText) {
                lines.push(`${colors.bold('[Think]')} ${truncate(event.thinkingText, CONSOLE_LIMITS.thinking)}`)
            }
            if (event.text) lines.push(`${colors.info('[Claude]')} ${truncate(event.text, CONSOLE_LIMITS.text)}`)
            if (event.toolInvocations.length > 0) {
                const summary = event.toolInvocations.map((call) => call.summary).join(' | ')
                lines.push(`${colors.warn('[Tool]')} ${summary}`)
            }
            return lines
        }
        case 'tool_result':
            return event.isError ? [`${colors.error('[Error]')} ${truncate(event.content, CONSOLE_LIMITS.error)}`] : []
        case 'result':
            return event.isError
                ? [`${colors.error('[ERROR]')} Session ended with error`]
                : [`${colors.info('[INFO]')} Session completed successfully.`]
        case 'other':
            return []
    }
}

export interface SessionPrinter {
    dispose(): void
}

export function createSessionPrinter(
    eventBus: TypedEventEmitter,
    write: (line: string) => void = (line) => console.log(line)
): SessionPrinter {
    const onEvent = ({ event }: { event: HarnessEvent }) => {
        for (const line of formatEventLines(event)) write(line)
    }
    const onStart = ({ pid, pgid }: { pid: number | undefined; pgid: number | undefined }) => {
        write(`${colors.info('[INFO]')} Agent PID: ${pid ?? 'unknown'}, PGID: ${pgid ?? 'unknown'}`)
    }

    eventBus.on('session:event', onEvent)
    eventBus.on('session:start', onStart)

    return {
        dispose() {
            eventBus.off('session:event', onEvent)
            eventBus.off('session:start', onStart)
        },
    }
}
