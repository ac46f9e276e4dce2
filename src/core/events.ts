import type { HarnessPhase, KillCause, SessionOutcome } from './types.js'
import type { HarnessEvent } from '../stream/types.js'

export type EventMap = {
    'session:start': { cwd: string; pid: number | undefined; pgid: number | undefined }
    'session:event': { event: HarnessEvent; ts: string }
    'session:end': { cwd: string; outcome: SessionOutcome }
    'watchdog:expired': { cause: KillCause; elapsedMs: number; idleMs: number }
    'harness:phase': { phase: HarnessPhase; session: number }
}

type EventHandler<T> = (data: T) => void

export class TypedEventEmitter {
    private handlers = new Map<string, Set<EventHandler<unknown>>>()

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        let set = this.handlers.get(event)
        if (!set) {
            set = new Set()
            this.handlers.set(event, set)
        }
        set.add(handler as EventHandler<unknown>)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers.get(event)?.delete(handler as EventHandler<unknown>)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set = this.handlers.get(event)
        if (!set) return
        for (const handler of set) {
            try {
                handler(data)
            } catch {
                // cross-cutting listeners should not crash the main flow
            }
        }
    }

    removeAll(): void {
        this.handlers.clear()
    }
}
