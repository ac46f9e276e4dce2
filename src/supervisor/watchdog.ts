import { errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import type { ActivityTracker, Clock } from './activity.js'

export type ExpiryCause = 'wallClock' | 'idle'

export type WatchdogState =
    | { phase: 'idle' }
    | { phase: 'running'; startedAt: number }
    | { phase: 'expired'; cause: ExpiryCause; elapsedMs: number; idleMs: number }
    | { phase: 'stopped' }

export interface WatchdogOptions {
    sessionTimeoutMs: number
    idleTimeoutMs: number
    pollIntervalMs: number
    activity: ActivityTracker
    /** True once the supervised process has exited; the watchdog then stops polling. */
    isExited: () => boolean
    onExpire: (cause: ExpiryCause, elapsedMs: number, idleMs: number) => Promise<unknown>
    logger: Logger
    now?: Clock
}

export class Watchdog {
    private state: WatchdogState = { phase: 'idle' }
    private timer: NodeJS.Timeout | undefined
    private pending: Promise<void> = Promise.resolve()
    private readonly now: Clock

    constructor(private readonly options: WatchdogOptions) {
        this.now = options.now ?? Date.now
    }

    get current(): WatchdogState {
        return this.state
    }

    start(): void {
        if (this.state.phase !== 'idle') return
        this.state = { phase: 'running', startedAt: this.now() }
        this.timer = setInterval(() => this.check(), this.options.pollIntervalMs)
        this.timer.unref()
    }

    /** One poll. Runs on every interval tick; callable directly to drive the state machine. */
    check(): WatchdogState {
        const state = this.state
        if (state.phase !== 'running') return state

        if (this.options.isExited()) {
            this.halt({ phase: 'stopped' })
            return this.state
        }

        const elapsedMs = this.now() - state.startedAt
        const idleMs = this.options.activity.idleDuration()

        if (elapsedMs > this.options.sessionTimeoutMs) {
            this.expire('wallClock', elapsedMs, idleMs)
        } else if (idleMs > this.options.idleTimeoutMs) {
            this.expire('idle', elapsedMs, idleMs)
        }
        return this.state
    }

    stop(): void {
        if (this.state.phase === 'idle' || this.state.phase === 'running') {
            this.halt({ phase: 'stopped' })
        } else {
            this.clearTimer()
        }
    }

    /** Resolves once any termination started by an expiry has finished. */
    join(): Promise<void> {
        return this.pending
    }

    private expire(cause: ExpiryCause, elapsedMs: number, idleMs: number): void {
        this.halt({ phase: 'expired', cause, elapsedMs, idleMs })
        this.options.logger.warn({ cause, elapsedMs, idleMs }, 'watchdog:expired')
        this.pending = this.options.onExpire(cause, elapsedMs, idleMs).then(
            () => undefined,
            (error: unknown) => {
                this.options.logger.warn({ cause, error: errorMessage(error) }, 'watchdog:terminate-failed')
            }
        )
    }

    private halt(next: WatchdogState): void {
        this.clearTimer()
        this.state = next
    }

    private clearTimer(): void {
        if (this.timer !== undefined) {
            clearInterval(this.timer)
            this.timer = undefined
        }
    }
}
