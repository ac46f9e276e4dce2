import type { TypedEventEmitter } from '../core/events.js'
import type { KillCause, SessionOutcome } from '../core/types.js'

interface OutcomeCounts {
    success: number
    failure: number
    killed: number
}

/** Aggregates session outcomes across one harness run. */
export class SessionMetrics {
    private outcomes: OutcomeCounts = { success: 0, failure: 0, killed: 0 }
    private tokens = { input: 0, output: 0 }
    private durationMs = 0
    private expiries = new Map<KillCause, number>()
    private cleanups: Array<() => void> = []

    constructor(eventBus: TypedEventEmitter) {
        const onEnd = ({ outcome }: { outcome: SessionOutcome }) => {
            this.outcomes[outcome.status.state]++
            this.tokens.input += outcome.tokensIn
            this.tokens.output += outcome.tokensOut
            this.durationMs += outcome.durationMs
        }
        eventBus.on('session:end', onEnd)
        this.cleanups.push(() => eventBus.off('session:end', onEnd))

        const onExpired = ({ cause }: { cause: KillCause }) => {
            this.expiries.set(cause, (this.expiries.get(cause) ?? 0) + 1)
        }
        eventBus.on('watchdog:expired', onExpired)
        this.cleanups.push(() => eventBus.off('watchdog:expired', onExpired))
    }

    dispose(): void {
        for (const cleanup of this.cleanups) cleanup()
        this.cleanups = []
    }

    get sessions(): number {
        return this.outcomes.success + this.outcomes.failure + this.outcomes.killed
    }

    getOutcomes(): OutcomeCounts {
        return { ...this.outcomes }
    }

    getTokens(): { input: number; output: number; total: number } {
        return { ...this.tokens, total: this.tokens.input + this.tokens.output }
    }

    getExpiries(): Map<KillCause, number> {
        return new Map(this.expiries)
    }

    get totalDurationMs(): number {
        return this.durationMs
    }

    formatStatus(): string {
        const tokens = this.getTokens()
        const { success, failure, killed } = this.outcomes
        const lines = [
            `Sessions: ${this.sessions} (${success} ok, ${failure} failed, ${killed} killed)`,
            `Tokens: ${tokens.total} (${tokens.input} in + ${tokens.output} out)`,
        ]
        if (this.expiries.size > 0) {
            const parts = [...this.expiries].map(([cause, count]) => `${cause} ${count}`)
            lines.push(`Watchdog kills: ${parts.join(', ')}`)
        }
        return lines.join('\n')
    }
}
