export type Clock = () => number

/**
 * Last-output timestamp shared between the drain loop (the only writer) and the watchdog (the only
 * reader). Both run on the same event loop, so a plain field is enough.
 */
export class ActivityTracker {
    private lastActivityAt: number

    constructor(private readonly now: Clock = Date.now) {
        this.lastActivityAt = now()
    }

    recordActivity(): void {
        this.lastActivityAt = this.now()
    }

    idleDuration(): number {
        return Math.max(0, this.now() - this.lastActivityAt)
    }

    get lastActivity(): number {
        return this.lastActivityAt
    }
}
