export interface BackoffOptions {
    /** Consecutive failures after which the loop gives up. */
    threshold: number
    baseSeconds: number
    maxSeconds: number
    /** Only failures shorter than this are treated as rate limiting and delayed. */
    quickFailureSeconds: number
}

export type FailureVerdict =
    | { action: 'continue'; waitSeconds: number }
    | { action: 'stop'; failures: number }

export function backoffSeconds(failures: number, baseSeconds: number, maxSeconds: number): number {
    return Math.min(baseSeconds * failures, maxSeconds)
}

/** Resolves early, without rejecting, when `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) return resolve()
        const timer = setTimeout(done, ms)
        function done() {
            clearTimeout(timer)
            signal?.removeEventListener('abort', done)
            resolve()
        }
        signal?.addEventListener('abort', done, { once: true })
    })
}

/** Counts consecutive session failures; a success closes the streak. */
export class FailureStreak {
    private failures = 0

    constructor(private readonly options: BackoffOptions) {}

    get count(): number {
        return this.failures
    }

    recordSuccess(): void {
        this.failures = 0
    }

    recordFailure(durationSeconds: number): FailureVerdict {
        this.failures++
        const { threshold, baseSeconds, maxSeconds, quickFailureSeconds } = this.options
        const waitSeconds =
            durationSeconds < quickFailureSeconds ? backoffSeconds(this.failures, baseSeconds, maxSeconds) : 0
        if (this.failures >= threshold) return { action: 'stop', failures: this.failures }
        return { action: 'continue', waitSeconds }
    }
}
