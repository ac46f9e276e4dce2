import type { HarnessEvent } from '../stream/types.js'

export type FailureCause = 'subprocessError' | 'nonZeroExit' | 'signal' | 'spawnFailed' | 'noResult'

export type KillCause = 'wallClock' | 'idle' | 'cancelled'

export type SessionStatus =
    | { state: 'success' }
    | { state: 'failure'; cause: FailureCause }
    | { state: 'killed'; cause: KillCause }

export interface SessionBudgets {
    sessionTimeoutSeconds: number
    idleTimeoutSeconds: number
    pollIntervalSeconds: number
}

export interface SessionOutcome {
    status: SessionStatus
    tokensIn: number
    tokensOut: number
    eventLogPath: string
    eventCount: number
    exitCode: number | null
    signal: string | null
    durationMs: number
}

export type HarnessPhase = 'initializer' | 'coding' | 'complete' | 'stopped'

export type LoggedEvent = HarnessEvent & { ts: string }

export function describeStatus(status: SessionStatus): string {
    if (status.state === 'success') return 'success'
    return `${status.state} (${status.cause})`
}
