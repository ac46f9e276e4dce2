import type { KillCause, SessionStatus } from '../core/types.js'
import type { HarnessEvent, TerminalResult } from '../stream/types.js'

export interface ExitObservation {
    exitCode: number | null
    signal: string | null
    spawnFailed: boolean
    terminal: TerminalResult | null
    /** Set when the watchdog or the caller asked for termination. */
    killCause: KillCause | null
    /** Whether that termination actually reached a live process. */
    killDelivered: boolean
}

/**
 * Maps how the subprocess ended to one terminal status. A requested kill only counts when it reached
 * a live process and the run did not finish on its own (no signal and a terminal result means the
 * process exited naturally first).
 */
export function classifyOutcome(exit: ExitObservation): SessionStatus {
    if (exit.spawnFailed) return { state: 'failure', cause: 'spawnFailed' }
    if (exit.killCause && exit.killDelivered && (exit.signal !== null || exit.terminal === null)) {
        return { state: 'killed', cause: exit.killCause }
    }
    if (exit.terminal?.isError) return { state: 'failure', cause: 'subprocessError' }
    if (exit.signal !== null) return { state: 'failure', cause: 'signal' }
    if (exit.exitCode !== 0) return { state: 'failure', cause: 'nonZeroExit' }
    if (!exit.terminal) return { state: 'failure', cause: 'noResult' }
    return { state: 'success' }
}

/**
 * Token totals for a run. The terminal result carries the session's cumulative usage and wins; until
 * one arrives, per-message usage is summed.
 */
export class TokenTally {
    private messageIn = 0
    private messageOut = 0
    private terminalResult: TerminalResult | null = null

    add(event: HarnessEvent): void {
        if (event.kind === 'assistant') {
            this.messageIn += event.inputTokens
            this.messageOut += event.outputTokens
        } else if (event.kind === 'result') {
            this.terminalResult = event
        }
    }

    get terminal(): TerminalResult | null {
        return this.terminalResult
    }

    totals(): { tokensIn: number; tokensOut: number } {
        if (this.terminalResult) {
            return { tokensIn: this.terminalResult.inputTokens, tokensOut: this.terminalResult.outputTokens }
        }
        return { tokensIn: this.messageIn, tokensOut: this.messageOut }
    }
}
