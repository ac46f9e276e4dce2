import { formatDuration } from '../cli/ui.js'

export type RunState =
    | 'complete'
    | 'coding'
    | 'thinking'
    | 'longWait'
    | 'likelyStuck'
    | 'betweenSessions'
    | 'backoff'
    | 'sessionGap'
    | 'notRunning'

export interface StateInputs {
    completed: boolean
    agentRunning: boolean
    /** Seconds since the live log last changed; `null` when there is no log yet. */
    outputAgeSeconds: number | null
    lastSessionFailed: boolean
}

export interface DetectedState {
    state: RunState
    label: string
    detail: string
}

const THRESHOLDS = {
    activeOutput: 30,
    thinking: 300,
    longWait: 1200,
    betweenSessions: 60,
    sessionGap: 300,
} as const

export function detectState(inputs: StateInputs): DetectedState {
    if (inputs.completed) return { state: 'complete', label: 'COMPLETE', detail: 'All features passing' }

    const age = inputs.outputAgeSeconds ?? Number.POSITIVE_INFINITY
    const silent = Number.isFinite(age) ? formatDuration(age) : 'ever'

    if (inputs.agentRunning) {
        if (age < THRESHOLDS.activeOutput) return { state: 'coding', label: 'CODING', detail: 'active output' }
        if (age < THRESHOLDS.thinking) {
            return { state: 'thinking', label: 'THINKING', detail: `no output for ${silent}` }
        }
        if (age < THRESHOLDS.longWait) {
            return { state: 'longWait', label: 'LONG WAIT', detail: `no output for ${silent}` }
        }
        return { state: 'likelyStuck', label: 'LIKELY STUCK', detail: `agent alive but silent ${silent}` }
    }

    if (age < THRESHOLDS.betweenSessions) {
        return { state: 'betweenSessions', label: 'BETWEEN SESSIONS', detail: 'preparing next session' }
    }
    if (inputs.lastSessionFailed) return { state: 'backoff', label: 'BACKOFF', detail: 'waiting after a failed session' }
    if (age < THRESHOLDS.sessionGap) {
        return { state: 'sessionGap', label: 'SESSION GAP', detail: `${silent} since last activity` }
    }
    return { state: 'notRunning', label: 'NOT RUNNING', detail: `no activity for ${silent}` }
}
