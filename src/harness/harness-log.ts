import type { FileSystem } from '../core/fs.js'

export interface SessionRecord {
    session: number
    passed: number
    total: number
    durationSeconds: number
    /** `success`, or a short description of how the session failed. */
    status: string
    timestamp?: Date
}

export interface HarnessLogHeader {
    goal: string
    model: string
    startedAt: Date
}

export interface HarnessLogSummary {
    model: string | undefined
    completed: boolean
    sessions: SessionRecord[]
}

const COMPLETED_MARKER = 'completed'

function isoSeconds(date: Date): string {
    return `${date.toISOString().slice(0, 19)}Z`
}

/**
 * Plain-text run history in the project directory, appended to after every session and read back
 * by the monitor.
 */
export class HarnessLog {
    constructor(
        private readonly fs: FileSystem,
        readonly path: string
    ) {}

    async begin(header: HarnessLogHeader): Promise<void> {
        const lines = [
            '=== Harness Log ===',
            `Goal: ${header.goal}`,
            `Started: ${isoSeconds(header.startedAt)}`,
            `Model: ${header.model}`,
        ]
        await this.fs.writeText(this.path, `${lines.join('\n')}\n`)
    }

    async appendSession(record: SessionRecord): Promise<void> {
        const block = [
            '',
            `--- Session ${record.session} [${isoSeconds(record.timestamp ?? new Date())}] ---`,
            `Status: ${record.status}`,
            `Duration: ${record.durationSeconds}s`,
            `Features: ${record.passed}/${record.total} passing`,
        ]
        await this.fs.appendText(this.path, `${block.join('\n')}\n`)
    }

    async markCompleted(): Promise<void> {
        await this.fs.appendText(this.path, `${COMPLETED_MARKER}\n`)
    }
}

const SESSION_HEADER = /^--- Session (\d+) \[([^\]]+)\] ---$/

export function parseHarnessLog(text: string): HarnessLogSummary {
    const summary: HarnessLogSummary = { model: undefined, completed: false, sessions: [] }
    let current: SessionRecord | undefined

    for (const line of text.split('\n')) {
        const header = SESSION_HEADER.exec(line)
        if (header) {
            current = {
                session: Number(header[1]),
                timestamp: new Date(header[2] ?? ''),
                passed: 0,
                total: 0,
                durationSeconds: 0,
                status: 'unknown',
            }
            summary.sessions.push(current)
            continue
        }
        if (line === COMPLETED_MARKER) {
            summary.completed = true
        } else if (line.startsWith('Model: ') && summary.model === undefined) {
            summary.model = line.slice('Model: '.length)
        } else if (current && line.startsWith('Status: ')) {
            current.status = line.slice('Status: '.length)
        } else if (current && line.startsWith('Duration: ')) {
            current.durationSeconds = Number.parseInt(line.slice('Duration: '.length), 10) || 0
        } else if (current && line.startsWith('Features: ')) {
            const match = /^Features: (\d+)\/(\d+)/.exec(line)
            current.passed = Number(match?.[1] ?? 0)
            current.total = Number(match?.[2] ?? 0)
        }
    }
    return summary
}
