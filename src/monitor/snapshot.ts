import path from 'node:path'
import { execa } from 'execa'
import { PROJECT_FILES } from '../config/defaults.js'
import type { FileSystem } from '../core/fs.js'
import type { LoggedEvent } from '../core/types.js'
import { type Feature, loadFeatures } from '../harness/features.js'
import { type HarnessLogSummary, parseHarnessLog } from '../harness/harness-log.js'
import type { LiveState } from '../supervisor/state-snapshot.js'
import { readLiveLog, readLiveState } from './live-log.js'

export interface GitSummary {
    commits: number
    lastMessage: string
    uncommitted: number
}

/** Questions about the host that the dashboard asks on every refresh. */
export interface SystemProbe {
    agentRunning(): Promise<boolean>
    git(projectDir: string): Promise<GitSummary | null>
}

export interface MonitorSnapshot {
    projectDir: string
    takenAt: number
    events: LoggedEvent[]
    liveLogMtime: number | null
    liveState: LiveState | null
    liveStateMtime: number | null
    features: Feature[] | null
    history: HarnessLogSummary
    git: GitSummary | null
    agentRunning: boolean
}

export function createSystemProbe(agentCommand: string): SystemProbe {
    return {
        async agentRunning() {
            // Matches the headless invocation the runner builds, not interactive agent sessions.
            const result = await execa('pgrep', ['-f', `${agentCommand} -p`], { reject: false })
            return result.exitCode === 0
        },
        async git(projectDir) {
            const run = (args: string[]) => execa('git', ['-C', projectDir, ...args], { reject: false })
            const [count, last, status] = await Promise.all([
                run(['rev-list', '--count', 'HEAD']),
                run(['log', '--format=%s', '-1']),
                run(['status', '--porcelain']),
            ])
            if (count.exitCode !== 0) return null
            return {
                commits: Number.parseInt(count.stdout.trim(), 10) || 0,
                lastMessage: last.stdout.trim(),
                uncommitted: status.stdout.split('\n').filter((line) => line.trim()).length,
            }
        },
    }
}

async function readHistory(fs: FileSystem, file: string): Promise<HarnessLogSummary> {
    if (!(await fs.exists(file))) return { model: undefined, completed: false, sessions: [] }
    return parseHarnessLog(await fs.readText(file))
}

export async function collectSnapshot(
    fs: FileSystem,
    probe: SystemProbe,
    projectDir: string,
    now: number = Date.now()
): Promise<MonitorSnapshot> {
    const file = (name: string) => path.join(projectDir, name)
    const liveLog = file(PROJECT_FILES.eventLog)
    const stateFile = file(PROJECT_FILES.stateSnapshot)

    const [events, liveLogMtime, liveState, liveStateMtime, features, history, git, agentRunning] = await Promise.all([
        readLiveLog(fs, liveLog),
        fs.mtime(liveLog),
        readLiveState(fs, stateFile),
        fs.mtime(stateFile),
        loadFeatures(fs, file(PROJECT_FILES.features)),
        readHistory(fs, file(PROJECT_FILES.harnessLog)),
        probe.git(projectDir),
        probe.agentRunning(),
    ])

    return {
        projectDir,
        takenAt: now,
        events,
        liveLogMtime,
        liveState,
        liveStateMtime,
        features: features.ok ? features.value : null,
        history,
        git,
        agentRunning,
    }
}
