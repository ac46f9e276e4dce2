import type { FileSystem } from '../core/fs.js'
import { sleep } from '../harness/backoff.js'
import type { Logger } from '../logger/index.js'
import { renderDashboard } from './render.js'
import { collectSnapshot, type SystemProbe } from './snapshot.js'

export interface MonitorOptions {
    projectDir: string
    refreshSeconds: number
    signal: AbortSignal
    write: (text: string) => void
}

const CLEAR_SCREEN = '\x1b[2J\x1b[H'

/** Redraws the dashboard until `signal` aborts. Read-only: never touches the files it watches. */
export async function runMonitor(
    deps: { fs: FileSystem; probe: SystemProbe; logger: Logger },
    options: MonitorOptions
): Promise<void> {
    while (!options.signal.aborted) {
        const snapshot = await collectSnapshot(deps.fs, deps.probe, options.projectDir)
        deps.logger.debug({ events: snapshot.events.length, agentRunning: snapshot.agentRunning }, 'monitor:refresh')
        options.write(`${CLEAR_SCREEN}${renderDashboard(snapshot).join('\n')}\n`)
        await sleep(options.refreshSeconds * 1000, options.signal)
    }
}
