import path from 'node:path'
import { loadConfig } from '../../config/loader.js'
import { NodeFileSystem } from '../../core/fs.js'
import { createLogger } from '../../logger/index.js'
import { runMonitor } from '../../monitor/monitor.js'
import { createSystemProbe } from '../../monitor/snapshot.js'
import { cancellationOnSignals } from '../signals.js'
import { formatError } from '../ui.js'

const HIDE_CURSOR = '\x1b[?25l'
const SHOW_CURSOR = '\x1b[?25h'

export async function monitorCommand(dir: string, flags: { interval: number }): Promise<number> {
    const projectDir = path.resolve(dir)
    const fs = new NodeFileSystem()
    if (!(await fs.isDirectory(projectDir))) {
        console.error(formatError(`Project directory not found: ${projectDir}`))
        return 1
    }

    const config = await loadConfig({ fs, projectDir })
    const logger = createLogger(config)
    const cancellation = cancellationOnSignals()
    const write = (text: string) => {
        process.stdout.write(text)
    }

    write(HIDE_CURSOR)
    try {
        await runMonitor(
            { fs, probe: createSystemProbe(config.agentCommand), logger },
            { projectDir, refreshSeconds: flags.interval, signal: cancellation.signal, write }
        )
        return 0
    } finally {
        write(`${SHOW_CURSOR}\n`)
        cancellation.dispose()
    }
}
