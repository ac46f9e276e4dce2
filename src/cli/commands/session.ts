import path from 'node:path'
import * as clack from '@clack/prompts'
import { loadConfig } from '../../config/loader.js'
import { createContainer } from '../../core/container.js'
import { NodeFileSystem } from '../../core/fs.js'
import { describeStatus } from '../../core/types.js'
import { createSessionPrinter } from '../session-printer.js'
import { cancellationOnSignals } from '../signals.js'
import { colors, formatDuration, formatTokenUsage } from '../ui.js'

export interface SessionFlags {
    dir: string
    model?: string
    mcpConfig?: string
    debug?: boolean
}

/** One supervised session from a prompt file. Resolves to the process exit code. */
export async function sessionCommand(promptFile: string, flags: SessionFlags): Promise<number> {
    const projectDir = path.resolve(flags.dir)
    const fs = new NodeFileSystem()
    const config = await loadConfig({
        fs,
        projectDir,
        cliFlags: { model: flags.model, mcpConfig: flags.mcpConfig, logLevel: flags.debug ? 'debug' : undefined },
    })
    const prompt = await fs.readText(path.resolve(promptFile))
    await fs.mkdir(projectDir)

    const container = createContainer(config, { fs })
    const printer = createSessionPrinter(container.eventBus)
    const cancellation = cancellationOnSignals()

    clack.intro(colors.brand('longhaul session'))
    try {
        const outcome = await container.sessionRunner.run(
            prompt,
            projectDir,
            container.sessionRunner.defaultBudgets(),
            cancellation.signal
        )
        const status = describeStatus(outcome.status)
        const line = `${status} in ${formatDuration(outcome.durationMs / 1000)}, ${outcome.eventCount} events`
        clack.outro(outcome.status.state === 'success' ? colors.success(line) : colors.error(line))
        console.log(formatTokenUsage(outcome.tokensIn, outcome.tokensOut))
        console.log(colors.dim(`event log: ${outcome.eventLogPath}`))
        return outcome.status.state === 'success' ? 0 : 1
    } finally {
        cancellation.dispose()
        printer.dispose()
        container.shutdown()
    }
}
