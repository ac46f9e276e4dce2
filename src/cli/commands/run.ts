import path from 'node:path'
import { loadConfig } from '../../config/loader.js'
import type { Config, ResolvedConfig } from '../../config/schema.js'
import { createContainer } from '../../core/container.js'
import { NodeFileSystem } from '../../core/fs.js'
import { ARTIFACT_NAMES } from '../../harness/artifacts.js'
import { Harness, type HarnessSummary } from '../../harness/orchestrator.js'
import { promptPath } from '../../harness/prompts.js'
import { buildAgentCommand, formatCommandLine } from '../../session/command.js'
import { createConsoleReporter } from '../reporter.js'
import { createSessionPrinter } from '../session-printer.js'
import { cancellationOnSignals } from '../signals.js'
import { colors, header, progressBar } from '../ui.js'

export interface RunFlags {
    dir: string
    maxSessions?: number
    model?: string
    mcpConfig?: string
    skipInit?: boolean
    dryRun?: boolean
    debug?: boolean
}

export function cliConfig(flags: Pick<RunFlags, 'model' | 'mcpConfig' | 'maxSessions' | 'debug'>): Partial<Config> {
    return {
        model: flags.model,
        mcpConfig: flags.mcpConfig,
        maxSessions: flags.maxSessions,
        logLevel: flags.debug ? 'debug' : undefined,
    }
}

export function dryRunLines(goal: string, config: ResolvedConfig, skipInit: boolean): string[] {
    const command = buildAgentCommand('<prompt>', config)
    const lines = [
        header('DRY RUN'),
        `Goal:           ${goal}`,
        `Project dir:    ${config.projectDir}`,
        `Max sessions:   ${config.maxSessions}`,
        `Model:          ${config.model}`,
        `MCP config:     ${config.mcpConfig ?? 'none'}`,
        `Skip init:      ${skipInit}`,
        `Budgets:        session ${config.sessionTimeoutSeconds}s, idle ${config.idleTimeoutSeconds}s, ` +
            `poll ${config.pollIntervalSeconds}s`,
        '',
    ]
    if (!skipInit) {
        lines.push(
            'Step 1: Would run initializer session',
            `  Prompt: ${promptPath('initializer')}`,
            `  Creates: ${ARTIFACT_NAMES.join(', ')}`,
            ''
        )
    }
    lines.push(
        `Step 2: Would loop up to ${config.maxSessions} coding sessions`,
        `  Prompt: ${promptPath('coding')}`,
        '  Each session: pick 1 feature → implement → test → update artifacts → commit',
        '',
        'Agent command that would be used:',
        `  ${formatCommandLine(command)}`
    )
    return lines
}

function summaryLines(goal: string, summary: HarnessSummary, projectDir: string, metrics: string): string[] {
    const { progress } = summary
    const lines = [
        header('Final Summary'),
        `Features passing: ${progress.passed} / ${progress.total}  ${progressBar(progress)}`,
        `Sessions used:    ${summary.sessionsUsed}`,
        `Harness log:      ${summary.harnessLogPath}`,
        `Project dir:      ${projectDir}`,
        colors.dim(metrics),
    ]
    if (summary.exitCode === 0) {
        lines.push(colors.success('Project complete!'))
    } else {
        lines.push(
            colors.warn(`Project incomplete (${summary.reason}). ${progress.total - progress.passed} features remaining.`),
            colors.warn(`Re-run with: longhaul --skip-init -d "${projectDir}" "${goal}"`)
        )
    }
    return lines
}

/** Resolves to the process exit code. */
export async function runCommand(goal: string, flags: RunFlags): Promise<number> {
    const projectDir = path.resolve(flags.dir)
    const fs = new NodeFileSystem()
    const config = await loadConfig({ fs, projectDir, cliFlags: cliConfig(flags) })

    if (flags.dryRun) {
        for (const line of dryRunLines(goal, config, flags.skipInit ?? false)) console.log(line)
        return 0
    }

    const container = createContainer(config, { fs })
    const printer = createSessionPrinter(container.eventBus)
    const reporter = createConsoleReporter()
    const cancellation = cancellationOnSignals((received) => {
        reporter.warn(`${received} received, stopping the current session...`)
    })

    try {
        reporter.header('Long-Running Agent Harness')
        console.log(`Goal:         ${goal}`)
        console.log(`Project dir:  ${projectDir}`)
        console.log(`Max sessions: ${config.maxSessions}`)
        console.log(`Model:        ${config.model}\n`)

        const harness = new Harness({
            runner: container.sessionRunner,
            fs,
            logger: container.logger,
            eventBus: container.eventBus,
            reporter,
            config,
        })
        const summary = await harness.run({
            goal,
            projectDir,
            skipInit: flags.skipInit ?? false,
            signal: cancellation.signal,
        })
        for (const line of summaryLines(goal, summary, projectDir, container.metrics.formatStatus())) console.log(line)
        return summary.exitCode
    } finally {
        cancellation.dispose()
        printer.dispose()
        container.shutdown()
    }
}
