import type { ResolvedConfig } from '../config/schema.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { SessionBudgets, SessionOutcome } from '../core/types.js'
import { describeStatus } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { ProcessSupervisor, type SupervisorDeps } from '../supervisor/supervisor.js'
import { type AgentCommand, agentEnvironment, buildAgentCommand } from './command.js'

export type CommandBuilder = (task: string) => AgentCommand

export interface SessionRunnerDeps extends SupervisorDeps {
    config: Pick<
        ResolvedConfig,
        'agentCommand' | 'model' | 'mcpConfig' | 'sessionTimeoutSeconds' | 'idleTimeoutSeconds' | 'pollIntervalSeconds'
    >
    /** Overrides how a task becomes a command line; defaults to the agent CLI invocation. */
    buildCommand?: CommandBuilder
    env?: NodeJS.ProcessEnv
}

/** The watchdog samples too rarely to honour the tighter of the two budgets. */
export function pollIntervalTooLong(budgets: SessionBudgets): boolean {
    const tightest = Math.min(budgets.sessionTimeoutSeconds, budgets.idleTimeoutSeconds)
    return budgets.pollIntervalSeconds * 2 > tightest
}

/**
 * Caller-facing entry point: one supervised agent invocation per call. Runs against the same working
 * directory must not overlap; nothing here guards against that.
 */
export class SessionRunner {
    private readonly supervisor: ProcessSupervisor
    private readonly logger: Logger
    private readonly eventBus: TypedEventEmitter

    constructor(private readonly deps: SessionRunnerDeps) {
        this.supervisor = new ProcessSupervisor(deps)
        this.logger = deps.logger
        this.eventBus = deps.eventBus
    }

    defaultBudgets(): SessionBudgets {
        const { sessionTimeoutSeconds, idleTimeoutSeconds, pollIntervalSeconds } = this.deps.config
        return { sessionTimeoutSeconds, idleTimeoutSeconds, pollIntervalSeconds }
    }

    commandFor(task: string): AgentCommand {
        if (this.deps.buildCommand) return this.deps.buildCommand(task)
        const { agentCommand, model, mcpConfig } = this.deps.config
        return buildAgentCommand(task, { agentCommand, model, mcpConfig })
    }

    async run(
        task: string,
        cwd: string,
        budgets: SessionBudgets = this.defaultBudgets(),
        signal?: AbortSignal
    ): Promise<SessionOutcome> {
        const { command, args } = this.commandFor(task)
        this.logger.info({ cwd, command, budgets }, 'session:start')
        if (pollIntervalTooLong(budgets)) {
            this.logger.warn({ budgets }, 'session:poll-interval-too-long')
        }

        const outcome = await this.supervisor.supervise({
            command,
            args,
            cwd,
            env: agentEnvironment(this.deps.env),
            budgets,
            signal,
        })

        this.logger.info(
            {
                cwd,
                status: describeStatus(outcome.status),
                tokensIn: outcome.tokensIn,
                tokensOut: outcome.tokensOut,
                events: outcome.eventCount,
                durationMs: outcome.durationMs,
            },
            'session:end'
        )
        this.eventBus.emit('session:end', { cwd, outcome })
        return outcome
    }
}
