import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { execa } from 'execa'
import { PROJECT_FILES } from '../config/defaults.js'
import { errorMessage, toHarnessError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { FileSystem } from '../core/fs.js'
import type { KillCause, SessionBudgets, SessionOutcome } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { decodeLine } from '../stream/decoder.js'
import { ActivityTracker, type Clock } from './activity.js'
import { classifyOutcome, TokenTally } from './classify.js'
import { EventLog } from './event-log.js'
import { OutputTail } from './output-tail.js'
import { handleFor, type ProcessHandle, terminateProcessTree } from './process-tree.js'
import { LiveStateWriter } from './state-snapshot.js'
import { Watchdog } from './watchdog.js'

export interface SupervisorDeps {
    fs: FileSystem
    logger: Logger
    eventBus: TypedEventEmitter
    /** Sleep between empty reads of the subprocess output. */
    drainPollMs: number
    /** Delay between the graceful and the forceful signal. */
    killGraceMs: number
    now?: Clock
    platform?: NodeJS.Platform
}

export interface SuperviseRequest {
    command: string
    args: string[]
    cwd: string
    env: NodeJS.ProcessEnv
    budgets: SessionBudgets
    signal?: AbortSignal
}

interface Scratch {
    dir: string
    outputPath: string
}

type ExitInfo = { exitCode: number | null; signal: string | null; spawnFailed: boolean }

type CleanupStep = [name: string, run: () => Promise<void>]

/** Runs every step even when an earlier one fails. */
async function runCleanupSteps(logger: Logger, steps: CleanupStep[]): Promise<void> {
    for (const [step, run] of steps) {
        try {
            await run()
        } catch (error) {
            logger.debug({ step, error: errorMessage(error) }, 'session:cleanup-step-failed')
        }
    }
}

/**
 * One supervised subprocess: spawn, drain, watchdog, and the cleanup every exit path goes through.
 * `terminate` and `release` are idempotent and may race each other.
 */
export class SupervisedSession {
    private exited = false
    private exitInfo: ExitInfo | undefined
    private killCause: KillCause | null = null
    private terminating: Promise<boolean> | undefined
    private releasing: Promise<void> | undefined
    private orphanTimer: NodeJS.Timeout | undefined
    private readonly now: Clock
    private readonly activity: ActivityTracker
    private readonly tally = new TokenTally()
    private readonly watchdog: Watchdog
    private readonly exitPromise: Promise<ExitInfo>
    private readonly onAbort = () => {
        void this.terminate('cancelled')
    }

    private constructor(
        private readonly deps: SupervisorDeps,
        private readonly request: SuperviseRequest,
        private readonly scratch: Scratch,
        private readonly eventLog: EventLog,
        private readonly liveState: LiveStateWriter,
        exit: Promise<ExitInfo>,
        readonly handle: ProcessHandle | undefined,
        private readonly startedAt: number
    ) {
        const now = deps.now ?? Date.now
        this.now = now
        this.activity = new ActivityTracker(now)
        this.exitPromise = exit.then((info) => {
            this.exited = true
            this.exitInfo = info
            return info
        })
        this.watchdog = new Watchdog({
            sessionTimeoutMs: request.budgets.sessionTimeoutSeconds * 1000,
            idleTimeoutMs: request.budgets.idleTimeoutSeconds * 1000,
            pollIntervalMs: request.budgets.pollIntervalSeconds * 1000,
            activity: this.activity,
            isExited: () => this.exited,
            onExpire: (cause, elapsedMs, idleMs) => {
                deps.eventBus.emit('watchdog:expired', { cause, elapsedMs, idleMs })
                return this.terminate(cause)
            },
            logger: deps.logger,
            now,
        })
    }

    static async launch(deps: SupervisorDeps, request: SuperviseRequest): Promise<SupervisedSession> {
        const now = deps.now ?? Date.now
        const startedAt = now()
        const platform = deps.platform ?? process.platform

        const dir = await mkdtemp(path.join(os.tmpdir(), 'longhaul-'))
        const outputPath = path.join(dir, 'output.jsonl')
        let eventLog: EventLog | undefined
        try {
            await writeFile(outputPath, '')
            eventLog = await EventLog.open(path.join(request.cwd, PROJECT_FILES.eventLog), deps.logger)
            const liveState = new LiveStateWriter(
                deps.fs,
                path.join(request.cwd, PROJECT_FILES.stateSnapshot),
                deps.logger
            )
            await liveState.reset()
            await deps.fs.writeText(path.join(request.cwd, PROJECT_FILES.rawPointer), `${outputPath}\n`)

            const subprocess = execa(request.command, request.args, {
                cwd: request.cwd,
                env: request.env,
                extendEnv: false,
                detached: true,
                stdin: 'ignore',
                stdout: { file: outputPath, append: true },
                stderr: { file: outputPath, append: true },
                reject: false,
            })
            const exit = subprocess.then(
                (result): ExitInfo => ({
                    exitCode: result.exitCode ?? null,
                    signal: result.signal ?? null,
                    spawnFailed: result.failed && result.exitCode === undefined && result.signal === undefined,
                })
            )
            const handle = subprocess.pid === undefined ? undefined : handleFor(subprocess.pid, platform)

            deps.logger.info({ pid: handle?.pid, pgid: handle?.pgid, cwd: request.cwd }, 'session:spawned')
            deps.eventBus.emit('session:start', { cwd: request.cwd, pid: handle?.pid, pgid: handle?.pgid })

            const scratch: Scratch = { dir, outputPath }
            const session = new SupervisedSession(deps, request, scratch, eventLog, liveState, exit, handle, startedAt)
            subprocess.once('exit', () => session.childExited())
            return session
        } catch (error) {
            deps.logger.error({ cwd: request.cwd, error: errorMessage(error) }, 'session:launch-failed')
            const log = eventLog
            await runCleanupSteps(deps.logger, [
                ['event-log', async () => log?.close()],
                ['scratch', () => rm(dir, { recursive: true, force: true })],
            ])
            throw toHarnessError(`Cannot start session in ${request.cwd}`, error)
        }
    }

    get eventLogPath(): string {
        return this.eventLog.path
    }

    /** Drains output until the subprocess has exited and nothing is left to read, then classifies. */
    async run(): Promise<SessionOutcome> {
        const { signal } = this.request
        if (signal?.aborted) {
            void this.terminate('cancelled')
        } else {
            signal?.addEventListener('abort', this.onAbort, { once: true })
        }
        this.watchdog.start()

        const tail = new OutputTail(this.scratch.outputPath, { pollMs: this.deps.drainPollMs })
        for await (const line of tail.lines(() => this.exited)) {
            this.activity.recordActivity()
            const event = decodeLine(line)
            if (!event) continue
            const ts = new Date(this.now()).toISOString()
            this.eventLog.append(event, ts)
            this.tally.add(event)
            this.liveState.observe(event)
            this.deps.eventBus.emit('session:event', { event, ts })
        }

        const exit = await this.exitPromise
        const killDelivered = this.terminating ? await this.terminating : false
        const status = classifyOutcome({
            ...exit,
            terminal: this.tally.terminal,
            killCause: this.killCause,
            killDelivered,
        })
        return {
            status,
            ...this.tally.totals(),
            eventLogPath: this.eventLog.path,
            eventCount: this.eventLog.size,
            exitCode: exit.exitCode,
            signal: exit.signal,
            durationMs: this.now() - this.startedAt,
        }
    }

    /** Graceful-then-forceful termination of the whole process group. */
    terminate(cause: KillCause): Promise<boolean> {
        if (this.terminating) return this.terminating
        if (this.exited || !this.handle) return Promise.resolve(false)

        this.killCause = cause
        this.deps.logger.warn({ cause, pid: this.handle.pid }, 'session:terminating')
        this.terminating = this.signalTree().catch((error: unknown) => {
            this.deps.logger.warn({ cause, error: errorMessage(error) }, 'session:terminate-failed')
            return false
        })
        return this.terminating
    }

    /**
     * The agent process is gone. Output still arrives through pipes, so the run only ends once every
     * holder has closed them; descendants that keep holding them after the grace period are swept.
     */
    childExited(): void {
        if (this.exited) return
        this.orphanTimer = setTimeout(() => {
            if (this.exited || !this.handle) return
            const { logger } = this.deps
            logger.warn({ pgid: this.handle.pgid }, 'session:orphans-holding-output')
            void this.signalTree().catch((error: unknown) => {
                logger.debug({ error: errorMessage(error) }, 'session:sweep-failed')
                return false
            })
        }, this.deps.killGraceMs)
    }

    /** Stops the watchdog, signals any survivors in the group, reaps the child and frees scratch space. */
    release(): Promise<void> {
        this.releasing ??= this.cleanup()
        return this.releasing
    }

    private signalTree(): Promise<boolean> {
        if (!this.handle) return Promise.resolve(false)
        return terminateProcessTree(this.handle, {
            graceMs: this.deps.killGraceMs,
            platform: this.deps.platform,
        })
    }

    private async cleanup(): Promise<void> {
        const { fs, logger } = this.deps
        this.request.signal?.removeEventListener('abort', this.onAbort)
        clearTimeout(this.orphanTimer)
        this.watchdog.stop()
        await this.watchdog.join()
        await this.terminating

        // Descendants can outlive the direct child; sweep the group whichever way the run ended.
        await this.signalTree().catch((error: unknown) => {
            logger.debug({ error: errorMessage(error) }, 'session:sweep-failed')
            return false
        })
        await this.exitPromise

        await runCleanupSteps(logger, [
            ['event-log', () => this.eventLog.close()],
            ['state', () => this.liveState.flush()],
            ['pointer', () => fs.remove(path.join(this.request.cwd, PROJECT_FILES.rawPointer))],
            ['scratch', () => rm(this.scratch.dir, { recursive: true, force: true })],
        ])
        logger.debug({ exit: this.exitInfo }, 'session:released')
    }
}

export class ProcessSupervisor {
    constructor(private readonly deps: SupervisorDeps) {}

    async supervise(request: SuperviseRequest): Promise<SessionOutcome> {
        const session = await SupervisedSession.launch(this.deps, request)
        try {
            return await session.run()
        } finally {
            await session.release()
        }
    }
}
