import path from 'node:path'
import { PROJECT_FILES } from '../config/defaults.js'
import type { ResolvedConfig } from '../config/schema.js'
import { classifyError, errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { FileSystem } from '../core/fs.js'
import { describeStatus, type HarnessPhase, type SessionOutcome } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { SessionRunner } from '../session/runner.js'
import type { Clock } from '../supervisor/activity.js'
import { ARTIFACT_NAMES, validateArtifacts } from './artifacts.js'
import { FailureStreak, sleep as defaultSleep } from './backoff.js'
import { type FeatureProgress, isComplete, readFeatureProgress } from './features.js'
import { HarnessLog } from './harness-log.js'
import { loadPrompt, type PromptName } from './prompts.js'

/** Human-facing progress lines; operational detail goes to the logger instead. */
export interface HarnessReporter {
    header(title: string): void
    info(message: string): void
    success(message: string): void
    warn(message: string): void
    error(message: string): void
    progress(progress: FeatureProgress): void
}

export interface HarnessDeps {
    runner: Pick<SessionRunner, 'run'>
    fs: FileSystem
    logger: Logger
    eventBus: TypedEventEmitter
    reporter: HarnessReporter
    config: Pick<
        ResolvedConfig,
        | 'model'
        | 'maxSessions'
        | 'maxConsecutiveFailures'
        | 'backoffBaseSeconds'
        | 'backoffMaxSeconds'
        | 'quickFailureSeconds'
    >
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
    now?: Clock
}

export interface HarnessRunOptions {
    goal: string
    /** Absolute path of the project the agent works in. */
    projectDir: string
    skipInit: boolean
    signal?: AbortSignal
}

export type StopReason =
    | 'complete'
    | 'artifactsExist'
    | 'artifactsMissing'
    | 'initializerFailed'
    | 'tooManyFailures'
    | 'cancelled'
    | 'sessionLimit'

export interface HarnessSummary {
    phase: Extract<HarnessPhase, 'complete' | 'stopped'>
    reason: StopReason
    progress: FeatureProgress
    sessionsUsed: number
    harnessLogPath: string
    exitCode: 0 | 1
}

interface ProjectPaths {
    dir: string
    features: string
    harnessLog: string
}

/**
 * Two-phase driver: one initializer session that lays down the project artifacts, then coding
 * sessions until every feature passes, the session limit is reached, or failures pile up.
 */
export class Harness {
    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
    private readonly now: Clock

    constructor(private readonly deps: HarnessDeps) {
        this.sleep = deps.sleep ?? defaultSleep
        this.now = deps.now ?? Date.now
    }

    async run(options: HarnessRunOptions): Promise<HarnessSummary> {
        const { fs, logger } = this.deps
        const paths: ProjectPaths = {
            dir: options.projectDir,
            features: path.join(options.projectDir, PROJECT_FILES.features),
            harnessLog: path.join(options.projectDir, PROJECT_FILES.harnessLog),
        }
        await fs.mkdir(paths.dir)
        const harnessLog = new HarnessLog(fs, paths.harnessLog)
        await harnessLog.begin({ goal: options.goal, model: this.deps.config.model, startedAt: new Date(this.now()) })
        logger.info({ projectDir: paths.dir, skipInit: options.skipInit }, 'harness:start')

        const setup = options.skipInit
            ? await this.resume(paths)
            : await this.initialize(options, paths, harnessLog)
        if (setup) return this.finish(setup, 0, paths, false)

        const { reason, sessionsUsed } = await this.codingLoop(options, paths, harnessLog)
        return this.finish(reason, sessionsUsed, paths, true)
    }

    /** Resolves to a stop reason when the run cannot continue to the coding loop. */
    private async initialize(
        options: HarnessRunOptions,
        paths: ProjectPaths,
        harnessLog: HarnessLog
    ): Promise<StopReason | undefined> {
        const { fs, reporter } = this.deps
        this.enterPhase('initializer', 0)
        reporter.header('Phase 1: Initializer Session')

        if ((await validateArtifacts(fs, paths.dir)).ok) {
            reporter.warn(`Artifacts already exist in ${paths.dir}`)
            reporter.warn('Use --skip-init to resume, or remove the directory to start fresh.')
            return 'artifactsExist'
        }

        reporter.info('Starting initializer session...')
        const outcome = await this.runSession('initializer', options)
        const durationSeconds = Math.round(outcome.durationMs / 1000)

        if (outcome.status.state !== 'success') {
            reporter.error(`Initializer session failed: ${describeStatus(outcome.status)}`)
            await harnessLog.appendSession({
                session: 0,
                passed: 0,
                total: 0,
                durationSeconds,
                status: describeStatus(outcome.status),
            })
            return outcome.status.state === 'killed' && outcome.status.cause === 'cancelled'
                ? 'cancelled'
                : 'initializerFailed'
        }

        const artifacts = await validateArtifacts(fs, paths.dir)
        if (!artifacts.ok) {
            reporter.error(`Initializer session completed but artifacts are missing: ${artifacts.error.join(', ')}`)
            reporter.error(`Expected: ${ARTIFACT_NAMES.join(', ')}`)
            return 'artifactsMissing'
        }

        const progress = await readFeatureProgress(fs, paths.features)
        reporter.success(`Initializer complete. Features: ${progress.passed}/${progress.total}`)
        reporter.progress(progress)
        await harnessLog.appendSession({ session: 0, ...progress, durationSeconds, status: 'success' })
        return undefined
    }

    private async resume(paths: ProjectPaths): Promise<StopReason | undefined> {
        const { fs, reporter } = this.deps
        reporter.info('Skipping initializer (--skip-init)')
        const artifacts = await validateArtifacts(fs, paths.dir)
        if (!artifacts.ok) {
            reporter.error(`Cannot skip init: artifacts are missing in ${paths.dir}: ${artifacts.error.join(', ')}`)
            return 'artifactsMissing'
        }
        const progress = await readFeatureProgress(fs, paths.features)
        reporter.info(`Resuming with ${progress.passed}/${progress.total} features passing`)
        return undefined
    }

    private async codingLoop(
        options: HarnessRunOptions,
        paths: ProjectPaths,
        harnessLog: HarnessLog
    ): Promise<{ reason: StopReason; sessionsUsed: number }> {
        const { fs, reporter, logger, config } = this.deps
        const streak = new FailureStreak({
            threshold: config.maxConsecutiveFailures,
            baseSeconds: config.backoffBaseSeconds,
            maxSeconds: config.backoffMaxSeconds,
            quickFailureSeconds: config.quickFailureSeconds,
        })
        reporter.header('Phase 2: Coding Sessions')

        let sessionsUsed = 0
        for (let session = 1; session <= config.maxSessions; session++) {
            if (options.signal?.aborted) return { reason: 'cancelled', sessionsUsed }

            const before = await readFeatureProgress(fs, paths.features)
            if (isComplete(before)) {
                reporter.header('ALL FEATURES PASSING!')
                reporter.success(`All ${before.total} features are passing after ${sessionsUsed} coding sessions.`)
                await harnessLog.markCompleted()
                return { reason: 'complete', sessionsUsed }
            }

            this.enterPhase('coding', session)
            reporter.header(`Coding Session ${session} / ${config.maxSessions}`)
            reporter.progress(before)

            const outcome = await this.attemptSession(session, options)
            sessionsUsed = session
            const durationSeconds = Math.round(outcome.durationMs / 1000)
            const after = await readFeatureProgress(fs, paths.features)
            const record = { session, ...after, durationSeconds, status: describeStatus(outcome.status) }

            if (outcome.status.state === 'killed' && outcome.status.cause === 'cancelled') {
                await harnessLog.appendSession(record)
                return { reason: 'cancelled', sessionsUsed }
            }

            if (outcome.status.state === 'success') {
                streak.recordSuccess()
            } else {
                reporter.warn(`Session ${session} ended ${describeStatus(outcome.status)} after ${durationSeconds}s`)
                const verdict = streak.recordFailure(durationSeconds)
                if (verdict.action === 'stop') {
                    reporter.error(`${verdict.failures} consecutive failures. Stopping to avoid wasting sessions.`)
                    reporter.error('Check API rate limits or errors, then resume with --skip-init.')
                    await harnessLog.appendSession(record)
                    return { reason: 'tooManyFailures', sessionsUsed }
                }
                if (verdict.waitSeconds > 0) {
                    reporter.warn(
                        `Session failed in under ${config.quickFailureSeconds}s, likely rate limited. ` +
                            `Waiting ${verdict.waitSeconds}s before retry...`
                    )
                    logger.info({ session, failures: streak.count, waitSeconds: verdict.waitSeconds }, 'harness:backoff')
                    await this.sleep(verdict.waitSeconds * 1000, options.signal)
                }
            }

            reporter.info(`Session ${session} complete in ${durationSeconds}s. Features: ${after.passed}/${after.total}`)
            reporter.progress(after)
            await harnessLog.appendSession(record)
        }

        const final = await readFeatureProgress(fs, paths.features)
        if (isComplete(final)) {
            await harnessLog.markCompleted()
            return { reason: 'complete', sessionsUsed }
        }
        return { reason: 'sessionLimit', sessionsUsed }
    }

    /** A launch that fails for a transient reason counts as a failed session instead of ending the run. */
    private async attemptSession(session: number, options: HarnessRunOptions): Promise<SessionOutcome> {
        const startedAt = this.now()
        try {
            return await this.runSession('coding', options)
        } catch (error) {
            if (classifyError(error) !== 'transient') throw error
            this.deps.logger.warn({ session, error: errorMessage(error) }, 'harness:launch-failed')
            return {
                status: { state: 'failure', cause: 'spawnFailed' },
                tokensIn: 0,
                tokensOut: 0,
                eventLogPath: path.join(options.projectDir, PROJECT_FILES.eventLog),
                eventCount: 0,
                exitCode: null,
                signal: null,
                durationMs: this.now() - startedAt,
            }
        }
    }

    private async runSession(prompt: PromptName, options: HarnessRunOptions): Promise<SessionOutcome> {
        const task = await loadPrompt(this.deps.fs, prompt, { goal: options.goal, projectDir: options.projectDir })
        return this.deps.runner.run(task, options.projectDir, undefined, options.signal)
    }

    private enterPhase(phase: HarnessPhase, session: number): void {
        this.deps.logger.info({ phase, session }, 'harness:phase')
        this.deps.eventBus.emit('harness:phase', { phase, session })
    }

    /** Runs stopped before the coding loop never count as complete, whatever features.json says. */
    private async finish(
        reason: StopReason,
        sessionsUsed: number,
        paths: ProjectPaths,
        reachedLoop: boolean
    ): Promise<HarnessSummary> {
        const progress = await readFeatureProgress(this.deps.fs, paths.features)
        const complete = reachedLoop && isComplete(progress)
        const phase = complete ? 'complete' : 'stopped'
        this.enterPhase(phase, sessionsUsed)
        this.deps.logger.info({ reason, sessionsUsed, ...progress }, 'harness:finish')
        return {
            phase,
            reason: complete ? 'complete' : reason,
            progress,
            sessionsUsed,
            harnessLogPath: paths.harnessLog,
            exitCode: complete ? 0 : 1,
        }
    }
}
