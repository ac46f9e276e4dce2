import path from 'node:path'
import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest'
import { PermanentError, TransientError } from '../../../src/core/errors.js'
import { TypedEventEmitter } from '../../../src/core/events.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import type { SessionOutcome, SessionStatus } from '../../../src/core/types.js'
import { Harness, type HarnessDeps, type HarnessReporter } from '../../../src/harness/orchestrator.js'
import { promptPath } from '../../../src/harness/prompts.js'
import { createSilentLogger } from '../../../src/logger/index.js'

const PROJECT = '/work/todo'
const GOAL = 'a todo list CLI'

type Step = () => SessionOutcome | Promise<SessionOutcome>

class ScriptedRunner {
    readonly tasks: string[] = []

    constructor(private readonly steps: Step[]) {}

    async run(task: string): Promise<SessionOutcome> {
        this.tasks.push(task)
        const step = this.steps.shift()
        if (!step) throw new Error('unexpected session')
        return step()
    }
}

function outcome(status: SessionStatus, durationMs = 120_000): SessionOutcome {
    return {
        status,
        tokensIn: 10,
        tokensOut: 5,
        eventLogPath: path.join(PROJECT, '.harness-live.jsonl'),
        eventCount: 3,
        exitCode: status.state === 'success' ? 0 : 1,
        signal: null,
        durationMs,
    }
}

const success = (): SessionOutcome => outcome({ state: 'success' })

function recordingReporter(): HarnessReporter & { lines: string[] } {
    const lines: string[] = []
    return {
        lines,
        header: (title) => lines.push(`header ${title}`),
        info: (message) => lines.push(`info ${message}`),
        success: (message) => lines.push(`success ${message}`),
        warn: (message) => lines.push(`warn ${message}`),
        error: (message) => lines.push(`error ${message}`),
        progress: ({ passed, total }) => lines.push(`progress ${passed}/${total}`),
    }
}

describe('Harness', () => {
    let fs: MockFileSystem
    let eventBus: TypedEventEmitter
    let reporter: ReturnType<typeof recordingReporter>
    let sleep: Mock<(ms: number, signal?: AbortSignal) => Promise<void>>

    function writeFeatures(passes: boolean[]): void {
        fs.setFile(
            path.join(PROJECT, 'features.json'),
            JSON.stringify({ features: passes.map((p, i) => ({ id: i + 1, description: `feature ${i + 1}`, passes: p })) })
        )
    }

    async function layArtifacts(passes: boolean[]): Promise<void> {
        fs.setFile(path.join(PROJECT, 'init.sh'), '#!/bin/sh\n')
        fs.setFile(path.join(PROJECT, 'claude-progress.txt'), 'notes\n')
        await fs.mkdir(path.join(PROJECT, '.git'))
        writeFeatures(passes)
    }

    function harness(runner: ScriptedRunner, config: Partial<HarnessDeps['config']> = {}): Harness {
        return new Harness({
            runner,
            fs,
            logger: createSilentLogger(),
            eventBus,
            reporter,
            sleep,
            config: {
                model: 'sonnet',
                maxSessions: 5,
                maxConsecutiveFailures: 3,
                backoffBaseSeconds: 30,
                backoffMaxSeconds: 300,
                quickFailureSeconds: 10,
                ...config,
            },
        })
    }

    async function harnessLog(): Promise<string> {
        return fs.readText(path.join(PROJECT, 'harness-log.txt'))
    }

    beforeEach(() => {
        fs = new MockFileSystem()
        fs.setFile(promptPath('initializer'), 'Initialize {{PROJECT_DIR}} for {{GOAL}}')
        fs.setFile(promptPath('coding'), 'Continue {{GOAL}}')
        eventBus = new TypedEventEmitter()
        reporter = recordingReporter()
        sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {})
    })

    it('initializes, codes until every feature passes and reports completion', async () => {
        const runner = new ScriptedRunner([
            async () => {
                await layArtifacts([false, false])
                return success()
            },
            () => {
                writeFeatures([true, false])
                return success()
            },
            () => {
                writeFeatures([true, true])
                return success()
            },
        ])
        const phases: string[] = []
        eventBus.on('harness:phase', ({ phase, session }) => phases.push(`${phase}:${session}`))

        const summary = await harness(runner).run({ goal: GOAL, projectDir: PROJECT, skipInit: false })

        expect(summary).toEqual({
            phase: 'complete',
            reason: 'complete',
            progress: { passed: 2, total: 2 },
            sessionsUsed: 2,
            harnessLogPath: path.join(PROJECT, 'harness-log.txt'),
            exitCode: 0,
        })
        expect(runner.tasks).toEqual([`Initialize ${PROJECT} for ${GOAL}`, `Continue ${GOAL}`, `Continue ${GOAL}`])
        expect(phases).toEqual(['initializer:0', 'coding:1', 'coding:2', 'complete:2'])
        expect(reporter.lines).toContain('header ALL FEATURES PASSING!')

        const log = await harnessLog()
        expect(log).toContain(`Goal: ${GOAL}`)
        expect(log).toContain('Features: 0/2 passing')
        expect(log).toContain('Features: 1/2 passing')
        expect(log.endsWith('Features: 2/2 passing\ncompleted\n')).toBe(true)
    })

    it('refuses to initialize over existing artifacts', async () => {
        await layArtifacts([true])
        const runner = new ScriptedRunner([])

        const summary = await harness(runner).run({ goal: GOAL, projectDir: PROJECT, skipInit: false })

        expect(summary.reason).toBe('artifactsExist')
        expect(summary.phase).toBe('stopped')
        expect(summary.exitCode).toBe(1)
        expect(runner.tasks).toEqual([])
    })

    it('stops when the initializer session fails', async () => {
        const runner = new ScriptedRunner([() => outcome({ state: 'failure', cause: 'nonZeroExit' })])

        const summary = await harness(runner).run({ goal: GOAL, projectDir: PROJECT, skipInit: false })

        expect(summary.reason).toBe('initializerFailed')
        expect(await harnessLog()).toContain('--- Session 0 [')
        expect(await harnessLog()).toContain('Status: failure (nonZeroExit)')
    })

    it('stops when the initializer leaves artifacts out', async () => {
        const runner = new ScriptedRunner([
            () => {
                writeFeatures([false])
                return success()
            },
        ])

        const summary = await harness(runner).run({ goal: GOAL, projectDir: PROJECT, skipInit: false })

        expect(summary.reason).toBe('artifactsMissing')
        expect(reporter.lines).toContain(
            'error Initializer session completed but artifacts are missing: init.sh, claude-progress.txt, .git/'
        )
    })

    it('needs artifacts to skip the initializer', async () => {
        const summary = await harness(new ScriptedRunner([])).run({ goal: GOAL, projectDir: PROJECT, skipInit: true })
        expect(summary.reason).toBe('artifactsMissing')
    })

    it('backs off after quick failures and gives up at the threshold', async () => {
        await layArtifacts([false])
        const quickFailure = () => outcome({ state: 'failure', cause: 'subprocessError' }, 2_000)
        const runner = new ScriptedRunner([quickFailure, quickFailure, quickFailure])

        const summary = await harness(runner).run({ goal: GOAL, projectDir: PROJECT, skipInit: true })

        expect(summary.reason).toBe('tooManyFailures')
        expect(summary.sessionsUsed).toBe(3)
        expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([30_000, 60_000])
        expect((await harnessLog()).match(/Status: failure \(subprocessError\)/g)).toHaveLength(3)
    })

    it('does not wait after a slow failure', async () => {
        await layArtifacts([false])
        const runner = new ScriptedRunner([
            () => outcome({ state: 'killed', cause: 'idle' }, 600_000),
            () => {
                writeFeatures([true])
                return success()
            },
        ])

        const summary = await harness(runner).run({ goal: GOAL, projectDir: PROJECT, skipInit: true })

        expect(summary.reason).toBe('complete')
        expect(sleep).not.toHaveBeenCalled()
        expect(await harnessLog()).toContain('Status: killed (idle)')
    })

    it('stops at the session limit', async () => {
        await layArtifacts([false, false])
        const runner = new ScriptedRunner([success, success])

        const summary = await harness(runner, { maxSessions: 2 }).run({
            goal: GOAL,
            projectDir: PROJECT,
            skipInit: true,
        })

        expect(summary).toMatchObject({ phase: 'stopped', reason: 'sessionLimit', sessionsUsed: 2, exitCode: 1 })
    })

    it('ends the run when a session is cancelled', async () => {
        await layArtifacts([false])
        const runner = new ScriptedRunner([() => outcome({ state: 'killed', cause: 'cancelled' }, 1_000)])

        const summary = await harness(runner).run({ goal: GOAL, projectDir: PROJECT, skipInit: true })

        expect(summary.reason).toBe('cancelled')
        expect(summary.sessionsUsed).toBe(1)
        expect(sleep).not.toHaveBeenCalled()
    })

    it('starts no session once the signal has aborted', async () => {
        await layArtifacts([false])
        const runner = new ScriptedRunner([])

        const summary = await harness(runner).run({
            goal: GOAL,
            projectDir: PROJECT,
            skipInit: true,
            signal: AbortSignal.abort(),
        })

        expect(summary.reason).toBe('cancelled')
        expect(runner.tasks).toEqual([])
    })

    it('counts a transient launch failure as a failed session', async () => {
        await layArtifacts([false])
        const runner = new ScriptedRunner([
            () => {
                throw new TransientError('Cannot start session in /work/todo: EAGAIN')
            },
        ])

        const summary = await harness(runner, { maxConsecutiveFailures: 1 }).run({
            goal: GOAL,
            projectDir: PROJECT,
            skipInit: true,
        })

        expect(summary.reason).toBe('tooManyFailures')
        expect(await harnessLog()).toContain('Status: failure (spawnFailed)')
    })

    it('propagates a permanent launch failure', async () => {
        await layArtifacts([false])
        const runner = new ScriptedRunner([
            () => {
                throw new PermanentError('Cannot start session in /work/todo: spawn claude ENOENT')
            },
        ])

        await expect(harness(runner).run({ goal: GOAL, projectDir: PROJECT, skipInit: true })).rejects.toBeInstanceOf(
            PermanentError
        )
    })
})
