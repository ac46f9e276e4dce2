import { afterEach, describe, expect, it, vi } from 'vitest'
import { createSilentLogger } from '../../../src/logger/index.js'
import { ActivityTracker } from '../../../src/supervisor/activity.js'
import { Watchdog, type WatchdogOptions } from '../../../src/supervisor/watchdog.js'

function setup(overrides: Partial<WatchdogOptions> = {}) {
    let now = 0
    let exited = false
    const clock = () => now
    const activity = new ActivityTracker(clock)
    const onExpire = vi.fn(async () => true)
    const watchdog = new Watchdog({
        sessionTimeoutMs: 10_000,
        idleTimeoutMs: 4_000,
        pollIntervalMs: 1_000,
        activity,
        isExited: () => exited,
        onExpire,
        logger: createSilentLogger(),
        now: clock,
        ...overrides,
    })
    return {
        watchdog,
        activity,
        onExpire,
        advance: (ms: number) => {
            now += ms
        },
        exit: () => {
            exited = true
        },
    }
}

describe('Watchdog', () => {
    afterEach(() => {
        vi.useRealTimers()
    })

    it('stays running within both budgets', () => {
        const { watchdog, advance, onExpire } = setup()
        watchdog.start()
        advance(3_000)
        expect(watchdog.check()).toEqual({ phase: 'running', startedAt: 0 })
        expect(onExpire).not.toHaveBeenCalled()
        watchdog.stop()
    })

    it('expires on idle time when output stops', () => {
        const { watchdog, advance, onExpire } = setup()
        watchdog.start()
        advance(4_001)
        expect(watchdog.check()).toEqual({ phase: 'expired', cause: 'idle', elapsedMs: 4_001, idleMs: 4_001 })
        expect(onExpire).toHaveBeenCalledWith('idle', 4_001, 4_001)
    })

    it('expires on wall-clock time even while output keeps coming', () => {
        const { watchdog, activity, advance, onExpire } = setup()
        watchdog.start()
        for (let i = 0; i < 11; i++) {
            advance(1_000)
            activity.recordActivity()
            watchdog.check()
        }
        expect(watchdog.current).toMatchObject({ phase: 'expired', cause: 'wallClock', elapsedMs: 11_000, idleMs: 0 })
        expect(onExpire).toHaveBeenCalledTimes(1)
    })

    it('prefers the wall-clock cause when both budgets are exceeded', () => {
        const { watchdog, advance } = setup({ sessionTimeoutMs: 2_000, idleTimeoutMs: 2_000 })
        watchdog.start()
        advance(5_000)
        expect(watchdog.check()).toMatchObject({ phase: 'expired', cause: 'wallClock' })
    })

    it('stops without firing once the process has exited', () => {
        const { watchdog, advance, exit, onExpire } = setup()
        watchdog.start()
        exit()
        advance(60_000)
        expect(watchdog.check()).toEqual({ phase: 'stopped' })
        expect(onExpire).not.toHaveBeenCalled()
    })

    it('fires at most once', () => {
        const { watchdog, advance, onExpire } = setup()
        watchdog.start()
        advance(5_000)
        watchdog.check()
        advance(5_000)
        watchdog.check()
        expect(onExpire).toHaveBeenCalledTimes(1)
    })

    it('ignores checks before start and after stop', () => {
        const { watchdog, advance, onExpire } = setup()
        advance(60_000)
        expect(watchdog.check()).toEqual({ phase: 'idle' })
        watchdog.start()
        watchdog.stop()
        advance(60_000)
        expect(watchdog.check()).toEqual({ phase: 'stopped' })
        expect(onExpire).not.toHaveBeenCalled()
    })

    it('join waits for the termination it started and absorbs its failure', async () => {
        const onExpire = vi.fn(() => Promise.reject(new Error('kill failed')))
        const { watchdog, advance } = setup({ onExpire })
        watchdog.start()
        advance(5_000)
        watchdog.check()
        await expect(watchdog.join()).resolves.toBeUndefined()
    })

    it('polls on its interval', async () => {
        vi.useFakeTimers()
        const { watchdog, advance, onExpire } = setup()
        watchdog.start()
        advance(4_500)
        await vi.advanceTimersByTimeAsync(1_000)
        expect(onExpire).toHaveBeenCalledWith('idle', 4_500, 4_500)
    })
})
