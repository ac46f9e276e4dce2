import { describe, expect, it } from 'vitest'
import { ActivityTracker } from '../../../src/supervisor/activity.js'

function manualClock(start = 1_000) {
    let now = start
    return {
        now: () => now,
        advance: (ms: number) => {
            now += ms
        },
    }
}

describe('ActivityTracker', () => {
    it('starts idle from construction', () => {
        const clock = manualClock()
        const tracker = new ActivityTracker(clock.now)
        clock.advance(500)
        expect(tracker.idleDuration()).toBe(500)
    })

    it('resets idle time on activity', () => {
        const clock = manualClock()
        const tracker = new ActivityTracker(clock.now)
        clock.advance(2_000)
        tracker.recordActivity()
        clock.advance(300)
        expect(tracker.idleDuration()).toBe(300)
        expect(tracker.lastActivity).toBe(3_000)
    })

    it('never reports negative idle time', () => {
        const clock = manualClock()
        const tracker = new ActivityTracker(clock.now)
        clock.advance(-50)
        expect(tracker.idleDuration()).toBe(0)
    })
})
