import { describe, expect, it } from 'vitest'
import { pollIntervalTooLong } from '../../../src/session/runner.js'

describe('pollIntervalTooLong', () => {
    it('accepts a poll interval at most half the tighter budget', () => {
        expect(pollIntervalTooLong({ sessionTimeoutSeconds: 3600, idleTimeoutSeconds: 600, pollIntervalSeconds: 5 })).toBe(
            false
        )
        expect(pollIntervalTooLong({ sessionTimeoutSeconds: 10, idleTimeoutSeconds: 60, pollIntervalSeconds: 5 })).toBe(
            false
        )
    })

    it('flags a poll interval longer than half the tighter budget', () => {
        expect(pollIntervalTooLong({ sessionTimeoutSeconds: 10, idleTimeoutSeconds: 60, pollIntervalSeconds: 6 })).toBe(
            true
        )
        expect(pollIntervalTooLong({ sessionTimeoutSeconds: 3600, idleTimeoutSeconds: 1, pollIntervalSeconds: 0.6 })).toBe(
            true
        )
    })
})
