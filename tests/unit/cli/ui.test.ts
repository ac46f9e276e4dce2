import { describe, expect, it } from 'vitest'
import { formatDuration, formatTokens, formatTokenUsage, header, progressBar } from '../../../src/cli/ui.js'
import { stripAnsi } from '../../helpers/ansi.js'

describe('progressBar', () => {
    it('fills proportionally', () => {
        expect(progressBar({ passed: 1, total: 4 }, 8)).toBe('[##------] 1/4')
        expect(progressBar({ passed: 4, total: 4 }, 8)).toBe('[########] 4/4')
    })

    it('shows an empty bar before any feature exists', () => {
        expect(progressBar({ passed: 0, total: 0 }, 4)).toBe('[----]  0/0')
    })
})

describe('formatDuration', () => {
    it('picks the largest sensible unit', () => {
        expect(formatDuration(42.9)).toBe('42s')
        expect(formatDuration(95)).toBe('1m35s')
        expect(formatDuration(3 * 3600 + 125)).toBe('3h2m')
        expect(formatDuration(-5)).toBe('0s')
    })
})

describe('formatTokens', () => {
    it('abbreviates without rounding up', () => {
        expect(formatTokens(999)).toBe('999')
        expect(formatTokens(1_299)).toBe('1.2K')
        expect(formatTokens(2_490_000)).toBe('2.4M')
    })

    it('sums usage', () => {
        expect(stripAnsi(formatTokenUsage(300, 45))).toBe('tokens: 345 (300 in + 45 out)')
    })
})

describe('header', () => {
    it('frames the title with rules', () => {
        const rule = '═'.repeat(60)
        expect(stripAnsi(header('Phase 1')).split('\n')).toEqual(['', rule, '  Phase 1', rule, ''])
    })
})
