import { describe, expect, it } from 'vitest'
import { MockFileSystem } from '../../../src/core/fs.js'
import {
    categoryBreakdown,
    describeFeature,
    type Feature,
    isComplete,
    loadFeatures,
    nextFeature,
    readFeatureProgress,
} from '../../../src/harness/features.js'

const FILE = '/project/features.json'

function feature(id: number | string, passes: boolean, extra: Partial<Feature> = {}): Feature {
    return { id, passes, ...extra }
}

describe('readFeatureProgress', () => {
    it('counts passing features', async () => {
        const fs = new MockFileSystem()
        fs.setFile(
            FILE,
            JSON.stringify({ features: [{ id: 1, passes: true }, { id: 2, passes: false }, { id: 3, passes: true }] })
        )
        expect(await readFeatureProgress(fs, FILE)).toEqual({ passed: 2, total: 3 })
    })

    it('reports zero for a missing file', async () => {
        expect(await readFeatureProgress(new MockFileSystem(), FILE)).toEqual({ passed: 0, total: 0 })
    })

    it('reports zero for invalid content', async () => {
        const fs = new MockFileSystem()
        fs.setFile(FILE, '{"features": "none"}')
        expect(await readFeatureProgress(fs, FILE)).toEqual({ passed: 0, total: 0 })
        fs.setFile(FILE, 'not json')
        expect(await readFeatureProgress(fs, FILE)).toEqual({ passed: 0, total: 0 })
    })

    it('counts only a literal true as passing', async () => {
        const fs = new MockFileSystem()
        fs.setFile(FILE, JSON.stringify({ features: [{ id: 1, passes: 'yes' }, { id: 2 }] }))
        expect(await readFeatureProgress(fs, FILE)).toEqual({ passed: 0, total: 2 })
    })
})

describe('loadFeatures', () => {
    it('explains a missing file', async () => {
        const result = await loadFeatures(new MockFileSystem(), FILE)
        expect(result).toEqual({ ok: false, error: `${FILE} does not exist` })
    })
})

describe('isComplete', () => {
    it('needs at least one feature', () => {
        expect(isComplete({ passed: 0, total: 0 })).toBe(false)
        expect(isComplete({ passed: 2, total: 3 })).toBe(false)
        expect(isComplete({ passed: 3, total: 3 })).toBe(true)
    })
})

describe('categoryBreakdown', () => {
    it('groups by category in name order', () => {
        const features = [
            feature(1, true, { category: 'ui' }),
            feature(2, false, { category: 'api' }),
            feature(3, true, { category: 'api' }),
            feature(4, false),
        ]
        expect(categoryBreakdown(features)).toEqual([
            { category: 'api', passed: 1, total: 2 },
            { category: 'ui', passed: 1, total: 1 },
            { category: 'uncategorized', passed: 0, total: 1 },
        ])
    })
})

describe('nextFeature', () => {
    it('picks the failing feature with the lowest priority, then id', () => {
        const features = [
            feature(4, false, { priority: 2 }),
            feature(3, false, { priority: 1 }),
            feature(1, true, { priority: 0 }),
            feature(2, false, { priority: 1 }),
            feature(5, false),
        ]
        expect(nextFeature(features)?.id).toBe(2)
    })

    it('orders string ids numerically', () => {
        expect(nextFeature([feature('F10', false), feature('F9', false)])?.id).toBe('F9')
    })

    it('returns undefined when everything passes', () => {
        expect(nextFeature([feature(1, true)])).toBeUndefined()
    })
})

describe('describeFeature', () => {
    it('prefers the description, then the name', () => {
        expect(describeFeature(feature(1, false, { description: 'Login', name: 'auth' }))).toBe('1: Login')
        expect(describeFeature(feature(2, false, { name: 'auth' }))).toBe('2: auth')
        expect(describeFeature(feature(3, false))).toBe('3: unknown')
    })
})
