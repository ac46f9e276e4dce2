import { z } from 'zod'
import { errorMessage, isNotFoundError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { err, ok, type Result } from '../core/result.js'

/** Features without an explicit priority sort after every prioritized one. */
const UNPRIORITIZED = 999

export const FeatureSchema = z
    .object({
        id: z.union([z.string(), z.number()]),
        description: z.string().optional(),
        name: z.string().optional(),
        category: z.string().optional(),
        priority: z.number().optional(),
        passes: z.boolean().catch(false),
    })
    .passthrough()

export const FeaturesFileSchema = z.object({
    features: z.array(FeatureSchema),
})

export type Feature = z.infer<typeof FeatureSchema>

export interface FeatureProgress {
    passed: number
    total: number
}

export interface CategoryProgress extends FeatureProgress {
    category: string
}

export async function loadFeatures(fs: FileSystem, path: string): Promise<Result<Feature[]>> {
    let raw: unknown
    try {
        raw = await fs.readJSON(path)
    } catch (error) {
        return err(isNotFoundError(error) ? `${path} does not exist` : errorMessage(error))
    }
    const parsed = FeaturesFileSchema.safeParse(raw)
    if (!parsed.success) {
        return err(`${path}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`)
    }
    return ok(parsed.data.features)
}

export function progressOf(features: Feature[]): FeatureProgress {
    return { passed: features.filter((f) => f.passes).length, total: features.length }
}

/** `{0, 0}` when the file is missing or unreadable. */
export async function readFeatureProgress(fs: FileSystem, path: string): Promise<FeatureProgress> {
    const result = await loadFeatures(fs, path)
    return result.ok ? progressOf(result.value) : { passed: 0, total: 0 }
}

export function isComplete(progress: FeatureProgress): boolean {
    return progress.total > 0 && progress.passed >= progress.total
}

export function categoryBreakdown(features: Feature[]): CategoryProgress[] {
    const byCategory = new Map<string, FeatureProgress>()
    for (const feature of features) {
        const category = feature.category ?? 'uncategorized'
        const entry = byCategory.get(category) ?? { passed: 0, total: 0 }
        entry.total++
        if (feature.passes) entry.passed++
        byCategory.set(category, entry)
    }
    return [...byCategory.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([category, progress]) => ({ category, ...progress }))
}

function compareIds(a: Feature['id'], b: Feature['id']): number {
    if (typeof a === 'number' && typeof b === 'number') return a - b
    return String(a).localeCompare(String(b), undefined, { numeric: true })
}

/** The failing feature a coding session should pick up next: lowest priority, then lowest id. */
export function nextFeature(features: Feature[]): Feature | undefined {
    return features
        .filter((f) => !f.passes)
        .sort((a, b) => (a.priority ?? UNPRIORITIZED) - (b.priority ?? UNPRIORITIZED) || compareIds(a.id, b.id))[0]
}

export function describeFeature(feature: Feature): string {
    return `${feature.id}: ${feature.description ?? feature.name ?? 'unknown'}`
}
