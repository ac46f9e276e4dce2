import path from 'node:path'
import { PROJECT_FILES } from '../config/defaults.js'
import type { FileSystem } from '../core/fs.js'
import { err, ok, type Result } from '../core/result.js'

/** What the initializer session must leave behind for coding sessions to resume from. */
export const REQUIRED_FILES = [PROJECT_FILES.initScript, PROJECT_FILES.features, PROJECT_FILES.progressNotes] as const

export const REQUIRED_DIRS = ['.git'] as const

export const ARTIFACT_NAMES = [...REQUIRED_FILES, `${REQUIRED_DIRS[0]}/`]

/** Resolves to the list of missing artifacts on failure. */
export async function validateArtifacts(fs: FileSystem, projectDir: string): Promise<Result<void, string[]>> {
    const missing: string[] = []
    for (const file of REQUIRED_FILES) {
        if (!(await fs.isFile(path.join(projectDir, file)))) missing.push(file)
    }
    for (const dir of REQUIRED_DIRS) {
        if (!(await fs.isDirectory(path.join(projectDir, dir)))) missing.push(`${dir}/`)
    }
    return missing.length === 0 ? ok(undefined) : err(missing)
}
