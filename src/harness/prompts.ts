import { fileURLToPath } from 'node:url'
import { isNotFoundError, PermanentError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'

export type PromptName = 'initializer' | 'coding'

export interface PromptVariables {
    goal: string
    projectDir: string
}

/** Shipped beside `src/` and `dist/`, one level above either. */
const PROMPTS_DIR = new URL('../../prompts/', import.meta.url)

export function promptPath(name: PromptName): string {
    return fileURLToPath(new URL(`${name}.md`, PROMPTS_DIR))
}

export function renderPrompt(template: string, vars: PromptVariables): string {
    // Function replacers keep `$` sequences in the goal literal.
    return template.replaceAll('{{GOAL}}', () => vars.goal).replaceAll('{{PROJECT_DIR}}', () => vars.projectDir)
}

export async function loadPrompt(fs: FileSystem, name: PromptName, vars: PromptVariables): Promise<string> {
    const file = promptPath(name)
    let template: string
    try {
        template = await fs.readText(file)
    } catch (error) {
        if (isNotFoundError(error)) throw new PermanentError(`Prompt template ${file} is missing`, { cause: error })
        throw error
    }
    return renderPrompt(template, vars)
}
