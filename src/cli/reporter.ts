import type { HarnessReporter } from '../harness/orchestrator.js'
import { colors, header, progressBar } from './ui.js'

export function createConsoleReporter(): HarnessReporter {
    return {
        header: (title) => console.log(header(title)),
        info: (message) => console.log(`${colors.info('[INFO]')} ${message}`),
        success: (message) => console.log(`${colors.success('[OK]')} ${message}`),
        warn: (message) => console.log(`${colors.warn('[WARN]')} ${message}`),
        error: (message) => console.error(`${colors.error('[ERROR]')} ${message}`),
        progress: (progress) => {
            const remaining = progress.total - progress.passed
            console.log(`Progress: ${progressBar(progress)}  (${remaining} remaining)\n`)
        },
    }
}
