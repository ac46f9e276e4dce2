import pc from 'picocolors'
import type { FeatureProgress } from '../harness/features.js'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    info: (text: string) => pc.blue(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    accent: (text: string) => pc.cyan(text),
    thought: (text: string) => pc.magenta(text),
}

const RULE = '═'.repeat(60)

export function banner(version: string): string {
    return `${colors.brand('longhaul')} ${colors.dim(`v${version}`)} — session supervisor for coding agents`
}

export function header(title: string): string {
    return ['', colors.bold(RULE), colors.bold(`  ${title}`), colors.bold(RULE), ''].join('\n')
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export function progressBar({ passed, total }: FeatureProgress, width = 40): string {
    if (total <= 0) return `[${'-'.repeat(width)}]  0/0`
    const filled = Math.min(width, Math.floor((passed * width) / total))
    return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}] ${passed}/${total}`
}

export function formatDuration(seconds: number): string {
    const s = Math.max(0, Math.floor(seconds))
    if (s < 60) return `${s}s`
    if (s < 3600) return `${Math.floor(s / 60)}m${s % 60}s`
    return `${Math.floor(s / 3600)}h${Math.floor((s % 3600) / 60)}m`
}

export function formatTokens(count: number): string {
    if (count >= 1_000_000) return `${(Math.floor(count / 100_000) / 10).toFixed(1)}M`
    if (count >= 1_000) return `${(Math.floor(count / 100) / 10).toFixed(1)}K`
    return String(count)
}

export function formatTokenUsage(input: number, output: number): string {
    return colors.dim(`tokens: ${input + output} (${input} in + ${output} out)`)
}
