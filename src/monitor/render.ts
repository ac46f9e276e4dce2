import { colors, formatDuration, formatTokens, progressBar } from '../cli/ui.js'
import type { LoggedEvent } from '../core/types.js'
import { categoryBreakdown, describeFeature, nextFeature, progressOf } from '../harness/features.js'
import { truncate } from '../stream/types.js'
import { summarizeLiveLog } from './live-log.js'
import type { MonitorSnapshot } from './snapshot.js'
import { type DetectedState, detectState } from './state.js'

/** USD per token, at list prices for the default model. */
const PRICE = { input: 0.000003, output: 0.000015 } as const

/** Older snapshots describe a session that is no longer the current one. */
const STATE_FRESH_SECONDS = 120

const MAX_ACTIONS = 14
const MAX_HISTORY = 8

function ageSeconds(mtime: number | null, now: number): number | null {
    return mtime === null ? null : Math.max(0, Math.floor((now - mtime) / 1000))
}

function clock(ts: string): string {
    return ts.length >= 19 ? ts.slice(11, 19) : ts
}

export function estimateCost(tokensIn: number, tokensOut: number): number {
    return tokensIn * PRICE.input + tokensOut * PRICE.output
}

export function formatAction(event: LoggedEvent): string | null {
    const at = colors.dim(clock(event.ts))
    switch (event.kind) {
        case 'assistant': {
            if (event.thinkingText) return `${at} ${colors.thought(`🧠 ${truncate(event.thinkingText, 80)}`)}`
            if (event.toolInvocations.length > 0) {
                const summary = event.toolInvocations.map((call) => call.summary).join(' | ')
                return `${at} ${colors.warn(`⚡ ${truncate(summary, 75)}`)}`
            }
            if (event.text) return `${at} ${colors.info(`💬 ${truncate(event.text, 70)}`)}`
            return null
        }
        case 'tool_result':
            return event.isError
                ? `${at} ${colors.error(`✗ ${truncate(event.content, 60)}`)}`
                : `${at} ${colors.dim(`→ ${truncate(event.content, 60)}`)}`
        case 'result': {
            const tokens = `(in:${event.inputTokens} out:${event.outputTokens})`
            return event.isError
                ? `${at} ${colors.error(`✗ Error ${tokens}`)}`
                : `${at} ${colors.success(`✓ Done ${tokens}`)}`
        }
        case 'other':
            return null
    }
}

function statusLine({ label, detail, state }: DetectedState): string {
    switch (state) {
        case 'complete':
            return `  ${colors.success(colors.bold(`✅ ${label}`))}  ${detail}`
        case 'coding':
        case 'thinking':
            return `  ${colors.success('●')} ${colors.bold(label)}  ${colors.dim(detail)}`
        case 'longWait':
        case 'betweenSessions':
        case 'backoff':
        case 'sessionGap':
            return `  ${colors.warn('●')} ${colors.bold(label)}  ${colors.warn(detail)}`
        case 'likelyStuck':
        case 'notRunning':
            return `  ${colors.error(colors.bold(`🔴 ${label}`))}  ${colors.error(detail)}`
    }
}

export function detectSnapshotState(snapshot: MonitorSnapshot): DetectedState {
    const lastSession = snapshot.history.sessions.at(-1)
    return detectState({
        completed: snapshot.history.completed,
        agentRunning: snapshot.agentRunning,
        outputAgeSeconds: snapshot.events.length > 0 ? ageSeconds(snapshot.liveLogMtime, snapshot.takenAt) : null,
        lastSessionFailed: lastSession !== undefined && lastSession.status !== 'success',
    })
}

export function renderDashboard(snapshot: MonitorSnapshot): string[] {
    const lines: string[] = []
    const now = snapshot.takenAt

    lines.push(colors.accent(colors.bold('Harness Monitor')) + '  ' + colors.dim(new Date(now).toISOString().slice(11, 19)))
    lines.push(colors.dim(snapshot.projectDir))
    lines.push(statusLine(detectSnapshotState(snapshot)))
    lines.push('')

    const stateAge = ageSeconds(snapshot.liveStateMtime, now)
    if (snapshot.liveState && stateAge !== null && stateAge < STATE_FRESH_SECONDS) {
        const { thinking, tool, detail, result, error } = snapshot.liveState
        lines.push(`  ${colors.bold('Now')}  ${colors.dim(`(${stateAge}s ago)`)}`)
        if (thinking) lines.push(`    ${colors.thought(`🧠 ${truncate(thinking, 75)}`)}`)
        if (tool) lines.push(`    ${colors.warn(`⚡ ${tool}`)}${detail ? ` ${colors.dim(truncate(detail, 55))}` : ''}`)
        if (result) {
            lines.push(
                error
                    ? `    ${colors.error(`✗ ${truncate(result, 70)}`)}`
                    : `    ${colors.success(`→ ${truncate(result, 70)}`)}`
            )
        }
        lines.push('')
    }

    const target = snapshot.features ? nextFeature(snapshot.features) : undefined
    if (target) lines.push(`  ${colors.bold('Target')}  ${colors.warn(truncate(describeFeature(target), 62))}`, '')

    lines.push(colors.bold('  Tokens'))
    if (snapshot.events.length > 0) {
        const stats = summarizeLiveLog(snapshot.events)
        const total = stats.tokensIn + stats.tokensOut
        const elapsed = stats.startedAt === null ? 0 : Math.max(0, Math.floor((now - stats.startedAt) / 1000))
        const perMinute = elapsed > 0 ? Math.floor((total * 60) / elapsed) : 0
        const cost = estimateCost(stats.tokensIn, stats.tokensOut).toFixed(3)
        lines.push(
            `    Session:  ↓${formatTokens(stats.tokensIn)} in  ↑${formatTokens(stats.tokensOut)} out  ` +
                `Σ${formatTokens(total)}  ${colors.dim(`($${cost})`)}`
        )
        lines.push(
            `    Rate:     ${formatTokens(perMinute)}/min  ` +
                colors.dim(`${stats.events} events  ${stats.toolCalls} tools  ${formatDuration(elapsed)} elapsed`)
        )
    } else {
        lines.push(`    Session:  ${colors.dim('(no live data)')}`)
    }
    const sessions = snapshot.history.sessions
    if (sessions.length > 0) {
        const totalSeconds = sessions.reduce((sum, s) => sum + s.durationSeconds, 0)
        lines.push(`    Total:    ${colors.dim(`${sessions.length} sessions  ${formatDuration(totalSeconds)}`)}`)
    }
    lines.push('')

    lines.push(colors.bold('  Features'))
    if (snapshot.features) {
        const progress = progressOf(snapshot.features)
        const pct = progress.total > 0 ? Math.floor((progress.passed * 100) / progress.total) : 0
        lines.push(`    ${progressBar(progress, 35)}  ${colors.success(`${pct}%`)}`)
        for (const category of categoryBreakdown(snapshot.features)) {
            const icon = category.passed === category.total ? '✓' : category.passed > 0 ? '◐' : '○'
            lines.push(`    ${icon} ${category.category.padEnd(14)}${category.passed}/${category.total}`)
        }
    } else {
        lines.push(`    ${colors.dim('features.json not yet created')}`)
    }
    lines.push('')

    lines.push(colors.bold('  Git'))
    if (snapshot.git) {
        lines.push(`    commits:${snapshot.git.commits}  uncommitted:${snapshot.git.uncommitted}`)
        lines.push(`    ${colors.dim(`last: ${truncate(snapshot.git.lastMessage || '—', 58)}`)}`)
    } else {
        lines.push(`    ${colors.dim('(no repository)')}`)
    }
    lines.push('')

    lines.push(colors.bold('  Actions'))
    const actions = snapshot.events.map(formatAction).filter((line): line is string => line !== null)
    if (actions.length > 0) {
        for (const action of actions.slice(-MAX_ACTIONS)) lines.push(`    ${action}`)
    } else {
        lines.push(`    ${colors.dim('(no data)')}`)
    }
    lines.push('')

    if (sessions.length > 0) {
        lines.push(colors.bold('  History'))
        for (const s of sessions.slice(-MAX_HISTORY)) {
            const icon =
                s.total > 0 && s.passed === s.total
                    ? colors.success('✓')
                    : s.passed > 0
                      ? colors.warn('◐')
                      : colors.error('○')
            lines.push(`    ${icon} ${`S${s.session}`.padEnd(4)}  ${`${s.durationSeconds}s`.padStart(6)}  ${s.passed}/${s.total}  ${colors.dim(s.status)}`)
        }
        lines.push('')
    }

    lines.push(colors.dim(`  model:${snapshot.history.model ?? '?'}`))
    return lines
}
