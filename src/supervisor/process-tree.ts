import { execa } from 'execa'
import { isMissingProcessError } from '../core/errors.js'

export interface ProcessHandle {
    pid: number
    /** Process-group id on POSIX, where the child leads its own group. */
    pgid: number | undefined
}

export type SignalSender = (pid: number, signal: NodeJS.Signals | 0) => void

export interface TerminateOptions {
    graceMs: number
    platform?: NodeJS.Platform
    kill?: SignalSender
    /** Interval at which the group is probed for exit during the grace period. */
    probeMs?: number
}

const defaultKill: SignalSender = (pid, signal) => {
    process.kill(pid, signal)
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}

export function handleFor(pid: number, platform: NodeJS.Platform = process.platform): ProcessHandle {
    return { pid, pgid: platform === 'win32' ? undefined : pid }
}

/** Sends `signal`; false when no process is left to receive it. */
function deliver(kill: SignalSender, target: number, signal: NodeJS.Signals | 0): boolean {
    try {
        kill(target, signal)
        return true
    } catch (error) {
        if (isMissingProcessError(error)) return false
        throw error
    }
}

async function waitForExit(kill: SignalSender, target: number, graceMs: number, probeMs: number): Promise<void> {
    const deadline = Date.now() + graceMs
    while (Date.now() < deadline) {
        await sleep(Math.min(probeMs, Math.max(0, deadline - Date.now())))
        if (!deliver(kill, target, 0)) return
    }
}

async function terminatePosix(handle: ProcessHandle, options: TerminateOptions): Promise<boolean> {
    const kill = options.kill ?? defaultKill
    // A negative pid addresses every member of the process group.
    const target = handle.pgid !== undefined ? -handle.pgid : handle.pid

    if (!deliver(kill, target, 'SIGTERM')) return false
    await waitForExit(kill, target, options.graceMs, options.probeMs ?? 50)
    deliver(kill, target, 'SIGKILL')
    return true
}

async function terminateWindows(handle: ProcessHandle, options: TerminateOptions): Promise<boolean> {
    const graceful = await execa('taskkill', ['/pid', String(handle.pid), '/T'], { reject: false })
    // 128: no such process
    if (graceful.exitCode === 128) return false
    await sleep(options.graceMs)
    await execa('taskkill', ['/pid', String(handle.pid), '/T', '/F'], { reject: false })
    return true
}

/**
 * Graceful-then-forceful termination of a process and all of its descendants. Resolves to whether
 * anything was still alive to receive the first signal.
 */
export function terminateProcessTree(handle: ProcessHandle, options: TerminateOptions): Promise<boolean> {
    const platform = options.platform ?? process.platform
    return platform === 'win32' ? terminateWindows(handle, options) : terminatePosix(handle, options)
}
