import os from 'node:os'
import path from 'node:path'
import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir' | 'configDir' | 'mcpConfig'> = {
    model: 'sonnet',
    logLevel: 'warn',
    agentCommand: 'claude',
    sessionTimeoutSeconds: 3600,
    idleTimeoutSeconds: 3600,
    pollIntervalSeconds: 15,
    drainPollMs: 300,
    killGraceMs: 1000,
    maxSessions: 50,
    maxConsecutiveFailures: 5,
    backoffBaseSeconds: 30,
    backoffMaxSeconds: 300,
    quickFailureSeconds: 10,
}

export const CONFIG_DIR = path.join(process.env.HOME ?? os.homedir(), '.config', 'longhaul')
export const GLOBAL_CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')
export const LOCAL_CONFIG_DIR = '.longhaul'
export const LOCAL_CONFIG_FILE = path.join(LOCAL_CONFIG_DIR, 'config.json')

/** Files the harness keeps inside the project directory. */
export const PROJECT_FILES = {
    eventLog: '.harness-live.jsonl',
    stateSnapshot: '.harness-state.json',
    rawPointer: '.harness-tmpfile',
    harnessLog: 'harness-log.txt',
    features: 'features.json',
    progressNotes: 'claude-progress.txt',
    initScript: 'init.sh',
} as const
