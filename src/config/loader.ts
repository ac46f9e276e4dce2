import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import { errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LogLevelSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    env?: NodeJS.ProcessEnv
    logger?: Logger
}

async function loadJsonConfig(fs: FileSystem, filePath: string, logger?: Logger): Promise<Config> {
    try {
        if (await fs.exists(filePath)) {
            const raw = await fs.readJSON(filePath)
            return ConfigSchema.parse(raw)
        }
    } catch (error) {
        logger?.warn({ filePath, error: errorMessage(error) }, 'config:invalid')
    }
    return {}
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        Object.assign(
            merged,
            Object.fromEntries(Object.entries(cfg).filter(([, value]) => value !== undefined))
        )
    }
    return merged
}

function parseSeconds(raw: string | undefined): number | undefined {
    if (raw === undefined || raw.trim() === '') return undefined
    const value = Number(raw)
    return Number.isFinite(value) && value > 0 ? value : undefined
}

export function configFromEnv(env: NodeJS.ProcessEnv): Config {
    const envConfig: Config = {}
    if (env.LONGHAUL_MODEL) envConfig.model = env.LONGHAUL_MODEL
    const level = LogLevelSchema.safeParse(env.LONGHAUL_LOG_LEVEL)
    if (level.success) envConfig.logLevel = level.data
    envConfig.sessionTimeoutSeconds = parseSeconds(env.SESSION_TIMEOUT)
    envConfig.idleTimeoutSeconds = parseSeconds(env.IDLE_TIMEOUT)
    envConfig.pollIntervalSeconds = parseSeconds(env.LONGHAUL_POLL_INTERVAL)
    return envConfig
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), env = process.env, logger } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE, logger)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE), logger)

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, configFromEnv(env), cliFlags)

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        projectDir,
        configDir: CONFIG_DIR,
    }
}
