import { z } from 'zod'

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

const seconds = z.number().positive()

export const ConfigSchema = z.object({
    model: z.string().min(1).optional(),
    logLevel: LogLevelSchema.optional(),
    agentCommand: z.string().min(1).optional(),
    mcpConfig: z.string().optional(),
    sessionTimeoutSeconds: seconds.optional(),
    idleTimeoutSeconds: seconds.optional(),
    pollIntervalSeconds: seconds.optional(),
    drainPollMs: z.number().int().positive().optional(),
    killGraceMs: z.number().int().nonnegative().optional(),
    maxSessions: z.number().int().positive().optional(),
    maxConsecutiveFailures: z.number().int().positive().optional(),
    backoffBaseSeconds: z.number().nonnegative().optional(),
    backoffMaxSeconds: z.number().nonnegative().optional(),
    quickFailureSeconds: z.number().nonnegative().optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export type LogLevel = z.infer<typeof LogLevelSchema>

export interface ResolvedConfig {
    model: string
    logLevel: LogLevel
    agentCommand: string
    mcpConfig?: string
    sessionTimeoutSeconds: number
    idleTimeoutSeconds: number
    pollIntervalSeconds: number
    drainPollMs: number
    killGraceMs: number
    maxSessions: number
    maxConsecutiveFailures: number
    backoffBaseSeconds: number
    backoffMaxSeconds: number
    quickFailureSeconds: number
    projectDir: string
    configDir: string
}
