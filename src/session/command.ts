export interface AgentCommandOptions {
    agentCommand: string
    model: string
    mcpConfig?: string
}

export interface AgentCommand {
    command: string
    args: string[]
}

/** Set by the agent CLI in its own children; nested invocations refuse to start while it is present. */
const NESTING_MARKER = 'CLAUDECODE'

export function buildAgentCommand(prompt: string, options: AgentCommandOptions): AgentCommand {
    const args = [
        '-p',
        prompt,
        '--model',
        options.model,
        '--verbose',
        '--output-format',
        'stream-json',
        '--dangerously-skip-permissions',
    ]
    if (options.mcpConfig) args.push('--mcp-config', options.mcpConfig)
    return { command: options.agentCommand, args }
}

export function agentEnvironment(base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = {}
    for (const [key, value] of Object.entries(base)) {
        if (key !== NESTING_MARKER && value !== undefined) env[key] = value
    }
    return env
}

/** Shell-quoted rendering for dry runs and logs. */
export function formatCommandLine({ command, args }: AgentCommand): string {
    return [command, ...args].map(quoteArg).join(' ')
}

function quoteArg(arg: string): string {
    if (/^[\w@%+=:,./-]+$/.test(arg)) return arg
    return `'${arg.replace(/'/g, `'\\''`)}'`
}
