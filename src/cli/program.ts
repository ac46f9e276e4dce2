import { Command, InvalidArgumentError } from 'commander'
import { errorMessage } from '../core/errors.js'
import { configCommand } from './commands/config-cmd.js'
import { doctorCommand } from './commands/doctor.js'
import { monitorCommand } from './commands/monitor.js'
import { type RunFlags, runCommand } from './commands/run.js'
import { type SessionFlags, sessionCommand } from './commands/session.js'
import { formatError } from './ui.js'

export const VERSION = '0.1.0'

const DEFAULT_PROJECT_DIR = './project'

export function parsePositiveInt(value: string): number {
    const parsed = Number(value)
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Expected a positive integer.')
    }
    return parsed
}

/** Runs a command body and turns its result or failure into the process exit code. */
async function exitWith(body: () => Promise<number>): Promise<void> {
    try {
        process.exitCode = await body()
    } catch (error) {
        console.error(formatError(errorMessage(error)))
        process.exitCode = 1
    }
}

export function createProgram(): Command {
    const program = new Command()

    program
        .name('longhaul')
        .description('Drives a coding agent across many supervised sessions until a project is built')
        .version(VERSION)
        .argument('<goal>', 'project goal description')
        .option('-d, --dir <path>', 'working directory for the project', DEFAULT_PROJECT_DIR)
        .option('-m, --max-sessions <n>', 'maximum number of coding sessions', parsePositiveInt)
        .option('-M, --model <model>', 'agent model to use')
        .option('--mcp-config <path>', 'MCP config file to pass to the agent')
        .option('--skip-init', 'skip the initializer and resume from existing artifacts')
        .option('--dry-run', 'show what would be executed without running')
        .option('--debug', 'enable debug logging')
        .addHelpText(
            'after',
            [
                '',
                'Examples:',
                '  longhaul "Build a REST API for a todo app"',
                '  longhaul -d ./my-app -m 30 "Build a CLI markdown-to-HTML converter"',
                '  longhaul --skip-init -d ./my-app "Continue building the app"',
            ].join('\n')
        )
        .action((goal: string, flags: RunFlags) => exitWith(() => runCommand(goal, flags)))

    program
        .command('session <prompt-file>')
        .description('Run exactly one supervised agent session with the prompt in <prompt-file>')
        .option('-d, --dir <path>', 'working directory for the session', '.')
        .option('-M, --model <model>', 'agent model to use')
        .option('--mcp-config <path>', 'MCP config file to pass to the agent')
        .option('--debug', 'enable debug logging')
        .action((promptFile: string, flags: SessionFlags) => exitWith(() => sessionCommand(promptFile, flags)))

    program
        .command('monitor [dir]')
        .description('Live dashboard for a project the harness is working on')
        .option('-i, --interval <seconds>', 'refresh interval', parsePositiveInt, 10)
        .action((dir: string | undefined, flags: { interval: number }) =>
            exitWith(() => monitorCommand(dir ?? DEFAULT_PROJECT_DIR, flags))
        )

    program
        .command('config [key]')
        .description('Show the resolved configuration')
        .option('-d, --dir <path>', 'project directory whose local config applies', '.')
        .action((key: string | undefined, flags: { dir: string }) => exitWith(() => configCommand(key, flags)))

    program
        .command('doctor')
        .description('Check that the agent CLI and git are available')
        .action(() => exitWith(doctorCommand))

    return program
}
