import { execa } from 'execa'
import { loadConfig } from '../../config/loader.js'
import { NodeFileSystem } from '../../core/fs.js'
import { colors } from '../ui.js'

interface Check {
    name: string
    status: 'ok' | 'warn' | 'error'
    message: string
}

/** First line of `<command> --version`, or `null` when the command cannot be run. */
async function versionOf(command: string): Promise<string | null> {
    const result = await execa(command, ['--version'], { reject: false })
    if (result.failed) return null
    return result.stdout.split('\n')[0]?.trim() || 'found'
}

export async function runChecks(agentCommand: string): Promise<Check[]> {
    const checks: Check[] = []

    const major = Number.parseInt(process.versions.node.split('.')[0] ?? '0', 10)
    checks.push({
        name: 'Node.js',
        status: major >= 20 ? 'ok' : 'error',
        message: major >= 20 ? `v${process.versions.node}` : `v${process.versions.node} (20 or newer required)`,
    })

    const agent = await versionOf(agentCommand)
    checks.push(
        agent
            ? { name: 'Agent CLI', status: 'ok', message: agent }
            : { name: 'Agent CLI', status: 'error', message: `${agentCommand} not found on PATH` }
    )

    const git = await versionOf('git')
    checks.push(git ? { name: 'Git', status: 'ok', message: git } : { name: 'Git', status: 'error', message: 'Not found' })

    if (process.platform !== 'win32') {
        const pgrep = await execa('pgrep', ['-x', 'pgrep-probe-none'], { reject: false })
        // pgrep exits 1 when nothing matches, which still proves it is installed.
        checks.push(
            pgrep.exitCode === 0 || pgrep.exitCode === 1
                ? { name: 'pgrep', status: 'ok', message: 'found' }
                : { name: 'pgrep', status: 'warn', message: 'Not found (monitor cannot see running agents)' }
        )
    }

    return checks
}

export async function doctorCommand(): Promise<number> {
    console.log(colors.brand('longhaul doctor\n'))

    const config = await loadConfig({ fs: new NodeFileSystem() })
    const checks = await runChecks(config.agentCommand)

    for (const check of checks) {
        const icon =
            check.status === 'ok' ? colors.success('✓') : check.status === 'warn' ? colors.warn('!') : colors.error('✗')
        console.log(`  ${icon} ${check.name.padEnd(15)} ${check.message}`)
    }

    const errors = checks.filter((c) => c.status === 'error')
    console.log('')
    if (errors.length === 0) {
        console.log(colors.success('All good!'))
        return 0
    }
    console.log(colors.warn(`${errors.length} problem(s) found.`))
    return 1
}
