import path from 'node:path'
import { loadConfig } from '../../config/loader.js'
import type { ResolvedConfig } from '../../config/schema.js'
import { NodeFileSystem } from '../../core/fs.js'
import { colors } from '../ui.js'

function isConfigKey(config: ResolvedConfig, key: string): key is keyof ResolvedConfig {
    return Object.hasOwn(config, key)
}

export async function configCommand(key: string | undefined, flags: { dir: string }): Promise<number> {
    const config = await loadConfig({ fs: new NodeFileSystem(), projectDir: path.resolve(flags.dir) })

    if (!key) {
        console.log(JSON.stringify(config, null, 2))
        return 0
    }
    if (!isConfigKey(config, key)) {
        console.log(colors.warn(`Config key '${key}' not found`))
        return 1
    }
    console.log(`${key}: ${JSON.stringify(config[key])}`)
    return 0
}
