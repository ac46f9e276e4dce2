import { access, chmod, mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises'

export interface FileSystem {
    readText(path: string): Promise<string>
    readJSON(path: string): Promise<unknown>
    writeText(path: string, content: string): Promise<void>
    writeJSON(path: string, data: unknown): Promise<void>
    /** Writes through a sibling temp file and a rename, so readers never see a partial file. */
    writeJSONAtomic(path: string, data: unknown): Promise<void>
    appendText(path: string, content: string): Promise<void>
    exists(path: string): Promise<boolean>
    isFile(path: string): Promise<boolean>
    isDirectory(path: string): Promise<boolean>
    mtime(path: string): Promise<number | null>
    mkdir(path: string): Promise<void>
    chmod(path: string, mode: number): Promise<void>
    remove(path: string): Promise<void>
}

export class NodeFileSystem implements FileSystem {
    async readText(path: string): Promise<string> {
        return readFile(path, 'utf-8')
    }

    async readJSON(path: string): Promise<unknown> {
        return JSON.parse(await this.readText(path))
    }

    async writeText(path: string, content: string): Promise<void> {
        await writeFile(path, content, 'utf-8')
    }

    async writeJSON(path: string, data: unknown): Promise<void> {
        await writeFile(path, JSON.stringify(data, null, 2), 'utf-8')
    }

    async writeJSONAtomic(path: string, data: unknown): Promise<void> {
        const tmpPath = `${path}.tmp`
        await writeFile(tmpPath, JSON.stringify(data), 'utf-8')
        try {
            await rename(tmpPath, path)
        } catch (error) {
            await rm(tmpPath, { force: true })
            throw error
        }
    }

    async appendText(path: string, content: string): Promise<void> {
        await writeFile(path, content, { encoding: 'utf-8', flag: 'a' })
    }

    async exists(path: string): Promise<boolean> {
        try {
            await access(path)
            return true
        } catch {
            return false
        }
    }

    async isFile(path: string): Promise<boolean> {
        try {
            return (await stat(path)).isFile()
        } catch {
            return false
        }
    }

    async isDirectory(path: string): Promise<boolean> {
        try {
            return (await stat(path)).isDirectory()
        } catch {
            return false
        }
    }

    async mtime(path: string): Promise<number | null> {
        try {
            return (await stat(path)).mtimeMs
        } catch {
            return null
        }
    }

    async mkdir(path: string): Promise<void> {
        await mkdir(path, { recursive: true })
    }

    async chmod(path: string, mode: number): Promise<void> {
        await chmod(path, mode)
    }

    async remove(path: string): Promise<void> {
        await rm(path, { recursive: true, force: true })
    }
}

export class MockFileSystem implements FileSystem {
    private files = new Map<string, string>()
    private dirs = new Set<string>()
    private mtimes = new Map<string, number>()

    async readText(path: string): Promise<string> {
        const content = this.files.get(path)
        if (content === undefined) {
            throw Object.assign(new Error(`ENOENT: no such file, open '${path}'`), { code: 'ENOENT' })
        }
        return content
    }

    async readJSON(path: string): Promise<unknown> {
        return JSON.parse(await this.readText(path))
    }

    async writeText(path: string, content: string): Promise<void> {
        this.setFile(path, content)
    }

    async writeJSON(path: string, data: unknown): Promise<void> {
        this.setFile(path, JSON.stringify(data, null, 2))
    }

    async writeJSONAtomic(path: string, data: unknown): Promise<void> {
        this.setFile(path, JSON.stringify(data))
    }

    async appendText(path: string, content: string): Promise<void> {
        this.setFile(path, (this.files.get(path) ?? '') + content)
    }

    async exists(path: string): Promise<boolean> {
        return this.files.has(path) || this.dirs.has(path)
    }

    async isFile(path: string): Promise<boolean> {
        return this.files.has(path)
    }

    async isDirectory(path: string): Promise<boolean> {
        return this.dirs.has(path)
    }

    async mtime(path: string): Promise<number | null> {
        return this.mtimes.get(path) ?? null
    }

    async mkdir(path: string): Promise<void> {
        this.dirs.add(path)
    }

    async chmod(_path: string, _mode: number): Promise<void> {}

    async remove(path: string): Promise<void> {
        this.files.delete(path)
        this.dirs.delete(path)
        this.mtimes.delete(path)
    }

    setFile(path: string, content: string, mtimeMs: number = Date.now()): void {
        this.files.set(path, content)
        this.mtimes.set(path, mtimeMs)
    }

    getFiles(): Map<string, string> {
        return new Map(this.files)
    }
}
