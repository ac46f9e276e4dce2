import { open } from 'node:fs/promises'
import { StringDecoder } from 'node:string_decoder'

export interface OutputTailOptions {
    /** Sleep between reads that return no new bytes. */
    pollMs: number
    chunkSize?: number
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}

function stripCarriageReturn(line: string): string {
    return line.endsWith('\r') ? line.slice(0, -1) : line
}

/**
 * Follows a file that another process is appending to, yielding complete non-empty lines. Reads are
 * positional and never hold the writer back; an empty read sleeps for `pollMs`.
 */
export class OutputTail {
    private position = 0

    constructor(
        private readonly path: string,
        private readonly options: OutputTailOptions
    ) {}

    get bytesRead(): number {
        return this.position
    }

    /**
     * Iterates until `isDone()` reports the writer has finished AND a read finds nothing further.
     * A trailing line without a newline is emitted at the end.
     */
    async *lines(isDone: () => boolean): AsyncGenerator<string> {
        const handle = await open(this.path, 'r')
        const buffer = Buffer.alloc(this.options.chunkSize ?? 64 * 1024)
        const decoder = new StringDecoder('utf8')
        let remainder = ''

        try {
            while (true) {
                // Sampled before the read: output written before exit is then guaranteed to be seen.
                const done = isDone()
                const { bytesRead } = await handle.read(buffer, 0, buffer.length, this.position)

                if (bytesRead > 0) {
                    this.position += bytesRead
                    const parts = (remainder + decoder.write(buffer.subarray(0, bytesRead))).split('\n')
                    remainder = parts.pop() ?? ''
                    for (const part of parts) {
                        const line = stripCarriageReturn(part)
                        if (line.trim() !== '') yield line
                    }
                    continue
                }

                if (done) break
                await sleep(this.options.pollMs)
            }

            const last = stripCarriageReturn(remainder + decoder.end())
            if (last.trim() !== '') yield last
        } finally {
            await handle.close()
        }
    }
}
