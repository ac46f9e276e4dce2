import { createWriteStream, type WriteStream } from 'node:fs'
import { errorMessage } from '../core/errors.js'
import type { LoggedEvent } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { HarnessEvent } from '../stream/types.js'

/**
 * Append-only JSONL log of decoded events. Opening truncates the file, so each session starts a
 * fresh log; every record is written as one whole line.
 *
 * A write failure never escapes as an `'error'` event: the first one is kept, later appends are
 * dropped, and `close()` rejects with it.
 */
export class EventLog {
    private count = 0
    private closing: Promise<void> | undefined
    private writeError: Error | undefined

    private constructor(
        readonly path: string,
        private readonly stream: WriteStream,
        logger: Logger
    ) {
        stream.on('error', (error) => {
            if (this.writeError) return
            this.writeError = error
            logger.warn({ path, error: errorMessage(error) }, 'event-log:write-failed')
        })
    }

    static open(path: string, logger: Logger): Promise<EventLog> {
        return new Promise((resolve, reject) => {
            const stream = createWriteStream(path, { flags: 'w', encoding: 'utf-8' })
            stream.once('error', reject)
            stream.once('open', () => {
                const log = new EventLog(path, stream, logger)
                stream.off('error', reject)
                resolve(log)
            })
        })
    }

    get size(): number {
        return this.count
    }

    /** The first write failure, if any. */
    get error(): Error | undefined {
        return this.writeError
    }

    append(event: HarnessEvent, ts: string): LoggedEvent {
        if (this.closing) throw new Error(`Event log ${this.path} is closed`)
        const record: LoggedEvent = { ts, ...event }
        if (this.writeError) return record
        this.stream.write(`${JSON.stringify(record)}\n`)
        this.count++
        return record
    }

    close(): Promise<void> {
        this.closing ??= new Promise((resolve, reject) => {
            // 'close' follows both 'finish' and 'error', so the outcome is known by then.
            const settle = () => (this.writeError ? reject(this.writeError) : resolve())
            if (this.stream.closed) return settle()
            this.stream.once('close', settle)
            this.stream.end()
        })
        return this.closing
    }
}
