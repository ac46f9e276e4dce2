import type { FileSystem } from '../core/fs.js'
import { errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { type HarnessEvent, truncate } from '../stream/types.js'

export interface LiveState {
    thinking: string
    tool: string
    detail: string
    result: string
    error: boolean
}

const EMPTY_STATE: LiveState = { thinking: '', tool: '', detail: '', result: '', error: false }

/**
 * Latest-activity snapshot for dashboards. Writes are chained so the file always reflects the most
 * recent event, and each write is atomic.
 */
export class LiveStateWriter {
    private state: LiveState = { ...EMPTY_STATE }
    private chain: Promise<void> = Promise.resolve()

    constructor(
        private readonly fs: FileSystem,
        private readonly path: string,
        private readonly logger: Logger
    ) {}

    get current(): LiveState {
        return { ...this.state }
    }

    /** Starts a session with an empty object on disk. */
    reset(): Promise<void> {
        this.state = { ...EMPTY_STATE }
        this.enqueue({})
        return this.chain
    }

    observe(event: HarnessEvent): void {
        if (event.kind === 'assistant') {
            const next = { ...this.state }
            if (event.thinkingText) next.thinking = event.thinkingText
            if (event.toolInvocations.length > 0) {
                next.tool = event.toolInvocations.map((call) => call.name).join(',')
                next.detail = truncate(event.toolInvocations.map((call) => call.summary).join(' | '), 200)
            }
            this.state = next
        } else if (event.kind === 'tool_result') {
            this.state = { ...this.state, result: event.content, error: event.isError }
        } else {
            return
        }
        this.enqueue(this.state)
    }

    flush(): Promise<void> {
        return this.chain
    }

    private enqueue(snapshot: LiveState | Record<string, never>): void {
        this.chain = this.chain
            .then(() => this.fs.writeJSONAtomic(this.path, snapshot))
            .catch((error: unknown) => {
                this.logger.debug({ path: this.path, error: errorMessage(error) }, 'state:write-failed')
            })
    }
}
