export type ErrorKind = 'transient' | 'permanent'

export class HarnessError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'HarnessError'
        this.kind = kind
    }
}

export class TransientError extends HarnessError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'transient', options)
        this.name = 'TransientError'
    }
}

export class PermanentError extends HarnessError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'PermanentError'
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

function errorCode(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null || !('code' in error)) return undefined
    const { code } = error
    return typeof code === 'string' ? code : undefined
}

/** Signal delivery to a process (or group) that is already gone. */
export function isMissingProcessError(error: unknown): boolean {
    return errorCode(error) === 'ESRCH'
}

export function isNotFoundError(error: unknown): boolean {
    return errorCode(error) === 'ENOENT'
}

/** Resource exhaustion clears up on its own; anything else will fail the same way again. */
export function classifyError(error: unknown): ErrorKind {
    if (error instanceof HarnessError) return error.kind
    const code = errorCode(error)
    if (code === 'EAGAIN' || code === 'EBUSY' || code === 'EMFILE') return 'transient'
    return 'permanent'
}

/** Wraps `cause` in the HarnessError subclass its classification calls for. */
export function toHarnessError(message: string, cause: unknown): HarnessError {
    if (cause instanceof HarnessError) return cause
    const detail = `${message}: ${errorMessage(cause)}`
    return classifyError(cause) === 'transient'
        ? new TransientError(detail, { cause })
        : new PermanentError(detail, { cause })
}
