import { describe, expect, it } from 'vitest'
import {
    classifyError,
    errorMessage,
    HarnessError,
    isMissingProcessError,
    isNotFoundError,
    PermanentError,
    TransientError,
    toHarnessError,
} from '../../../src/core/errors.js'

function systemError(code: string): Error {
    return Object.assign(new Error(`${code}: failed`), { code })
}

describe('classifyError', () => {
    it('keeps the kind of harness errors', () => {
        expect(classifyError(new TransientError('busy'))).toBe('transient')
        expect(classifyError(new PermanentError('missing binary'))).toBe('permanent')
    })

    it('treats resource exhaustion as transient', () => {
        for (const code of ['EAGAIN', 'EBUSY', 'EMFILE']) {
            expect(classifyError(systemError(code))).toBe('transient')
        }
    })

    it('treats everything else as permanent', () => {
        expect(classifyError(systemError('ENOENT'))).toBe('permanent')
        expect(classifyError(new Error('unknown'))).toBe('permanent')
        expect(classifyError('text')).toBe('permanent')
        expect(classifyError({ code: 42 })).toBe('permanent')
    })
})

describe('error codes', () => {
    it('recognizes ESRCH and ENOENT', () => {
        expect(isMissingProcessError(systemError('ESRCH'))).toBe(true)
        expect(isMissingProcessError(systemError('EPERM'))).toBe(false)
        expect(isNotFoundError(systemError('ENOENT'))).toBe(true)
        expect(isNotFoundError(null)).toBe(false)
    })
})

describe('errorMessage', () => {
    it('reads errors and stringifies the rest', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom')
        expect(errorMessage(7)).toBe('7')
    })
})

describe('toHarnessError', () => {
    it('returns harness errors unchanged', () => {
        const original = new PermanentError('bad')
        expect(toHarnessError('Cannot start', original)).toBe(original)
    })

    it('wraps transient causes', () => {
        const cause = systemError('EAGAIN')
        const wrapped = toHarnessError('Cannot start session in /p', cause)
        expect(wrapped).toBeInstanceOf(TransientError)
        expect(wrapped.message).toBe('Cannot start session in /p: EAGAIN: failed')
        expect(wrapped.cause).toBe(cause)
    })

    it('wraps other causes as permanent', () => {
        const wrapped = toHarnessError('Cannot start', new Error('nope'))
        expect(wrapped).toBeInstanceOf(PermanentError)
        expect(wrapped.kind).toBe('permanent')
    })
})

describe('HarnessError', () => {
    it('carries name and kind', () => {
        const error = new HarnessError('test', 'transient')
        expect(error.name).toBe('HarnessError')
        expect(error.kind).toBe('transient')
        expect(new TransientError('x').name).toBe('TransientError')
    })
})
