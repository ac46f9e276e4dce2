import { describe, expect, it, vi } from 'vitest'
import { TypedEventEmitter } from '../../../src/core/events.js'

describe('TypedEventEmitter', () => {
    it('emits and handles events', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('harness:phase', handler)
        emitter.emit('harness:phase', { phase: 'coding', session: 3 })

        expect(handler).toHaveBeenCalledWith({ phase: 'coding', session: 3 })
    })

    it('supports multiple handlers', () => {
        const emitter = new TypedEventEmitter()
        const h1 = vi.fn()
        const h2 = vi.fn()

        emitter.on('watchdog:expired', h1)
        emitter.on('watchdog:expired', h2)
        emitter.emit('watchdog:expired', { cause: 'idle', elapsedMs: 5_000, idleMs: 5_000 })

        expect(h1).toHaveBeenCalledTimes(1)
        expect(h2).toHaveBeenCalledTimes(1)
    })

    it('removes handler with off', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('session:start', handler)
        emitter.off('session:start', handler)
        emitter.emit('session:start', { cwd: '/p', pid: 10, pgid: 10 })

        expect(handler).not.toHaveBeenCalled()
    })

    it('removeAll clears all handlers', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('harness:phase', handler)
        emitter.removeAll()
        emitter.emit('harness:phase', { phase: 'initializer', session: 0 })

        expect(handler).not.toHaveBeenCalled()
    })

    it('keeps delivering after a handler throws', () => {
        const emitter = new TypedEventEmitter()
        const badHandler = vi.fn(() => {
            throw new Error('boom')
        })
        const goodHandler = vi.fn()

        emitter.on('harness:phase', badHandler)
        emitter.on('harness:phase', goodHandler)
        emitter.emit('harness:phase', { phase: 'coding', session: 1 })

        expect(badHandler).toHaveBeenCalledTimes(1)
        expect(goodHandler).toHaveBeenCalledTimes(1)
    })
})
