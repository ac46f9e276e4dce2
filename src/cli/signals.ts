/**
 * AbortSignal tied to SIGINT and SIGTERM for the lifetime of one command. Repeat signals are absorbed
 * while cleanup runs; after `dispose` they fall back to Node's default handling.
 */
export function cancellationOnSignals(onCancel?: (signal: NodeJS.Signals) => void): {
    signal: AbortSignal
    dispose(): void
} {
    const controller = new AbortController()
    const handler = (received: NodeJS.Signals) => {
        if (controller.signal.aborted) return
        onCancel?.(received)
        controller.abort(new Error(`Received ${received}`))
    }
    process.on('SIGINT', handler)
    process.on('SIGTERM', handler)
    return {
        signal: controller.signal,
        dispose() {
            process.off('SIGINT', handler)
            process.off('SIGTERM', handler)
        },
    }
}
