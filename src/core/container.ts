import type { ResolvedConfig } from '../config/schema.js'
import { SessionMetrics } from '../harness/metrics.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { SessionRunner } from '../session/runner.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    sessionRunner: SessionRunner
    metrics: SessionMetrics
    shutdown(): void
}

export interface ContainerOverrides {
    logger?: Logger
    fs?: FileSystem
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter()
    const fs = overrides.fs ?? new NodeFileSystem()
    const sessionRunner = new SessionRunner({
        fs,
        logger,
        eventBus,
        config,
        drainPollMs: config.drainPollMs,
        killGraceMs: config.killGraceMs,
    })
    const metrics = new SessionMetrics(eventBus)

    return {
        config,
        logger,
        eventBus,
        fs,
        sessionRunner,
        metrics,

        shutdown() {
            metrics.dispose()
            eventBus.removeAll()
            logger.flush()
        },
    }
}
