import pino from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    const verbose = config.logLevel === 'debug' || config.logLevel === 'trace'
    if (verbose) {
        return pino({
            name: 'council',
            level: config.logLevel,
            transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
        })
    }
    // stdout carries the plan and trace, so logs go to stderr
    return pino({ name: 'council', level: config.logLevel }, pino.destination(2))
}
