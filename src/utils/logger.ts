import pino from 'pino'

import { defaultConfig } from '../config/config'
import { LogLevel } from '../types'
import { isDevEnv, isProdEnv } from './env-utils'

type LogExtra = Record<string, unknown>

function isLogExtra(value: unknown): value is LogExtra {
    return typeof value === 'object' && value !== null && !(value instanceof Error) && !Array.isArray(value)
}

export class Logger {
    private pino: pino.Logger
    private prefix: string
    private transport?: ReturnType<typeof pino.transport>
    private isShutdown = false

    constructor(name: string, level: LogLevel = defaultConfig.LOG_LEVEL) {
        this.prefix = `[${name.toUpperCase()}]`
        if (isDevEnv()) {
            // NOTE: keep a reference to the transport so that shutdown can end the worker thread
            this.transport = pino.transport({
                target: 'pino-pretty',
                options: { sync: true },
            })
            this.pino = pino({ level }, this.transport)
        } else {
            this.pino = pino({
                // Output the level name rather than its number so logs can be queried by level
                formatters: isProdEnv() ? { level: (label) => ({ level: label }) } : undefined,
                level,
            })
        }
    }

    private log(level: LogLevel, args: unknown[]): void {
        if (this.isShutdown) {
            return
        }

        // A trailing plain object is spread into the structured record
        const lastArg = args[args.length - 1]
        const extra = isLogExtra(lastArg) ? lastArg : undefined
        const parts = extra ? args.slice(0, -1) : args

        this.pino[level]({ ...extra, msg: `${this.prefix} ${parts.map((part) => String(part)).join(' ')}` })
    }

    debug(...args: unknown[]): void {
        this.log('debug', args)
    }

    info(...args: unknown[]): void {
        this.log('info', args)
    }

    warn(...args: unknown[]): void {
        this.log('warn', args)
    }

    error(...args: unknown[]): void {
        this.log('error', args)
    }

    shutdown(): void {
        this.isShutdown = true
        // Ending the transport lets the pino-pretty worker thread exit
        this.transport?.end()
    }
}

export const logger = new Logger('pageviews')

export function shutdownLogger(): void {
    logger.shutdown()
}
