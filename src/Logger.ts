import winston from "winston"
import { logLevel } from "./internal/Config.js"

/**
 * Sink for the messages this library emits. A winston logger satisfies it, as does any object with
 * these four methods.
 */
export interface Logger {
    debug(message: string, ...meta: unknown[]): void
    info(message: string, ...meta: unknown[]): void
    warn(message: string, ...meta: unknown[]): void
    error(message: string, ...meta: unknown[]): void
}

const { combine, timestamp, printf } = winston.format

const lineFormat = printf(({ level, message, timestamp }) => `${timestamp} [${level}]: ${message}`)

/**
 * Console logger at `level`, `POOLQUEUE_LOG_LEVEL` or `LOG_LEVEL` by default.
 */
export function createLogger(level: string = logLevel): winston.Logger {
    return winston.createLogger({
        level,
        format: combine(timestamp(), lineFormat),
        transports: [new winston.transports.Console({ stderrLevels: ["error", "warn"] })],
    })
}

export const defaultLogger: Logger = createLogger()

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
    debug() { },
    info() { },
    warn() { },
    error() { },
}
