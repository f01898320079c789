const truthy = new Set(["1", "true", "yes", "on"])

/**
 * Trace job state transitions through the logger at debug level.
 */
export const debug: boolean = truthy.has((process.env.POOLQUEUE_DEBUG ?? "").toLowerCase())

export const logLevel: string = process.env.POOLQUEUE_LOG_LEVEL ?? process.env.LOG_LEVEL ?? (debug ? "debug" : "info")
