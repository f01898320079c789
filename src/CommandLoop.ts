import { Channel } from "./Channel.js"
import { describe } from "./internal/Errors.js"
import { Job } from "./Job.js"
import { defaultLogger, Logger } from "./Logger.js"
import { PoolQueue } from "./PoolQueue.js"
import { LaunchScope } from "./Scope.js"
import { Coroutine } from "./Types.js"

/**
 * Acts on one command, typically by producing items into `pq`.
 */
export type Production<T> = (command: string, pq: PoolQueue<T>) => Coroutine<void>

export interface CommandLoopOptions {
    logger?: Logger
    /** Close `pq.queue` and the command channel when the loop ends. Defaults to true. */
    autoClose?: boolean
}

/**
 * Why a command loop ended. `end-of-commands` is the normal end: the command channel was closed
 * and drained.
 */
export type CommandLoopExit = `end-of-commands` | `production-failed`

/**
 * Receives commands and runs `production(command, pq)` for each, one at a time, until the command
 * channel ends (logged at info) or a production throws (logged at warn). Never throws either; the
 * reason is returned instead.
 *
 * With `autoClose` the queue and the command channel are closed on the way out. The pool is left
 * open for whoever shuts the PoolQueue down.
 */
export function* commandLoop<T>(
    commands: Channel<string>,
    pq: PoolQueue<T>,
    production: Production<T>,
    options: CommandLoopOptions = {},
): Coroutine<CommandLoopExit> {
    const logger = options.logger ?? defaultLogger
    const autoClose = options.autoClose ?? true

    try {
        for (; ;) {
            let command: string
            try {
                command = yield* commands.receive()
            } catch (error) {
                logger.info(`Command loop stopped, no more commands: ${describe(error)}`)
                return `end-of-commands`
            }

            logger.debug(`Command loop running "${command}"`)
            try {
                yield* production(command, pq)
            } catch (error) {
                logger.warn(`Command loop stopped, "${command}" failed: ${describe(error)}`)
                return `production-failed`
            }
        }
    } finally {
        if (autoClose) {
            pq.queue.close()
            commands.close()
        }
    }
}

/**
 * Launches `commandLoop` as a background job of `scope`.
 */
export function launchCommandLoop<T>(
    scope: LaunchScope,
    commands: Channel<string>,
    pq: PoolQueue<T>,
    production: Production<T>,
    options?: CommandLoopOptions,
): Job {
    return scope.launch(function* () {
        yield* commandLoop(commands, pq, production, options)
    })
}
