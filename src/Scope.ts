import { Deferred } from "./Deferred.js"
import { Job } from "./Job.js"
import { Coroutine } from "./Types.js"

export type CoroutineExceptionHandler = (job: Job, error: unknown) => void

/**
 * Where coroutine instances are launched.
 */
export interface LaunchScope {
    launch(coroutine: () => Coroutine<void>, coroutineExceptionHandler?: CoroutineExceptionHandler): Job
}

/**
 * A root scope with a shortcut for launching a child coroutineScope.
 */
export interface LaunchCoroutineScope extends LaunchScope {
    launchCoroutineScope(
        coroutine: (this: Scope) => Coroutine<void>,
        coroutineExceptionHandler?: CoroutineExceptionHandler
    ): Job
}

/**
 * A Scope starts jobs without suspending the parent coroutine. The parent collects results with
 * `yield* deferred.await()`, and the scope itself completes only once every child has.
 */
export interface Scope extends LaunchScope {
    async<T>(coroutine: () => Coroutine<T>): Deferred<T>
}
