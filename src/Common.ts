import { CancellationError } from "./Errors.js"
import { Failure } from "./Failure.js"
import { GlobalScope, job } from "./internal/JobImpl.js"
import { suspendCoroutine } from "./internal/Suspend.js"
import { LaunchScope } from "./Scope.js"
import { Coroutine, ResultCallback } from "./Types.js"

export { suspendCancellableCoroutine, suspendCoroutine } from "./internal/Suspend.js"

/**
 * Suspends the coroutine for a given number of milliseconds.
 * @param {number} [millis]
 * @return {void}
 */
export function* delay(millis?: number): Coroutine<void> {
    yield (resultCallback: ResultCallback<void>) => {
        const timeout = setTimeout(() => resultCallback(undefined), millis)
        return () => clearTimeout(timeout)
    }
}

/**
 * Checks if the coroutine is still active. A cancelled coroutine does not return from this.
 */
export function* ensureActive(): Coroutine<void> {
    yield* job()
}

/**
 * Waits until the coroutine is canceled. Keeps finally blocks from running until cancellation.
 * @return {never}
 */
export function* awaitCancellation(): Coroutine<never> {
    yield () => { }
    throw new CancellationError()
}

/**
 * Converts a Promise<T> to a Coroutine<T>. A rejection is thrown in the coroutine.
 * @param {<T>Promise<T>} promise
 * @return {<T>T} promiseResult
 */
export function* awaitPromise<T>(promise: Promise<T>): Coroutine<T> {
    return yield* suspendCoroutine<T>((resultCallback) => {
        promise.then(
            (value) => resultCallback(value),
            (error: unknown) => resultCallback(new Failure(error)),
        )
    })
}

/**
 * Runs `coroutine` as a job in `scope` and settles the returned promise with its outcome. A job
 * cancelled before it returns rejects with CancellationError.
 */
export function promiseOf<T>(coroutine: () => Coroutine<T>, scope: LaunchScope = GlobalScope): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        let isSettled = false
        const launched = scope.launch(function* () {
            try {
                const value = yield* coroutine()
                isSettled = true
                resolve(value)
            } catch (error) {
                isSettled = true
                reject(error)
            } finally {
                if (!isSettled) reject(new CancellationError())
            }
        })
        if (!isSettled && !launched.isActive()) reject(new CancellationError())
    })
}
