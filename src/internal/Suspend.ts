import { CancelFunction, Coroutine, ResultCallback } from "../Types.js"

/**
 * Converts a callback API to a coroutine.
 * @param {<T>(resultCallback: ResultCallback<T>) => void} continuation
 * @return {<T>T}
 */
export function* suspendCoroutine<T>(continuation: (resultCallback: ResultCallback<T>) => void): Coroutine<T> {
    return (yield continuation) as T
}

/**
 * Converts a callback API that can be canceled to a coroutine. The returned function is called if
 * the job is cancelled while suspended.
 * @param {<T>(resultCallback: ResultCallback<T>) => CancelFunction} continuation
 * @return {<T>T}
 */
export function* suspendCancellableCoroutine<T>(
    continuation: (resultCallback: ResultCallback<T>) => CancelFunction
): Coroutine<T> {
    return (yield continuation) as T
}
