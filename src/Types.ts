import { Failure } from "./Failure.js"
import { YieldJob } from "./internal/YieldJob.js"

/**
 * Instance of a coroutine. Compose coroutines with `yield*`.
 */
export type Coroutine<T> = Generator<Yield, T, unknown>

/**
 * Value or error of a resolved asynchronous operation.
 */
export type Result<T> = Failure | T

/**
 * Callback function called with result of an asynchronous operation.
 */
export type ResultCallback<T> = (result: Result<T>) => void

/**
 * Function that cancels an asynchronous operation.
 */
export type CancelFunction = () => void

/**
 * What a coroutine yields to its job: a suspension that calls back with the result, or the sentinel
 * asking for the running job.
 */
export type Yield = Suspension | typeof YieldJob

export type Suspension = (resultCallback: ResultCallback<unknown>) => CancelFunction | void
