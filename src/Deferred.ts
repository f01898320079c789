import { Coroutine } from "./Types.js"

/**
 * Result of a coroutine started with `scope.async()`.
 */
export interface Deferred<T> {
    await(): Coroutine<T>
}
