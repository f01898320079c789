import { Coroutine } from "./Types.js"

/**
 * Channels pass values between coroutines in FIFO order. A channel holds up to `capacity` values;
 * `send` suspends while it is full and `receive` suspends while it is empty. Coroutines waiting on
 * the same channel are served first come, first served.
 *
 * Closing a channel fails every waiting and every later `send`, and fails `receive` once the values
 * already buffered have been taken. Failures throw `ChannelClosed`.
 */
export interface Channel<T> {
    readonly capacity: number

    send(value: T): Coroutine<void>

    /**
     * Sends without suspending. Returns false if the channel is full or closed.
     */
    trySend(value: T): boolean

    receive(): Coroutine<T>

    close(): void

    isClosed(): boolean

    /**
     * True when a `receive` would return without suspending.
     */
    isReady(): boolean

    length(): number
}
