import { Channel } from "../Channel.js"
import { ChannelClosed, InvalidArgument } from "../Errors.js"
import { Failure } from "../Failure.js"
import { Coroutine, ResultCallback } from "../Types.js"
import { Queue } from "./Queue.js"
import { suspendCancellableCoroutine } from "./Suspend.js"

type PendingSend<T> = { value: T, resultCallback: ResultCallback<void> }

/**
 * Creates a channel that buffers up to `capacity` values.
 * @throws InvalidArgument if capacity is not a positive integer
 */
export const boundedChannel = <T>(capacity: number): Channel<T> => new BoundedChannelImpl<T>(capacity)

class BoundedChannelImpl<T> implements Channel<T> {
    readonly capacity: number
    #isClosed = false
    readonly #buffer = new Queue<T>()
    // Only non-empty while the buffer is full.
    readonly #senders = new Queue<PendingSend<T>>()
    // Only non-empty while the buffer is empty.
    readonly #receivers = new Queue<ResultCallback<T>>()

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new InvalidArgument(`channel capacity must be a positive integer, got ${capacity}`)
        }
        this.capacity = capacity
    }

    close(): void {
        if (this.#isClosed) return
        this.#isClosed = true

        const failure = new Failure(ChannelClosed)
        for (; ;) {
            const receiver = this.#receivers.dequeue()
            if (receiver === null) break
            receiver(failure)
        }
        for (; ;) {
            const sender = this.#senders.dequeue()
            if (sender === null) break
            sender.resultCallback(failure)
        }
    }

    isClosed(): boolean {
        return this.#isClosed
    }

    isReady(): boolean {
        return this.#buffer.length() > 0
    }

    length(): number {
        return this.#buffer.length()
    }

    trySend(value: T): boolean {
        if (this.#isClosed) return false

        const receiver = this.#receivers.dequeue()
        if (receiver !== null) {
            receiver(value)
            return true
        }

        if (this.#buffer.length() < this.capacity) {
            this.#buffer.enqueue(value)
            return true
        }

        return false
    }

    * send(value: T): Coroutine<void> {
        if (this.#isClosed) throw ChannelClosed
        if (this.trySend(value)) return

        // suspend sender until a receiver frees a slot
        yield* suspendCancellableCoroutine<void>((resultCallback) => {
            const pending: PendingSend<T> = { value, resultCallback }
            this.#senders.enqueue(pending)
            return () => {
                this.#senders.remove((sender) => sender === pending)
            }
        })
    }

    * receive(): Coroutine<T> {
        if (this.#buffer.length() > 0) {
            const value = this.#buffer.shift()

            // the freed slot goes to the longest waiting sender
            const sender = this.#senders.dequeue()
            if (sender !== null) {
                this.#buffer.enqueue(sender.value)
                sender.resultCallback(undefined)
            }

            return value
        }

        if (this.#isClosed) throw ChannelClosed

        return yield* suspendCancellableCoroutine<T>((resultCallback) => {
            this.#receivers.enqueue(resultCallback)
            return () => {
                this.#receivers.remove((receiver) => receiver === resultCallback)
            }
        })
    }
}

/**
 * Receives from `channel` and runs `action` on each value until the channel is closed and drained.
 */
export function* forEach<T>(channel: Channel<T>, action: (value: T) => Coroutine<void>): Coroutine<void> {
    for (; ;) {
        let value: T
        try {
            value = yield* channel.receive()
        } catch (error) {
            if (error === ChannelClosed) return
            throw error
        }
        yield* action(value)
    }
}
