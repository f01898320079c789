import { Channel } from "../Channel.js"
import { InvalidArgument } from "../Errors.js"
import {
    ConstructorPoolQueueOptions,
    ConsumeFunction,
    FactoryPoolQueueOptions,
    PoolQueue,
    PoolQueueOptions,
    ProduceFunction,
    Skip,
} from "../PoolQueue.js"
import { Coroutine } from "../Types.js"
import { boundedChannel } from "./ChannelImpl.js"

class PoolQueueImpl<T> implements PoolQueue<T> {
    constructor(readonly pool: Channel<T>, readonly queue: Channel<T>) { }

    * acquire(): Coroutine<T> {
        return yield* this.pool.receive()
    }

    * produce(item: T): Coroutine<T> {
        yield* this.queue.send(item)
        return item
    }

    * produceWith<A extends unknown[]>(f: ProduceFunction<T, A>, ...args: A): Coroutine<T | Skip> {
        const item = yield* this.acquire()
        let isHandedOff = false
        try {
            const produced = yield* f(item, ...args)
            isHandedOff = true
            if (produced === Skip) {
                yield* this.recycle(item)
            } else {
                yield* this.produce(produced)
            }
            return produced
        } finally {
            if (!isHandedOff) this.pool.trySend(item)
        }
    }

    * consume(): Coroutine<T> {
        return yield* this.queue.receive()
    }

    * consumeWith<A extends unknown[]>(f: ConsumeFunction<T, A>, ...args: A): Coroutine<T> {
        const item = yield* this.consume()
        let isHandedOff = false
        try {
            const processed = yield* f(item, ...args)
            isHandedOff = true
            return yield* this.recycle(processed)
        } finally {
            if (!isHandedOff) this.pool.trySend(item)
        }
    }

    * recycle(item: T): Coroutine<T> {
        yield* this.pool.send(item)
        return item
    }

    close(): void {
        this.queue.close()
        this.pool.close()
    }
}

function checkCapacity(name: string, capacity: number): void {
    if (!Number.isInteger(capacity) || capacity <= 0) {
        throw new InvalidArgument(`${name} capacity must be a positive integer, got ${capacity}`)
    }
}

function prefill<T>(pq: PoolQueue<T>, count: number, create: () => T): PoolQueue<T> {
    // The pool was created with room for exactly `count` items.
    for (let i = 0; i < count; i++) {
        pq.pool.trySend(create())
    }
    return pq
}

/**
 * Creates a PoolQueue over two existing channels.
 */
export function poolQueue<T>(pool: Channel<T>, queue: Channel<T>): PoolQueue<T>
/**
 * Creates a PoolQueue whose pool holds `new itemClass(...constructorArgs)` items.
 */
export function poolQueue<T, A extends unknown[]>(options: ConstructorPoolQueueOptions<T, A>): PoolQueue<T>
/**
 * Creates a PoolQueue whose pool holds `itemFactory()` items.
 */
export function poolQueue<T>(options: FactoryPoolQueueOptions<T>): PoolQueue<T>
/**
 * Creates a PoolQueue with an empty pool; fill it with `recycle` or `pool.trySend`.
 */
export function poolQueue<T>(options: PoolQueueOptions): PoolQueue<T>
export function poolQueue<T>(
    poolOrOptions: Channel<T> | PoolQueueOptions | FactoryPoolQueueOptions<T> | ConstructorPoolQueueOptions<T, unknown[]>,
    queue?: Channel<T>,
): PoolQueue<T> {
    if (!("poolCapacity" in poolOrOptions)) {
        if (queue === undefined) throw new InvalidArgument(`queue channel is required`)
        return new PoolQueueImpl(poolOrOptions, queue)
    }

    const options = poolOrOptions
    const queueCapacity = options.queueCapacity ?? options.poolCapacity
    checkCapacity(`pool`, options.poolCapacity)
    checkCapacity(`queue`, queueCapacity)

    const pq = new PoolQueueImpl(boundedChannel<T>(options.poolCapacity), boundedChannel<T>(queueCapacity))

    if ("itemClass" in options) {
        const { itemClass, constructorArgs } = options
        return prefill(pq, options.poolCapacity, () => new itemClass(...constructorArgs))
    }
    if ("itemFactory" in options) {
        return prefill(pq, options.poolCapacity, options.itemFactory)
    }
    return pq
}
