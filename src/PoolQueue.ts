import { Channel } from "./Channel.js"
import { Coroutine } from "./Types.js"

/**
 * Returned by a `produceWith` callback to skip producing this cycle. The acquired item goes back to
 * the pool.
 */
export const Skip: unique symbol = Symbol("Skip")
export type Skip = typeof Skip

export type ProduceFunction<T, A extends unknown[]> = (item: T, ...args: A) => Coroutine<T | Skip>

export type ConsumeFunction<T, A extends unknown[]> = (item: T, ...args: A) => Coroutine<T>

/**
 * A PoolQueue shares a fixed set of reusable items between a producer coroutine and a consumer
 * coroutine. Free items wait in `pool`, filled items wait in `queue`.
 *
 * The producer loops over `acquire` (take a free item), fills it, and `produce` (hand it to the
 * consumer). The consumer loops over `consume`, processes the item, and `recycle` (hand it back).
 * The producer can fill the next item while the consumer is still processing the previous one,
 * and no item is allocated after construction:
 *
 * ```text
 * producer: read1 read2    read3    ...
 * consumer:       process1 process2 ...
 * ```
 *
 * An empty pool suspends the producer and a full queue suspends it too; an empty queue suspends
 * the consumer. Between `acquire` and `produce` only the producer may touch the item, between
 * `consume` and `recycle` only the consumer.
 */
export interface PoolQueue<T> {
    readonly pool: Channel<T>
    readonly queue: Channel<T>

    /**
     * Takes a free item from the pool, suspending while the pool is empty.
     */
    acquire(): Coroutine<T>

    /**
     * Puts `item` on the queue, suspending while the queue is full. Returns `item`.
     */
    produce(item: T): Coroutine<T>

    /**
     * Acquires an item and calls `f(item, ...args)`. Produces what `f` returns, or recycles the
     * acquired item if `f` returns `Skip`. Returns what `f` returned.
     *
     * If `f` throws, the acquired item is returned to the pool when it has room and the error is
     * rethrown.
     */
    produceWith<A extends unknown[]>(f: ProduceFunction<T, A>, ...args: A): Coroutine<T | Skip>

    /**
     * Takes a filled item from the queue, suspending while the queue is empty.
     */
    consume(): Coroutine<T>

    /**
     * Consumes an item, calls `f(item, ...args)` and recycles whatever `f` returns. There is no
     * way to skip the recycle: the pool always regains its item.
     *
     * If `f` throws, the consumed item is returned to the pool when it has room and the error is
     * rethrown.
     */
    consumeWith<A extends unknown[]>(f: ConsumeFunction<T, A>, ...args: A): Coroutine<T>

    /**
     * Puts `item` back in the pool. Suspends while the pool is full, which only happens when more
     * items circulate than the pool holds. Returns `item`.
     */
    recycle(item: T): Coroutine<T>

    /**
     * Closes the queue, then the pool.
     */
    close(): void
}

export interface PoolQueueOptions {
    poolCapacity: number
    /** Defaults to `poolCapacity`. */
    queueCapacity?: number
}

/**
 * Pre-populates the pool by calling `itemFactory` `poolCapacity` times.
 */
export interface FactoryPoolQueueOptions<T> {
    poolCapacity: number
    queueCapacity: number
    itemFactory: () => T
}

/**
 * Pre-populates the pool with `new itemClass(...constructorArgs)`, `poolCapacity` times.
 */
export interface ConstructorPoolQueueOptions<T, A extends unknown[]> {
    poolCapacity: number
    queueCapacity: number
    itemClass: new (...args: A) => T
    constructorArgs: A
}
