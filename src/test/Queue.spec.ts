import { assert } from "chai"
import { NoSuchElementException } from "../internal/Errors.js"
import { Queue } from "../internal/Queue.js"

function drain<T>(queue: Queue<T>): T[] {
    const values: T[] = []
    while (queue.length() > 0) {
        values.push(queue.shift())
    }
    return values
}

describe("Queue tests", () => {
    it("dequeues in insertion order", () => {
        const queue = new Queue<string>()
        queue.enqueue("a")
        queue.enqueue("b")
        queue.enqueue("c")

        assert.strictEqual(queue.length(), 3)
        assert.strictEqual(queue.dequeue(), "a")
        assert.strictEqual(queue.dequeue(), "b")
        assert.strictEqual(queue.dequeue(), "c")
        assert.isNull(queue.dequeue())
        assert.strictEqual(queue.length(), 0)
    })

    it("shift() keeps null values apart from emptiness", () => {
        const queue = new Queue<number | null>()
        queue.enqueue(null)

        assert.isNull(queue.shift())
        assert.throws(() => queue.shift(), NoSuchElementException)
    })

    it("remove() unlinks the first match and keeps the tail usable", () => {
        const queue = new Queue<number>()
        queue.enqueue(1)
        queue.enqueue(2)
        queue.enqueue(3)

        assert.isTrue(queue.remove((value) => value === 3))
        assert.isFalse(queue.remove((value) => value === 4))
        queue.enqueue(4)
        assert.isTrue(queue.remove((value) => value === 1))

        assert.strictEqual(queue.length(), 2)
        assert.deepEqual(drain(queue), [2, 4])
    })

    it("refills after being emptied", () => {
        const queue = new Queue<number>()
        queue.enqueue(1)
        queue.dequeue()
        queue.enqueue(2)

        assert.deepEqual(drain(queue), [2])
    })
})
