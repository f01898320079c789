import { assert } from "chai"
import { promiseOf } from "../Common.js"
import { ChannelClosed, InvalidArgument } from "../Errors.js"
import { boundedChannel, forEach } from "../internal/ChannelImpl.js"
import { coroutineScope } from "../internal/JobImpl.js"
import { assertFailsWith } from "./Assert.js"

describe("Channel tests", () => {
    it("delivers buffered values in FIFO order", () => promiseOf(function* () {
        const chan = boundedChannel<number>(3)
        yield* chan.send(1)
        yield* chan.send(2)
        yield* chan.send(3)

        assert.strictEqual(chan.length(), 3)
        assert.strictEqual(yield* chan.receive(), 1)
        assert.strictEqual(yield* chan.receive(), 2)
        assert.strictEqual(yield* chan.receive(), 3)
        assert.isFalse(chan.isReady())
    }))

    it("rejects capacities that are not positive integers", () => {
        for (const capacity of [0, -2, 2.5]) {
            assert.throws(() => boundedChannel<number>(capacity), InvalidArgument)
        }
    })

    it("trySend() refuses values once the channel is full", () => {
        const chan = boundedChannel<string>(1)

        assert.isTrue(chan.trySend("a"))
        assert.isFalse(chan.trySend("b"))
        assert.strictEqual(chan.length(), 1)
        assert.strictEqual(chan.capacity, 1)
    })

    it("send() suspends while full and waiting senders resume in order", () => promiseOf(function* () {
        const chan = boundedChannel<number>(1)
        const events: string[] = []

        yield* coroutineScope(function* () {
            yield* chan.send(1)
            this.launch(function* () {
                yield* chan.send(2)
                events.push("sent 2")
            })
            this.launch(function* () {
                yield* chan.send(3)
                events.push("sent 3")
            })
            assert.deepEqual(events, [])

            assert.strictEqual(yield* chan.receive(), 1)
            assert.deepEqual(events, ["sent 2"])
            assert.strictEqual(yield* chan.receive(), 2)
            assert.deepEqual(events, ["sent 2", "sent 3"])
            assert.strictEqual(yield* chan.receive(), 3)
        })
    }))

    it("receive() suspends until a value is sent and receivers are served in order", () => promiseOf(function* () {
        const chan = boundedChannel<string>(2)
        const received: string[] = []

        yield* coroutineScope(function* () {
            this.launch(function* () {
                received.push(`first got ${yield* chan.receive()}`)
            })
            this.launch(function* () {
                received.push(`second got ${yield* chan.receive()}`)
            })
            assert.deepEqual(received, [])

            yield* chan.send("a")
            yield* chan.send("b")
        })

        assert.deepEqual(received, ["first got a", "second got b"])
        assert.strictEqual(chan.length(), 0)
    }))

    it("close() fails suspended receivers and senders with ChannelClosed", () => promiseOf(function* () {
        const empty = boundedChannel<number>(1)
        const full = boundedChannel<number>(1)
        const errors: unknown[] = []

        yield* coroutineScope(function* () {
            full.trySend(0)
            this.launch(function* () {
                try {
                    yield* empty.receive()
                } catch (error) {
                    errors.push(error)
                }
            })
            this.launch(function* () {
                try {
                    yield* full.send(1)
                } catch (error) {
                    errors.push(error)
                }
            })

            empty.close()
            full.close()
        })

        assert.deepEqual(errors, [ChannelClosed, ChannelClosed])
    }))

    it("a closed channel drains its buffer before failing", () => promiseOf(function* () {
        const chan = boundedChannel<number>(2)
        chan.trySend(1)
        chan.trySend(2)
        chan.close()
        chan.close()

        assert.isTrue(chan.isClosed())
        assert.isFalse(chan.trySend(3))
        yield* assertFailsWith(chan.send(3), ChannelClosed)
        assert.strictEqual(yield* chan.receive(), 1)
        assert.strictEqual(yield* chan.receive(), 2)
        yield* assertFailsWith(chan.receive(), ChannelClosed)
    }))

    it("forEach() receives until the channel is closed and drained", () => promiseOf(function* () {
        const chan = boundedChannel<number>(4)
        const seen: number[] = []
        chan.trySend(1)
        chan.trySend(2)
        chan.trySend(3)
        chan.close()

        yield* forEach(chan, function* (value) {
            seen.push(value)
        })

        assert.deepEqual(seen, [1, 2, 3])
    }))

    it("a cancelled receiver does not take a later value", () => promiseOf(function* () {
        const chan = boundedChannel<number>(1)

        yield* coroutineScope(function* () {
            const receiver = this.launch(function* () {
                yield* chan.receive()
            })
            receiver.cancel()

            assert.isTrue(chan.trySend(7))
            assert.strictEqual(yield* chan.receive(), 7)
        })
    }))

    it("a cancelled sender does not deliver its value", () => promiseOf(function* () {
        const chan = boundedChannel<number>(1)

        yield* coroutineScope(function* () {
            chan.trySend(1)
            const sender = this.launch(function* () {
                yield* chan.send(2)
            })
            sender.cancel()

            assert.strictEqual(yield* chan.receive(), 1)
            assert.isFalse(chan.isReady())
        })
    }))
})
