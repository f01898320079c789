import { NoSuchElementException } from "./Errors.js"

type Link<T> = { value: T, next: LinkOrNull<T> }
type LinkOrNull<T> = Link<T> | null

/**
 * Singly linked FIFO. Unlike `Array.prototype.shift` both ends are O(1).
 */
export class Queue<T> {
    #length = 0
    #first: LinkOrNull<T> = null
    #last: LinkOrNull<T> = null

    enqueue(value: T): void {
        const link: Link<T> = { value, next: null }
        if (this.#last !== null) {
            this.#last.next = link
        } else {
            this.#first = link
        }
        this.#last = link
        this.#length++
    }

    /**
     * Removes and returns the oldest value, or null when empty.
     */
    dequeue(): T | null {
        const first = this.#first
        if (first === null) return null
        this.#first = first.next
        if (this.#first === null) this.#last = null
        this.#length--
        return first.value
    }

    /**
     * Removes and returns the oldest value. Use where `T` itself may be null.
     * @throws NoSuchElementException when empty
     */
    shift(): T {
        const first = this.#first
        if (first === null) throw new NoSuchElementException()
        this.#first = first.next
        if (this.#first === null) this.#last = null
        this.#length--
        return first.value
    }

    /**
     * Removes the first value matching `predicate`.
     */
    remove(predicate: (value: T) => boolean): boolean {
        let previous: LinkOrNull<T> = null
        for (let link = this.#first; link !== null; link = link.next) {
            if (predicate(link.value)) {
                if (previous === null) {
                    this.#first = link.next
                } else {
                    previous.next = link.next
                }
                if (this.#last === link) this.#last = previous
                this.#length--
                return true
            }
            previous = link
        }
        return false
    }

    length(): number {
        return this.#length
    }
}
