/**
 * Wraps a thrown value so it can travel through a ResultCallback and be rethrown in the resumed
 * coroutine.
 */
export class Failure {
    constructor(readonly value: unknown) { }
}
