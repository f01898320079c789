import { Deferred } from "../Deferred.js"
import { CancellationError } from "../Errors.js"
import { Failure } from "../Failure.js"
import { Job } from "../Job.js"
import { defaultLogger } from "../Logger.js"
import { CoroutineExceptionHandler, LaunchCoroutineScope, Scope } from "../Scope.js"
import { CancelFunction, Coroutine, ResultCallback, Yield } from "../Types.js"
import { debug } from "./Config.js"
import { describe } from "./Errors.js"
import { Queue } from "./Queue.js"
import { suspendCancellableCoroutine } from "./Suspend.js"
import { YieldJob } from "./YieldJob.js"

enum JobState {
    ACTIVE, // Initial state. The job runs until its body finishes, it throws, or it is cancelled.
    COMPLETING, // Body has finished; waiting for children.
    COMPLETED, // Final. Launching into a completed job does nothing.
}

// Nested resumptions of one job beyond this depth continue on a fresh stack.
const MAX_RESUME_DEPTH = 1000

abstract class JobImpl implements Job {
    readonly #id: string = Math.random().toString(36).substring(2, 9)
    #state: JobState = JobState.ACTIVE
    readonly #parent: JobImpl | null
    readonly #children = new Set<JobImpl>()
    readonly #coroutineExceptionHandler: CoroutineExceptionHandler | null

    constructor(parent: JobImpl | null, coroutineExceptionHandler: CoroutineExceptionHandler | null) {
        this.#parent = parent
        this.#coroutineExceptionHandler = coroutineExceptionHandler
        if (parent !== null) parent.#children.add(this)
    }

    isActive(): boolean {
        return this.#state !== JobState.COMPLETED
    }

    cancel(): boolean {
        this.trace(`cancel()`)
        if (this.#state === JobState.COMPLETED) return false
        this.#state = JobState.COMPLETED
        this.#cancelChildren()
        this.stop()
        this.onCompleted(new Failure(new CancellationError()))
        this.detachFromParent()
        return true
    }

    protected isRunning(): boolean {
        return this.#state === JobState.ACTIVE
    }

    /**
     * Stops whatever the job itself is running. Children are cancelled separately.
     */
    protected stop(): void {
    }

    /**
     * Called once when the job reaches COMPLETED, with the failure that ended it, if any.
     */
    protected onCompleted(_failure: Failure | null): void {
    }

    protected bodyCompleted(): void {
        this.trace(`bodyCompleted()`)
        if (this.#state !== JobState.ACTIVE) return
        this.#state = JobState.COMPLETING
        if (this.#children.size === 0) this.#complete()
    }

    protected fail(error: unknown): void {
        this.trace(`fail(${describe(error)})`)
        if (this.#state === JobState.COMPLETED) return
        this.#state = JobState.COMPLETED
        this.#cancelChildren()
        this.stop()
        this.onCompleted(new Failure(error))
        this.reportFailure(error)
    }

    /**
     * Hands a failure of this job to its exception handler, its parent or, at the root, the log.
     */
    protected reportFailure(error: unknown): void {
        if (this.#coroutineExceptionHandler !== null) {
            this.#coroutineExceptionHandler(this, error)
            this.detachFromParent()
        } else if (this.#parent !== null) {
            this.#parent.childFailed(this, error)
        } else {
            defaultLogger.error(`Uncaught failure in ${this}: ${describe(error)}`)
        }
    }

    protected detachFromParent(): void {
        this.#parent?.childCompleted(this)
    }

    protected childCompleted(child: JobImpl): void {
        if (!this.removeChild(child)) return
        if (this.#state === JobState.COMPLETING && this.#children.size === 0) this.#complete()
    }

    protected childFailed(child: JobImpl, error: unknown): void {
        this.removeChild(child)
        this.fail(error)
    }

    protected removeChild(child: JobImpl): boolean {
        return this.#children.delete(child)
    }

    protected trace(message: string): void {
        if (debug) defaultLogger.debug(`${this} ${message}`)
    }

    #complete(): void {
        this.trace(`complete()`)
        this.#state = JobState.COMPLETED
        this.onCompleted(null)
        this.detachFromParent()
    }

    #cancelChildren(): void {
        for (const child of [...this.#children]) {
            child.cancel()
        }
    }

    toString(): string {
        return `${this.constructor.name}@${this.#id}{${JobState[this.#state]}}`
    }
}

abstract class CoroutineJob<T> extends JobImpl {
    #coroutine: Coroutine<T> | null = null
    #cancelSuspension: CancelFunction | null = null
    #isStepping = false
    #depth = 0

    /**
     * Receives the value the coroutine returned. The job may still be waiting for children.
     */
    protected abstract setResult(value: T): void

    protected start(coroutine: Coroutine<T>): void {
        this.#coroutine = coroutine
        this.resumeWith(undefined)
    }

    protected resumeWith(result: unknown): void {
        const coroutine = this.#coroutine
        if (coroutine === null || !this.isRunning()) return

        if (this.#depth >= MAX_RESUME_DEPTH) {
            setTimeout(() => this.resumeWith(result))
            return
        }

        this.#depth++
        try {
            let step: IteratorResult<Yield, T>
            this.#isStepping = true
            try {
                step = result instanceof Failure ? coroutine.throw(result.value) : coroutine.next(result)
            } catch (error) {
                this.#isStepping = false
                this.fail(error)
                return
            }
            this.#isStepping = false

            // A child launched during the step may have failed and taken this job down with it.
            if (!this.isRunning()) {
                this.#returnCoroutine()
                return
            }

            if (step.done) {
                this.setResult(step.value)
                this.bodyCompleted()
                return
            }

            const suspension = step.value
            if (suspension === YieldJob) {
                this.resumeWith(this)
                return
            }

            let isResumed = false
            const cancel = suspension((resumeResult) => {
                if (isResumed) return
                isResumed = true
                this.#cancelSuspension = null
                this.resumeWith(resumeResult)
            })
            if (!isResumed && typeof cancel === "function") this.#cancelSuspension = cancel
        } finally {
            this.#depth--
        }
    }

    protected override stop(): void {
        const cancel = this.#cancelSuspension
        if (cancel !== null) {
            this.#cancelSuspension = null
            cancel()
        }

        // A running generator cannot be returned; resumeWith() does it once the step unwinds.
        if (!this.#isStepping) this.#returnCoroutine()
    }

    // Runs the finally blocks of a coroutine that will not be resumed again.
    #returnCoroutine(): void {
        const generator: Generator<Yield, unknown, unknown> | null = this.#coroutine
        if (generator === null) return

        let step: IteratorResult<Yield, unknown>
        try {
            step = generator.return(undefined)
        } catch (error) {
            defaultLogger.error(`Error thrown while running finally blocks of ${this}: ${describe(error)}`)
            return
        }

        // A finally block suspended. Let it run to the end outside this job.
        if (!step.done) {
            const pending = step.value
            GlobalScope.launch(function* () {
                let next: IteratorResult<Yield, unknown> = generator.next(yield pending)
                while (!next.done) {
                    next = generator.next(yield next.value)
                }
            })
        }
    }
}

class LaunchedJob extends CoroutineJob<void> {
    constructor(
        parent: JobImpl,
        coroutine: () => Coroutine<void>,
        coroutineExceptionHandler: CoroutineExceptionHandler | null,
    ) {
        super(parent, coroutineExceptionHandler)
        this.start(coroutine())
    }

    protected override setResult(): void {
    }
}

/**
 * Outcome of a job that other coroutines can wait on.
 */
class Settlement<T> {
    #outcome: { value: T } | Failure | null = null
    readonly #waiters = new Queue<ResultCallback<T>>()

    isSettled(): boolean {
        return this.#outcome !== null
    }

    settle(outcome: { value: T } | Failure): void {
        if (this.#outcome !== null) return
        this.#outcome = outcome
        const result = outcome instanceof Failure ? outcome : outcome.value
        for (; ;) {
            const waiter = this.#waiters.dequeue()
            if (waiter === null) break
            waiter(result)
        }
    }

    * await(): Coroutine<T> {
        const outcome = this.#outcome
        if (outcome instanceof Failure) throw outcome.value
        if (outcome !== null) return outcome.value

        return yield* suspendCancellableCoroutine<T>((resultCallback) => {
            this.#waiters.enqueue(resultCallback)
            return () => {
                this.#waiters.remove((waiter) => waiter === resultCallback)
            }
        })
    }
}

/**
 * Job started with `scope.async()`. Its result is available as soon as its body returns.
 */
class DeferredJob<T> extends CoroutineJob<T> implements Deferred<T> {
    readonly #settlement = new Settlement<T>()

    constructor(parent: JobImpl, coroutine: () => Coroutine<T>) {
        super(parent, null)
        this.start(coroutine())
    }

    protected override setResult(value: T): void {
        this.#settlement.settle({ value })
    }

    protected override onCompleted(failure: Failure | null): void {
        if (failure !== null) this.#settlement.settle(failure)
    }

    * await(): Coroutine<T> {
        return yield* this.#settlement.await()
    }
}

class NullJob implements Job {
    static instance = new NullJob()

    private constructor() {
    }

    cancel(): boolean {
        return false
    }

    isActive(): boolean {
        return false
    }
}

/**
 * Body of a `coroutineScope()`. Completes after its body and every child have, and hands its
 * outcome to the awaiting caller instead of failing the caller's job.
 */
class ScopeJob<T> extends CoroutineJob<T> implements Scope {
    #result: { value: T } | null = null
    readonly #settlement = new Settlement<T>()

    constructor(parent: JobImpl, coroutine: (this: Scope) => Coroutine<T>) {
        super(parent, null)
        this.start(coroutine.call(this))
    }

    launch(coroutine: () => Coroutine<void>, coroutineExceptionHandler?: CoroutineExceptionHandler): Job {
        if (!this.isActive()) return NullJob.instance
        return new LaunchedJob(this, coroutine, coroutineExceptionHandler ?? null)
    }

    async<R>(coroutine: () => Coroutine<R>): Deferred<R> {
        if (!this.isActive()) {
            return {
                * await(): Coroutine<R> {
                    throw new CancellationError()
                },
            }
        }
        return new DeferredJob(this, coroutine)
    }

    * await(): Coroutine<T> {
        return yield* this.#settlement.await()
    }

    protected override setResult(value: T): void {
        this.#result = { value }
    }

    protected override onCompleted(failure: Failure | null): void {
        const result = this.#result
        if (failure !== null) {
            this.#settlement.settle(failure)
        } else if (result !== null) {
            this.#settlement.settle(result)
        }
    }

    protected override reportFailure(): void {
        this.detachFromParent()
    }
}

class CoroutineScopeImpl extends JobImpl implements LaunchCoroutineScope {
    constructor(coroutineExceptionHandler: CoroutineExceptionHandler | null = null) {
        super(null, coroutineExceptionHandler)
    }

    launch(coroutine: () => Coroutine<void>, coroutineExceptionHandler?: CoroutineExceptionHandler): Job {
        if (!this.isActive()) return NullJob.instance
        return new LaunchedJob(this, coroutine, coroutineExceptionHandler ?? null)
    }

    launchCoroutineScope(
        coroutine: (this: Scope) => Coroutine<void>,
        coroutineExceptionHandler?: CoroutineExceptionHandler
    ): Job {
        return this.launch(function* () {
            yield* coroutineScope(coroutine)
        }, coroutineExceptionHandler)
    }
}

/**
 * Constructor for a CoroutineScope, a group of coroutines that are canceled together. If a child
 * job throws an uncaught error the scope cancels immediately; if `coroutineExceptionHandler` is
 * provided it is called with the error instead of logging it.
 */
export const CoroutineScope = (coroutineExceptionHandler?: CoroutineExceptionHandler): LaunchCoroutineScope & Job =>
    new CoroutineScopeImpl(coroutineExceptionHandler)

class SupervisorScopeImpl extends CoroutineScopeImpl {
    protected override childFailed(child: JobImpl, error: unknown): void {
        if (!this.removeChild(child)) return
        defaultLogger.error(`Uncaught failure in ${child}: ${describe(error)}`)
    }
}

/**
 * Constructor for a SupervisorScope. A child that throws is logged and removed; its siblings and
 * the scope keep running.
 */
export const SupervisorScope = (coroutineExceptionHandler?: CoroutineExceptionHandler): LaunchCoroutineScope & Job =>
    new SupervisorScopeImpl(coroutineExceptionHandler)

class GlobalScopeImpl extends SupervisorScopeImpl {
    static instance = new GlobalScopeImpl()

    override cancel(): boolean {
        return false
    }

    private constructor() {
        super()
    }
}

export const GlobalScope: LaunchCoroutineScope & Job = GlobalScopeImpl.instance

/**
 * Runs `coroutine` with a Scope bound to `this`. Returns its result once it and every coroutine it
 * launched have completed; rethrows the first failure among them.
 */
export function* coroutineScope<T>(coroutine: (this: Scope) => Coroutine<T>): Coroutine<T> {
    const parent = yield* currentJob()
    return yield* new ScopeJob(parent, coroutine).await()
}

/**
 * The job running the calling coroutine.
 */
export function* job(): Coroutine<Job> {
    return yield* currentJob()
}

function* currentJob(): Coroutine<JobImpl> {
    const current = yield YieldJob
    if (!(current instanceof JobImpl)) throw new Error(`job() was resumed without a job`)
    return current
}
