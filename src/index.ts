export type {
  Coroutine,
  Result,
  ResultCallback,
  CancelFunction,
  Suspension,
  Yield,
} from "./Types.js"

export { Failure } from "./Failure.js"
export { CancellationError, ChannelClosed, InvalidArgument } from "./Errors.js"
export type { Job } from "./Job.js"
export type { Deferred } from "./Deferred.js"
export type { CoroutineExceptionHandler, LaunchScope, LaunchCoroutineScope, Scope } from "./Scope.js"
export { CoroutineScope, SupervisorScope, GlobalScope, coroutineScope, job } from "./internal/JobImpl.js"
export * from "./Common.js"
export type { Channel } from "./Channel.js"
export { boundedChannel, forEach } from "./internal/ChannelImpl.js"
export type {
  PoolQueue,
  PoolQueueOptions,
  FactoryPoolQueueOptions,
  ConstructorPoolQueueOptions,
  ProduceFunction,
  ConsumeFunction,
} from "./PoolQueue.js"
export { Skip } from "./PoolQueue.js"
export { poolQueue } from "./internal/PoolQueueImpl.js"
export { commandLoop, launchCommandLoop } from "./CommandLoop.js"
export type { CommandLoopExit, CommandLoopOptions, Production } from "./CommandLoop.js"
export { createLogger, defaultLogger, silentLogger } from "./Logger.js"
export type { Logger } from "./Logger.js"
