// Yielded by `job()` to receive the running job as the resume value.
export const YieldJob: unique symbol = Symbol("YieldJob")
