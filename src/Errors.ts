class ChannelClosedImpl implements Error {
  static instance = new ChannelClosedImpl()

  name = `ChannelClosed`
  message = `Channel closed`

  private constructor() { }
}

/**
 * Thrown by a channel operation that cannot proceed because the channel was closed. It is a single
 * value; compare with `error === ChannelClosed`.
 */
export const ChannelClosed = ChannelClosedImpl.instance

/**
 * Thrown synchronously when a capacity or other argument is out of range.
 */
export class InvalidArgument extends Error {
  name = `InvalidArgument`

  constructor(message: string) {
    super(message)
  }
}

/**
 * Delivered to whoever awaits a job that was cancelled before producing a result.
 */
export class CancellationError extends Error {
  name = `CancellationError`
  message = `Job was cancelled`
}
