/**
 * Base class for every error raised by socket-pipe itself.
 * Errors coming from a channel or a formatter are passed through unchanged.
 */
export class SocketPipeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SocketPipeError';
  }
}

/**
 * Raised when an operation is cancelled through its `AbortSignal`.
 * The signal's `reason` is kept as `cause`.
 */
export class OperationCanceledError extends SocketPipeError {
  constructor(cause?: unknown) {
    super('The operation was canceled.', { cause });
    this.name = 'OperationCanceledError';
  }
}

/**
 * Raised when inbound bytes are not a valid stream for the configured codec.
 * Fails the message, not the channel.
 */
export class DecompressionError extends SocketPipeError {
  constructor(codec: string, cause: unknown) {
    super(`Failed to decompress ${codec} payload`, { cause });
    this.name = 'DecompressionError';
  }
}

/**
 * Raised by a channel asked to send or receive in a state that does not allow it.
 */
export class ChannelStateError extends SocketPipeError {
  constructor(operation: string, public readonly state: string) {
    super(`Cannot ${operation} while the channel is ${state}`);
    this.name = 'ChannelStateError';
  }
}

/**
 * Throws {@link OperationCanceledError} when the signal has been aborted.
 */
export function throwIfCanceled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new OperationCanceledError(signal.reason);
}

export function isCanceled(err: unknown): err is OperationCanceledError {
  return err instanceof OperationCanceledError;
}
