import type { BufferPool } from "../buffers/BufferPool.js";
import type { MessageFormatter } from "../formatters/MessageFormatter.js";
import type { CompressionSetting } from "../utils/compression.js";

/**
 * Configuration options for {@link MessageHandler}.
 */
export interface MessageHandlerOptions<T> {
  /**
   * Compression of whole messages on the wire, applied symmetrically to
   * reads and writes. Both ends of a channel must use the same setting.
   *
   *  - false (default)           → disabled
   *  - true                      → gzip (fastest level)
   *  - { codec: 'gzip'|'snappy'} → explicit object form
   */
  compression?: CompressionSetting;

  /**
   * Size of the buffer handed to each `receive` call. Larger messages are
   * read over several calls; this is not a message size limit.
   *
   * @default 4096
   */
  segmentSizeHint?: number;

  /**
   * Serializer for logical messages.
   *
   * @default new JsonMessageFormatter()
   */
  formatter?: MessageFormatter<T>;

  /**
   * Pool backing the per-call accumulation buffers. The pool's
   * `minimumLength` is also the size of outgoing frames for messages that
   * span several chunks.
   *
   * @default BufferPool.shared
   */
  pool?: BufferPool;
}

/**
 * Event definitions for {@link MessagePipe}.
 *
 * @template T - The logical message type.
 */
export interface MessagePipeEvents<T> {
  /** Emitted for every message read from the channel. */
  message: (message: T) => void;

  /** Emitted once when the peer closes the channel. */
  closed: () => void;

  /**
   * Emitted when the read loop fails. The pipe stops reading afterwards.
   * Without a listener the failure is logged with `console.warn`.
   * @param error - The encountered error.
   */
  error: (error: Error) => void;
}
