import type { MessageFormatter } from '../formatters/MessageFormatter.js';
import type { DataFrameKind, ReceiveResult, SocketChannel } from '../transports/SocketChannel.js';
import type { JsonValue } from '../types/helper.js';
import type { CompressionCodec } from '../utils/compression.js';
import type { MessageHandlerOptions } from './types.js';

import { BufferPool } from '../buffers/BufferPool.js';
import { ByteSequence } from '../buffers/ByteSequence.js';
import { throwIfCanceled } from '../errors.js';
import { JsonMessageFormatter } from '../formatters/JsonMessageFormatter.js';
import { hasTracingCallbacks, isTextFormatter } from '../formatters/MessageFormatter.js';
import { CloseCode } from '../transports/SocketChannel.js';
import { compress, decompress, resolveCodec } from '../utils/compression.js';
import { dlog } from '../utils/debug.js';

const CLOSE_REASON = 'Closed as requested.';
const EMPTY = new Uint8Array(0);

/**
 * MessageHandler reads and writes whole logical messages over a frame-oriented
 * {@link SocketChannel}.
 *
 * It manages:
 * - **Reassembly** of inbound frames into one message, using pooled buffers
 * - **Fragmentation** of outbound messages into one frame per buffer chunk
 * - **Optional compression** of whole messages (gzip or snappy), on both paths
 * - **Close signaling**: a peer close frame is acknowledged and reported as `null`
 *
 * One read and one write may be in flight at the same time; callers must
 * serialize reads among themselves and writes among themselves
 * ({@link MessagePipe} does that).
 *
 * @template T - The logical message type produced and consumed by the formatter.
 */
export class MessageHandler<T = JsonValue> {
  public readonly formatter: MessageFormatter<T>;
  public readonly compression: CompressionCodec | null;
  public readonly segmentSizeHint: number;
  public readonly canRead = true;
  public readonly canWrite = true;

  private readonly pool: BufferPool;
  private _lastSend = new Date();
  private _lastReceive = new Date();

  /**
   * Creates a new instance of {@link MessageHandler}.
   *
   * @param channel - The connected channel. It is owned by the handler but only
   * closed in answer to a close frame from the peer.
   * @param options - Compression, receive buffer size, formatter and buffer pool.
   *
   * @example
   * const handler = new MessageHandler(new WebSocketChannel(ws), {
   *   compression: true,
   *   segmentSizeHint: 16 * 1024,
   * });
   */
  constructor(
    public readonly channel: SocketChannel,
    options: MessageHandlerOptions<T> = {},
  ) {
    if (typeof channel !== 'object' || channel === null) {
      throw new TypeError('MessageHandler: channel is required');
    }

    const segmentSizeHint = options.segmentSizeHint ?? 4096;
    if (!Number.isInteger(segmentSizeHint) || segmentSizeHint <= 0) {
      throw new RangeError(`MessageHandler: segmentSizeHint must be a positive integer, got ${segmentSizeHint}`);
    }

    this.segmentSizeHint = segmentSizeHint;
    this.compression = resolveCodec(options.compression);
    this.formatter = options.formatter ?? new JsonMessageFormatter<T>();
    this.pool = options.pool ?? BufferPool.shared;
  }

  /** When the last frame was handed to the channel successfully. */
  public get lastSend(): Date {
    return this._lastSend;
  }

  /** When the last frame was received. */
  public get lastReceive(): Date {
    return this._lastReceive;
  }

  /**
   * Reads one logical message.
   *
   * @returns The message, or `null` when the peer closed the channel or sent
   * a zero-length message.
   * @throws The channel's error on transport failure, `OperationCanceledError`
   * when `signal` aborts, `DecompressionError` on malformed compressed bytes,
   * or whatever the formatter throws.
   */
  public async read(signal?: AbortSignal): Promise<T | null> {
    const content = new ByteSequence(this.pool);
    try {
      let result: ReceiveResult;
      do {
        const memory = content.getMemory(this.segmentSizeHint).subarray(0, this.segmentSizeHint);
        result = await this.channel.receive(memory, signal);
        this._lastReceive = new Date();
        content.advance(result.count);

        if (result.kind === 'close') {
          await this.acknowledgeClose();
          return null;
        }
      } while (!result.endOfMessage);

      if (content.length === 0) return null;

      if (!this.compression) {
        return this.formatter.deserialize(content);
      }

      const decompressed = new ByteSequence(this.pool);
      try {
        decompressed.write(await decompress(content.toUint8Array(), this.compression));
        dlog('socket-pipe:handler', `inflated ${content.length} → ${decompressed.length} bytes (${this.compression})`);
        return this.formatter.deserialize(decompressed);
      } finally {
        decompressed.reset();
      }
    } finally {
      content.reset();
    }
  }

  /**
   * Serializes, optionally compresses, then sends one logical message.
   *
   * @remarks
   * - Text-capable formatters produce text frames, unless compression is on:
   *   compressed bytes always go out as binary frames.
   * - `signal` is checked right after serialization, so a cancelled write sends
   *   nothing, and is then passed to every frame send.
   * - A failed frame send fails the whole write; nothing is retried.
   */
  public async write(message: T, signal?: AbortSignal): Promise<void> {
    if (message === null || message === undefined) {
      throw new TypeError('MessageHandler.write: message must not be null or undefined');
    }

    let kind: DataFrameKind = isTextFormatter(this.formatter) ? 'text' : 'binary';
    const content = new ByteSequence(this.pool);
    try {
      this.formatter.serialize(content, message);
      throwIfCanceled(signal);

      if (hasTracingCallbacks(this.formatter)) {
        this.formatter.onSerializationComplete(message, content);
      }

      if (!this.compression) {
        await this.transmit(content, kind, signal);
        return;
      }

      const compressed = new ByteSequence(this.pool);
      try {
        compressed.write(await compress(content.toUint8Array(), this.compression));
        kind = 'binary';
        await this.transmit(compressed, kind, signal);
      } finally {
        compressed.reset();
      }
    } finally {
      content.reset();
    }
  }

  /**
   * Nothing is buffered between `write` and the channel, so there is nothing to flush.
   */
  public flush(): Promise<void> {
    return Promise.resolve();
  }

  /**
   * Sends each chunk of `content` as one frame; the frame that ends at the
   * total length carries end-of-message. An empty message is one empty frame.
   */
  private async transmit(content: ByteSequence, kind: DataFrameKind, signal?: AbortSignal): Promise<void> {
    const total = content.length;
    if (total === 0) {
      await this.channel.send(EMPTY, kind, true, signal);
      this._lastSend = new Date();
      return;
    }

    let bytesSent = 0;
    let frames = 0;
    for (const segment of content.segments()) {
      const endOfMessage = bytesSent + segment.length === total;
      await this.channel.send(segment, kind, endOfMessage, signal);
      this._lastSend = new Date();
      bytesSent += segment.length;
      frames++;
    }
    dlog('socket-pipe:handler', `sent ${total} bytes in ${frames} ${kind} frame(s)`);
  }

  /**
   * Answers a peer close frame. Only open or half-closed channels take part in
   * the handshake; its outcome does not change what `read` returns.
   */
  private async acknowledgeClose(): Promise<void> {
    switch (this.channel.state) {
      case 'open':
      case 'close-received':
      case 'close-sent':
        try {
          await this.channel.close(CloseCode.NormalClosure, CLOSE_REASON);
        } catch (err) {
          dlog('socket-pipe:handler', 'close handshake failed:', err);
        }
        break;
      default:
        dlog('socket-pipe:handler', `close frame received in state ${this.channel.state}`);
    }
  }
}
