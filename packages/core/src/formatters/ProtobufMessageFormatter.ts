import type { ByteSequence } from '../buffers/ByteSequence.js';
import type { MessageFns } from '../types/helper.js';
import type { FormatterTracingCallbacks, MessageFormatter } from './MessageFormatter.js';
import { dlog } from '../utils/debug.js';

/**
 * Options for {@link ProtobufMessageFormatter}.
 */
export interface ProtobufMessageFormatterOptions<T> {
  /**
   * Called with every outgoing message and its encoded bytes, after
   * serialization and before any compression. Binary output cannot be traced
   * meaningfully from the message alone, so this is the place to log it.
   */
  onTrace?: (message: T, encoded: Uint8Array) => void;
}

/**
 * Binary formatter over a protobuf codec (ts-proto `MessageFns`, or a thin
 * adapter over a protobufjs `Type`).
 *
 * @example
 * const formatter = new ProtobufMessageFormatter(Ping, {
 *   onTrace: (msg, bytes) => console.debug('sent', msg, bytes.length),
 * });
 */
export class ProtobufMessageFormatter<T> implements MessageFormatter<T>, FormatterTracingCallbacks<T> {
  constructor(
    private readonly codec: MessageFns<T>,
    private readonly options: ProtobufMessageFormatterOptions<T> = {},
  ) {}

  public serialize(sink: ByteSequence, message: T): void {
    sink.write(this.codec.encode(message).finish());
  }

  public deserialize(content: ByteSequence): T {
    return this.codec.decode(content.toUint8Array());
  }

  public onSerializationComplete(message: T, encoded: ByteSequence): void {
    if (this.options.onTrace) {
      this.options.onTrace(message, encoded.toUint8Array());
      return;
    }
    dlog('socket-pipe:trace', `serialized ${encoded.length} bytes`);
  }
}
