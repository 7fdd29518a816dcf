import type { ByteSequence } from '../buffers/ByteSequence.js';

/**
 * Serializes logical messages into a {@link ByteSequence} and back.
 *
 * @template T - The logical message type.
 */
export interface MessageFormatter<T> {
  /**
   * Writes the encoded form of `message` onto the end of `sink`.
   */
  serialize(sink: ByteSequence, message: T): void;

  /**
   * Decodes one complete message from `content`.
   * Must throw when the bytes are malformed.
   */
  deserialize(content: ByteSequence): T;
}

/**
 * Capability: the formatter's output is UTF-8 text, so it may travel in text frames.
 */
export interface TextMessageFormatter<T> extends MessageFormatter<T> {
  readonly encoding: 'utf-8';
}

/**
 * Capability: the formatter wants to see the encoded bytes of each outgoing message.
 */
export interface FormatterTracingCallbacks<T> {
  onSerializationComplete(message: T, encoded: ByteSequence): void;
}

export function isTextFormatter<T>(formatter: MessageFormatter<T>): formatter is TextMessageFormatter<T> {
  return 'encoding' in formatter && formatter.encoding === 'utf-8';
}

export function hasTracingCallbacks<T>(
  formatter: MessageFormatter<T>
): formatter is MessageFormatter<T> & FormatterTracingCallbacks<T> {
  return 'onSerializationComplete' in formatter && typeof formatter.onSerializationComplete === 'function';
}
