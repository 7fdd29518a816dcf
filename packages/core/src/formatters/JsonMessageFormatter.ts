import type { ByteSequence } from '../buffers/ByteSequence.js';
import type { JsonValue } from '../types/helper.js';
import type { TextMessageFormatter } from './MessageFormatter.js';

/**
 * Options for {@link JsonMessageFormatter}.
 */
export interface JsonMessageFormatterOptions<T> {
  /**
   * Validates decoded values. When it returns false, `deserialize` throws.
   */
  guard?: (value: unknown) => value is T;
}

/**
 * UTF-8 JSON formatter. Declares textual output, so uncompressed messages go
 * out as text frames.
 *
 * Without a `guard`, decoded values are trusted to be `T`.
 */
export class JsonMessageFormatter<T = JsonValue> implements TextMessageFormatter<T> {
  public readonly encoding = 'utf-8';

  private readonly encoder = new TextEncoder();
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });
  private readonly guard?: (value: unknown) => value is T;

  constructor(options: JsonMessageFormatterOptions<T> = {}) {
    this.guard = options.guard;
  }

  public serialize(sink: ByteSequence, message: T): void {
    const text = JSON.stringify(message);
    if (text === undefined) {
      throw new TypeError('JsonMessageFormatter.serialize: message is not representable as JSON');
    }
    sink.write(this.encoder.encode(text));
  }

  public deserialize(content: ByteSequence): T {
    const text = this.decoder.decode(content.toUint8Array());
    const value = JSON.parse(text);
    if (this.guard && !this.guard(value)) {
      throw new TypeError('JsonMessageFormatter.deserialize: decoded value failed validation');
    }
    return value;
  }
}
