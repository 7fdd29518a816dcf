import type { MessageFormatter } from '../formatters/MessageFormatter.js';

/**
 * Any value `JSON.parse` can produce.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Infers the message type carried by a formatter.
 *
 * @example
 * type Msg = InferMessage<typeof formatter>;
 */
export type InferMessage<F> = F extends MessageFormatter<infer U> ? U : never;

/**
 * Minimal codec shape shared by ts-proto generated messages and protobufjs adapters.
 */
export interface MessageFns<T> {
  encode(message: T): { finish(): Uint8Array };
  decode(input: Uint8Array): T;
}
