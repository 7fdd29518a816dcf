import type { JsonValue } from '@socket-pipe/core';
import type { Ping } from './helpers/ping.js';
import {
  BufferPool,
  ByteSequence,
  JsonMessageFormatter,
  ProtobufMessageFormatter,
  hasTracingCallbacks,
  isTextFormatter
} from '@socket-pipe/core';
import { PingCodec } from './helpers/ping.js';

const pool = new BufferPool({ minimumLength: 4 });

function sequenceOf(bytes: Uint8Array): ByteSequence {
  const seq = new ByteSequence(pool);
  seq.write(bytes);
  return seq;
}

test('JsonMessageFormatter writes compact UTF-8 JSON', () => {
  const formatter = new JsonMessageFormatter();
  const seq = new ByteSequence(pool);
  formatter.serialize(seq, { greeting: 'héllo', n: [1, 2] });

  expect(new TextDecoder().decode(seq.toUint8Array())).toBe('{"greeting":"héllo","n":[1,2]}');
  expect(formatter.deserialize(seq)).toEqual({ greeting: 'héllo', n: [1, 2] });
  seq.reset();
});

test('JsonMessageFormatter rejects values JSON cannot represent', () => {
  const formatter = new JsonMessageFormatter<unknown>();
  const seq = new ByteSequence(pool);

  expect(() => formatter.serialize(seq, undefined)).toThrow(TypeError);
  expect(seq.length).toBe(0);
});

test('JsonMessageFormatter fails on malformed input', () => {
  const formatter = new JsonMessageFormatter();

  expect(() => formatter.deserialize(sequenceOf(new TextEncoder().encode('{"a":')))).toThrow(SyntaxError);
  expect(() => formatter.deserialize(sequenceOf(Uint8Array.from([0x7b, 0xff, 0x7d])))).toThrow(TypeError);
});

test('JsonMessageFormatter applies its guard to decoded values', () => {
  const isGreeting = (value: unknown): value is { greeting: string } =>
    typeof value === 'object' && value !== null && 'greeting' in value && typeof value.greeting === 'string';
  const formatter = new JsonMessageFormatter({ guard: isGreeting });

  expect(formatter.deserialize(sequenceOf(new TextEncoder().encode('{"greeting":"hi"}')))).toEqual({ greeting: 'hi' });
  expect(() => formatter.deserialize(sequenceOf(new TextEncoder().encode('{"greeting":1}')))).toThrow(
    'JsonMessageFormatter.deserialize: decoded value failed validation'
  );
});

test('ProtobufMessageFormatter encodes with its codec', () => {
  const formatter = new ProtobufMessageFormatter<Ping>(PingCodec);
  const seq = new ByteSequence(pool);
  formatter.serialize(seq, { id: 7, note: 'hi' });

  expect(Array.from(seq.toUint8Array())).toEqual([0x08, 0x07, 0x12, 0x02, 0x68, 0x69]);
  expect(formatter.deserialize(seq)).toEqual({ id: 7, note: 'hi' });
  seq.reset();
});

test('ProtobufMessageFormatter reports serialized bytes to onTrace', () => {
  const traced: { message: Ping; bytes: number[] }[] = [];
  const formatter = new ProtobufMessageFormatter<Ping>(PingCodec, {
    onTrace: (message, bytes) => traced.push({ message, bytes: Array.from(bytes) }),
  });
  const seq = sequenceOf(Uint8Array.from([0x08, 0x01]));

  formatter.onSerializationComplete({ id: 1, note: '' }, seq);

  expect(traced).toEqual([{ message: { id: 1, note: '' }, bytes: [0x08, 0x01] }]);
});

test('formatter capabilities are detected structurally', () => {
  const json = new JsonMessageFormatter<JsonValue>();
  const proto = new ProtobufMessageFormatter<Ping>(PingCodec);

  expect(isTextFormatter(json)).toBe(true);
  expect(isTextFormatter(proto)).toBe(false);
  expect(hasTracingCallbacks(json)).toBe(false);
  expect(hasTracingCallbacks(proto)).toBe(true);
});
