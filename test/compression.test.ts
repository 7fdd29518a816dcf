import {
  DecompressionError,
  SocketPipeError,
  compress,
  decompress,
  resolveCodec
} from '@socket-pipe/core';

const text = new TextEncoder().encode('hello hello hello hello hello hello');

test('resolveCodec maps settings to codecs', () => {
  expect(resolveCodec(undefined)).toBeNull();
  expect(resolveCodec(false)).toBeNull();
  expect(resolveCodec(true)).toBe('gzip');
  expect(resolveCodec({ codec: 'snappy' })).toBe('snappy');
});

test('gzip round-trips and writes a gzip header', async () => {
  const packed = await compress(text, 'gzip');

  expect(packed[0]).toBe(0x1f);
  expect(packed[1]).toBe(0x8b);
  expect(Array.from(await decompress(packed, 'gzip'))).toEqual(Array.from(text));
});

test('snappy round-trips', async () => {
  const packed = await compress(text, 'snappy');

  expect(packed.length).toBeLessThan(text.length);
  expect(Array.from(await decompress(packed, 'snappy'))).toEqual(Array.from(text));
});

test('gzip round-trips an empty payload', async () => {
  const packed = await compress(new Uint8Array(0), 'gzip');

  expect(packed.length).toBeGreaterThan(0);
  expect((await decompress(packed, 'gzip')).length).toBe(0);
});

test('malformed input raises DecompressionError', async () => {
  const garbage = new TextEncoder().encode('{"not":"gzip"}');

  await expect(decompress(garbage, 'gzip')).rejects.toBeInstanceOf(DecompressionError);
  await expect(decompress(garbage, 'gzip')).rejects.toBeInstanceOf(SocketPipeError);
  await expect(decompress(garbage, 'gzip')).rejects.toThrow('Failed to decompress gzip payload');
});

test('truncated gzip stream raises DecompressionError', async () => {
  const packed = await compress(text, 'gzip');

  await expect(decompress(packed.subarray(0, packed.length - 4), 'gzip')).rejects.toBeInstanceOf(DecompressionError);
});
