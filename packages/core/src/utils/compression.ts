// src/utils/compression.ts
import { promisify } from 'node:util';
import zlib from 'node:zlib';
import * as snappy from 'snappy';
import { DecompressionError } from '../errors.js';

const gzipAsync = {
  deflate: promisify(zlib.gzip),
  inflate: promisify(zlib.gunzip),
};

export type CompressionCodec = 'snappy' | 'gzip';
export type CompressionSetting = boolean | { codec: CompressionCodec };

export function isCompressionEnabled(
  v: CompressionSetting | undefined
): v is true | { codec: CompressionCodec } {
  return !!v;
}

/**
 * Maps a setting to its codec; `true` means gzip, `false`/`undefined` means none.
 */
export function resolveCodec(setting: CompressionSetting | undefined): CompressionCodec | null {
  if (!isCompressionEnabled(setting)) return null;
  return setting === true ? 'gzip' : setting.codec;
}

function toUint8(buf: Buffer): Uint8Array {
  return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
}

function ensureBuffer(x: Buffer | string): Buffer {
  return Buffer.isBuffer(x) ? x : Buffer.from(x);
}

function asBuffer(buf: Uint8Array): Buffer {
  return Buffer.from(buf.buffer, buf.byteOffset, buf.byteLength);
}

/**
 * Compresses a complete payload in one shot. gzip runs at its fastest level.
 */
export async function compress(buf: Uint8Array, codec: CompressionCodec): Promise<Uint8Array> {
  if (codec === 'gzip') {
    const out = await gzipAsync.deflate(asBuffer(buf), { level: zlib.constants.Z_BEST_SPEED });
    return toUint8(out);
  }

  const out = await snappy.compress(asBuffer(buf));
  return toUint8(ensureBuffer(out));
}

/**
 * Decompresses a complete payload in one shot.
 *
 * @throws {DecompressionError} when `buf` is not a complete, valid stream for `codec`.
 */
export async function decompress(buf: Uint8Array, codec: CompressionCodec): Promise<Uint8Array> {
  try {
    if (codec === 'gzip') {
      const out = await gzipAsync.inflate(asBuffer(buf));
      return toUint8(out);
    }

    const out = await snappy.uncompress(asBuffer(buf), { asBuffer: true });
    return toUint8(ensureBuffer(out));
  } catch (err) {
    throw new DecompressionError(codec, err);
  }
}
