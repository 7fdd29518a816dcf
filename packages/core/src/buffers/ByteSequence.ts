import { BufferPool } from './BufferPool.js';

interface Chunk {
  buffer: Uint8Array;
  used: number;
}

/**
 * A growable byte buffer made of pooled chunks.
 *
 * Writers either copy bytes in with {@link write}, or ask for writable space
 * with {@link getMemory} and commit what they filled with {@link advance}.
 * Readers walk the committed bytes chunk by chunk with {@link segments}, which
 * keeps the chunk boundaries intact for frame-by-frame transmission.
 *
 * A sequence owns its chunks until {@link reset} hands them back to the pool.
 * Views obtained from {@link getMemory} or {@link segments} must not be used
 * after that.
 */
export class ByteSequence {
  private chunks: Chunk[] = [];
  private total = 0;

  constructor(public readonly pool: BufferPool = BufferPool.shared) {}

  /** Number of committed bytes. */
  public get length(): number {
    return this.total;
  }

  /** Number of pooled chunks currently held. */
  public get chunkCount(): number {
    return this.chunks.length;
  }

  /**
   * Returns writable space of at least `sizeHint` bytes (at least one byte
   * when `sizeHint` is 0) at the end of the sequence. Nothing is committed
   * until {@link advance} is called.
   */
  public getMemory(sizeHint = 0): Uint8Array {
    if (!Number.isInteger(sizeHint) || sizeHint < 0) {
      throw new RangeError(`ByteSequence.getMemory: invalid sizeHint ${sizeHint}`);
    }

    const wanted = Math.max(sizeHint, 1);
    const tail = this.chunks[this.chunks.length - 1];
    if (tail && tail.buffer.length - tail.used >= wanted) {
      return tail.buffer.subarray(tail.used);
    }

    const buffer = this.pool.rent(wanted);
    this.chunks.push({ buffer, used: 0 });
    return buffer;
  }

  /**
   * Commits `count` bytes written into the space last returned by {@link getMemory}.
   */
  public advance(count: number): void {
    if (count === 0) return;
    const tail = this.chunks[this.chunks.length - 1];
    if (!tail || !Number.isInteger(count) || count < 0 || tail.used + count > tail.buffer.length) {
      throw new RangeError(`ByteSequence.advance: cannot advance by ${count}`);
    }
    tail.used += count;
    this.total += count;
  }

  /**
   * Copies `bytes` onto the end of the sequence, spilling into new chunks as needed.
   */
  public write(bytes: Uint8Array): void {
    let offset = 0;
    while (offset < bytes.length) {
      const memory = this.getMemory();
      const n = Math.min(memory.length, bytes.length - offset);
      memory.set(bytes.subarray(offset, offset + n));
      this.advance(n);
      offset += n;
    }
  }

  /**
   * Yields the committed bytes, one view per non-empty chunk, in order.
   */
  public *segments(): IterableIterator<Uint8Array> {
    for (const chunk of this.chunks) {
      if (chunk.used > 0) yield chunk.buffer.subarray(0, chunk.used);
    }
  }

  /**
   * Copies the committed bytes into one new, unpooled array.
   */
  public toUint8Array(): Uint8Array {
    const out = new Uint8Array(this.total);
    let offset = 0;
    for (const segment of this.segments()) {
      out.set(segment, offset);
      offset += segment.length;
    }
    return out;
  }

  /**
   * Returns every chunk to the pool and empties the sequence.
   * Safe to call more than once.
   */
  public reset(): void {
    const chunks = this.chunks;
    this.chunks = [];
    this.total = 0;
    for (const chunk of chunks) this.pool.return(chunk.buffer);
  }
}
