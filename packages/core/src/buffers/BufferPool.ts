/**
 * Options for {@link BufferPool}.
 */
export interface BufferPoolOptions {
  /**
   * Smallest chunk the pool hands out. Requests below this size are rounded up.
   *
   * @default 4096
   */
  minimumLength?: number;

  /**
   * How many returned chunks are retained per chunk length. Extra returns are
   * left to the garbage collector.
   *
   * @default 32
   */
  maxRetainedPerLength?: number;
}

/**
 * A pool of reusable byte chunks.
 *
 * Chunks are bucketed by exact length. A chunk rented from the pool must be
 * returned to the same pool exactly once; {@link BufferPool.outstanding}
 * counts chunks that are still out.
 */
export class BufferPool {
  /** Process-wide default pool. */
  public static readonly shared = new BufferPool();

  public readonly minimumLength: number;
  private readonly maxRetainedPerLength: number;
  private readonly buckets = new Map<number, Uint8Array[]>();
  private readonly rentedChunks = new WeakSet<Uint8Array>();
  private rentedCount = 0;

  constructor(options: BufferPoolOptions = {}) {
    const minimumLength = options.minimumLength ?? 4096;
    if (!Number.isInteger(minimumLength) || minimumLength <= 0) {
      throw new RangeError(`BufferPool: minimumLength must be a positive integer, got ${minimumLength}`);
    }
    this.minimumLength = minimumLength;
    this.maxRetainedPerLength = options.maxRetainedPerLength ?? 32;
  }

  /**
   * Number of chunks rented and not yet returned.
   */
  public get outstanding(): number {
    return this.rentedCount;
  }

  /**
   * Rents a chunk of at least `minimumLength` bytes.
   * The chunk's contents are unspecified.
   */
  public rent(minimumLength: number): Uint8Array {
    const length = Math.max(this.minimumLength, minimumLength);
    const chunk = this.buckets.get(length)?.pop() ?? new Uint8Array(length);
    this.rentedChunks.add(chunk);
    this.rentedCount++;
    return chunk;
  }

  /**
   * Returns a chunk previously obtained from {@link rent}.
   */
  public return(chunk: Uint8Array): void {
    if (!this.rentedChunks.delete(chunk)) {
      throw new Error('BufferPool.return: chunk was not rented from this pool or was already returned');
    }
    this.rentedCount--;

    let bucket = this.buckets.get(chunk.length);
    if (!bucket) {
      bucket = [];
      this.buckets.set(chunk.length, bucket);
    }
    if (bucket.length < this.maxRetainedPerLength) bucket.push(chunk);
  }
}
