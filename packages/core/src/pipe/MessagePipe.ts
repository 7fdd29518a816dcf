import type { JsonValue } from '../types/helper.js';
import type { MessageHandler } from './MessageHandler.js';
import type { MessagePipeEvents } from './types.js';

import fastq from 'fastq';
import { OperationCanceledError, isCanceled } from '../errors.js';
import { dlog } from '../utils/debug.js';
import { TypedEventEmitter } from './TypedEventEmitter.js';

/**
 * MessagePipe drives a {@link MessageHandler} with exactly one reader and one
 * writer: a read loop that emits every inbound message, and a write queue of
 * concurrency 1 for outbound ones.
 *
 * @template T - The logical message type.
 *
 * @example
 * const pipe = new MessagePipe(new MessageHandler(channel));
 * pipe.on('message', (msg) => console.log(msg));
 * pipe.on('closed', () => console.log('peer closed'));
 * pipe.start();
 * await pipe.post({ hello: 'world' });
 */
export class MessagePipe<T = JsonValue> extends TypedEventEmitter<MessagePipeEvents<T>> {
  private readonly queue: fastq.queueAsPromised<T, void>;
  private readonly controller = new AbortController();
  private reading: Promise<void> | null = null;

  constructor(public readonly handler: MessageHandler<T>) {
    super();
    this.queue = fastq.promise((message: T) => this.handler.write(message, this.controller.signal), 1);
  }

  /** Whether {@link stop} has been called. */
  public get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  /** Number of writes waiting behind the one in flight. */
  public get pendingWrites(): number {
    return this.queue.length();
  }

  /**
   * Resolves once the read loop has ended (closed, failed or stopped).
   * Resolves immediately if the loop was never started.
   */
  public get done(): Promise<void> {
    return this.reading ?? Promise.resolve();
  }

  /**
   * Starts the read loop. Calling it again has no effect.
   */
  public start(): this {
    if (!this.reading) this.reading = this.readLoop();
    return this;
  }

  /**
   * Queues a message for writing.
   *
   * @returns Resolves when the message has been sent; rejects with the write's error.
   */
  public post(message: T): Promise<void> {
    if (this.stopped) {
      return Promise.reject(new OperationCanceledError(this.controller.signal.reason));
    }
    return this.queue.push(message);
  }

  /**
   * Stops reading and cancels queued and in-flight writes.
   * Their `post` promises reject with `OperationCanceledError`.
   */
  public stop(): void {
    if (this.stopped) return;
    this.controller.abort();
  }

  private async readLoop(): Promise<void> {
    const signal = this.controller.signal;
    try {
      while (!signal.aborted) {
        const message = await this.handler.read(signal);
        if (message === null) {
          // zero-length message on a live channel
          if (this.handler.channel.state === 'open') continue;
          dlog('socket-pipe:pipe', `channel closed (${this.handler.channel.state})`);
          this.emit('closed');
          return;
        }
        this.emit('message', message);
      }
    } catch (err) {
      if (signal.aborted && isCanceled(err)) return;
      this.fail(err instanceof Error ? err : new Error(String(err)));
    }
  }

  private fail(error: Error): void {
    dlog('socket-pipe:pipe', 'read loop failed:', error.message);
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    } else {
      console.warn('[MessagePipe] unhandled read error:', error.message);
    }
  }
}
