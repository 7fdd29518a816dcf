import type { FrameKind, ReceiveResult } from './SocketChannel.js';
import { OperationCanceledError, throwIfCanceled } from '../errors.js';
import { Deque } from '../utils/Deque.js';

/**
 * A frame as it arrived from the wire, before being copied into receive buffers.
 */
export interface InboundFrame {
  kind: FrameKind;
  data: Uint8Array;
  endOfMessage: boolean;
  closeCode?: number;
  closeReason?: string;
}

const EMPTY = new Uint8Array(0);

/**
 * Buffers inbound frames for a channel and hands them out to a single reader,
 * splitting frames that do not fit the reader's buffer.
 *
 * Frames queued before {@link fail} are still delivered; the failure is
 * raised once the queue runs dry.
 */
export class FrameQueue {
  private readonly frames = new Deque<InboundFrame>();
  private offset = 0;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;

  public get isEmpty(): boolean {
    return this.frames.length === 0;
  }

  public push(frame: InboundFrame): void {
    this.frames.push(frame);
    this.notify();
  }

  public pushClose(code: number, reason: string): void {
    this.push({ kind: 'close', data: EMPTY, endOfMessage: true, closeCode: code, closeReason: reason });
  }

  public fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;
    this.notify();
  }

  /**
   * Copies the next frame (or the next part of it) into `buffer`.
   */
  public async take(buffer: Uint8Array, signal?: AbortSignal): Promise<ReceiveResult> {
    for (;;) {
      throwIfCanceled(signal);
      const head = this.frames.peek();
      if (head) return this.deliver(head, buffer);
      if (this.failure) throw this.failure;
      await this.waitForFrame(signal);
    }
  }

  private deliver(head: InboundFrame, buffer: Uint8Array): ReceiveResult {
    const count = Math.min(head.data.length - this.offset, buffer.length);
    buffer.set(head.data.subarray(this.offset, this.offset + count));
    this.offset += count;

    if (this.offset < head.data.length) {
      return { kind: head.kind, count, endOfMessage: false };
    }

    this.frames.shift();
    this.offset = 0;
    const result: ReceiveResult = { kind: head.kind, count, endOfMessage: head.endOfMessage };
    if (head.kind === 'close') {
      result.closeCode = head.closeCode;
      result.closeReason = head.closeReason;
    }
    return result;
  }

  private waitForFrame(signal?: AbortSignal): Promise<void> {
    if (this.wake) {
      return Promise.reject(new Error('FrameQueue: concurrent receive calls are not supported'));
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        this.wake = null;
        reject(new OperationCanceledError(signal?.reason));
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.wake = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
    });
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
