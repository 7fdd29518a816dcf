import type { FrameMessage } from '../proto/frameService.js';
import type { ChannelState, DataFrameKind, ReceiveResult, SocketChannel } from './SocketChannel.js';
import { ChannelStateError, throwIfCanceled } from '../errors.js';
import { dlog } from '../utils/debug.js';
import { CloseCode } from './SocketChannel.js';
import { FrameQueue } from './FrameQueue.js';

/**
 * The part of a gRPC duplex stream (client or server side) this channel relies on.
 * Both `ClientDuplexStream<FrameMessage, FrameMessage>` and
 * `ServerDuplexStream<FrameMessage, FrameMessage>` satisfy it.
 */
export interface FrameStream {
  write(frame: FrameMessage, cb?: (error: Error | null | undefined) => void): boolean;
  end(): void;
  on(event: 'data', listener: (frame: FrameMessage) => void): unknown;
  on(event: 'end', listener: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

const EMPTY = new Uint8Array(0);

/**
 * GrpcStreamChannel wraps a bidirectional gRPC stream of `socketpipe.Frame`
 * messages and implements {@link SocketChannel} on top of it.
 *
 * Every stream message is one transport frame. A peer that ends its side of
 * the stream without a close frame is reported as an abnormal close (1006).
 */
export class GrpcStreamChannel implements SocketChannel {
  private readonly inbound = new FrameQueue();
  private closeSent = false;
  private closeReceived = false;
  private closeQueued = false;
  private ended = false;
  private failed = false;

  /**
   * Creates a new instance of GrpcStreamChannel.
   *
   * @param stream - A gRPC duplex stream reading and writing {@link FrameMessage} objects.
   */
  constructor(private readonly stream: FrameStream) {
    this.stream.on('data', (frame: FrameMessage) => {
      if (frame.kind === 'close') {
        this.closeQueued = true;
        this.inbound.pushClose(frame.closeCode, frame.closeReason);
        return;
      }
      this.inbound.push({ kind: frame.kind, data: frame.payload, endOfMessage: frame.endOfMessage });
    });

    this.stream.on('end', () => {
      if (this.closeQueued || this.failed) return;
      dlog('socket-pipe:channel', 'grpc stream ended without a close frame');
      this.closeQueued = true;
      this.inbound.pushClose(CloseCode.AbnormalClosure, 'Stream ended.');
    });

    this.stream.on('error', (err: Error) => {
      this.failed = true;
      this.inbound.fail(err);
    });
  }

  public get state(): ChannelState {
    if (this.failed) return 'aborted';
    if (this.closeSent && this.closeReceived) return 'closed';
    if (this.closeSent) return 'close-sent';
    if (this.closeReceived) return 'close-received';
    return 'open';
  }

  public async receive(buffer: Uint8Array, signal?: AbortSignal): Promise<ReceiveResult> {
    const result = await this.inbound.take(buffer, signal);
    if (result.kind === 'close') {
      this.closeReceived = true;
      if (this.closeSent) this.endStream();
    }
    return result;
  }

  public send(data: Uint8Array, kind: DataFrameKind, endOfMessage: boolean, signal?: AbortSignal): Promise<void> {
    throwIfCanceled(signal);
    const state = this.state;
    if (state !== 'open' && state !== 'close-received') {
      return Promise.reject(new ChannelStateError('send', state));
    }

    return this.write({ kind, payload: data.slice(), endOfMessage, closeCode: 0, closeReason: '' });
  }

  public async close(code: number, reason: string, signal?: AbortSignal): Promise<void> {
    throwIfCanceled(signal);
    if (this.closeSent || this.failed) return;

    this.closeSent = true;
    await this.write({ kind: 'close', payload: EMPTY, endOfMessage: true, closeCode: code, closeReason: reason });
    if (this.closeReceived) this.endStream();
  }

  private write(frame: FrameMessage): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.stream.write(frame, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private endStream(): void {
    if (this.ended) return;
    this.ended = true;
    this.stream.end();
  }
}
