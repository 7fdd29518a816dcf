import type { ChannelState, DataFrameKind, ReceiveResult, SocketChannel } from './SocketChannel.js';
import { ChannelStateError, throwIfCanceled } from '../errors.js';
import { FrameQueue } from './FrameQueue.js';

/**
 * One end of an in-memory channel pair created by {@link createLoopbackPair}.
 *
 * Sent bytes are copied, so callers may reuse their buffers as soon as
 * `send` resolves. The close handshake follows WebSocket semantics:
 * `open → close-sent → closed` for the side that starts it and
 * `open → close-received → closed` for the other.
 */
export class LoopbackChannel implements SocketChannel {
  private readonly inbound = new FrameQueue();
  private peer: LoopbackChannel | null = null;
  private closeSent = false;
  private closeReceived = false;
  private aborted = false;

  /** Code and reason of the close frame received from the peer, if any. */
  public closeStatus: { code: number; reason: string } | null = null;

  public get state(): ChannelState {
    if (this.aborted) return 'aborted';
    if (this.closeSent && this.closeReceived) return 'closed';
    if (this.closeSent) return 'close-sent';
    if (this.closeReceived) return 'close-received';
    return 'open';
  }

  /** @internal */
  public static connect(a: LoopbackChannel, b: LoopbackChannel): void {
    a.peer = b;
    b.peer = a;
  }

  public async send(data: Uint8Array, kind: DataFrameKind, endOfMessage: boolean, signal?: AbortSignal): Promise<void> {
    throwIfCanceled(signal);
    const state = this.state;
    if (state !== 'open' && state !== 'close-received') {
      throw new ChannelStateError('send', state);
    }

    await Promise.resolve();
    throwIfCanceled(signal);
    this.requirePeer().inbound.push({ kind, data: data.slice(), endOfMessage });
  }

  public async receive(buffer: Uint8Array, signal?: AbortSignal): Promise<ReceiveResult> {
    if (this.state === 'closed' && this.inbound.isEmpty) {
      throw new ChannelStateError('receive', 'closed');
    }

    const result = await this.inbound.take(buffer, signal);
    if (result.kind === 'close') {
      this.closeReceived = true;
      this.closeStatus = { code: result.closeCode ?? 0, reason: result.closeReason ?? '' };
    }
    return result;
  }

  public async close(code: number, reason: string, signal?: AbortSignal): Promise<void> {
    throwIfCanceled(signal);
    if (this.closeSent || this.aborted) return;

    this.closeSent = true;
    this.requirePeer().inbound.pushClose(code, reason);
  }

  /**
   * Simulates a transport failure: pending and future receives reject with `error`.
   */
  public abort(error: Error = new Error('Loopback channel aborted')): void {
    this.aborted = true;
    this.inbound.fail(error);
  }

  private requirePeer(): LoopbackChannel {
    if (!this.peer) throw new ChannelStateError('use an unconnected loopback channel', this.state);
    return this.peer;
  }
}

/**
 * Creates two connected in-memory channels.
 */
export function createLoopbackPair(): [LoopbackChannel, LoopbackChannel] {
  const a = new LoopbackChannel();
  const b = new LoopbackChannel();
  LoopbackChannel.connect(a, b);
  return [a, b];
}
