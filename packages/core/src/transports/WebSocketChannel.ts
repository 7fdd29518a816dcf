import type { RawData } from 'ws';
import type { ChannelState, DataFrameKind, ReceiveResult, SocketChannel } from './SocketChannel.js';
import { ChannelStateError, throwIfCanceled } from '../errors.js';
import { dlog } from '../utils/debug.js';
import { FrameQueue } from './FrameQueue.js';

/** `readyState` values shared by `ws` and the WHATWG WebSocket. */
const CONNECTING = 0;
const OPEN = 1;
const CLOSING = 2;

/**
 * The part of a `ws` WebSocket this channel relies on.
 */
export interface WebSocketLike {
  readonly readyState: number;
  send(data: Uint8Array, options: { binary: boolean; fin: boolean }, cb: (err?: Error) => void): void;
  close(code: number, reason: string): void;
  on(event: 'message', listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
}

function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

/**
 * {@link SocketChannel} over a connected `ws` WebSocket.
 *
 * `ws` reassembles inbound fragments itself, so every inbound message is
 * surfaced as one end-of-message frame. Outbound frames map onto WebSocket
 * fragments through the `fin` send option. `ws` answers a peer's close frame
 * on its own, so by the time the close frame is read the state is `closed`.
 */
export class WebSocketChannel implements SocketChannel {
  private readonly inbound = new FrameQueue();
  private closeSent = false;
  private failed = false;

  constructor(public readonly socket: WebSocketLike) {
    socket.on('message', (data, isBinary) => {
      this.inbound.push({ kind: isBinary ? 'binary' : 'text', data: toBytes(data), endOfMessage: true });
    });

    socket.on('close', (code, reason) => {
      dlog('socket-pipe:channel', `websocket closed (${code})`);
      // ws follows every 'error' with 'close'; the failure must win over a close frame
      if (this.failed) return;
      this.inbound.pushClose(code, reason.toString('utf8'));
    });

    socket.on('error', (err) => {
      this.failed = true;
      this.inbound.fail(err);
    });
  }

  public get state(): ChannelState {
    if (this.failed) return 'aborted';
    switch (this.socket.readyState) {
      case CONNECTING:
        return 'connecting';
      case OPEN:
        return 'open';
      case CLOSING:
        return this.closeSent ? 'close-sent' : 'close-received';
      default:
        return 'closed';
    }
  }

  public receive(buffer: Uint8Array, signal?: AbortSignal): Promise<ReceiveResult> {
    return this.inbound.take(buffer, signal);
  }

  /**
   * Sends one WebSocket fragment. `ws` cannot withdraw a fragment once handed
   * over, so `signal` is only checked before the send starts.
   */
  public send(data: Uint8Array, kind: DataFrameKind, endOfMessage: boolean, signal?: AbortSignal): Promise<void> {
    throwIfCanceled(signal);
    if (this.socket.readyState !== OPEN) {
      return Promise.reject(new ChannelStateError('send', this.state));
    }

    return new Promise<void>((resolve, reject) => {
      this.socket.send(data, { binary: kind === 'binary', fin: endOfMessage }, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Starts (or answers) the close handshake and resolves once the socket is closed.
   */
  public async close(code: number, reason: string, signal?: AbortSignal): Promise<void> {
    throwIfCanceled(signal);
    if (this.state === 'closed' || this.state === 'aborted') return;

    this.closeSent = true;
    const closed = new Promise<void>((resolve) => {
      this.socket.once('close', () => resolve());
    });
    this.socket.close(code, reason);
    await closed;
  }
}
