import type { ChannelState, DataFrameKind, ReceiveResult, SocketChannel } from '@socket-pipe/core';
import { FrameQueue, throwIfCanceled } from '@socket-pipe/core';

export interface SentFrame {
  kind: DataFrameKind;
  data: number[];
  endOfMessage: boolean;
}

/**
 * A channel that records what is sent and replays scripted inbound frames.
 * Its state is whatever the test sets.
 */
export class RecordingChannel implements SocketChannel {
  public state: ChannelState = 'open';
  public readonly sent: SentFrame[] = [];
  public readonly closes: { code: number; reason: string }[] = [];
  public readonly inbound = new FrameQueue();

  /** Runs after each recorded send. */
  public onSend?: (frame: SentFrame) => void;
  /** Replaces the close behavior, e.g. to make the handshake fail. */
  public onClose?: () => Promise<void>;

  public receive(buffer: Uint8Array, signal?: AbortSignal): Promise<ReceiveResult> {
    return this.inbound.take(buffer, signal);
  }

  public async send(data: Uint8Array, kind: DataFrameKind, endOfMessage: boolean, signal?: AbortSignal): Promise<void> {
    throwIfCanceled(signal);
    const frame = { kind, data: Array.from(data), endOfMessage };
    this.sent.push(frame);
    this.onSend?.(frame);
  }

  public async close(code: number, reason: string): Promise<void> {
    this.closes.push({ code, reason });
    if (this.onClose) await this.onClose();
  }
}
