/**
 * Kind of a transport frame. `close` frames carry no payload and end the conversation.
 */
export type FrameKind = 'text' | 'binary' | 'close';

/** Kinds a caller may send; close frames are produced by {@link SocketChannel.close}. */
export type DataFrameKind = Exclude<FrameKind, 'close'>;

/**
 * Connection state of a channel, following the WebSocket close handshake.
 */
export type ChannelState =
  | 'connecting'
  | 'open'
  | 'close-sent'
  | 'close-received'
  | 'closed'
  | 'aborted';

/**
 * WebSocket-compatible close status codes.
 */
export const CloseCode = {
  NormalClosure: 1000,
  GoingAway: 1001,
  ProtocolError: 1002,
  AbnormalClosure: 1006,
  PolicyViolation: 1008,
  InternalError: 1011,
} as const;

/**
 * Outcome of one {@link SocketChannel.receive} call.
 */
export interface ReceiveResult {
  kind: FrameKind;
  /** Bytes written into the caller's buffer. */
  count: number;
  /** Whether this receive completed a logical message. */
  endOfMessage: boolean;
  /** Present on close frames. */
  closeCode?: number;
  closeReason?: string;
}

/**
 * A connected, full-duplex, frame-oriented channel.
 *
 * At most one `receive` and one `send` may be in flight at a time.
 * A frame larger than the receive buffer is delivered over several receives;
 * only the last of them carries the frame's end-of-message flag.
 */
export interface SocketChannel {
  readonly state: ChannelState;

  receive(buffer: Uint8Array, signal?: AbortSignal): Promise<ReceiveResult>;

  send(data: Uint8Array, kind: DataFrameKind, endOfMessage: boolean, signal?: AbortSignal): Promise<void>;

  close(code: number, reason: string, signal?: AbortSignal): Promise<void>;
}
