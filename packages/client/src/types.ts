import type {
  JsonValue,
  MessageHandlerOptions,
  MessagePipe
} from '@socket-pipe/core';
import type { ClientOptions } from '@grpc/grpc-js';
import type { ClientOptions as WebSocketClientOptions } from 'ws';

/**
 * Configuration options for {@link GrpcPipeClient}.
 */
export interface GrpcPipeClientOptions<T = JsonValue> extends MessageHandlerOptions<T> {
  /** The server address to connect to (e.g. `localhost:50051`). */
  address: string;

  /**
   * How long to wait for the gRPC channel to become ready.
   *
   * @default 5000
   */
  connectTimeoutMs?: number;

  /**
   * Optional metadata to send when opening the stream.
   * Example:
   * `{ authorization: 'Bearer token', clientId: 'id' }`
   */
  metadata?: Record<string, string>;

  /**
   * Enable TLS. If true, uses default secure credentials.
   * Optional advanced: pass root cert if needed.
   */
  tls?: boolean | {
    rootCerts?: Buffer | string;
  };

  /**
   * Advanced: gRPC channel options (e.g. keepalive settings).
   */
  channelOptions?: ClientOptions;
}

/**
 * Event definitions for {@link GrpcPipeClient}.
 *
 * @template T - The logical message type.
 */
export interface GrpcPipeClientEvents<T = JsonValue> {
  /**
   * Emitted when the stream is established. The pipe is already reading.
   * @param pipe - The MessagePipe for this connection.
   */
  connected: (pipe: MessagePipe<T>) => void;

  /**
   * Emitted when the stream closes, gracefully or not, and after the `error`
   * of a connection attempt that failed.
   */
  disconnected: () => void;

  /**
   * Emitted when connecting or reading fails.
   * @param error - The encountered error.
   */
  error: (error: Error) => void;
}

/**
 * Configuration options for {@link connectWebSocketPipe}.
 */
export interface WebSocketPipeClientOptions<T = JsonValue> extends MessageHandlerOptions<T> {
  /** WebSocket subprotocols to offer. */
  protocols?: string | string[];

  /** Options passed to the `ws` client (headers, handshake timeout, TLS…). */
  clientOptions?: WebSocketClientOptions;
}
