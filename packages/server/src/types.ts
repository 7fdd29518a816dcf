import type {
  JsonValue,
  MessageHandlerOptions,
  MessagePipe,
  WebSocketLike
} from '@socket-pipe/core';
import type { Metadata, ServerOptions } from '@grpc/grpc-js';

export type Context = Record<string, unknown>;

/**
 * Authenticates a new connection before its pipe is created. The returned
 * object becomes the connection's context; throwing rejects the connection.
 */
export type PipeConnectionHook<Info, Ctx extends object = Context> = (
  info: Info
) => Promise<Ctx | void> | (Ctx | void);

/**
 * Payload of the `incoming` event.
 */
export interface IncomingPayload<T, Ctx extends object = Context> {
  data: T;
  pipe: MessagePipe<T>;
  context: Ctx | undefined;
}

/**
 * Events shared by {@link GrpcPipeServer} and {@link WebSocketPipeServer}.
 *
 * @template T - The logical message type.
 */
export interface PipeServerEvents<T = JsonValue, Ctx extends object = Context> {
  /**
   * Emitted when a new connection's pipe is ready and reading.
   * @param pipe - The pipe for the connection.
   * @param context - What `beforeConnect` returned, if anything.
   */
  connection: (pipe: MessagePipe<T>, context: Ctx | undefined) => void;

  /**
   * Emitted when an individual connection closes or fails.
   * Safe to use for session cleanup.
   */
  disconnected: (pipe: MessagePipe<T>) => void;

  /**
   * Emitted when a server or connection error occurs.
   * @param error - The encountered error.
   */
  error: (error: Error) => void;

  /** Emitted for every message from any pipe */
  incoming: (payload: IncomingPayload<T, Ctx>) => void;
}

/**
 * Configuration options for the {@link GrpcPipeServer}.
 */
export interface GrpcPipeServerOptions<T = JsonValue, Ctx extends object = Context> extends MessageHandlerOptions<T> {
  /**
   * The host IP address the server should bind to.
   *
   * Examples:
   * - `'127.0.0.1'` for localhost only
   * - `'0.0.0.0'` to listen on all IPv4 interfaces
   * - `'::'` to support all IPv6 interfaces
   */
  host: string;

  /** The port number the server should listen on (0 picks a free port). */
  port: number;

  /**
   * Optional hook to authenticate a stream from its metadata.
   */
  beforeConnect?: PipeConnectionHook<{ metadata: Metadata }, Ctx>;

  /**
   * Enable TLS by passing key/cert pair.
   * If not provided, insecure connection will be used.
   */
  tls?: {
    cert: Buffer | string;
    key: Buffer | string;
  };

  /**
   * Optional gRPC channel/server options (e.g. keepalive settings).
   */
  serverOptions?: ServerOptions;
}

/**
 * Anything that emits `ws` sockets on `connection`, typically a `WebSocketServer`.
 */
export interface ConnectionSource {
  on(event: 'connection', listener: (socket: WebSocketLike) => void): unknown;
}

/**
 * Configuration options for the {@link WebSocketPipeServer}.
 */
export interface WebSocketPipeServerOptions<T = JsonValue, Ctx extends object = Context> extends MessageHandlerOptions<T> {
  /**
   * An existing server to accept sockets from. When omitted, a `ws`
   * `WebSocketServer` is created on `port`/`host`.
   */
  server?: ConnectionSource;

  /** Port for the server created when `server` is omitted. */
  port?: number;

  /** Host for the server created when `server` is omitted. */
  host?: string;

  /**
   * Optional hook to authenticate a socket before its pipe is created.
   */
  beforeConnect?: PipeConnectionHook<{ socket: WebSocketLike }, Ctx>;
}
