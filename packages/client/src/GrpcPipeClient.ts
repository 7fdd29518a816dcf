import type { GrpcPipeClientEvents, GrpcPipeClientOptions } from './types.js';
import type { ClientDuplexStream } from '@grpc/grpc-js';
import type { FrameMessage, JsonValue } from '@socket-pipe/core';

import {
  Client,
  credentials,
  Metadata
} from '@grpc/grpc-js';
import {
  FRAME_SERVICE_PATH,
  GrpcStreamChannel,
  MessageHandler,
  MessagePipe,
  TypedEventEmitter,
  decodeFrame,
  encodeFrame
} from '@socket-pipe/core';

/**
 * GrpcPipeClient opens one bidirectional `socketpipe.FrameService/Communicate`
 * stream to a gRPC server and exposes it as a {@link MessagePipe}.
 *
 * The connection is used for its lifetime only: when it closes or fails the
 * client emits `'disconnected'` and does not reconnect.
 *
 * @template T - The logical message type.
 */
export class GrpcPipeClient<T = JsonValue> extends TypedEventEmitter<GrpcPipeClientEvents<T>> {
  private client?: Client;
  private connected = false;

  /**
   * Exposes the raw gRPC duplex stream used for communication.
   * Intended primarily for testing or low-level access.
   */
  public stream?: ClientDuplexStream<FrameMessage, FrameMessage>;

  /** The pipe of the current connection, once established. */
  public pipe?: MessagePipe<T>;

  /**
   * Creates a new instance of {@link GrpcPipeClient} and starts connecting.
   *
   * @param options - Client configuration options.
   * @param options.address - Target server address (e.g., `localhost:50051`).
   * @param options.connectTimeoutMs - How long to wait for the channel (default: 5000ms).
   * @param options.metadata - Optional metadata to include when opening the stream.
   * @param options.tls - Enable TLS, optionally with a root cert.
   * @param options.channelOptions - gRPC channel options for advanced tuning.
   * @param options.compression - gzip/snappy compression of whole messages.
   */
  constructor(private readonly options: GrpcPipeClientOptions<T>) {
    super();
    if (typeof options.address !== 'string' || options.address.length === 0) {
      throw new TypeError(`Invalid gRPC server address: ${String(options.address)}`);
    }
    this.connect();
  }

  /** Whether the stream is established and not yet closed. */
  public get isConnected(): boolean {
    return this.connected;
  }

  private connect() {
    const creds = this.options.tls
      ? credentials.createSsl(
        typeof this.options.tls === 'object' && this.options.tls.rootCerts
          ? Buffer.from(this.options.tls.rootCerts)
          : undefined
      )
      : credentials.createInsecure();

    const client = new Client(this.options.address, creds, this.options.channelOptions);
    this.client = client;

    const deadline = Date.now() + (this.options.connectTimeoutMs ?? 5_000);
    client.waitForReady(deadline, (err) => {
      if (err) {
        console.warn('[GrpcPipeClient] waitForReady failed:', err.message);
        this.abandon(err);
        return;
      }

      this.startStream(client);
    });
  }

  private startStream(client: Client) {
    const metadata = new Metadata();
    for (const [key, value] of Object.entries(this.options.metadata ?? {})) {
      metadata.set(key, value);
    }

    const stream = client.makeBidiStreamRequest<FrameMessage, FrameMessage>(
      FRAME_SERVICE_PATH,
      encodeFrame,
      decodeFrame,
      metadata
    );
    this.stream = stream;

    const pipe = new MessagePipe(new MessageHandler(new GrpcStreamChannel(stream), this.options));
    this.pipe = pipe;

    const handleDisconnect = () => {
      if (!this.connected) return;
      this.connected = false;
      pipe.stop();
      this.emit('disconnected');
    };

    pipe.on('closed', handleDisconnect);
    pipe.on('error', (err) => {
      this.fail(err);
      handleDisconnect();
    });

    // until the server accepts the stream nothing reads the channel, so its
    // failures are only visible here
    let accepted = false;
    stream.on('error', (err: Error) => {
      if (accepted || this.stream !== stream) return;
      console.warn('[GrpcPipeClient] Stream failed before it was accepted:', err.message);
      this.abandon(err);
    });

    stream.on('metadata', () => {
      if (accepted) return;
      accepted = true;
      this.connected = true;
      console.debug('[GrpcPipeClient] Connected to server.');
      pipe.start();
      this.emit('connected', pipe);
    });
  }

  private fail(error: Error) {
    if (this.listenerCount('error') > 0) this.emit('error', error);
  }

  /**
   * Gives up on a connection that never got established: emits `'error'`,
   * releases the channel, then emits `'disconnected'`.
   */
  private abandon(error: Error) {
    this.fail(error);
    this.close();
    this.emit('disconnected');
  }

  /**
   * Closes the connection: stops the pipe, ends the gRPC stream and closes the
   * underlying channel. Emits `'disconnected'` if a stream was established.
   */
  public close() {
    if (this.connected) {
      this.connected = false;
      this.emit('disconnected');
    }

    this.pipe?.stop();
    try {
      this.stream?.end();
      this.client?.close();
    } catch (err) {
      console.error('[GrpcPipeClient] Error during close:', err);
    }
    this.stream = undefined;
    this.client = undefined;
  }
}
