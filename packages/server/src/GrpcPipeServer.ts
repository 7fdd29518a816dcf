import type { Context, GrpcPipeServerOptions } from './types.js';
import type { ServerDuplexStream } from '@grpc/grpc-js';
import type { FrameMessage, FrameStream, JsonValue } from '@socket-pipe/core';

import {
  Metadata,
  Server,
  ServerCredentials,
} from '@grpc/grpc-js';
import {
  FrameServiceService,
  GrpcStreamChannel,
  dlog
} from '@socket-pipe/core';
import { PipeServer, asError } from './PipeServer.js';

/**
 * The part of a server-side gRPC duplex stream the server relies on.
 */
export interface ServerFrameStream extends FrameStream {
  readonly metadata: Metadata;
  sendMetadata(responseMetadata: Metadata): void;
  destroy(error?: Error): unknown;
}

/**
 * GrpcPipeServer serves `socketpipe.FrameService/Communicate` and turns every
 * incoming bidirectional stream into a {@link MessagePipe}.
 *
 * It emits structured events when clients connect or disconnect and provides
 * a hook for authentication (`beforeConnect`).
 *
 * @template T - The logical message type.
 * @template Ctx - The per-connection context returned by `beforeConnect`.
 */
export class GrpcPipeServer<T = JsonValue, Ctx extends object = Context>
  extends PipeServer<T, Ctx, { metadata: Metadata }> {
  private readonly server: Server;

  /**
   * Constructs a new {@link GrpcPipeServer}. Call {@link listen} to bind it.
   *
   * @param options - Configuration for the server's behavior and transport.
   * @param options.host - Interface to bind.
   * @param options.port - The TCP port to listen on (0 picks a free one).
   * @param options.beforeConnect - Optional hook to authenticate clients and return session context.
   * @param options.tls - TLS credentials for secure connections. If omitted, server uses insecure transport.
   * @param options.serverOptions - Additional gRPC server/channel options (e.g., keepalive settings).
   * @param options.compression - gzip/snappy compression of whole messages.
   */
  constructor(private readonly options: GrpcPipeServerOptions<T, Ctx>) {
    super(options, options.beforeConnect);
    this.server = new Server(this.options.serverOptions);

    this.server.addService(FrameServiceService, {
      communicate: (stream: ServerDuplexStream<FrameMessage, FrameMessage>) => {
        this.handleStream(stream).catch((err: unknown) => {
          stream.destroy(asError(err, 'Pipe init failed'));
          this.fail(asError(err, 'Pipe init failed'));
        });
      },
    });
  }

  /**
   * Wires one incoming stream to a pipe and tells the client it is accepted
   * by sending response metadata.
   */
  public async handleStream(stream: ServerFrameStream): Promise<void> {
    const pipe = await this.accept(new GrpcStreamChannel(stream), { metadata: stream.metadata }, {
      reject: (err) => stream.destroy(err),
      release: () => stream.end(),
    });
    if (!pipe) return;

    stream.sendMetadata(new Metadata());
  }

  /**
   * Binds the gRPC server to the configured host and port.
   *
   * @returns The bound port.
   */
  public listen(): Promise<number> {
    const creds = this.options.tls
      ? ServerCredentials.createSsl(
        // `null` means use self-signed / non-root-verified certs
        null,
        [{
          cert_chain: Buffer.isBuffer(this.options.tls.cert)
            ? this.options.tls.cert
            : Buffer.from(this.options.tls.cert),
          private_key: Buffer.isBuffer(this.options.tls.key)
            ? this.options.tls.key
            : Buffer.from(this.options.tls.key),
        }],
        false
      )
      : ServerCredentials.createInsecure();

    return new Promise((resolve, reject) => {
      this.server.bindAsync(
        `${this.options.host}:${this.options.port}`,
        creds,
        (err, port) => {
          if (err) {
            this.fail(err);
            reject(err);
            return;
          }
          dlog('socket-pipe:server', `grpc listening on ${this.options.host}:${port}`);
          resolve(port);
        }
      );
    });
  }

  /**
   * Gracefully shuts down the gRPC server, stops all active pipes and
   * removes all event listeners.
   */
  public async destroy(): Promise<void> {
    this.disconnectAll();

    await new Promise<void>((resolve) => {
      const shutdownTimeout = setTimeout(() => {
        console.warn('[GrpcPipeServer] Force shutting down gRPC server after timeout');
        this.server.forceShutdown();
        resolve();
      }, 5_000);

      this.server.tryShutdown((err) => {
        clearTimeout(shutdownTimeout);
        if (err) this.fail(err);
        resolve();
      });
    });

    this.removeAllListeners();
  }
}
