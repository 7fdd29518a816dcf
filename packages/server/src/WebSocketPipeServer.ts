import type { ConnectionSource, Context, WebSocketPipeServerOptions } from './types.js';
import type { JsonValue, WebSocketLike } from '@socket-pipe/core';

import { CloseCode, WebSocketChannel, dlog } from '@socket-pipe/core';
import { WebSocketServer } from 'ws';
import { PipeServer, asError } from './PipeServer.js';

/**
 * WebSocketPipeServer turns every socket accepted by a `ws` server into a
 * {@link MessagePipe}.
 *
 * @template T - The logical message type.
 * @template Ctx - The per-connection context returned by `beforeConnect`.
 *
 * @example
 * const server = new WebSocketPipeServer({ port: 8080, compression: true });
 * server.on('incoming', ({ data, pipe }) => pipe.post(data));
 */
export class WebSocketPipeServer<T = JsonValue, Ctx extends object = Context>
  extends PipeServer<T, Ctx, { socket: WebSocketLike }> {
  private readonly owned?: WebSocketServer;
  private readonly channels = new Set<WebSocketChannel>();
  private listening = false;

  constructor(options: WebSocketPipeServerOptions<T, Ctx>) {
    super(options, options.beforeConnect);

    let source: ConnectionSource;
    if (options.server) {
      source = options.server;
    } else if (options.port !== undefined) {
      this.owned = new WebSocketServer({ port: options.port, host: options.host });
      this.owned.on('error', (err) => this.fail(err));
      this.owned.on('listening', () => {
        this.listening = true;
        dlog('socket-pipe:server', `websocket listening on ${options.host ?? '*'}:${options.port}`);
      });
      source = this.owned;
    } else {
      throw new TypeError('WebSocketPipeServer: either `server` or `port` is required');
    }

    source.on('connection', (socket) => {
      this.handleSocket(socket).catch((err: unknown) => this.fail(asError(err, 'Pipe init failed')));
    });
  }

  /**
   * Waits until the server created from `port`/`host` is accepting connections.
   *
   * @returns The bound port.
   */
  public listen(): Promise<number> {
    const owned = this.owned;
    if (!owned) {
      return Promise.reject(new TypeError('WebSocketPipeServer.listen: the server was supplied by the caller'));
    }

    return new Promise((resolve, reject) => {
      const bound = () => {
        owned.off('error', reject);
        const address = owned.address();
        if (typeof address === 'string') reject(new TypeError(`Not a TCP address: ${address}`));
        else resolve(address.port);
      };
      if (this.listening) {
        bound();
        return;
      }
      owned.once('listening', bound);
      owned.once('error', reject);
    });
  }

  private async handleSocket(socket: WebSocketLike): Promise<void> {
    const channel = new WebSocketChannel(socket);
    this.channels.add(channel);

    const pipe = await this.accept(channel, { socket }, {
      reject: () => {
        this.channels.delete(channel);
        socket.close(CloseCode.PolicyViolation, 'Connection rejected.');
      },
      release: () => {
        this.channels.delete(channel);
      },
    });
    if (!pipe) dlog('socket-pipe:server', 'websocket connection rejected');
  }

  /**
   * Stops all pipes, starts the close handshake on every open socket and, if
   * this server created the `ws` server, closes it.
   */
  public async close(): Promise<void> {
    const channels = [...this.channels];
    this.disconnectAll();

    await Promise.allSettled(
      channels.map((channel) => channel.close(CloseCode.GoingAway, 'Server shutting down.'))
    );

    const owned = this.owned;
    if (owned) {
      await new Promise<void>((resolve) => owned.close(() => resolve()));
    }
    this.removeAllListeners();
  }
}
