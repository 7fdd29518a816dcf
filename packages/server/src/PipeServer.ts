import type { Context, PipeConnectionHook, PipeServerEvents } from './types.js';
import type { JsonValue, MessageHandlerOptions, SocketChannel } from '@socket-pipe/core';

import { MessageHandler, MessagePipe, TypedEventEmitter, dlog } from '@socket-pipe/core';

/**
 * Callbacks a concrete server passes to {@link PipeServer.accept} for one connection.
 */
export interface AcceptCallbacks {
  /** Tears the connection down after `beforeConnect` rejected it. */
  reject: (error: Error) => void;
  /** Runs once when the connection's pipe closes or fails. */
  release: () => void;
}

export function asError(err: unknown, fallback = 'Unknown error'): Error {
  return err instanceof Error ? err : new Error(typeof err === 'string' ? err : fallback);
}

/**
 * Shared connection bookkeeping for the gRPC and WebSocket servers: runs the
 * `beforeConnect` hook, builds a {@link MessageHandler} and {@link MessagePipe}
 * per channel, and relays pipe events as server events.
 *
 * @template T - The logical message type.
 * @template Ctx - The per-connection context returned by `beforeConnect`.
 * @template Info - What `beforeConnect` receives about a connection.
 */
export abstract class PipeServer<T = JsonValue, Ctx extends object = Context, Info = unknown>
  extends TypedEventEmitter<PipeServerEvents<T, Ctx>> {
  private readonly pipes = new Map<MessagePipe<T>, () => void>();

  protected constructor(
    private readonly handlerOptions: MessageHandlerOptions<T>,
    private readonly beforeConnect?: PipeConnectionHook<Info, Ctx>,
  ) {
    super();
  }

  /** Number of live connections. */
  public get connectionCount(): number {
    return this.pipes.size;
  }

  /** Pipes of all live connections. */
  public get connections(): MessagePipe<T>[] {
    return [...this.pipes.keys()];
  }

  /**
   * Authenticates and wires up one connection.
   *
   * @returns The started pipe, or `null` when `beforeConnect` rejected the connection.
   */
  protected async accept(channel: SocketChannel, info: Info, callbacks: AcceptCallbacks): Promise<MessagePipe<T> | null> {
    let context: Ctx | undefined;
    if (this.beforeConnect) {
      try {
        const maybeCtx = await this.beforeConnect(info);
        if (maybeCtx && typeof maybeCtx === 'object') context = maybeCtx;
      } catch (err) {
        dlog('socket-pipe:server', 'connection rejected:', err);
        callbacks.reject(asError(err, 'Auth failed'));
        return null;
      }
    }

    const pipe = new MessagePipe(new MessageHandler(channel, this.handlerOptions));

    const handleDisconnect = () => {
      const release = this.pipes.get(pipe);
      if (!release) return;
      this.pipes.delete(pipe);
      pipe.stop();
      release();
      this.emit('disconnected', pipe);
    };

    pipe.on('message', (data) => {
      this.emit('incoming', { data, pipe, context });
    });
    pipe.on('closed', handleDisconnect);
    pipe.on('error', (err) => {
      this.fail(err);
      handleDisconnect();
    });

    this.pipes.set(pipe, callbacks.release);
    this.emit('connection', pipe, context);
    pipe.start();
    return pipe;
  }

  /**
   * Stops every live pipe and forgets it, emitting `disconnected` for each.
   */
  protected disconnectAll(): void {
    for (const [pipe, release] of [...this.pipes.entries()]) {
      this.pipes.delete(pipe);
      pipe.stop();
      release();
      this.emit('disconnected', pipe);
    }
  }

  protected fail(error: Error): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    } else {
      console.warn('[socket-pipe] unhandled server error:', error.message);
    }
  }
}
