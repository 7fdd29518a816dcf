import type { JsonValue } from '@socket-pipe/core';
import type { WebSocketPipeClientOptions } from './types.js';

import { MessageHandler, MessagePipe, WebSocketChannel, dlog } from '@socket-pipe/core';
import WebSocket from 'ws';

/**
 * Opens a WebSocket to `url` and wraps it in a {@link MessagePipe}.
 *
 * The pipe is returned before it starts reading: attach listeners, then call
 * `start()`.
 *
 * @example
 * const pipe = await connectWebSocketPipe('ws://localhost:8080', { compression: true });
 * pipe.on('message', (msg) => console.log(msg));
 * pipe.start();
 * await pipe.post({ type: 'hello' });
 */
export async function connectWebSocketPipe<T = JsonValue>(
  url: string,
  options: WebSocketPipeClientOptions<T> = {},
): Promise<MessagePipe<T>> {
  const socket = new WebSocket(url, options.protocols, options.clientOptions);

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      reject(new Error(`Failed to connect to ${url}: ${err.message}`, { cause: err }));
    };
    socket.once('error', onError);
    socket.once('open', () => {
      socket.off('error', onError);
      resolve();
    });
  });

  dlog('socket-pipe:client', `connected to ${url}`);
  return new MessagePipe(new MessageHandler(new WebSocketChannel(socket), options));
}
