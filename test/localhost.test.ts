import type { JsonValue, MessagePipe } from '@socket-pipe/core';
import { GrpcPipeClient, connectWebSocketPipe } from '@socket-pipe/client';
import { WebSocketChannel } from '@socket-pipe/core';
import { GrpcPipeServer, WebSocketPipeServer } from '@socket-pipe/server';

const HOST = '127.0.0.1';

test('GrpcPipeClient exchanges messages with a GrpcPipeServer on localhost', async () => {
  const server = new GrpcPipeServer<JsonValue, { clientId: string }>({
    host: HOST,
    port: 0,
    compression: true,
    beforeConnect: ({ metadata }) => ({ clientId: String(metadata.get('clientid')[0]) }),
  });
  const replies: Promise<void>[] = [];
  server.on('incoming', ({ data, pipe, context }) => {
    replies.push(pipe.post({ echo: data, from: context?.clientId ?? null }));
  });
  const port = await server.listen();
  expect(port).toBeGreaterThan(0);

  const client = new GrpcPipeClient({
    address: `${HOST}:${port}`,
    metadata: { clientid: 'test-client' },
    compression: true,
  });
  const pipe = await new Promise<MessagePipe>((resolve, reject) => {
    client.once('connected', resolve);
    client.once('error', reject);
  });
  expect(client.isConnected).toBe(true);

  const reply = new Promise<JsonValue>((resolve) => pipe.once('message', resolve));
  await pipe.post({ hello: 'server' });

  expect(await reply).toEqual({ echo: { hello: 'server' }, from: 'test-client' });
  expect(server.connections).toHaveLength(1);
  await Promise.all(replies);

  client.close();
  expect(client.isConnected).toBe(false);
  await server.destroy();
  expect(server.connections).toEqual([]);
}, 15_000);

test('GrpcPipeClient reports a stream the server rejects', async () => {
  const server = new GrpcPipeServer({
    host: HOST,
    port: 0,
    beforeConnect: () => {
      throw new Error('unauthenticated');
    },
  });
  const port = await server.listen();

  const client = new GrpcPipeClient({ address: `${HOST}:${port}` });
  const events: string[] = [];
  client.on('connected', () => events.push('connected'));
  client.on('error', () => events.push('error'));
  await new Promise<void>((resolve) => {
    client.on('disconnected', () => {
      events.push('disconnected');
      resolve();
    });
  });

  expect(events).toEqual(['error', 'disconnected']);
  expect(client.isConnected).toBe(false);
  expect(server.connectionCount).toBe(0);
  await server.destroy();
}, 15_000);

test('connectWebSocketPipe exchanges messages with a WebSocketPipeServer on localhost', async () => {
  const server = new WebSocketPipeServer<JsonValue, { user: string }>({
    host: HOST,
    port: 0,
    compression: { codec: 'snappy' },
    beforeConnect: () => ({ user: 'test-user' }),
  });
  const replies: Promise<void>[] = [];
  server.on('incoming', ({ data, pipe, context }) => {
    replies.push(pipe.post({ echo: data, user: context?.user ?? null }));
  });
  const port = await server.listen();

  const pipe = await connectWebSocketPipe(`ws://${HOST}:${port}`, { compression: { codec: 'snappy' } });
  const reply = new Promise<JsonValue>((resolve) => pipe.once('message', resolve));
  const closed = new Promise<void>((resolve) => pipe.once('closed', resolve));
  pipe.start();
  await pipe.post({ hello: 'server' });

  expect(await reply).toEqual({ echo: { hello: 'server' }, user: 'test-user' });
  expect(server.connections).toHaveLength(1);
  await Promise.all(replies);

  await server.close();
  await closed;
  expect(server.connectionCount).toBe(0);
});

test('connectWebSocketPipe sees the policy close of a rejected socket', async () => {
  const server = new WebSocketPipeServer({
    host: HOST,
    port: 0,
    beforeConnect: () => {
      throw new Error('bad token');
    },
  });
  const port = await server.listen();

  const pipe = await connectWebSocketPipe(`ws://${HOST}:${port}`);
  const channel = pipe.handler.channel;
  if (!(channel instanceof WebSocketChannel)) throw new TypeError('expected a WebSocketChannel');
  const closeCode = new Promise<number>((resolve) => channel.socket.once('close', (code) => resolve(code)));
  const closed = new Promise<void>((resolve) => pipe.once('closed', resolve));
  pipe.start();

  expect(await closeCode).toBe(1008);
  await closed;
  expect(server.connectionCount).toBe(0);
  await server.close();
});

test('connectWebSocketPipe rejects when nothing is listening', async () => {
  const server = new WebSocketPipeServer({ host: HOST, port: 0 });
  const port = await server.listen();
  await server.close();

  await expect(connectWebSocketPipe(`ws://${HOST}:${port}`)).rejects.toThrow(`Failed to connect to ws://${HOST}:${port}`);
});
