import type { MessagePipe } from '@socket-pipe/core';
import type { IncomingPayload } from '@socket-pipe/server';
import { EventEmitter } from 'node:events';
import { GrpcPipeClient } from '@socket-pipe/client';
import { GrpcPipeServer, WebSocketPipeServer } from '@socket-pipe/server';
import { FakeServerStream, FakeSocket, flush } from './helpers/fakes.js';

type Session = { user: string };

function nextEvent<T>(register: (resolve: (value: T) => void) => void): Promise<T> {
  return new Promise<T>((resolve) => register(resolve));
}

test('WebSocketPipeServer wires accepted sockets to pipes with their context', async () => {
  const source = new EventEmitter();
  const server = new WebSocketPipeServer<{ type: string }, Session>({
    server: source,
    beforeConnect: () => ({ user: 'test-user' }),
  });
  const connected = nextEvent<Session | undefined>((resolve) => server.on('connection', (_pipe, context) => resolve(context)));
  const incoming = nextEvent<IncomingPayload<{ type: string }, Session>>((resolve) => server.on('incoming', resolve));

  const socket = new FakeSocket();
  source.emit('connection', socket);

  expect(await connected).toEqual({ user: 'test-user' });
  expect(server.connectionCount).toBe(1);

  socket.receiveText('{"type":"hello"}');
  const payload = await incoming;
  expect(payload.data).toEqual({ type: 'hello' });
  expect(payload.context).toEqual({ user: 'test-user' });

  await payload.pipe.post({ type: 'welcome' });
  expect(socket.sent).toEqual([
    { data: Array.from(Buffer.from('{"type":"welcome"}')), binary: false, fin: true },
  ]);

  await server.close();
});

test('WebSocketPipeServer closes sockets that beforeConnect rejects', async () => {
  const source = new EventEmitter();
  const server = new WebSocketPipeServer({
    server: source,
    beforeConnect: () => {
      throw new Error('bad token');
    },
  });
  const onConnection = vi.fn();
  server.on('connection', onConnection);

  const socket = new FakeSocket();
  source.emit('connection', socket);
  await flush();

  expect(socket.closeArgs).toEqual([1008, 'Connection rejected.']);
  expect(onConnection).not.toHaveBeenCalled();
  expect(server.connectionCount).toBe(0);
});

test('WebSocketPipeServer emits disconnected when a peer closes', async () => {
  const source = new EventEmitter();
  const server = new WebSocketPipeServer({ server: source });
  const connected = nextEvent<MessagePipe>((resolve) => server.on('connection', resolve));
  const disconnected = nextEvent<MessagePipe>((resolve) => server.on('disconnected', resolve));

  const socket = new FakeSocket();
  source.emit('connection', socket);
  const pipe = await connected;
  socket.peerClosed(1000, 'bye');

  expect(await disconnected).toBe(pipe);
  expect(server.connectionCount).toBe(0);
  expect(pipe.stopped).toBe(true);
});

test('WebSocketPipeServer.close says goodbye to every socket', async () => {
  const source = new EventEmitter();
  const server = new WebSocketPipeServer({ server: source });
  const onDisconnected = vi.fn();
  server.on('disconnected', onDisconnected);

  const sockets = [new FakeSocket(), new FakeSocket()];
  for (const socket of sockets) source.emit('connection', socket);
  await flush();
  expect(server.connectionCount).toBe(2);

  await server.close();

  expect(sockets.map((s) => s.closeArgs)).toEqual([
    [1001, 'Server shutting down.'],
    [1001, 'Server shutting down.'],
  ]);
  expect(onDisconnected).toHaveBeenCalledTimes(2);
  expect(server.connectionCount).toBe(0);
});

test('WebSocketPipeServer needs a server or a port', () => {
  expect(() => new WebSocketPipeServer({})).toThrow(TypeError);
});

test('GrpcPipeServer accepts a stream and answers with response metadata', async () => {
  const server = new GrpcPipeServer<{ type: string }, { clientId: string }>({
    host: '127.0.0.1',
    port: 0,
    beforeConnect: ({ metadata }) => ({ clientId: String(metadata.get('clientid')[0]) }),
  });
  const incoming = nextEvent<IncomingPayload<{ type: string }, { clientId: string }>>((resolve) => server.on('incoming', resolve));

  const stream = new FakeServerStream();
  stream.metadata.set('clientid', 'test-client');
  await server.handleStream(stream);

  expect(stream.sentMetadata).not.toBeNull();
  expect(server.connectionCount).toBe(1);

  stream.emit('data', {
    kind: 'text',
    payload: Buffer.from('{"type":"ping"}'),
    endOfMessage: true,
    closeCode: 0,
    closeReason: '',
  });
  const payload = await incoming;
  expect(payload.data).toEqual({ type: 'ping' });
  expect(payload.context).toEqual({ clientId: 'test-client' });

  await server.destroy();
  expect(stream.ended).toBe(true);
  expect(server.connectionCount).toBe(0);
});

test('GrpcPipeServer destroys streams that beforeConnect rejects', async () => {
  const server = new GrpcPipeServer({
    host: '127.0.0.1',
    port: 0,
    beforeConnect: async () => {
      throw new Error('unauthenticated');
    },
  });

  const stream = new FakeServerStream();
  await server.handleStream(stream);

  expect(stream.destroyedWith?.message).toBe('unauthenticated');
  expect(stream.sentMetadata).toBeNull();
  expect(server.connectionCount).toBe(0);
  await server.destroy();
});

test('GrpcPipeClient refuses an empty address', () => {
  expect(() => new GrpcPipeClient({ address: '' })).toThrow(TypeError);
});
