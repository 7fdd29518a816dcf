export type {
  ConnectionSource,
  Context,
  GrpcPipeServerOptions,
  IncomingPayload,
  PipeConnectionHook,
  PipeServerEvents,
  WebSocketPipeServerOptions
} from './types.js';
export type { AcceptCallbacks } from './PipeServer.js';
export { PipeServer } from './PipeServer.js';
export type { ServerFrameStream } from './GrpcPipeServer.js';
export { GrpcPipeServer } from './GrpcPipeServer.js';
export { WebSocketPipeServer } from './WebSocketPipeServer.js';
