export type { GrpcPipeClientEvents, GrpcPipeClientOptions, WebSocketPipeClientOptions } from './types.js';
export { GrpcPipeClient } from './GrpcPipeClient.js';
export { connectWebSocketPipe } from './connectWebSocketPipe.js';
