export * from './types/helper.js';
export * from './errors.js';

export type { BufferPoolOptions } from './buffers/BufferPool.js';
export { BufferPool } from './buffers/BufferPool.js';
export { ByteSequence } from './buffers/ByteSequence.js';

export type { MessageFormatter, TextMessageFormatter, FormatterTracingCallbacks } from './formatters/MessageFormatter.js';
export { isTextFormatter, hasTracingCallbacks } from './formatters/MessageFormatter.js';
export type { JsonMessageFormatterOptions } from './formatters/JsonMessageFormatter.js';
export { JsonMessageFormatter } from './formatters/JsonMessageFormatter.js';
export type { ProtobufMessageFormatterOptions } from './formatters/ProtobufMessageFormatter.js';
export { ProtobufMessageFormatter } from './formatters/ProtobufMessageFormatter.js';

export type { MessageHandlerOptions, MessagePipeEvents } from './pipe/types.js';
export { MessageHandler } from './pipe/MessageHandler.js';
export { MessagePipe } from './pipe/MessagePipe.js';
export { TypedEventEmitter } from './pipe/TypedEventEmitter.js';

export type { ChannelState, DataFrameKind, FrameKind, ReceiveResult, SocketChannel } from './transports/SocketChannel.js';
export { CloseCode } from './transports/SocketChannel.js';
export type { InboundFrame } from './transports/FrameQueue.js';
export { FrameQueue } from './transports/FrameQueue.js';
export { LoopbackChannel, createLoopbackPair } from './transports/LoopbackChannel.js';
export type { WebSocketLike } from './transports/WebSocketChannel.js';
export { WebSocketChannel } from './transports/WebSocketChannel.js';
export type { FrameStream } from './transports/GrpcStreamChannel.js';
export { GrpcStreamChannel } from './transports/GrpcStreamChannel.js';

export type { FrameMessage } from './proto/frameService.js';
export { FrameServiceService, FRAME_SERVICE_PATH, encodeFrame, decodeFrame } from './proto/frameService.js';

export type { CompressionCodec, CompressionSetting } from './utils/compression.js';
export { compress, decompress, resolveCodec, isCompressionEnabled } from './utils/compression.js';
export { dlog, isDebugEnabled } from './utils/debug.js';
