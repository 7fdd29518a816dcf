import type { ServiceDefinition } from '@grpc/grpc-js';
import type { FrameKind } from '../transports/SocketChannel.js';
import { fileURLToPath } from 'node:url';
import protobuf from 'protobufjs';

/**
 * A transport frame as carried on the gRPC `FrameService/Communicate` stream.
 */
export interface FrameMessage {
  kind: FrameKind;
  payload: Uint8Array;
  endOfMessage: boolean;
  /** Only meaningful on close frames. */
  closeCode: number;
  closeReason: string;
}

const root = protobuf.loadSync(fileURLToPath(new URL('./frame.proto', import.meta.url)));
const Frame = root.lookupType('socketpipe.Frame');

const KIND_TO_WIRE = { binary: 'BINARY', text: 'TEXT', close: 'CLOSE' } as const satisfies Record<FrameKind, string>;

function kindFromWire(value: unknown): FrameKind {
  switch (value) {
    case 'TEXT':
      return 'text';
    case 'CLOSE':
      return 'close';
    case 'BINARY':
      return 'binary';
    default:
      throw new TypeError(`Unknown frame kind on the wire: ${String(value)}`);
  }
}

export function encodeFrame(frame: FrameMessage): Buffer {
  const message = Frame.fromObject({
    kind: KIND_TO_WIRE[frame.kind],
    payload: frame.payload,
    endOfMessage: frame.endOfMessage,
    closeCode: frame.closeCode,
    closeReason: frame.closeReason,
  });
  const bytes = Frame.encode(message).finish();
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export function decodeFrame(bytes: Uint8Array): FrameMessage {
  const plain = Frame.toObject(Frame.decode(bytes), { enums: String, defaults: true });
  const payload: unknown = plain.payload;
  return {
    kind: kindFromWire(plain.kind),
    payload: payload instanceof Uint8Array ? payload : new Uint8Array(0),
    endOfMessage: plain.endOfMessage === true,
    closeCode: typeof plain.closeCode === 'number' ? plain.closeCode : 0,
    closeReason: typeof plain.closeReason === 'string' ? plain.closeReason : '',
  };
}

export const FRAME_SERVICE_PATH = '/socketpipe.FrameService/Communicate';

/**
 * gRPC service definition for `socketpipe.FrameService`, usable with
 * `Server.addService` and `Client.makeBidiStreamRequest`.
 */
export const FrameServiceService = {
  communicate: {
    path: FRAME_SERVICE_PATH,
    requestStream: true,
    responseStream: true,
    requestSerialize: encodeFrame,
    requestDeserialize: decodeFrame,
    responseSerialize: encodeFrame,
    responseDeserialize: decodeFrame,
  },
} satisfies ServiceDefinition;
