/**
 * WebSocket frame utilities
 * Based on RFC 6455 section 5.2: https://datatracker.ietf.org/doc/html/rfc6455#section-5.2
 */

export const Opcode = {
  Continuation: 0x0,
  Text: 0x1,
  Binary: 0x2,
  Close: 0x8,
  Ping: 0x9,
  Pong: 0xa,
} as const;

export type Opcode = (typeof Opcode)[keyof typeof Opcode];

export interface Frame {
  fin: boolean;
  opcode: number;
  masked: boolean;
  /** Unmasked payload */
  payload: Uint8Array;
}

/** Control frames (close, ping, pong) carry at most 125 bytes. */
export const MAX_CONTROL_PAYLOAD = 125;
/** Client frames above this size are rejected; the viewer only ever sends control frames. */
export const MAX_CLIENT_PAYLOAD = 64 * 1024;

const encoder = new TextEncoder();

/**
 * Calculates the number of header bytes needed for a payload of the given length.
 */
export function frameHeaderLength(payloadLength: number, masked = false): number {
  const lengthBytes = payloadLength < 126 ? 0 : payloadLength <= 0xffff ? 2 : 8;
  return 2 + lengthBytes + (masked ? 4 : 0);
}

/**
 * Writes an unmasked frame header to a buffer at the given offset.
 * Returns the new offset.
 */
export function writeFrameHeader(buffer: Uint8Array, offset: number, opcode: Opcode, payloadLength: number, fin = true): number {
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  view.setUint8(offset++, (fin ? 0x80 : 0) | opcode);

  if (payloadLength < 126) {
    view.setUint8(offset++, payloadLength);
  } else if (payloadLength <= 0xffff) {
    view.setUint8(offset++, 126);
    view.setUint16(offset, payloadLength);
    offset += 2;
  } else {
    view.setUint8(offset++, 127);
    view.setUint32(offset, Math.floor(payloadLength / 0x100000000));
    view.setUint32(offset + 4, payloadLength >>> 0);
    offset += 8;
  }
  return offset;
}

/**
 * Encodes a complete, unmasked server frame.
 * Servers never mask their frames (RFC 6455 section 5.1).
 */
export function encodeFrame(opcode: Opcode, payload: Uint8Array | string = new Uint8Array()): Uint8Array {
  const bytes = typeof payload === 'string' ? encoder.encode(payload) : payload;
  const frame = new Uint8Array(frameHeaderLength(bytes.length) + bytes.length);
  const offset = writeFrameHeader(frame, 0, opcode, bytes.length);
  frame.set(bytes, offset);
  return frame;
}

/**
 * Reads one frame from a buffer starting at the given offset.
 * Returns the frame and the new offset, or null when the frame is incomplete.
 */
export function readFrame(buffer: Uint8Array, offset: number): { frame: Frame; offset: number } | null {
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  if (buffer.length - offset < 2) return null;

  const first = view.getUint8(offset);
  const second = view.getUint8(offset + 1);
  const fin = (first & 0x80) !== 0;
  const opcode = first & 0x0f;
  const masked = (second & 0x80) !== 0;
  let payloadLength = second & 0x7f;
  let cursor = offset + 2;

  if (payloadLength === 126) {
    if (buffer.length - cursor < 2) return null;
    payloadLength = view.getUint16(cursor);
    cursor += 2;
  } else if (payloadLength === 127) {
    if (buffer.length - cursor < 8) return null;
    const high = view.getUint32(cursor);
    payloadLength = high * 0x100000000 + view.getUint32(cursor + 4);
    cursor += 8;
  }

  if (opcode >= Opcode.Close && payloadLength > MAX_CONTROL_PAYLOAD) {
    throw new Error(`Control frame payload of ${payloadLength} bytes exceeds ${MAX_CONTROL_PAYLOAD}`);
  }
  if (payloadLength > MAX_CLIENT_PAYLOAD) {
    throw new Error(`Frame payload of ${payloadLength} bytes exceeds ${MAX_CLIENT_PAYLOAD}`);
  }

  const maskLength = masked ? 4 : 0;
  if (buffer.length - cursor < maskLength + payloadLength) return null;

  const mask = buffer.subarray(cursor, cursor + maskLength);
  cursor += maskLength;
  const payload = new Uint8Array(buffer.subarray(cursor, cursor + payloadLength));
  if (masked) {
    for (let i = 0; i < payload.length; i++) {
      payload[i] = (payload[i] ?? 0) ^ (mask[i % 4] ?? 0);
    }
  }
  cursor += payloadLength;

  return {
    frame: { fin, opcode, masked, payload },
    offset: cursor,
  };
}
