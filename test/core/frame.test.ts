import { describe, expect, test } from 'vitest';
import { encodeFrame, frameHeaderLength, Opcode, readFrame, writeFrameHeader } from '../../src/core/frame.js';

// Masked "Hello" from RFC 6455 section 5.7
const MASKED_HELLO = new Uint8Array([0x81, 0x85, 0x37, 0xfa, 0x21, 0x3d, 0x7f, 0x9f, 0x4d, 0x51, 0x58]);

describe('Frame', () => {
  test('encodeFrame - short text frame', () => {
    expect(encodeFrame(Opcode.Text, 'hi')).toEqual(new Uint8Array([0x81, 0x02, 0x68, 0x69]));
  });

  test('encodeFrame - empty close frame', () => {
    expect(encodeFrame(Opcode.Close)).toEqual(new Uint8Array([0x88, 0x00]));
  });

  test('encodeFrame - 125 bytes still fit the 7-bit length', () => {
    const frame = encodeFrame(Opcode.Text, 'a'.repeat(125));
    expect(frame.length).toBe(127);
    expect([...frame.slice(0, 2)]).toEqual([0x81, 125]);
  });

  test('encodeFrame - 126 bytes use the 16-bit length', () => {
    const frame = encodeFrame(Opcode.Text, 'a'.repeat(126));
    expect(frame.length).toBe(130);
    expect([...frame.slice(0, 4)]).toEqual([0x81, 126, 0x00, 0x7e]);
  });

  test('encodeFrame - 65535 bytes is the largest 16-bit length', () => {
    const frame = encodeFrame(Opcode.Binary, new Uint8Array(65535));
    expect([...frame.slice(0, 4)]).toEqual([0x82, 126, 0xff, 0xff]);
  });

  test('encodeFrame - 65536 bytes use the 64-bit length', () => {
    const frame = encodeFrame(Opcode.Text, new Uint8Array(65536));
    expect(frame.length).toBe(65536 + 10);
    expect([...frame.slice(0, 10)]).toEqual([0x81, 127, 0, 0, 0, 0, 0, 0x01, 0x00, 0x00]);
  });

  test('encodeFrame - payload is UTF-8 and never masked', () => {
    const frame = encodeFrame(Opcode.Text, 'é');
    expect([...frame]).toEqual([0x81, 0x02, 0xc3, 0xa9]);
    expect((frame[1] ?? 0) & 0x80).toBe(0);
  });

  test('writeFrameHeader - writes at an offset and returns the new offset', () => {
    const buffer = new Uint8Array(6);
    const offset = writeFrameHeader(buffer, 2, Opcode.Pong, 300);
    expect(offset).toBe(6);
    expect([...buffer]).toEqual([0, 0, 0x8a, 126, 0x01, 0x2c]);
  });

  test('writeFrameHeader - clears FIN for fragments', () => {
    const buffer = new Uint8Array(2);
    writeFrameHeader(buffer, 0, Opcode.Text, 1, false);
    expect(buffer[0]).toBe(0x01);
  });

  test('frameHeaderLength', () => {
    expect(frameHeaderLength(0)).toBe(2);
    expect(frameHeaderLength(125)).toBe(2);
    expect(frameHeaderLength(126)).toBe(4);
    expect(frameHeaderLength(65535)).toBe(4);
    expect(frameHeaderLength(65536)).toBe(10);
    expect(frameHeaderLength(10, true)).toBe(6);
  });

  test('readFrame - unmasks a client frame', () => {
    const result = readFrame(MASKED_HELLO, 0);
    expect(result).not.toBeNull();
    expect(result?.offset).toBe(MASKED_HELLO.length);
    expect(result?.frame.fin).toBe(true);
    expect(result?.frame.masked).toBe(true);
    expect(result?.frame.opcode).toBe(Opcode.Text);
    expect(new TextDecoder().decode(result?.frame.payload)).toBe('Hello');
  });

  test('readFrame - reads unmasked frames with extended lengths', () => {
    const frame = encodeFrame(Opcode.Binary, new Uint8Array(300).fill(7));
    const result = readFrame(frame, 0);
    expect(result?.frame.payload.length).toBe(300);
    expect(result?.frame.payload[299]).toBe(7);
    expect(result?.offset).toBe(304);
  });

  test('readFrame - returns null while incomplete', () => {
    expect(readFrame(new Uint8Array([0x81]), 0)).toBeNull();
    expect(readFrame(MASKED_HELLO.slice(0, 5), 0)).toBeNull();
    expect(readFrame(MASKED_HELLO.slice(0, 10), 0)).toBeNull();
    expect(readFrame(new Uint8Array([0x81, 126, 0x01]), 0)).toBeNull();
  });

  test('readFrame - consecutive frames', () => {
    const ping = encodeFrame(Opcode.Ping, 'p');
    const buffer = new Uint8Array(MASKED_HELLO.length + ping.length);
    buffer.set(MASKED_HELLO);
    buffer.set(ping, MASKED_HELLO.length);

    const first = readFrame(buffer, 0);
    expect(first?.frame.opcode).toBe(Opcode.Text);
    const second = readFrame(buffer, first?.offset ?? 0);
    expect(second?.frame.opcode).toBe(Opcode.Ping);
    expect(second?.offset).toBe(buffer.length);
  });

  test('readFrame - rejects oversized control frames', () => {
    expect(() => readFrame(new Uint8Array([0x89, 126, 0x00, 0x7e]), 0)).toThrow();
  });
});
