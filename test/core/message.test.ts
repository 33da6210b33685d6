import { describe, expect, test } from 'vitest';
import { encodeMessage } from '../../src/core/message.js';

describe('encodeMessage', () => {
  test('draw message carries surface and content', () => {
    expect(encodeMessage({ kind: 'draw', surface: 'main', content: 'First message' })).toBe(
      '{"surf":"main","content":"First message"}',
    );
  });

  test('escapes quotes and newlines as JSON', () => {
    expect(encodeMessage({ kind: 'draw', surface: 's"1', content: 'a\nb<img>' })).toBe(
      '{"surf":"s\\"1","content":"a\\nb<img>"}',
    );
  });

  test('byte content is decoded as UTF-8', () => {
    const content = new TextEncoder().encode('ünï');
    expect(encodeMessage({ kind: 'draw', surface: 'x', content })).toBe('{"surf":"x","content":"ünï"}');
  });

  test('byte content that is not UTF-8 is rejected', () => {
    const content = new Uint8Array([0x61, 0xc3]);
    expect(() => encodeMessage({ kind: 'draw', surface: 'x', content })).toThrow(TypeError);
  });

  test('clear message', () => {
    expect(encodeMessage({ kind: 'clear', surface: 'loading' })).toBe('{"clear":1,"surf":"loading"}');
  });
});
