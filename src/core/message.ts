/**
 * Messages sent to the bootstrap page. Each one becomes a single JSON text frame:
 *
 *   draw:  {"surf":"<surface>","content":"<content>"}
 *   clear: {"clear":1,"surf":"<surface>"}
 */

/** Text, or bytes that must be valid UTF-8. */
export type VLogContent = string | Uint8Array;

export type VLogMessage =
  | { kind: 'draw'; surface: string; content: VLogContent }
  | { kind: 'clear'; surface: string };

const decoder = new TextDecoder('utf-8', { fatal: true });

/** Throws a TypeError when byte content is not valid UTF-8. */
export function encodeMessage(message: VLogMessage): string {
  if (message.kind === 'clear') {
    return JSON.stringify({ clear: 1, surf: message.surface });
  }
  const content = typeof message.content === 'string' ? message.content : decoder.decode(message.content);
  return JSON.stringify({ surf: message.surface, content });
}
