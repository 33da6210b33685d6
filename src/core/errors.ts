export type HandshakeErrorCode = 'MALFORMED_REQUEST' | 'REQUEST_TOO_LARGE';

/**
 * Raised while reading the HTTP request that precedes the WebSocket upgrade.
 * The offending connection is closed; the server keeps listening.
 */
export class HandshakeError extends Error {
  constructor(
    message: string,
    public readonly code: HandshakeErrorCode = 'MALFORMED_REQUEST',
  ) {
    super(message);
    this.name = 'HandshakeError';
  }
}

export type RegistryErrorCode = 'NOT_INITIALIZED' | 'ALREADY_INITIALIZED' | 'LISTEN_FAILED' | 'SHUT_DOWN';

/**
 * Setup mistakes surfaced to the caller: waiting before the server started,
 * starting twice, or a port that could not be bound.
 */
export class RegistryError extends Error {
  constructor(
    message: string,
    public readonly code: RegistryErrorCode,
    public override readonly cause?: Error,
  ) {
    super(message);
    this.name = 'RegistryError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
