import { createHash } from 'node:crypto';
import { HandshakeError } from './errors.js';

/** Fixed GUID appended to the client key, see RFC 6455 section 1.3. */
export const WEBSOCKET_GUID = '258EAFA5-E914-47DA-95CA-C5AB0DC85B11';
export const WEBSOCKET_VERSION = '13';
/** Largest request head accepted before the connection is dropped. */
export const MAX_REQUEST_SIZE = 8192;

export interface HttpRequest {
  method: string;
  path: string;
  version: string;
  /** Header values keyed by lower-cased name */
  headers: Map<string, string>;
}

const STATUS_TEXT: Record<number, string> = {
  101: 'Switching Protocols',
  200: 'OK',
  400: 'Bad Request',
  404: 'Not Found',
};

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Returns the offset just past the blank line ending the request head,
 * or -1 when it has not arrived yet.
 */
function findHeadEnd(buffer: Uint8Array): number {
  for (let i = 3; i < buffer.length; i++) {
    if (buffer[i - 3] === 0x0d && buffer[i - 2] === 0x0a && buffer[i - 1] === 0x0d && buffer[i] === 0x0a) {
      return i + 1;
    }
  }
  return -1;
}

/**
 * Parses an HTTP/1.1 request head from the start of the buffer.
 * Returns null if more data is needed, together with the bytes consumed otherwise.
 * Bodies are not supported; anything after the head belongs to the next request
 * or, after an upgrade, to the WebSocket stream.
 */
export function parseHttpRequest(buffer: Uint8Array): { request: HttpRequest; bytesRead: number } | null {
  const headEnd = findHeadEnd(buffer);
  if (headEnd === -1) {
    if (buffer.length > MAX_REQUEST_SIZE) {
      throw new HandshakeError(`Request head exceeds ${MAX_REQUEST_SIZE} bytes`, 'REQUEST_TOO_LARGE');
    }
    return null;
  }
  if (headEnd > MAX_REQUEST_SIZE) {
    throw new HandshakeError(`Request head exceeds ${MAX_REQUEST_SIZE} bytes`, 'REQUEST_TOO_LARGE');
  }

  const [requestLine = '', ...headerLines] = decoder.decode(buffer.subarray(0, headEnd - 4)).split('\r\n');
  const parts = requestLine.split(' ');
  const [method = '', path = '', version = ''] = parts;
  if (parts.length !== 3 || !method || !path || !version) {
    throw new HandshakeError(`Invalid request line '${requestLine}'`);
  }

  const headers = new Map<string, string>();
  for (const line of headerLines) {
    const separator = line.indexOf(':');
    // Only a handful of headers matter, so lines we cannot read are skipped.
    if (separator <= 0) continue;
    const name = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();
    const previous = headers.get(name);
    headers.set(name, previous === undefined ? value : `${previous}, ${value}`);
  }

  return {
    request: { method, path, version, headers },
    bytesRead: headEnd,
  };
}

/** Path without the query string. */
export function requestPath(request: HttpRequest): string {
  const query = request.path.indexOf('?');
  return query === -1 ? request.path : request.path.slice(0, query);
}

function hasToken(value: string | undefined, token: string): boolean {
  if (value === undefined) return false;
  return value.split(',').some((part) => part.trim().toLowerCase() === token);
}

/** Whether the request asks for a WebSocket, regardless of its other headers. */
export function isUpgradeRequest(request: HttpRequest): boolean {
  return hasToken(request.headers.get('upgrade'), 'websocket');
}

/**
 * Derives the `Sec-WebSocket-Accept` value from the client's key:
 * base64(sha1(key + GUID)).
 */
export function computeAcceptToken(key: string): string {
  return createHash('sha1').update(key + WEBSOCKET_GUID).digest('base64');
}

function encodeHead(status: number, headers: Array<[string, string | number]>): string {
  const lines = [`HTTP/1.1 ${status} ${STATUS_TEXT[status] ?? ''}`];
  for (const [name, value] of headers) {
    lines.push(`${name}: ${value}`);
  }
  return lines.join('\r\n') + '\r\n\r\n';
}

/**
 * Validates an upgrade request and builds the `101 Switching Protocols` reply.
 */
export function upgradeResponse(request: HttpRequest, upgradePath: string): Uint8Array {
  if (request.method !== 'GET' || request.version !== 'HTTP/1.1') {
    throw new HandshakeError(`Expected 'GET ... HTTP/1.1', got '${request.method} ... ${request.version}'`);
  }
  if (requestPath(request) !== upgradePath) {
    throw new HandshakeError(`Upgrade requested on '${request.path}', expected '${upgradePath}'`);
  }
  if (!isUpgradeRequest(request)) {
    throw new HandshakeError('Missing Upgrade: websocket header');
  }
  const key = request.headers.get('sec-websocket-key');
  if (!key) {
    throw new HandshakeError('Missing Sec-WebSocket-Key header');
  }
  const version = request.headers.get('sec-websocket-version');
  if (version !== undefined && version !== WEBSOCKET_VERSION) {
    throw new HandshakeError(`Unsupported Sec-WebSocket-Version '${version}'`);
  }

  return encoder.encode(
    encodeHead(101, [
      ['Upgrade', 'websocket'],
      ['Connection', 'Upgrade'],
      ['Sec-WebSocket-Accept', computeAcceptToken(key)],
    ]),
  );
}

/**
 * Parses raw request bytes and returns the upgrade response for them.
 * Incomplete input counts as malformed here; the server buffers before calling
 * {@link parseHttpRequest} itself.
 */
export function performHandshake(raw: Uint8Array, upgradePath: string): Uint8Array {
  const parsed = parseHttpRequest(raw);
  if (!parsed) {
    throw new HandshakeError('Incomplete request head');
  }
  return upgradeResponse(parsed.request, upgradePath);
}

function withBody(head: string, body: Uint8Array): Uint8Array {
  const headBytes = encoder.encode(head);
  const response = new Uint8Array(headBytes.length + body.length);
  response.set(headBytes);
  response.set(body, headBytes.length);
  return response;
}

/** `200 OK` carrying the bootstrap page; the connection stays open. */
export function bootstrapResponse(page: string): Uint8Array {
  const body = encoder.encode(page);
  return withBody(
    encodeHead(200, [
      ['Content-Type', 'text/html; charset=utf-8'],
      ['Content-Length', body.length],
      ['Cache-Control', 'no-store'],
      ['Connection', 'keep-alive'],
    ]),
    body,
  );
}

/** Error page for requests that are answered and then closed. */
export function errorResponse(status: 400 | 404, detail?: string): Uint8Array {
  const body = encoder.encode(detail ?? STATUS_TEXT[status] ?? '');
  return withBody(
    encodeHead(status, [
      ['Content-Type', 'text/plain; charset=utf-8'],
      ['Content-Length', body.length],
      ['Connection', 'close'],
    ]),
    body,
  );
}
