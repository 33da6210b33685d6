import { createConfig, type VLogConfig } from '../config/config.js';
import type { Transport, Connection } from '../transports/Transport.js';
import { TcpTransport } from '../transports/TcpTransport.js';
import { renderBootstrapPage } from './bootstrap-page.js';
import { HandshakeError, RegistryError, toError } from './errors.js';
import { encodeFrame, Opcode, readFrame } from './frame.js';
import {
    bootstrapResponse,
    errorResponse,
    isUpgradeRequest,
    parseHttpRequest,
    requestPath,
    upgradeResponse,
    type HttpRequest,
} from './handshake.js';
import { encodeMessage, type VLogContent, type VLogMessage } from './message.js';
import { TargetFilter } from './target-filter.js';

export type RegistryState =
    | { status: 'uninitialized' }
    | { status: 'listening'; port: number }
    | { status: 'connected'; port: number; connection: Connection }
    | { status: 'closed' };

type ClientPhase = 'awaiting-bootstrap' | 'awaiting-upgrade' | 'upgraded' | 'closed';

interface Waiter {
    resolve: () => void;
    reject: (err: Error) => void;
}

// 1001 "going away"
const GOING_AWAY = new Uint8Array([0x03, 0xe9]);
// 1002 "protocol error"
const PROTOCOL_ERROR = new Uint8Array([0x03, 0xea]);

/** Idle time allowed between connecting and each request until the upgrade. */
export const HANDSHAKE_TIMEOUT_MS = 5000;

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
    if (a.length === 0) return b;
    const merged = new Uint8Array(a.length + b.length);
    merged.set(a);
    merged.set(b, a.length);
    return merged;
}

/**
 * Serves the bootstrap page, upgrades exactly one browser connection to a
 * WebSocket and streams vlog messages to it.
 *
 * Lifecycle: uninitialized -> listening <-> connected -> closed. A viewer that
 * goes away puts the server back into `listening` so a reload can reconnect.
 * While a viewer is connected any further inbound connection is closed at once.
 */
export class VLogServer {
    readonly config: VLogConfig;
    readonly filter: TargetFilter;
    private transport: Transport;
    private state: RegistryState = { status: 'uninitialized' };
    private starting = false;
    private page = '';
    private pending = new Set<Connection>();
    private waiters: Waiter[] = [];
    private readonly log: (...args: unknown[]) => void;

    constructor(config?: Partial<VLogConfig>, transport?: Transport) {
        this.config = createConfig(config);
        this.filter = new TargetFilter(this.config.targets);
        this.transport = transport ?? new TcpTransport();
        this.log = this.config.debug ? console.log : () => {};
    }

    /**
     * Opens the listener and returns the bound port.
     */
    async start(): Promise<number> {
        if (this.starting || this.state.status !== 'uninitialized') {
            throw new RegistryError('The vlog server has already been started', 'ALREADY_INITIALIZED');
        }
        this.page = renderBootstrapPage(this.config.upgradePath, this.config.page);
        this.starting = true;

        this.transport.onConnection((client) => this.handleClient(client));
        // Only a pending waitForConnection() keeps the process alive.
        this.transport.unref();

        let port: number;
        try {
            port = await this.transport.listen(this.config.port, this.config.host);
        } catch (err: unknown) {
            throw new RegistryError(
                `Could not listen on ${this.config.host}:${this.config.port}`,
                'LISTEN_FAILED',
                toError(err),
            );
        } finally {
            this.starting = false;
        }

        // shutdown() may have run while listen() was pending
        if (this.getState().status === 'closed') {
            this.transport.close();
            throw new RegistryError('The vlog server was shut down while starting', 'SHUT_DOWN');
        }
        this.state = { status: 'listening', port };
        this.log(`[VLog] Server started on http://${this.config.host}:${port}/`);
        return port;
    }

    /**
     * Resolves once a browser has loaded the page and upgraded its connection.
     */
    waitForConnection(): Promise<void> {
        switch (this.state.status) {
            case 'uninitialized':
                return Promise.reject(new RegistryError('waitForConnection() called before start()', 'NOT_INITIALIZED'));
            case 'closed':
                return Promise.reject(new RegistryError('The vlog server has been shut down', 'SHUT_DOWN'));
            case 'connected':
                return Promise.resolve();
            case 'listening':
                return new Promise<void>((resolve, reject) => {
                    this.waiters.push({ resolve, reject });
                    this.transport.ref();
                });
        }
    }

    isEnabled(target: string): boolean {
        return this.filter.isEnabled(target);
    }

    /**
     * Sends content to a surface. Does nothing without a viewer or when the
     * target is filtered out; never throws.
     */
    emit(target: string, surface: string, content: VLogContent): void {
        if (this.state.status !== 'connected') return;
        if (!this.filter.isEnabled(target)) return;
        this.deliver(this.state.connection, { kind: 'draw', surface, content });
    }

    /** Wipes a surface in the viewer. */
    clear(surface: string): void {
        if (this.state.status !== 'connected') return;
        this.deliver(this.state.connection, { kind: 'clear', surface });
    }

    getState(): RegistryState {
        return this.state;
    }

    get port(): number | null {
        return this.state.status === 'listening' || this.state.status === 'connected' ? this.state.port : null;
    }

    /**
     * Closes the viewer, pending handshakes and the listener. Problems are
     * logged; pending waitForConnection() calls reject with SHUT_DOWN.
     */
    shutdown(): void {
        if (this.state.status === 'closed') return;
        const previous = this.state;
        this.state = { status: 'closed' };

        if (previous.status === 'connected') {
            try {
                previous.connection.write(encodeFrame(Opcode.Close, GOING_AWAY));
            } catch (err: unknown) {
                console.warn('[VLog] Failed to send close frame:', toError(err).message);
            }
            this.closeQuietly(previous.connection);
        }
        for (const client of this.pending) {
            this.closeQuietly(client);
        }
        this.pending.clear();

        try {
            this.transport.close();
        } catch (err: unknown) {
            console.warn('[VLog] Failed to close listener:', toError(err).message);
        }
        this.settleWaiters(new RegistryError('The vlog server was shut down before a viewer connected', 'SHUT_DOWN'));
        this.log('[VLog] Server shut down');
    }

    private handleClient(client: Connection) {
        const peer = `${client.remoteAddress}:${client.remotePort}`;

        if (this.state.status !== 'listening') {
            this.log(`[VLog] Refusing connection from ${peer}: a viewer is already connected`);
            client.on('error', (err) => this.log(`[VLog] Refused connection error from ${peer}:`, err.message));
            client.close();
            return;
        }

        this.log(`[VLog] New connection from ${peer}`);
        this.pending.add(client);

        let buffer: Uint8Array = new Uint8Array();
        let phase: ClientPhase = 'awaiting-bootstrap';

        const startHandshakeTimer = () => {
            const timer = setTimeout(() => {
                if (phase !== 'awaiting-bootstrap' && phase !== 'awaiting-upgrade') return;
                this.log(`[VLog] Handshake timeout for ${peer}`);
                phase = 'closed';
                this.pending.delete(client);
                this.closeQuietly(client);
            }, HANDSHAKE_TIMEOUT_MS);
            timer.unref();
            return timer;
        };
        let handshakeTimeout = startHandshakeTimer();

        client.on('data', (data) => {
            if (phase === 'closed') return;
            buffer = concat(buffer, data);

            try {
                while (phase === 'awaiting-bootstrap' || phase === 'awaiting-upgrade') {
                    const parsed = parseHttpRequest(buffer);
                    if (!parsed) return;
                    buffer = buffer.subarray(parsed.bytesRead);
                    phase = this.respond(client, parsed.request);
                    clearTimeout(handshakeTimeout);
                    if (phase === 'awaiting-upgrade') handshakeTimeout = startHandshakeTimer();
                }
                if (phase === 'upgraded') {
                    buffer = this.readFrames(client, buffer);
                }
            } catch (e: unknown) {
                const err = toError(e);
                if (err instanceof HandshakeError) {
                    this.log(`[VLog] Rejected request from ${peer}:`, err.message);
                    this.writeQuietly(client, errorResponse(400, err.message));
                } else {
                    this.log(`[VLog] Connection error from ${peer}:`, err.message);
                }
                clearTimeout(handshakeTimeout);
                phase = 'closed';
                this.pending.delete(client);
                this.drop(client);
                this.closeQuietly(client);
            }
        });

        client.on('close', () => {
            clearTimeout(handshakeTimeout);
            phase = 'closed';
            this.pending.delete(client);
            this.drop(client);
        });

        client.on('error', (err) => {
            this.log(`[VLog] Connection error from ${peer}:`, err.message);
            clearTimeout(handshakeTimeout);
            phase = 'closed';
            this.pending.delete(client);
            this.drop(client);
        });
    }

    /**
     * Answers one request: the page, the upgrade, or a 404.
     */
    private respond(client: Connection, request: HttpRequest): ClientPhase {
        this.log(`[VLog] ${request.method} ${request.path}`);

        if (isUpgradeRequest(request)) {
            const response = upgradeResponse(request, this.config.upgradePath);
            if (this.state.status !== 'listening') {
                client.close();
                return 'closed';
            }
            client.write(response);
            this.connect(client, this.state.port);
            return 'upgraded';
        }

        if (request.method !== 'GET' || request.version !== 'HTTP/1.1') {
            throw new HandshakeError(`Unsupported request '${request.method} ${request.path} ${request.version}'`);
        }
        if (requestPath(request) === '/') {
            client.write(bootstrapResponse(this.page));
            return 'awaiting-upgrade';
        }

        client.write(errorResponse(404, `Path '${request.path}' not found`));
        client.close();
        return 'closed';
    }

    private connect(client: Connection, port: number) {
        this.pending.delete(client);
        for (const other of this.pending) {
            this.closeQuietly(other);
        }
        this.pending.clear();

        this.state = { status: 'connected', port, connection: client };
        this.log(`[VLog] Viewer connected from ${client.remoteAddress}:${client.remotePort}`);
        this.settleWaiters();
    }

    /**
     * Handles the frames a viewer sends after the upgrade. Only close and ping
     * need an answer. Returns the bytes of an incomplete trailing frame.
     */
    private readFrames(client: Connection, buffer: Uint8Array): Uint8Array {
        let offset = 0;
        for (;;) {
            const result = readFrame(buffer, offset);
            if (!result) break;
            offset = result.offset;

            const { frame } = result;
            if (!frame.masked) {
                this.log('[VLog] Viewer sent an unmasked frame, closing');
                this.writeQuietly(client, encodeFrame(Opcode.Close, PROTOCOL_ERROR));
                this.drop(client);
                this.closeQuietly(client);
                return new Uint8Array();
            }
            if (frame.opcode === Opcode.Close) {
                this.log('[VLog] Viewer closed the connection');
                this.writeQuietly(client, encodeFrame(Opcode.Close, frame.payload.subarray(0, 2)));
                this.drop(client);
                this.closeQuietly(client);
                return new Uint8Array();
            }
            if (frame.opcode === Opcode.Ping) {
                this.send(client, encodeFrame(Opcode.Pong, frame.payload));
            }
        }
        return buffer.subarray(offset);
    }

    private deliver(connection: Connection, message: VLogMessage) {
        let payload: string;
        try {
            payload = encodeMessage(message);
        } catch (err: unknown) {
            this.log(`[VLog] Dropping message for surface '${message.surface}':`, toError(err).message);
            return;
        }
        // One write per frame keeps frames from interleaving on the wire.
        this.send(connection, encodeFrame(Opcode.Text, payload));
    }

    private send(connection: Connection, frame: Uint8Array) {
        if (connection.bufferedAmount > this.config.maxBufferedBytes) {
            console.warn(
                `[VLog] Viewer left ${connection.bufferedAmount} bytes unread (limit ${this.config.maxBufferedBytes}), dropping it`,
            );
            this.drop(connection);
            connection.destroy();
            return;
        }
        try {
            connection.write(frame);
        } catch (err: unknown) {
            this.log('[VLog] Write failed, dropping viewer:', toError(err).message);
            this.drop(connection);
            this.closeQuietly(connection);
        }
    }

    /** Forgets the viewer if `connection` is it; the server listens again. */
    private drop(connection: Connection) {
        if (this.state.status !== 'connected' || this.state.connection !== connection) return;
        this.state = { status: 'listening', port: this.state.port };
        this.log('[VLog] Viewer disconnected, waiting for a new connection');
    }

    private settleWaiters(error?: Error) {
        const waiters = this.waiters;
        this.waiters = [];
        this.transport.unref();
        for (const waiter of waiters) {
            if (error) waiter.reject(error);
            else waiter.resolve();
        }
    }

    private writeQuietly(connection: Connection, data: Uint8Array) {
        try {
            connection.write(data);
        } catch (err: unknown) {
            this.log('[VLog] Write failed:', toError(err).message);
        }
    }

    private closeQuietly(connection: Connection) {
        try {
            connection.close();
        } catch (err: unknown) {
            console.warn('[VLog] Failed to close connection:', toError(err).message);
        }
    }
}
