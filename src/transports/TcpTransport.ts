import { createServer, type Server, type Socket } from 'node:net';
import type { Transport, Connection } from './Transport.js';

/** How long a socket that is already ending gets to flush when the listener closes. */
const CLOSE_GRACE_MS = 1000;

type ConnectionListener = ((data: Uint8Array) => void) | (() => void) | ((err: Error) => void);

export class TcpConnection implements Connection {
    constructor(private socket: Socket) {
        socket.setNoDelay(true);
    }

    write(data: Uint8Array): void {
        if (this.socket.destroyed || !this.socket.writable) {
            throw new Error(`Socket to ${this.remoteAddress}:${this.remotePort} is not writable`);
        }
        this.socket.write(data);
    }

    close(): void {
        if (this.socket.destroyed) return;
        // end() only half-closes; drop the socket once pending writes are flushed
        this.socket.end(() => this.socket.destroy());
    }

    destroy(): void {
        this.socket.destroy();
    }

    get bufferedAmount(): number {
        return this.socket.writableLength;
    }

    on(event: 'data', listener: (data: Uint8Array) => void): void;
    on(event: 'close', listener: () => void): void;
    on(event: 'error', listener: (err: Error) => void): void;
    on(event: 'data' | 'close' | 'error', listener: ConnectionListener): void {
        this.socket.on(event, listener);
    }

    get remoteAddress() {
        return this.socket.remoteAddress;
    }

    get remotePort() {
        return this.socket.remotePort;
    }
}

export class TcpTransport implements Transport {
    private server: Server | null = null;
    private sockets = new Set<Socket>();
    private connectionHandler: ((conn: Connection) => void) | null = null;
    private referenced = true;

    listen(port: number, host: string = '127.0.0.1'): Promise<number> {
        return new Promise((resolve, reject) => {
            const server = createServer((socket) => this.accept(socket));

            const onStartupError = (err: Error) => reject(err);
            server.once('error', onStartupError);
            server.listen(port, host, () => {
                server.removeListener('error', onStartupError);
                server.on('error', (err) => {
                    console.error('[TcpTransport] Listener error:', err);
                });
                this.server = server;
                if (!this.referenced) server.unref();

                const address = server.address();
                resolve(address !== null && typeof address === 'object' ? address.port : port);
            });
        });
    }

    private accept(socket: Socket) {
        this.sockets.add(socket);
        socket.once('close', () => this.sockets.delete(socket));
        if (!this.referenced) socket.unref();

        if (this.connectionHandler) {
            this.connectionHandler(new TcpConnection(socket));
        } else {
            socket.destroy();
        }
    }

    onConnection(listener: (connection: Connection) => void): void {
        this.connectionHandler = listener;
    }

    close(): void {
        for (const socket of this.sockets) {
            if (socket.writableEnded && !socket.destroyed) {
                // end() was called; let queued writes such as a close frame go out first
                setTimeout(() => socket.destroy(), CLOSE_GRACE_MS).unref();
            } else {
                socket.destroy();
            }
        }
        this.sockets.clear();
        if (this.server) {
            this.server.close((err) => {
                if (err) console.warn('[TcpTransport] Failed to close listener:', err.message);
            });
            this.server = null;
        }
    }

    ref(): void {
        this.referenced = true;
        this.server?.ref();
        for (const socket of this.sockets) socket.ref();
    }

    unref(): void {
        this.referenced = false;
        this.server?.unref();
        for (const socket of this.sockets) socket.unref();
    }
}
