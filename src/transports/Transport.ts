export interface Connection {
    /** Throws when the underlying socket can no longer be written to. */
    write(data: Uint8Array): void;
    /** Flushes pending writes, then closes. */
    close(): void;
    /** Closes at once, discarding pending writes. */
    destroy(): void;
    /** Bytes accepted by `write` that the peer has not taken yet. */
    readonly bufferedAmount: number;
    on(event: 'data', listener: (data: Uint8Array) => void): void;
    on(event: 'close', listener: () => void): void;
    on(event: 'error', listener: (err: Error) => void): void;

    remoteAddress?: string;
    remotePort?: number;
}

export interface Transport {
    /** Resolves with the bound port, which differs from `port` when it is 0. */
    listen(port: number, host?: string): Promise<number>;
    onConnection(listener: (connection: Connection) => void): void;
    close(): void;
    /** Keep the process alive while the listener is open. */
    ref(): void;
    /** Let the process exit even though the listener is open. */
    unref(): void;
}
