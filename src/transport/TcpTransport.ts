import net from 'net';
import { ConnectionError } from '../errors';
import type { Transport } from './Transport';

export interface TcpTransportConfig {
    /** Give up opening the socket after this many ms; 0 disables the timer (default: 5000) */
    connectTimeout?: number;
    /** Disable Nagle's algorithm (default: true) */
    noDelay?: boolean;
    /** Pause the socket once this many unread bytes are queued (default: 1048576) */
    highWaterMark?: number;
}

const DEFAULT_CONFIG: Required<TcpTransportConfig> = {
    connectTimeout: 5000,
    noDelay: true,
    highWaterMark: 1024 * 1024,
};

/**
 * TCP transport on `net.Socket`.
 *
 * Socket data is queued as it arrives and handed out by `read()` in chunks,
 * which gives the client pull-style, non-blocking reads on top of Node's
 * push-style streams. The socket is paused while the queue is above
 * `highWaterMark` and resumed once reads bring it back under.
 */
export class TcpTransport implements Transport {
    private socket: net.Socket | null = null;
    private chunks: Buffer[] = [];
    private buffered = 0;
    private ended = false;
    private paused = false;
    private failure: Error | null = null;
    private waiters = new Set<() => void>();
    private config: Required<TcpTransportConfig>;

    constructor(config: TcpTransportConfig = {}) {
        this.config = { ...DEFAULT_CONFIG };
        if (config.connectTimeout !== undefined) this.config.connectTimeout = config.connectTimeout;
        if (config.noDelay !== undefined) this.config.noDelay = config.noDelay;
        if (config.highWaterMark !== undefined) this.config.highWaterMark = config.highWaterMark;
    }

    public open(host: string, port: number): Promise<void> {
        if (this.socket) {
            return Promise.reject(new ConnectionError('Transport is already open', undefined, false));
        }

        this.chunks = [];
        this.buffered = 0;
        this.ended = false;
        this.paused = false;
        this.failure = null;

        return new Promise((resolve, reject) => {
            const socket = net.createConnection({ host, port });
            this.socket = socket;
            let settled = false;

            const timeout = this.config.connectTimeout > 0
                ? setTimeout(() => {
                    if (settled) return;
                    settled = true;
                    socket.destroy();
                    this.socket = null;
                    reject(new ConnectionError(`Connection to ${host}:${port} timed out`));
                }, this.config.connectTimeout)
                : null;

            socket.once('connect', () => {
                if (settled) return;
                settled = true;
                if (timeout) clearTimeout(timeout);
                socket.setNoDelay(this.config.noDelay);
                resolve();
            });

            socket.on('data', (data: Buffer) => {
                this.chunks.push(data);
                this.buffered += data.length;
                if (!this.paused && this.buffered >= this.config.highWaterMark) {
                    this.paused = true;
                    socket.pause();
                }
                this.wake();
            });

            socket.on('end', () => {
                this.ended = true;
                this.wake();
            });

            socket.on('close', () => {
                this.ended = true;
                this.wake();
            });

            socket.on('error', (err: Error) => {
                if (!settled) {
                    settled = true;
                    if (timeout) clearTimeout(timeout);
                    this.socket = null;
                    reject(new ConnectionError(`Could not connect to ${host}:${port}`, err));
                    return;
                }
                this.failure = err;
                this.wake();
            });
        });
    }

    public write(data: string): void {
        const socket = this.socket;
        if (!socket || socket.destroyed || !socket.writable || this.failure) {
            throw new ConnectionError('Transport is not open', this.failure ?? undefined);
        }
        socket.write(data);
    }

    public read(maxBytes: number): Uint8Array | null {
        if (this.buffered > 0) {
            return this.take(maxBytes);
        }
        if (this.failure) {
            throw new ConnectionError('Socket failed', this.failure);
        }
        if (this.ended || !this.socket) {
            return new Uint8Array(0);
        }
        return null;
    }

    public waitReadable(timeoutMs: number): Promise<boolean> {
        if (this.isReadable()) return Promise.resolve(true);

        return new Promise((resolve) => {
            let timer: ReturnType<typeof setTimeout> | null = null;
            const settle = (ready: boolean) => {
                if (timer) clearTimeout(timer);
                this.waiters.delete(onReadable);
                resolve(ready);
            };
            const onReadable = () => settle(true);
            this.waiters.add(onReadable);
            timer = setTimeout(() => settle(false), Math.max(0, timeoutMs));
        });
    }

    public close(): void {
        const socket = this.socket;
        this.socket = null;
        this.ended = true;
        if (socket && !socket.destroyed) {
            socket.end();
        }
        this.wake();
    }

    public isOpen(): boolean {
        return this.socket !== null && !this.ended && this.failure === null;
    }

    private isReadable(): boolean {
        return this.buffered > 0 || this.ended || this.failure !== null || this.socket === null;
    }

    private take(maxBytes: number): Uint8Array {
        const size = Math.min(maxBytes, this.buffered);
        const out = new Uint8Array(size);
        let offset = 0;
        while (offset < size) {
            const head = this.chunks[0];
            const n = Math.min(head.length, size - offset);
            out.set(head.subarray(0, n), offset);
            offset += n;
            if (n === head.length) {
                this.chunks.shift();
            } else {
                this.chunks[0] = head.subarray(n);
            }
        }
        this.buffered -= size;

        if (this.paused && this.buffered < this.config.highWaterMark) {
            this.paused = false;
            this.socket?.resume();
        }
        return out;
    }

    private wake(): void {
        for (const waiter of Array.from(this.waiters)) {
            waiter();
        }
    }
}
