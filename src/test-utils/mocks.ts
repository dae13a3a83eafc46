import { ConnectionError } from '../errors';
import { OOCSIClient } from '../client';
import { LogLevel } from '../utils/Logger';
import type { Transport } from '../transport/Transport';
import type { ClientConfig } from '../types';

export interface MockTransportOptions {
    /** Line queued automatically after the handshake is written; null answers nothing. */
    handshakeReply?: string | null;
    /** Rejects `open()` with this error. */
    openError?: Error;
}

/**
 * In-memory transport. Tests queue inbound data with `receive()` and inspect
 * everything the client wrote in `sent`. Each queued chunk comes back from
 * `read()` on its own, so line boundaries can be split on purpose.
 */
export class MockTransport implements Transport {
    public sent: string[] = [];
    public host: string | null = null;
    public port: number | null = null;
    public writeError: Error | null = null;
    public readError: Error | null = null;

    private opened = false;
    private closed = false;
    private peerClosed = false;
    private queue: Uint8Array[] = [];
    private waiters = new Set<() => void>();
    private readonly encoder = new TextEncoder();
    private readonly handshakeReply: string | null;
    private readonly openError: Error | undefined;

    constructor(options: MockTransportOptions = {}) {
        this.handshakeReply = options.handshakeReply === undefined ? '{"status":"ok"}\n' : options.handshakeReply;
        this.openError = options.openError;
    }

    open(host: string, port: number): Promise<void> {
        this.host = host;
        this.port = port;
        if (this.openError) return Promise.reject(this.openError);
        this.opened = true;
        return Promise.resolve();
    }

    write(data: string): void {
        if (this.writeError) throw this.writeError;
        if (!this.opened || this.closed) throw new ConnectionError('Transport is not open');
        this.sent.push(data);
        if (this.handshakeReply !== null && data.endsWith('(JSON)\n')) {
            this.receive(this.handshakeReply);
        }
    }

    read(maxBytes: number): Uint8Array | null {
        const head = this.queue[0];
        if (head !== undefined) {
            if (head.length <= maxBytes) {
                this.queue.shift();
                return head;
            }
            this.queue[0] = head.subarray(maxBytes);
            return head.subarray(0, maxBytes);
        }
        if (this.readError) throw this.readError;
        if (this.peerClosed || this.closed) return new Uint8Array(0);
        return null;
    }

    waitReadable(timeoutMs: number): Promise<boolean> {
        if (this.isReadable()) return Promise.resolve(true);

        return new Promise((resolve) => {
            const onReadable = () => {
                clearTimeout(timer);
                this.waiters.delete(onReadable);
                resolve(true);
            };
            const timer = setTimeout(() => {
                this.waiters.delete(onReadable);
                resolve(false);
            }, timeoutMs);
            this.waiters.add(onReadable);
        });
    }

    close(): void {
        this.closed = true;
        this.wake();
    }

    isOpen(): boolean {
        return this.opened && !this.closed && !this.peerClosed;
    }

    // -------------------------------------------------------------------------
    // Test controls
    // -------------------------------------------------------------------------

    /** Queue one chunk of inbound data. */
    receive(data: string | Uint8Array): void {
        this.queue.push(typeof data === 'string' ? this.encoder.encode(data) : data);
        this.wake();
    }

    /** The peer closes; `read()` returns an empty chunk once the queue is drained. */
    closeFromPeer(): void {
        this.peerClosed = true;
        this.wake();
    }

    /** The socket fails; `read()` throws once the queue is drained. */
    failRead(error: Error = new ConnectionError('Socket failed')): void {
        this.readError = error;
        this.wake();
    }

    isClosed(): boolean {
        return this.closed;
    }

    clearSent(): void {
        this.sent = [];
    }

    private isReadable(): boolean {
        return this.queue.length > 0 || this.readError !== null || this.peerClosed || this.closed;
    }

    private wake(): void {
        for (const waiter of Array.from(this.waiters)) {
            waiter();
        }
    }
}

/**
 * A connected client on a fresh `MockTransport`, logging silenced.
 * `sent` is cleared after the handshake.
 */
export async function connectMockClient(
    config: ClientConfig = {},
    transport: MockTransport = new MockTransport()
): Promise<{ client: OOCSIClient; transport: MockTransport }> {
    const client = new OOCSIClient({
        handle: 'tester',
        logLevel: LogLevel.NONE,
        pollInterval: 10,
        ...config,
        transport: () => transport,
    });
    await client.connect();
    transport.clearSent();
    return { client, transport };
}

/** An inbound event line as the server frames it. */
export function eventLine(sender: string, recipient: string, payload: Record<string, unknown> = {}, timestamp = 1700000000000): string {
    return `${JSON.stringify({ ...payload, sender, recipient, timestamp })}\n`;
}
