/**
 * Duplex byte stream between the client and the server.
 *
 * The client is the single reader. Reads never block: data that arrived is
 * handed out in chunks, and `waitReadable` is the only suspension point.
 */
export interface Transport {
    /** Open the stream to `host:port`. Rejects with a `ConnectionError`. */
    open(host: string, port: number): Promise<void>;

    /** Write UTF-8 text. Throws a `ConnectionError` when the stream is unusable. */
    write(data: string): void;

    /**
     * Take up to `maxBytes` of received data.
     *
     * @returns `null` when nothing is buffered yet (the read would block),
     * an empty array once the peer has closed and everything was consumed.
     * @throws ConnectionError after a socket error.
     */
    read(maxBytes: number): Uint8Array | null;

    /**
     * Resolves `true` as soon as `read` would return something other than
     * `null`, or `false` after `timeoutMs`.
     */
    waitReadable(timeoutMs: number): Promise<boolean>;

    close(): void;

    isOpen(): boolean;
}
