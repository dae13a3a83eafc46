/**
 * @file LineFramer.ts
 * @brief Splits the raw receive stream into newline-terminated protocol lines.
 *
 * In buffered mode the bytes after the last newline of a chunk are kept and
 * prefixed to the next chunk, so a line split across two reads is delivered
 * whole. Splitting happens on bytes before decoding, so a multi-byte UTF-8
 * character cut by a chunk boundary survives too.
 *
 * Unbuffered mode decodes every chunk on its own and yields whatever the
 * chunk contains, partial trailing line included.
 */

import { Logger } from '../utils/Logger';

const NEWLINE = 0x0a;

export interface LineFramerOptions {
    /** Carry the unterminated tail of a chunk into the next one (default: true) */
    buffered?: boolean;
    /** Longest tail kept while waiting for its newline (default: 65536) */
    maxLineLength?: number;
    logger?: Logger;
}

export class LineFramer {
    private residual: Uint8Array = new Uint8Array(0);
    /** Set after an over-long tail was dropped; the rest of that line is skipped too. */
    private discarding = false;
    private readonly decoder = new TextDecoder('utf-8');
    private readonly buffered: boolean;
    private readonly maxLineLength: number;
    private readonly logger: Logger;

    constructor(options: LineFramerOptions = {}) {
        this.buffered = options.buffered ?? true;
        this.maxLineLength = options.maxLineLength ?? 65536;
        this.logger = options.logger ?? new Logger('oocsi:framer');
    }

    /**
     * Feed one chunk, get back the complete non-empty lines it finishes.
     */
    push(chunk: Uint8Array): string[] {
        if (!this.buffered) {
            return this.decoder.decode(chunk).split('\n').map(stripCarriageReturn).filter((line) => line.length > 0);
        }

        const data = this.residual.length > 0 ? concat(this.residual, chunk) : chunk;
        const lines: string[] = [];
        let start = 0;

        for (let i = 0; i < data.length; i++) {
            if (data[i] !== NEWLINE) continue;
            if (this.discarding) {
                this.discarding = false;
                start = i + 1;
                continue;
            }
            const line = stripCarriageReturn(this.decoder.decode(data.subarray(start, i)));
            if (line.length > 0) lines.push(line);
            start = i + 1;
        }

        const tail = data.subarray(start);
        if (this.discarding) {
            this.residual = new Uint8Array(0);
        } else if (tail.length > this.maxLineLength) {
            this.logger.warn(`Dropping ${tail.length} bytes without a newline (limit ${this.maxLineLength})`);
            this.residual = new Uint8Array(0);
            this.discarding = true;
        } else {
            this.residual = tail.slice();
        }

        return lines;
    }

    reset(): void {
        this.residual = new Uint8Array(0);
        this.discarding = false;
    }
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
    const out = new Uint8Array(a.length + b.length);
    out.set(a, 0);
    out.set(b, a.length);
    return out;
}

function stripCarriageReturn(line: string): string {
    return line.endsWith('\r') ? line.slice(0, -1) : line;
}
