/**
 * OOCSI client - Protocol Layer
 *
 * Newline-delimited UTF-8 text commands. Everything the client writes goes
 * through one of the encoders below.
 */

import { ClientError } from './errors';
import type { EventPayload } from './types';

// =============================================================================
// Wire constants
// =============================================================================

/** Keep-alive reply (and one of the two keep-alive forms the server sends). */
export const KEEPALIVE = '.';
export const PING = 'ping';
export const QUIT = 'quit';

/** Identifies a service call; holds the call name. */
export const MESSAGE_HANDLE = '_MESSAGE_HANDLE';
/** Correlates a call with its response. */
export const MESSAGE_ID = '_MESSAGE_ID';

/** Envelope fields removed before a payload reaches user code. */
export const ENVELOPE_FIELDS = ['sender', 'recipient', 'timestamp', 'data'] as const;
export const CONTROL_FIELDS = [MESSAGE_HANDLE, MESSAGE_ID] as const;

/** Channel that device descriptors are announced on. */
export const DEVICE_CHANNEL = 'heyOOCSI!';

// =============================================================================
// Encoder
// =============================================================================

/** Handshake line: `<handle>(JSON)`, asking the server for JSON events. */
export function encodeHandshake(handle: string): string {
    return frame(`${handle}(JSON)`);
}

export function encodeSubscribe(channel: string): string {
    return frame(`subscribe ${assertChannelName(channel)}`);
}

export function encodeUnsubscribe(channel: string): string {
    return frame(`unsubscribe ${assertChannelName(channel)}`);
}

/** `sendraw <channel> <json>` */
export function encodePublish(channel: string, payload: EventPayload): string {
    return frame(`sendraw ${assertChannelName(channel)} ${JSON.stringify(payload)}`);
}

export function encodeKeepAlive(): string {
    return frame(KEEPALIVE);
}

export function encodeQuit(): string {
    return frame(QUIT);
}

export function frame(command: string): string {
    return `${command}\n`;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Channel names travel as a single space-separated token, so they cannot be
 * empty or contain whitespace.
 */
export function assertChannelName(channel: string): string {
    if (channel.length === 0 || /\s/.test(channel)) {
        throw new ClientError(`Invalid channel name: ${JSON.stringify(channel)}`);
    }
    return channel;
}

/** Server keep-alive lines start with `ping` or `.`. */
export function isKeepAlive(line: string): boolean {
    return line.startsWith(PING) || line.startsWith(KEEPALIVE);
}

export function isJsonLine(line: string): boolean {
    return line.startsWith('{');
}
