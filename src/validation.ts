import { z } from 'zod';
import { MessageError } from './errors';
import type { InboundEvent } from './types';

/**
 * Zod schema for inbound events. The envelope is checked, every other field
 * passes through untouched as payload.
 */
export const InboundEventSchema = z.object({
    sender: z.string(),
    recipient: z.string(),
    timestamp: z.coerce.number(),
}).passthrough();

/**
 * Parses and validates one JSON line received from the server.
 *
 * @param raw - Line text, without its newline
 * @throws {MessageError} If the line is not JSON or lacks the envelope
 */
export function parseEvent(raw: string): InboundEvent {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new MessageError(
            `Failed to parse message as JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
            raw
        );
    }

    const result = InboundEventSchema.safeParse(json);

    if (!result.success) {
        const errorMessages = result.error.issues
            .map(e => `${e.path.join('.')}: ${e.message}`)
            .join(', ');

        throw new MessageError(
            `Validation failed: ${errorMessages}`,
            raw
        );
    }

    return result.data;
}

/**
 * Safely truncates a string for logging/error messages.
 */
export function truncate(str: string, maxLength: number = 200): string {
    if (str.length <= maxLength) return str;
    return str.substring(0, maxLength) + `... (${str.length - maxLength} more chars)`;
}
