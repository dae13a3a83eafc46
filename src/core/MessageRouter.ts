/**
 * @file MessageRouter.ts
 * @brief The single parsing gateway for inbound protocol lines.
 *
 * Every line the framer yields enters here and leaves either as one member
 * of the `IncomingMessage` union or as `null` (discarded). The router never
 * touches state or invokes callbacks; the client acts on what it returns.
 */

import { CONTROL_FIELDS, ENVELOPE_FIELDS, MESSAGE_HANDLE, MESSAGE_ID, isJsonLine, isKeepAlive } from '../protocol';
import { parseEvent, truncate } from '../validation';
import { Logger } from '../utils/Logger';
import type { EventPayload, InboundEvent } from '../types';

// ============================================================================
// Discriminated union of everything a line can mean
// ============================================================================

/** `ping` or `.` from the server; answered with `.`, never dispatched. */
export interface KeepAliveMessage {
    type: 'keepalive';
}

/** A call addressed to one of this client's registered responders. */
export interface ServiceCallMessage {
    type: 'service';
    sender: string;
    recipient: string;
    name: string;
    callId?: string;
    payload: EventPayload;
}

/** A response to a call this client may have issued. */
export interface CallResponseMessage {
    type: 'response';
    sender: string;
    recipient: string;
    callId: string;
    payload: EventPayload;
}

/** A plain channel event. */
export interface BroadcastMessage {
    type: 'broadcast';
    sender: string;
    recipient: string;
    payload: EventPayload;
}

export type EventMessage = ServiceCallMessage | CallResponseMessage | BroadcastMessage;

export type IncomingMessage = KeepAliveMessage | EventMessage;

/** What the router needs to know about registered responders. */
export interface ServiceLookup {
    has(name: string): boolean;
}

// ============================================================================
// Router
// ============================================================================

export class MessageRouter {
    constructor(
        private readonly services: ServiceLookup,
        private readonly logger: Logger = new Logger('oocsi:router')
    ) { }

    /**
     * Turn one protocol line into a typed message.
     * Returns null for anything that is neither a keep-alive nor a valid event.
     */
    route(line: string): IncomingMessage | null {
        if (isKeepAlive(line)) {
            return { type: 'keepalive' };
        }

        if (!isJsonLine(line)) {
            this.logger.debug(`Discarding line: ${truncate(line, 80)}`);
            return null;
        }

        let event: InboundEvent;
        try {
            event = parseEvent(line);
        } catch (err) {
            this.logger.debug(`Discarding malformed event: ${err instanceof Error ? err.message : String(err)}`);
            return null;
        }

        return this.classify(event);
    }

    /**
     * Classify a decoded event. Control fields are removed from the payload in
     * every case; a `_MESSAGE_HANDLE` naming an unknown responder falls
     * through to the `_MESSAGE_ID` check.
     */
    classify(event: InboundEvent): EventMessage {
        const { sender, recipient } = event;
        const payload = stripFields(event);

        const handle = event[MESSAGE_HANDLE];
        const id = event[MESSAGE_ID];

        if (typeof handle === 'string' && this.services.has(handle)) {
            return {
                type: 'service',
                sender,
                recipient,
                name: handle,
                callId: id === undefined ? undefined : String(id),
                payload,
            };
        }

        if (id !== undefined) {
            return { type: 'response', sender, recipient, callId: String(id), payload };
        }

        return { type: 'broadcast', sender, recipient, payload };
    }
}

const STRIPPED: ReadonlySet<string> = new Set<string>([...ENVELOPE_FIELDS, ...CONTROL_FIELDS]);

function stripFields(event: InboundEvent): EventPayload {
    const payload: EventPayload = {};
    for (const [key, value] of Object.entries(event)) {
        if (!STRIPPED.has(key)) {
            payload[key] = value;
        }
    }
    return payload;
}
