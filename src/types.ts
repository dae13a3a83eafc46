/**
 * OOCSI client - Type Definitions
 *
 * Configuration, connection state, events and the callback capabilities
 * accepted by the client.
 */

import type { LogLevel } from './utils/Logger';
import type { Transport } from './transport/Transport';

// =============================================================================
// Events
// =============================================================================

/** Payload of an event after `sender`, `recipient`, `timestamp` and control fields are removed. */
export type EventPayload = Record<string, unknown>;

/** A decoded inbound event as it appears on the wire. */
export interface InboundEvent extends EventPayload {
    sender: string;
    recipient: string;
    timestamp: number;
}

/** Capability interface for channel subscribers. */
export interface EventReceiver {
    invoke(sender: string, recipient: string, event: EventPayload): void;
}

export type EventHandler = (sender: string, recipient: string, event: EventPayload) => void;

/** A subscriber: either a plain function or any object implementing `EventReceiver`. */
export type EventCallback = EventHandler | EventReceiver;

/** Capability interface for call responders. */
export interface CallResponder {
    respond(request: EventPayload): EventPayload | void;
}

/**
 * Handles a call addressed to this client. Returning nothing replies with the
 * (possibly mutated) request object.
 */
export type ResponderFunction = (request: EventPayload) => EventPayload | void;

export type Responder = ResponderFunction | CallResponder;

/** The publish/subscribe surface that the extension modules build on. */
export interface ChannelClient {
    publish(channel: string, payload: EventPayload): void;
    subscribe(channel: string, callback: EventCallback): void;
    getHandle(): string;
}

// =============================================================================
// Connection State
// =============================================================================

export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected';

/** Events emitted by the client */
export interface ClientEvents {
    status: [status: ConnectionStatus];
    error: [error: Error];
}

// =============================================================================
// Configuration
// =============================================================================

export type TransportFactory = () => Transport;

/** Configuration for `OOCSIClient` */
export interface ClientConfig {
    /** Client handle; every `#` becomes a random digit. Defaults to `OOCSIClient_####`. */
    handle?: string;
    /** Server hostname (default: localhost) */
    host?: string;
    /** Server port (default: 4444) */
    port?: number;
    /** Subscriber for events addressed to this client's handle. */
    callback?: EventCallback;
    /** Enable debug logging */
    debug?: boolean;
    logLevel?: LogLevel;
    /** Write log lines as JSON objects (default: false) */
    logJson?: boolean;
    /** Maximum bytes taken from the transport per `pump()` (default: 1024) */
    chunkSize?: number;
    /** How long `connect()` waits for the handshake reply in ms (default: 5000) */
    handshakeTimeout?: number;
    /** How long opening the socket may take in ms (default: 5000) */
    connectTimeout?: number;
    /** Readability wait per cooperative step in ms (default: 100) */
    pollInterval?: number;
    /** Carry partial lines across reads (default: true) */
    bufferPartialLines?: boolean;
    /** Longest line kept while waiting for its newline (default: 65536) */
    maxLineLength?: number;
    /** Reconnect after an unexpected disconnect (default: false) */
    autoReconnect?: boolean;
    /** Fixed delay between reconnect attempts in ms (default: 1000) */
    reconnectDelay?: number;
    /** Consecutive failed reconnects before giving up (default: 5) */
    maxReconnectAttempts?: number;
    /** Overrides the TCP transport, mainly for tests. */
    transport?: TransportFactory;
    /** Time source in ms, used for call deadlines (default: Date.now) */
    clock?: () => number;
}
