/**
 * Error types for the OOCSI client.
 *
 * Every error carries a stable `code`, so consumers can branch on the
 * failure mode without string-matching messages.
 */

/**
 * Base class for all OOCSI errors.
 */
export class OOCSIError extends Error {
    constructor(message: string, public readonly code: string) {
        super(message);
        this.name = 'OOCSIError';
        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, OOCSIError);
        }
    }
}

/**
 * Thrown when configuration is invalid.
 */
export class ConfigurationError extends OOCSIError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}

/**
 * Raised when the transport cannot be opened, fails mid-stream, or the
 * handshake does not complete in time.
 */
export class ConnectionError extends OOCSIError {
    constructor(
        message: string,
        public readonly cause?: Error,
        public readonly isRetryable: boolean = true
    ) {
        super(message, 'CONNECTION_ERROR');
        this.name = 'ConnectionError';
    }
}

/**
 * The server answered the handshake with an `error` line, usually because
 * the handle is already taken. Not retryable.
 */
export class HandshakeError extends OOCSIError {
    constructor(public readonly response: string) {
        super(`Handshake rejected: ${response}`, 'HANDSHAKE_ERROR');
        this.name = 'HandshakeError';
    }
}

/**
 * Thrown when an inbound line fails to parse or validate.
 */
export class MessageError extends OOCSIError {
    constructor(
        message: string,
        public readonly rawMessage?: string
    ) {
        super(message, 'MESSAGE_ERROR');
        this.name = 'MessageError';
    }
}

/**
 * Thrown on client misuse, such as unsubscribing from a channel that was
 * never subscribed or using a channel name with whitespace in it.
 */
export class ClientError extends OOCSIError {
    constructor(message: string) {
        super(message, 'CLIENT_ERROR');
        this.name = 'ClientError';
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
