/**
 * oocsi-client - TypeScript client for the OOCSI messaging protocol
 *
 * Publish to channels, subscribe with callbacks, make calls and answer them.
 *
 * @example
 * ```typescript
 * import { OOCSIClient } from 'oocsi-client';
 *
 * const client = await OOCSIClient.create({ handle: 'sensor_##', host: 'localhost' });
 * client.subscribe('lights', (sender, recipient, event) => console.log(sender, event));
 * client.publish('lights', { on: true });
 * await client.run();
 * ```
 *
 * @packageDocumentation
 */

export { OOCSIClient, DEFAULT_CALL_TIMEOUT } from './client';
export type { RunOptions } from './client';

// Types
export type {
    ClientConfig,
    ClientEvents,
    ConnectionStatus,
    ChannelClient,
    EventPayload,
    InboundEvent,
    EventCallback,
    EventHandler,
    EventReceiver,
    Responder,
    ResponderFunction,
    CallResponder,
    TransportFactory,
} from './types';

// Errors
export {
    OOCSIError,
    ConfigurationError,
    ConnectionError,
    HandshakeError,
    MessageError,
    ClientError,
} from './errors';

// Configuration
export { resolveConfig, configFromEnv } from './config';
export type { ResolvedConfig } from './config';

// Protocol engine
export { PendingCall } from './core/PendingCall';
export type { PendingCallStatus } from './core/PendingCall';
export { CallRegistry } from './core/CallRegistry';
export { SubscriptionRegistry } from './core/SubscriptionRegistry';
export { ServiceRegistry } from './core/ServiceRegistry';
export { MessageRouter } from './core/MessageRouter';
export type { IncomingMessage, EventMessage } from './core/MessageRouter';
export { LineFramer } from './core/LineFramer';
export * as protocol from './protocol';
export { parseEvent } from './validation';

// Transport
export type { Transport } from './transport/Transport';
export { TcpTransport } from './transport/TcpTransport';
export type { TcpTransportConfig } from './transport/TcpTransport';

// Extensions
export { Variable } from './extensions/Variable';
export { DeviceDescriptor } from './extensions/DeviceDescriptor';
export type { DeviceDescription, DeviceComponent, LedType, Spectrum } from './extensions/DeviceDescriptor';

// Logging
export { Logger, LogLevel } from './utils/Logger';
export { resolveHandle, generateCallId } from './utils/identity';
