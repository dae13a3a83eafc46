/**
 * OOCSI client
 *
 * One instance owns one connection: the transport, the three registries
 * (subscriptions, pending calls, responders) and the connection status.
 * Inbound data is processed only when the host drives the client, either by
 * calling `pump()` from its own loop or by awaiting `pumpAsync()` / `run()`.
 */

import { setTimeout as sleep } from 'timers/promises';
import { resolveConfig } from './config';
import type { ResolvedConfig } from './config';
import { ClientError, ConnectionError, HandshakeError, toError } from './errors';
import {
    MESSAGE_HANDLE,
    MESSAGE_ID,
    assertChannelName,
    encodeHandshake,
    encodeKeepAlive,
    encodePublish,
    encodeQuit,
    encodeSubscribe,
    encodeUnsubscribe,
} from './protocol';
import { CallRegistry } from './core/CallRegistry';
import { LineFramer } from './core/LineFramer';
import { MessageRouter } from './core/MessageRouter';
import type { CallResponseMessage, ServiceCallMessage } from './core/MessageRouter';
import type { PendingCall } from './core/PendingCall';
import { ServiceRegistry } from './core/ServiceRegistry';
import { SubscriptionRegistry } from './core/SubscriptionRegistry';
import { DeviceDescriptor } from './extensions/DeviceDescriptor';
import { Variable } from './extensions/Variable';
import { TcpTransport } from './transport/TcpTransport';
import type { Transport } from './transport/Transport';
import { EventEmitter } from './utils/EventEmitter';
import { resolveHandle } from './utils/identity';
import { Logger } from './utils/Logger';
import { truncate } from './validation';
import type {
    ClientConfig,
    ClientEvents,
    ConnectionStatus,
    EventCallback,
    EventPayload,
    Responder,
} from './types';

export const DEFAULT_CALL_TIMEOUT = 1000;

export interface RunOptions {
    /** Stops the loop after the current step. */
    signal?: AbortSignal;
}

export class OOCSIClient {
    private readonly config: ResolvedConfig;
    private readonly handle: string;
    private readonly logger: Logger;
    private readonly emitter = new EventEmitter<ClientEvents>();
    private readonly subscriptions = new SubscriptionRegistry();
    private readonly services = new ServiceRegistry();
    private readonly calls: CallRegistry;
    private readonly router: MessageRouter;
    private readonly framer: LineFramer;

    private transport: Transport | null = null;
    private status: ConnectionStatus = 'disconnected';
    /** Lines decoded but not yet dispatched, in arrival order. */
    private inbox: string[] = [];
    private connecting: Promise<ConnectionStatus> | null = null;
    /** Cleared when the server rejects the handle. */
    private reconnectEnabled = true;
    private stopped = false;
    private reconnectAttempts = 0;
    private reconnectTimer: ReturnType<typeof setTimeout> | null = null;

    constructor(config: ClientConfig = {}) {
        this.config = resolveConfig(config);
        this.handle = resolveHandle(this.config.handle);

        this.logger = new Logger(this.handle, this.config.debug);
        if (this.config.logLevel !== undefined) {
            this.logger.setLogLevel(this.config.logLevel);
        }
        this.logger.setJson(this.config.logJson);

        this.calls = new CallRegistry(this.config.clock);
        this.router = new MessageRouter(this.services, this.logger.child('router'));
        this.framer = new LineFramer({
            buffered: this.config.bufferPartialLines,
            maxLineLength: this.config.maxLineLength,
            logger: this.logger.child('framer'),
        });

        // The handle channel is always subscribed, with or without a callback
        this.subscriptions.add(this.handle, this.config.callback);
    }

    /** Construct a client and wait for its first connection attempt to finish. */
    static async create(config: ClientConfig = {}): Promise<OOCSIClient> {
        const client = new OOCSIClient(config);
        await client.connect();
        return client;
    }

    // ---------------------------------------------------------------------------
    // Connection lifecycle
    // ---------------------------------------------------------------------------

    /**
     * Open the transport and perform the handshake.
     *
     * Never rejects: failures are logged, emitted as `error` events and leave
     * the client `disconnected`. Resolves with the resulting status.
     */
    connect(): Promise<ConnectionStatus> {
        if (this.connecting) return this.connecting;
        if (this.status === 'connected') return Promise.resolve(this.status);

        this.stopped = false;
        this.connecting = this.establish().finally(() => {
            this.connecting = null;
        });
        return this.connecting;
    }

    /**
     * Send `quit`, close the transport and stay disconnected. Pending calls
     * are not cancelled; they expire on their own.
     */
    stop(): void {
        this.stopped = true;
        this.clearReconnectTimer();

        const transport = this.transport;
        if (transport && this.status === 'connected') {
            try {
                transport.write(encodeQuit());
            } catch (err) {
                this.logger.debug(`quit not sent: ${toError(err).message}`);
            }
        }
        this.teardown();
        this.setStatus('disconnected');
        this.logger.debug('stopped');
    }

    getHandle(): string {
        return this.handle;
    }

    getStatus(): ConnectionStatus {
        return this.status;
    }

    isConnected(): boolean {
        return this.status === 'connected' && this.transport !== null;
    }

    on<K extends keyof ClientEvents>(event: K, handler: (...args: ClientEvents[K]) => void): () => void {
        return this.emitter.on(event, handler);
    }

    getLogger(): Logger {
        return this.logger;
    }

    /** Channels that are (re)subscribed on every handshake. */
    getSubscriptions(): string[] {
        return this.subscriptions.channels();
    }

    // ---------------------------------------------------------------------------
    // Receiving
    // ---------------------------------------------------------------------------

    /**
     * Synchronous polling step: dispatch queued lines, then read at most one
     * chunk from the transport and dispatch the lines it completes.
     *
     * Transport failures never escape; they disconnect the client. An error
     * thrown by a subscriber or responder propagates, and the lines after the
     * failing one are dispatched by the next call.
     */
    pump(): void {
        if (!this.isConnected()) return;

        this.expireOverdueCalls();
        this.drainInbox();

        const chunk = this.readChunk();
        if (!chunk) return;

        this.inbox.push(...this.framer.push(chunk));
        this.drainInbox();
    }

    /**
     * Cooperative polling step: wait up to `timeoutMs` for data, then `pump()`.
     */
    async pumpAsync(timeoutMs: number = this.config.pollInterval): Promise<void> {
        const transport = this.transport;
        if (!transport || this.status !== 'connected') return;

        if (this.inbox.length === 0) {
            await transport.waitReadable(timeoutMs);
        }
        this.pump();
    }

    /**
     * Pump until stopped, aborted, or disconnected with no reconnect pending.
     * Callback errors are logged and emitted as `error` events; the loop
     * carries on with the next line.
     */
    async run(options: RunOptions = {}): Promise<void> {
        const { signal } = options;

        while (!signal?.aborted && !this.stopped) {
            if (!this.isConnected()) {
                if (!this.isReconnecting()) break;
                await sleep(Math.max(this.config.pollInterval, 10));
                continue;
            }

            try {
                await this.pumpAsync();
            } catch (err) {
                const error = toError(err);
                this.logger.error(`Error in dispatch: ${error.message}`);
                this.emitter.emit('error', error);
            }
        }
    }

    // ---------------------------------------------------------------------------
    // Sending
    // ---------------------------------------------------------------------------

    /** Publish `payload` on `channel`. Dropped when not connected. */
    publish(channel: string, payload: EventPayload = {}): void {
        this.write(encodePublish(channel, payload));
    }

    /** Alias of `publish`. */
    send(channel: string, payload: EventPayload = {}): void {
        this.publish(channel, payload);
    }

    /**
     * Add `callback` to `channel` and subscribe upstream. The local entry is
     * in place before the server acknowledges anything.
     */
    subscribe(channel: string, callback: EventCallback): void {
        assertChannelName(channel);
        this.subscriptions.add(channel, callback);
        this.write(encodeSubscribe(channel));
        this.logger.info(`subscribed to ${channel}`);
    }

    /**
     * Drop every callback of `channel` and unsubscribe upstream.
     * @throws {ClientError} when the channel was never subscribed
     */
    unsubscribe(channel: string): void {
        if (!this.subscriptions.remove(channel)) {
            throw new ClientError(`Not subscribed to ${channel}`);
        }
        this.write(encodeUnsubscribe(channel));
        this.logger.info(`unsubscribed from ${channel}`);
    }

    /**
     * Issue a call without waiting. The returned handle becomes fulfilled
     * when a response arrives in time, expired otherwise.
     */
    call(channel: string, name: string, payload: EventPayload = {}, timeoutMs: number = DEFAULT_CALL_TIMEOUT): PendingCall {
        assertChannelName(channel);
        if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
            throw new ClientError(`Invalid call timeout: ${timeoutMs}`);
        }
        const call = this.calls.create(channel, name, timeoutMs);
        this.publish(channel, { ...payload, [MESSAGE_HANDLE]: name, [MESSAGE_ID]: call.id });
        return call;
    }

    /**
     * Issue a call and pump the connection until it is fulfilled or its
     * deadline passes. While a reconnect is pending the wait goes on; once
     * the client is disconnected for good the call is expired at once. The
     * call is returned either way; check `isFulfilled()`.
     */
    async callAndWait(
        channel: string,
        name: string,
        payload: EventPayload = {},
        timeoutMs: number = DEFAULT_CALL_TIMEOUT
    ): Promise<PendingCall> {
        const call = this.call(channel, name, payload, timeoutMs);

        while (call.isPending()) {
            const remaining = call.deadline - this.config.clock();
            if (remaining <= 0) break;
            const step = this.config.pollInterval > 0 ? Math.min(remaining, this.config.pollInterval) : remaining;

            if (this.isConnected()) {
                await this.pumpAsync(step);
            } else if (this.isReconnecting()) {
                await sleep(Math.max(step, 1));
            } else {
                break;
            }
        }

        if (call.isPending()) {
            this.expireOverdueCalls();
        }
        if (call.isPending() && this.calls.expire(call.id)) {
            this.logger.debug(`Call ${call.name} (${call.id}) expired while disconnected`);
        }
        return call;
    }

    /**
     * Answer calls named `name`. Subscribes to `channel`, where the calls
     * arrive. One responder per name; the last registration wins.
     */
    register(channel: string, name: string, responder: Responder): void {
        assertChannelName(channel);
        this.services.register(name, responder);
        this.subscriptions.add(channel);
        this.write(encodeSubscribe(channel));
        this.logger.info(`registered responder on ${channel} for ${name}`);
    }

    // ---------------------------------------------------------------------------
    // Extensions
    // ---------------------------------------------------------------------------

    /** A numeric value on `key` of `channel`, with optional bounds and smoothing. */
    variable(channel: string, key: string): Variable {
        return new Variable(this, channel, key);
    }

    /** A device descriptor announced on `heyOOCSI!`. Named after the handle by default. */
    device(name: string = this.handle): DeviceDescriptor {
        return new DeviceDescriptor(this, name, this.logger.child('device'));
    }

    // ---------------------------------------------------------------------------
    // Private
    // ---------------------------------------------------------------------------

    private async establish(): Promise<ConnectionStatus> {
        this.clearReconnectTimer();
        this.teardown();
        this.setStatus('connecting');

        const { host, port } = this.config;
        this.logger.info(`connecting to ${host} port ${port}`);

        const transport = this.config.transport
            ? this.config.transport()
            : new TcpTransport({ connectTimeout: this.config.connectTimeout });
        this.transport = transport;

        try {
            await transport.open(host, port);
            if (this.transport !== transport) return this.status;

            transport.write(encodeHandshake(this.handle));
            const response = await this.readHandshakeResponse(transport);
            if (this.transport !== transport) return this.status;

            if (response.startsWith('{')) {
                this.logger.info('connection established');
                for (const channel of this.subscriptions.channels()) {
                    transport.write(encodeSubscribe(channel));
                }
                this.reconnectAttempts = 0;
                this.reconnectEnabled = true;
                this.setStatus('connected');
                return this.status;
            }

            this.teardown();
            this.setStatus('disconnected');

            if (response.startsWith('error')) {
                this.logger.error(response);
                this.reconnectEnabled = false;
                this.emitter.emit('error', new HandshakeError(response));
            } else {
                this.logger.warn(`Unexpected handshake response: ${truncate(response, 80)}`);
                this.emitter.emit('error', new ConnectionError(`Unexpected handshake response: ${truncate(response, 80)}`));
                this.scheduleReconnect();
            }
        } catch (err) {
            if (this.transport !== transport) return this.status;
            const error = toError(err);
            this.logger.warn(`connection failed: ${error.message}`);
            this.teardown();
            this.setStatus('disconnected');
            this.emitter.emit('error', error);
            this.scheduleReconnect();
        }

        return this.status;
    }

    /**
     * Wait for the first complete line. Lines that arrive with it are queued
     * for the first `pump()`.
     */
    private async readHandshakeResponse(transport: Transport): Promise<string> {
        const deadline = this.config.clock() + this.config.handshakeTimeout;

        for (; ;) {
            const remaining = deadline - this.config.clock();
            if (remaining <= 0 || !(await transport.waitReadable(remaining))) {
                throw new ConnectionError(`No handshake response within ${this.config.handshakeTimeout}ms`);
            }

            const chunk = transport.read(this.config.chunkSize);
            if (chunk === null) continue;
            if (chunk.length === 0) {
                throw new ConnectionError('Connection closed during handshake');
            }

            const [first, ...rest] = this.framer.push(chunk);
            if (first !== undefined) {
                this.inbox.push(...rest);
                return first;
            }
        }
    }

    /** One chunk from the transport, or null when there is nothing to dispatch. */
    private readChunk(): Uint8Array | null {
        const transport = this.transport;
        if (!transport || this.status !== 'connected') return null;

        let chunk: Uint8Array | null;
        try {
            chunk = transport.read(this.config.chunkSize);
        } catch (err) {
            this.handleTransportFailure(toError(err));
            return null;
        }

        if (chunk === null) return null;
        if (chunk.length === 0) {
            this.handleTransportFailure(new ConnectionError('Connection closed by server'));
            return null;
        }
        return chunk;
    }

    private drainInbox(): void {
        while (this.status === 'connected') {
            const line = this.inbox.shift();
            if (line === undefined) return;
            this.dispatch(line);
        }
    }

    private dispatch(line: string): void {
        const message = this.router.route(line);
        if (!message) return;

        switch (message.type) {
            case 'keepalive':
                this.write(encodeKeepAlive());
                return;
            case 'service':
                this.answerCall(message);
                return;
            case 'response':
                this.settleCall(message);
                return;
            case 'broadcast':
                this.subscriptions.deliver(message.sender, message.recipient, message.payload);
                return;
        }
    }

    /**
     * Run the responder, reply to the sender with the call id attached, then
     * hand the request to the subscribers of the channel it arrived on.
     */
    private answerCall(message: ServiceCallMessage): void {
        const reply = this.services.respond(message.name, { ...message.payload });
        if (reply) {
            const response = message.callId === undefined ? reply : { ...reply, [MESSAGE_ID]: message.callId };
            this.publish(message.sender, response);
        }
        this.subscriptions.deliver(message.sender, message.recipient, message.payload);
    }

    private settleCall(message: CallResponseMessage): void {
        const outcome = this.calls.settle(message.callId, message.payload);
        if (outcome === 'expired') {
            this.logger.debug(`Dropping late response for call ${message.callId}`);
        } else if (outcome === 'unknown') {
            this.logger.debug(`Dropping response for unknown call ${message.callId}`);
        }
    }

    private expireOverdueCalls(): void {
        for (const call of this.calls.sweep()) {
            this.logger.debug(`Call ${call.name} (${call.id}) expired`);
        }
    }

    private write(line: string): boolean {
        const transport = this.transport;
        if (!transport || this.status !== 'connected') {
            this.logger.debug(`Not connected, dropping: ${truncate(line.trimEnd(), 80)}`);
            return false;
        }

        try {
            transport.write(line);
            return true;
        } catch (err) {
            this.handleTransportFailure(toError(err));
            return false;
        }
    }

    private handleTransportFailure(error: Error): void {
        if (!this.transport) return;

        this.logger.warn(error.message);
        this.teardown();
        this.setStatus('disconnected');
        this.emitter.emit('error', error);
        this.scheduleReconnect();
    }

    private teardown(): void {
        const transport = this.transport;
        this.transport = null;
        this.inbox = [];
        this.framer.reset();
        transport?.close();
    }

    private isReconnecting(): boolean {
        return this.reconnectTimer !== null || this.connecting !== null;
    }

    /** Fixed-delay reconnect; only with `autoReconnect`, never after `stop()` or a rejected handle. */
    private scheduleReconnect(): void {
        if (!this.config.autoReconnect || !this.reconnectEnabled || this.stopped || this.reconnectTimer) return;

        if (this.reconnectAttempts >= this.config.maxReconnectAttempts) {
            this.logger.warn(`Giving up after ${this.reconnectAttempts} reconnect attempts`);
            return;
        }

        this.reconnectAttempts++;
        const delay = this.config.reconnectDelay;
        this.logger.conn(`Reconnecting in ${delay}ms (attempt ${this.reconnectAttempts})`);

        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null;
            if (this.stopped) return;
            this.connect().catch((err: unknown) => {
                this.logger.error(`Reconnect failed: ${toError(err).message}`);
            });
        }, delay);
    }

    private clearReconnectTimer(): void {
        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer);
            this.reconnectTimer = null;
        }
    }

    private setStatus(status: ConnectionStatus): void {
        if (this.status === status) return;
        this.status = status;
        this.emitter.emit('status', status);
    }
}
