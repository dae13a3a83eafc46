import { describe, it, expect, vi, afterEach } from 'vitest';
import { OOCSIClient } from '../src/client';
import { ClientError, ConnectionError, HandshakeError } from '../src/errors';
import { LogLevel } from '../src/utils/Logger';
import { MockTransport, connectMockClient, eventLine } from '../src/test-utils/mocks';
import type { ClientConfig, ConnectionStatus, EventPayload } from '../src/types';

function createClient(transport: MockTransport, config: ClientConfig = {}) {
    return new OOCSIClient({
        handle: 'tester',
        logLevel: LogLevel.NONE,
        pollInterval: 10,
        ...config,
        transport: () => transport,
    });
}

/** The JSON payload of a `sendraw <channel> <json>` line. */
function sentPayload(line: string): unknown {
    const json = line.slice(line.indexOf('{'));
    return JSON.parse(json);
}

describe('OOCSIClient', () => {
    let client: OOCSIClient | undefined;

    afterEach(() => {
        client?.stop();
        client = undefined;
    });

    describe('connect', () => {
        it('performs the handshake and replays subscriptions in order', async () => {
            const transport = new MockTransport();
            client = createClient(transport);
            client.subscribe('early', () => { });

            await expect(client.connect()).resolves.toBe('connected');

            expect(transport.host).toBe('localhost');
            expect(transport.port).toBe(4444);
            expect(transport.sent).toEqual([
                'tester(JSON)\n',
                'subscribe tester\n',
                'subscribe early\n',
            ]);
            expect(client.isConnected()).toBe(true);
        });

        it('emits status transitions', async () => {
            const transport = new MockTransport();
            client = createClient(transport);
            const statuses: ConnectionStatus[] = [];
            client.on('status', (status) => statuses.push(status));

            await client.connect();
            client.stop();

            expect(statuses).toEqual(['connecting', 'connected', 'disconnected']);
        });

        it('expands # in the handle', async () => {
            const transport = new MockTransport();
            client = createClient(transport, { handle: 'sensor_###' });

            expect(client.getHandle()).toMatch(/^sensor_\d{3}$/);
            await client.connect();
            expect(transport.sent[0]).toBe(`${client.getHandle()}(JSON)\n`);
        });

        it('stays disconnected when the server rejects the handle', async () => {
            const transport = new MockTransport({ handshakeReply: 'error (name already in use)\n' });
            client = createClient(transport);
            const errors: Error[] = [];
            client.on('error', (error) => errors.push(error));

            await expect(client.connect()).resolves.toBe('disconnected');

            expect(errors).toHaveLength(1);
            expect(errors[0]).toBeInstanceOf(HandshakeError);
            expect(errors[0].message).toBe('Handshake rejected: error (name already in use)');
            expect(transport.sent).toEqual(['tester(JSON)\n']);
            expect(transport.isClosed()).toBe(true);
        });

        it('gives up when no handshake reply arrives in time', async () => {
            const transport = new MockTransport({ handshakeReply: null });
            client = createClient(transport, { handshakeTimeout: 20 });
            const errors: Error[] = [];
            client.on('error', (error) => errors.push(error));

            await expect(client.connect()).resolves.toBe('disconnected');
            expect(errors[0].message).toBe('No handshake response within 20ms');
        });

        it('reports a failure to open the transport', async () => {
            const failure = new ConnectionError('Could not connect to localhost:4444');
            const transport = new MockTransport({ openError: failure });
            client = createClient(transport);
            const errors: Error[] = [];
            client.on('error', (error) => errors.push(error));

            await expect(client.connect()).resolves.toBe('disconnected');
            expect(errors).toEqual([failure]);
        });

        it('queues lines that arrive with the handshake reply', async () => {
            const handled = vi.fn();
            const transport = new MockTransport({
                handshakeReply: '{"status":"ok"}\n' + eventLine('alice', 'tester', { hello: 'world' }),
            });
            const { client: c } = await connectMockClient({ callback: handled }, transport);
            client = c;

            expect(handled).not.toHaveBeenCalled();
            client.pump();
            expect(handled).toHaveBeenCalledWith('alice', 'tester', { hello: 'world' });
        });

        it('create() connects before resolving', async () => {
            const transport = new MockTransport();
            client = await OOCSIClient.create({ handle: 'tester', logLevel: LogLevel.NONE, transport: () => transport });
            expect(client.getStatus()).toBe('connected');
        });
    });

    describe('receiving', () => {
        it('answers keep-alives with a dot', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;

            transport.receive('ping\n.\n');
            client.pump();

            expect(transport.sent).toEqual(['.\n', '.\n']);
        });

        it('delivers events to callbacks in subscription order, duplicates included', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;
            const order: string[] = [];
            const first = () => order.push('first');
            const second = () => order.push('second');

            client.subscribe('room', first);
            client.subscribe('room', second);
            client.subscribe('room', first);
            transport.receive(eventLine('alice', 'room', { n: 1 }));
            client.pump();

            expect(order).toEqual(['first', 'second', 'first']);
        });

        it('delivers what was published, without the envelope', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;
            const received: EventPayload[] = [];
            client.subscribe('room', (_sender, _recipient, event) => received.push(event));

            const payload = { color: 'blue', level: 3, tags: ['a', 'b'], nested: { on: true } };
            client.publish('room', payload);
            const echoed = sentPayload(transport.sent[transport.sent.length - 1]);
            expect(echoed).toEqual(payload);

            transport.receive(eventLine('tester', 'room', payload));
            client.pump();
            expect(received).toEqual([payload]);
        });

        it('delivers a minimal inbound event with the envelope removed', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;
            const handled = vi.fn();
            client.subscribe('channel', handled);

            client.publish('channel', { x: 1 });
            expect(transport.sent[transport.sent.length - 1]).toBe('sendraw channel {"x":1}\n');

            transport.receive('{"sender":"s","recipient":"channel","timestamp":0,"x":1}\n');
            client.pump();
            expect(handled).toHaveBeenCalledTimes(1);
            expect(handled).toHaveBeenCalledWith('s', 'channel', { x: 1 });
        });

        it('passes events to receiver objects', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;
            const receiver = { invoke: vi.fn() };
            client.subscribe('room', receiver);

            transport.receive(eventLine('alice', 'room', { n: 2 }));
            client.pump();

            expect(receiver.invoke).toHaveBeenCalledWith('alice', 'room', { n: 2 });
        });

        it('reassembles a line split across reads', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;
            const handled = vi.fn();
            client.subscribe('room', handled);

            transport.receive('{"sender":"alice","recip');
            client.pump();
            expect(handled).not.toHaveBeenCalled();

            transport.receive('ient":"room","timestamp":1,"n":3}\n');
            client.pump();
            expect(handled).toHaveBeenCalledWith('alice', 'room', { n: 3 });
        });

        it('drops split lines when partial-line buffering is off', async () => {
            const { client: c, transport } = await connectMockClient({ bufferPartialLines: false });
            client = c;
            const handled = vi.fn();
            client.subscribe('room', handled);

            transport.receive('{"sender":"alice","recip');
            client.pump();
            transport.receive('ient":"room","timestamp":1,"n":3}\n');
            client.pump();

            expect(handled).not.toHaveBeenCalled();
            expect(client.isConnected()).toBe(true);
        });

        it('ignores events for channels it is not subscribed to', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;
            const handled = vi.fn();
            client.subscribe('room', handled);

            transport.receive(eventLine('alice', 'hall', { n: 1 }) + 'garbage\n');
            client.pump();

            expect(handled).not.toHaveBeenCalled();
        });

        it('keeps the remaining lines queued when a callback throws', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;
            const seen: unknown[] = [];
            client.subscribe('room', (_s, _r, event) => {
                if (event.n === 1) throw new Error('boom');
                seen.push(event.n);
            });

            transport.receive(eventLine('alice', 'room', { n: 1 }) + eventLine('alice', 'room', { n: 2 }));
            expect(() => client?.pump()).toThrow('boom');
            expect(seen).toEqual([]);

            client.pump();
            expect(seen).toEqual([2]);
        });

        it('disconnects when the server closes the connection', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;
            const errors: Error[] = [];
            client.on('error', (error) => errors.push(error));

            transport.closeFromPeer();
            client.pump();

            expect(client.getStatus()).toBe('disconnected');
            expect(errors.map((e) => e.message)).toEqual(['Connection closed by server']);
            expect(transport.isClosed()).toBe(true);
        });

        it('dispatches nothing after the server closed the connection', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;
            const handled = vi.fn();
            client.subscribe('room', handled);

            transport.closeFromPeer();
            client.pump();
            transport.receive(eventLine('alice', 'room', { n: 1 }));
            client.pump();

            expect(handled).not.toHaveBeenCalled();
            expect(client.getStatus()).toBe('disconnected');
        });

        it('disconnects when the socket fails', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;
            const failure = new ConnectionError('Socket failed', new Error('ECONNRESET'));
            const errors: Error[] = [];
            client.on('error', (error) => errors.push(error));

            transport.failRead(failure);
            client.pump();

            expect(client.isConnected()).toBe(false);
            expect(errors).toEqual([failure]);
        });
    });

    describe('sending', () => {
        it('publish() and send() write sendraw lines', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;

            client.publish('lights', { on: true });
            client.send('lights', { on: false });

            expect(transport.sent).toEqual([
                'sendraw lights {"on":true}\n',
                'sendraw lights {"on":false}\n',
            ]);
        });

        it('drops messages while disconnected', async () => {
            const transport = new MockTransport();
            client = createClient(transport);

            client.publish('lights', { on: true });
            expect(transport.sent).toEqual([]);
        });

        it('disconnects when a write fails', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;
            const errors: Error[] = [];
            client.on('error', (error) => errors.push(error));

            transport.writeError = new ConnectionError('broken pipe');
            expect(() => client?.publish('lights', { on: true })).not.toThrow();

            expect(client.getStatus()).toBe('disconnected');
            expect(errors.map((e) => e.message)).toEqual(['broken pipe']);
        });

        it('unsubscribe() removes the channel and tells the server', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;
            const handled = vi.fn();
            client.subscribe('room', handled);
            transport.clearSent();

            client.unsubscribe('room');
            transport.receive(eventLine('alice', 'room', { n: 1 }));
            client.pump();

            expect(transport.sent).toEqual(['unsubscribe room\n']);
            expect(handled).not.toHaveBeenCalled();
            expect(client.getSubscriptions()).toEqual(['tester']);
        });

        it('unsubscribe() of an unknown channel throws', async () => {
            const { client: c } = await connectMockClient();
            client = c;
            expect(() => client?.unsubscribe('nowhere')).toThrow(ClientError);
            expect(() => client?.unsubscribe('nowhere')).toThrow('Not subscribed to nowhere');
        });

        it('rejects invalid channel names', async () => {
            const { client: c } = await connectMockClient();
            client = c;
            expect(() => client?.subscribe('two words', () => { })).toThrow(ClientError);
            expect(() => client?.publish('', {})).toThrow(ClientError);
        });

        it('announces devices on heyOOCSI!', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;

            client.device().submit();

            expect(transport.sent).toEqual([
                'sendraw heyOOCSI! {"tester":{"properties":{"device_id":"tester"},"components":{},"location":{}}}\n',
            ]);
        });
    });

    describe('responders', () => {
        it('replies to the caller and then delivers the request to subscribers', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;
            const seen: Array<[string, string, EventPayload]> = [];
            client.register('services', 'double', (request) => ({ result: Number(request.value) * 2 }));
            client.subscribe('services', (sender, recipient, event) => seen.push([sender, recipient, event]));
            transport.clearSent();

            transport.receive(eventLine('bob', 'services', { value: 21, _MESSAGE_HANDLE: 'double', _MESSAGE_ID: 'abc' }));
            client.pump();

            expect(transport.sent).toEqual(['sendraw bob {"result":42,"_MESSAGE_ID":"abc"}\n']);
            expect(seen).toEqual([['bob', 'services', { value: 21 }]]);
        });

        it('replies with the mutated request when the responder returns nothing', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;
            const seen: EventPayload[] = [];
            client.register('services', 'mark', (request) => {
                request.status = 'done';
            });
            client.subscribe('services', (_s, _r, event) => seen.push(event));
            transport.clearSent();

            transport.receive(eventLine('bob', 'services', { value: 1, _MESSAGE_HANDLE: 'mark', _MESSAGE_ID: 'm-1' }));
            client.pump();

            expect(transport.sent).toEqual(['sendraw bob {"value":1,"status":"done","_MESSAGE_ID":"m-1"}\n']);
            expect(seen).toEqual([{ value: 1 }]);
        });

        it('subscribes to the responder channel', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;

            client.register('services', 'double', () => ({}));

            expect(transport.sent).toEqual(['subscribe services\n']);
            expect(client.getSubscriptions()).toEqual(['tester', 'services']);
        });

        it('drops calls to names it does not answer', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;
            const handled = vi.fn();
            client.subscribe('services', handled);
            transport.clearSent();

            transport.receive(eventLine('bob', 'services', { _MESSAGE_HANDLE: 'triple', _MESSAGE_ID: 'zzz' }));
            client.pump();

            expect(transport.sent).toEqual([]);
            expect(handled).not.toHaveBeenCalled();
        });
    });

    describe('calls', () => {
        it('sends the call and fulfils it with a timely response', async () => {
            let now = 1000;
            const { client: c, transport } = await connectMockClient({ clock: () => now });
            client = c;

            const call = client.call('services', 'double', { value: 2 }, 500);
            expect(call.deadline).toBe(1500);
            expect(transport.sent).toEqual([
                `sendraw services {"value":2,"_MESSAGE_HANDLE":"double","_MESSAGE_ID":"${call.id}"}\n`,
            ]);

            now = 1200;
            transport.receive(eventLine('bob', 'tester', { result: 4, _MESSAGE_ID: call.id }));
            client.pump();

            expect(call.isFulfilled()).toBe(true);
            expect(call.response).toEqual({ result: 4 });
        });

        it('does not deliver responses to the handle subscriber', async () => {
            const handled = vi.fn();
            const { client: c, transport } = await connectMockClient({ callback: handled });
            client = c;

            const call = client.call('services', 'double', {}, 500);
            transport.receive(eventLine('bob', 'tester', { result: 4, _MESSAGE_ID: call.id }));
            client.pump();

            expect(call.isFulfilled()).toBe(true);
            expect(handled).not.toHaveBeenCalled();
        });

        it('expires a call whose response comes too late', async () => {
            let now = 1000;
            const { client: c, transport } = await connectMockClient({ clock: () => now });
            client = c;

            const call = client.call('services', 'double', {}, 500);
            now = 1500;
            transport.receive(eventLine('bob', 'tester', { result: 4, _MESSAGE_ID: call.id }));
            client.pump();

            expect(call.isExpired()).toBe(true);
            expect(call.response).toBeUndefined();
        });

        it('uses a 1000ms timeout by default', async () => {
            const { client: c } = await connectMockClient({ clock: () => 0 });
            client = c;
            expect(client.call('services', 'double').deadline).toBe(1000);
        });

        it('callAndWait() resolves once the response arrives', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;

            const pending = client.callAndWait('services', 'double', { value: 3 }, 1000);
            const request = sentPayload(transport.sent[0]);
            const id = typeof request === 'object' && request !== null && '_MESSAGE_ID' in request
                ? String(request._MESSAGE_ID)
                : '';
            transport.receive(eventLine('bob', 'tester', { result: 6, _MESSAGE_ID: id }));

            const call = await pending;
            expect(call.isFulfilled()).toBe(true);
            expect(call.response).toEqual({ result: 6 });
        });

        it('callAndWait() returns an expired call after the timeout', async () => {
            const { client: c } = await connectMockClient();
            client = c;

            const call = await client.callAndWait('services', 'double', {}, 30);

            expect(call.isExpired()).toBe(true);
        });

        it('callAndWait() expires the call at once when disconnected', async () => {
            const transport = new MockTransport();
            client = createClient(transport);

            const call = await client.callAndWait('services', 'double', {}, 5000);
            expect(call.isExpired()).toBe(true);
            expect(transport.sent).toEqual([]);
        });

        it('rejects a timeout that is negative or not finite', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;

            expect(() => c.call('services', 'double', {}, Number.NaN)).toThrow(new ClientError('Invalid call timeout: NaN'));
            expect(() => c.call('services', 'double', {}, Infinity)).toThrow('Invalid call timeout: Infinity');
            expect(() => c.call('services', 'double', {}, -1)).toThrow(ClientError);
            await expect(c.callAndWait('services', 'double', {}, Number.NaN)).rejects.toBeInstanceOf(ClientError);
            expect(transport.sent).toEqual([]);
        });

        it('accepts a zero timeout and expires the call on the next pump', async () => {
            const { client: c, transport } = await connectMockClient({ clock: () => 1000 });
            client = c;

            const call = c.call('services', 'double', {}, 0);
            expect(transport.sent).toHaveLength(1);
            c.pump();
            expect(call.isExpired()).toBe(true);
        });
    });

    describe('logging', () => {
        it('writes JSON log lines when logJson is set', () => {
            const info = vi.spyOn(console, 'info').mockImplementation(() => { });
            client = createClient(new MockTransport(), { logLevel: LogLevel.INFO, logJson: true });

            client.subscribe('room', () => { });

            expect(info).toHaveBeenCalledTimes(1);
            const entry: unknown = JSON.parse(String(info.mock.calls[0][0]));
            expect(entry).toMatchObject({ tag: 'tester', level: 'INFO', message: 'subscribed to room' });
            info.mockRestore();
        });

        it('writes tagged text lines by default', () => {
            const info = vi.spyOn(console, 'info').mockImplementation(() => { });
            client = createClient(new MockTransport(), { logLevel: LogLevel.INFO });

            client.subscribe('room', () => { });

            expect(info.mock.calls).toEqual([['[tester] subscribed to room']]);
            info.mockRestore();
        });
    });

    describe('stop', () => {
        it('sends quit and closes the transport', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;

            client.stop();

            expect(transport.sent).toEqual(['quit\n']);
            expect(transport.isClosed()).toBe(true);
            expect(client.getStatus()).toBe('disconnected');
        });

        it('does nothing on the wire when already disconnected', () => {
            const transport = new MockTransport();
            client = createClient(transport);
            client.stop();
            expect(transport.sent).toEqual([]);
        });

        it('ends run()', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;
            const stopping = client;
            client.subscribe('room', () => stopping.stop());

            transport.receive(eventLine('alice', 'room', {}));
            await client.run();

            expect(client.getStatus()).toBe('disconnected');
        });
    });

    describe('run', () => {
        it('reports callback errors and keeps going', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;
            const controller = new AbortController();
            const errors: string[] = [];
            const seen: unknown[] = [];
            client.on('error', (error) => errors.push(error.message));
            client.subscribe('room', (_s, _r, event) => {
                if (event.n === 1) throw new Error('boom');
                seen.push(event.n);
                controller.abort();
            });

            transport.receive(eventLine('alice', 'room', { n: 1 }) + eventLine('alice', 'room', { n: 2 }));
            await client.run({ signal: controller.signal });

            expect(errors).toEqual(['boom']);
            expect(seen).toEqual([2]);
            expect(client.isConnected()).toBe(true);
        });

        it('returns when the connection drops without auto-reconnect', async () => {
            const { client: c, transport } = await connectMockClient();
            client = c;

            transport.closeFromPeer();
            await client.run();

            expect(client.getStatus()).toBe('disconnected');
        });
    });
});
