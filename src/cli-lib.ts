import cac from 'cac';
import { z } from 'zod';
import { version } from '../package.json';
import { OOCSIClient } from './client';
import { configFromEnv } from './config';
import { ClientError, ConfigurationError } from './errors';
import type { ClientConfig, EventPayload } from './types';

export interface GlobalOptions {
    host?: string;
    port?: number | string;
    handle?: string;
    debug?: boolean;
}

export interface CallOptions extends GlobalOptions {
    timeout?: number | string;
}

export interface CliDeps {
    connect?: (config: ClientConfig) => Promise<OOCSIClient>;
    env?: Record<string, string | undefined>;
    print?: (line: string) => void;
}

const PayloadSchema = z.record(z.unknown());

/** Parse a JSON object given on the command line. */
export function parsePayload(text: string | undefined): EventPayload {
    if (text === undefined) return {};

    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (error) {
        throw new ConfigurationError(`Payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const result = PayloadSchema.safeParse(json);
    if (!result.success) {
        throw new ConfigurationError('Payload must be a JSON object');
    }
    return result.data;
}

/** Command-line flags take precedence over `OOCSI_*` environment variables. */
export function toClientConfig(options: GlobalOptions, env: Record<string, string | undefined>): ClientConfig {
    const config = configFromEnv(env);
    if (options.host !== undefined) config.host = String(options.host);
    if (options.port !== undefined) config.port = Number(options.port);
    if (options.handle !== undefined) config.handle = String(options.handle);
    if (options.debug) config.debug = true;
    return config;
}

/** Subscribe to every channel and print each event as one JSON line until aborted. */
export async function listen(
    client: OOCSIClient,
    channels: string[],
    print: (line: string) => void,
    signal?: AbortSignal
): Promise<void> {
    for (const channel of channels) {
        client.subscribe(channel, (sender, recipient, event) => {
            print(JSON.stringify({ sender, recipient, event }));
        });
    }
    await client.run({ signal });
}

/** Call `name` on `channel` and return the response payload. */
export async function callOnce(
    client: OOCSIClient,
    channel: string,
    name: string,
    payload: EventPayload,
    timeoutMs: number
): Promise<EventPayload> {
    const call = await client.callAndWait(channel, name, payload, timeoutMs);
    if (!call.isFulfilled() || !call.response) {
        throw new ClientError(`No response to ${name} on ${channel} within ${timeoutMs}ms`);
    }
    return call.response;
}

async function connectOrFail(connect: (config: ClientConfig) => Promise<OOCSIClient>, config: ClientConfig): Promise<OOCSIClient> {
    const client = await connect(config);
    if (!client.isConnected()) {
        throw new ClientError(`Could not connect to ${config.host ?? 'localhost'}:${config.port ?? 4444}`);
    }
    return client;
}

export function createCLI(deps: CliDeps = {}) {
    const connect = deps.connect ?? ((config: ClientConfig) => OOCSIClient.create(config));
    const env = deps.env ?? process.env;
    const print = deps.print ?? ((line: string) => console.log(line));

    const cli = cac('oocsi-client');

    cli
        .option('--host <host>', 'Server host (env: OOCSI_HOST)')
        .option('--port <port>', 'Server port (env: OOCSI_PORT)')
        .option('--handle <handle>', 'Client handle, # for random digits (env: OOCSI_HANDLE)')
        .option('--debug', 'Enable debug logging (env: OOCSI_DEBUG)');

    cli
        .command('listen <...channels>', 'Print events from channels as JSON lines')
        .action(async (channels: string[], options: GlobalOptions) => {
            const client = await connectOrFail(connect, toClientConfig(options, env));
            const controller = new AbortController();
            const onSignal = () => controller.abort();
            process.once('SIGINT', onSignal);
            try {
                await listen(client, channels, print, controller.signal);
            } finally {
                process.off('SIGINT', onSignal);
                client.stop();
            }
        });

    cli
        .command('send <channel> <json>', 'Publish one event on a channel')
        .action(async (channel: string, json: string, options: GlobalOptions) => {
            const payload = parsePayload(json);
            const client = await connectOrFail(connect, toClientConfig(options, env));
            try {
                client.publish(channel, payload);
            } finally {
                client.stop();
            }
        });

    cli
        .command('call <channel> <name> [json]', 'Call a responder and print its response')
        .option('--timeout <ms>', 'Call timeout in ms', { default: 1000 })
        .action(async (channel: string, name: string, json: string | undefined, options: CallOptions) => {
            const payload = parsePayload(json);
            const timeout = Number(options.timeout ?? 1000);
            if (!Number.isFinite(timeout) || timeout <= 0) {
                throw new ConfigurationError(`Invalid timeout: ${String(options.timeout)}`);
            }
            const client = await connectOrFail(connect, toClientConfig(options, env));
            try {
                print(JSON.stringify(await callOnce(client, channel, name, payload, timeout)));
            } finally {
                client.stop();
            }
        });

    cli.help();
    cli.version(version);

    return cli;
}
