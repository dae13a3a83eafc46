import { z } from 'zod';
import { ConfigurationError } from './errors';
import { LogLevel } from './utils/Logger';
import type { ClientConfig, EventCallback, TransportFactory } from './types';

/**
 * Zod schema for the plain-data part of `ClientConfig`. Function-valued
 * options (callback, transport, clock) are carried over unchecked.
 */
const ClientConfigSchema = z.object({
    handle: z.string().optional(),
    host: z.string().min(1).default('localhost'),
    port: z.number().int().min(1).max(65535).default(4444),
    debug: z.boolean().default(false),
    logLevel: z.nativeEnum(LogLevel).optional(),
    logJson: z.boolean().default(false),
    chunkSize: z.number().int().positive().default(1024),
    handshakeTimeout: z.number().int().positive().default(5000),
    connectTimeout: z.number().int().nonnegative().default(5000),
    pollInterval: z.number().int().nonnegative().default(100),
    bufferPartialLines: z.boolean().default(true),
    maxLineLength: z.number().int().positive().default(65536),
    autoReconnect: z.boolean().default(false),
    reconnectDelay: z.number().int().nonnegative().default(1000),
    maxReconnectAttempts: z.number().int().nonnegative().default(5),
});

export type ResolvedConfig = z.infer<typeof ClientConfigSchema> & {
    callback?: EventCallback;
    transport?: TransportFactory;
    clock: () => number;
};

/**
 * Validates a client config at the gate and fills in defaults.
 * @throws {ConfigurationError} on any invalid value
 */
export function resolveConfig(config: ClientConfig = {}): ResolvedConfig {
    const result = ClientConfigSchema.safeParse(config);
    if (!result.success) {
        const issues = result.error.issues
            .map(e => `${e.path.join('.')}: ${e.message}`)
            .join(', ');
        throw new ConfigurationError(`Invalid client config: ${issues}`);
    }

    const handle = result.data.handle;
    if (handle !== undefined && handle.trim().length > 0 && /\s/.test(handle)) {
        throw new ConfigurationError(`Invalid client config: handle must not contain whitespace`);
    }

    return {
        ...result.data,
        callback: config.callback,
        transport: config.transport,
        clock: config.clock ?? Date.now,
    };
}

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

const EnvSchema = z.object({
    OOCSI_HOST: z.string().min(1).optional(),
    OOCSI_PORT: z.coerce.number().int().min(1).max(65535).optional(),
    OOCSI_HANDLE: z.string().min(1).optional(),
    OOCSI_DEBUG: z.string().optional(),
});

/**
 * Reads `OOCSI_HOST`, `OOCSI_PORT`, `OOCSI_HANDLE` and `OOCSI_DEBUG`.
 * Unset variables are left out of the result.
 */
export function configFromEnv(env: Record<string, string | undefined>): ClientConfig {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        const issues = result.error.issues
            .map(e => `${e.path.join('.')}: ${e.message}`)
            .join(', ');
        throw new ConfigurationError(`Invalid environment: ${issues}`);
    }

    const config: ClientConfig = {};
    const { OOCSI_HOST, OOCSI_PORT, OOCSI_HANDLE, OOCSI_DEBUG } = result.data;
    if (OOCSI_HOST !== undefined) config.host = OOCSI_HOST;
    if (OOCSI_PORT !== undefined) config.port = OOCSI_PORT;
    if (OOCSI_HANDLE !== undefined) config.handle = OOCSI_HANDLE;
    if (OOCSI_DEBUG !== undefined) config.debug = TRUTHY.has(OOCSI_DEBUG.toLowerCase());
    return config;
}
