import { randomUUID } from 'crypto';

export const DEFAULT_HANDLE = 'OOCSIClient_####';

/**
 * Resolves a handle template: each `#` becomes a random digit. A missing or
 * blank template falls back to `OOCSIClient_####`.
 *
 * @example resolveHandle('Dev_##') // 'Dev_07'
 */
export function resolveHandle(template?: string, random: () => number = Math.random): string {
    const source = template === undefined || template.trim().length === 0 ? DEFAULT_HANDLE : template;
    return source.replace(/#/g, () => String(Math.floor(random() * 10) % 10));
}

/** Random RFC 4122 version 4 identifier for call correlation. */
export function generateCallId(): string {
    return randomUUID();
}
