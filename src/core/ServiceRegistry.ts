import type { EventPayload, Responder } from '../types';

/**
 * Call name → responder. One responder per name; registering again replaces it.
 */
export class ServiceRegistry {
    private responders = new Map<string, Responder>();

    register(name: string, responder: Responder): void {
        this.responders.set(name, responder);
    }

    has(name: string): boolean {
        return this.responders.has(name);
    }

    /**
     * Run the responder for `name`. A responder that returns nothing replies
     * with the request object, which it may have mutated.
     */
    respond(name: string, request: EventPayload): EventPayload | undefined {
        const responder = this.responders.get(name);
        if (!responder) return undefined;

        const reply: unknown = typeof responder === 'function'
            ? responder(request)
            : responder.respond(request);
        return isPayload(reply) ? reply : request;
    }
}

export function isPayload(value: unknown): value is EventPayload {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
