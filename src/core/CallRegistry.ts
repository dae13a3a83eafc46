import { PendingCall } from './PendingCall';
import { generateCallId } from '../utils/identity';
import type { EventPayload } from '../types';

export type SettleOutcome = 'fulfilled' | 'expired' | 'unknown';

/**
 * Call id → pending call.
 *
 * Entries leave the registry when a response settles them or when a sweep
 * finds them past their deadline, so a response can match at most once.
 */
export class CallRegistry {
    private calls = new Map<string, PendingCall>();

    constructor(
        private readonly clock: () => number = Date.now,
        private readonly idFactory: () => string = generateCallId
    ) { }

    create(channel: string, name: string, timeoutMs: number): PendingCall {
        const call = new PendingCall(this.idFactory(), name, channel, this.clock() + timeoutMs);
        this.calls.set(call.id, call);
        return call;
    }

    get(id: string): PendingCall | undefined {
        return this.calls.get(id);
    }

    /** Match a response to its call. Late responses expire the call. */
    settle(id: string, response: EventPayload): SettleOutcome {
        const call = this.calls.get(id);
        if (!call) return 'unknown';

        this.calls.delete(id);
        return call.fulfil(response, this.clock()) ? 'fulfilled' : 'expired';
    }

    /** Expire and drop one call ahead of its deadline. Returns false when it was not registered. */
    expire(id: string): boolean {
        const call = this.calls.get(id);
        if (!call) return false;

        this.calls.delete(id);
        call.expire();
        return true;
    }

    /** Expire and drop every call past its deadline. */
    sweep(): PendingCall[] {
        const now = this.clock();
        const expired: PendingCall[] = [];
        for (const [id, call] of this.calls) {
            if (call.isOverdue(now)) {
                this.calls.delete(id);
                call.expire();
                expired.push(call);
            }
        }
        return expired;
    }

    get size(): number {
        return this.calls.size;
    }
}
