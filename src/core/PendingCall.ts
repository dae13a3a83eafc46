import type { EventPayload } from '../types';

export type PendingCallStatus = 'pending' | 'fulfilled' | 'expired';

/**
 * One outstanding call, returned to the caller as soon as the call is sent.
 *
 * A call is fulfilled only by a response that arrives before `deadline`;
 * anything later expires it instead.
 */
export class PendingCall {
    private _status: PendingCallStatus = 'pending';
    private _response: EventPayload | undefined;

    constructor(
        public readonly id: string,
        public readonly name: string,
        public readonly channel: string,
        public readonly deadline: number
    ) { }

    get status(): PendingCallStatus {
        return this._status;
    }

    /** The response payload, once fulfilled. */
    get response(): EventPayload | undefined {
        return this._response;
    }

    isPending(): boolean {
        return this._status === 'pending';
    }

    isFulfilled(): boolean {
        return this._status === 'fulfilled';
    }

    isExpired(): boolean {
        return this._status === 'expired';
    }

    isOverdue(now: number): boolean {
        return now >= this.deadline;
    }

    /**
     * Attach a response received at `now`. A late response expires the call.
     * @returns whether the call was fulfilled
     */
    fulfil(response: EventPayload, now: number): boolean {
        if (this._status !== 'pending') return false;
        if (this.isOverdue(now)) {
            this.expire();
            return false;
        }
        this._status = 'fulfilled';
        this._response = response;
        return true;
    }

    expire(): void {
        if (this._status !== 'pending') return;
        this._status = 'expired';
    }

    toJSON() {
        return {
            id: this.id,
            name: this.name,
            channel: this.channel,
            deadline: this.deadline,
            status: this._status,
            response: this._response,
        };
    }
}
