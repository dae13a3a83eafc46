import type { EventCallback, EventPayload } from '../types';

/**
 * Channel name → ordered subscriber list.
 *
 * Insertion order is invocation order. The same callback may be added twice
 * and is then invoked twice per event. A channel with an empty list is still
 * subscribed upstream; an absent channel is not.
 */
export class SubscriptionRegistry {
    private entries = new Map<string, EventCallback[]>();

    /** Append `callback` to `channel`, creating the entry if needed. */
    add(channel: string, callback?: EventCallback): void {
        let callbacks = this.entries.get(channel);
        if (!callbacks) {
            callbacks = [];
            this.entries.set(channel, callbacks);
        }
        if (callback) {
            callbacks.push(callback);
        }
    }

    /** Drop the channel and all of its callbacks. Returns false when it was absent. */
    remove(channel: string): boolean {
        return this.entries.delete(channel);
    }

    has(channel: string): boolean {
        return this.entries.has(channel);
    }

    /** Subscribed channel names, in first-subscription order. */
    channels(): string[] {
        return Array.from(this.entries.keys());
    }

    /**
     * Invoke every callback of `recipient` in order. A throwing callback ends
     * the delivery and the error propagates.
     *
     * @returns the number of callbacks invoked
     */
    deliver(sender: string, recipient: string, event: EventPayload): number {
        const callbacks = this.entries.get(recipient);
        if (!callbacks) return 0;

        // Snapshot: callbacks may subscribe or unsubscribe while we iterate
        const snapshot = callbacks.slice();
        for (const callback of snapshot) {
            invokeCallback(callback, sender, recipient, event);
        }
        return snapshot.length;
    }
}

export function invokeCallback(callback: EventCallback, sender: string, recipient: string, event: EventPayload): void {
    if (typeof callback === 'function') {
        callback(sender, recipient, event);
    } else {
        callback.invoke(sender, recipient, event);
    }
}
