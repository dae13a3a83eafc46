/**
 * A tiny, type-safe event emitter.
 *
 * Event names and argument tuples are checked at compile time, a throwing
 * listener does not stop the others, and `on` returns its own unsubscribe
 * function.
 *
 * @example
 * ```typescript
 * interface MyEvents { data: [string]; error: [Error] }
 * const emitter = new EventEmitter<MyEvents>();
 * const unsub = emitter.on('data', (msg) => console.log(msg));
 * emitter.emit('data', 'hello');
 * unsub();
 * ```
 */
export class EventEmitter<T extends { [K in keyof T]: unknown[] }> {
    private listeners: { [K in keyof T]?: Set<(...args: T[K]) => void> } = {};

    /**
     * Subscribe to an event.
     * @returns Unsubscribe function
     */
    on<K extends keyof T>(event: K, handler: (...args: T[K]) => void): () => void {
        let handlers = this.listeners[event];
        if (!handlers) {
            handlers = new Set();
            this.listeners[event] = handlers;
        }
        handlers.add(handler);
        return () => this.off(event, handler);
    }

    off<K extends keyof T>(event: K, handler: (...args: T[K]) => void): void {
        this.listeners[event]?.delete(handler);
    }

    emit<K extends keyof T>(event: K, ...args: T[K]): void {
        const handlers = this.listeners[event];
        if (!handlers) return;

        for (const handler of Array.from(handlers)) {
            try {
                handler(...args);
            } catch (err) {
                console.error(`[EventEmitter] Error in listener for ${String(event)}:`, err);
            }
        }
    }
}
