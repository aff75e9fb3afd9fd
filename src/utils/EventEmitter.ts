/**
 * A tiny, type-safe event emitter for lifecycle notifications
 * (connection status, transport errors, expired acks).
 *
 * Exceptions in one handler are logged and do not stop the others.
 *
 * @example
 * ```typescript
 * const emitter = new EventEmitter<ClientEvents>();
 * const unsub = emitter.on('status', (status) => console.log(status));
 * emitter.emit('status', 'connected');
 * unsub();
 * ```
 */
export class EventEmitter<T extends Record<keyof T, unknown[]>> {
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
