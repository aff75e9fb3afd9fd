import type { EventListener, JsonValue } from '../types';

/**
 * One listener per event name. Registering again replaces the previous
 * listener; there is no unregister.
 */
export class ListenerRegistry {
    private listeners = new Map<string, EventListener>();

    on(event: string, callback: EventListener): void {
        this.listeners.set(event, callback);
    }

    has(event: string): boolean {
        return this.listeners.has(event);
    }

    /**
     * Invoke the listener for `event` with `args` spread positionally.
     * @returns false when nobody listens, in which case the message is dropped
     */
    trigger(event: string, args: JsonValue[]): boolean {
        const listener = this.listeners.get(event);
        if (!listener) {
            return false;
        }
        listener(...args);
        return true;
    }
}
