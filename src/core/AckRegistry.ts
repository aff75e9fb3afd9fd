/**
 * @file AckRegistry.ts
 * @brief Callbacks waiting for a server acknowledgement, keyed by correlation id.
 *
 * An entry is removed before its callback runs, so a callback fires at most
 * once even if it throws or the server repeats the reply. Unknown ids are
 * ignored.
 *
 * Entries live until answered. With a positive `ackTimeout` they are also
 * dropped after that many milliseconds and reported through `onExpire`.
 */

import type { AckCallback, JsonValue } from '../types';

export interface AckRegistryOptions {
    /** Milliseconds before an unanswered entry is dropped; 0 keeps it forever */
    ackTimeout?: number;
    /** Called with the id of every entry dropped by the timeout */
    onExpire?: (id: string) => void;
    /** Custom id generator; must not repeat while ids are outstanding */
    generateId?: () => string;
}

interface PendingAck {
    callback: AckCallback;
    timer?: ReturnType<typeof setTimeout>;
}

export class AckRegistry {
    private pending = new Map<string, PendingAck>();
    private counter = 0;
    private readonly ackTimeout: number;
    private readonly onExpire?: (id: string) => void;
    private readonly generateId: () => string;

    constructor(options: AckRegistryOptions = {}) {
        this.ackTimeout = options.ackTimeout ?? 0;
        this.onExpire = options.onExpire;
        this.generateId = options.generateId ?? (() => this.nextId());
    }

    /** Number of callbacks still waiting for a reply */
    get size(): number {
        return this.pending.size;
    }

    has(id: string): boolean {
        return this.pending.has(id);
    }

    /**
     * Store a callback under a fresh id.
     * @returns the correlation id to send to the server
     */
    register(callback: AckCallback): string {
        let id = this.generateId();
        // A custom generator may collide; the built-in one never does.
        while (this.pending.has(id)) {
            id = this.nextId();
        }

        const entry: PendingAck = { callback };
        if (this.ackTimeout > 0) {
            entry.timer = setTimeout(() => this.expire(id), this.ackTimeout);
            entry.timer.unref?.();
        }
        this.pending.set(id, entry);
        return id;
    }

    /**
     * Run and remove the callback for `id`.
     * @returns false when no callback was waiting under that id
     */
    resolve(id: string, response: JsonValue | null): boolean {
        const entry = this.take(id);
        if (!entry) {
            return false;
        }
        entry.callback(response);
        return true;
    }

    /**
     * Drop every entry and cancel their timers.
     */
    clear(): void {
        for (const entry of this.pending.values()) {
            if (entry.timer) clearTimeout(entry.timer);
        }
        this.pending.clear();
    }

    private take(id: string): PendingAck | undefined {
        const entry = this.pending.get(id);
        if (!entry) {
            return undefined;
        }
        this.pending.delete(id);
        if (entry.timer) clearTimeout(entry.timer);
        return entry;
    }

    private expire(id: string): void {
        if (this.take(id)) {
            this.onExpire?.(id);
        }
    }

    private nextId(): string {
        this.counter += 1;
        return `${Date.now().toString(36)}${this.counter.toString(36).padStart(4, '0')}`;
    }
}
