/**
 * ackwire Testing Utilities
 *
 * An in-process transport for unit tests: no sockets, no timers.
 * Script inbound frames with `push()`, inspect what the client sent
 * through `emitted`, `namespaces`, `connectCalls` and `closeCalls`.
 */

import { ConnectionError } from './errors';
import type { Transport } from './transport/Transport';
import type { JsonValue } from './types';

export interface EmittedMessage {
    event: string;
    args: JsonValue[];
    expectsAck: boolean;
}

export class MockTransport implements Transport {
    public emitted: EmittedMessage[] = [];
    public namespaces: string[] = [];
    public connectCalls = 0;
    public closeCalls = 0;

    private frames: string[] = [];
    private readers: Array<{ resolve: (frame: string) => void; reject: (error: Error) => void }> = [];
    private open = false;
    private connectError: Error | null = null;

    /** Make the next connect() calls reject with `error` */
    failConnect(error: Error): this {
        this.connectError = error;
        return this;
    }

    /** Queue inbound frames, handing them to waiting readers first */
    push(...frames: string[]): this {
        for (const frame of frames) {
            const reader = this.readers.shift();
            if (reader) {
                reader.resolve(frame);
            } else {
                this.frames.push(frame);
            }
        }
        return this;
    }

    /** Simulate the remote side dropping the connection */
    drop(error: Error = new ConnectionError('Connection lost')): void {
        this.open = false;
        for (const reader of this.readers.splice(0)) {
            reader.reject(error);
        }
    }

    get isOpen(): boolean {
        return this.open;
    }

    async connect(): Promise<void> {
        this.connectCalls += 1;
        if (this.connectError) {
            throw this.connectError;
        }
        this.open = true;
    }

    read(): Promise<string> {
        const frame = this.frames.shift();
        if (frame !== undefined) {
            return Promise.resolve(frame);
        }
        if (!this.open) {
            return Promise.reject(new ConnectionError('Transport closed'));
        }
        return new Promise((resolve, reject) => {
            this.readers.push({ resolve, reject });
        });
    }

    emit(event: string, args: JsonValue[], expectsAck: boolean): void {
        this.emitted.push({ event, args, expectsAck });
    }

    of(namespace: string): void {
        this.namespaces.push(namespace);
    }

    async close(): Promise<void> {
        this.closeCalls += 1;
        this.drop(new ConnectionError('Transport closed'));
    }
}
