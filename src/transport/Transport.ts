import type { JsonValue } from '../types';

/**
 * The connection underneath a client.
 * This decouples the 'How' (engine handshake, heartbeats, socket I/O) from
 * the 'What' (events and acknowledgements).
 */
export interface Transport {
    /** Establish the connection; rejects when it cannot be made */
    connect(): Promise<void>;

    /** Resolve with the next raw frame; rejects once the transport is closed */
    read(): Promise<string>;

    /** Send one outbound event; wire framing is the transport's business */
    emit(event: string, args: JsonValue[], expectsAck: boolean): void;

    /** Set the namespace for subsequent messages */
    of(namespace: string): void;

    close(): Promise<void>;
}
