/**
 * ackwire - Client
 *
 * The façade applications talk to. It owns the transport, both registries
 * and the connection flag; everything with protocol meaning lives in
 * `core/`.
 */

import type {
    AckCallback,
    ClientEvents,
    ConnectionStatus,
    EventListener,
    IncomingMessage,
    JsonValue,
} from './types';
import { ACK_MARKER_PREFIX } from './types';
import { resolveClientOptions, type ClientOptions } from './config';
import { AckRegistry } from './core/AckRegistry';
import { ListenerRegistry } from './core/ListenerRegistry';
import { MessageRouter } from './core/MessageRouter';
import { ConnectionError, toError } from './errors';
import type { Transport } from './transport/Transport';
import { EventEmitter } from './utils/EventEmitter';
import type { Logger } from './utils/Logger';

// =============================================================================
// SocketClient
// =============================================================================

export class SocketClient {
    private readonly transport: Transport;
    private readonly acks: AckRegistry;
    private readonly listeners = new ListenerRegistry();
    private readonly router = new MessageRouter();
    private readonly events = new EventEmitter<ClientEvents>();
    private readonly logger: Logger;
    private readonly namespace?: string;
    private connected = false;

    constructor(transport: Transport, options: ClientOptions = {}) {
        const resolved = resolveClientOptions(options);
        this.transport = transport;
        this.logger = resolved.logger;
        this.namespace = resolved.namespace;
        this.acks = new AckRegistry({
            ackTimeout: resolved.ackTimeout,
            generateId: resolved.generateId,
            onExpire: (id) => {
                this.logger.warn(`Ack ${id} expired without a reply`);
                this.events.emit('ackTimeout', id);
            },
        });
    }

    // ---------------------------------------------------------------------------
    // Public API
    // ---------------------------------------------------------------------------

    /** True between a successful initialize() and the next close() */
    get isConnected(): boolean {
        return this.connected;
    }

    /** Number of emits still waiting for an acknowledgement */
    get pendingAcks(): number {
        return this.acks.size;
    }

    /** The transport, for more advanced use */
    getTransport(): Transport {
        return this.transport;
    }

    /**
     * Connect the transport.
     *
     * @throws {ConnectionError} If the transport cannot connect
     */
    async initialize(): Promise<this> {
        // Forwarded first so the transport joins it as part of connecting.
        if (this.namespace !== undefined) {
            this.of(this.namespace);
        }
        try {
            this.logger.debug('Connecting to the server');
            await this.transport.connect();
            this.logger.debug('Connected to the server');
        } catch (e) {
            const error = e instanceof ConnectionError
                ? e
                : new ConnectionError('Could not connect to the server', toError(e));
            this.logger.error('Could not connect to the server', error);
            throw error;
        }

        this.connected = true;
        this.events.emit('status', 'connected');
        return this;
    }

    /**
     * Read one frame and dispatch it.
     * Resolves with the dispatched message, or null for an empty frame.
     *
     * @throws {MalformedPacketError | UnsupportedPacketCodeError} If the frame cannot be decoded
     */
    async read(): Promise<IncomingMessage | null> {
        this.logger.debug('Reading a new message from the socket');
        const frame = await this.transport.read();
        const message = this.router.parse(frame);
        if (message) {
            this.dispatch(message);
        }
        return message;
    }

    /**
     * Read and dispatch until the first error of any kind, then resolve with
     * that error. A malformed frame ends the loop just like a lost connection.
     */
    async listen(): Promise<Error> {
        for (;;) {
            try {
                await this.read();
            } catch (e) {
                const error = toError(e);
                this.logger.debug('Listen loop stopped', error.message);
                return error;
            }
        }
    }

    /**
     * Send an event. With `ack`, the server is asked to reply: a trailing
     * `"ACK:<id>"` argument is appended and the reply is routed to `ack`.
     */
    emit(event: string, args: JsonValue[] = [], ack?: AckCallback): this {
        const outgoing = [...args];
        if (ack) {
            const id = this.acks.register(ack);
            outgoing.push(`${ACK_MARKER_PREFIX}${id}`);
        }

        this.logger.debug('Sending a new message', { event, args: outgoing });
        this.transport.emit(event, outgoing, ack !== undefined);
        return this;
    }

    /** Set the listener for `event`, replacing any previous one */
    on(event: string, callback: EventListener): this {
        this.listeners.on(event, callback);
        return this;
    }

    /** Set the namespace for the next messages */
    of(namespace: string): this {
        this.logger.debug('Setting the namespace', { namespace });
        this.transport.of(namespace);
        return this;
    }

    /** Close the connection; a no-op when already closed */
    async close(): Promise<this> {
        if (!this.connected) {
            return this;
        }
        this.logger.debug('Closing the connection');
        await this.transport.close();
        this.connected = false;
        this.events.emit('status', 'disconnected');
        return this;
    }

    /** Subscribe to connection status changes */
    onStatus(handler: (status: ConnectionStatus) => void): () => void {
        return this.events.on('status', handler);
    }

    /** Subscribe to acks dropped by `ackTimeout` */
    onAckTimeout(handler: (ackId: string) => void): () => void {
        return this.events.on('ackTimeout', handler);
    }

    // ---------------------------------------------------------------------------
    // Private
    // ---------------------------------------------------------------------------

    private dispatch(message: IncomingMessage): void {
        switch (message.type) {
            case 'ack':
                if (!this.acks.resolve(message.ackId, message.response)) {
                    this.logger.debug(`No callback waiting for ack ${message.ackId}`);
                }
                return;
            case 'event':
                if (!this.listeners.trigger(message.event, message.args)) {
                    this.logger.debug(`No listener for "${message.event}"`);
                }
                return;
            default: {
                const unhandled: never = message;
                throw new Error(`Unhandled message: ${JSON.stringify(unhandled)}`);
            }
        }
    }
}

/**
 * Run `fn` with a connected client and always close it afterwards,
 * whether `fn` returns or throws.
 *
 * @example
 * ```typescript
 * await withClient(transport, {}, async (client) => {
 *     client.emit('join', ['lobby']);
 *     await client.read();
 * });
 * ```
 */
export async function withClient<T>(
    transport: Transport,
    options: ClientOptions,
    fn: (client: SocketClient) => Promise<T>
): Promise<T> {
    const client = new SocketClient(transport, options);
    await client.initialize();
    try {
        return await fn(client);
    } finally {
        await client.close();
    }
}
