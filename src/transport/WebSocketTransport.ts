import WebSocket from 'ws';
import { z } from 'zod';
import { ConfigurationError, ConnectionError, toError } from '../errors';
import type { ConnectionStatus, JsonValue } from '../types';
import { EventEmitter } from '../utils/EventEmitter';
import { Logger, LogLevel, logger as rootLogger } from '../utils/Logger';
import { formatIssues, truncate } from '../validation';
import {
    DEFAULT_NAMESPACE,
    EngineOpCode,
    SocketOpCode,
    encodeConnect,
    encodeDisconnect,
    encodeEvent,
    normalizeNamespace,
    parseConnectError,
    parseSocketFrame,
} from './protocol';
import type { Transport } from './Transport';

/** Callbacks a socket factory wires to the underlying socket */
export interface SocketHandlers {
    onOpen(): void;
    onMessage(data: string): void;
    onClose(code: number, reason: string): void;
    onError(error: Error): void;
}

/** The slice of a WebSocket the transport writes to */
export interface SocketLike {
    send(data: string): void;
    close(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketLike;

export interface TransportEvents {
    status: [status: ConnectionStatus];
    error: [error: Error];
}

export interface WebSocketTransportOptions {
    /** Server path of the engine endpoint (default: /socket.io/) */
    path?: string;
    /** Extra query parameters, e.g. an auth token */
    query?: Record<string, string>;
    /** Namespace joined after the handshake (default: /) */
    namespace?: string;
    /** Handshake deadline in ms, 0 disables (default: 20000) */
    connectionTimeout?: number;
    /** Answer engine pings automatically (default: true) */
    autoPong?: boolean;
    debug?: boolean;
    logger?: Logger;
    /** Builds the socket; defaults to a `ws` WebSocket */
    createSocket?: SocketFactory;
}

const OptionsSchema = z.object({
    path: z.string().startsWith('/').default('/socket.io/'),
    query: z.record(z.string()).default({}),
    namespace: z.string().default(DEFAULT_NAMESPACE),
    connectionTimeout: z.number().int().nonnegative().default(20000),
    autoPong: z.boolean().default(true),
    debug: z.boolean().default(false),
});

type ResolvedOptions = z.infer<typeof OptionsSchema>;

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:', 'ws:', 'wss:']);

function rawDataToString(data: WebSocket.RawData): string {
    if (Buffer.isBuffer(data)) return data.toString('utf8');
    if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
    return Buffer.from(data).toString('utf8');
}

/**
 * Default socket factory backed by the `ws` package.
 */
export const createWsSocket: SocketFactory = (url, handlers) => {
    const ws = new WebSocket(url);
    ws.on('open', () => handlers.onOpen());
    ws.on('message', (data) => handlers.onMessage(rawDataToString(data)));
    ws.on('close', (code, reason) => handlers.onClose(code, reason.toString('utf8')));
    ws.on('error', (error) => handlers.onError(error));
    return {
        send: (data) => ws.send(data),
        close: () => ws.close(),
    };
};

interface PendingRead {
    resolve: (frame: string) => void;
    reject: (error: Error) => void;
}

interface PendingHandshake {
    resolve: () => void;
    reject: (error: Error) => void;
}

/**
 * Engine.IO v4 transport over a WebSocket, text frames only.
 *
 * Engine-level traffic (handshake, ping/pong, namespace connect acks) is
 * consumed here. `connect()` settles once the server accepts or refuses the
 * namespace. Socket.IO message frames for the active namespace are queued,
 * with the namespace prefix removed, until `read()` takes them.
 *
 * @example
 * ```typescript
 * const transport = new WebSocketTransport('http://localhost:3000', {
 *     query: { token: 'test-token' },
 * });
 * const client = new SocketClient(transport);
 * await client.initialize();
 * ```
 */
export class WebSocketTransport implements Transport {
    private readonly events = new EventEmitter<TransportEvents>();
    private socket: SocketLike | null = null;
    private status: ConnectionStatus = 'disconnected';
    private namespace: string;
    private frames: string[] = [];
    private readers: PendingRead[] = [];
    private handshake: PendingHandshake | null = null;
    private connecting: Promise<void> | null = null;
    private engineOpen = false;
    private lastError: ConnectionError | null = null;
    // Bumped on every teardown so late events from a dead socket are ignored.
    private generation = 0;
    private readonly options: ResolvedOptions;
    private readonly createSocket: SocketFactory;
    private readonly log: Logger;

    constructor(private readonly url: string, options: WebSocketTransportOptions = {}) {
        const { logger, createSocket, ...plain } = options;
        const result = OptionsSchema.safeParse(plain);
        if (!result.success) {
            throw new ConfigurationError(`Invalid transport options: ${formatIssues(result.error)}`);
        }
        this.options = result.data;
        this.assertUrl(url);

        this.namespace = normalizeNamespace(this.options.namespace);
        this.createSocket = createSocket ?? createWsSocket;
        if (this.options.debug) {
            // A supplied logger keeps its level; debug output goes to a child.
            this.log = (logger ?? rootLogger).child('transport');
            this.log.setLogLevel(LogLevel.DEBUG);
        } else {
            this.log = logger ?? rootLogger.child('transport');
        }
    }

    /** Subscribe to status changes and socket errors */
    public on<K extends keyof TransportEvents>(
        event: K,
        handler: (...args: TransportEvents[K]) => void
    ): () => void {
        return this.events.on(event, handler);
    }

    public getStatus(): ConnectionStatus {
        return this.status;
    }

    public getNamespace(): string {
        return this.namespace;
    }

    /** The URL the socket is opened on */
    public buildUrl(): string {
        const url = new URL(this.url);
        if (url.protocol === 'http:') url.protocol = 'ws:';
        else if (url.protocol === 'https:') url.protocol = 'wss:';
        if (url.pathname === '/' || url.pathname === '') {
            url.pathname = this.options.path;
        }
        for (const [key, value] of Object.entries(this.options.query)) {
            url.searchParams.set(key, value);
        }
        url.searchParams.set('EIO', '4');
        url.searchParams.set('transport', 'websocket');
        return url.toString();
    }

    public connect(): Promise<void> {
        if (this.status === 'connected') {
            return Promise.resolve();
        }
        if (!this.connecting) {
            this.connecting = this.open().finally(() => {
                this.connecting = null;
            });
        }
        return this.connecting;
    }

    public read(): Promise<string> {
        const frame = this.frames.shift();
        if (frame !== undefined) {
            return Promise.resolve(frame);
        }
        if (this.status !== 'connected') {
            return Promise.reject(this.lastError ?? new ConnectionError('Transport is not connected'));
        }
        return new Promise((resolve, reject) => {
            this.readers.push({ resolve, reject });
        });
    }

    /**
     * Send one event. The ack request travels as the trailing `"ACK:<id>"`
     * argument, so `expectsAck` only shows up in the debug log.
     */
    public emit(event: string, args: JsonValue[], expectsAck: boolean): void {
        if (this.status !== 'connected') {
            this.log.warn(`Dropping "${event}": transport is ${this.status}`);
            return;
        }
        this.log.debug('Sending event', { event, expectsAck });
        this.send(encodeEvent(this.namespace, event, args));
    }

    public of(namespace: string): void {
        this.namespace = normalizeNamespace(namespace);
        if (this.engineOpen) {
            this.send(encodeConnect(this.namespace));
        }
    }

    public async close(): Promise<void> {
        const socket = this.socket;
        if (!socket) {
            return;
        }
        if (this.status === 'connected') {
            this.send(encodeDisconnect(this.namespace));
        }
        this.log.conn('Closing socket');
        this.teardown(new ConnectionError('Transport closed'));
        socket.close();
    }

    private open(): Promise<void> {
        const url = this.buildUrl();
        const generation = this.generation;
        this.frames = [];
        this.lastError = null;
        this.setStatus('connecting');
        this.log.conn('Connecting', url);

        return new Promise<void>((resolve, reject) => {
            const timeoutMs = this.options.connectionTimeout;
            const timeout = timeoutMs > 0
                ? setTimeout(() => this.abort(new ConnectionError(`Connection timed out after ${timeoutMs}ms`)), timeoutMs)
                : null;

            this.handshake = {
                resolve: () => {
                    if (timeout) clearTimeout(timeout);
                    resolve();
                },
                reject: (error) => {
                    if (timeout) clearTimeout(timeout);
                    reject(error);
                },
            };

            const live = () => generation === this.generation;
            try {
                this.socket = this.createSocket(url, {
                    onOpen: () => {
                        if (live()) this.log.conn('Socket open, awaiting engine handshake');
                    },
                    onMessage: (data) => {
                        if (live()) this.handleFrame(data);
                    },
                    onClose: (code, reason) => {
                        if (live()) this.handleSocketClose(code, reason);
                    },
                    onError: (error) => {
                        if (live()) this.handleSocketError(error);
                    },
                });
            } catch (e) {
                this.abort(new ConnectionError('Could not open socket', toError(e)));
            }
        });
    }

    private handleFrame(data: string): void {
        switch (data.charAt(0)) {
            case EngineOpCode.OPEN:
                this.handleEngineOpen(data.substring(1));
                return;
            case EngineOpCode.PING:
                if (this.options.autoPong) {
                    this.send(EngineOpCode.PONG + data.substring(1));
                }
                return;
            case EngineOpCode.PONG:
            case EngineOpCode.NOOP:
                return;
            case EngineOpCode.CLOSE:
                this.abort(new ConnectionError('Server closed the session'));
                return;
            case EngineOpCode.MESSAGE:
                this.handleSocketFrame(data);
                return;
            default:
                this.log.warn('Ignoring unknown engine packet', truncate(data));
        }
    }

    private handleEngineOpen(handshakeData: string): void {
        const handshake = this.handshake;
        if (!handshake) {
            return;
        }
        this.engineOpen = true;
        this.log.conn('Engine handshake', truncate(handshakeData));
        this.send(encodeConnect(this.namespace));
    }

    /** Namespace accepted: the handshake is complete. */
    private handleNamespaceConnect(namespace: string): void {
        const handshake = this.handshake;
        this.log.conn(`Joined namespace ${namespace}`);
        if (!handshake) {
            return;
        }
        this.handshake = null;
        this.setStatus('connected');
        handshake.resolve();
    }

    private handleSocketFrame(data: string): void {
        const { type, namespace, frame } = parseSocketFrame(data);
        if (namespace !== this.namespace) {
            this.log.debug(`Dropping frame for namespace ${namespace}`);
            return;
        }

        switch (type) {
            case SocketOpCode.CONNECT:
                this.handleNamespaceConnect(namespace);
                return;
            case SocketOpCode.CONNECT_ERROR:
                this.abort(new ConnectionError(
                    `Namespace ${namespace} refused the connection: ${parseConnectError(frame)}`
                ));
                return;
            case SocketOpCode.DISCONNECT:
                this.abort(new ConnectionError(`Server disconnected namespace ${namespace}`));
                return;
            default:
                this.push(frame);
        }
    }

    private push(frame: string): void {
        const reader = this.readers.shift();
        if (reader) {
            reader.resolve(frame);
        } else {
            this.frames.push(frame);
        }
    }

    private handleSocketClose(code: number, reason: string): void {
        const detail = reason ? `${code}: ${reason}` : `${code}`;
        if (this.handshake) {
            this.teardown(new ConnectionError(`Socket closed before handshake (${detail})`));
            return;
        }
        this.log.conn(`Socket closed (${detail})`);
        this.teardown(new ConnectionError(`Connection closed (${detail})`));
    }

    private handleSocketError(error: Error): void {
        if (this.handshake) {
            this.abort(new ConnectionError('Socket error during handshake', error));
            return;
        }
        this.log.error('Socket error', error);
        this.events.emit('error', error);
    }

    private send(data: string): void {
        if (!this.socket) return;
        try {
            this.socket.send(data);
        } catch (e) {
            const error = toError(e);
            this.log.error('Send failed', error);
            this.events.emit('error', error);
        }
    }

    /** Tear down and close the socket. */
    private abort(error: ConnectionError): void {
        const socket = this.socket;
        this.teardown(error);
        socket?.close();
    }

    private teardown(error: ConnectionError): void {
        this.generation += 1;
        this.socket = null;
        this.engineOpen = false;
        this.lastError = error;
        this.setStatus('disconnected');

        const handshake = this.handshake;
        this.handshake = null;
        handshake?.reject(error);

        for (const reader of this.readers.splice(0)) {
            reader.reject(error);
        }
    }

    private setStatus(status: ConnectionStatus): void {
        if (this.status === status) return;
        this.status = status;
        this.events.emit('status', status);
    }

    private assertUrl(url: string): void {
        let parsed: URL;
        try {
            parsed = new URL(url);
        } catch {
            throw new ConfigurationError(`Invalid transport URL: ${url}`);
        }
        if (!SUPPORTED_PROTOCOLS.has(parsed.protocol)) {
            throw new ConfigurationError(`Unsupported URL protocol: ${parsed.protocol}`);
        }
    }
}
