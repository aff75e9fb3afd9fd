/**
 * ackwire - event and acknowledgement client for `42[...]` framed sockets
 *
 * @example
 * ```typescript
 * import { SocketClient, WebSocketTransport } from 'ackwire';
 *
 * const client = new SocketClient(new WebSocketTransport('http://localhost:3000'));
 * await client.initialize();
 *
 * client.on('chat message', (text) => console.log(text));
 * client.emit('join', ['lobby'], (response) => console.log('joined', response));
 *
 * await client.listen();
 * ```
 *
 * @packageDocumentation
 */

export { SocketClient, withClient } from './client';

// Core
export { PacketCodec } from './core/PacketCodec';
export { MessageRouter } from './core/MessageRouter';
export { AckRegistry } from './core/AckRegistry';
export type { AckRegistryOptions } from './core/AckRegistry';
export { ListenerRegistry } from './core/ListenerRegistry';

// Types
export type {
    JsonValue,
    Packet,
    EventMessage,
    AckMessage,
    IncomingMessage,
    EventListener,
    AckCallback,
    ConnectionStatus,
    ClientEvents,
} from './types';
export { EVENT_PACKET_CODE, ACK_SENTINEL, ACK_MARKER_PREFIX } from './types';

// Configuration
export type { ClientOptions, ResolvedClientOptions } from './config';
export { resolveClientOptions } from './config';

// Errors
export {
    AckwireError,
    ConfigurationError,
    ConnectionError,
    MalformedPacketError,
    UnsupportedPacketCodeError,
} from './errors';

// Transports
export type { Transport } from './transport/Transport';
export { WebSocketTransport, createWsSocket } from './transport/WebSocketTransport';
export type {
    WebSocketTransportOptions,
    SocketFactory,
    SocketHandlers,
    SocketLike,
    TransportEvents,
} from './transport/WebSocketTransport';

// Logging
export { Logger, LogLevel, logger } from './utils/Logger';

// Testing
export { MockTransport } from './testing';
export type { EmittedMessage } from './testing';
