/**
 * ackwire - Type Definitions
 *
 * Wire values, routed messages and handler signatures in one place.
 */

// =============================================================================
// Wire Values
// =============================================================================

/** Any value that survives a JSON round trip */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

// =============================================================================
// Packets & Messages
// =============================================================================

/** The combined "message + event" packet code, the only one this layer handles */
export const EVENT_PACKET_CODE = 42;

/** Payload element 0 that marks an acknowledgement reply */
export const ACK_SENTINEL = 'ACK';

/** Prefix of the trailing argument that asks the server for a reply */
export const ACK_MARKER_PREFIX = 'ACK:';

/** One decoded frame */
export interface Packet {
    code: typeof EVENT_PACKET_CODE;
    payload: JsonValue;
}

/** A fire-and-forget event pushed by the server */
export interface EventMessage {
    type: 'event';
    event: string;
    args: JsonValue[];
}

/** A server reply to a call made with an ack callback */
export interface AckMessage {
    type: 'ack';
    ackId: string;
    response: JsonValue | null;
}

/** Every routed inbound message is one of these */
export type IncomingMessage = EventMessage | AckMessage;

// =============================================================================
// Handlers
// =============================================================================

/** Receives the positional arguments of an event */
export type EventListener = (...args: JsonValue[]) => void;

/** Receives the server's reply to an acknowledged emit */
export type AckCallback = (response: JsonValue | null) => void;

/** Connection status of a client or transport */
export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected';

/** Lifecycle events published by the client */
export interface ClientEvents {
    status: [status: ConnectionStatus];
    ackTimeout: [ackId: string];
}
