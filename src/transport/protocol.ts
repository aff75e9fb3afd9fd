/**
 * Engine.IO v4 / Socket.IO text framing used by `WebSocketTransport`.
 *
 * Engine packets are a single digit followed by data. Socket.IO packets ride
 * inside engine MESSAGE packets: `4` + socket packet type + optional
 * `/namespace,` + JSON.
 */

import { z } from 'zod';
import type { JsonValue } from '../types';
import { truncate } from '../validation';

export const EngineOpCode = {
    OPEN: '0',
    CLOSE: '1',
    PING: '2',
    PONG: '3',
    MESSAGE: '4',
    UPGRADE: '5',
    NOOP: '6',
} as const;

export const SocketOpCode = {
    CONNECT: '0',
    DISCONNECT: '1',
    EVENT: '2',
    CONNECT_ERROR: '4',
} as const;

export const DEFAULT_NAMESPACE = '/';

/**
 * Normalises a namespace to a leading slash; empty means the default.
 */
export function normalizeNamespace(namespace: string): string {
    if (namespace === '' || namespace === DEFAULT_NAMESPACE) return DEFAULT_NAMESPACE;
    return namespace.startsWith('/') ? namespace : `/${namespace}`;
}

function namespacePrefix(namespace: string): string {
    return namespace === DEFAULT_NAMESPACE ? '' : `${namespace},`;
}

export function encodeConnect(namespace: string): string {
    return EngineOpCode.MESSAGE + SocketOpCode.CONNECT + namespacePrefix(namespace);
}

export function encodeDisconnect(namespace: string): string {
    return EngineOpCode.MESSAGE + SocketOpCode.DISCONNECT + namespacePrefix(namespace);
}

export function encodeEvent(namespace: string, event: string, args: JsonValue[]): string {
    return EngineOpCode.MESSAGE + SocketOpCode.EVENT + namespacePrefix(namespace) + JSON.stringify([event, ...args]);
}

export interface SocketFrame {
    /** Socket.IO packet type digit, e.g. '2' for EVENT */
    type: string;
    namespace: string;
    /** The frame with any namespace prefix removed */
    frame: string;
}

/**
 * Splits an engine MESSAGE frame (`4...`) into its socket packet type and
 * namespace. `42/chat,["a"]` becomes `{ type: '2', namespace: '/chat', frame: '42["a"]' }`.
 */
export function parseSocketFrame(raw: string): SocketFrame {
    const head = raw.substring(0, 2);
    const type = raw.charAt(1);
    const rest = raw.substring(2);

    if (!rest.startsWith('/')) {
        return { type, namespace: DEFAULT_NAMESPACE, frame: raw };
    }

    const comma = rest.indexOf(',');
    if (comma === -1) {
        return { type, namespace: rest, frame: head };
    }
    return {
        type,
        namespace: rest.substring(0, comma),
        frame: head + rest.substring(comma + 1),
    };
}

const ConnectErrorSchema = z.object({ message: z.string() });

/**
 * Reason carried by a CONNECT_ERROR frame, which the server sends to refuse a
 * namespace: `44{"message":"not authorized"}` gives `not authorized`.
 * The frame must already have its namespace prefix removed.
 */
export function parseConnectError(frame: string): string {
    const body = frame.substring(2);
    let data: unknown;
    try {
        data = JSON.parse(body);
    } catch {
        return truncate(body) || 'no reason given';
    }
    const result = ConnectErrorSchema.safeParse(data);
    return result.success ? result.data.message : truncate(body);
}
