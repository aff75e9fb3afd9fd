/**
 * @file MessageRouter.ts
 * @brief The single parsing gateway for inbound packets.
 *
 * Every event packet enters through here, is inspected once, and emerges as
 * the closed `IncomingMessage` union. Callers switch on `type` and never
 * look at raw payload arrays.
 *
 * Disambiguation is this client's own convention: a payload whose first
 * element is the literal `"ACK"` is a reply to one of our calls, anything
 * else is a named event.
 */

import { z } from 'zod';
import { MalformedPacketError } from '../errors';
import {
    ACK_SENTINEL,
    type AckMessage,
    type EventMessage,
    type IncomingMessage,
    type JsonValue,
} from '../types';
import { formatIssues } from '../validation';
import { PacketCodec } from './PacketCodec';

const AckPayloadSchema = z.tuple([z.literal(ACK_SENTINEL), z.string()]).rest(z.unknown());

export class MessageRouter {
    constructor(private readonly codec: PacketCodec = new PacketCodec()) {}

    /**
     * Decode and route a raw frame in one step.
     * Returns null for an empty frame.
     */
    parse(frame: string | null | undefined): IncomingMessage | null {
        const packet = this.codec.decode(frame);
        if (!packet) {
            return null;
        }
        return this.route(packet.payload);
    }

    /**
     * Route the payload of an event packet.
     *
     * @throws {MalformedPacketError} payload is not a non-empty array, or its elements have the wrong types
     */
    route(payload: JsonValue): IncomingMessage {
        if (!Array.isArray(payload) || payload.length === 0) {
            throw new MalformedPacketError('Event payload must be a non-empty array', JSON.stringify(payload));
        }

        if (payload[0] === ACK_SENTINEL) {
            return this.routeAck(payload);
        }
        return this.routeEvent(payload);
    }

    private routeAck(payload: JsonValue[]): AckMessage {
        const result = AckPayloadSchema.safeParse(payload);
        if (!result.success) {
            throw new MalformedPacketError(`Invalid ack reply: ${formatIssues(result.error)}`, JSON.stringify(payload));
        }

        return MessageRouter.createAck(result.data[1], payload[2] ?? null);
    }

    private routeEvent(payload: JsonValue[]): EventMessage {
        const [event, ...args] = payload;
        if (typeof event !== 'string') {
            throw new MalformedPacketError('Event name must be a string', JSON.stringify(payload));
        }
        return MessageRouter.createEvent(event, args);
    }

    /** Build an EventMessage; every routed event goes through here. */
    static createEvent(event: string, args: JsonValue[] = []): EventMessage {
        return { type: 'event', event, args };
    }

    /** Build an AckMessage; a missing response becomes null. */
    static createAck(ackId: string, response: JsonValue | null = null): AckMessage {
        return { type: 'ack', ackId, response };
    }
}
