/**
 * @file PacketCodec.ts
 * @brief Turns one raw text frame into a typed packet.
 *
 * A frame looks like `<code>[<json-array>]`: ASCII digits, then JSON starting
 * at the first `[`. Only the combined message/event code (42) carries
 * application payload here; open, ping, close and friends belong to the
 * transport and never reach this layer.
 *
 * Encoding outgoing frames is the transport's job, not the codec's.
 */

import { MalformedPacketError, UnsupportedPacketCodeError } from '../errors';
import { EVENT_PACKET_CODE, type JsonValue, type Packet } from '../types';

const PACKET_CODE = /^\d+$/;

export class PacketCodec {
    /**
     * Decode a raw frame.
     * Returns null for an empty frame, which callers treat as a no-op.
     *
     * @throws {MalformedPacketError} missing separator, non-numeric code or invalid JSON
     * @throws {UnsupportedPacketCodeError} any code other than 42
     */
    decode(frame: string | null | undefined): Packet | null {
        if (!frame) {
            return null;
        }

        const separator = frame.indexOf('[');
        if (separator === -1) {
            throw new MalformedPacketError('No code/payload separator in frame', frame);
        }

        const prefix = frame.substring(0, separator);
        if (!PACKET_CODE.test(prefix)) {
            throw new MalformedPacketError(`Invalid packet code "${prefix}"`, frame);
        }
        const code = Number.parseInt(prefix, 10);

        let payload: JsonValue;
        try {
            payload = JSON.parse(frame.substring(separator));
        } catch (error) {
            throw new MalformedPacketError(
                `Failed to parse packet payload as JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
                frame
            );
        }

        if (code !== EVENT_PACKET_CODE) {
            throw new UnsupportedPacketCodeError(code);
        }

        return { code: EVENT_PACKET_CODE, payload };
    }
}
