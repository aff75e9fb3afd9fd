/**
 * Error types for the ackwire client.
 *
 * Every error carries a stable `code` so callers can branch on the failure
 * mode without string-matching messages.
 */

/**
 * Base class for all ackwire errors.
 */
export class AckwireError extends Error {
    constructor(message: string, public readonly code: string) {
        super(message);
        this.name = 'AckwireError';
        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, AckwireError);
        }
    }
}

/**
 * Thrown when client or transport options are invalid.
 */
export class ConfigurationError extends AckwireError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}

/**
 * Thrown when the transport cannot connect, or is closed under a pending read.
 */
export class ConnectionError extends AckwireError {
    constructor(
        message: string,
        public readonly cause?: Error
    ) {
        super(message, 'CONNECTION_FAILED');
        this.name = 'ConnectionError';
    }
}

/**
 * Thrown when a frame cannot be parsed into a packet or routed.
 */
export class MalformedPacketError extends AckwireError {
    constructor(
        message: string,
        public readonly rawFrame?: string
    ) {
        super(message, 'MALFORMED_PACKET');
        this.name = 'MalformedPacketError';
    }
}

/**
 * Thrown for a well-formed frame whose packet code this layer does not handle.
 */
export class UnsupportedPacketCodeError extends AckwireError {
    constructor(public readonly packetCode: number) {
        super(`Unhandled packet code: ${packetCode}`, 'UNSUPPORTED_PACKET_CODE');
        this.name = 'UnsupportedPacketCodeError';
    }
}

/**
 * Normalises anything thrown into an Error.
 */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
