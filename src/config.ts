import { z } from 'zod';
import { ConfigurationError } from './errors';
import { Logger, LogLevel, logger as rootLogger } from './utils/Logger';
import { formatIssues } from './validation';

/**
 * Options accepted by `SocketClient`.
 */
export interface ClientOptions {
    /** Namespace forwarded to the transport before it connects */
    namespace?: string;
    /** Shorthand for `logLevel: LogLevel.DEBUG` */
    debug?: boolean;
    logLevel?: LogLevel;
    /** Milliseconds before an unanswered ack callback is dropped (0 = never) */
    ackTimeout?: number;
    /**
     * Logger to use instead of the package logger. With `debug` or
     * `logLevel`, the client logs through `logger.child('client')` at that
     * level and the supplied logger keeps its own.
     */
    logger?: Logger;
    /** Correlation id generator for ack callbacks */
    generateId?: () => string;
}

export interface ResolvedClientOptions {
    namespace?: string;
    ackTimeout: number;
    logger: Logger;
    generateId?: () => string;
}

const ClientOptionsSchema = z.object({
    namespace: z.string().min(1).optional(),
    debug: z.boolean().default(false),
    logLevel: z.nativeEnum(LogLevel).optional(),
    ackTimeout: z.number().int().nonnegative().default(0),
});

/**
 * Validates client options and fills in defaults.
 *
 * @throws {ConfigurationError} If any option is invalid
 */
export function resolveClientOptions(options: ClientOptions = {}): ResolvedClientOptions {
    const { logger, generateId, ...plain } = options;
    const result = ClientOptionsSchema.safeParse(plain);
    if (!result.success) {
        throw new ConfigurationError(`Invalid client options: ${formatIssues(result.error)}`);
    }
    if (generateId !== undefined && typeof generateId !== 'function') {
        throw new ConfigurationError('Invalid client options: generateId: Expected function');
    }

    const level = result.data.logLevel ?? (result.data.debug ? LogLevel.DEBUG : undefined);
    let log = logger ?? rootLogger.child('client');
    if (level !== undefined) {
        // A supplied logger is never reconfigured; the level goes on a child of it.
        if (logger) log = logger.child('client');
        log.setLogLevel(level);
    }

    return {
        namespace: result.data.namespace,
        ackTimeout: result.data.ackTimeout,
        logger: log,
        generateId,
    };
}
