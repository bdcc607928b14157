import pino from 'pino';

/**
 * Logger Interface
 *
 * Defines the contract for logging operations across the engine.
 * Every call takes structured fields first and the message second,
 * matching pino's native signature.
 */
export interface ILogger {
    info(data: object, message: string): void;
    error(data: object, message: string): void;
    warn(data: object, message: string): void;
    debug(data: object, message: string): void;
}

/**
 * Logger Configuration
 *
 * JSON logger for the tailoring service. Scheduler decisions, task
 * finalization, audit writes and HTTP handling all log through it.
 */
export const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    transport: {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            singleLine: false
        }
    },
    serializers: {
        err: pino.stdSerializers.err
    }
});
