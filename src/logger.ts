/**
 * Logger
 * pino, pretty-printed as `[2026-10-19 12:00:00] DEBUG: message`
 */

import { pino, type DestinationStream } from 'pino';

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    critical(message: string): void;
}

export interface LoggerOptions {
    level: string;
    pretty: boolean;
}

export function createLogger(
    options: LoggerOptions,
    destination?: DestinationStream,
): Logger {
    const base = destination
        ? pino({ level: options.level, base: null }, destination)
        : pino({
            level: options.level,
            base: null,
            transport: options.pretty
                ? {
                    target: 'pino-pretty',
                    options: {
                        colorize: process.stdout.isTTY,
                        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
                        ignore: 'pid,hostname',
                    },
                }
                : undefined,
        });

    return {
        debug: (message) => base.debug(message),
        info: (message) => base.info(message),
        warn: (message) => base.warn(message),
        error: (message) => base.error(message),
        // pino calls it fatal
        critical: (message) => base.fatal(message),
    };
}
