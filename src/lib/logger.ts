/**
 * pino logging for the process entry point, plus the adapter that turns a
 * logger into the server's status callback.
 */

import pino from 'pino';
import type { LogLevel } from './config.js';
import type { StatusCallback, StatusLevel } from './types.js';

export interface LoggerOptions {
    service: string;
    level: LogLevel;
    pretty?: boolean;
    destination?: pino.DestinationStream;
}

export function createLogger(options: LoggerOptions): pino.Logger {
    const config: pino.LoggerOptions = {
        level: options.level,
        base: {
            service: options.service,
            pid: process.pid
        },
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
            level: (label) => ({ level: label })
        }
    };

    if (options.destination) {
        return pino(config, options.destination);
    }

    if (options.pretty) {
        return pino({
            ...config,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname'
                }
            }
        });
    }

    return pino(config);
}

const LEVELS: Record<StatusLevel, 'debug' | 'info' | 'warn' | 'error' | 'fatal'> = {
    DEBUG: 'debug',
    INFO: 'info',
    WARN: 'warn',
    ERROR: 'error',
    FATAL: 'fatal'
};

export function createStatusLogger(logger: pino.Logger): StatusCallback {
    return (level, message, success) => {
        logger[LEVELS[level]]({ success }, message);
    };
}
