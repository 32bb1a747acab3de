/**
 * Forwards server events to the status callback handed to `start()`.
 */

import type { StatusCallback, StatusLevel } from './types.js';

export class StatusReporter {
    constructor(private readonly callback?: StatusCallback) {}

    report(level: StatusLevel, message: string, success: boolean = true): void {
        if (!this.callback) {
            return;
        }

        try {
            this.callback(level, message, success);
        } catch (error) {
            // A broken sink must not take a connection or the listener down with it.
            process.emitWarning(
                error instanceof Error ? error : new Error(String(error)),
                'StatusCallbackWarning'
            );
        }
    }

    debug(message: string): void {
        this.report('DEBUG', message);
    }

    info(message: string): void {
        this.report('INFO', message);
    }

    warn(message: string): void {
        this.report('WARN', message, false);
    }

    error(message: string): void {
        this.report('ERROR', message, false);
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
