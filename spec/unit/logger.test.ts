import { describe, test, expect } from 'vitest';
import { createLogger, createStatusLogger } from '@lib/logger.js';
import type { LogLevel } from '@lib/config.js';

function captureLogger(level: LogLevel) {
    const lines: string[] = [];
    const logger = createLogger({
        service: 'cmd-server-test',
        level,
        destination: { write: (line: string) => { lines.push(line); } }
    });

    return { logger, entries: () => lines.map(line => JSON.parse(line)) };
}

describe('Status logger', () => {
    test('should write status events as structured log lines', () => {
        const { logger, entries } = captureLogger('debug');
        const status = createStatusLogger(logger);

        status('INFO', 'Server is listening on 127.0.0.1:31415', true);

        const [entry] = entries();
        expect(entry.level).toBe('info');
        expect(entry.msg).toBe('Server is listening on 127.0.0.1:31415');
        expect(entry.success).toBe(true);
        expect(entry.service).toBe('cmd-server-test');
        expect(entry.pid).toBe(process.pid);
    });

    test('should map every status level onto a pino level', () => {
        const { logger, entries } = captureLogger('debug');
        const status = createStatusLogger(logger);

        status('DEBUG', 'd', true);
        status('INFO', 'i', true);
        status('WARN', 'w', false);
        status('ERROR', 'e', false);
        status('FATAL', 'f', false);

        expect(entries().map(entry => entry.level)).toEqual(['debug', 'info', 'warn', 'error', 'fatal']);
        expect(entries().map(entry => entry.success)).toEqual([true, true, false, false, false]);
    });

    test('should respect the configured level', () => {
        const { logger, entries } = captureLogger('warn');
        const status = createStatusLogger(logger);

        status('DEBUG', 'too chatty', true);
        status('INFO', 'still too chatty', true);
        status('ERROR', 'Bind failed', false);

        expect(entries()).toHaveLength(1);
        expect(entries()[0].msg).toBe('Bind failed');
    });
});
