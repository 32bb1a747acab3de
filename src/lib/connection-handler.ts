/**
 * Connection Handler
 *
 * Owns one accepted socket for its whole life: one read, one dispatch,
 * one write, then the socket is closed. Nothing thrown in here reaches
 * the listener.
 */

import type * as net from 'net';
import { parseRequest } from './request-parser.js';
import { StatusReporter, describeError } from './status-reporter.js';
import type { CommandHandler, ServerOptions } from './types.js';

/**
 * Cuts a request to at most `limit` bytes without splitting a UTF-8
 * character.
 */
export function truncateUtf8(input: Buffer, limit: number): Buffer {
    if (input.length <= limit) {
        return input;
    }

    let end = limit;
    // continuation bytes look like 10xxxxxx
    while (end > 0 && (input[end] & 0xc0) === 0x80) {
        end--;
    }
    return input.subarray(0, end);
}

export type ConnectionOptions = Pick<ServerOptions, 'maxRequestBytes' | 'clientTimeoutMs'>;

export class ConnectionHandler {
    constructor(
        private readonly handler: CommandHandler,
        private readonly status: StatusReporter,
        private readonly options: ConnectionOptions
    ) {}

    async handle(socket: net.Socket): Promise<void> {
        const peer = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
        this.status.info(`Client connected: ${peer}`);

        socket.setTimeout(this.options.clientTimeoutMs);
        socket.on('timeout', () => {
            socket.destroy(new Error(`Client idle for ${this.options.clientTimeoutMs}ms`));
        });
        socket.on('error', (error) => {
            this.status.debug(`[${peer}] Socket error: ${error.message}`);
        });

        let input: Buffer | null;
        try {
            input = await this.readOnce(socket);
        } catch (error) {
            this.status.debug(`[${peer}] Read failed: ${describeError(error)}`);
            socket.destroy();
            return;
        }

        if (!input) {
            this.status.debug(`[${peer}] Client closed before sending a command`);
            socket.destroy();
            return;
        }

        const { command, argument } = parseRequest(
            truncateUtf8(input, this.options.maxRequestBytes).toString('utf8')
        );
        this.status.debug(`Processed command: '${command}', arg: '${argument}'`);

        let response: string;
        try {
            response = this.handler.handleCommand(command, argument);
        } catch (error) {
            this.status.error(`[${peer}] Command '${command}' failed: ${describeError(error)}`);
            socket.destroy();
            return;
        }
        this.status.debug(`Response to client: '${response}'`);

        try {
            await this.write(socket, `${response}\n`);
        } catch (error) {
            this.status.debug(`[${peer}] Write failed: ${describeError(error)}`);
            socket.destroy();
            return;
        }

        socket.end();
    }

    /**
     * Resolves with the first chunk the client sends, or null when the
     * client goes away first.
     */
    private readOnce(socket: net.Socket): Promise<Buffer | null> {
        return new Promise((resolve, reject) => {
            const cleanup = () => {
                socket.off('data', onData);
                socket.off('end', onClosed);
                socket.off('close', onClosed);
                socket.off('error', onError);
            };
            const onData = (chunk: Buffer) => {
                cleanup();
                socket.pause();
                resolve(chunk);
            };
            const onClosed = () => {
                cleanup();
                resolve(null);
            };
            const onError = (error: Error) => {
                cleanup();
                reject(error);
            };

            socket.on('data', onData);
            socket.on('end', onClosed);
            socket.on('close', onClosed);
            socket.on('error', onError);
        });
    }

    private write(socket: net.Socket, data: string): Promise<void> {
        return new Promise((resolve, reject) => {
            socket.write(data, 'utf8', (error) => {
                if (error) {
                    reject(error);
                } else {
                    resolve();
                }
            });
        });
    }
}
