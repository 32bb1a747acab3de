/**
 * Command Server - listener lifecycle
 *
 * Owns the listening socket and hands every accepted connection to its own
 * ConnectionHandler run. State moves idle -> starting -> running ->
 * stopping -> idle; each start/stop cycle begins from a clean slate.
 */

import * as net from 'net';
import * as os from 'os';
import { ConnectionHandler } from './connection-handler.js';
import { StatusReporter, describeError } from './status-reporter.js';
import {
    DEFAULT_SERVER_OPTIONS,
    type CommandHandler,
    type ServerOptions,
    type ServerState,
    type ServerStatus,
    type StatusCallback
} from './types.js';

export class CommandServer {
    private readonly options: ServerOptions;
    private state: ServerState = 'idle';
    private server: net.Server | null = null;
    private port: number | null = null;
    private status = new StatusReporter();

    // Only counted and, with drainOnStop, waited for. Never interrupted.
    private readonly connections = new Set<net.Socket>();

    private starting: Promise<boolean> | null = null;
    private stopping: Promise<void> | null = null;

    constructor(options: Partial<ServerOptions> = {}) {
        this.options = { ...DEFAULT_SERVER_OPTIONS, ...options };
    }

    start(port: number, handler: CommandHandler | null | undefined, statusCallback?: StatusCallback): Promise<boolean> {
        const status = new StatusReporter(statusCallback);

        if (this.state !== 'idle') {
            status.error(`Server is already ${this.state}; start ignored`);
            return Promise.resolve(false);
        }
        if (!handler) {
            status.error('No command handler provided');
            return Promise.resolve(false);
        }

        this.state = 'starting';
        this.status = status;
        // bind() reports before its first await; a stop() issued from that
        // report must already see the pending start.
        this.starting = Promise.resolve()
            .then(() => this.bind(port, handler, status))
            .finally(() => {
                this.starting = null;
            });
        return this.starting;
    }

    stop(): Promise<void> {
        if (!this.stopping) {
            this.stopping = this.shutdown().finally(() => {
                this.stopping = null;
            });
        }
        return this.stopping;
    }

    isRunning(): boolean {
        return this.state === 'running';
    }

    getState(): ServerState {
        return this.state;
    }

    getStatus(): ServerStatus {
        return {
            state: this.state,
            running: this.isRunning(),
            host: this.options.host,
            port: this.port,
            connections: this.connections.size
        };
    }

    /**
     * Adjusts the scheduling priority of the serving process. Failure is
     * reported and otherwise ignored.
     */
    setSchedulingPriority(priority: number): boolean {
        try {
            os.setPriority(priority);
            this.status.info(`Scheduling priority set to ${priority}`);
            return true;
        } catch (error) {
            this.status.warn(`Failed to set scheduling priority ${priority}: ${describeError(error)}`);
            return false;
        }
    }

    protected createListener(onConnection: (socket: net.Socket) => void): net.Server {
        return net.createServer(onConnection);
    }

    private async bind(port: number, handler: CommandHandler, status: StatusReporter): Promise<boolean> {
        const { host, backlog } = this.options;
        status.info(`Starting server on port: ${port}`);

        const connectionHandler = new ConnectionHandler(handler, status, this.options);
        const server = this.createListener((socket) => this.accept(socket, connectionHandler, status));

        try {
            await this.listen(server, port);
        } catch (error) {
            status.error(`Bind failed on ${host}:${port}: ${describeError(error)}`);
            this.state = 'idle';
            this.status = new StatusReporter();
            return false;
        }

        server.on('error', (error) => {
            status.error(`Accept failed: ${error.message}`);
        });

        const address = server.address();
        this.server = server;
        this.port = typeof address === 'object' && address !== null ? address.port : port;
        this.state = 'running';

        status.info(`Server is listening on ${host}:${this.port} (backlog ${backlog})`);
        return true;
    }

    private listen(server: net.Server, port: number): Promise<void> {
        const { host, backlog } = this.options;

        return new Promise((resolve, reject) => {
            const onError = (error: Error) => {
                server.off('listening', onListening);
                reject(error);
            };
            const onListening = () => {
                server.off('error', onError);
                resolve();
            };

            server.once('error', onError);
            server.once('listening', onListening);
            server.listen({ port, host, backlog });
        });
    }

    private accept(socket: net.Socket, connectionHandler: ConnectionHandler, status: StatusReporter): void {
        this.connections.add(socket);
        socket.once('close', () => {
            this.connections.delete(socket);
        });

        connectionHandler.handle(socket).catch((error: unknown) => {
            status.error(`Connection handler failed: ${describeError(error)}`);
            socket.destroy();
        });
    }

    private async shutdown(): Promise<void> {
        if (this.starting) {
            await this.starting;
        }

        const server = this.server;
        if (this.state !== 'running' || !server) {
            return;
        }

        const status = this.status;
        this.state = 'stopping';
        status.info('Stopping server.');

        // close() stops accepting at once; its callback waits for open connections.
        const onClosed = (error?: Error) => {
            if (error) {
                status.debug(`Listener close: ${error.message}`);
            }
        };

        if (this.options.drainOnStop) {
            status.info(`Waiting for ${this.connections.size} active connection(s).`);
            await new Promise<void>((resolve) => {
                server.close((error) => {
                    onClosed(error);
                    resolve();
                });
            });
        } else {
            server.close(onClosed);
            if (this.connections.size > 0) {
                status.debug(`Leaving ${this.connections.size} connection(s) to finish on their own.`);
            }
        }

        this.server = null;
        this.port = null;
        this.state = 'idle';
        this.status = new StatusReporter();
        status.info('Server shutdown complete.');
    }
}
