/**
 * Shared types for cmd-server
 */

export type StatusLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export type StatusCallback = (level: StatusLevel, message: string, success: boolean) => void;

/**
 * Anything that can answer a command line. The server only ever talks to
 * this interface; `CommandDispatcher` is the stock implementation.
 */
export interface CommandHandler {
    handleCommand(command: string, argument: string): string;
}

export interface Command {
    readonly name: string;

    execute(argument: string): string;
}

export interface CommandRequest {
    command: string;
    argument: string;
}

export type ServerState = 'idle' | 'starting' | 'running' | 'stopping';

export interface ServerOptions {
    host: string;
    backlog: number;
    maxRequestBytes: number;
    clientTimeoutMs: number;
    drainOnStop: boolean;
}

export interface ServerStatus {
    state: ServerState;
    running: boolean;
    host: string;
    port: number | null;
    connections: number;
}

export const DEFAULT_SERVER_OPTIONS: ServerOptions = {
    host: '127.0.0.1',
    backlog: 15,
    maxRequestBytes: 1024,
    clientTimeoutMs: 30000,
    drainOnStop: false
};
