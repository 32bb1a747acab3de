/**
 * Helper utilities for testing the command server
 */

import * as net from 'net';
import type { StatusCallback, StatusLevel } from '@src/lib/types.js';

export interface StatusEvent {
    level: StatusLevel;
    message: string;
    success: boolean;
}

export interface StatusRecorder {
    events: StatusEvent[];
    callback: StatusCallback;
    messages(level?: StatusLevel): string[];
}

/**
 * Create a status callback that keeps every event it receives
 */
export function createStatusRecorder(): StatusRecorder {
    const events: StatusEvent[] = [];

    return {
        events,
        callback: (level, message, success) => {
            events.push({ level, message, success });
        },
        messages: (level) => events
            .filter(event => level === undefined || event.level === level)
            .map(event => event.message)
    };
}

/**
 * Send one request and collect everything the server writes back until it
 * closes the connection
 */
export function sendCommand(port: number, payload: string, host = '127.0.0.1'): Promise<string> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        const client = net.createConnection({ port, host }, () => {
            client.write(payload);
        });

        client.on('data', (chunk: Buffer) => chunks.push(chunk));
        client.on('error', reject);
        client.on('close', () => resolve(Buffer.concat(chunks).toString('utf8')));
    });
}

export interface IdleConnection {
    socket: net.Socket;
    closed: Promise<void>;
    isClosed(): boolean;
}

/**
 * Open a connection that never sends anything
 */
export function openIdleConnection(port: number, host = '127.0.0.1'): Promise<IdleConnection> {
    return new Promise((resolve, reject) => {
        let closed = false;
        const socket = net.createConnection({ port, host });
        const closedPromise = new Promise<void>((resolveClosed) => {
            socket.on('close', () => {
                closed = true;
                resolveClosed();
            });
        });

        socket.once('connect', () => {
            socket.off('error', reject);
            // resets from the server are expected once it gives up on us
            socket.on('error', () => {});
            resolve({ socket, closed: closedPromise, isClosed: () => closed });
        });
        socket.once('error', reject);
    });
}
