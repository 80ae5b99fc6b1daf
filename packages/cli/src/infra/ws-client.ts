/**
 * @parley/cli — WebSocket Client
 *
 * One request, one connection: opens a socket to the daemon, sends a
 * single client message and relays the daemon's messages for that
 * request until the terminal one arrives.
 */

import WebSocket from 'ws';
import { parseDaemonMessage, type ClientMessage, type DaemonMessage } from '@parley/shared';

export interface ExchangeOptions {
    readonly url: string;
    readonly request: ClientMessage;
    readonly onMessage?: (message: DaemonMessage) => void;
    /** Give up waiting for the terminal message after this long */
    readonly timeoutMs?: number;
}

export class DaemonUnreachableError extends Error {
    constructor(url: string, cause: unknown) {
        super(`Could not connect to the daemon at ${url}`, { cause });
        this.name = 'DaemonUnreachableError';
    }
}

/** chat:done, tools:catalog, or a chat:error about this request (or an unparseable one) */
export function isTerminal(message: DaemonMessage, requestId: string): boolean {
    switch (message.type) {
        case 'chat:done':
        case 'tools:catalog':
            return message.payload.requestId === requestId;
        case 'chat:error':
            return message.payload.requestId === requestId || message.payload.requestId === '';
        default:
            return false;
    }
}

function requestIdOf(message: DaemonMessage): string | undefined {
    return 'requestId' in message.payload ? message.payload.requestId : undefined;
}

export function exchange(options: ExchangeOptions): Promise<DaemonMessage> {
    const requestId = options.request.payload.requestId;

    return new Promise((resolve, reject) => {
        const socket = new WebSocket(options.url);
        let opened = false;
        let settled = false;

        const timer = options.timeoutMs
            ? setTimeout(() => finish(new Error(`No answer from the daemon within ${options.timeoutMs}ms`)), options.timeoutMs)
            : undefined;

        function finish(result: DaemonMessage | Error): void {
            if (settled) return;
            settled = true;
            if (timer) clearTimeout(timer);
            socket.close(1000, 'Request complete');
            if (result instanceof Error) reject(result);
            else resolve(result);
        }

        socket.on('open', () => {
            opened = true;
            socket.send(JSON.stringify(options.request));
        });

        socket.on('message', (raw) => {
            const message = parseDaemonMessage(raw.toString());
            if (!message) return;
            const owner = requestIdOf(message);
            if (owner !== undefined && owner !== requestId && owner !== '') return;

            options.onMessage?.(message);
            if (isTerminal(message, requestId)) finish(message);
        });

        socket.on('close', () => {
            finish(new Error('The daemon closed the connection before answering'));
        });

        socket.on('error', (err) => {
            finish(opened ? err : new DaemonUnreachableError(options.url, err));
        });
    });
}
