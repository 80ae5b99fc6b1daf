/**
 * @parley/daemon — Daemon bootstrap
 *
 * Wires the process-wide pieces (execution bridge, remote catalog
 * cache) to a Chat Service and exposes it over WebSocket.
 */

import { mkdirSync, unlinkSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { APP_NAME, APP_VERSION, Vault } from '@parley/shared';
import type { ClientMessage } from '@parley/shared';
import { DaemonWsServer } from './infra/ws-server.js';
import { getListenConfig, getProviderConfig, getRemoteConfig, validateProviderConfig } from './infra/llm-config.js';
import { ChatHandler } from './core/chat-handler.js';
import { ChatService } from './core/chat-service.js';
import { ExecutionBridge } from './core/execution-bridge.js';
import { RemoteCatalog, type CatalogEntry } from './core/remote-catalog.js';
import { InMemoryStore } from './core/store.js';
import { errorMessage } from './core/errors.js';

export interface RunningDaemon {
    readonly host: string;
    readonly port: number;
    shutdown(): Promise<void>;
}

export const PID_FILE_NAME = 'daemon.pid';

export function pidFilePath(): string {
    return join(Vault.dir, PID_FILE_NAME);
}

function writePidFile(): void {
    if (!existsSync(Vault.dir)) mkdirSync(Vault.dir, { recursive: true, mode: 0o700 });
    writeFileSync(pidFilePath(), String(process.pid), { encoding: 'utf-8', mode: 0o600 });
}

function removePidFile(): void {
    try {
        unlinkSync(pidFilePath());
    } catch (err) {
        console.warn(`  ⚠️ [daemon] Could not remove PID file: ${errorMessage(err)}`);
    }
}

export async function startDaemon(): Promise<RunningDaemon> {
    const { host, port } = getListenConfig();
    const remote = getRemoteConfig();
    const provider = getProviderConfig();

    console.log(`\n🗣️  ${APP_NAME} daemon v${APP_VERSION}`);
    console.log(`   PID: ${process.pid}`);

    const validation = validateProviderConfig();
    if (validation.valid) {
        console.log(`  🔐 Provider: ${provider.baseURL} (default model ${provider.defaultModel})`);
    } else {
        console.log(`  🔐 Provider: ⚠️  ${validation.error ?? 'not configured'}`);
    }
    console.log(`  🔌 Remote tools: ${remote.url ?? 'none configured'}`);

    const bridge = new ExecutionBridge({ maxConcurrent: remote.maxConcurrent });
    const catalog = new RemoteCatalog(new InMemoryStore<CatalogEntry>());
    const service = new ChatService({ bridge, catalog });

    const wsServer = await new Promise<DaemonWsServer>((resolve, reject) => {
        const server: DaemonWsServer = new DaemonWsServer({
            port,
            host,
            onListening: () => resolve(server),
            onError: reject,
            onConnection: (clientId) => {
                console.log(`  ⚡ Client connected: ${clientId} (total: ${server.connectionCount})`);
            },
            onDisconnection: (clientId) => {
                console.log(`  ⛓️‍💥 Client disconnected: ${clientId} (total: ${server.connectionCount})`);
            },
            onClientMessage: (clientId: string, message: ClientMessage) => {
                route(clientId, message);
            },
        });
    });

    const chatHandler = new ChatHandler(wsServer, service);

    function route(clientId: string, message: ClientMessage): void {
        const work = message.type === 'chat:request'
            ? chatHandler.handleChatRequest(clientId, message)
            : chatHandler.handleToolsList(clientId, message);
        work.catch((err: unknown) => {
            console.error(`  ❌ [daemon] ${message.type} from ${clientId} failed: ${errorMessage(err)}`);
        });
    }

    writePidFile();
    wsServer.broadcast({ type: 'system:status', timestamp: new Date().toISOString(), payload: { status: 'ready' } });
    console.log(`  ✅ Listening on ws://${host}:${port}\n`);

    let stopped = false;
    return {
        host,
        port,
        async shutdown() {
            if (stopped) return;
            stopped = true;
            wsServer.broadcast({ type: 'system:status', timestamp: new Date().toISOString(), payload: { status: 'shutting_down' } });
            await wsServer.shutdown();
            removePidFile();
            console.log('  👋 Daemon stopped.\n');
        },
    };
}
