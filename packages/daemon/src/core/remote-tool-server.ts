/**
 * @parley/daemon — Remote Tool Server handle
 *
 * Binds a server URL to the process-wide execution bridge and catalog
 * cache. Every operation builds a fresh RemoteToolClient bound to the
 * bridge task's AbortSignal, so no connection state outlives a call.
 */

import type { ExecutionBridge, BridgeOutcome } from './execution-bridge.js';
import type { RemoteCatalog, CatalogLoadResult } from './remote-catalog.js';
import { RemoteToolClient, type FetchLike, type RemoteResourceInfo } from './remote-tool-client.js';

export interface RemoteToolServerOptions {
    baseUrl: string;
    timeoutMs: number;
    bridge: ExecutionBridge;
    catalog: RemoteCatalog;
    fetch?: FetchLike;
}

export class RemoteToolServer {
    readonly baseUrl: string;
    readonly timeoutMs: number;
    private readonly bridge: ExecutionBridge;
    private readonly catalog: RemoteCatalog;
    private readonly fetchImpl?: FetchLike;

    constructor(options: RemoteToolServerOptions) {
        this.baseUrl = options.baseUrl;
        this.timeoutMs = options.timeoutMs;
        this.bridge = options.bridge;
        this.catalog = options.catalog;
        this.fetchImpl = options.fetch;
    }

    loadCatalog(timeoutMs = this.timeoutMs): Promise<CatalogLoadResult> {
        return this.catalog.load(this.baseUrl, async () => {
            const outcome = await this.run('tools/list', (client) => client.listTools(), timeoutMs);
            if (!outcome.ok) throw outcome.error;
            return outcome.value;
        });
    }

    callTool(name: string, args: Record<string, unknown>, timeoutMs = this.timeoutMs): Promise<BridgeOutcome<unknown>> {
        return this.run(`tools/call ${name}`, (client) => client.callTool(name, args), timeoutMs);
    }

    listResources(timeoutMs = this.timeoutMs): Promise<BridgeOutcome<RemoteResourceInfo[]>> {
        return this.run('resources/list', (client) => client.listResources(), timeoutMs);
    }

    readResource(uri: string, timeoutMs = this.timeoutMs): Promise<BridgeOutcome<unknown>> {
        return this.run(`resources/read ${uri}`, (client) => client.readResource(uri), timeoutMs);
    }

    private run<T>(
        label: string,
        op: (client: RemoteToolClient) => Promise<T>,
        timeoutMs: number,
    ): Promise<BridgeOutcome<T>> {
        return this.bridge.run(label, (signal) => {
            const client = new RemoteToolClient({
                baseUrl: this.baseUrl,
                // The bridge owns the deadline; the client only follows its signal
                timeoutMs: 0,
                fetch: this.fetchImpl,
                signal,
            });
            return op(client);
        }, timeoutMs);
    }
}
