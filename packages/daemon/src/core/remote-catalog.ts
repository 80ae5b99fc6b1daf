/**
 * @parley/daemon — Remote Catalog Cache
 *
 * Last-known tool catalog per remote server URL, kept in an injected
 * KeyValueStore. An entry is `fresh` until it outlives the TTL or is
 * invalidated, then `stale`; a URL with no entry is unfetched.
 *
 * A failed fetch is remembered for `failureTtlMs`; loads inside that
 * window answer from memory (the stale catalog if there is one, the
 * failure otherwise) instead of waiting on the server again. Loading a
 * different URL drops the entries of every other URL.
 */

import type { KeyValueStore } from './store.js';
import type { RemoteToolInfo } from './remote-tool-client.js';
import { RemoteToolError, errorMessage } from './errors.js';

export type CatalogState = 'unfetched' | 'fresh' | 'stale';

export interface CatalogEntry {
    readonly tools: readonly RemoteToolInfo[];
    readonly fetchedAt: number;
    readonly stale: boolean;
}

export type CatalogLoadResult =
    | { ok: true; tools: readonly RemoteToolInfo[]; fromCache: boolean; stale: boolean }
    | { ok: false; error: RemoteToolError };

export interface RemoteCatalogOptions {
    ttlMs?: number;
    /** How long a failed fetch is served from memory before the next attempt */
    failureTtlMs?: number;
    now?: () => number;
}

interface FetchFailure {
    readonly error: RemoteToolError;
    readonly at: number;
}

const DEFAULT_TTL_MS = 5 * 60_000;
const DEFAULT_FAILURE_TTL_MS = 30_000;

export class RemoteCatalog {
    private readonly ttlMs: number;
    private readonly failureTtlMs: number;
    private readonly now: () => number;
    private readonly failures = new Map<string, FetchFailure>();

    constructor(
        private readonly store: KeyValueStore<CatalogEntry>,
        options: RemoteCatalogOptions = {},
    ) {
        this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
        this.failureTtlMs = options.failureTtlMs ?? DEFAULT_FAILURE_TTL_MS;
        this.now = options.now ?? Date.now;
    }

    state(baseUrl: string): CatalogState {
        const entry = this.store.get(baseUrl);
        if (!entry) return 'unfetched';
        return this.isFresh(entry) ? 'fresh' : 'stale';
    }

    async load(baseUrl: string, fetcher: () => Promise<readonly RemoteToolInfo[]>): Promise<CatalogLoadResult> {
        for (const key of this.store.keys()) {
            if (key !== baseUrl) this.store.delete(key);
        }
        for (const key of this.failures.keys()) {
            if (key !== baseUrl) this.failures.delete(key);
        }

        const cached = this.store.get(baseUrl);
        if (cached && this.isFresh(cached)) {
            return { ok: true, tools: cached.tools, fromCache: true, stale: false };
        }

        const failure = this.failures.get(baseUrl);
        if (failure && this.now() - failure.at < this.failureTtlMs) {
            return cached
                ? { ok: true, tools: cached.tools, fromCache: true, stale: true }
                : { ok: false, error: failure.error };
        }

        try {
            const tools = Object.freeze([...(await fetcher())]);
            this.store.put(baseUrl, { tools, fetchedAt: this.now(), stale: false });
            this.failures.delete(baseUrl);
            return { ok: true, tools, fromCache: false, stale: false };
        } catch (err) {
            const error = err instanceof RemoteToolError
                ? err
                : new RemoteToolError('transport-error', errorMessage(err), { cause: err });
            this.failures.set(baseUrl, { error, at: this.now() });
            if (cached) {
                console.warn(`  ⚠️ [catalog] Refresh of ${baseUrl} failed (${error.message}); serving stale catalog`);
                return { ok: true, tools: cached.tools, fromCache: true, stale: true };
            }
            return { ok: false, error };
        }
    }

    /** Mark one URL's entry (or every entry) stale so the next load refetches */
    invalidate(baseUrl?: string): void {
        if (baseUrl === undefined) this.failures.clear();
        else this.failures.delete(baseUrl);
        const keys = baseUrl === undefined ? this.store.keys() : [baseUrl];
        for (const key of keys) {
            const entry = this.store.get(key);
            if (entry) this.store.put(key, { ...entry, stale: true });
        }
    }

    private isFresh(entry: CatalogEntry): boolean {
        return !entry.stale && this.now() - entry.fetchedAt < this.ttlMs;
    }
}
