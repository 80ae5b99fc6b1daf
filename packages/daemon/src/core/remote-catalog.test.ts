import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RemoteCatalog, type CatalogEntry } from './remote-catalog.js';
import { InMemoryStore } from './store.js';
import { RemoteToolError } from './errors.js';
import type { RemoteToolInfo } from './remote-tool-client.js';

const UUID_TOOL: RemoteToolInfo = { name: 'uuid', description: 'Generate a UUID', parameters: {} };
const TIME_TOOL: RemoteToolInfo = { name: 'time', description: 'Current time', parameters: {} };

describe('RemoteCatalog', () => {
    let store: InMemoryStore<CatalogEntry>;
    let clock: number;
    let catalog: RemoteCatalog;

    beforeEach(() => {
        store = new InMemoryStore<CatalogEntry>();
        clock = 1_000;
        catalog = new RemoteCatalog(store, { ttlMs: 60_000, now: () => clock });
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('fetches once and serves the fresh entry afterwards', async () => {
        const fetcher = vi.fn(async () => [UUID_TOOL]);
        expect(catalog.state('http://a')).toBe('unfetched');

        const first = await catalog.load('http://a', fetcher);
        const second = await catalog.load('http://a', fetcher);

        expect(first).toEqual({ ok: true, tools: [UUID_TOOL], fromCache: false, stale: false });
        expect(second).toEqual({ ok: true, tools: [UUID_TOOL], fromCache: true, stale: false });
        expect(fetcher).toHaveBeenCalledTimes(1);
        expect(catalog.state('http://a')).toBe('fresh');
    });

    it('refetches after invalidation', async () => {
        const fetcher = vi.fn<() => Promise<RemoteToolInfo[]>>()
            .mockResolvedValueOnce([UUID_TOOL])
            .mockResolvedValueOnce([UUID_TOOL, TIME_TOOL]);

        await catalog.load('http://a', fetcher);
        catalog.invalidate('http://a');
        expect(catalog.state('http://a')).toBe('stale');

        const reloaded = await catalog.load('http://a', fetcher);
        expect(reloaded.ok && reloaded.tools.map((t) => t.name)).toEqual(['uuid', 'time']);
        expect(fetcher).toHaveBeenCalledTimes(2);
    });

    it('treats entries older than the TTL as stale', async () => {
        await catalog.load('http://a', async () => [UUID_TOOL]);
        clock += 60_000;
        expect(catalog.state('http://a')).toBe('stale');
    });

    it('drops entries of other URLs when the configured URL changes', async () => {
        await catalog.load('http://a', async () => [UUID_TOOL]);
        await catalog.load('http://b', async () => [TIME_TOOL]);
        expect(store.keys()).toEqual(['http://b']);
        expect(catalog.state('http://a')).toBe('unfetched');
    });

    it('remembers a failure for a short window, then tries again', async () => {
        const failure = new RemoteToolError('transport-error', 'connection refused');
        const fetcher = vi.fn<() => Promise<RemoteToolInfo[]>>()
            .mockRejectedValueOnce(failure)
            .mockResolvedValueOnce([UUID_TOOL]);

        await expect(catalog.load('http://a', fetcher)).resolves.toEqual({ ok: false, error: failure });
        expect(catalog.state('http://a')).toBe('unfetched');

        clock += 29_999;
        await expect(catalog.load('http://a', fetcher)).resolves.toEqual({ ok: false, error: failure });
        expect(fetcher).toHaveBeenCalledTimes(1);

        clock += 1;
        const retried = await catalog.load('http://a', fetcher);
        expect(retried).toEqual({ ok: true, tools: [UUID_TOOL], fromCache: false, stale: false });
        expect(fetcher).toHaveBeenCalledTimes(2);
    });

    it('retries at once after invalidation even inside the failure window', async () => {
        const fetcher = vi.fn<() => Promise<RemoteToolInfo[]>>()
            .mockRejectedValueOnce(new Error('down'))
            .mockResolvedValueOnce([UUID_TOOL]);

        await catalog.load('http://a', fetcher);
        catalog.invalidate('http://a');
        const retried = await catalog.load('http://a', fetcher);
        expect(retried.ok).toBe(true);
        expect(fetcher).toHaveBeenCalledTimes(2);
    });

    it('serves a stale entry when the refetch fails', async () => {
        await catalog.load('http://a', async () => [UUID_TOOL]);
        catalog.invalidate();

        const result = await catalog.load('http://a', async () => {
            throw new Error('down');
        });
        expect(result).toEqual({ ok: true, tools: [UUID_TOOL], fromCache: true, stale: true });
    });

    it('keeps serving the stale entry without refetching while the failure is recent', async () => {
        await catalog.load('http://a', async () => [UUID_TOOL]);
        clock += 60_000;

        const fetcher = vi.fn<() => Promise<RemoteToolInfo[]>>().mockRejectedValue(new Error('down'));
        await catalog.load('http://a', fetcher);
        const again = await catalog.load('http://a', fetcher);

        expect(again).toEqual({ ok: true, tools: [UUID_TOOL], fromCache: true, stale: true });
        expect(fetcher).toHaveBeenCalledTimes(1);
    });
});
