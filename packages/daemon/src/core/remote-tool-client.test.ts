import { describe, it, expect, vi } from 'vitest';
import { RemoteToolClient, type FetchLike } from './remote-tool-client.js';
import { RemoteToolError } from './errors.js';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

function clientWith(fetchImpl: FetchLike, timeoutMs = 1_000): RemoteToolClient {
    return new RemoteToolClient({ baseUrl: 'http://tools.test/', timeoutMs, fetch: fetchImpl });
}

async function captureError(promise: Promise<unknown>): Promise<RemoteToolError> {
    try {
        await promise;
    } catch (err) {
        if (err instanceof RemoteToolError) return err;
        throw err;
    }
    throw new Error('expected the call to fail');
}

describe('RemoteToolClient.callTool', () => {
    it('posts the method envelope and returns the result unchanged', async () => {
        const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(jsonResponse({ result: { value: 'X' } }));
        const client = clientWith(fetchImpl);

        await expect(client.callTool('echo', { text: 'X' })).resolves.toEqual({ value: 'X' });

        const [url, init] = fetchImpl.mock.calls[0] ?? [];
        expect(url).toBe('http://tools.test/tools/call');
        expect(init?.method).toBe('POST');
        expect(JSON.parse(String(init?.body))).toEqual({
            method: 'tools/call',
            params: { name: 'echo', arguments: { text: 'X' } },
        });
    });

    it('maps an error body to remote-application-error carrying the server message', async () => {
        const client = clientWith(async () => jsonResponse({ error: 'boom' }));
        const err = await captureError(client.callTool('echo', {}));
        expect(err.kind).toBe('remote-application-error');
        expect(err.message).toBe('boom');
    });

    it('maps a non-2xx status to transport-error', async () => {
        const client = clientWith(async () => new Response('bad gateway', { status: 502 }));
        const err = await captureError(client.callTool('echo', {}));
        expect(err.kind).toBe('transport-error');
        expect(err.status).toBe(502);
        expect(err.message).toBe('tools/call failed with HTTP 502: bad gateway');
    });

    it('maps a body without result or error to transport-error', async () => {
        const client = clientWith(async () => jsonResponse({ status: 'ok' }));
        const err = await captureError(client.callTool('echo', {}));
        expect(err.kind).toBe('transport-error');
        expect(err.message).toBe('tools/call response has neither "result" nor "error"');
    });

    it('maps a non-JSON body to transport-error', async () => {
        const client = clientWith(async () => new Response('<html>', { status: 200 }));
        const err = await captureError(client.callTool('echo', {}));
        expect(err.kind).toBe('transport-error');
        expect(err.message).toBe('tools/call returned a non-JSON body');
    });

    it('maps a connection failure to transport-error', async () => {
        const client = clientWith(async () => {
            throw new TypeError('fetch failed');
        });
        const err = await captureError(client.callTool('echo', {}));
        expect(err.kind).toBe('transport-error');
        expect(err.message).toBe('Could not reach http://tools.test/tools/call: fetch failed');
    });

    it('times out a call that never answers', async () => {
        const hanging: FetchLike = (_url, init) =>
            new Promise((_resolve, reject) => {
                init.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
            });
        const client = clientWith(hanging, 20);
        const err = await captureError(client.callTool('slow', {}));
        expect(err.kind).toBe('transport-error');
        expect(err.timedOut).toBe(true);
        expect(err.message).toBe('tools/call timed out after 20ms');
    });

    it('aborts when the external signal fires', async () => {
        const controller = new AbortController();
        const hanging: FetchLike = (_url, init) =>
            new Promise((_resolve, reject) => {
                init.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
            });
        const client = new RemoteToolClient({
            baseUrl: 'http://tools.test',
            timeoutMs: 5_000,
            fetch: hanging,
            signal: controller.signal,
        });
        const pending = captureError(client.callTool('slow', {}));
        controller.abort();
        const err = await pending;
        expect(err.timedOut).toBe(false);
        expect(err.message).toBe('tools/call was cancelled');
    });
});

describe('RemoteToolClient.listTools', () => {
    it('normalizes both parameter forms and skips malformed entries', async () => {
        const client = clientWith(async () => jsonResponse({
            tools: [
                {
                    name: 'calculator',
                    description: 'Math',
                    parameters: {
                        operation: { type: 'string', description: 'op' },
                        a: { type: 'number', description: 'first' },
                    },
                },
                {
                    name: 'weather',
                    description: 'Weather',
                    parameters: {
                        type: 'object',
                        properties: { city: { type: 'string' }, units: { type: 'string' } },
                        required: ['city'],
                    },
                },
                { description: 'no name' },
            ],
        }));

        const tools = await client.listTools();
        expect(tools.map((t) => t.name)).toEqual(['calculator', 'weather']);
        expect(tools[0]?.parameters['a']).toEqual({ type: 'number', description: 'first', required: true });
        expect(tools[1]?.parameters['city']?.required).toBe(true);
        expect(tools[1]?.parameters['units']?.required).toBe(false);
    });

    it('returns the same catalog on repeated calls', async () => {
        const fetchImpl = vi.fn<FetchLike>().mockImplementation(async () => jsonResponse({
            tools: [{ name: 'uuid', description: 'Generate a UUID' }],
        }));
        const client = clientWith(fetchImpl);
        const first = await client.listTools();
        const second = await client.listTools();
        expect(second).toEqual(first);
        expect(fetchImpl).toHaveBeenCalledTimes(2);
    });
});

describe('RemoteToolClient resources', () => {
    it('lists resources', async () => {
        const client = clientWith(async () => jsonResponse({
            resources: [{ uri: 'docs://readme', name: 'README', mimeType: 'text/markdown' }, { name: 'no uri' }],
        }));
        await expect(client.listResources()).resolves.toEqual([
            { uri: 'docs://readme', name: 'README', mimeType: 'text/markdown' },
        ]);
    });

    it('reads a resource from the contents array', async () => {
        const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(jsonResponse({
            contents: [{ uri: 'docs://readme', text: '# Readme' }],
        }));
        const client = clientWith(fetchImpl);
        await expect(client.readResource('docs://readme')).resolves.toBe('# Readme');
        const [, init] = fetchImpl.mock.calls[0] ?? [];
        expect(JSON.parse(String(init?.body))).toEqual({ method: 'resources/read', params: { uri: 'docs://readme' } });
    });

    it('reads a resource from a result key', async () => {
        const client = clientWith(async () => jsonResponse({ result: 'plain text' }));
        await expect(client.readResource('docs://x')).resolves.toBe('plain text');
    });
});
