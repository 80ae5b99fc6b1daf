/**
 * @parley/daemon — Remote Tool Protocol Client
 *
 * Stateless HTTP+JSON client for a remote tool server. Every operation is
 * one POST to `{baseUrl}/{method}` with `{"method", "params"}` in the body;
 * the answer carries either the operation's success key or `error`.
 *
 * All failures surface as RemoteToolError:
 *  • transport-error — connection failure, timeout, non-2xx status,
 *    non-JSON body, or a body with neither the success key nor `error`
 *  • remote-application-error — the server answered `{"error": "..."}`
 */

import { z } from 'zod';
import type { ParameterSchema } from '@parley/shared';
import { RemoteToolError, errorMessage, isAbortError } from './errors.js';
import { normalizeParameterSchema } from './tool-schema.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface RemoteToolClientOptions {
    baseUrl: string;
    /** Per-call timeout; 0 disables the client's own timer */
    timeoutMs: number;
    fetch?: FetchLike;
    /** External cancellation (the execution bridge's controller) */
    signal?: AbortSignal;
}

export interface RemoteToolInfo {
    name: string;
    description: string;
    parameters: ParameterSchema;
}

export interface RemoteResourceInfo {
    uri: string;
    name?: string;
    description?: string;
    mimeType?: string;
}

// ─── Wire Schemas ─────────────────────────────────────────────────

const RemoteToolSchema = z.object({
    name: z.string().min(1),
    description: z.string().default(''),
    parameters: z.unknown().optional(),
    // Some servers follow the MCP naming for the schema field
    inputSchema: z.unknown().optional(),
});

const RemoteResourceSchema = z.object({
    uri: z.string().min(1),
    name: z.string().optional(),
    description: z.string().optional(),
    mimeType: z.string().optional(),
});

const BODY_SNIPPET_CHARS = 200;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeRemoteError(value: unknown): string {
    if (typeof value === 'string') return value;
    if (isRecord(value) && typeof value['message'] === 'string') return value['message'];
    return JSON.stringify(value);
}

// ─── Client ───────────────────────────────────────────────────────

export class RemoteToolClient {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: FetchLike;
    private readonly signal?: AbortSignal;

    constructor(options: RemoteToolClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs;
        this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
        this.signal = options.signal;
    }

    async listTools(): Promise<RemoteToolInfo[]> {
        const body = await this.post('tools/list', undefined, ['tools']);
        const raw = body['tools'];
        if (!Array.isArray(raw)) {
            throw new RemoteToolError('transport-error', 'Malformed tools/list response: "tools" is not a list');
        }

        const tools: RemoteToolInfo[] = [];
        for (const item of raw) {
            const parsed = RemoteToolSchema.safeParse(item);
            if (!parsed.success) {
                console.warn(`  ⚠️ [remote] Skipping malformed tool entry: ${JSON.stringify(item)}`);
                continue;
            }
            tools.push({
                name: parsed.data.name,
                description: parsed.data.description,
                parameters: normalizeParameterSchema(parsed.data.parameters ?? parsed.data.inputSchema),
            });
        }
        return tools;
    }

    async callTool(name: string, args: Record<string, unknown>): Promise<unknown> {
        const body = await this.post('tools/call', { name, arguments: args }, ['result']);
        return body['result'];
    }

    async listResources(): Promise<RemoteResourceInfo[]> {
        const body = await this.post('resources/list', undefined, ['resources']);
        const raw = body['resources'];
        if (!Array.isArray(raw)) {
            throw new RemoteToolError('transport-error', 'Malformed resources/list response: "resources" is not a list');
        }
        return raw.flatMap((item) => {
            const parsed = RemoteResourceSchema.safeParse(item);
            return parsed.success ? [parsed.data] : [];
        });
    }

    async readResource(uri: string): Promise<unknown> {
        const body = await this.post('resources/read', { uri }, ['result', 'contents']);
        if ('result' in body) return body['result'];

        const contents = body['contents'];
        if (Array.isArray(contents)) {
            const [first] = contents;
            if (isRecord(first) && typeof first['text'] === 'string') return first['text'];
        }
        return contents;
    }

    // ─── Transport ────────────────────────────────────────────────

    private async post(
        method: string,
        params: Record<string, unknown> | undefined,
        successKeys: readonly string[],
    ): Promise<Record<string, unknown>> {
        const url = `${this.baseUrl}/${method}`;
        const controller = new AbortController();
        let timedOut = false;

        const timer = this.timeoutMs > 0
            ? setTimeout(() => {
                timedOut = true;
                controller.abort();
            }, this.timeoutMs)
            : undefined;
        const onExternalAbort = (): void => controller.abort();
        if (this.signal?.aborted) controller.abort();
        this.signal?.addEventListener('abort', onExternalAbort, { once: true });

        try {
            let response: Response;
            try {
                response = await this.fetchImpl(url, {
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
                    body: JSON.stringify(params === undefined ? { method } : { method, params }),
                    signal: controller.signal,
                });
            } catch (err) {
                if (timedOut) {
                    throw new RemoteToolError('transport-error', `${method} timed out after ${this.timeoutMs}ms`, { timedOut: true, cause: err });
                }
                if (isAbortError(err) || controller.signal.aborted) {
                    throw new RemoteToolError('transport-error', `${method} was cancelled`, { cause: err });
                }
                throw new RemoteToolError('transport-error', `Could not reach ${url}: ${errorMessage(err)}`, { cause: err });
            }

            let text: string;
            try {
                text = await response.text();
            } catch (err) {
                throw new RemoteToolError('transport-error', `${method} response could not be read: ${errorMessage(err)}`, {
                    status: response.status,
                    timedOut,
                    cause: err,
                });
            }

            if (!response.ok) {
                const snippet = text.slice(0, BODY_SNIPPET_CHARS);
                throw new RemoteToolError(
                    'transport-error',
                    `${method} failed with HTTP ${response.status}${snippet ? `: ${snippet}` : ''}`,
                    { status: response.status },
                );
            }

            let parsed: unknown;
            try {
                parsed = JSON.parse(text);
            } catch (err) {
                throw new RemoteToolError('transport-error', `${method} returned a non-JSON body`, { status: response.status, cause: err });
            }
            const body = parsed;
            if (!isRecord(body)) {
                throw new RemoteToolError('transport-error', `${method} returned a non-object JSON body`, { status: response.status });
            }

            if ('error' in body && body['error'] !== null && body['error'] !== undefined) {
                throw new RemoteToolError('remote-application-error', describeRemoteError(body['error']), { status: response.status });
            }
            if (!successKeys.some((key) => key in body)) {
                throw new RemoteToolError(
                    'transport-error',
                    `${method} response has neither ${successKeys.map((k) => `"${k}"`).join(' nor ')} nor "error"`,
                    { status: response.status },
                );
            }
            return body;
        } finally {
            if (timer !== undefined) clearTimeout(timer);
            this.signal?.removeEventListener('abort', onExternalAbort);
        }
    }
}
