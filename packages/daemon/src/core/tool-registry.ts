/**
 * @parley/daemon — Tool Registry
 *
 * One invocation contract for local and remote tools. A registry is
 * built per request: local tools are registered up front, the remote
 * catalog is merged in on first use (through the shared catalog cache).
 *
 * `invoke()` never throws. Unknown names, argument problems, remote
 * failures and throwing local tools all come back as a ToolError that
 * the reasoning loop turns into an observation.
 */

import type { ParameterSchema, ToolCatalogEntry, ToolKind } from '@parley/shared';
import type { LocalTool } from './tools/local-tool.js';
import type { RemoteToolServer } from './remote-tool-server.js';
import type { BridgeOutcome } from './execution-bridge.js';
import { errorMessage, type ToolError } from './errors.js';
import {
    buildArgumentValidator,
    decodeActionInput,
    describeValidationError,
    type ArgumentValidator,
} from './tool-schema.js';

// ─── Types ────────────────────────────────────────────────────────

export type ToolDescriptor = ToolCatalogEntry;

export type ToolResolution =
    | { status: 'found'; name: string; descriptor: ToolDescriptor }
    | { status: 'not-found' }
    | { status: 'ambiguous'; candidates: string[] };

export type ToolInvocationResult =
    | { ok: true; tool: string; output: string }
    | { ok: false; tool: string; error: ToolError };

export interface ToolCatalog {
    tools: readonly ToolDescriptor[];
    remoteCatalogUnavailable: boolean;
    remoteError?: string;
}

export interface InvokeOptions {
    /** Upper bound for a remote call; defaults to the server's timeout */
    timeoutMs?: number;
    signal?: AbortSignal;
}

type HandlerResult = { ok: true; value: unknown } | { ok: false; error: ToolError };

interface ToolHandle {
    descriptor: ToolDescriptor;
    validator: ArgumentValidator;
    run(args: Record<string, unknown>, options: InvokeOptions): Promise<HandlerResult>;
}

export interface ToolRegistryOptions {
    localTools: readonly LocalTool[];
    remote?: RemoteToolServer;
}

export const LIST_RESOURCES_TOOL = 'list_remote_resources';
export const READ_RESOURCE_TOOL = 'read_remote_resource';

// ─── Helpers ──────────────────────────────────────────────────────

function descriptorOf(name: string, description: string, kind: ToolKind, parameters: ParameterSchema): ToolDescriptor {
    return Object.freeze({ name, description, kind, parameters: Object.freeze({ ...parameters }) });
}

/** Canonical form for the lenient name match: trimmed, unquoted, lowercase */
export function normalizeToolName(name: string): string {
    return name.trim().replace(/^["'`]+|["'`]+$/g, '').trim().toLowerCase();
}

export function formatToolOutput(value: unknown): string {
    if (value === undefined || value === null) return '(no output)';
    if (typeof value === 'string') return value.trim() === '' ? '(no output)' : value;
    // JSON would print Infinity and NaN as null
    if (typeof value === 'number') return String(value);
    return JSON.stringify(value, null, 2);
}

function fromBridge(outcome: BridgeOutcome<unknown>): HandlerResult {
    return outcome.ok ? outcome : { ok: false, error: outcome.error.toToolError() };
}

// ─── Registry ─────────────────────────────────────────────────────

export class ToolRegistry {
    private readonly handles = new Map<string, ToolHandle>();
    private readonly remote?: RemoteToolServer;
    private remoteLoad?: Promise<void>;
    private remoteUnavailable = false;
    private remoteError?: string;

    constructor(options: ToolRegistryOptions) {
        this.remote = options.remote;
        for (const tool of options.localTools) {
            if (this.handles.has(tool.name)) {
                throw new Error(`Duplicate local tool name "${tool.name}"`);
            }
            this.add(descriptorOf(tool.name, tool.description, 'local', tool.parameters), async (args, { signal }) => {
                try {
                    const value = await tool.execute(args, signal ?? new AbortController().signal);
                    return { ok: true, value };
                } catch (err) {
                    return {
                        ok: false,
                        error: { kind: 'tool-execution-error', message: `Tool "${tool.name}" failed: ${errorMessage(err)}` },
                    };
                }
            });
        }
    }

    /** True once a configured remote server could not deliver its catalog */
    get remoteCatalogUnavailable(): boolean {
        return this.remoteUnavailable;
    }

    get lastRemoteError(): string | undefined {
        return this.remoteError;
    }

    /**
     * Fetch and merge the remote catalog; runs at most once per registry, so
     * only the first caller's timeout applies.
     */
    ensureRemoteCatalog(options: { timeoutMs?: number } = {}): Promise<void> {
        this.remoteLoad ??= this.loadRemote(options.timeoutMs);
        return this.remoteLoad;
    }

    names(): string[] {
        return Array.from(this.handles.keys());
    }

    descriptors(): readonly ToolDescriptor[] {
        return Object.freeze(Array.from(this.handles.values(), (h) => h.descriptor));
    }

    /**
     * Exact name first; otherwise a unique match after trimming, unquoting
     * and lowercasing. Several candidates are reported as ambiguous.
     */
    resolve(name: string): ToolResolution {
        const exact = this.handles.get(name);
        if (exact) return { status: 'found', name, descriptor: exact.descriptor };

        const wanted = normalizeToolName(name);
        if (wanted === '') return { status: 'not-found' };
        const candidates = this.names().filter((n) => normalizeToolName(n) === wanted);
        const [only] = candidates;
        if (candidates.length === 1 && only !== undefined) {
            const handle = this.handles.get(only);
            if (handle) return { status: 'found', name: only, descriptor: handle.descriptor };
        }
        return candidates.length > 1 ? { status: 'ambiguous', candidates } : { status: 'not-found' };
    }

    /** Decode, validate and run a tool. Never throws. */
    async invoke(
        name: string,
        input: string | Record<string, unknown>,
        options: InvokeOptions = {},
    ): Promise<ToolInvocationResult> {
        await this.ensureRemoteCatalog();

        const resolution = this.resolve(name);
        if (resolution.status !== 'found') {
            const detail = resolution.status === 'ambiguous'
                ? `matches several tools (${resolution.candidates.join(', ')})`
                : 'is not registered';
            return {
                ok: false,
                tool: name,
                error: { kind: 'tool-not-found', message: `Tool "${name}" ${detail}. Available tools: ${this.names().join(', ')}` },
            };
        }

        const tool = resolution.name;
        const handle = this.handles.get(tool);
        if (!handle) {
            return { ok: false, tool, error: { kind: 'tool-not-found', message: `Tool "${tool}" is not registered` } };
        }

        let args: Record<string, unknown>;
        if (typeof input === 'string') {
            const decoded = decodeActionInput(input, handle.descriptor.parameters);
            if (!decoded.ok) {
                return { ok: false, tool, error: { kind: 'schema-validation-error', message: decoded.error } };
            }
            args = decoded.args;
        } else {
            args = input;
        }

        const validated = handle.validator.safeParse(args);
        if (!validated.success) {
            return {
                ok: false,
                tool,
                error: {
                    kind: 'schema-validation-error',
                    message: `Invalid arguments for "${tool}": ${describeValidationError(validated.error)}`,
                },
            };
        }

        const result = await handle.run(validated.data, options);
        if (!result.ok) return { ok: false, tool, error: result.error };
        return { ok: true, tool, output: formatToolOutput(result.value) };
    }

    async listCatalog(): Promise<ToolCatalog> {
        await this.ensureRemoteCatalog();
        return {
            tools: this.descriptors(),
            remoteCatalogUnavailable: this.remoteUnavailable,
            ...(this.remoteError !== undefined ? { remoteError: this.remoteError } : {}),
        };
    }

    // ─── Internals ────────────────────────────────────────────────

    private add(descriptor: ToolDescriptor, run: ToolHandle['run']): void {
        this.handles.set(descriptor.name, {
            descriptor,
            validator: buildArgumentValidator(descriptor.parameters),
            run,
        });
    }

    private async loadRemote(timeoutMs?: number): Promise<void> {
        const remote = this.remote;
        if (!remote) return;

        const loaded = await remote.loadCatalog(timeoutMs);
        if (!loaded.ok) {
            this.remoteUnavailable = true;
            this.remoteError = loaded.error.message;
            console.warn(`  ⚠️ [tools] Remote catalog unavailable (${remote.baseUrl}): ${loaded.error.message}`);
            return;
        }
        if (loaded.stale) {
            this.remoteError = `Serving a stale catalog for ${remote.baseUrl}`;
        }

        this.addResourceTools(remote);

        for (const info of loaded.tools) {
            if (this.handles.has(info.name)) {
                console.warn(`  ⚠️ [tools] Remote tool "${info.name}" shadows an existing tool; keeping the existing one`);
                continue;
            }
            this.add(
                descriptorOf(info.name, info.description, 'remote', info.parameters),
                async (args, { timeoutMs }) => fromBridge(await remote.callTool(info.name, args, timeoutMs)),
            );
        }
    }

    private addResourceTools(remote: RemoteToolServer): void {
        this.add(
            descriptorOf(LIST_RESOURCES_TOOL, `Lists the documents and other resources offered by the remote tool server at ${remote.baseUrl}.`, 'remote', {}),
            async (_args, { timeoutMs }) => fromBridge(await remote.listResources(timeoutMs)),
        );
        this.add(
            descriptorOf(READ_RESOURCE_TOOL, 'Reads one resource from the remote tool server by its URI (see list_remote_resources).', 'remote', {
                uri: { type: 'string', description: 'Resource URI, e.g. docs://readme', required: true },
            }),
            async (args, { timeoutMs }) => {
                const uri = args['uri'];
                if (typeof uri !== 'string') {
                    return { ok: false, error: { kind: 'schema-validation-error', message: 'uri must be a string' } };
                }
                return fromBridge(await remote.readResource(uri, timeoutMs));
            },
        );
    }
}
