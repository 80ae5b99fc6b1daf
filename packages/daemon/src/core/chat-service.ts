/**
 * @parley/daemon — Chat Service
 *
 * The caller boundary. Each request gets its own tool registry and
 * agent session; the execution bridge and the remote catalog cache are
 * the only things shared between requests. Nothing thrown inside a
 * request escapes: every path ends in a ChatOutcome.
 */

import type { AgentFailureReason, ChatHistoryMessage } from '@parley/shared';
import { AgentOrchestrator, type AgentEvents, type AgentLimits } from './agent-orchestrator.js';
import { OpenAICompatibleBackend, type ModelBackend } from './model-backend.js';
import { ModelSelector } from './model-selector.js';
import { ToolRegistry, type ToolCatalog } from './tool-registry.js';
import { RemoteToolServer } from './remote-tool-server.js';
import type { ExecutionBridge } from './execution-bridge.js';
import type { RemoteCatalog } from './remote-catalog.js';
import type { FetchLike } from './remote-tool-client.js';
import type { RetryConfig } from './retry.js';
import type { ReasoningStep } from './scratchpad.js';
import { LOCAL_TOOLS, type LocalTool } from './tools/index.js';
import { errorMessage } from './errors.js';
import {
    getAgentLimits,
    getProviderConfig,
    getRemoteConfig,
    type ProviderConfig,
    type RemoteConfig,
} from '../infra/llm-config.js';

export interface ChatSettings {
    provider: ProviderConfig;
    limits: AgentLimits;
    remote: RemoteConfig;
}

export interface ChatServiceOptions {
    bridge: ExecutionBridge;
    catalog: RemoteCatalog;
    localTools?: readonly LocalTool[];
    /** Read on every request; defaults to the Vault and environment */
    settings?: () => ChatSettings;
    createBackend?: (provider: ProviderConfig) => ModelBackend;
    fetch?: FetchLike;
    now?: () => number;
    retry?: Partial<RetryConfig>;
}

export interface ChatInput {
    message: string;
    history?: readonly ChatHistoryMessage[];
    /** Requested model; unknown or absent means the configured default */
    model?: string;
}

export interface ChatOutcome {
    status: 'finished' | 'failed';
    /** The final answer, or a message that is safe to show */
    text: string;
    model: string;
    failureReason?: AgentFailureReason;
    iterations: number;
    steps: readonly ReasoningStep[];
}

export const UNEXPECTED_FAILURE = 'Something went wrong while answering. Please try again.';
export const EMPTY_MESSAGE = 'Message must not be empty.';

function defaultSettings(): ChatSettings {
    return {
        provider: getProviderConfig(),
        limits: getAgentLimits(),
        remote: getRemoteConfig(),
    };
}

export class ChatService {
    private readonly bridge: ExecutionBridge;
    private readonly catalog: RemoteCatalog;
    private readonly localTools: readonly LocalTool[];
    private readonly settings: () => ChatSettings;
    private readonly createBackend: (provider: ProviderConfig) => ModelBackend;
    private readonly fetchImpl?: FetchLike;
    private readonly now?: () => number;
    private readonly retry?: Partial<RetryConfig>;
    private selector?: ModelSelector;

    constructor(options: ChatServiceOptions) {
        this.bridge = options.bridge;
        this.catalog = options.catalog;
        this.localTools = options.localTools ?? LOCAL_TOOLS;
        this.settings = options.settings ?? defaultSettings;
        this.createBackend = options.createBackend
            ?? ((provider) => new OpenAICompatibleBackend({ baseURL: provider.baseURL, apiKey: provider.apiKey }));
        this.fetchImpl = options.fetch;
        this.now = options.now;
        this.retry = options.retry;
    }

    async chat(input: ChatInput, events: AgentEvents = {}): Promise<ChatOutcome> {
        if (input.message.trim() === '') {
            return { status: 'failed', text: EMPTY_MESSAGE, model: '', iterations: 0, steps: [] };
        }

        let model = input.model ?? '';
        try {
            const settings = this.settings();
            const choice = this.selectorFor(settings.provider.defaultModel).select(input.model);
            model = choice.identifier;
            if (choice.substituted) {
                console.warn(`  ⚠️ [chat] Unknown model "${choice.requested ?? ''}"; using ${choice.identifier}`);
            }

            const agent = new AgentOrchestrator({
                backend: this.createBackend(settings.provider),
                limits: settings.limits,
                ...(this.now ? { now: this.now } : {}),
                ...(this.retry ? { retry: this.retry } : {}),
            });
            const result = await agent.run(
                { message: input.message, history: input.history ?? [], model: choice },
                this.buildRegistry(settings),
                events,
            );

            if (result.status === 'finished') {
                console.log(`  ✅ [chat] Answered via ${result.model} in ${result.iterations} step(s)`);
                return {
                    status: 'finished',
                    text: result.answer,
                    model: result.model,
                    iterations: result.iterations,
                    steps: result.steps,
                };
            }

            console.warn(`  ⚠️ [chat] Request ended with ${result.reason} after ${result.iterations} step(s)`);
            return {
                status: 'failed',
                text: result.partial ? `${result.message}\n\nLast thought: ${result.partial}` : result.message,
                model: result.model,
                failureReason: result.reason,
                iterations: result.iterations,
                steps: result.steps,
            };
        } catch (err) {
            console.error(`  ❌ [chat] Unexpected failure: ${errorMessage(err)}`);
            return { status: 'failed', text: UNEXPECTED_FAILURE, model, iterations: 0, steps: [] };
        }
    }

    /** Local tools plus whatever the remote server currently offers */
    async listTools(): Promise<ToolCatalog> {
        return this.buildRegistry(this.settings()).listCatalog();
    }

    private buildRegistry(settings: ChatSettings): ToolRegistry {
        const url = settings.remote.url;
        const remote = url
            ? new RemoteToolServer({
                baseUrl: url,
                timeoutMs: Math.min(settings.remote.timeoutMs, settings.limits.deadlineMs),
                bridge: this.bridge,
                catalog: this.catalog,
                ...(this.fetchImpl ? { fetch: this.fetchImpl } : {}),
            })
            : undefined;
        return new ToolRegistry({ localTools: this.localTools, ...(remote ? { remote } : {}) });
    }

    private selectorFor(defaultModel: string): ModelSelector {
        if (!this.selector || this.selector.configuredDefault !== defaultModel) {
            this.selector = new ModelSelector({ defaultModel });
        }
        return this.selector;
    }
}
