/**
 * @parley/daemon — Model Backend
 *
 * The reasoning loop only needs "text in, text out" from a model, so the
 * backend is a one-method interface. The production implementation calls
 * an OpenAI-compatible chat endpoint (Groq by default) through the `ai`
 * SDK; tests script their own.
 */

import { generateText, APICallError, type ModelMessage } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import type { PromptMessage } from './system-prompt.js';

export interface ModelRequest {
    system: string;
    messages: readonly PromptMessage[];
    stopSequences: readonly string[];
    temperature: number;
}

export interface ModelBackend {
    generate(modelId: string, request: ModelRequest, signal: AbortSignal): Promise<string>;
}

export interface OpenAICompatibleBackendOptions {
    baseURL: string;
    /** Falls back to OPENAI_API_KEY when absent */
    apiKey?: string;
}

function toModelMessage(message: PromptMessage): ModelMessage {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content };
        case 'assistant':
            return { role: 'assistant', content: message.content };
        case 'user':
            return { role: 'user', content: message.content };
    }
}

export class OpenAICompatibleBackend implements ModelBackend {
    private readonly provider: ReturnType<typeof createOpenAI>;

    constructor(options: OpenAICompatibleBackendOptions) {
        this.provider = createOpenAI({
            baseURL: options.baseURL,
            apiKey: options.apiKey,
        });
    }

    async generate(modelId: string, request: ModelRequest, signal: AbortSignal): Promise<string> {
        const { text } = await generateText({
            // Chat Completions: the endpoint other providers implement
            model: this.provider.chat(modelId),
            system: request.system,
            messages: request.messages.map(toModelMessage),
            stopSequences: [...request.stopSequences],
            temperature: request.temperature,
            // Retries belong to the fallback runner
            maxRetries: 0,
            abortSignal: signal,
        });
        return text;
    }
}

// ─── Error Classification ───────────────────────────────────────

const UNAVAILABLE_MARKERS = [
    'decommissioned',
    'model_not_found',
    'no longer supported',
    'does not exist',
    'unknown model',
];

/** True when the backend says the model itself is gone, so another model should be tried */
export function isModelUnavailableError(err: unknown): boolean {
    if (APICallError.isInstance(err)) {
        if (err.statusCode === 404) return true;
        const haystack = `${err.message} ${err.responseBody ?? ''}`.toLowerCase();
        return UNAVAILABLE_MARKERS.some((marker) => haystack.includes(marker));
    }
    if (err instanceof Error) {
        const message = err.message.toLowerCase();
        return UNAVAILABLE_MARKERS.some((marker) => message.includes(marker));
    }
    return false;
}
