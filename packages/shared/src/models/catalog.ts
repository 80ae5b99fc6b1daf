/**
 * @parley/shared — Model Catalog
 *
 * Known model backends served through the configured OpenAI-compatible
 * provider, each with the ordered chain of alternatives tried when the
 * backend reports it has been decommissioned or removed.
 */

export interface ModelInfo {
    readonly id: string;
    readonly label: string;
    readonly hint?: string;
    readonly contextWindow: number;
    /** Tried in order when this model is permanently unavailable */
    readonly fallbackChain: readonly string[];
}

export const DEFAULT_MODEL_ID = 'openai/gpt-oss-120b';

export const KNOWN_MODELS: readonly ModelInfo[] = [
    {
        id: 'openai/gpt-oss-120b',
        label: 'GPT-OSS 120B',
        hint: 'recommended',
        contextWindow: 131_072,
        fallbackChain: ['llama-3.3-70b-versatile', 'llama-3.1-8b-instant'],
    },
    {
        id: 'openai/gpt-oss-20b',
        label: 'GPT-OSS 20B',
        hint: 'fast',
        contextWindow: 131_072,
        fallbackChain: ['openai/gpt-oss-120b', 'llama-3.1-8b-instant'],
    },
    {
        id: 'llama-3.3-70b-versatile',
        label: 'LLaMA 3.3 70B',
        contextWindow: 131_072,
        fallbackChain: ['llama-3.1-8b-instant'],
    },
    {
        id: 'llama-3.1-8b-instant',
        label: 'LLaMA 3.1 8B Instant',
        hint: 'fastest',
        contextWindow: 131_072,
        fallbackChain: [],
    },
];

export function findModel(id: string): ModelInfo | undefined {
    return KNOWN_MODELS.find((m) => m.id === id);
}
