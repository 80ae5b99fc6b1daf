/**
 * @parley/daemon — Model Selector
 *
 * Picks the model identifier for a request. A requested identifier must
 * be in the known catalog; anything else (or nothing) gets the default.
 */

import { DEFAULT_MODEL_ID, KNOWN_MODELS, type ModelInfo } from '@parley/shared';

export interface ModelChoice {
    identifier: string;
    fallbackChain: readonly string[];
    /** What the caller asked for, when it asked */
    requested?: string;
    /** True when the request named a model we do not know */
    substituted: boolean;
}

export interface ModelSelectorOptions {
    models?: readonly ModelInfo[];
    defaultModel?: string;
}

export class ModelSelector {
    private readonly models: readonly ModelInfo[];
    private readonly fallbackDefault: ModelInfo;
    /** The default as configured, even when it was not recognised */
    readonly configuredDefault: string;

    constructor(options: ModelSelectorOptions = {}) {
        this.models = options.models ?? KNOWN_MODELS;
        const wanted = options.defaultModel ?? DEFAULT_MODEL_ID;
        this.configuredDefault = wanted;
        const configured = this.find(wanted);
        const builtIn = this.find(DEFAULT_MODEL_ID) ?? this.models[0];
        if (!builtIn) throw new Error('ModelSelector needs at least one known model');
        if (!configured) {
            console.warn(`  ⚠️ [models] Configured default "${wanted}" is not a known model; using ${builtIn.id}`);
        }
        this.fallbackDefault = configured ?? builtIn;
    }

    get defaultModel(): string {
        return this.fallbackDefault.id;
    }

    select(requested?: string): ModelChoice {
        const wanted = requested?.trim();
        const known = wanted ? this.find(wanted) : undefined;
        const chosen = known ?? this.fallbackDefault;
        return {
            identifier: chosen.id,
            fallbackChain: chosen.fallbackChain,
            ...(wanted ? { requested: wanted } : {}),
            substituted: Boolean(wanted) && !known,
        };
    }

    private find(id: string): ModelInfo | undefined {
        return this.models.find((m) => m.id === id);
    }
}
