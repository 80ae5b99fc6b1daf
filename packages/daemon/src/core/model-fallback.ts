/**
 * @parley/daemon — Model Fallback
 *
 * Runs one model call down an ordered candidate chain. Transient errors
 * (429, 5xx, connection resets) are retried with backoff on the same
 * model; a permanent-unavailability error (decommissioned, not found)
 * moves on to the next candidate. Anything else stops the chain.
 *
 * No state survives a call: the caller keeps whichever model worked.
 */

import { retryAsync, isRetryableError, type RetryConfig } from './retry.js';
import { errorMessage, isAbortError } from './errors.js';

// ─── Types ───────────────────────────────────────────────────────

export interface FallbackAttempt {
    model: string;
    error: string;
    status?: number;
    permanent: boolean;
}

export interface ModelFallbackResult<T> {
    result: T;
    model: string;
    attempts: FallbackAttempt[];
}

export interface ModelFallbackOptions<T> {
    primary: string;
    fallbacks?: readonly string[];
    run: (model: string) => Promise<T>;
    /** True for errors that mean the model itself is gone */
    isPermanent: (err: unknown) => boolean;
    retry?: Partial<RetryConfig>;
    signal?: AbortSignal;
    onFallback?: (attempt: FallbackAttempt, next: string) => void;
}

// ─── Errors ──────────────────────────────────────────────────────

/** Every candidate in the chain is permanently unavailable */
export class ModelUnavailableError extends Error {
    readonly attempts: readonly FallbackAttempt[];

    constructor(attempts: readonly FallbackAttempt[]) {
        const tried = attempts.map((a) => a.model).join(', ');
        super(`No model available (tried ${tried || 'none'})`);
        this.name = 'ModelUnavailableError';
        this.attempts = attempts;
    }
}

/** A candidate failed for a reason a different model would not fix */
export class ModelBackendError extends Error {
    readonly model: string;
    readonly status?: number;
    readonly attempts: readonly FallbackAttempt[];

    constructor(model: string, attempts: readonly FallbackAttempt[], cause: unknown) {
        super(`Model backend "${model}" failed: ${errorMessage(cause)}`, { cause });
        this.name = 'ModelBackendError';
        this.model = model;
        this.status = statusOf(cause);
        this.attempts = attempts;
    }
}

function statusOf(err: unknown): number | undefined {
    if (!err || typeof err !== 'object') return undefined;
    const status: unknown = 'statusCode' in err ? err.statusCode : 'status' in err ? err.status : undefined;
    return typeof status === 'number' ? status : undefined;
}

// ─── Main ────────────────────────────────────────────────────────

const DEFAULT_RETRY: RetryConfig = {
    attempts: 2,
    minDelayMs: 500,
    maxDelayMs: 5_000,
    jitter: 0.3,
};

export async function runWithModelFallback<T>(options: ModelFallbackOptions<T>): Promise<ModelFallbackResult<T>> {
    const candidates = [options.primary];
    for (const model of options.fallbacks ?? []) {
        if (!candidates.includes(model)) candidates.push(model);
    }

    const retry = { ...DEFAULT_RETRY, ...options.retry };
    const attempts: FallbackAttempt[] = [];

    for (const [index, model] of candidates.entries()) {
        try {
            const result = await retryAsync(() => options.run(model), {
                ...retry,
                label: `model:${model}`,
                signal: options.signal,
                shouldRetry: (err) => !options.isPermanent(err) && isRetryableError(err),
                onRetry: (info) => {
                    console.log(`  🔄 [model-fallback] Retrying ${model} (attempt ${info.attempt}/${info.maxAttempts}, delay ${info.delayMs}ms)`);
                },
            });
            return { result, model, attempts };
        } catch (err) {
            if (isAbortError(err) || options.signal?.aborted) throw err;

            const permanent = options.isPermanent(err);
            const status = statusOf(err);
            const attempt: FallbackAttempt = {
                model,
                error: errorMessage(err).slice(0, 200),
                ...(status !== undefined ? { status } : {}),
                permanent,
            };
            attempts.push(attempt);

            if (!permanent) throw new ModelBackendError(model, attempts, err);

            const next = candidates[index + 1];
            console.warn(`  ⚠️ [model-fallback] ${model} is unavailable${next ? `; falling back to ${next}` : ''}`);
            if (next !== undefined) options.onFallback?.(attempt, next);
        }
    }

    throw new ModelUnavailableError(attempts);
}
