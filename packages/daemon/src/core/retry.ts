/**
 * @parley/daemon — Retry with Exponential Backoff
 *
 * Generic `retryAsync()` with exponential backoff, jitter, a
 * configurable shouldRetry, an onRetry hook, and an AbortSignal that
 * cuts both the attempts and the sleeps between them short. Used by
 * the model fallback runner for transient backend failures.
 */

// ─── Types ───────────────────────────────────────────────────────

export interface RetryConfig {
    attempts: number;
    minDelayMs: number;
    maxDelayMs: number;
    /** Jitter factor 0–1. 0 = no jitter, 1 = ±100% randomization */
    jitter: number;
}

export interface RetryInfo {
    attempt: number;
    maxAttempts: number;
    delayMs: number;
    err: unknown;
    label?: string;
}

export interface RetryOptions extends Partial<RetryConfig> {
    label?: string;
    /** Return false to stop retrying for this specific error */
    shouldRetry?: (err: unknown, attempt: number) => boolean;
    onRetry?: (info: RetryInfo) => void;
    /** Aborting stops further attempts and wakes a pending backoff sleep */
    signal?: AbortSignal;
}

// ─── Defaults ────────────────────────────────────────────────────

const DEFAULT_CONFIG: RetryConfig = {
    attempts: 3,
    minDelayMs: 300,
    maxDelayMs: 30_000,
    jitter: 0.2,
};

// ─── Helpers ─────────────────────────────────────────────────────

function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}

function applyJitter(delayMs: number, jitter: number): number {
    if (jitter <= 0) return delayMs;
    const offset = (Math.random() * 2 - 1) * jitter;
    return Math.max(0, Math.round(delayMs * (1 + offset)));
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const timer = setTimeout(done, ms);
        function done(): void {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        }
        signal?.addEventListener('abort', done, { once: true });
    });
}

function readProperty(err: unknown, key: string): unknown {
    if (!err || typeof err !== 'object' || !(key in err)) return undefined;
    const value: unknown = Reflect.get(err, key);
    return value;
}

// ─── Main ────────────────────────────────────────────────────────

/**
 * Retry an async function with exponential backoff and jitter.
 *
 * @example
 * const text = await retryAsync(() => backend.generate(model, prompt, signal), { attempts: 2, label: 'think' });
 */
export async function retryAsync<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {},
): Promise<T> {
    const maxAttempts = Math.max(1, Math.round(options.attempts ?? DEFAULT_CONFIG.attempts));
    const minDelayMs = Math.max(0, Math.round(options.minDelayMs ?? DEFAULT_CONFIG.minDelayMs));
    const maxDelayMs = Math.max(minDelayMs, Math.round(options.maxDelayMs ?? DEFAULT_CONFIG.maxDelayMs));
    const jitter = clamp(options.jitter ?? DEFAULT_CONFIG.jitter, 0, 1);
    const shouldRetry = options.shouldRetry ?? (() => true);

    let lastErr: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            return await fn();
        } catch (err) {
            lastErr = err;

            if (attempt >= maxAttempts || options.signal?.aborted || !shouldRetry(err, attempt)) {
                break;
            }

            let delay = clamp(minDelayMs * 2 ** (attempt - 1), minDelayMs, maxDelayMs);
            delay = clamp(applyJitter(delay, jitter), minDelayMs, maxDelayMs);

            options.onRetry?.({
                attempt,
                maxAttempts,
                delayMs: delay,
                err,
                label: options.label,
            });

            await sleep(delay, options.signal);
            if (options.signal?.aborted) break;
        }
    }

    throw lastErr ?? new Error('Retry failed');
}

// ─── Convenience: shouldRetry for HTTP-like errors ───────────────

/** Returns true for transient errors (429, 5xx, network errors) */
export function isRetryableError(err: unknown): boolean {
    if (!err || typeof err !== 'object') return false;

    // Provider SDK errors (ai's APICallError) carry their own verdict
    const flagged = readProperty(err, 'isRetryable');
    if (typeof flagged === 'boolean') return flagged;

    const status = readProperty(err, 'status') ?? readProperty(err, 'statusCode');
    if (typeof status === 'number') {
        return status === 429 || (status >= 500 && status < 600);
    }
    const code = readProperty(err, 'code');
    if (typeof code === 'string') {
        return ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'UND_ERR_SOCKET'].includes(code);
    }
    return false;
}
