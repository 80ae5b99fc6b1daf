/**
 * Tests for Model Fallback module
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runWithModelFallback, ModelUnavailableError, ModelBackendError } from './model-fallback.js';

const NO_WAIT = { minDelayMs: 1, maxDelayMs: 1, jitter: 0 };

function decommissioned(model: string): Error {
    return Object.assign(new Error(`The model \`${model}\` has been decommissioned`), { statusCode: 400 });
}

const isPermanent = (err: unknown): boolean => err instanceof Error && err.message.includes('decommissioned');

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
    vi.restoreAllMocks();
});

describe('runWithModelFallback', () => {
    it('returns result from primary on success', async () => {
        const result = await runWithModelFallback({ primary: 'model-a', run: async () => 'ok', isPermanent });
        expect(result).toEqual({ result: 'ok', model: 'model-a', attempts: [] });
    });

    it('advances to the next model when the primary is decommissioned', async () => {
        const onFallback = vi.fn();
        const run = vi.fn(async (model: string) => {
            if (model === 'model-a') throw decommissioned(model);
            return `answer from ${model}`;
        });

        const result = await runWithModelFallback({
            primary: 'model-a',
            fallbacks: ['model-b', 'model-c'],
            run,
            isPermanent,
            retry: NO_WAIT,
            onFallback,
        });

        expect(result.result).toBe('answer from model-b');
        expect(result.model).toBe('model-b');
        expect(run).toHaveBeenCalledTimes(2);
        expect(onFallback).toHaveBeenCalledWith(
            { model: 'model-a', error: 'The model `model-a` has been decommissioned', status: 400, permanent: true },
            'model-b',
        );
    });

    it('does not retry a permanent error on the same model', async () => {
        const run = vi.fn(async (model: string): Promise<string> => {
            throw decommissioned(model);
        });
        await expect(runWithModelFallback({ primary: 'model-a', run, isPermanent, retry: NO_WAIT }))
            .rejects.toBeInstanceOf(ModelUnavailableError);
        expect(run).toHaveBeenCalledTimes(1);
    });

    it('throws ModelUnavailableError listing every model once the chain is exhausted', async () => {
        const run = async (model: string): Promise<string> => {
            throw decommissioned(model);
        };
        const err = await runWithModelFallback({ primary: 'model-a', fallbacks: ['model-b', 'model-a'], run, isPermanent })
            .catch((e: unknown) => e);
        expect(err).toBeInstanceOf(ModelUnavailableError);
        if (err instanceof ModelUnavailableError) {
            expect(err.message).toBe('No model available (tried model-a, model-b)');
            expect(err.attempts.map((a) => a.model)).toEqual(['model-a', 'model-b']);
        }
    });

    it('retries transient errors on the same model before succeeding', async () => {
        const run = vi.fn()
            .mockRejectedValueOnce(Object.assign(new Error('rate limited'), { status: 429 }))
            .mockResolvedValue('ok');
        const result = await runWithModelFallback({ primary: 'model-a', fallbacks: ['model-b'], run, isPermanent, retry: NO_WAIT });
        expect(result.model).toBe('model-a');
        expect(run).toHaveBeenCalledTimes(2);
    });

    it('stops the chain with ModelBackendError on a non-permanent failure', async () => {
        const run = vi.fn().mockRejectedValue(Object.assign(new Error('Invalid API key'), { statusCode: 401 }));
        const err = await runWithModelFallback({ primary: 'model-a', fallbacks: ['model-b'], run, isPermanent, retry: NO_WAIT })
            .catch((e: unknown) => e);
        expect(err).toBeInstanceOf(ModelBackendError);
        if (err instanceof ModelBackendError) {
            expect(err.message).toBe('Model backend "model-a" failed: Invalid API key');
            expect(err.status).toBe(401);
        }
        expect(run).toHaveBeenCalledTimes(1);
    });

    it('rethrows aborts without trying fallbacks', async () => {
        const controller = new AbortController();
        const run = vi.fn(async (): Promise<string> => {
            controller.abort();
            throw Object.assign(new Error('aborted'), { name: 'AbortError' });
        });
        await expect(runWithModelFallback({ primary: 'model-a', fallbacks: ['model-b'], run, isPermanent, signal: controller.signal }))
            .rejects.toThrow('aborted');
        expect(run).toHaveBeenCalledTimes(1);
    });
});
