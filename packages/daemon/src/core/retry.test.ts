/**
 * Tests for Retry with Backoff module
 */
import { describe, it, expect, vi } from 'vitest';
import { retryAsync, isRetryableError } from './retry.js';

describe('retryAsync', () => {
    it('returns result on first success', async () => {
        const fn = vi.fn().mockResolvedValue('ok');
        const result = await retryAsync(fn, { attempts: 3, minDelayMs: 10, maxDelayMs: 20, jitter: 0 });
        expect(result).toBe('ok');
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it('retries on failure and succeeds', async () => {
        const fn = vi.fn()
            .mockRejectedValueOnce(new Error('temporary'))
            .mockResolvedValue('ok');
        const result = await retryAsync(fn, { attempts: 3, minDelayMs: 10, maxDelayMs: 20, jitter: 0 });
        expect(result).toBe('ok');
        expect(fn).toHaveBeenCalledTimes(2);
    });

    it('throws after exhausting attempts', async () => {
        const fn = vi.fn().mockRejectedValue(new Error('persistent'));
        await expect(retryAsync(fn, { attempts: 2, minDelayMs: 10, maxDelayMs: 20, jitter: 0 }))
            .rejects.toThrow('persistent');
        expect(fn).toHaveBeenCalledTimes(2);
    });

    it('respects shouldRetry to skip non-retryable errors', async () => {
        const fn = vi.fn().mockRejectedValue(new Error('Invalid API key'));
        await expect(retryAsync(fn, {
            attempts: 3,
            minDelayMs: 10,
            maxDelayMs: 20,
            jitter: 0,
            shouldRetry: () => false,
        })).rejects.toThrow('Invalid API key');
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it('calls onRetry callback with RetryInfo', async () => {
        const onRetry = vi.fn();
        const fn = vi.fn()
            .mockRejectedValueOnce(new Error('timeout'))
            .mockResolvedValue('ok');
        await retryAsync(fn, { attempts: 3, minDelayMs: 10, maxDelayMs: 20, jitter: 0, onRetry, label: 'think' });
        expect(onRetry).toHaveBeenCalledTimes(1);
        expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({
            attempt: 1,
            maxAttempts: 3,
            delayMs: 10,
            label: 'think',
        }));
    });

    it('stops retrying once the signal is aborted', async () => {
        const controller = new AbortController();
        const fn = vi.fn().mockImplementation(async () => {
            controller.abort();
            throw new Error('down');
        });
        await expect(retryAsync(fn, { attempts: 5, minDelayMs: 10, jitter: 0, signal: controller.signal }))
            .rejects.toThrow('down');
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it('wakes a pending backoff sleep when aborted', async () => {
        const controller = new AbortController();
        const fn = vi.fn().mockRejectedValue(new Error('slow'));
        const started = Date.now();
        const pending = retryAsync(fn, { attempts: 3, minDelayMs: 5_000, maxDelayMs: 5_000, jitter: 0, signal: controller.signal });
        setTimeout(() => controller.abort(), 20);
        await expect(pending).rejects.toThrow('slow');
        expect(Date.now() - started).toBeLessThan(2_000);
        expect(fn).toHaveBeenCalledTimes(1);
    });
});

describe('isRetryableError', () => {
    it('returns true for 429 status', () => {
        expect(isRetryableError({ status: 429 })).toBe(true);
    });

    it('returns true for 5xx statusCode', () => {
        expect(isRetryableError({ statusCode: 500 })).toBe(true);
        expect(isRetryableError({ status: 503 })).toBe(true);
    });

    it('returns true for network error codes', () => {
        expect(isRetryableError({ code: 'ECONNRESET' })).toBe(true);
        expect(isRetryableError({ code: 'ETIMEDOUT' })).toBe(true);
    });

    it('defers to an explicit isRetryable flag', () => {
        expect(isRetryableError({ isRetryable: false, statusCode: 503 })).toBe(false);
        expect(isRetryableError({ isRetryable: true, statusCode: 400 })).toBe(true);
    });

    it('returns false for 400 errors', () => {
        expect(isRetryableError({ status: 400 })).toBe(false);
    });

    it('returns false for null/undefined', () => {
        expect(isRetryableError(null)).toBe(false);
        expect(isRetryableError(undefined)).toBe(false);
    });
});
