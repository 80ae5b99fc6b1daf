import { describe, it, expect, vi, afterEach } from 'vitest';
import { ExecutionBridge } from './execution-bridge.js';
import { RemoteToolError } from './errors.js';

function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

afterEach(() => {
    vi.restoreAllMocks();
});

describe('ExecutionBridge.run', () => {
    it('returns the task value', async () => {
        const bridge = new ExecutionBridge({ maxConcurrent: 2 });
        await expect(bridge.run('echo', async () => 'X', 1_000)).resolves.toEqual({ ok: true, value: 'X' });
    });

    it('passes RemoteToolErrors through unchanged', async () => {
        const bridge = new ExecutionBridge({ maxConcurrent: 1 });
        const failure = new RemoteToolError('remote-application-error', 'boom');
        const outcome = await bridge.run('echo', async () => {
            throw failure;
        }, 1_000);
        expect(outcome).toEqual({ ok: false, error: failure });
    });

    it('wraps other errors as transport-error', async () => {
        const bridge = new ExecutionBridge({ maxConcurrent: 1 });
        const outcome = await bridge.run('echo', async () => {
            throw new Error('socket hang up');
        }, 1_000);
        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.error.kind).toBe('transport-error');
            expect(outcome.error.message).toBe('echo failed: socket hang up');
        }
    });

    it('returns a timeout error within the window and aborts the task', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const bridge = new ExecutionBridge({ maxConcurrent: 1 });
        let aborted = false;
        const started = Date.now();

        const outcome = await bridge.run('slow', (signal) => new Promise<string>((resolve) => {
            signal.addEventListener('abort', () => {
                aborted = true;
            });
            setTimeout(() => resolve('late'), 300);
        }), 30);

        expect(Date.now() - started).toBeLessThan(250);
        expect(aborted).toBe(true);
        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.error.kind).toBe('transport-error');
            expect(outcome.error.timedOut).toBe(true);
            expect(outcome.error.message).toBe('slow timed out after 30ms');
        }
    });

    it('discards a late result after the timeout', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const bridge = new ExecutionBridge({ maxConcurrent: 1 });

        const outcome = await bridge.run('slow', () => delay(60).then(() => 'late'), 10);
        expect(outcome.ok).toBe(false);

        await delay(100);
        expect(warn).toHaveBeenCalledWith('  ⏱️ [bridge] Discarding late result of "slow"');
        expect(bridge.activeCount).toBe(0);
    });

    it('never runs more than maxConcurrent tasks at once', async () => {
        const bridge = new ExecutionBridge({ maxConcurrent: 2 });
        let running = 0;
        let peak = 0;

        const task = async (): Promise<number> => {
            running++;
            peak = Math.max(peak, running);
            await delay(20);
            running--;
            return peak;
        };

        const outcomes = await Promise.all(
            Array.from({ length: 5 }, (_, i) => bridge.run(`task-${i}`, task, 1_000)),
        );

        expect(outcomes.every((o) => o.ok)).toBe(true);
        expect(peak).toBe(2);
        expect(bridge.activeCount).toBe(0);
        expect(bridge.pendingCount).toBe(0);
    });

    it('counts queue wait against the timeout and never starts an expired task', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const bridge = new ExecutionBridge({ maxConcurrent: 1 });
        const second = vi.fn(async () => 'second');

        const first = bridge.run('first', () => delay(80).then(() => 'first'), 1_000);
        const queued = await bridge.run('second', second, 20);

        expect(queued.ok).toBe(false);
        expect(bridge.pendingCount).toBe(0);
        await first;
        await delay(10);
        expect(second).not.toHaveBeenCalled();
    });
});
