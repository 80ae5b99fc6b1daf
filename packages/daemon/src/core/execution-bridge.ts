/**
 * @parley/daemon — Execution Bridge
 *
 * Runs remote calls for the reasoning loop as one-shot tasks in a bounded
 * pool. Each task gets its own AbortController; the caller waits for the
 * task or the per-call timeout, whichever comes first.
 *
 *  • Pump pattern — dequeues entries up to maxConcurrent, each finished
 *    task calls pump() again to keep the pool flowing
 *  • Queue wait counts against the caller's timeout
 *  • On timeout the caller gets a transport-error at once; the task's
 *    controller is aborted and any late result is discarded
 */

import { RemoteToolError, errorMessage } from './errors.js';

export type BridgeTask<T> = (signal: AbortSignal) => Promise<T>;

export type BridgeOutcome<T> =
    | { ok: true; value: T }
    | { ok: false; error: RemoteToolError };

export interface ExecutionBridgeOptions {
    maxConcurrent: number;
}

interface BridgeEntry {
    label: string;
    start: () => void;
}

export class ExecutionBridge {
    private readonly maxConcurrent: number;
    private readonly queue: BridgeEntry[] = [];
    private active = 0;
    private draining = false;

    constructor(options: ExecutionBridgeOptions) {
        this.maxConcurrent = Math.max(1, Math.floor(options.maxConcurrent));
    }

    /** Number of tasks currently executing */
    get activeCount(): number {
        return this.active;
    }

    /** Number of tasks waiting for a free slot */
    get pendingCount(): number {
        return this.queue.length;
    }

    /**
     * Schedule `task` and wait for it, bounded by `timeoutMs`.
     * Never rejects: failures come back as `{ ok: false }`.
     */
    run<T>(label: string, task: BridgeTask<T>, timeoutMs: number): Promise<BridgeOutcome<T>> {
        return new Promise<BridgeOutcome<T>>((resolve) => {
            const controller = new AbortController();
            let settled = false;

            const settle = (outcome: BridgeOutcome<T>): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                resolve(outcome);
            };

            const entry: BridgeEntry = {
                label,
                start: () => {
                    this.active++;
                    void (async () => {
                        try {
                            const value = await task(controller.signal);
                            if (settled) {
                                console.warn(`  ⏱️ [bridge] Discarding late result of "${label}"`);
                            }
                            settle({ ok: true, value });
                        } catch (err) {
                            settle({ ok: false, error: toRemoteError(label, err) });
                        } finally {
                            this.active--;
                            this.drain();
                        }
                    })();
                },
            };

            const timer = setTimeout(() => {
                const queuedAt = this.queue.indexOf(entry);
                if (queuedAt >= 0) this.queue.splice(queuedAt, 1);
                controller.abort();
                console.warn(`  ⏱️ [bridge] "${label}" timed out after ${timeoutMs}ms`);
                settle({
                    ok: false,
                    error: new RemoteToolError('transport-error', `${label} timed out after ${timeoutMs}ms`, { timedOut: true }),
                });
            }, Math.max(0, timeoutMs));

            this.queue.push(entry);
            this.drain();
        });
    }

    private drain(): void {
        if (this.draining) return;
        this.draining = true;
        try {
            while (this.active < this.maxConcurrent) {
                const entry = this.queue.shift();
                if (!entry) break;
                entry.start();
            }
        } finally {
            this.draining = false;
        }
    }
}

function toRemoteError(label: string, err: unknown): RemoteToolError {
    if (err instanceof RemoteToolError) return err;
    return new RemoteToolError('transport-error', `${label} failed: ${errorMessage(err)}`, { cause: err });
}
