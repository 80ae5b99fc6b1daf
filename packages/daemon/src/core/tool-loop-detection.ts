/**
 * @parley/daemon — Tool Loop Detection
 *
 * Notices when the model keeps asking for the same thing and getting the
 * same answer. Two detectors, both warn-only (the iteration cap is what
 * ends a runaway loop):
 *  1. Generic Repeat — same tool, args and observation N times in a row
 *  2. Ping-Pong — alternating between two such calls with no progress
 */

import { createHash } from 'node:crypto';

// ─── Types ───────────────────────────────────────────────────────

export type LoopDetectorKind = 'generic_repeat' | 'ping_pong';

export type LoopDetectionResult =
    | { stuck: false }
    | {
        stuck: true;
        detector: LoopDetectorKind;
        count: number;
        message: string;
    };

export interface ToolCallHistoryEntry {
    toolName: string;
    argsHash: string;
    resultHash: string;
}

export interface LoopDetectionConfig {
    /** Max history entries to track */
    historySize: number;
    /** Warn once a call repeats this many times */
    repeatThreshold: number;
    /** Warn once an A-B-A-B pattern reaches this many calls */
    pingPongThreshold: number;
}

const DEFAULT_CONFIG: LoopDetectionConfig = {
    historySize: 30,
    repeatThreshold: 3,
    pingPongThreshold: 4,
};

// ─── Hashing ─────────────────────────────────────────────────────

export function hashToolCall(toolName: string, args: unknown): string {
    const payload = JSON.stringify({ t: toolName, a: args });
    return createHash('sha256').update(payload).digest('hex').slice(0, 16);
}

export function hashResult(result: string): string {
    return createHash('sha256').update(result).digest('hex').slice(0, 16);
}

// ─── Streak Detection ────────────────────────────────────────────

function signature(entry: ToolCallHistoryEntry): string {
    return `${entry.argsHash}:${entry.resultHash}`;
}

/** Consecutive entries from the tail matching the last one */
function getRepeatStreak(history: readonly ToolCallHistoryEntry[]): number {
    const last = history[history.length - 1];
    if (!last) return 0;
    const target = signature(last);
    let count = 0;
    for (let i = history.length - 1; i >= 0; i--) {
        const entry = history[i];
        if (!entry || signature(entry) !== target) break;
        count++;
    }
    return count;
}

/** Length of the A-B-A-B run at the tail, 0 when the tail does not alternate */
function getPingPongStreak(history: readonly ToolCallHistoryEntry[]): number {
    const last = history[history.length - 1];
    const prev = history[history.length - 2];
    if (!last || !prev) return 0;
    const a = signature(last);
    const b = signature(prev);
    if (a === b) return 0;

    let count = 0;
    for (let i = history.length - 1; i >= 0; i--) {
        const entry = history[i];
        const expected = count % 2 === 0 ? a : b;
        if (!entry || signature(entry) !== expected) break;
        count++;
    }
    return count;
}

// ─── Detector ────────────────────────────────────────────────────

/** One per reasoning session; never shared */
export class ToolLoopDetector {
    private readonly history: ToolCallHistoryEntry[] = [];
    private readonly config: LoopDetectionConfig;

    constructor(config: Partial<LoopDetectionConfig> = {}) {
        this.config = { ...DEFAULT_CONFIG, ...config };
    }

    record(toolName: string, args: unknown, observation: string): LoopDetectionResult {
        this.history.push({
            toolName,
            argsHash: hashToolCall(toolName, args),
            resultHash: hashResult(observation),
        });
        if (this.history.length > this.config.historySize) this.history.shift();

        const repeat = getRepeatStreak(this.history);
        if (repeat >= this.config.repeatThreshold) {
            return {
                stuck: true,
                detector: 'generic_repeat',
                count: repeat,
                message: `WARNING: ${toolName} was called ${repeat} times with the same arguments and returned the same result. Do not call it again; use the result above or give your Final Answer.`,
            };
        }

        const pingPong = getPingPongStreak(this.history);
        if (pingPong >= this.config.pingPongThreshold) {
            return {
                stuck: true,
                detector: 'ping_pong',
                count: pingPong,
                message: `WARNING: You are alternating between the same two tool calls (${pingPong} calls) without new results. Change approach or give your Final Answer.`,
            };
        }

        return { stuck: false };
    }
}
