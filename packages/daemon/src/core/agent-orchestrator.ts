/**
 * @parley/daemon — Agent Orchestrator
 *
 * The reasoning loop. Each iteration asks the model what to do next,
 * parses the reply, runs the chosen tool and feeds the observation back:
 *
 *   thinking → parsing → dispatching → observing → thinking …
 *                      ↘ finished (Final Answer)
 *   any state → failed (iteration cap, deadline, no usable model)
 *
 * Everything the model or a tool gets wrong is folded into the
 * scratchpad as an observation. Only the three terminal reasons end the
 * loop early, and they end it with a result, never an exception.
 */

import type { AgentFailureReason, ChatHistoryMessage } from '@parley/shared';
import type { ModelBackend, ModelRequest } from './model-backend.js';
import { isModelUnavailableError } from './model-backend.js';
import type { ModelChoice } from './model-selector.js';
import type { ToolRegistry, ToolInvocationResult } from './tool-registry.js';
import type { RetryConfig } from './retry.js';
import { runWithModelFallback, ModelUnavailableError, ModelBackendError } from './model-fallback.js';
import { parseModelOutput, OBSERVATION_STOP, type ParsedAction } from './react-parser.js';
import { Scratchpad, FINAL_ANSWER_ACTION, type ReasoningStep, type ObservationKind } from './scratchpad.js';
import { buildPromptMessages, buildSystemPrompt } from './system-prompt.js';
import { ToolLoopDetector } from './tool-loop-detection.js';
import { errorMessage, isAbortError } from './errors.js';

// ─── Types ───────────────────────────────────────────────────────

export type AgentState = 'thinking' | 'parsing' | 'dispatching' | 'observing' | 'finished' | 'failed';

export interface AgentLimits {
    maxIterations: number;
    /** Wall-clock budget for the whole request */
    deadlineMs: number;
    historyWindow: number;
    temperature: number;
    /** Upper bound for one remote tool call (further capped by the deadline) */
    remoteTimeoutMs: number;
}

export interface AgentRequest {
    message: string;
    history: readonly ChatHistoryMessage[];
    model: ModelChoice;
}

export interface AgentEvents {
    onStateChange?: (state: AgentState, iteration: number) => void;
    onStep?: (step: ReasoningStep) => void;
    onToolCall?: (tool: string, input: string) => void;
    onToolResult?: (result: ToolInvocationResult) => void;
    onModelFallback?: (from: string, to: string, reason: string) => void;
}

export type AgentResult =
    | {
        status: 'finished';
        answer: string;
        model: string;
        iterations: number;
        steps: readonly ReasoningStep[];
    }
    | {
        status: 'failed';
        reason: AgentFailureReason;
        /** Safe to show to the user */
        message: string;
        /** Best partial text (the last thought), possibly empty */
        partial: string;
        model: string;
        iterations: number;
        steps: readonly ReasoningStep[];
    };

export interface AgentOrchestratorOptions {
    backend: ModelBackend;
    limits: AgentLimits;
    now?: () => number;
    /** Backoff for transient model errors */
    retry?: Partial<RetryConfig>;
}

export const FORMAT_CORRECTION =
    'Reply with "Thought:" then either "Action:" and "Action Input:" lines to use a tool, or "Final Answer:" to answer the user.';

export const FAILURE_MESSAGES: Readonly<Record<AgentFailureReason, string>> = {
    'iteration-limit-exceeded': 'I could not finish within the allowed number of reasoning steps.',
    'deadline-exceeded': 'I ran out of time before reaching an answer.',
    'model-unavailable': 'No language model is available to answer right now. Please try again later.',
};

/** Share of the session deadline the remote catalog fetch may use */
export const CATALOG_DEADLINE_SHARE = 0.25;

type ThinkOutcome =
    | { kind: 'text'; text: string }
    | { kind: 'deadline' }
    | { kind: 'unavailable'; detail: string };

/** Request-scoped state; never shared between requests */
interface AgentSession {
    readonly history: readonly ChatHistoryMessage[];
    readonly input: string;
    readonly scratchpad: Scratchpad;
    readonly deadline: number;
    readonly loops: ToolLoopDetector;
    model: string;
    fallbackChain: readonly string[];
    iteration: number;
    state: AgentState;
}

// ─── Orchestrator ────────────────────────────────────────────────

export class AgentOrchestrator {
    private readonly backend: ModelBackend;
    private readonly limits: AgentLimits;
    private readonly now: () => number;
    private readonly retry?: Partial<RetryConfig>;

    constructor(options: AgentOrchestratorOptions) {
        this.backend = options.backend;
        this.limits = options.limits;
        this.now = options.now ?? Date.now;
        this.retry = options.retry;
    }

    async run(request: AgentRequest, registry: ToolRegistry, events: AgentEvents = {}): Promise<AgentResult> {
        const session: AgentSession = {
            history: request.history,
            input: request.message,
            scratchpad: new Scratchpad(),
            deadline: this.now() + this.limits.deadlineMs,
            loops: new ToolLoopDetector(),
            model: request.model.identifier,
            fallbackChain: request.model.fallbackChain,
            iteration: 0,
            state: 'thinking',
        };

        await registry.ensureRemoteCatalog({ timeoutMs: this.catalogBudget() });
        const system = buildSystemPrompt(registry.descriptors(), new Date(this.now()));

        for (;;) {
            if (session.iteration >= this.limits.maxIterations) {
                return this.fail(session, 'iteration-limit-exceeded', events);
            }
            if (this.remaining(session) <= 0) {
                return this.fail(session, 'deadline-exceeded', events);
            }

            session.iteration++;
            this.enter(session, 'thinking', events);
            const thought = await this.think(session, system, events);
            if (thought.kind === 'deadline') return this.fail(session, 'deadline-exceeded', events);
            if (thought.kind === 'unavailable') {
                console.error(`  ❌ [agent] Model unavailable: ${thought.detail}`);
                return this.fail(session, 'model-unavailable', events);
            }

            this.enter(session, 'parsing', events);
            const parsed = parseModelOutput(thought.text);

            if (parsed.kind === 'final-answer') {
                this.record(session, {
                    thought: parsed.thought,
                    action: FINAL_ANSWER_ACTION,
                    actionInput: '',
                    observation: '',
                    observationKind: 'final-answer',
                }, events);
                this.enter(session, 'finished', events);
                return {
                    status: 'finished',
                    answer: parsed.answer,
                    model: session.model,
                    iterations: session.iteration,
                    steps: session.scratchpad.steps,
                };
            }

            const action = this.checkAction(parsed, registry);
            if (action.kind === 'format-error') {
                console.warn(`  ⚠️ [agent] Format error at iteration ${session.iteration}: ${action.message}`);
                this.enter(session, 'observing', events);
                this.record(session, {
                    thought: action.thought,
                    action: parsed.kind === 'tool-action' ? parsed.tool : '',
                    actionInput: parsed.kind === 'tool-action' ? parsed.input : '',
                    observation: `${action.message}\n${FORMAT_CORRECTION}`,
                    observationKind: 'format-error',
                    rawOutput: thought.text,
                }, events);
                continue;
            }

            this.enter(session, 'dispatching', events);
            console.log(`  🔧 [agent] Tool call: ${action.tool}`);
            events.onToolCall?.(action.tool, action.input);
            const result = await registry.invoke(action.tool, action.input, {
                timeoutMs: Math.max(1, Math.min(this.limits.remoteTimeoutMs, this.remaining(session))),
            });
            events.onToolResult?.(result);

            this.enter(session, 'observing', events);
            let observation = result.ok ? result.output : `Error (${result.error.kind}): ${result.error.message}`;
            const observationKind: ObservationKind = result.ok ? 'tool-result' : result.error.kind;
            if (!result.ok) console.warn(`  ⚠️ [agent] ${action.tool} → ${result.error.kind}: ${result.error.message}`);

            const loop = session.loops.record(action.tool, action.input, observation);
            if (loop.stuck) observation = `${observation}\n${loop.message}`;

            this.record(session, {
                thought: action.thought,
                action: action.tool,
                actionInput: action.input,
                observation,
                observationKind,
            }, events);
        }
    }

    private catalogBudget(): number {
        const share = Math.floor(this.limits.deadlineMs * CATALOG_DEADLINE_SHARE);
        return Math.max(1, Math.min(this.limits.remoteTimeoutMs, share));
    }

    // ─── States ──────────────────────────────────────────────────

    private enter(session: AgentSession, state: AgentState, events: AgentEvents): void {
        session.state = state;
        events.onStateChange?.(state, session.iteration);
    }

    private record(session: AgentSession, step: Omit<ReasoningStep, 'iteration'>, events: AgentEvents): void {
        const full: ReasoningStep = { iteration: session.iteration, ...step };
        session.scratchpad.append(full);
        events.onStep?.(full);
    }

    private fail(session: AgentSession, reason: AgentFailureReason, events: AgentEvents): AgentResult {
        this.enter(session, 'failed', events);
        return {
            status: 'failed',
            reason,
            message: FAILURE_MESSAGES[reason],
            partial: session.scratchpad.lastThought(),
            model: session.model,
            iterations: session.iteration,
            steps: session.scratchpad.steps,
        };
    }

    private remaining(session: AgentSession): number {
        return session.deadline - this.now();
    }

    /** A tool action must name a registered tool; otherwise it is a format error */
    private checkAction(
        parsed: Exclude<ParsedAction, { kind: 'final-answer' }>,
        registry: ToolRegistry,
    ):
        | { kind: 'format-error'; thought: string; message: string }
        | { kind: 'dispatch'; thought: string; tool: string; input: string } {
        if (parsed.kind === 'format-error') return parsed;

        const resolution = registry.resolve(parsed.tool);
        if (resolution.status === 'found') {
            return { kind: 'dispatch', thought: parsed.thought, tool: resolution.name, input: parsed.input };
        }
        return {
            kind: 'format-error',
            thought: parsed.thought,
            message: `"${parsed.tool}" is not a valid tool, try one of [${registry.names().join(', ')}].`,
        };
    }

    // ─── Thinking ────────────────────────────────────────────────

    /** One model call through the fallback chain, bounded by the session deadline */
    private async think(session: AgentSession, system: string, events: AgentEvents): Promise<ThinkOutcome> {
        const request: ModelRequest = {
            system,
            messages: buildPromptMessages({
                history: session.history,
                input: session.input,
                scratchpad: session.scratchpad.render(),
                historyWindow: this.limits.historyWindow,
            }),
            stopSequences: [OBSERVATION_STOP],
            temperature: this.limits.temperature,
        };

        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), Math.max(0, this.remaining(session)));
        const deadline = new Promise<ThinkOutcome>((resolve) => {
            controller.signal.addEventListener('abort', () => resolve({ kind: 'deadline' }), { once: true });
        });

        const chain = session.fallbackChain;
        const attempt = runWithModelFallback({
            primary: session.model,
            fallbacks: chain,
            run: (model) => this.backend.generate(model, request, controller.signal),
            isPermanent: isModelUnavailableError,
            retry: this.retry,
            signal: controller.signal,
            onFallback: (failed, next) => events.onModelFallback?.(failed.model, next, failed.error),
        }).then(
            (result): ThinkOutcome => {
                if (result.model !== session.model) {
                    console.log(`  🔀 [agent] Continuing with ${result.model}`);
                    session.model = result.model;
                    session.fallbackChain = chain.slice(chain.indexOf(result.model) + 1);
                }
                return { kind: 'text', text: result.result };
            },
            (err: unknown): ThinkOutcome => {
                if (controller.signal.aborted || isAbortError(err)) return { kind: 'deadline' };
                if (err instanceof ModelUnavailableError || err instanceof ModelBackendError) {
                    return { kind: 'unavailable', detail: err.message };
                }
                return { kind: 'unavailable', detail: errorMessage(err) };
            },
        );

        try {
            return await Promise.race([attempt, deadline]);
        } finally {
            clearTimeout(timer);
            controller.abort();
        }
    }
}
