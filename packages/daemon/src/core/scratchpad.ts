/**
 * @parley/daemon — Scratchpad
 *
 * Append-only record of the reasoning steps of one request. It is
 * rendered back into every later model call so the model sees its own
 * thoughts, actions and the observations they produced.
 */

import type { RecoverableErrorKind } from './errors.js';

export const FINAL_ANSWER_ACTION = 'final-answer';

/** `final-answer` marks the closing step, which has no observation */
export type ObservationKind = 'tool-result' | 'final-answer' | RecoverableErrorKind;

export interface ReasoningStep {
    readonly iteration: number;
    readonly thought: string;
    /** Tool name, or FINAL_ANSWER_ACTION */
    readonly action: string;
    readonly actionInput: string;
    readonly observation: string;
    readonly observationKind: ObservationKind;
    /** Verbatim model output, kept for format errors so the model sees what it wrote */
    readonly rawOutput?: string;
}

export class Scratchpad {
    private readonly entries: ReasoningStep[] = [];

    append(step: ReasoningStep): void {
        this.entries.push(Object.freeze({ ...step }));
    }

    get steps(): readonly ReasoningStep[] {
        return Object.freeze([...this.entries]);
    }

    get length(): number {
        return this.entries.length;
    }

    /** Most recent non-empty thought; the best partial answer when the loop gives up */
    lastThought(): string {
        for (let i = this.entries.length - 1; i >= 0; i--) {
            const thought = this.entries[i]?.thought.trim();
            if (thought) return thought;
        }
        return '';
    }

    /** Steps in the prompt grammar, ending with an open "Thought:" for the model to continue */
    render(): string {
        if (this.entries.length === 0) return '';
        return `${this.entries.map(renderStep).join('\n')}\nThought:`;
    }
}

function renderStep(step: ReasoningStep): string {
    if (step.observationKind === 'format-error' && step.rawOutput !== undefined) {
        const written = step.rawOutput.trim().replace(/^Thought\s*:\s*/i, '');
        return `Thought: ${written}\nObservation: ${step.observation}`;
    }
    return `Thought: ${step.thought}\nAction: ${step.action}\nAction Input: ${step.actionInput}\nObservation: ${step.observation}`;
}
