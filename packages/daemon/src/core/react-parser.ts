/**
 * @parley/daemon — Reasoning Step Parser
 *
 * Reads one model turn in the Thought / Action / Action Input /
 * Final Answer grammar and returns a tagged variant. Anything that does
 * not fit comes back as `format-error` with a message the model can act
 * on; nothing here throws.
 */

export type ParsedAction =
    | { kind: 'final-answer'; thought: string; answer: string }
    | { kind: 'tool-action'; thought: string; tool: string; input: string }
    | { kind: 'format-error'; thought: string; message: string };

export const OBSERVATION_STOP = '\nObservation:';

const FINAL_ANSWER_RE = /Final\s+Answer\s*:/i;
const ACTION_RE = /Action\s*\d*\s*:[ \t]*([\s\S]*?)\s*Action\s*\d*\s*Input\s*\d*\s*:[ \t]*([\s\S]*)/i;
const ACTION_ONLY_RE = /(?:^|\n)[ \t]*Action\s*\d*\s*:/i;
const ACTION_INPUT_RE = /Action\s*\d*\s*Input\s*\d*\s*:/i;

export const MISSING_ACTION_INPUT = "Invalid Format: Missing 'Action Input:' after 'Action:'";
export const MISSING_ACTION = "Invalid Format: Missing 'Action:' after 'Thought:'";
export const ACTION_AND_ANSWER = 'Parsing error: found both a final answer and a parse-able action';

function thoughtOf(prefix: string): string {
    return prefix.replace(/^\s*Thought\s*:\s*/i, '').trim();
}

/** Drop anything the model wrote after inventing its own observation */
export function truncateAtObservation(text: string): string {
    const cut = text.search(/(?:^|\n)[ \t]*Observation\s*:/);
    return cut >= 0 ? text.slice(0, cut) : text;
}

export function parseModelOutput(raw: string): ParsedAction {
    const text = truncateAtObservation(raw).trim();
    if (text === '') {
        return { kind: 'format-error', thought: '', message: 'Invalid Format: empty response' };
    }

    const finalAt = text.search(FINAL_ANSWER_RE);
    const action = ACTION_RE.exec(text);

    if (action && finalAt >= 0) {
        return { kind: 'format-error', thought: thoughtOf(text.slice(0, Math.min(action.index, finalAt))), message: ACTION_AND_ANSWER };
    }

    if (action) {
        const thought = thoughtOf(text.slice(0, action.index));
        const tool = (action[1] ?? '').trim();
        const input = (action[2] ?? '').trim();
        if (tool === '') {
            return { kind: 'format-error', thought, message: "Invalid Format: Missing tool name after 'Action:'" };
        }
        return { kind: 'tool-action', thought, tool, input };
    }

    if (finalAt >= 0) {
        const thought = thoughtOf(text.slice(0, finalAt));
        const answer = text.slice(finalAt).replace(FINAL_ANSWER_RE, '').trim();
        if (answer === '') {
            return { kind: 'format-error', thought, message: "Invalid Format: 'Final Answer:' must be followed by the answer" };
        }
        return { kind: 'final-answer', thought, answer };
    }

    if (ACTION_ONLY_RE.test(text)) {
        return { kind: 'format-error', thought: thoughtOf(text.slice(0, text.search(ACTION_ONLY_RE))), message: MISSING_ACTION_INPUT };
    }

    const inputAt = text.search(ACTION_INPUT_RE);
    return { kind: 'format-error', thought: thoughtOf(inputAt >= 0 ? text.slice(0, inputAt) : text), message: MISSING_ACTION };
}
