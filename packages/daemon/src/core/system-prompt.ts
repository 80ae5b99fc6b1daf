/**
 * @parley/daemon — System Prompt
 *
 * The behavioral contract and tool catalog sent with every Thinking
 * step, plus the message list (windowed history, new input, scratchpad)
 * that follows it.
 */

import type { ChatHistoryMessage } from '@parley/shared';
import type { ToolDescriptor } from './tool-registry.js';

export interface PromptMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

const BASE_SYSTEM_PROMPT = `You are parley, a helpful assistant for everyday work tasks.
You answer questions directly when you can, and use tools when a question needs a calculation, live data or anything a tool provides.
Be accurate and concise. When you do not know something and no tool can find it, say so instead of inventing an answer.`;

const FORMAT_RULES = `To use a tool, use exactly this format:

Thought: Do I need to use a tool? Yes
Action: the tool to use, exactly one of [{tool_names}]
Action Input: the arguments as a JSON object, e.g. {"a": 1}

The system replies with "Observation: <tool result>". Never write the Observation yourself.

When you have the answer for the user, or do not need a tool, you MUST use this format:

Thought: Do I need to use a tool? No
Final Answer: your response here

Write either an Action or a Final Answer in one reply, never both.`;

function renderParameters(tool: ToolDescriptor): string {
    const entries = Object.entries(tool.parameters);
    if (entries.length === 0) return '    (no arguments)';
    return entries
        .map(([name, spec]) => {
            const flags = [spec.type, spec.required ? 'required' : 'optional'];
            const choices = spec.enum ? ` One of: ${spec.enum.join(', ')}.` : '';
            const fallback = spec.default !== undefined ? ` Default: ${JSON.stringify(spec.default)}.` : '';
            return `    - ${name} (${flags.join(', ')}): ${spec.description}${choices}${fallback}`;
        })
        .join('\n');
}

export function renderToolCatalog(tools: readonly ToolDescriptor[]): string {
    if (tools.length === 0) return 'No tools are available; always reply with a Final Answer.';
    return tools
        .map((tool) => `- ${tool.name}: ${tool.description}\n${renderParameters(tool)}`)
        .join('\n');
}

export function buildSystemPrompt(tools: readonly ToolDescriptor[], now: Date = new Date()): string {
    const toolNames = tools.map((t) => t.name).join(', ');
    return `${BASE_SYSTEM_PROMPT}

## Tools

${renderToolCatalog(tools)}

## Format

${FORMAT_RULES.replace('{tool_names}', toolNames)}

The current time is ${now.toISOString()}.`;
}

export interface PromptInput {
    history: readonly ChatHistoryMessage[];
    input: string;
    scratchpad: string;
    /** How many trailing history messages to include */
    historyWindow: number;
}

export function buildPromptMessages({ history, input, scratchpad, historyWindow }: PromptInput): PromptMessage[] {
    const window = historyWindow > 0 ? history.slice(-historyWindow) : [];
    const messages: PromptMessage[] = window.map((m) => ({ role: m.role, content: m.content }));
    const turn = scratchpad ? `New input: ${input}\n\n${scratchpad}` : `New input: ${input}`;
    messages.push({ role: 'user', content: turn });
    return messages;
}
