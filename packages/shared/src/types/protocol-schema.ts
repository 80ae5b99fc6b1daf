/**
 * @parley/shared — Client Message Validation
 *
 * Runtime schemas for both directions. The daemon parses every inbound
 * frame through `parseClientMessage` before routing it; clients read
 * daemon frames through `parseDaemonMessage`.
 */

import { z } from 'zod';
import type { ClientMessage, DaemonMessage } from './protocol.js';

const ChatHistoryMessageSchema = z.object({
    role: z.enum(['user', 'assistant', 'system']),
    content: z.string(),
});

const ChatRequestSchema = z.object({
    type: z.literal('chat:request'),
    timestamp: z.string(),
    payload: z.object({
        requestId: z.string().min(1),
        message: z.string(),
        history: z.array(ChatHistoryMessageSchema).optional(),
        model: z.string().optional(),
    }),
});

const ToolsListSchema = z.object({
    type: z.literal('tools:list'),
    timestamp: z.string(),
    payload: z.object({
        requestId: z.string().min(1),
    }),
});

export const ClientMessageSchema = z.discriminatedUnion('type', [ChatRequestSchema, ToolsListSchema]);

export type ParseClientMessageResult =
    | { ok: true; message: ClientMessage }
    | { ok: false; error: string };

export function parseClientMessage(raw: string): ParseClientMessageResult {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch {
        return { ok: false, error: 'Malformed JSON' };
    }
    const parsed = ClientMessageSchema.safeParse(json);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        return { ok: false, error: issue ? `${issue.path.join('.') || 'message'}: ${issue.message}` : 'Invalid message' };
    }
    return { ok: true, message: parsed.data };
}

// ─── Daemon → Client ──────────────────────────────────────────────

const FAILURE_REASONS = ['model-unavailable', 'iteration-limit-exceeded', 'deadline-exceeded'] as const;

const ParameterSpecSchema = z.object({
    type: z.string(),
    description: z.string(),
    required: z.boolean(),
    enum: z.array(z.string()).optional(),
    default: z.unknown().optional(),
});

const ToolCatalogEntrySchema = z.object({
    name: z.string(),
    description: z.string(),
    kind: z.enum(['local', 'remote']),
    parameters: z.record(ParameterSpecSchema),
});

export const DaemonMessageSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('log'),
        timestamp: z.string(),
        payload: z.object({
            level: z.enum(['info', 'warn', 'error', 'debug']),
            source: z.string(),
            message: z.string(),
        }),
    }),
    z.object({
        type: z.literal('system:status'),
        timestamp: z.string(),
        payload: z.object({ status: z.enum(['starting', 'ready', 'shutting_down']) }),
    }),
    z.object({
        type: z.literal('chat:step'),
        timestamp: z.string(),
        payload: z.object({
            requestId: z.string(),
            iteration: z.number(),
            thought: z.string(),
            action: z.string(),
            observation: z.string(),
        }),
    }),
    z.object({
        type: z.literal('chat:tool:call'),
        timestamp: z.string(),
        payload: z.object({ requestId: z.string(), toolName: z.string(), input: z.string() }),
    }),
    z.object({
        type: z.literal('chat:tool:result'),
        timestamp: z.string(),
        payload: z.object({ requestId: z.string(), toolName: z.string(), success: z.boolean(), result: z.string() }),
    }),
    z.object({
        type: z.literal('chat:done'),
        timestamp: z.string(),
        payload: z.object({
            requestId: z.string(),
            status: z.enum(['finished', 'failed']),
            text: z.string(),
            model: z.string(),
            failureReason: z.enum(FAILURE_REASONS).optional(),
            iterations: z.number(),
        }),
    }),
    z.object({
        type: z.literal('chat:error'),
        timestamp: z.string(),
        payload: z.object({ requestId: z.string(), error: z.string() }),
    }),
    z.object({
        type: z.literal('tools:catalog'),
        timestamp: z.string(),
        payload: z.object({
            requestId: z.string(),
            tools: z.array(ToolCatalogEntrySchema),
            remoteCatalogUnavailable: z.boolean(),
            remoteError: z.string().optional(),
        }),
    }),
]);

/** Null for anything that is not a well-formed daemon message */
export function parseDaemonMessage(raw: string): DaemonMessage | null {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch {
        return null;
    }
    const parsed = DaemonMessageSchema.safeParse(json);
    return parsed.success ? parsed.data : null;
}
