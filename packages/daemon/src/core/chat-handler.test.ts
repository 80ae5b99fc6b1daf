import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { DaemonMessage } from '@parley/shared';
import { ChatHandler, type MessageSink } from './chat-handler.js';
import { ChatService } from './chat-service.js';
import { ExecutionBridge } from './execution-bridge.js';
import { RemoteCatalog, type CatalogEntry } from './remote-catalog.js';
import { InMemoryStore } from './store.js';

function recordingSink(): MessageSink & { sent: Array<{ clientId: string; message: DaemonMessage }> } {
    const sent: Array<{ clientId: string; message: DaemonMessage }> = [];
    return {
        sent,
        sendTo(clientId, message) {
            sent.push({ clientId, message });
        },
    };
}

function serviceReplying(...replies: string[]): ChatService {
    let call = 0;
    return new ChatService({
        bridge: new ExecutionBridge({ maxConcurrent: 1 }),
        catalog: new RemoteCatalog(new InMemoryStore<CatalogEntry>()),
        settings: () => ({
            provider: { baseURL: 'http://model.test/v1', apiKey: 'test-secret', defaultModel: 'openai/gpt-oss-120b' },
            limits: { maxIterations: 5, deadlineMs: 5_000, historyWindow: 10, temperature: 0, remoteTimeoutMs: 1_000 },
            remote: { timeoutMs: 1_000, maxConcurrent: 1 },
        }),
        createBackend: () => ({
            async generate() {
                return replies[Math.min(call++, replies.length - 1)] ?? '';
            },
        }),
    });
}

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
    vi.restoreAllMocks();
});

describe('ChatHandler', () => {
    it('streams the tool call, its result, each step and the final answer to the asking client', async () => {
        const sink = recordingSink();
        const handler = new ChatHandler(sink, serviceReplying(
            'Thought: add\nAction: calculator\nAction Input: {"operation": "add", "a": 25, "b": 17}',
            'Thought: done\nFinal Answer: 42',
        ));

        await handler.handleChatRequest('client-1', {
            type: 'chat:request',
            timestamp: '2026-01-01T00:00:00.000Z',
            payload: { requestId: 'req-1', message: "What's 25 plus 17?" },
        });

        expect(sink.sent.every((s) => s.clientId === 'client-1')).toBe(true);
        expect(sink.sent.map((s) => s.message.type)).toEqual([
            'chat:tool:call',
            'chat:tool:result',
            'chat:step',
            'chat:step',
            'chat:done',
        ]);
        expect(sink.sent[0]?.message.payload).toEqual({
            requestId: 'req-1',
            toolName: 'calculator',
            input: '{"operation": "add", "a": 25, "b": 17}',
        });
        expect(sink.sent[1]?.message.payload).toEqual({ requestId: 'req-1', toolName: 'calculator', success: true, result: '42' });
        expect(sink.sent[4]?.message.payload).toEqual({
            requestId: 'req-1',
            status: 'finished',
            text: '42',
            model: 'openai/gpt-oss-120b',
            iterations: 2,
        });
    });

    it('reports a failed request through chat:done with its reason', async () => {
        const sink = recordingSink();
        const handler = new ChatHandler(sink, serviceReplying('no idea'));

        await handler.handleChatRequest('client-2', {
            type: 'chat:request',
            timestamp: '2026-01-01T00:00:00.000Z',
            payload: { requestId: 'req-2', message: 'hello' },
        });

        const done = sink.sent.at(-1)?.message;
        expect(done?.type).toBe('chat:done');
        expect(done?.payload).toMatchObject({ requestId: 'req-2', status: 'failed', failureReason: 'iteration-limit-exceeded', iterations: 5 });
    });

    it('answers tools:list with the catalog', async () => {
        const sink = recordingSink();
        const handler = new ChatHandler(sink, serviceReplying('Final Answer: unused'));

        await handler.handleToolsList('client-3', {
            type: 'tools:list',
            timestamp: '2026-01-01T00:00:00.000Z',
            payload: { requestId: 'req-3' },
        });

        expect(sink.sent).toHaveLength(1);
        const message = sink.sent[0]?.message;
        expect(message?.type).toBe('tools:catalog');
        if (message?.type !== 'tools:catalog') return;
        expect(message.payload.requestId).toBe('req-3');
        expect(message.payload.remoteCatalogUnavailable).toBe(false);
        expect(message.payload.tools.map((t) => t.name)).toEqual(['assistant_helper', 'calculator', 'current_time']);
    });
});
