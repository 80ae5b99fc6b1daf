import { describe, it, expect } from 'vitest';
import { parseClientMessage, parseDaemonMessage } from './protocol-schema.js';

describe('parseClientMessage', () => {
    it('accepts a chat request', () => {
        const result = parseClientMessage(JSON.stringify({
            type: 'chat:request',
            timestamp: '2026-01-01T00:00:00.000Z',
            payload: { requestId: 'r1', message: 'hi', history: [{ role: 'user', content: 'earlier' }] },
        }));
        expect(result.ok).toBe(true);
        if (result.ok) expect(result.message.type).toBe('chat:request');
    });

    it('rejects malformed JSON', () => {
        expect(parseClientMessage('{nope')).toEqual({ ok: false, error: 'Malformed JSON' });
    });

    it('names the offending field', () => {
        const result = parseClientMessage(JSON.stringify({
            type: 'chat:request',
            timestamp: '2026-01-01T00:00:00.000Z',
            payload: { requestId: 'r1' },
        }));
        expect(result).toEqual({ ok: false, error: 'payload.message: Required' });
    });

    it('rejects unknown message types', () => {
        const result = parseClientMessage(JSON.stringify({ type: 'system:command', timestamp: 'x', payload: {} }));
        expect(result.ok).toBe(false);
    });
});

describe('parseDaemonMessage', () => {
    it('reads a chat:done message', () => {
        const message = parseDaemonMessage(JSON.stringify({
            type: 'chat:done',
            timestamp: '2026-01-01T00:00:00.000Z',
            payload: { requestId: 'r1', status: 'failed', text: 'out of time', model: 'm', failureReason: 'deadline-exceeded', iterations: 3 },
        }));
        expect(message?.type).toBe('chat:done');
        expect(message?.payload).toMatchObject({ failureReason: 'deadline-exceeded', iterations: 3 });
    });

    it('reads a tool catalog', () => {
        const message = parseDaemonMessage(JSON.stringify({
            type: 'tools:catalog',
            timestamp: '2026-01-01T00:00:00.000Z',
            payload: {
                requestId: 'r2',
                tools: [{
                    name: 'calculator',
                    description: 'Adds',
                    kind: 'local',
                    parameters: { a: { type: 'number', description: 'first', required: true } },
                }],
                remoteCatalogUnavailable: true,
                remoteError: 'down',
            },
        }));
        expect(message?.type).toBe('tools:catalog');
    });

    it('returns null for anything else', () => {
        expect(parseDaemonMessage('not json')).toBeNull();
        expect(parseDaemonMessage(JSON.stringify({ type: 'chat:done', timestamp: 'x', payload: {} }))).toBeNull();
        expect(parseDaemonMessage(JSON.stringify({ type: 'chat:stream:chunk', timestamp: 'x', payload: {} }))).toBeNull();
    });
});
