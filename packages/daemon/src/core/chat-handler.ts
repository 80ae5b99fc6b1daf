/**
 * @parley/daemon — Chat Handler
 *
 * Bridges incoming chat:request and tools:list messages to the Chat
 * Service, streaming tool events and reasoning steps back to the client
 * that asked.
 */

import type { ChatRequestMessage, DaemonMessage, ToolsListRequestMessage } from '@parley/shared';
import type { ChatService } from './chat-service.js';
import type { AgentEvents } from './agent-orchestrator.js';
import { errorMessage } from './errors.js';

/** The slice of the WebSocket server the handler needs */
export interface MessageSink {
    sendTo(clientId: string, message: DaemonMessage): void;
}

function now(): string {
    return new Date().toISOString();
}

export class ChatHandler {
    constructor(
        private readonly sink: MessageSink,
        private readonly service: ChatService,
    ) {}

    async handleChatRequest(clientId: string, message: ChatRequestMessage): Promise<void> {
        const { requestId, model } = message.payload;
        console.log(`  🧠 [chat] Processing request ${requestId.slice(0, 8)}... from ${clientId}`);

        const events: AgentEvents = {
            onToolCall: (toolName, input) => {
                this.sink.sendTo(clientId, {
                    type: 'chat:tool:call',
                    timestamp: now(),
                    payload: { requestId, toolName, input },
                });
            },
            onToolResult: (result) => {
                console.log(`  ${result.ok ? '✅' : '❌'} [chat] Tool result: ${result.tool} — ${result.ok ? 'success' : result.error.kind}`);
                this.sink.sendTo(clientId, {
                    type: 'chat:tool:result',
                    timestamp: now(),
                    payload: {
                        requestId,
                        toolName: result.tool,
                        success: result.ok,
                        result: result.ok ? result.output : result.error.message,
                    },
                });
            },
            onStep: (step) => {
                this.sink.sendTo(clientId, {
                    type: 'chat:step',
                    timestamp: now(),
                    payload: {
                        requestId,
                        iteration: step.iteration,
                        thought: step.thought,
                        action: step.action,
                        observation: step.observation,
                    },
                });
            },
            onModelFallback: (from, to) => {
                this.sink.sendTo(clientId, {
                    type: 'log',
                    timestamp: now(),
                    payload: { level: 'warn', source: 'Models', message: `${from} is unavailable; continuing with ${to}` },
                });
            },
        };

        const outcome = await this.service.chat(
            {
                message: message.payload.message,
                ...(message.payload.history ? { history: message.payload.history } : {}),
                ...(model ? { model } : {}),
            },
            events,
        );

        this.sink.sendTo(clientId, {
            type: 'chat:done',
            timestamp: now(),
            payload: {
                requestId,
                status: outcome.status,
                text: outcome.text,
                model: outcome.model,
                ...(outcome.failureReason ? { failureReason: outcome.failureReason } : {}),
                iterations: outcome.iterations,
            },
        });
    }

    async handleToolsList(clientId: string, message: ToolsListRequestMessage): Promise<void> {
        const { requestId } = message.payload;
        try {
            const catalog = await this.service.listTools();
            this.sink.sendTo(clientId, {
                type: 'tools:catalog',
                timestamp: now(),
                payload: {
                    requestId,
                    tools: catalog.tools,
                    remoteCatalogUnavailable: catalog.remoteCatalogUnavailable,
                    ...(catalog.remoteError !== undefined ? { remoteError: catalog.remoteError } : {}),
                },
            });
        } catch (err) {
            console.error(`  ❌ [chat] Listing tools failed: ${errorMessage(err)}`);
            this.sink.sendTo(clientId, {
                type: 'chat:error',
                timestamp: now(),
                payload: { requestId, error: 'Could not list tools' },
            });
        }
    }
}
