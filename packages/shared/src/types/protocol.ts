/**
 * @parley/shared — Protocol Types
 *
 * Defines the contract for all WebSocket messages exchanged between
 * the Daemon (server) and its clients (the CLI). Every message must
 * conform to a discriminated union keyed on `type`.
 */

// ─── Base Envelope ────────────────────────────────────────────────

export interface BaseMessage {
    /** ISO-8601 timestamp of when the message was created */
    readonly timestamp: string;
}

// ─── Shared Payload Types ─────────────────────────────────────────

export type ChatRole = 'user' | 'assistant' | 'system';

export interface ChatHistoryMessage {
    readonly role: ChatRole;
    readonly content: string;
}

export type ToolKind = 'local' | 'remote';

/** One parameter of a tool, as shown to the model and to tool-listing clients */
export interface ParameterSpec {
    readonly type: string;
    readonly description: string;
    readonly required: boolean;
    readonly enum?: readonly string[];
    readonly default?: unknown;
}

export type ParameterSchema = Readonly<Record<string, ParameterSpec>>;

export interface ToolCatalogEntry {
    readonly name: string;
    readonly description: string;
    readonly kind: ToolKind;
    readonly parameters: ParameterSchema;
}

/** Terminal failures of the reasoning loop; everything else is recovered in-loop */
export type AgentFailureReason =
    | 'model-unavailable'
    | 'iteration-limit-exceeded'
    | 'deadline-exceeded';

// ─── Server → Client Messages ─────────────────────────────────────

export interface LogMessage extends BaseMessage {
    readonly type: 'log';
    readonly payload: {
        readonly level: 'info' | 'warn' | 'error' | 'debug';
        readonly source: string;
        readonly message: string;
    };
}

export interface SystemStatusMessage extends BaseMessage {
    readonly type: 'system:status';
    readonly payload: {
        readonly status: 'starting' | 'ready' | 'shutting_down';
    };
}

/** One completed reasoning step (thought + action + observation) */
export interface ChatStepMessage extends BaseMessage {
    readonly type: 'chat:step';
    readonly payload: {
        readonly requestId: string;
        readonly iteration: number;
        readonly thought: string;
        readonly action: string;
        readonly observation: string;
    };
}

/** The agent decided to call a tool */
export interface ChatToolCallMessage extends BaseMessage {
    readonly type: 'chat:tool:call';
    readonly payload: {
        readonly requestId: string;
        readonly toolName: string;
        /** Action Input exactly as the model wrote it */
        readonly input: string;
    };
}

/** A tool invocation completed (successfully or not) */
export interface ChatToolResultMessage extends BaseMessage {
    readonly type: 'chat:tool:result';
    readonly payload: {
        readonly requestId: string;
        readonly toolName: string;
        readonly success: boolean;
        readonly result: string;
    };
}

/** Final outcome of a chat request */
export interface ChatDoneMessage extends BaseMessage {
    readonly type: 'chat:done';
    readonly payload: {
        readonly requestId: string;
        readonly status: 'finished' | 'failed';
        /** Final answer, or a safe-to-display failure message */
        readonly text: string;
        /** Model identifier that produced the last step */
        readonly model: string;
        readonly failureReason?: AgentFailureReason;
        readonly iterations: number;
    };
}

/** The request itself was malformed (never used for agent failures) */
export interface ChatErrorMessage extends BaseMessage {
    readonly type: 'chat:error';
    readonly payload: {
        readonly requestId: string;
        readonly error: string;
    };
}

export interface ToolsCatalogMessage extends BaseMessage {
    readonly type: 'tools:catalog';
    readonly payload: {
        readonly requestId: string;
        readonly tools: readonly ToolCatalogEntry[];
        readonly remoteCatalogUnavailable: boolean;
        readonly remoteError?: string;
    };
}

export type DaemonMessage =
    | LogMessage
    | SystemStatusMessage
    | ChatStepMessage
    | ChatToolCallMessage
    | ChatToolResultMessage
    | ChatDoneMessage
    | ChatErrorMessage
    | ToolsCatalogMessage;

// ─── Client → Server Messages ─────────────────────────────────────

export interface ChatRequestMessage extends BaseMessage {
    readonly type: 'chat:request';
    readonly payload: {
        readonly requestId: string;
        readonly message: string;
        readonly history?: readonly ChatHistoryMessage[];
        /** Requested model identifier; unknown or absent means the default */
        readonly model?: string;
    };
}

export interface ToolsListRequestMessage extends BaseMessage {
    readonly type: 'tools:list';
    readonly payload: {
        readonly requestId: string;
    };
}

export type ClientMessage = ChatRequestMessage | ToolsListRequestMessage;
