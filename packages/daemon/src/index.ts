/**
 * @parley/daemon — Barrel Export
 *
 * The agent core for embedding, plus the daemon bootstrap used by
 * `parley daemon --foreground`.
 */

export { startDaemon, pidFilePath, type RunningDaemon } from './daemon.js';
export {
    AgentOrchestrator,
    FAILURE_MESSAGES,
    type AgentEvents,
    type AgentLimits,
    type AgentRequest,
    type AgentResult,
    type AgentState,
} from './core/agent-orchestrator.js';
export { ChatService, type ChatInput, type ChatOutcome, type ChatSettings } from './core/chat-service.js';
export { ToolRegistry, type ToolCatalog, type ToolDescriptor, type ToolInvocationResult } from './core/tool-registry.js';
export { RemoteToolClient, type FetchLike } from './core/remote-tool-client.js';
export { RemoteToolServer } from './core/remote-tool-server.js';
export { RemoteCatalog, type CatalogEntry } from './core/remote-catalog.js';
export { ExecutionBridge, type BridgeOutcome } from './core/execution-bridge.js';
export { InMemoryStore, type KeyValueStore } from './core/store.js';
export { ModelSelector, type ModelChoice } from './core/model-selector.js';
export { OpenAICompatibleBackend, isModelUnavailableError, type ModelBackend, type ModelRequest } from './core/model-backend.js';
export { ModelUnavailableError, ModelBackendError } from './core/model-fallback.js';
export { RemoteToolError, type ToolError, type ToolErrorKind } from './core/errors.js';
export { LOCAL_TOOLS, defineLocalTool, type LocalTool } from './core/tools/index.js';
