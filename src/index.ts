/**
 * @module index
 * @fileoverview Public API of mcp-tool-orchestrator.
 *
 * ## Architecture
 * ```
 *  user text
 *    |
 *    v
 *  Orchestrator ── IntentRouter ── Classifier (LLM)
 *    |                 |
 *    |            RegistrySnapshot <── ToolRegistry <── catalogs
 *    v                                                    ^
 *  Dispatcher ──> SessionManager ──> SessionChannel ──────┘
 *                                       | SSE + X-API-Key
 *                                       v
 *                  memory / tasks / calendar / crawler servers
 * ```
 *
 * The CLI (`mcp-orchestrator`) and the backend launcher
 * (`mcp-orchestrator-serve`) are thin wrappers over these exports.
 */

export { Orchestrator } from "./orchestrator.js";
export type {
  HandleOptions,
  HandleOutcome,
  OrchestratorConfig,
  OrchestratorDeps,
  StartReport,
} from "./orchestrator.js";

export { SessionManager, STATE_EVENT, SHUTDOWN_EVENT } from "./transport/session.js";
export type { CallOptions, SessionHandle, SessionManagerOptions } from "./transport/session.js";
export { McpSessionChannel, mcpChannelFactory, sseTransportFactory } from "./transport/channel.js";
export type { ChannelFactory, ChannelHandlers, SessionChannel } from "./transport/channel.js";

export { ToolRegistry } from "./registry/tool-registry.js";
export type { RegistrySnapshot, ToolCollision, ToolMap } from "./registry/tool-registry.js";

export { Dispatcher } from "./dispatch/dispatcher.js";
export type { DispatchOptions, DispatcherOptions } from "./dispatch/dispatcher.js";

export { IntentRouter } from "./router/intent-router.js";
export type { Classifier, ClassifierMessage, ClassifierPrompt } from "./router/intent-router.js";
export {
  createChatModel,
  createConversationalResponder,
  createLlmClassifier,
} from "./router/llm-classifier.js";
export type { ConversationalResponder } from "./router/llm-classifier.js";

export { CrawlEngine } from "./crawler/crawl-engine.js";
export type { CrawlOptions } from "./crawler/crawl-engine.js";
export type { CrawlRecord, CrawlScope, CrawlSummary, PageFetcher } from "./crawler/types.js";

export { backendFactory, BACKEND_NAMES } from "./servers/backends.js";
export { serveMcp } from "./servers/http-host.js";

export { loadConfig, loadServerEndpoints, parseServerEndpoints } from "./config.js";
export type * from "./types.js";
export * from "./utils/errors.js";
