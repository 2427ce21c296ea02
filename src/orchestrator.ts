/**
 * @module orchestrator
 * @fileoverview Wires sessions, registry, router and dispatcher into one
 * context object. Nothing here is a module-level singleton; two
 * orchestrators in one process share no state.
 *
 * ## Request Flow
 * ```
 *  userText ──> IntentRouter.route(snapshot)
 *                 │ RoutingError ─────────────> { kind: "routing-failure" }
 *                 │ []           ──> responder ─> { kind: "conversation" }
 *                 v
 *               plan ──> Dispatcher.dispatch, in order ─> { kind: "tools", plan, results }
 * ```
 *
 * ## Registry Upkeep
 * | Session event                          | Registry action     |
 * | -------------------------------------- | ------------------- |
 * | `notifications/tools/list_changed`     | `refresh(endpoint)` |
 * | state `connected` after a reconnect    | `refresh(endpoint)` |
 * | state `failed`                         | `remove(endpoint)`  |
 */

import { config as appConfig } from "./config.js";
import { Dispatcher } from "./dispatch/dispatcher.js";
import { ToolRegistry, type RegistrySnapshot } from "./registry/tool-registry.js";
import { IntentRouter, type Classifier } from "./router/intent-router.js";
import type { ConversationalResponder } from "./router/llm-classifier.js";
import type { ChannelFactory } from "./transport/channel.js";
import { STATE_EVENT, SessionManager, type Sleep } from "./transport/session.js";
import type {
  CallProgress,
  DispatchResult,
  EndpointConfig,
  RoutePlan,
  ServerEndpoint,
  SessionEvent,
} from "./types.js";
import { RoutingError, errorMessage } from "./utils/errors.js";
import { createLogger, type Logger } from "./utils/logger.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

export interface OrchestratorConfig {
  endpoints: readonly EndpointConfig[];
  /** @default config.callTimeout */
  callTimeoutMs?: number;
  /** @default config.backoffBaseMs */
  backoffBaseMs?: number;
  /** @default config.backoffCapMs */
  backoffCapMs?: number;
  /** @default config.maxConnectAttempts */
  maxConnectAttempts?: number;
}

export interface OrchestratorDeps {
  classifier: Classifier;
  /** Answers requests no tool applies to. */
  responder: ConversationalResponder;
  /** @default SDK client over SSE */
  channelFactory?: ChannelFactory;
  sleep?: Sleep;
  logger?: Logger;
}

export interface HandleOptions {
  signal?: AbortSignal;
  onProgress?: (toolName: string, progress: CallProgress) => void;
}

export type HandleOutcome =
  | { readonly kind: "tools"; readonly plan: RoutePlan; readonly results: readonly DispatchResult[] }
  | { readonly kind: "conversation"; readonly reply: string }
  | { readonly kind: "routing-failure"; readonly message: string };

export interface StartReport {
  connected: string[];
  failed: Array<{ endpoint: string; error: string }>;
}

const LIST_CHANGED = "notifications/tools/list_changed";

function stateOf(event: SessionEvent): string | undefined {
  const { payload } = event;
  if (typeof payload !== "object" || payload === null || !("state" in payload)) return undefined;
  return typeof payload.state === "string" ? payload.state : undefined;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Orchestrator
 * ──────────────────────────────────────────────────────────────────────────── */

export class Orchestrator {
  private started = false;
  /** Endpoints whose catalog was loaded at least once. */
  private readonly catalogued = new Set<string>();
  private unsubscribe: (() => void) | undefined;

  private constructor(
    private readonly endpointConfigs: readonly EndpointConfig[],
    private readonly sessions: SessionManager,
    private readonly registry: ToolRegistry,
    private readonly router: IntentRouter,
    private readonly dispatcher: Dispatcher,
    private readonly responder: ConversationalResponder,
    private readonly log: Logger,
  ) {}

  static create(config: OrchestratorConfig, deps: OrchestratorDeps): Orchestrator {
    const log = deps.logger ?? createLogger("orchestrator");
    const sessions = new SessionManager({
      channelFactory: deps.channelFactory,
      backoffBaseMs: config.backoffBaseMs,
      backoffCapMs: config.backoffCapMs,
      maxConnectAttempts: config.maxConnectAttempts,
      sleep: deps.sleep,
      logger: log.child("session"),
    });
    const registry = new ToolRegistry(sessions, log.child("registry"));
    const router = new IntentRouter({ classifier: deps.classifier, logger: log.child("router") });
    const dispatcher = new Dispatcher({
      registry,
      sessions,
      callTimeoutMs: config.callTimeoutMs ?? appConfig.callTimeout,
      logger: log.child("dispatch"),
    });
    return new Orchestrator(config.endpoints, sessions, registry, router, dispatcher, deps.responder, log);
  }

  /**
   * Connect every endpoint concurrently and load their catalogs. An endpoint
   * that fails is reported, not thrown; the others stay usable.
   */
  async start(): Promise<StartReport> {
    if (this.started) throw new Error("Orchestrator already started");
    this.started = true;
    this.unsubscribe = this.sessions.onEvent((event) => this.onSessionEvent(event));

    const outcomes = await Promise.all(
      this.endpointConfigs.map(async (endpoint) => {
        try {
          await this.sessions.connect(endpoint);
          await this.registry.refresh(endpoint.name);
          this.catalogued.add(endpoint.name);
          return { endpoint: endpoint.name, error: undefined };
        } catch (error) {
          this.log.error(`Endpoint '${endpoint.name}' is not available`, errorMessage(error));
          return { endpoint: endpoint.name, error: errorMessage(error) };
        }
      }),
    );

    const report: StartReport = { connected: [], failed: [] };
    for (const outcome of outcomes) {
      if (outcome.error === undefined) {
        report.connected.push(outcome.endpoint);
      } else {
        report.failed.push({ endpoint: outcome.endpoint, error: outcome.error });
      }
    }
    this.log.info(
      `Ready with ${Object.keys(this.registry.allTools()).length} tools from ${report.connected.length} endpoints`,
    );
    return report;
  }

  /** Route `userText` and run the resulting plan. */
  async handle(userText: string, options: HandleOptions = {}): Promise<HandleOutcome> {
    let plan: RoutePlan;
    try {
      plan = await this.router.route(userText, this.registry.snapshot());
    } catch (error) {
      if (!(error instanceof RoutingError)) throw error;
      return { kind: "routing-failure", message: error.message };
    }

    if (plan.length === 0) {
      return { kind: "conversation", reply: await this.responder(userText) };
    }

    const { signal, onProgress } = options;
    const results: DispatchResult[] = [];
    for (const call of plan) {
      const request = this.dispatcher.createRequest(call.toolName, call.arguments);
      results.push(
        await this.dispatcher.dispatch(request, {
          signal,
          onProgress: onProgress ? (progress) => onProgress(call.toolName, progress) : undefined,
        }),
      );
    }
    this.log.debug(`Ran ${results.length} calls, ${results.filter((result) => result.ok).length} succeeded`);
    return { kind: "tools", plan, results };
  }

  tools(): RegistrySnapshot {
    return this.registry.snapshot();
  }

  endpoints(): ServerEndpoint[] {
    return this.sessions.endpoints();
  }

  /** Close every session. The orchestrator cannot be restarted. */
  async shutdown(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    await this.sessions.shutdown();
    for (const endpoint of this.endpointConfigs) this.registry.remove(endpoint.name);
  }

  /* ── Registry upkeep ──────────────────────────────────────────────────── */

  private onSessionEvent(event: SessionEvent): void {
    if (event.type === LIST_CHANGED) {
      void this.refreshQuietly(event.endpoint, "tool list changed");
      return;
    }
    if (event.type !== STATE_EVENT) return;

    const state = stateOf(event);
    if (state === "failed") {
      this.catalogued.delete(event.endpoint);
      this.registry.remove(event.endpoint);
    } else if (state === "connected" && this.catalogued.has(event.endpoint)) {
      // The first connect is refreshed by start(); this is a reconnect.
      void this.refreshQuietly(event.endpoint, "reconnected");
    }
  }

  private async refreshQuietly(endpoint: string, reason: string): Promise<void> {
    try {
      await this.registry.refresh(endpoint);
      this.log.info(`Refreshed tools of '${endpoint}' (${reason})`);
    } catch (error) {
      this.log.warn(`Cannot refresh tools of '${endpoint}' (${reason})`, errorMessage(error));
    }
  }
}
