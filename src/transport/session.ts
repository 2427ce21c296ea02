/**
 * @module transport/session
 * @fileoverview Session manager: owns one channel per backend endpoint,
 * keeps it connected, and turns every call into exactly one
 * {@link DispatchResult}.
 *
 * ## Connection State Machine
 * ```
 *                 open ok
 *  disconnected ──────────> connecting ──────────> connected
 *                             ^    │                   │
 *                 backoff     │    │ auth rejected,    │ transport dropped
 *                 1s,2s,4s..  └────┤ attempts used up  │
 *                 (cap 30s)        v                   │
 *                                failed <──────────────┘ (when reconnect fails)
 * ```
 *
 * Calls on a `failed` or closed endpoint return `EndpointUnavailable` without
 * touching the network. Calls issued while a reconnect runs wait for it,
 * bounded by their own deadline. A key rejected on a call is fatal too: the
 * endpoint goes `failed` and its channel is closed.
 *
 * A call that passes its deadline or whose signal aborts is abandoned: the
 * channel cancels the request on the server and any late answer is dropped.
 *
 * ## Push Events
 * Server notifications and local state changes are published as
 * {@link SessionEvent}s. Consumers either register a synchronous listener or
 * pull through {@link SessionManager.subscribe}.
 */

import { setTimeout as delay } from "node:timers/promises";
import { config } from "../config.js";
import type {
  CallProgress,
  ConnectionState,
  DispatchResult,
  EndpointConfig,
  RawToolInfo,
  ServerEndpoint,
  SessionEvent,
  ToolArguments,
} from "../types.js";
import { AsyncChannel } from "../utils/async-channel.js";
import { withDeadline, withSignal } from "../utils/deadline.js";
import {
  AuthError,
  CancelledError,
  ConnectionError,
  EndpointUnavailableError,
  TimeoutError,
  errorMessage,
  toFailure,
} from "../utils/errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { classifyTransportError, mcpChannelFactory, type ChannelFactory, type SessionChannel } from "./channel.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/** Opaque reference to a managed endpoint. */
export interface SessionHandle {
  readonly endpoint: string;
}

export interface CallOptions {
  correlationId: string;
  /** Absolute deadline, epoch milliseconds. */
  deadline: number;
  /** Aborting yields `Cancelled` and cancels the request on the server. */
  signal?: AbortSignal;
  onProgress?: (progress: CallProgress) => void;
}

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export type SessionEventListener = (event: SessionEvent) => void;

export interface SessionManagerOptions {
  /** @default SDK client over SSE */
  channelFactory?: ChannelFactory;
  /** @default config.backoffBaseMs */
  backoffBaseMs?: number;
  /** @default config.backoffCapMs */
  backoffCapMs?: number;
  /** @default config.maxConnectAttempts */
  maxConnectAttempts?: number;
  /** Waits between connect attempts. Rejects when the signal aborts. */
  sleep?: Sleep;
  logger?: Logger;
}

/** Event type of local connection-state changes. */
export const STATE_EVENT = "session/state";

/** Published once when the manager shuts down; ends every subscription. */
export const SHUTDOWN_EVENT = "session/shutdown";

/** The channel's own timeout trails the deadline by this much, so the deadline fires first. */
const CHANNEL_TIMEOUT_SLACK_MS = 1_000;

interface Session {
  readonly config: EndpointConfig;
  state: ConnectionState;
  channel: SessionChannel | undefined;
  /** Settles when the current connect or reconnect run ends. */
  connecting: Promise<void> | undefined;
  closed: boolean;
  /** Why the last connect run failed. */
  lastError: Error | undefined;
  /** Aborts backoff sleeps when the session is closed. */
  readonly lifetime: AbortController;
}

const defaultSleep: Sleep = (ms, signal) => delay(ms, undefined, { signal });

/* ────────────────────────────────────────────────────────────────────────────
 * Session Manager
 * ──────────────────────────────────────────────────────────────────────────── */

export class SessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly listeners = new Set<SessionEventListener>();
  private readonly channelFactory: ChannelFactory;
  private readonly backoffBaseMs: number;
  private readonly backoffCapMs: number;
  private readonly maxConnectAttempts: number;
  private readonly sleep: Sleep;
  private readonly log: Logger;
  private shutDown = false;

  constructor(options: SessionManagerOptions = {}) {
    this.channelFactory = options.channelFactory ?? mcpChannelFactory();
    this.backoffBaseMs = options.backoffBaseMs ?? config.backoffBaseMs;
    this.backoffCapMs = options.backoffCapMs ?? config.backoffCapMs;
    this.maxConnectAttempts = Math.max(1, options.maxConnectAttempts ?? config.maxConnectAttempts);
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? createLogger("session");
  }

  /** Delay before retry number `attempt` (1-based): base * 2^(attempt-1), capped. */
  backoffDelay(attempt: number): number {
    return Math.min(this.backoffBaseMs * 2 ** (attempt - 1), this.backoffCapMs);
  }

  /* ── Connection lifecycle ─────────────────────────────────────────────── */

  /**
   * Connect to `endpoint`, retrying with backoff. Returns the existing
   * handle when the endpoint is already connected.
   *
   * @throws {AuthError} The key was rejected; the endpoint is `failed`.
   * @throws {ConnectionError} Every attempt failed; the endpoint is `failed`.
   */
  async connect(endpoint: EndpointConfig): Promise<SessionHandle> {
    if (this.shutDown) {
      throw new EndpointUnavailableError(endpoint.name, "Session manager is shut down");
    }

    let session = this.sessions.get(endpoint.name);
    if (!session || session.closed || session.state === "failed") {
      session = {
        config: endpoint,
        state: "disconnected",
        channel: undefined,
        connecting: undefined,
        closed: false,
        lastError: undefined,
        lifetime: new AbortController(),
      };
      this.sessions.set(endpoint.name, session);
    }

    if (session.state !== "connected") {
      const run = session.connecting ?? this.startConnecting(session);
      await run;
      if (session.state !== "connected") {
        throw (
          session.lastError ??
          new ConnectionError(endpoint.name, `Endpoint '${endpoint.name}' did not connect`)
        );
      }
    }

    return Object.freeze({ endpoint: endpoint.name });
  }

  private startConnecting(session: Session): Promise<void> {
    const run = this.connectWithRetry(session)
      .then(() => {
        session.lastError = undefined;
      })
      .catch((error: unknown) => {
        session.lastError =
          error instanceof Error ? error : new ConnectionError(session.config.name, errorMessage(error));
      })
      .finally(() => {
        session.connecting = undefined;
      });
    session.connecting = run;
    return run;
  }

  private async connectWithRetry(session: Session): Promise<void> {
    const { name } = session.config;

    for (let attempt = 1; ; attempt++) {
      if (session.closed) throw new EndpointUnavailableError(name);
      this.setState(session, "connecting");

      const channel = this.channelFactory(session.config, {
        onNotification: (method, params) => this.publish(name, method, params),
        onClose: () => this.handleDrop(session, channel),
      });

      try {
        await channel.open();
      } catch (rawError) {
        const error = classifyTransportError(name, rawError);

        if (error instanceof AuthError) {
          this.log.error(`Endpoint '${name}' rejected credentials; not retrying`, error);
          this.setState(session, "failed", error.message);
          throw error;
        }
        if (attempt >= this.maxConnectAttempts) {
          const message = `Endpoint '${name}' unreachable after ${attempt} attempts: ${error.message}`;
          this.log.error(message);
          this.setState(session, "failed", message);
          throw new ConnectionError(name, message);
        }

        const wait = this.backoffDelay(attempt);
        this.log.warn(
          `Connect to '${name}' failed (attempt ${attempt}/${this.maxConnectAttempts}); retrying in ${wait}ms`,
          error,
        );
        try {
          await this.sleep(wait, session.lifetime.signal);
        } catch (sleepError) {
          if (session.closed) throw new EndpointUnavailableError(name);
          throw sleepError;
        }
        continue;
      }

      if (session.closed) {
        await channel.close();
        throw new EndpointUnavailableError(name);
      }

      session.channel = channel;
      this.setState(session, "connected");
      this.log.info(`Connected to '${name}' at ${session.config.url}`);
      return;
    }
  }

  /** The active channel of `session` closed underneath us: reconnect. */
  private handleDrop(session: Session, channel: SessionChannel): void {
    if (session.closed || session.channel !== channel) return;

    this.log.warn(`Connection to '${session.config.name}' dropped; reconnecting`);
    session.channel = undefined;
    if (!session.connecting) {
      // Failures land in session.lastError and the state event.
      void this.startConnecting(session);
    }
  }

  private setState(session: Session, state: ConnectionState, error?: string): void {
    const previous = session.state;
    if (previous === state) return;
    session.state = state;
    const payload = error === undefined ? { state, previous } : { state, previous, error };
    this.publish(session.config.name, STATE_EVENT, payload);
  }

  /* ── Calls ────────────────────────────────────────────────────────────── */

  /**
   * Issue one tool call. Never throws: every outcome is a {@link DispatchResult}
   * whose correlation id is `options.correlationId`.
   */
  async call(
    handle: SessionHandle,
    toolName: string,
    args: ToolArguments,
    options: CallOptions,
  ): Promise<DispatchResult> {
    const { correlationId, deadline } = options;
    const fail = (error: unknown): DispatchResult => ({
      ok: false,
      correlationId,
      toolName,
      failure: toFailure(error),
    });

    const session = this.sessions.get(handle.endpoint);
    if (!session || session.closed || session.state === "failed") {
      return fail(new EndpointUnavailableError(handle.endpoint));
    }

    const timeoutMessage = `Call to '${toolName}' on '${handle.endpoint}' passed its deadline`;
    if (Date.now() >= deadline) {
      return fail(new TimeoutError(timeoutMessage));
    }
    if (options.signal?.aborted) {
      return fail(new CancelledError());
    }

    const abandon = new AbortController();
    try {
      if (session.connecting) {
        await withSignal(withDeadline(session.connecting, deadline, timeoutMessage), options.signal);
      }
      const channel = session.channel;
      if (session.state !== "connected" || !channel) {
        return fail(new EndpointUnavailableError(handle.endpoint));
      }

      const work = channel.callTool(toolName, args, {
        correlationId,
        timeoutMs: Math.max(deadline - Date.now(), 1) + CHANNEL_TIMEOUT_SLACK_MS,
        deadline,
        signal: abandon.signal,
        onProgress: (progress) => {
          options.onProgress?.(progress);
          this.publish(handle.endpoint, "notifications/progress", { correlationId, toolName, ...progress });
        },
      });

      const payload = await withSignal(withDeadline(work, deadline, timeoutMessage), options.signal);
      return { ok: true, correlationId, toolName, endpoint: handle.endpoint, payload };
    } catch (error) {
      if (error instanceof TimeoutError || error instanceof CancelledError) {
        abandon.abort();
      } else if (error instanceof AuthError) {
        await this.revoke(session, error);
      }
      this.log.debug(`Call ${correlationId} (${toolName}) failed`, error);
      return fail(error);
    }
  }

  /** The endpoint rejected its key on a call: fail it and drop the channel. */
  private async revoke(session: Session, error: AuthError): Promise<void> {
    const channel = session.channel;
    if (session.state === "failed" || !channel) return;

    this.log.error(`Endpoint '${session.config.name}' rejected credentials on a call; marking it failed`, error);
    session.channel = undefined;
    session.lastError = error;
    this.setState(session, "failed", error.message);
    try {
      await channel.close();
    } catch (closeError) {
      this.log.warn(`Error closing '${session.config.name}'`, closeError);
    }
  }

  /**
   * Fetch the tool catalog of a connected endpoint.
   *
   * @throws {EndpointUnavailableError} The endpoint is not connected.
   */
  async listTools(handle: SessionHandle): Promise<RawToolInfo[]> {
    const session = this.sessions.get(handle.endpoint);
    if (session?.connecting) await session.connecting;
    if (!session || session.state !== "connected" || !session.channel) {
      throw new EndpointUnavailableError(handle.endpoint);
    }
    return session.channel.listTools();
  }

  /* ── Events ───────────────────────────────────────────────────────────── */

  private publish(endpoint: string, type: string, payload: unknown): void {
    const event: SessionEvent = Object.freeze({ endpoint, type, payload, receivedAt: Date.now() });
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.log.error(`Event listener failed on ${type}`, error);
      }
    }
  }

  /** Register a synchronous listener for every event. Returns an unsubscribe function. */
  onEvent(listener: SessionEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Stream events as an async iterable, optionally for one endpoint only.
   * Ends when `signal` aborts, the consumer breaks out, or the manager shuts down.
   */
  subscribe(handle?: SessionHandle, signal?: AbortSignal): AsyncIterable<SessionEvent> {
    const events = new AsyncChannel<SessionEvent>();
    if (this.shutDown || signal?.aborted) {
      events.close();
      return events;
    }

    const unsubscribe = this.onEvent((event) => {
      if (event.type === SHUTDOWN_EVENT) {
        events.close();
      } else if (!handle || event.endpoint === handle.endpoint) {
        events.push(event);
      }
    });
    const closeStream = (): void => events.close();

    signal?.addEventListener("abort", closeStream, { once: true });
    events.onClose(() => {
      unsubscribe();
      signal?.removeEventListener("abort", closeStream);
    });
    return events;
  }

  /* ── Inspection ───────────────────────────────────────────────────────── */

  endpoint(name: string): ServerEndpoint | undefined {
    const session = this.sessions.get(name);
    return session ? { ...session.config, state: session.state } : undefined;
  }

  endpoints(): ServerEndpoint[] {
    return [...this.sessions.values()].map((session) => ({ ...session.config, state: session.state }));
  }

  /* ── Teardown ─────────────────────────────────────────────────────────── */

  /** Close one endpoint. Later calls on its handle return `EndpointUnavailable`. */
  async close(handle: SessionHandle): Promise<void> {
    const session = this.sessions.get(handle.endpoint);
    if (!session || session.closed) return;

    session.closed = true;
    session.lifetime.abort();
    const channel = session.channel;
    session.channel = undefined;
    this.setState(session, "disconnected");

    if (channel) {
      try {
        await channel.close();
      } catch (error) {
        this.log.warn(`Error closing '${handle.endpoint}'`, error);
      }
    }
  }

  /** Close every endpoint and end every subscription. */
  async shutdown(): Promise<void> {
    if (this.shutDown) return;
    this.shutDown = true;
    await Promise.all([...this.sessions.keys()].map((endpoint) => this.close({ endpoint })));
    this.publish("*", SHUTDOWN_EVENT, null);
    this.listeners.clear();
  }
}
