/**
 * @module types
 * @fileoverview Domain types shared by the transport, registry, dispatcher
 * and router layers.
 *
 * Crawl-specific types live in `crawler/types.ts`; this module only holds
 * what crosses layer boundaries on the orchestrating client.
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Endpoints
 * ──────────────────────────────────────────────────────────────────────────── */

/** Lifecycle of one backend connection. */
export type ConnectionState = "disconnected" | "connecting" | "connected" | "failed";

/**
 * Static identity of a backend server, as read from configuration.
 */
export interface EndpointConfig {
  /** Logical server name, e.g. `"memory"`. Unique across the configuration. */
  name: string;
  /** SSE endpoint URL, e.g. `"http://localhost:8030/sse"`. */
  url: string;
  /** Key sent in the `X-API-Key` header of every request. */
  apiKey: string;
}

/** An endpoint together with its current connection state. */
export interface ServerEndpoint extends EndpointConfig {
  state: ConnectionState;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Tools
 * ──────────────────────────────────────────────────────────────────────────── */

/** JSON types a tool parameter may declare. */
export type ParameterType =
  | "string"
  | "number"
  | "integer"
  | "boolean"
  | "array"
  | "object"
  | "any";

/** One entry of a tool's ordered parameter list. */
export interface ParameterSpec {
  readonly name: string;
  readonly type: ParameterType;
  readonly required: boolean;
  readonly description?: string;
}

/**
 * A tool as advertised by one endpoint. Frozen at creation; a refresh
 * replaces descriptors rather than editing them.
 */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly parameters: readonly ParameterSpec[];
  /** Name of the owning endpoint (lookup key, not an owning reference). */
  readonly endpoint: string;
}

/** Raw catalog entry as returned by the tool catalog query. */
export interface RawToolInfo {
  name: string;
  description?: string;
  inputSchema: unknown;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Dispatch
 * ──────────────────────────────────────────────────────────────────────────── */

/** Insertion-ordered argument mapping. */
export type ToolArguments = Readonly<Record<string, unknown>>;

/** A tool call ready to dispatch. Frozen once created. */
export interface DispatchRequest {
  readonly toolName: string;
  readonly arguments: ToolArguments;
  readonly correlationId: string;
  /** Absolute deadline, epoch milliseconds. */
  readonly deadline: number;
}

/** Every way a dispatch can fail. */
export type FailureKind =
  | "UnknownTool"
  | "InvalidArguments"
  | "Timeout"
  | "RemoteError"
  | "EndpointUnavailable"
  | "AuthError"
  | "ConnectionError"
  | "Cancelled"
  | "DuplicateCorrelationId";

export interface DispatchFailure {
  readonly kind: FailureKind;
  readonly message: string;
}

/** Opaque structured value returned by a tool. */
export interface ToolPayload {
  /** Concatenated text content blocks. */
  readonly text: string;
  /** `structuredContent` of the tool result, when the server sent one. */
  readonly structured?: Readonly<Record<string, unknown>>;
}

export type DispatchResult =
  | {
      readonly ok: true;
      readonly correlationId: string;
      readonly toolName: string;
      readonly endpoint: string;
      readonly payload: ToolPayload;
    }
  | {
      readonly ok: false;
      readonly correlationId: string;
      readonly toolName: string;
      readonly failure: DispatchFailure;
    };

/* ────────────────────────────────────────────────────────────────────────────
 * Push Events
 * ──────────────────────────────────────────────────────────────────────────── */

/** A server-pushed notification, or a local connection-state change. */
export interface SessionEvent {
  readonly endpoint: string;
  /** Notification method, e.g. `"notifications/progress"`, or `"session/state"`. */
  readonly type: string;
  readonly payload: unknown;
  readonly receivedAt: number;
}

/** Progress update for a call in flight. */
export interface CallProgress {
  progress: number;
  total?: number;
  message?: string;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Routing
 * ──────────────────────────────────────────────────────────────────────────── */

/** One step of a routing plan. */
export interface PlannedCall {
  readonly toolName: string;
  readonly arguments: ToolArguments;
}

/** Ordered tool calls chosen for a user request; empty when none applies. */
export type RoutePlan = readonly PlannedCall[];
