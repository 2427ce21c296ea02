/**
 * @module utils/errors
 * @fileoverview Error class hierarchy for the tool orchestrator and its servers.
 *
 * Every error raised by this package extends {@link OrchestratorError}, which
 * carries a machine-readable `code` next to the human-readable `message`.
 * The dispatcher turns these into {@link DispatchFailure} values with
 * {@link toFailure}; tool handlers on the server side turn them into
 * `isError` responses with {@link formatErrorForMcp}.
 *
 * ## Error Hierarchy
 * ```
 * Error (built-in)
 *   └── OrchestratorError (base)      ─── code: string
 *         ├── ConnectionError          ─── "CONNECTION_FAILED"
 *         ├── AuthError                ─── "AUTH_REJECTED"
 *         ├── EndpointUnavailableError ─── "ENDPOINT_UNAVAILABLE"
 *         ├── RegistryError            ─── "REGISTRY_FAILED"
 *         ├── UnknownToolError         ─── "UNKNOWN_TOOL"
 *         ├── InvalidArgumentsError    ─── "INVALID_ARGUMENTS"
 *         ├── TimeoutError             ─── "TIMEOUT"
 *         ├── RemoteError              ─── "REMOTE_ERROR"
 *         ├── CancelledError           ─── "CANCELLED"
 *         ├── DuplicateCorrelationIdError ─ "DUPLICATE_CORRELATION_ID"
 *         ├── HallucinatedToolError    ─── "HALLUCINATED_TOOL"
 *         ├── RoutingError             ─── "ROUTING_FAILED"
 *         ├── FetchError               ─── "FETCH_FAILED"   + optional statusCode
 *         ├── SecurityError            ─── "SSRF_BLOCKED"
 *         ├── ContentTypeError         ─── "CONTENT_TYPE_REJECTED"
 *         ├── ResponseTooLargeError    ─── "RESPONSE_TOO_LARGE"
 *         ├── ParseError               ─── "PARSE_FAILED"
 *         ├── FrontierError            ─── "FRONTIER_FAILED"
 *         ├── NotFoundError            ─── "NOT_FOUND"
 *         ├── ConflictError            ─── "CONFLICT"
 *         └── ConfigError              ─── "CONFIG_INVALID"
 * ```
 *
 * @example
 * ```ts
 * import { FetchError, formatErrorForMcp } from "./utils/errors.js";
 *
 * formatErrorForMcp(new FetchError("Server returned 503", 503));
 * // => "[FETCH_FAILED] Server returned 503"
 * ```
 */

import type { DispatchFailure, FailureKind } from "../types.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error Class
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Base class for all orchestrator errors.
 *
 * Codes are SCREAMING_SNAKE_CASE and stable: they cross the MCP boundary as
 * text, so changing one is a breaking change.
 */
export class OrchestratorError extends Error {
  /** Machine-readable error code, e.g. `"UNKNOWN_TOOL"`. */
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Transport & Endpoint Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * The transport to an endpoint could not be established or dropped mid-call.
 * Retried by the session manager according to its backoff policy.
 */
export class ConnectionError extends OrchestratorError {
  /** Logical endpoint name from configuration. */
  public readonly endpoint: string;

  constructor(endpoint: string, message: string) {
    super(message, "CONNECTION_FAILED");
    this.endpoint = endpoint;
  }
}

/**
 * The endpoint rejected the API key (HTTP 401/403). Never retried: the
 * endpoint is marked `failed` as soon as this is seen.
 */
export class AuthError extends OrchestratorError {
  public readonly endpoint: string;

  constructor(endpoint: string, message: string) {
    super(message, "AUTH_REJECTED");
    this.endpoint = endpoint;
  }
}

/**
 * A call was issued to an endpoint that is `failed` or already closed.
 */
export class EndpointUnavailableError extends OrchestratorError {
  public readonly endpoint: string;

  constructor(endpoint: string, message?: string) {
    super(message ?? `Endpoint '${endpoint}' is unavailable`, "ENDPOINT_UNAVAILABLE");
    this.endpoint = endpoint;
  }
}

/** The tool catalog of an endpoint could not be fetched. */
export class RegistryError extends OrchestratorError {
  public readonly endpoint: string;

  constructor(endpoint: string, message: string) {
    super(message, "REGISTRY_FAILED");
    this.endpoint = endpoint;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Dispatch Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/** No connected endpoint exposes a tool with this name. */
export class UnknownToolError extends OrchestratorError {
  public readonly toolName: string;

  constructor(toolName: string) {
    super(`Unknown tool '${toolName}'`, "UNKNOWN_TOOL");
    this.toolName = toolName;
  }
}

/**
 * The supplied arguments do not satisfy the tool's parameter schema.
 *
 * `problems` lists one entry per offending parameter so the caller (or the
 * classifier, on a retry) can correct all of them at once.
 */
export class InvalidArgumentsError extends OrchestratorError {
  public readonly toolName: string;
  public readonly problems: readonly string[];

  constructor(toolName: string, problems: readonly string[]) {
    super(`Invalid arguments for '${toolName}': ${problems.join("; ")}`, "INVALID_ARGUMENTS");
    this.toolName = toolName;
    this.problems = problems;
  }
}

/**
 * A call, fetch or other operation exceeded its time budget.
 * Propagated to the caller, who owns the retry decision.
 */
export class TimeoutError extends OrchestratorError {
  constructor(message: string) {
    super(message, "TIMEOUT");
  }
}

/**
 * A server reported a business-level failure. The server's message is kept
 * verbatim as this error's message.
 */
export class RemoteError extends OrchestratorError {
  public readonly endpoint: string;

  constructor(endpoint: string, message: string) {
    super(message, "REMOTE_ERROR");
    this.endpoint = endpoint;
  }
}

/** The caller aborted the dispatch. Any in-flight call is left to finish. */
export class CancelledError extends OrchestratorError {
  constructor(message = "Dispatch cancelled") {
    super(message, "CANCELLED");
  }
}

/** A request reused a correlation id that was already issued. */
export class DuplicateCorrelationIdError extends OrchestratorError {
  public readonly correlationId: string;

  constructor(correlationId: string) {
    super(`Correlation id '${correlationId}' was already used`, "DUPLICATE_CORRELATION_ID");
    this.correlationId = correlationId;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Routing Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/** The classifier picked a tool name that is not in the registry snapshot. */
export class HallucinatedToolError extends OrchestratorError {
  public readonly toolName: string;

  constructor(toolName: string) {
    super(`Classifier chose unknown tool '${toolName}'`, "HALLUCINATED_TOOL");
    this.toolName = toolName;
  }
}

/**
 * Routing gave up: the classifier failed twice in a row (the original attempt
 * and the single correction retry).
 */
export class RoutingError extends OrchestratorError {
  /** The error that ended the final attempt. */
  public readonly lastError: unknown;

  constructor(message: string, lastError?: unknown) {
    super(message, "ROUTING_FAILED");
    this.lastError = lastError;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Crawl & Fetch Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * An HTTP fetch failed. `statusCode` is set when the server responded and
 * left undefined for DNS, TCP and TLS level failures.
 */
export class FetchError extends OrchestratorError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message, "FETCH_FAILED");
    this.statusCode = statusCode;
  }
}

/**
 * A fetch was blocked before any traffic left the host because the target
 * resolves to a private or reserved address.
 */
export class SecurityError extends OrchestratorError {
  constructor(message: string) {
    super(message, "SSRF_BLOCKED");
  }
}

/** The response Content-Type is not an HTML type. */
export class ContentTypeError extends OrchestratorError {
  constructor(message: string) {
    super(message, "CONTENT_TYPE_REJECTED");
  }
}

/** The response body is larger than the configured limit. */
export class ResponseTooLargeError extends OrchestratorError {
  constructor(message: string) {
    super(message, "RESPONSE_TOO_LARGE");
  }
}

/** The page HTML could not be turned into text and links. */
export class ParseError extends OrchestratorError {
  constructor(message: string) {
    super(message, "PARSE_FAILED");
  }
}

/**
 * The initial crawl frontier could not be built (bad seed URL, unsupported
 * scheme, empty allow-list). The only error that is fatal to a crawl.
 */
export class FrontierError extends OrchestratorError {
  constructor(message: string) {
    super(message, "FRONTIER_FAILED");
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Backend Store Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/** A backend store has no entry with the requested key. */
export class NotFoundError extends OrchestratorError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
  }
}

/** A backend store already holds an entry with this key. */
export class ConflictError extends OrchestratorError {
  constructor(message: string) {
    super(message, "CONFLICT");
  }
}

/** Configuration file or environment is malformed. */
export class ConfigError extends OrchestratorError {
  constructor(message: string) {
    super(message, "CONFIG_INVALID");
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Render any caught value as a single line for an MCP tool response or a
 * log entry.
 *
 * @example
 * ```ts
 * formatErrorForMcp(new UnknownToolError("fly"));  // "[UNKNOWN_TOOL] Unknown tool 'fly'"
 * formatErrorForMcp(new TypeError("boom"));         // "boom"
 * formatErrorForMcp(42);                            // "42"
 * ```
 */
export function formatErrorForMcp(error: unknown): string {
  if (error instanceof OrchestratorError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Plain message of any caught value, without the code prefix.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/* ────────────────────────────────────────────────────────────────────────────
 * Dispatch Failure Mapping
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Map a caught value to the {@link DispatchFailure} reported to callers.
 *
 * Errors outside the hierarchy are reported as `ConnectionError`: the only
 * code paths that can produce them are transport internals.
 */
export function toFailure(error: unknown): DispatchFailure {
  const message = errorMessage(error);
  let kind: FailureKind = "ConnectionError";

  if (error instanceof UnknownToolError) kind = "UnknownTool";
  else if (error instanceof InvalidArgumentsError) kind = "InvalidArguments";
  else if (error instanceof TimeoutError) kind = "Timeout";
  else if (error instanceof RemoteError) kind = "RemoteError";
  else if (error instanceof EndpointUnavailableError) kind = "EndpointUnavailable";
  else if (error instanceof AuthError) kind = "AuthError";
  else if (error instanceof CancelledError) kind = "Cancelled";
  else if (error instanceof DuplicateCorrelationIdError) kind = "DuplicateCorrelationId";

  return { kind, message };
}
