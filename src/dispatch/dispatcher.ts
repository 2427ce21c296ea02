/**
 * @module dispatch/dispatcher
 * @fileoverview Turn a {@link DispatchRequest} into exactly one
 * {@link DispatchResult}.
 *
 * ## Pipeline
 * ```
 *  DispatchRequest
 *   |
 *   v
 *  [1] Correlation id already issued? ------> DuplicateCorrelationId
 *   |
 *   v
 *  [2] Registry lookup ---------------------> UnknownTool      (no network)
 *   |
 *   v
 *  [3] Argument check / coercion -----------> InvalidArguments (no network)
 *   |
 *   v
 *  [4] Session call, bounded by deadline ---> Timeout / RemoteError /
 *   |   and by the caller's signal              EndpointUnavailable /
 *   |                                           AuthError / ConnectionError /
 *   v                                           Cancelled
 *  DispatchResult { ok: true, payload }
 * ```
 *
 * Nothing is retried here. A timed-out or cancelled call is abandoned: the
 * session cancels it on the server and drops any late result.
 *
 * Issued correlation ids are remembered until {@link ISSUED_RETENTION_MS}
 * after their deadline. A request reusing an id forgotten by then has a
 * deadline long gone and fails as `Timeout` before reaching the network.
 */

import { randomUUID } from "node:crypto";
import { config } from "../config.js";
import type { CallOptions, SessionHandle } from "../transport/session.js";
import type {
  CallProgress,
  DispatchResult,
  DispatchRequest,
  ToolArguments,
  ToolDescriptor,
} from "../types.js";
import { withSignal } from "../utils/deadline.js";
import {
  CancelledError,
  DuplicateCorrelationIdError,
  InvalidArgumentsError,
  toFailure,
} from "../utils/errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { checkArguments } from "./arguments.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Collaborators
 * ──────────────────────────────────────────────────────────────────────────── */

/** The slice of the tool registry the dispatcher reads. */
export interface ToolResolver {
  /** @throws {UnknownToolError} */
  resolve(name: string): ToolDescriptor;
}

/** The slice of the session manager the dispatcher calls. */
export interface ToolCaller {
  call(handle: SessionHandle, toolName: string, args: ToolArguments, options: CallOptions): Promise<DispatchResult>;
}

export interface DispatcherOptions {
  registry: ToolResolver;
  sessions: ToolCaller;
  /** Default time budget of {@link Dispatcher.createRequest}. @default config.callTimeout */
  callTimeoutMs?: number;
  logger?: Logger;
}

export interface DispatchOptions {
  /** Aborting yields `Cancelled` at once. */
  signal?: AbortSignal;
  onProgress?: (progress: CallProgress) => void;
}

/** How long an issued correlation id is remembered past its deadline. */
export const ISSUED_RETENTION_MS = 5 * 60_000;

/* ────────────────────────────────────────────────────────────────────────────
 * Dispatcher
 * ──────────────────────────────────────────────────────────────────────────── */

export class Dispatcher {
  /** Correlation id -> deadline of the request that used it. */
  private readonly issued = new Map<string, number>();
  private readonly registry: ToolResolver;
  private readonly sessions: ToolCaller;
  private readonly callTimeoutMs: number;
  private readonly log: Logger;

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.sessions = options.sessions;
    this.callTimeoutMs = options.callTimeoutMs ?? config.callTimeout;
    this.log = options.logger ?? createLogger("dispatch");
  }

  /**
   * Build a frozen request with a fresh correlation id and a deadline
   * `timeoutMs` from now.
   */
  createRequest(toolName: string, args: ToolArguments = {}, options: { timeoutMs?: number } = {}): DispatchRequest {
    return Object.freeze({
      toolName,
      arguments: Object.freeze({ ...args }),
      correlationId: randomUUID(),
      deadline: Date.now() + (options.timeoutMs ?? this.callTimeoutMs),
    });
  }

  /** Dispatch one request. Never throws. */
  async dispatch(request: DispatchRequest, options: DispatchOptions = {}): Promise<DispatchResult> {
    const { toolName, correlationId } = request;
    const fail = (error: unknown): DispatchResult => {
      const failure = toFailure(error);
      this.log.debug(`Dispatch ${correlationId} (${toolName}) failed: ${failure.kind}`, failure.message);
      return { ok: false, correlationId, toolName, failure };
    };

    this.forgetExpired(Date.now());
    if (this.issued.has(correlationId)) {
      return fail(new DuplicateCorrelationIdError(correlationId));
    }
    this.issued.set(correlationId, request.deadline);

    let descriptor: ToolDescriptor;
    try {
      descriptor = this.registry.resolve(toolName);
    } catch (error) {
      return fail(error);
    }

    const checked = checkArguments(descriptor.parameters, request.arguments);
    if (!checked.ok) {
      return fail(new InvalidArgumentsError(toolName, checked.problems));
    }

    if (options.signal?.aborted) {
      return fail(new CancelledError());
    }

    this.log.debug(`Dispatch ${correlationId}: ${toolName} -> '${descriptor.endpoint}'`);
    const call = this.sessions.call({ endpoint: descriptor.endpoint }, toolName, checked.arguments, {
      correlationId,
      deadline: request.deadline,
      signal: options.signal,
      onProgress: options.onProgress,
    });

    try {
      return await withSignal(call, options.signal);
    } catch (error) {
      return fail(error);
    }
  }

  /** Number of correlation ids currently remembered. */
  get issuedCount(): number {
    return this.issued.size;
  }

  private forgetExpired(now: number): void {
    for (const [id, deadline] of this.issued) {
      if (deadline + ISSUED_RETENTION_MS <= now) this.issued.delete(id);
    }
  }

  /**
   * Dispatch requests one after another, in order. Results line up with
   * `requests`. Once the signal aborts, the remaining requests come back
   * `Cancelled`.
   */
  async dispatchAll(requests: readonly DispatchRequest[], options: DispatchOptions = {}): Promise<DispatchResult[]> {
    const results: DispatchResult[] = [];
    for (const request of requests) {
      results.push(await this.dispatch(request, options));
    }
    return results;
  }
}

