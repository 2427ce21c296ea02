/**
 * @module transport/channel
 * @fileoverview One MCP client connection to one backend endpoint.
 *
 * A {@link SessionChannel} is the unit the session manager opens, drops and
 * re-opens. The production implementation wraps the SDK `Client` over the
 * SSE client transport; tests hand the manager fakes, or an SDK client over
 * the in-memory linked transport.
 *
 * ## Error Mapping
 * | Raised by the SDK                              | Thrown here       |
 * | ---------------------------------------------- | ----------------- |
 * | HTTP 401 / 403 on the event stream or a POST   | `AuthError`       |
 * | Any other connect or send failure              | `ConnectionError` |
 * | `McpError` RequestTimeout                      | `TimeoutError`    |
 * | `McpError` ConnectionClosed                    | `ConnectionError` |
 * | Other `McpError`, or a result with `isError`   | `RemoteError`     |
 *
 * ## Request Metadata
 * Every call carries `_meta.correlationId`, and `_meta.timeBudgetMs` (time
 * left until the caller's deadline) when a deadline is given.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { SSEClientTransport, SseError } from "@modelcontextprotocol/sdk/client/sse.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type {
  CallProgress,
  EndpointConfig,
  RawToolInfo,
  ToolArguments,
  ToolPayload,
} from "../types.js";
import {
  AuthError,
  ConnectionError,
  OrchestratorError,
  RemoteError,
  TimeoutError,
  errorMessage,
} from "../utils/errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Contract
 * ──────────────────────────────────────────────────────────────────────────── */

export interface ChannelCallOptions {
  correlationId: string;
  /** Upper bound the channel itself enforces; the caller's deadline is separate. */
  timeoutMs: number;
  /**
   * Caller's deadline, epoch milliseconds. The time left is sent to the
   * server as `_meta.timeBudgetMs` so long-running tools can stop early.
   */
  deadline?: number;
  /** Aborting cancels the request on the server. */
  signal?: AbortSignal;
  onProgress?: (progress: CallProgress) => void;
}

/** Callbacks a channel fires toward its owner. */
export interface ChannelHandlers {
  /** Any server notification other than progress for a call in flight. */
  onNotification(method: string, params: unknown): void;
  /** The transport went away without `close()` being called. */
  onClose(): void;
}

export interface SessionChannel {
  /** @throws {AuthError | ConnectionError} */
  open(): Promise<void>;
  listTools(): Promise<RawToolInfo[]>;
  /** @throws {RemoteError | TimeoutError | ConnectionError | AuthError} */
  callTool(name: string, args: ToolArguments, options: ChannelCallOptions): Promise<ToolPayload>;
  close(): Promise<void>;
}

export type ChannelFactory = (endpoint: EndpointConfig, handlers: ChannelHandlers) => SessionChannel;

/** Builds the SDK transport for an endpoint. */
export type TransportFactory = (endpoint: EndpointConfig) => Transport;

/* ────────────────────────────────────────────────────────────────────────────
 * Error Classification
 * ──────────────────────────────────────────────────────────────────────────── */

const AUTH_STATUS = /\bHTTP (401|403)\b/;

function isAuthFailure(error: unknown): boolean {
  if (error instanceof SseError && (error.code === 401 || error.code === 403)) return true;
  return error instanceof Error && AUTH_STATUS.test(error.message);
}

/** Map a failure of `open()` or a send to the orchestrator hierarchy. */
export function classifyTransportError(endpoint: string, error: unknown): OrchestratorError {
  if (error instanceof OrchestratorError) return error;
  if (isAuthFailure(error)) {
    return new AuthError(endpoint, `Endpoint '${endpoint}' rejected the API key: ${errorMessage(error)}`);
  }
  return new ConnectionError(endpoint, `Endpoint '${endpoint}': ${errorMessage(error)}`);
}

function classifyCallError(endpoint: string, error: unknown): OrchestratorError {
  if (error instanceof McpError) {
    if (error.code === ErrorCode.RequestTimeout) return new TimeoutError(error.message);
    if (error.code === ErrorCode.ConnectionClosed) return new ConnectionError(endpoint, error.message);
    return new RemoteError(endpoint, error.message);
  }
  return classifyTransportError(endpoint, error);
}

/* ────────────────────────────────────────────────────────────────────────────
 * SDK Implementation
 * ──────────────────────────────────────────────────────────────────────────── */

const CLIENT_INFO = { name: "mcp-tool-orchestrator", version: "1.0.0" };

/** SSE transport carrying the endpoint key in `X-API-Key`. */
export const sseTransportFactory: TransportFactory = (endpoint) =>
  new SSEClientTransport(new URL(endpoint.url), {
    requestInit: { headers: { "X-API-Key": endpoint.apiKey } },
  });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function textOf(content: ReadonlyArray<{ type: string; text?: unknown }>): string {
  return content
    .flatMap((block) => (block.type === "text" && typeof block.text === "string" ? [block.text] : []))
    .join("\n");
}

export class McpSessionChannel implements SessionChannel {
  private readonly client: Client;
  private closing = false;

  constructor(
    private readonly endpoint: EndpointConfig,
    private readonly handlers: ChannelHandlers,
    private readonly transportFactory: TransportFactory = sseTransportFactory,
  ) {
    this.client = new Client(CLIENT_INFO, { capabilities: {} });
    this.client.fallbackNotificationHandler = async (notification) => {
      this.handlers.onNotification(notification.method, notification.params);
    };
    this.client.onclose = () => {
      if (!this.closing) this.handlers.onClose();
    };
  }

  async open(): Promise<void> {
    try {
      await this.client.connect(this.transportFactory(this.endpoint));
    } catch (error) {
      this.closing = true;
      throw classifyTransportError(this.endpoint.name, error);
    }
  }

  async listTools(): Promise<RawToolInfo[]> {
    const tools: RawToolInfo[] = [];
    let cursor: string | undefined;
    try {
      do {
        const page = await this.client.listTools(cursor === undefined ? undefined : { cursor });
        for (const tool of page.tools) {
          tools.push({ name: tool.name, description: tool.description, inputSchema: tool.inputSchema });
        }
        cursor = page.nextCursor;
      } while (cursor !== undefined);
    } catch (error) {
      throw classifyCallError(this.endpoint.name, error);
    }
    return tools;
  }

  async callTool(name: string, args: ToolArguments, options: ChannelCallOptions): Promise<ToolPayload> {
    const { correlationId, deadline } = options;
    const meta =
      deadline === undefined
        ? { correlationId }
        : { correlationId, timeBudgetMs: Math.max(deadline - Date.now(), 0) };

    const result = await this.client
      .callTool(
        { name, arguments: { ...args }, _meta: meta },
        undefined,
        {
          timeout: options.timeoutMs,
          signal: options.signal,
          onprogress: options.onProgress
            ? (progress) =>
                options.onProgress?.({
                  progress: progress.progress,
                  total: progress.total,
                  message: typeof progress.message === "string" ? progress.message : undefined,
                })
            : undefined,
        },
      )
      .catch((error: unknown) => {
        throw classifyCallError(this.endpoint.name, error);
      });

    if (!("content" in result) || !Array.isArray(result.content)) {
      // Servers on protocol versions before 2024-11-05 answer with a bare `toolResult`.
      return { text: JSON.stringify("toolResult" in result ? result.toolResult : null) };
    }

    const text = textOf(result.content);
    if (result.isError === true) {
      throw new RemoteError(this.endpoint.name, text || `Tool '${name}' failed`);
    }

    const structured: unknown = result.structuredContent;
    return isRecord(structured) ? { text, structured } : { text };
  }

  async close(): Promise<void> {
    this.closing = true;
    await this.client.close();
  }
}

/** Channel factory over the given SDK transport factory. */
export function mcpChannelFactory(transportFactory: TransportFactory = sseTransportFactory): ChannelFactory {
  return (endpoint, handlers) => new McpSessionChannel(endpoint, handlers, transportFactory);
}
