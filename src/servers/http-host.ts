/**
 * @module servers/http-host
 * @fileoverview Serve an MCP server over SSE on `node:http`, guarded by a
 * static API key.
 *
 * ## Routes
 * ```
 *  GET  /sse                     open an event stream; one McpServer per stream
 *  POST /messages?sessionId=...  client -> server JSON-RPC message
 * ```
 * Both routes require `X-API-Key: <key>`; anything else is 401.
 */

import { timingSafeEqual } from "node:crypto";
import { createServer, type IncomingHttpHeaders, type ServerResponse } from "node:http";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import type { ListenConfig } from "../config.js";
import { createLogger, type Logger } from "../utils/logger.js";

export interface ServeOptions extends ListenConfig {
  logger?: Logger;
}

export interface RunningServer {
  /** Event stream URL clients connect to. */
  readonly url: string;
  close(): Promise<void>;
}

const SSE_PATH = "/sse";
const MESSAGES_PATH = "/messages";

/** `true` when the `X-API-Key` header equals `apiKey`. */
export function isAuthorized(headers: IncomingHttpHeaders, apiKey: string): boolean {
  const supplied = headers["x-api-key"];
  if (typeof supplied !== "string") return false;

  const expected = Buffer.from(apiKey);
  const actual = Buffer.from(supplied);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

function reply(res: ServerResponse, status: number, text: string): void {
  res.writeHead(status, { "Content-Type": "text/plain" }).end(text);
}

/**
 * Listen on `host:port` and hand every new event stream a fresh server from
 * `factory`. Resolves once the socket is bound.
 */
export async function serveMcp(factory: () => McpServer, options: ServeOptions): Promise<RunningServer> {
  const log = options.logger ?? createLogger("http");
  const transports = new Map<string, SSEServerTransport>();

  const httpServer = createServer((req, res) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (!isAuthorized(req.headers, options.apiKey)) {
      log.warn(`Rejected ${req.method ?? "?"} ${url.pathname}: missing or wrong API key`);
      reply(res, 401, "Unauthorized");
      return;
    }

    if (req.method === "GET" && url.pathname === SSE_PATH) {
      const transport = new SSEServerTransport(MESSAGES_PATH, res);
      const server = factory();
      transports.set(transport.sessionId, transport);
      res.on("close", () => {
        transports.delete(transport.sessionId);
        server.close().catch((error: unknown) => log.warn("Error closing session", error));
      });
      server.connect(transport).then(
        () => log.debug(`Session ${transport.sessionId} opened`),
        (error: unknown) => log.error("Failed to open session", error),
      );
      return;
    }

    if (req.method === "POST" && url.pathname === MESSAGES_PATH) {
      const transport = transports.get(url.searchParams.get("sessionId") ?? "");
      if (!transport) {
        reply(res, 404, "Unknown session");
        return;
      }
      transport.handlePostMessage(req, res).catch((error: unknown) => {
        log.error("Failed to handle message", error);
        if (!res.headersSent) reply(res, 500, "Internal error");
      });
      return;
    }

    reply(res, 404, "Not found");
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  const url = `http://${options.host}:${options.port}${SSE_PATH}`;
  log.info(`Listening on ${url}`);

  return {
    url,
    close: async () => {
      for (const transport of transports.values()) {
        await transport.close();
      }
      transports.clear();
      await new Promise<void>((resolve, reject) =>
        httpServer.close((error) => (error ? reject(error) : resolve())),
      );
    },
  };
}
