#!/usr/bin/env node
/**
 * @module serve
 * @fileoverview Run one backend server.
 *
 * ```
 * mcp-orchestrator-serve <memory|tasks|calendar|crawler> [--stdio]
 * ```
 *
 * By default the backend listens for SSE clients on the host, port and key
 * from `<NAME>_SERVER_HOST`, `<NAME>_SERVER_PORT` and `<NAME>_SERVER_API_KEY`.
 * With `--stdio` it serves a single client over stdin/stdout instead, for
 * MCP hosts that launch servers as subprocesses.
 *
 * | Backend    | Default port | State                                   |
 * | ---------- | ------------ | --------------------------------------- |
 * | `tasks`    | 8010         | JSON files under `TASKS_DATA_DIR`       |
 * | `calendar` | 8020         | in process                              |
 * | `memory`   | 8030         | in process                              |
 * | `crawler`  | 8040         | page cache, in process                  |
 */

import { parseArgs } from "node:util";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadListenConfig } from "./config.js";
import { backendFactory } from "./servers/backends.js";
import { serveMcp } from "./servers/http-host.js";
import { ConfigError } from "./utils/errors.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("serve");

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: { stdio: { type: "boolean", default: false } },
  });
  const [name] = positionals;
  if (name === undefined) {
    throw new ConfigError("Usage: mcp-orchestrator-serve <memory|tasks|calendar|crawler> [--stdio]");
  }
  const factory = backendFactory(name, log);

  if (values.stdio) {
    await factory().connect(new StdioServerTransport());
    log.info(`Backend '${name}' serving on stdio`);
    return;
  }

  const running = await serveMcp(factory, { ...loadListenConfig(name), logger: log.child(name) });
  const stop = (): void => {
    running.close().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error("Error during shutdown", error);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
}

main().catch((error: unknown) => {
  log.error("Server error", error);
  process.exit(1);
});
