/**
 * @module servers/backends
 * @fileoverview The bundled backends by name.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { config } from "../config.js";
import { PageCache } from "../services/cache.js";
import { ConfigError } from "../utils/errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { createCalendarServer } from "./calendar-server.js";
import { createCrawlerServer } from "./crawler-server.js";
import { createMemoryServer } from "./memory-server.js";
import { InMemoryCalendarStore } from "./stores/calendar-store.js";
import { InMemoryMemoryStore } from "./stores/memory-store.js";
import { JsonFileTaskStore } from "./stores/task-store.js";
import { createTasksServer } from "./tasks-server.js";

export const BACKEND_NAMES = ["memory", "tasks", "calendar", "crawler"] as const;

export type BackendName = (typeof BACKEND_NAMES)[number];

/**
 * Server factory of the backend called `name`. Every server it builds
 * shares one store, so all clients see the same data.
 *
 * @throws {ConfigError} For a name outside {@link BACKEND_NAMES}.
 */
export function backendFactory(name: string, logger: Logger = createLogger("backend")): () => McpServer {
  switch (name) {
    case "memory": {
      const store = new InMemoryMemoryStore();
      return () => createMemoryServer(store);
    }
    case "tasks": {
      const store = new JsonFileTaskStore(config.tasksDataDir);
      return () => createTasksServer(store);
    }
    case "calendar": {
      const store = new InMemoryCalendarStore();
      return () => createCalendarServer(store);
    }
    case "crawler": {
      const cache = new PageCache();
      return () => createCrawlerServer({ cache, logger: logger.child("crawler") });
    }
    default:
      throw new ConfigError(`Unknown backend '${name}'; expected one of ${BACKEND_NAMES.join(", ")}`);
  }
}
