/**
 * @module servers/memory-server
 * @fileoverview Memory backend: save, search and list long-term memories.
 *
 * | Tool               | Parameters        | Returns                         |
 * | ------------------ | ----------------- | ------------------------------- |
 * | `save_memory`      | `content`         | confirmation text               |
 * | `search_memories`  | `query`, `limit?` | JSON array of texts, best first |
 * | `get_all_memories` | --                | JSON array of texts, oldest first |
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { createMemoryHandlers, SaveMemorySchema, SearchMemoriesSchema } from "../tools/memory.js";
import { InMemoryMemoryStore, type MemoryStore } from "./stores/memory-store.js";

export function createMemoryServer(store: MemoryStore = new InMemoryMemoryStore()): McpServer {
  const server = new McpServer({ name: "memory", version: "1.0.0" }, { capabilities: { tools: {} } });
  const handlers = createMemoryHandlers(store);

  server.tool("save_memory", "Save a new long-term memory about the user.", SaveMemorySchema, (params) =>
    handlers.saveMemory(params),
  );
  server.tool(
    "search_memories",
    "Search saved memories for the ones most similar to a query.",
    SearchMemoriesSchema,
    (params) => handlers.searchMemories(params),
  );
  server.tool("get_all_memories", "List every saved memory.", () => handlers.getAllMemories());

  return server;
}
