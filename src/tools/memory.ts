/**
 * @module tools/memory
 * @fileoverview MCP tools of the memory server: `save_memory`,
 * `search_memories`, `get_all_memories`.
 *
 * Search and list responses are JSON arrays of memory texts, best match
 * first for search.
 */

import { z } from "zod";
import type { MemoryStore } from "../servers/stores/memory-store.js";
import { jsonResult, runTool, textResult, type ToolResponse } from "./result.js";

export const SaveMemorySchema = {
  content: z.string().min(1).describe("Text of the memory to save"),
};

export const SearchMemoriesSchema = {
  query: z.string().min(1).describe("What to look for"),
  limit: z
    .number()
    .int()
    .min(1)
    .max(100)
    .optional()
    .default(10)
    .describe("Maximum number of memories to return (default: 10)"),
};

export interface MemoryHandlers {
  saveMemory(params: { content: string }): Promise<ToolResponse>;
  searchMemories(params: { query: string; limit: number }): Promise<ToolResponse>;
  getAllMemories(): Promise<ToolResponse>;
}

export function createMemoryHandlers(store: MemoryStore): MemoryHandlers {
  return {
    saveMemory: ({ content }) =>
      runTool(async () => {
        await store.add(content);
        return textResult(`Successfully saved memory: ${content}`);
      }),

    searchMemories: ({ query, limit }) =>
      runTool(async () => {
        const matches = await store.search(query, limit);
        return jsonResult(matches.map((match) => match.content));
      }),

    getAllMemories: () =>
      runTool(async () => {
        const entries = await store.all();
        return jsonResult(entries.map((entry) => entry.content));
      }),
  };
}
