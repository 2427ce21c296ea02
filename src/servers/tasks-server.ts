/**
 * @module servers/tasks-server
 * @fileoverview Task list backend. Titles are unique per list.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { createTaskHandlers, TaskTitleSchema } from "../tools/tasks.js";
import { InMemoryTaskStore, type TaskStore } from "./stores/task-store.js";

export function createTasksServer(store: TaskStore = new InMemoryTaskStore()): McpServer {
  const server = new McpServer({ name: "tasks", version: "1.0.0" }, { capabilities: { tools: {} } });
  const handlers = createTaskHandlers(store);

  server.tool("get_tasks", "List the user's tasks and whether each is done.", () => handlers.getTasks());
  server.tool("add_new_task", "Add a task to the user's list.", TaskTitleSchema, (params) =>
    handlers.addNewTask(params),
  );
  server.tool(
    "complete_task",
    "Mark a task as done. Use when the user finished or completed something on their list.",
    TaskTitleSchema,
    (params) => handlers.completeTask(params),
  );

  return server;
}
