/**
 * @module tools/tasks
 * @fileoverview MCP tools of the tasks server: `get_tasks`, `add_new_task`,
 * `complete_task`.
 */

import { z } from "zod";
import type { TaskStore } from "../servers/stores/task-store.js";
import { jsonResult, runTool, textResult, type ToolResponse } from "./result.js";

export const TaskTitleSchema = {
  task: z.string().min(1).describe("Title of the task"),
};

export interface TaskHandlers {
  getTasks(): Promise<ToolResponse>;
  addNewTask(params: { task: string }): Promise<ToolResponse>;
  completeTask(params: { task: string }): Promise<ToolResponse>;
}

export function createTaskHandlers(store: TaskStore): TaskHandlers {
  return {
    getTasks: () =>
      runTool(async () => {
        const tasks = await store.list();
        return tasks.length > 0 ? jsonResult(tasks) : textResult("No tasks found");
      }),

    addNewTask: ({ task }) =>
      runTool(async () => {
        await store.add(task);
        return textResult(`Successfully added task '${task}'`);
      }),

    completeTask: ({ task }) =>
      runTool(async () => {
        await store.complete(task);
        return textResult(`Successfully completed task '${task}'`);
      }),
  };
}
