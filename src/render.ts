/**
 * @module render
 * @fileoverview Plain-text rendering of orchestrator output for the chat CLI.
 */

import type { HandleOutcome } from "./orchestrator.js";
import type { RegistrySnapshot } from "./registry/tool-registry.js";
import type { CallProgress, DispatchResult, ServerEndpoint } from "./types.js";

export function renderResult(result: DispatchResult): string {
  return result.ok
    ? `[${result.toolName}] ${result.payload.text}`
    : `[${result.toolName}] ${result.failure.kind}: ${result.failure.message}`;
}

export function renderOutcome(outcome: HandleOutcome): string {
  switch (outcome.kind) {
    case "conversation":
      return outcome.reply;
    case "routing-failure":
      return `Could not route the request: ${outcome.message}`;
    case "tools":
      return outcome.results.map(renderResult).join("\n");
  }
}

/** `[tool] 3/10 message`; total and message only when the server sent them. */
export function renderProgress(toolName: string, progress: CallProgress): string {
  const count = progress.total === undefined ? `${progress.progress}` : `${progress.progress}/${progress.total}`;
  return progress.message ? `[${toolName}] ${count} ${progress.message}` : `[${toolName}] ${count}`;
}

export function renderTools(snapshot: RegistrySnapshot): string {
  const tools = Object.values(snapshot.tools).sort((a, b) => a.name.localeCompare(b.name));
  if (tools.length === 0) return "(no tools available)";
  return tools.map((tool) => `${tool.name} (${tool.endpoint}) -- ${tool.description || "no description"}`).join("\n");
}

export function renderEndpoints(endpoints: readonly ServerEndpoint[]): string {
  if (endpoints.length === 0) return "(no servers configured)";
  return endpoints.map((endpoint) => `${endpoint.name}: ${endpoint.state} (${endpoint.url})`).join("\n");
}
