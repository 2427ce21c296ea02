/**
 * @module tools/result
 * @fileoverview MCP tool response builders shared by every backend tool.
 *
 * Handlers never throw: a failure becomes an `isError` response whose text
 * is {@link formatErrorForMcp} of the error, which the orchestrator reports
 * verbatim as a `RemoteError`.
 */

import { formatErrorForMcp } from "../utils/errors.js";

export type ToolResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export function textResult(text: string): ToolResponse {
  return { content: [{ type: "text" as const, text }] };
}

export function jsonResult(value: unknown): ToolResponse {
  return textResult(JSON.stringify(value, null, 2));
}

export function errorResult(error: unknown): ToolResponse {
  return {
    content: [{ type: "text" as const, text: formatErrorForMcp(error) }],
    isError: true,
  };
}

/** Run a handler body, turning a throw into {@link errorResult}. */
export async function runTool(body: () => Promise<ToolResponse>): Promise<ToolResponse> {
  try {
    return await body();
  } catch (error) {
    return errorResult(error);
  }
}
