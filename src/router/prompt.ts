/**
 * @module router/prompt
 * @fileoverview Classifier prompt rendering and reply parsing.
 *
 * The classifier sees the tool catalog as plain text and answers with JSON.
 * Three reply shapes are accepted:
 * ```
 * {"calls": [{"tool": "save_memory", "arguments": {"content": "..."}}, ...]}
 * {"tool": "save_memory", "arguments": {"content": "..."}}
 * {"tool": "none"}
 * ```
 * Models often wrap the JSON in prose or a code fence, so only the first
 * balanced JSON object in the reply is read.
 */

import { z } from "zod";
import type { RegistrySnapshot } from "../registry/tool-registry.js";
import type { ToolArguments, ToolDescriptor } from "../types.js";
import { ParseError } from "../utils/errors.js";

/** Tool name meaning "no tool applies". */
export const NO_TOOL = "none";

/* ────────────────────────────────────────────────────────────────────────────
 * Rendering
 * ──────────────────────────────────────────────────────────────────────────── */

function renderTool(tool: ToolDescriptor): string {
  const lines = [`- ${tool.name}: ${tool.description || "(no description)"}`];
  for (const parameter of tool.parameters) {
    const flag = parameter.required ? "required" : "optional";
    const note = parameter.description ? ` -- ${parameter.description}` : "";
    lines.push(`    ${parameter.name} (${parameter.type}, ${flag})${note}`);
  }
  return lines.join("\n");
}

/** Catalog section of the system prompt, tools sorted by name. */
export function renderCatalog(snapshot: RegistrySnapshot): string {
  const tools = Object.values(snapshot.tools).sort((a, b) => a.name.localeCompare(b.name));
  return tools.length > 0 ? tools.map(renderTool).join("\n") : "(no tools available)";
}

export function buildSystemPrompt(snapshot: RegistrySnapshot): string {
  return [
    "You route user requests to tools. Available tools:",
    "",
    renderCatalog(snapshot),
    "",
    "Reply with one JSON object and nothing else:",
    '{"calls": [{"tool": "<tool name>", "arguments": {"<parameter>": <value>}}]}',
    "List several calls in the order they should run when the request needs more than one tool.",
    `When no tool fits, reply {"tool": "${NO_TOOL}"}.`,
    "Use only tool names from the list above.",
  ].join("\n");
}

/** Follow-up user message after a reply that named tools outside the catalog. */
export function unknownToolCorrection(invalid: readonly string[], valid: readonly string[]): string {
  const names = invalid.map((name) => `'${name}'`).join(", ");
  return (
    `${names} ${invalid.length === 1 ? "is not an available tool" : "are not available tools"}. ` +
    `Valid tools: ${valid.join(", ") || "(none)"}. ` +
    `Answer again with JSON, or {"tool": "${NO_TOOL}"}.`
  );
}

/** Follow-up user message after a reply that was not usable JSON. */
export function formatCorrection(problem: string): string {
  return (
    `Your reply could not be used: ${problem}. ` +
    'Answer with exactly one JSON object of the form {"calls": [{"tool": "<name>", "arguments": {}}]}.'
  );
}

/* ────────────────────────────────────────────────────────────────────────────
 * Parsing
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Text of the first balanced `{...}` in `text`, honoring JSON string
 * escapes. `undefined` when there is none.
 */
export function extractFirstJsonObject(text: string): string | undefined {
  for (let start = text.indexOf("{"); start !== -1; start = text.indexOf("{", start + 1)) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (escaped) escaped = false;
        else if (ch === "\\") escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }
      if (ch === '"') inString = true;
      else if (ch === "{") depth += 1;
      else if (ch === "}") {
        depth -= 1;
        if (depth === 0) {
          const candidate = text.slice(start, i + 1);
          try {
            JSON.parse(candidate);
            return candidate;
          } catch {
            break; // balanced but not JSON: try the next opening brace
          }
        }
      }
    }
  }
  return undefined;
}

const callSchema = z.object({
  tool: z.string().min(1),
  arguments: z.record(z.unknown()).nullish(),
});

const replySchema = z.union([z.object({ calls: z.array(callSchema) }), callSchema]);

/** A call as the classifier wrote it, before the catalog check. */
export interface ClassifiedCall {
  tool: string;
  arguments: ToolArguments;
}

/**
 * Parse a classifier reply into calls. `{"tool": "none"}` entries are
 * removed, so "no tool applies" is an empty list.
 *
 * @throws {ParseError} No JSON object, or one of the wrong shape.
 */
export function parseClassifierReply(reply: string): ClassifiedCall[] {
  const json = extractFirstJsonObject(reply);
  if (json === undefined) {
    throw new ParseError("no JSON object found in the reply");
  }

  const parsed = replySchema.safeParse(JSON.parse(json));
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ParseError(`unexpected JSON shape (${problems})`);
  }

  const calls = "calls" in parsed.data ? parsed.data.calls : [parsed.data];
  return calls
    .filter((call) => call.tool !== NO_TOOL)
    .map((call) => ({ tool: call.tool, arguments: Object.freeze({ ...(call.arguments ?? {}) }) }));
}
