import { describe, it, expect } from "vitest";
import {
  buildSystemPrompt,
  extractFirstJsonObject,
  parseClassifierReply,
  renderCatalog,
} from "../../src/router/prompt.js";
import { ParseError } from "../../src/utils/errors.js";
import { snapshotOf } from "../helpers/snapshot.js";

describe("extractFirstJsonObject", () => {
  it("skips prose and code fences", () => {
    expect(extractFirstJsonObject('Sure!\n```json\n{"tool": "none"}\n```')).toBe('{"tool": "none"}');
  });

  it("ignores braces inside strings", () => {
    expect(extractFirstJsonObject('x {"a": "}{\\"", "b": {"c": 1}} y')).toBe('{"a": "}{\\"", "b": {"c": 1}}');
  });

  it("moves past a balanced object that is not JSON", () => {
    expect(extractFirstJsonObject('{not json} then {"tool": "get_tasks"}')).toBe('{"tool": "get_tasks"}');
  });

  it("returns undefined without any object", () => {
    expect(extractFirstJsonObject("I would call get_tasks")).toBeUndefined();
    expect(extractFirstJsonObject('{"open": ')).toBeUndefined();
  });
});

describe("parseClassifierReply", () => {
  it("reads the calls form in order", () => {
    expect(
      parseClassifierReply(
        '{"calls": [{"tool": "add_new_task", "arguments": {"task": "buy milk"}}, {"tool": "get_tasks"}]}',
      ),
    ).toEqual([
      { tool: "add_new_task", arguments: { task: "buy milk" } },
      { tool: "get_tasks", arguments: {} },
    ]);
  });

  it("reads a single call", () => {
    expect(parseClassifierReply('{"tool": "get_tasks", "arguments": null}')).toEqual([
      { tool: "get_tasks", arguments: {} },
    ]);
  });

  it("turns none into an empty list", () => {
    expect(parseClassifierReply('{"tool": "none"}')).toEqual([]);
    expect(parseClassifierReply('{"calls": []}')).toEqual([]);
  });

  it("rejects replies without usable JSON", () => {
    expect(() => parseClassifierReply("no idea")).toThrow(new ParseError("no JSON object found in the reply"));
    expect(() => parseClassifierReply('{"action": "get_tasks"}')).toThrow(ParseError);
  });
});

describe("renderCatalog", () => {
  it("lists tools by name with their parameters", () => {
    const snapshot = snapshotOf({
      name: "search_memories",
      description: "Search stored memories",
      parameters: [
        { name: "query", type: "string", required: true, description: "Search text" },
        { name: "limit", type: "integer", required: false },
      ],
    }, { name: "get_tasks", description: "", parameters: [] });

    expect(renderCatalog(snapshot)).toBe(
      [
        "- get_tasks: (no description)",
        "- search_memories: Search stored memories",
        "    query (string, required) -- Search text",
        "    limit (integer, optional)",
      ].join("\n"),
    );
  });

  it("puts the catalog in the system prompt", () => {
    const prompt = buildSystemPrompt(snapshotOf());
    expect(prompt.split("\n").slice(0, 3)).toEqual([
      "You route user requests to tools. Available tools:",
      "",
      "(no tools available)",
    ]);
  });
});
