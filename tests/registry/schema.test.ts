import { describe, it, expect } from "vitest";
import { toParameterSpecs } from "../../src/registry/schema.js";

describe("toParameterSpecs", () => {
  it("keeps property order and marks required parameters", () => {
    expect(
      toParameterSpecs({
        type: "object",
        properties: {
          query: { type: "string", description: "What to look for" },
          limit: { type: "integer" },
        },
        required: ["query"],
      }),
    ).toEqual([
      { name: "query", type: "string", required: true, description: "What to look for" },
      { name: "limit", type: "integer", required: false },
    ]);
  });

  it.each([
    ["nullable union", { type: ["null", "number"] }, "number"],
    ["anyOf", { anyOf: [{ type: "boolean" }, { type: "string" }] }, "boolean"],
    ["no type", { description: "anything" }, "any"],
    ["unknown type", { type: "date" }, "any"],
    ["not an object", "string", "any"],
  ])("%s -- %s", (_label, property, expected) => {
    const [spec] = toParameterSpecs({ type: "object", properties: { value: property } });
    expect(spec?.type).toBe(expected);
  });

  it("yields nothing for schemas without properties", () => {
    expect(toParameterSpecs({ type: "object" })).toEqual([]);
    expect(toParameterSpecs(null)).toEqual([]);
    expect(toParameterSpecs({ properties: [1, 2] })).toEqual([]);
  });
});
