/**
 * @module registry/schema
 * @fileoverview Flatten a tool's JSON Schema `inputSchema` into the ordered
 * parameter list the dispatcher validates against and the router renders.
 *
 * Only the top level is read: nested object and array schemas become a
 * single `object` / `array` parameter.
 */

import { z } from "zod";
import type { ParameterSpec, ParameterType } from "../types.js";

const KNOWN_TYPES: ReadonlySet<string> = new Set([
  "string",
  "number",
  "integer",
  "boolean",
  "array",
  "object",
]);

const propertySchema = z
  .object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    description: z.string().optional(),
    anyOf: z.array(z.object({ type: z.string().optional() }).passthrough()).optional(),
    oneOf: z.array(z.object({ type: z.string().optional() }).passthrough()).optional(),
  })
  .passthrough();

const inputSchemaSchema = z
  .object({
    properties: z.record(z.unknown()).optional(),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

type PropertySchema = z.infer<typeof propertySchema>;

function isParameterType(value: string): value is ParameterType {
  return KNOWN_TYPES.has(value);
}

/**
 * `{"type": ["string", "null"]}` -> `"string"`; `anyOf` / `oneOf` use their
 * first typed branch; anything else is `"any"`.
 */
function parameterTypeOf(property: PropertySchema): ParameterType {
  const declared = property.type;
  const candidates: string[] =
    typeof declared === "string"
      ? [declared]
      : Array.isArray(declared)
        ? declared
        : [...(property.anyOf ?? []), ...(property.oneOf ?? [])].flatMap((branch) =>
            branch.type === undefined ? [] : [branch.type],
          );

  const first = candidates.find((candidate) => candidate !== "null");
  return first !== undefined && isParameterType(first) ? first : "any";
}

/**
 * Convert an MCP `inputSchema` into parameters, in property order.
 * A schema that is not an object with `properties` yields no parameters.
 *
 * @example
 * ```ts
 * toParameterSpecs({
 *   type: "object",
 *   properties: { query: { type: "string" }, limit: { type: "integer" } },
 *   required: ["query"],
 * });
 * // [{ name: "query", type: "string", required: true },
 * //  { name: "limit", type: "integer", required: false }]
 * ```
 */
export function toParameterSpecs(inputSchema: unknown): ParameterSpec[] {
  const parsed = inputSchemaSchema.safeParse(inputSchema);
  if (!parsed.success || !parsed.data.properties) return [];

  const required = new Set(parsed.data.required ?? []);

  return Object.entries(parsed.data.properties).map(([name, raw]) => {
    const property = propertySchema.safeParse(raw);
    const type = property.success ? parameterTypeOf(property.data) : "any";
    const description = property.success ? property.data.description : undefined;

    const spec: ParameterSpec =
      description === undefined
        ? { name, type, required: required.has(name) }
        : { name, type, required: required.has(name), description };
    return Object.freeze(spec);
  });
}
