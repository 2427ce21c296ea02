/**
 * @module dispatch/arguments
 * @fileoverview Check call arguments against a tool's parameter list before
 * anything goes on the wire.
 *
 * | Declared type | Accepted                 | Coerced from              |
 * | ------------- | ------------------------ | ------------------------- |
 * | `string`      | string                   | --                        |
 * | `number`      | finite number            | numeric string            |
 * | `integer`     | integral number          | integral numeric string   |
 * | `boolean`     | boolean                  | `"true"` / `"false"`      |
 * | `array`       | array                    | --                        |
 * | `object`      | non-array object         | --                        |
 * | `any`         | anything but `undefined` | --                        |
 *
 * Arguments the tool does not declare are dropped.
 */

import type { ParameterSpec, ParameterType, ToolArguments } from "../types.js";

export type ArgumentCheck =
  | { ok: true; arguments: ToolArguments }
  | { ok: false; problems: string[] };

type Coerced = { ok: true; value: unknown } | { ok: false };

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "string") return `string ${JSON.stringify(value)}`;
  return typeof value;
}

function coerce(type: ParameterType, value: unknown): Coerced {
  switch (type) {
    case "string":
      return typeof value === "string" ? { ok: true, value } : { ok: false };

    case "number":
    case "integer": {
      let numeric: number | undefined;
      if (typeof value === "number") numeric = value;
      else if (typeof value === "string" && NUMERIC.test(value.trim())) numeric = Number(value.trim());

      if (numeric === undefined || !Number.isFinite(numeric)) return { ok: false };
      if (type === "integer" && !Number.isInteger(numeric)) return { ok: false };
      return { ok: true, value: numeric };
    }

    case "boolean":
      if (typeof value === "boolean") return { ok: true, value };
      if (value === "true") return { ok: true, value: true };
      if (value === "false") return { ok: true, value: false };
      return { ok: false };

    case "array":
      return Array.isArray(value) ? { ok: true, value } : { ok: false };

    case "object":
      return typeof value === "object" && value !== null && !Array.isArray(value)
        ? { ok: true, value }
        : { ok: false };

    case "any":
      return { ok: true, value };
  }
}

/**
 * Validate `args` against `parameters`. On success the returned arguments
 * hold only declared parameters, in declaration order, with coerced values.
 * On failure every offending parameter is listed.
 */
export function checkArguments(parameters: readonly ParameterSpec[], args: ToolArguments): ArgumentCheck {
  const problems: string[] = [];
  const accepted: Record<string, unknown> = {};

  for (const parameter of parameters) {
    const value = Object.hasOwn(args, parameter.name) ? args[parameter.name] : undefined;

    if (value === undefined || value === null) {
      if (parameter.required) problems.push(`missing required parameter '${parameter.name}'`);
      continue;
    }

    const coerced = coerce(parameter.type, value);
    if (!coerced.ok) {
      problems.push(`parameter '${parameter.name}' must be ${parameter.type}, got ${describe(value)}`);
      continue;
    }
    accepted[parameter.name] = coerced.value;
  }

  return problems.length > 0 ? { ok: false, problems } : { ok: true, arguments: Object.freeze(accepted) };
}
