import type { RegistrySnapshot } from "../../src/registry/tool-registry.js";
import type { ParameterSpec, ToolDescriptor } from "../../src/types.js";

interface ToolSketch {
  name: string;
  description?: string;
  parameters?: ParameterSpec[];
  endpoint?: string;
}

/** Registry snapshot holding exactly the given tools. */
export function snapshotOf(...tools: ToolSketch[]): RegistrySnapshot {
  const entries = tools.map((tool): [string, ToolDescriptor] => [
    tool.name,
    {
      name: tool.name,
      description: tool.description ?? `${tool.name} tool`,
      parameters: tool.parameters ?? [],
      endpoint: tool.endpoint ?? "test",
    },
  ]);
  return Object.freeze({ version: 1, tools: Object.freeze(Object.fromEntries(entries)) });
}
