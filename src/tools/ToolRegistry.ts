import type { ToolAdapter, ToolField, ToolName, ToolSpec, ToolTable } from "./ToolTypes";
import { TOOL_NAMES } from "./ToolTypes";

export interface ToolDescriptor {
  name: ToolName;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, { type: ToolField["type"]; description: string; default?: string | number | boolean }>;
    required: string[];
  };
}

export function toInputSchema(fields: readonly ToolField[]): ToolDescriptor["inputSchema"] {
  const properties: ToolDescriptor["inputSchema"]["properties"] = {};
  for (const f of fields) {
    properties[f.name] = f.default === undefined
      ? { type: f.type, description: f.description }
      : { type: f.type, description: f.description, default: f.default };
  }
  return { type: "object", properties, required: fields.filter(f => f.required).map(f => f.name) };
}

// Specs are module-level objects shared by every registry; freeze them once registered.
function freezeSpec(spec: ToolSpec): void {
  for (const field of spec.fields) Object.freeze(field);
  Object.freeze(spec.fields);
  Object.freeze(spec);
}

export class ToolRegistry {
  private tools: Map<string, ToolAdapter> = new Map();

  static fromTable(table: ToolTable): ToolRegistry {
    const registry = new ToolRegistry();
    for (const name of TOOL_NAMES) registry.register(table[name]);
    return registry;
  }

  register(adapter: ToolAdapter): void {
    if (this.tools.has(adapter.spec.name)) throw new Error(`duplicate tool: ${adapter.spec.name}`);
    freezeSpec(adapter.spec);
    this.tools.set(adapter.spec.name, adapter);
  }

  has(name: string): name is ToolName {
    return this.tools.has(name);
  }

  get(name: ToolName): ToolAdapter | undefined {
    return this.tools.get(name);
  }

  list(): ToolDescriptor[] {
    return Array.from(this.tools.values()).map(t => ({
      name: t.spec.name,
      description: t.spec.description,
      inputSchema: toInputSchema(t.spec.fields),
    }));
  }
}
