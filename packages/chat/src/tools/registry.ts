import type { Tool } from '@toolchat/llm';
import type { RegisteredTool, ToolName, ToolRegistry, ToolSchema } from '../types/index.js';
import { TOOL_NAMES, isToolName } from '../types/index.js';

export type ToolTable = { readonly [Name in ToolName]: RegisteredTool };

/**
 * Builds the fixed registry from one entry per tool name. Schemas are listed in
 * TOOL_NAMES order.
 */
export function createToolRegistry(table: ToolTable): ToolRegistry {
  for (const name of TOOL_NAMES) {
    if (table[name].schema.name !== name) {
      throw new Error(`Tool registered as ${name} declares the name ${table[name].schema.name}`);
    }
  }

  const schemas = Object.freeze(TOOL_NAMES.map((name) => table[name].schema));

  return {
    listSchemas(): ReadonlyArray<ToolSchema> {
      return schemas;
    },
    resolve(name: string): RegisteredTool | null {
      return isToolName(name) ? table[name] : null;
    },
  };
}

/**
 * Converts the registry's schemas into the JSON-schema tool list the model API takes.
 */
export function toModelTools(registry: ToolRegistry): ReadonlyArray<Tool> {
  return registry.listSchemas().map((schema) => {
    const properties: Record<string, { type: string; description: string }> = {};
    const required: string[] = [];

    for (const [name, spec] of Object.entries(schema.parameters)) {
      properties[name] = { type: spec.type, description: spec.description };
      if (spec.required) {
        required.push(name);
      }
    }

    return {
      name: schema.name,
      description: schema.description,
      parameters: { type: 'object', properties, required },
    };
  });
}
