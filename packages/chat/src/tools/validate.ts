import { z } from 'zod';
import type { ParameterSpec, ParameterType, ParameterValue, ToolArgs, ToolError, ToolSchema } from '../types/index.js';

export type ValidationResult =
  | { readonly ok: true; readonly args: ToolArgs }
  | { readonly ok: false; readonly error: ToolError };

const numericString = z.string().trim().min(1).transform(Number);

const parameterSchemas: { readonly [Type in ParameterType]: z.ZodType<ParameterValue, z.ZodTypeDef, unknown> } = {
  string: z.union([z.string(), z.number().transform(String), z.boolean().transform(String)]),
  number: z.union([z.number(), numericString]).pipe(z.number().finite()),
  integer: z.union([z.number(), numericString]).pipe(z.number().int().finite()),
  boolean: z.union([z.boolean(), z.enum(['true', 'false']).transform((value) => value === 'true')]),
};

const TYPE_NAMES: Readonly<Record<ParameterType, string>> = {
  string: 'a string',
  number: 'a number',
  integer: 'an integer',
  boolean: 'a boolean',
};

function isArgumentObject(args: unknown): args is Record<string, unknown> {
  return typeof args === 'object' && args !== null && !Array.isArray(args);
}

function invalid(schema: ToolSchema, message: string, parameter?: string): ValidationResult {
  return {
    ok: false,
    error: {
      kind: 'InvalidArguments',
      message: `Invalid arguments for ${schema.name}: ${message}`,
      ...(parameter !== undefined ? { parameter } : {}),
    },
  };
}

/**
 * Checks model-supplied arguments against a tool's parameters. Values are coerced
 * where the intent is unambiguous and parameters the tool does not declare are dropped.
 */
export function validateArguments(schema: ToolSchema, args: unknown): ValidationResult {
  if (!isArgumentObject(args)) {
    return invalid(schema, 'arguments must be a JSON object');
  }

  const validated: Record<string, ParameterValue> = {};

  for (const [name, spec] of Object.entries(schema.parameters)) {
    const value = args[name];

    if (value === undefined || value === null) {
      if (spec.required) {
        return invalid(schema, `missing required parameter '${name}'`, name);
      }
      continue;
    }

    const parsed = parseParameter(spec, value);
    if (parsed === null) {
      return invalid(schema, `parameter '${name}' must be ${TYPE_NAMES[spec.type]}`, name);
    }
    validated[name] = parsed;
  }

  return { ok: true, args: Object.freeze(validated) };
}

function parseParameter(spec: ParameterSpec, value: unknown): ParameterValue | null {
  const result = parameterSchemas[spec.type].safeParse(value);
  return result.success ? result.data : null;
}
