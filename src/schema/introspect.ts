/**
 * Schema Introspection
 *
 * Structural (JSON Schema) descriptions of a Cell's contract, for documentation
 * generators and compatibility checks. Works from the definition alone, so no
 * Cell needs to be constructed and no environment needs to be resolved.
 */

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { CellDefinition } from '../cells/definition.js';
import { isRequired } from '../config/configModel.js';

// ============================================================================
// TYPES
// ============================================================================

const JsonSchemaRecord = z.record(z.string(), z.unknown());
export type JsonSchema = z.infer<typeof JsonSchemaRecord>;

export interface ConfigDescription {
  key: string;
  required: boolean;
  hasDefault: boolean;
}

export interface CellManifest {
  role: string;
  description: string;
  inputSchema: JsonSchema;
  outputSchema: JsonSchema;
  config: ConfigDescription[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// DESCRIPTION
// ============================================================================

/**
 * JSON Schema (draft-07 shape) for a zod schema, without the `$schema` marker.
 * Every call returns a fresh copy.
 */
export function describeSchema(schema: z.ZodTypeAny, title?: string): JsonSchema {
  const raw: unknown = zodToJsonSchema(schema, { $refStrategy: 'none', target: 'jsonSchema7' });
  const described = JsonSchemaRecord.parse(structuredClone(raw));
  delete described['$schema'];
  return title === undefined ? described : { title, ...described };
}

export function describeCell<I extends z.ZodTypeAny, O extends z.ZodTypeAny, K extends string>(
  definition: CellDefinition<I, O, K>
): CellManifest {
  return {
    role: definition.role,
    description: definition.description,
    inputSchema: describeSchema(definition.input),
    outputSchema: describeSchema(definition.output),
    config: (definition.config ?? []).map(envVar => ({
      key: envVar.key,
      required: isRequired(envVar),
      hasDefault: envVar.value !== undefined,
    })),
  };
}
