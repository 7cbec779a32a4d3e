/**
 * JSON Schema → function-calling definition.
 *
 * Tool-calling APIs take a flat `{ name, description, parameters }` object and
 * do not follow `$ref` pointers, so every `#/$defs/...` reference is inlined
 * before the object schema is reshaped.
 */

import { z } from 'zod';
import { isRecord, type JsonSchema } from './introspect.js';

export interface FunctionDefinition {
  name: string;
  description?: string;
  parameters: {
    type: string;
    properties: Record<string, unknown>;
    required: string[];
  };
}

const DEFS_PREFIX = '#/$defs/';

const ObjectSchema = z.object({
  title: z.string({ required_error: 'Schema has no title to use as the function name' }),
  description: z.string().optional(),
  type: z.string().default('object'),
  properties: z.record(z.string(), z.unknown()).default({}),
  required: z.array(z.string()).default([]),
});

// ============================================================================
// REF RESOLUTION
// ============================================================================

function containsRef(value: unknown): boolean {
  if (Array.isArray(value)) return value.some(containsRef);
  if (!isRecord(value)) return false;
  return '$ref' in value || Object.values(value).some(containsRef);
}

function resolveRef(ref: string, defs: Record<string, unknown>): unknown {
  if (!ref.startsWith(DEFS_PREFIX)) {
    throw new Error(`Unsupported $ref: ${ref}`);
  }
  // JSON pointer segments: ~1 is '/', ~0 is '~'
  const segments = ref
    .slice(DEFS_PREFIX.length)
    .split('/')
    .map(segment => segment.replace(/~1/g, '/').replace(/~0/g, '~'));

  let node: unknown = defs;
  for (const segment of segments) {
    if (!isRecord(node) || !(segment in node)) {
      throw new Error(`Unresolvable $ref: ${ref}`);
    }
    node = node[segment];
  }
  return node;
}

function inlineRefs(value: unknown, defs: Record<string, unknown>, resolving: ReadonlySet<string>): unknown {
  if (Array.isArray(value)) {
    return value.map(item => inlineRefs(item, defs, resolving));
  }
  if (!isRecord(value)) return value;

  const inlined: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    if (key !== '$ref') inlined[key] = inlineRefs(item, defs, resolving);
  }

  const ref = value['$ref'];
  if (typeof ref !== 'string') return inlined;

  if (resolving.has(ref)) {
    throw new Error(`Circular $ref cannot be inlined: ${ref}`);
  }
  const target = inlineRefs(resolveRef(ref, defs), defs, new Set([...resolving, ref]));
  // Definition keys win over siblings of the $ref
  return isRecord(target) ? { ...inlined, ...target } : target;
}

// ============================================================================
// PUBLIC
// ============================================================================

/**
 * Inline all `$defs` references and reshape an object schema into a
 * function definition. The input schema is left untouched.
 */
export function replaceRefsWithDefs(schema: JsonSchema): FunctionDefinition {
  const { $defs, ...rest } = schema;

  let resolved: unknown;
  if ($defs === undefined) {
    if (containsRef(rest)) {
      throw new Error('Schema contains $ref but has no $defs');
    }
    resolved = structuredClone(rest);
  } else {
    if (!isRecord($defs)) {
      throw new Error('Schema $defs must be an object');
    }
    resolved = inlineRefs(rest, $defs, new Set());
  }

  const { title, description, type, properties, required } = ObjectSchema.parse(resolved);
  return {
    name: title,
    ...(description !== undefined ? { description } : {}),
    parameters: { type, properties, required },
  };
}
