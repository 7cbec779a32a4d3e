/**
 * Cell definitions: the construction-time descriptor every Cell is built from.
 */

import { z, ZodType } from 'zod';
import type { EnvVarDeclaration } from '../config/configModel.js';
import { CellDefinitionError, formatPath } from './errors.js';

export interface CellDefinition<
  I extends z.ZodTypeAny,
  O extends z.ZodTypeAny,
  K extends string = string,
> {
  /** Short classification of what the Cell does, e.g. "Processor" */
  role: string;
  description: string;
  input: I;
  output: O;
  /** Environment variables resolved when the Cell is constructed */
  config?: ReadonlyArray<EnvVarDeclaration<K>>;
}

const isZodSchema = (value: unknown): boolean => value instanceof ZodType;

const CellDefinitionShape = z.object({
  role: z.string().trim().min(1, 'role must be a non-empty string'),
  description: z.string().trim().min(1, 'description must be a non-empty string'),
  input: z.custom<z.ZodTypeAny>(isZodSchema, 'input must be a zod schema'),
  output: z.custom<z.ZodTypeAny>(isZodSchema, 'output must be a zod schema'),
  config: z.array(z.unknown()).optional(),
});

export function assertCellDefinition(definition: unknown): void {
  const result = CellDefinitionShape.safeParse(definition);
  if (result.success) return;

  const detail = result.error.issues
    .map(issue => `${formatPath(issue.path) || '(root)'}: ${issue.message}`)
    .join('; ');
  throw new CellDefinitionError(`Invalid cell definition: ${detail}`, { cause: result.error });
}
