/**
 * Environment-derived configuration for a Cell.
 *
 * A ConfigModel is declared as an ordered list of EnvVar entries and resolved
 * exactly once, when it is constructed. Lookup order per entry:
 *   environment value → declared default → missing
 * Missing required keys are collected across the whole list and reported
 * together in a single ConfigResolutionError.
 */

import { z } from 'zod';
import { CellDefinitionError, ConfigResolutionError, formatPath } from '../cells/errors.js';

// ============================================================================
// SCHEMAS
// ============================================================================

export const EnvVar = z.object({
  /** Variable name looked up in the environment */
  key: z.string().min(1),
  /** Default used when the environment does not set the key */
  value: z.string().optional(),
  /** Defaults to true when no default value is declared */
  required: z.boolean().optional(),
});
export type EnvVar = z.infer<typeof EnvVar>;

const EnvVarList = z.array(EnvVar);

/** Declaration form with the key kept as a literal type. */
export interface EnvVarDeclaration<K extends string = string> {
  key: K;
  value?: string;
  required?: boolean;
}

export type Environment = Readonly<Record<string, string | undefined>>;

export function isRequired(envVar: EnvVar): boolean {
  return envVar.required ?? envVar.value === undefined;
}

// ============================================================================
// CONFIG MODEL
// ============================================================================

export class ConfigModel<K extends string = string> {
  readonly envVars: ReadonlyArray<Readonly<EnvVar>>;
  private readonly declaredKeys: ReadonlyArray<K>;
  private readonly values: Readonly<Record<string, string>>;

  constructor(envVars: ReadonlyArray<EnvVarDeclaration<K>>, env: Environment = process.env) {
    const parsed = EnvVarList.safeParse(envVars);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map(issue => `${formatPath(issue.path)}: ${issue.message}`)
        .join('; ');
      throw new CellDefinitionError(`Invalid EnvVar declarations: ${detail}`, { cause: parsed.error });
    }

    const seen = new Set<string>();
    for (const { key } of parsed.data) {
      if (seen.has(key)) {
        throw new CellDefinitionError(`Duplicate EnvVar key: ${key}`);
      }
      seen.add(key);
    }

    const resolved: Record<string, string> = {};
    const missing: string[] = [];

    for (const envVar of parsed.data) {
      const fromEnv = Object.prototype.hasOwnProperty.call(env, envVar.key) ? env[envVar.key] : undefined;
      if (typeof fromEnv === 'string') {
        resolved[envVar.key] = fromEnv;
      } else if (envVar.value !== undefined) {
        resolved[envVar.key] = envVar.value;
      } else if (isRequired(envVar)) {
        missing.push(envVar.key);
      }
    }

    if (missing.length > 0) {
      throw new ConfigResolutionError(missing);
    }

    this.envVars = Object.freeze(parsed.data.map(envVar => Object.freeze({ ...envVar })));
    this.declaredKeys = Object.freeze(envVars.map(envVar => envVar.key));
    this.values = Object.freeze(resolved);
  }

  /**
   * Resolved value for a declared key. Undefined only for optional keys
   * that neither the environment nor a default supplied.
   */
  get(key: K): string | undefined {
    return this.values[key];
  }

  has(key: K): boolean {
    return Object.prototype.hasOwnProperty.call(this.values, key);
  }

  /** Declared keys, in declaration order */
  keys(): K[] {
    return [...this.declaredKeys];
  }

  toJSON(): Record<string, string> {
    return { ...this.values };
  }
}
