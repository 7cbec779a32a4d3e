/**
 * Cell Error Taxonomy
 *
 * Every failure that crosses the Cell boundary is one of:
 * - CellValidationError: input or output did not match its schema
 * - CellExecutionError: business logic threw, was cancelled or timed out
 * - ConfigResolutionError: required environment keys were missing at construction
 * - CellDefinitionError: the Cell or its config was declared incorrectly
 *
 * None of these are retried here. Retry policy belongs to the host.
 */

import {
  ZodArray,
  ZodDefault,
  ZodEffects,
  ZodNullable,
  ZodNumber,
  ZodObject,
  ZodOptional,
  type ZodError,
  type ZodIssue,
  type ZodTypeAny,
} from 'zod';

// ============================================================================
// TYPES
// ============================================================================

export type CellErrorCode = 'VALIDATION' | 'EXECUTION' | 'CONFIG_RESOLUTION' | 'DEFINITION';

export type ValidationBoundary = 'input' | 'output';

export type ExecutionFailureKind = 'failed' | 'cancelled' | 'timeout';

export interface ValidationIssue {
  /** Dot-joined field path, '' for the root value */
  path: string;
  /** Violated rule (zod issue code, or 'invalid_json') */
  rule: string;
  message: string;
  expected?: string;
  received?: string;
}

export interface SerializedCellError {
  name: string;
  code: CellErrorCode;
  message: string;
  boundary?: ValidationBoundary;
  issues?: ValidationIssue[];
  kind?: ExecutionFailureKind;
  missingKeys?: string[];
}

// ============================================================================
// BASE
// ============================================================================

export abstract class CellError extends Error {
  abstract readonly code: CellErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): SerializedCellError {
    return { name: this.name, code: this.code, message: this.message };
  }
}

export function isCellError(value: unknown): value is CellError {
  return value instanceof CellError;
}

// ============================================================================
// VALIDATION
// ============================================================================

export function formatPath(path: ReadonlyArray<string | number>): string {
  return path.map(String).join('.');
}

function unwrap(schema: ZodTypeAny): ZodTypeAny {
  let current = schema;
  for (;;) {
    if (current instanceof ZodOptional || current instanceof ZodNullable) current = current.unwrap();
    else if (current instanceof ZodDefault) current = current.removeDefault();
    else if (current instanceof ZodEffects) current = current.innerType();
    else return current;
  }
}

/** The schema a zod issue path points at, when it can be followed. */
export function schemaAt(schema: ZodTypeAny, path: ReadonlyArray<string | number>): ZodTypeAny | undefined {
  let current: ZodTypeAny | undefined = unwrap(schema);
  for (const segment of path) {
    if (current instanceof ZodObject && typeof segment === 'string') {
      const shape: Record<string, ZodTypeAny> = current.shape;
      current = Object.prototype.hasOwnProperty.call(shape, segment) ? unwrap(shape[segment]) : undefined;
    } else if (current instanceof ZodArray && typeof segment === 'number') {
      const element: ZodTypeAny = current.element;
      current = unwrap(element);
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Convert a zod issue. With the schema at hand, a type mismatch on an
 * `.int()` number is reported as expecting an integer.
 */
export function toValidationIssue(issue: ZodIssue, schema?: ZodTypeAny): ValidationIssue {
  const base: ValidationIssue = {
    path: formatPath(issue.path),
    rule: issue.code,
    message: issue.message,
  };
  if (issue.code !== 'invalid_type') return base;

  const target = schema ? schemaAt(schema, issue.path) : undefined;
  if (issue.expected === 'number' && target instanceof ZodNumber && target.isInt) {
    const defaultMessage = `Expected number, received ${issue.received}`;
    return {
      ...base,
      message: issue.message === defaultMessage ? `Expected integer, received ${issue.received}` : issue.message,
      expected: 'integer',
      received: issue.received,
    };
  }
  return { ...base, expected: issue.expected, received: issue.received };
}

function describeIssues(issues: ValidationIssue[]): string {
  return issues
    .map(i => `${i.path || '(root)'}: ${i.message}`)
    .join('; ');
}

export class CellValidationError extends CellError {
  readonly code = 'VALIDATION' as const;
  readonly boundary: ValidationBoundary;
  readonly issues: ValidationIssue[];

  constructor(boundary: ValidationBoundary, issues: ValidationIssue[], options?: { cause?: unknown }) {
    super(`Invalid ${boundary}: ${describeIssues(issues)}`, options);
    this.boundary = boundary;
    this.issues = issues;
  }

  /** Pass the schema that produced `error` to get integer-aware issues. */
  static fromZod(boundary: ValidationBoundary, error: ZodError, schema?: ZodTypeAny): CellValidationError {
    const issues = error.issues.map(issue => toValidationIssue(issue, schema));
    return new CellValidationError(boundary, issues, { cause: error });
  }

  override toJSON(): SerializedCellError {
    return { ...super.toJSON(), boundary: this.boundary, issues: this.issues };
  }
}

// ============================================================================
// EXECUTION
// ============================================================================

export class CellExecutionError extends CellError {
  readonly code = 'EXECUTION' as const;
  readonly kind: ExecutionFailureKind;

  constructor(kind: ExecutionFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
  }

  override toJSON(): SerializedCellError {
    return { ...super.toJSON(), kind: this.kind };
  }
}

// ============================================================================
// CONFIGURATION
// ============================================================================

export class ConfigResolutionError extends CellError {
  readonly code = 'CONFIG_RESOLUTION' as const;
  readonly missingKeys: string[];

  constructor(missingKeys: string[]) {
    super(`Missing required environment variables: ${missingKeys.join(', ')}`);
    this.missingKeys = missingKeys;
  }

  override toJSON(): SerializedCellError {
    return { ...super.toJSON(), missingKeys: this.missingKeys };
  }
}

export class CellDefinitionError extends CellError {
  readonly code = 'DEFINITION' as const;
}
