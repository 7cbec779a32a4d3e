/**
 * Cell
 *
 * A self-describing unit of computation with one input schema, one output
 * schema and an optional environment-derived config. `execute` wraps the
 * author's logic in two validation boundaries:
 *
 *   raw → input.safeParse → invoke() → output.safeParse → Output
 *
 * Authors override `invoke` only. It may return a value or a promise;
 * callers always get a promise back.
 */

import { EventEmitter } from 'eventemitter3';
import { randomUUID } from 'crypto';
import type { z } from 'zod';
import { ConfigModel, type Environment } from '../config/configModel.js';
import { describeCell, describeSchema, type CellManifest, type JsonSchema } from '../schema/introspect.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { assertCellDefinition, type CellDefinition } from './definition.js';
import {
  CellError,
  CellExecutionError,
  CellValidationError,
  type ExecutionFailureKind,
} from './errors.js';
import type { CellResponse } from './response.js';

// ============================================================================
// TYPES
// ============================================================================

export interface CellOptions {
  /** Environment to resolve config against (defaults to process.env) */
  env?: Environment;
}

export interface ExecuteOptions {
  /** Caller cancellation; surfaces as CellExecutionError kind 'cancelled' */
  signal?: AbortSignal;
  /**
   * Surfaces as CellExecutionError kind 'timeout'. `Infinity` means no
   * timeout; negative or NaN values are rejected with a RangeError.
   */
  timeoutMs?: number;
}

export interface InvocationContext<K extends string = string> {
  callId: string;
  /** Aborted when the caller cancels or the timeout elapses */
  signal: AbortSignal;
  config: ConfigModel<K> | undefined;
}

export type CellResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: CellError };

export interface CellEvents {
  'execute:start': (callId: string) => void;
  'execute:success': (callId: string, output: unknown) => void;
  'execute:failure': (callId: string, error: CellError) => void;
}

/** The surface hosts and tool adapters depend on. */
export interface CellLike {
  getRole(): string;
  getDescription(): string;
  getInputSchema(): JsonSchema;
  getOutputSchema(): JsonSchema;
  run(inputJson: string): Promise<string>;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Longest delay a single Node timer accepts. */
const MAX_TIMER_MS = 2 ** 31 - 1;

function assertTimeout(timeoutMs: number | undefined): void {
  if (timeoutMs === undefined) return;
  if (Number.isNaN(timeoutMs) || timeoutMs < 0) {
    throw new RangeError(`timeoutMs must be a non-negative number, got ${timeoutMs}`);
  }
}

/**
 * Call `onElapsed` after `ms`, chaining timers past the 32-bit limit.
 * Returns the canceller.
 */
function startTimer(ms: number, onElapsed: () => void): () => void {
  let handle: ReturnType<typeof setTimeout> | undefined;
  const schedule = (remaining: number): void => {
    const step = Math.min(remaining, MAX_TIMER_MS);
    handle = setTimeout(() => {
      if (remaining > step) schedule(remaining - step);
      else onElapsed();
    }, step);
  };
  schedule(ms);
  return () => clearTimeout(handle);
}

// ============================================================================
// CELL
// ============================================================================

export abstract class Cell<
  I extends z.ZodTypeAny,
  O extends z.ZodTypeAny,
  K extends string = string,
> extends EventEmitter<CellEvents> implements CellLike {
  readonly role: string;
  readonly description: string;
  readonly input: I;
  readonly output: O;
  readonly config: ConfigModel<K> | undefined;

  private readonly definition: CellDefinition<I, O, K>;
  private readonly log: Logger;

  constructor(definition: CellDefinition<I, O, K>, options: CellOptions = {}) {
    super();
    assertCellDefinition(definition);

    this.definition = definition;
    this.role = definition.role;
    this.description = definition.description;
    this.input = definition.input;
    this.output = definition.output;
    this.log = createLogger(`cell:${definition.role}`);

    // Resolved once; a new environment needs a new Cell
    this.config = definition.config
      ? new ConfigModel(definition.config, options.env ?? process.env)
      : undefined;
  }

  /**
   * Business logic. Receives validated input; whatever it returns is
   * validated against the output schema before leaving `execute`.
   */
  protected abstract invoke(
    input: z.output<I>,
    context: InvocationContext<K>
  ): z.input<O> | Promise<z.input<O>>;

  // ==========================================================================
  // METADATA
  // ==========================================================================

  getRole(): string {
    return this.role;
  }

  getDescription(): string {
    return this.description;
  }

  getInputSchema(): JsonSchema {
    return describeSchema(this.input);
  }

  getOutputSchema(): JsonSchema {
    return describeSchema(this.output);
  }

  toManifest(): CellManifest {
    return describeCell(this.definition);
  }

  // ==========================================================================
  // EXECUTION
  // ==========================================================================

  /**
   * Validate, run and validate again.
   *
   * @throws CellValidationError when input or output does not match its schema
   * @throws CellExecutionError when `invoke` throws, is cancelled or times out
   * @throws RangeError when `timeoutMs` is negative or NaN
   */
  async execute(raw: unknown, options: ExecuteOptions = {}): Promise<z.output<O>> {
    assertTimeout(options.timeoutMs);

    const callId = this.begin();
    let output: z.output<O>;
    try {
      output = await this.validateAndInvoke(raw, callId, options);
    } catch (error) {
      const failure = error instanceof CellError
        ? error
        : new CellExecutionError('failed', messageOf(error), { cause: error });
      this.fail(callId, failure);
      throw failure;
    }

    this.emit('execute:success', callId, output);
    return output;
  }

  /** Like `execute`, but Cell failures come back as values. */
  async safeExecute(raw: unknown, options: ExecuteOptions = {}): Promise<CellResult<z.output<O>>> {
    try {
      return { ok: true, value: await this.execute(raw, options) };
    } catch (error) {
      if (error instanceof CellError) return { ok: false, error };
      throw error;
    }
  }

  /**
   * JSON in, JSON response envelope out. Never rejects for Cell failures.
   * Malformed JSON still emits `execute:start` and `execute:failure`.
   */
  async run(inputJson: string): Promise<string> {
    let raw: unknown;
    try {
      raw = JSON.parse(inputJson);
    } catch (error) {
      const invalid = new CellValidationError(
        'input',
        [{ path: '', rule: 'invalid_json', message: messageOf(error) }],
        { cause: error }
      );
      this.fail(this.begin(), invalid);
      return JSON.stringify(errorResponse(invalid));
    }

    const result = await this.safeExecute(raw);
    const response: CellResponse = result.ok
      ? { type: 'success', content: result.value }
      : errorResponse(result.error);
    return JSON.stringify(response);
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private begin(): string {
    const callId = randomUUID();
    this.emit('execute:start', callId);
    this.log.debug('execute:start', { callId });
    return callId;
  }

  private fail(callId: string, failure: CellError): void {
    this.log.warn('execute:failure', { callId, ...failure.toJSON() });
    this.emit('execute:failure', callId, failure);
  }

  private async validateAndInvoke(raw: unknown, callId: string, options: ExecuteOptions): Promise<z.output<O>> {
    const parsedInput = this.input.safeParse(raw);
    if (!parsedInput.success) {
      throw CellValidationError.fromZod('input', parsedInput.error, this.input);
    }

    const result = await this.invokeWithCancellation(parsedInput.data, callId, options);

    const parsedOutput = this.output.safeParse(result);
    if (!parsedOutput.success) {
      throw CellValidationError.fromZod('output', parsedOutput.error, this.output);
    }
    return parsedOutput.data;
  }

  private async invokeWithCancellation(
    input: z.output<I>,
    callId: string,
    options: ExecuteOptions
  ): Promise<unknown> {
    const { signal: external, timeoutMs } = options;
    if (external?.aborted) {
      throw new CellExecutionError('cancelled', 'Execution cancelled before start', { cause: external.reason });
    }

    const controller = new AbortController();
    const cleanup: Array<() => void> = [];
    let abortFailure: CellExecutionError | undefined;

    const abort = (kind: ExecutionFailureKind, message: string, reason: unknown): void => {
      if (controller.signal.aborted) return;
      abortFailure = new CellExecutionError(kind, message, { cause: reason });
      controller.abort(reason);
    };

    if (external) {
      const onAbort = () => abort('cancelled', 'Execution cancelled', external.reason);
      external.addEventListener('abort', onAbort, { once: true });
      cleanup.push(() => external.removeEventListener('abort', onAbort));
    }

    if (timeoutMs !== undefined && Number.isFinite(timeoutMs)) {
      cleanup.push(startTimer(timeoutMs, () =>
        abort('timeout', `Execution timed out after ${timeoutMs}ms`, new Error(`Timed out after ${timeoutMs}ms`))
      ));
    }

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(abortFailure), { once: true });
    });

    const work = Promise.resolve().then(() => {
      controller.signal.throwIfAborted();
      return this.invoke(input, { callId, signal: controller.signal, config: this.config });
    });

    try {
      return await Promise.race([work, aborted]);
    } catch (error) {
      if (abortFailure) throw abortFailure;
      throw new CellExecutionError('failed', `${this.role} failed: ${messageOf(error)}`, { cause: error });
    } finally {
      for (const fn of cleanup) fn();
    }
  }
}

function errorResponse(error: CellError): CellResponse {
  return { type: 'error', content: error.message, error: error.toJSON() };
}

// ============================================================================
// FACTORY
// ============================================================================

export type CellHandler<I extends z.ZodTypeAny, O extends z.ZodTypeAny, K extends string = string> = (
  input: z.output<I>,
  context: InvocationContext<K>
) => z.input<O> | Promise<z.input<O>>;

export interface CellClass<I extends z.ZodTypeAny, O extends z.ZodTypeAny, K extends string = string> {
  new (options?: CellOptions): Cell<I, O, K>;
  readonly definition: CellDefinition<I, O, K>;
}

/**
 * Build a Cell class from a definition and a handler, for Cells that need
 * no extra state of their own.
 */
export function defineCell<I extends z.ZodTypeAny, O extends z.ZodTypeAny, K extends string = string>(
  definition: CellDefinition<I, O, K>,
  handler: CellHandler<I, O, K>
): CellClass<I, O, K> {
  assertCellDefinition(definition);

  return class extends Cell<I, O, K> {
    static readonly definition = definition;

    constructor(options?: CellOptions) {
      super(definition, options);
    }

    protected invoke(input: z.output<I>, context: InvocationContext<K>): z.input<O> | Promise<z.input<O>> {
      return handler(input, context);
    }
  };
}
