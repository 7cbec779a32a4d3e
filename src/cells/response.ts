/**
 * JSON response envelope returned by `Cell.run`.
 */

import { z } from 'zod';
import type { SerializedCellError } from './errors.js';

export type CellResponse =
  | { type: 'success'; content: unknown }
  | { type: 'error'; content: string; error: SerializedCellError };

/** Loose parser for envelopes read back from a Cell's JSON output. */
export const CellResponseEnvelope = z.discriminatedUnion('type', [
  z.object({ type: z.literal('success'), content: z.unknown() }),
  z.object({ type: z.literal('error'), content: z.string() }).passthrough(),
]);
export type CellResponseEnvelope = z.infer<typeof CellResponseEnvelope>;
