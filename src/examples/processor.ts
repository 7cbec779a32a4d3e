/**
 * Processor: a minimal Cell that doubles a number.
 *
 * The multiplier comes from PROCESSOR_MULTIPLIER (default 2).
 */

import { z } from 'zod';
import { Cell, type CellOptions, type InvocationContext } from '../cells/cell.js';
import type { CellDefinition } from '../cells/definition.js';

export const ProcessorInput = z.object({
  value1: z.number().int().describe('Value to process'),
  value2: z.string().describe('Free-form tag carried with the value'),
});
export type ProcessorInput = z.infer<typeof ProcessorInput>;

export const ProcessorOutput = z.object({
  processedValue: z.number().int(),
});
export type ProcessorOutput = z.infer<typeof ProcessorOutput>;

type ProcessorConfigKey = 'PROCESSOR_MULTIPLIER';

export const processorDefinition: CellDefinition<typeof ProcessorInput, typeof ProcessorOutput, ProcessorConfigKey> = {
  role: 'Processor',
  description: 'Processes input data',
  input: ProcessorInput,
  output: ProcessorOutput,
  config: [{ key: 'PROCESSOR_MULTIPLIER', value: '2' }],
};

export class ProcessorCell extends Cell<typeof ProcessorInput, typeof ProcessorOutput, ProcessorConfigKey> {
  constructor(options?: CellOptions) {
    super(processorDefinition, options);
  }

  protected invoke(input: ProcessorInput, context: InvocationContext<ProcessorConfigKey>): ProcessorOutput {
    // Non-numeric multipliers fall through to output validation
    const multiplier = Number(context.config?.get('PROCESSOR_MULTIPLIER') ?? '2');
    return { processedValue: input.value1 * multiplier };
  }
}
