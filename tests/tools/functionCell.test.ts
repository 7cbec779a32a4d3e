import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { FunctionCell, cellsToFunctions } from '../../src/tools/functionCell.js';
import { defineCell } from '../../src/cells/cell.js';
import { ProcessorCell } from '../../src/examples/processor.js';

const Echo = defineCell(
  {
    role: 'Echo',
    description: 'Echoes its message',
    input: z.object({ message: z.string() }),
    output: z.object({ message: z.string() }),
  },
  input => ({ message: input.message })
);

describe('FunctionCell', () => {
  it('takes name and description from the cell', () => {
    const fn = new FunctionCell(new ProcessorCell({ env: {} }));

    expect(fn.name).toBe('Processor');
    expect(fn.description).toBe('Processes input data');
    expect(String(fn)).toBe('Processor()');
  });

  it('exposes input properties as args', () => {
    const fn = new FunctionCell(new ProcessorCell({ env: {} }));

    expect(fn.args).toMatchObject({
      value1: { type: 'integer', description: 'Value to process' },
      value2: { type: 'string' },
    });
  });

  it('builds a function definition from the input schema', () => {
    const { name, description, parameters } = new FunctionCell(new ProcessorCell({ env: {} })).definition;

    expect(name).toBe('Processor');
    expect(description).toBe('Processes input data');
    expect(parameters.type).toBe('object');
    expect(parameters.required).toEqual(['value1', 'value2']);
    expect(Object.keys(parameters.properties)).toEqual(['value1', 'value2']);
  });

  it('throws when the input schema has no properties', () => {
    const Scalar = defineCell(
      { role: 'Scalar', description: 'Takes a bare string', input: z.string(), output: z.string() },
      input => input
    );

    expect(() => new FunctionCell(new Scalar()).args).toThrow('No input properties found in the cell: Scalar');
  });

  describe('ainvoke', () => {
    it('runs the cell with object arguments', async () => {
      const fn = new FunctionCell(new ProcessorCell({ env: {} }));
      await expect(fn.ainvoke({ value1: 10, value2: 'example' })).resolves.toEqual({ processedValue: 20 });
    });

    it('runs the cell with JSON string arguments', async () => {
      const fn = new FunctionCell(new ProcessorCell({ env: {} }));
      await expect(fn.ainvoke('{"value1": 3, "value2": "x"}')).resolves.toEqual({ processedValue: 6 });
    });

    it('returns the error message for invalid arguments', async () => {
      const fn = new FunctionCell(new ProcessorCell({ env: {} }));
      await expect(fn.ainvoke({ value1: 'ten', value2: 'x' })).resolves.toBe(
        'Invalid input: value1: Expected integer, received string'
      );
    });

    it('rejects arguments that cannot be serialized', async () => {
      const fn = new FunctionCell(new Echo());
      await expect(fn.ainvoke({ message: 10n })).rejects.toThrow('Input could not be serialized to JSON');
    });
  });
});

describe('cellsToFunctions', () => {
  it('wraps each cell in order', () => {
    const fns = cellsToFunctions([new ProcessorCell({ env: {} }), new Echo()]);
    expect(fns.map(fn => fn.name)).toEqual(['Processor', 'Echo']);
  });
});
