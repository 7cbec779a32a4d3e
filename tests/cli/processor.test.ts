import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { processorCli } from '../../src/cli/processor.js';

describe('processorCli', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function logged(fn: (...args: unknown[]) => void): string {
    return vi.mocked(fn).mock.calls.map(call => call.map(String).join(' ')).join('\n');
  }

  it('prints the validated output of run', async () => {
    const code = await processorCli(['run', '{"value1": 10, "value2": "example"}'], {});

    expect(code).toBe(0);
    expect(logged(console.log)).toContain('{"processedValue":20}');
  });

  it('applies PROCESSOR_MULTIPLIER from the given environment', async () => {
    const code = await processorCli(['run', '{"value1": 10, "value2": "example"}'], { PROCESSOR_MULTIPLIER: '3' });

    expect(code).toBe(0);
    expect(logged(console.log)).toContain('{"processedValue":30}');
  });

  it('reports validation failures on stderr', async () => {
    const code = await processorCli(['run', '{"value1": "ten", "value2": "example"}'], {});

    expect(code).toBe(1);
    expect(logged(console.error)).toContain('Invalid input: value1: Expected integer, received string');
  });

  it('requires an input for run', async () => {
    expect(await processorCli(['run'], {})).toBe(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('describes the cell', async () => {
    const code = await processorCli(['describe'], {});

    expect(code).toBe(0);
    const output = logged(console.log);
    expect(output).toContain('Processor');
    expect(output).toContain('"processedValue"');
    expect(output).toContain('PROCESSOR_MULTIPLIER');
  });

  it('shows help for unknown commands', async () => {
    expect(await processorCli(['bogus'], {})).toBe(1);
    expect(await processorCli(['help'], {})).toBe(0);
    expect(logged(console.log)).toContain('Usage: cellkit processor <command>');
  });
});
