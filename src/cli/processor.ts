/**
 * Processor CLI Commands
 *
 * cellkit processor describe
 * cellkit processor run '<json>'
 */

import chalk from 'chalk';
import { ConfigResolutionError } from '../cells/errors.js';
import { CellResponseEnvelope } from '../cells/response.js';
import type { Environment } from '../config/configModel.js';
import { ProcessorCell } from '../examples/processor.js';

// ============================================================================
// MAIN DISPATCHER
// ============================================================================

/** @returns process exit code */
export async function processorCli(args: string[], env: Environment = process.env): Promise<number> {
  const subcommand = args[0] || 'help';

  let cell: ProcessorCell;
  try {
    cell = new ProcessorCell({ env });
  } catch (error) {
    if (error instanceof ConfigResolutionError) {
      console.error(chalk.red(error.message));
      return 1;
    }
    throw error;
  }

  switch (subcommand) {
    case 'describe':
      return describeCommand(cell);
    case 'run':
      return runCommand(cell, args[1]);
    case 'help':
    default:
      showProcessorHelp();
      return subcommand === 'help' ? 0 : 1;
  }
}

// ============================================================================
// COMMANDS
// ============================================================================

function describeCommand(cell: ProcessorCell): number {
  const manifest = cell.toManifest();
  console.log(chalk.cyan(`${manifest.role}`) + chalk.gray(`: ${manifest.description}`));
  console.log(chalk.white('Input:'));
  console.log(JSON.stringify(manifest.inputSchema, null, 2));
  console.log(chalk.white('Output:'));
  console.log(JSON.stringify(manifest.outputSchema, null, 2));
  for (const entry of manifest.config) {
    const note = entry.required ? 'required' : entry.hasDefault ? 'has default' : 'optional';
    console.log(chalk.gray(`  ${entry.key}`) + `  ${note}`);
  }
  return 0;
}

async function runCommand(cell: ProcessorCell, inputJson: string | undefined): Promise<number> {
  if (inputJson === undefined) {
    console.error(chalk.red('Missing input: cellkit processor run \'{"value1": 10, "value2": "example"}\''));
    return 1;
  }

  const response = CellResponseEnvelope.parse(JSON.parse(await cell.run(inputJson)));
  if (response.type === 'success') {
    console.log(chalk.green('✓ ') + JSON.stringify(response.content));
    return 0;
  }
  console.error(chalk.red(`✗ ${response.content}`));
  return 1;
}

function showProcessorHelp(): void {
  console.log(chalk.cyan('Usage: cellkit processor <command>\n'));
  console.log(chalk.white('Commands:'));
  console.log(chalk.gray('  describe') + '      Print role, schemas and config keys');
  console.log(chalk.gray('  run <json>') + '    Execute with a JSON input');
  console.log(chalk.gray('  help') + '          Show this help');
  console.log();
  console.log(chalk.white('Environment:'));
  console.log(chalk.gray('  PROCESSOR_MULTIPLIER') + '  Multiplier (default: 2)');
  console.log(chalk.gray('  LOG_LEVEL') + '             debug|info|warn|error (default: info)');
  console.log();
}
