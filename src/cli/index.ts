#!/usr/bin/env node
/**
 * cellkit CLI entry point. Loads .env before any Cell resolves its config.
 *
 * Usage: cellkit processor <command>
 */

import 'dotenv/config';
import chalk from 'chalk';
import { processorCli } from './processor.js';

async function main(): Promise<number> {
  const [command, ...rest] = process.argv.slice(2);
  switch (command) {
    case 'processor':
      return processorCli(rest);
    default:
      console.log(chalk.cyan('Usage: cellkit processor <describe|run|help>'));
      return command === undefined ? 0 : 1;
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    process.exitCode = 1;
  });
