#!/usr/bin/env node

import chalk from 'chalk';

import { run, stopActiveSpinner } from './cli.js';
import { EXIT_CODES, MESSAGES, formatMessage } from './constants.js';

async function init(): Promise<void> {
  // Handle exit signals at the top level
  const exitHandler = (signal: string): void => {
    console.log(formatMessage(MESSAGES.signalCleanup, signal));
    stopActiveSpinner();
    process.exit(EXIT_CODES.OK);
  };

  process.on('SIGINT', () => {
    exitHandler('SIGINT');
  });
  process.on('SIGTERM', () => {
    exitHandler('SIGTERM');
  });

  process.exitCode = await run(process.argv.slice(2));
}

init().catch((error: unknown) => {
  stopActiveSpinner();
  console.error(chalk.red(MESSAGES.unexpected), error);
  process.exit(EXIT_CODES.FAILURE);
});
