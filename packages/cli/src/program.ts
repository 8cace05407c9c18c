/**
 * sfetch - supervised curl transfers from the command line
 */

import { Command } from 'commander';
import { PRODUCT_VERSION } from '@supervised-fetch/core';
import { registerFetchCommand } from './commands/fetch.js';
import { registerHeadCommand } from './commands/head.js';
import { defaultContext, type CliContext } from './context.js';

export function createProgram(context: CliContext = defaultContext): Command {
  const program = new Command();

  program
    .name('sfetch')
    .description('Download files through curl with progress and clean interruption')
    .version(PRODUCT_VERSION);

  registerFetchCommand(program, context);
  registerHeadCommand(program, context);

  return program;
}

export { defaultContext, EXIT_CODES } from './context.js';
export type { CliContext, Transferer } from './context.js';
export { TerminalUI } from './ui.js';
