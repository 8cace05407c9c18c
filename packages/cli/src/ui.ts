import * as readline from 'readline';
import chalk from 'chalk';
import type { TransferUI } from '@supervised-fetch/core';

/**
 * Draws the progress line on a terminal stream.
 * Each detail overwrites the last; clearLine wipes it.
 */
export class TerminalUI implements TransferUI {
  private readonly stream: NodeJS.WritableStream;

  constructor(stream: NodeJS.WritableStream = process.stdout) {
    this.stream = stream;
  }

  clearLine(): void {
    readline.clearLine(this.stream, 0);
    readline.cursorTo(this.stream, 0);
  }

  renderDetail(text: string, appendNewline: boolean): void {
    this.stream.write(chalk.dim(text) + (appendNewline ? '\n' : ''));
  }
}

export function success(msg: string): void {
  console.log(chalk.green('  ✓') + ' ' + msg);
}

export function warn(msg: string): void {
  console.error(chalk.yellow('  ✗') + ' ' + msg);
}

export function failure(msg: string): void {
  console.error(chalk.red('  ✗') + ' ' + msg);
}

export function info(msg: string): void {
  console.log(chalk.dim('  ~') + ' ' + msg);
}

export function configErrors(errors: string[]): void {
  failure('Invalid configuration:');
  for (const err of errors) {
    console.error(chalk.red(`    - ${err}`));
  }
}
