/**
 * sfetch fetch <source> [destination]
 *
 * Downloads a URL to a file through curl, drawing progress when stdout is
 * a terminal. Ctrl-C stops curl and exits 130.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  createTransferRequest,
  validateCoordinatorConfig,
  validateTransportConfig,
} from '@supervised-fetch/core';
import {
  addTransportOptions,
  defaultDestination,
  toTransportConfig,
  type TransportCliOptions,
} from '../transport-options.js';
import { EXIT_CODES, type CliContext } from '../context.js';
import { configErrors, success, TerminalUI } from '../ui.js';
import { reportError, reportOutcome } from './report.js';

interface FetchCommandOptions extends TransportCliOptions {
  progress: boolean;
}

export function registerFetchCommand(program: Command, context: CliContext): void {
  const cmd = program
    .command('fetch')
    .description('Download a URL to a local file')
    .argument('<source>', 'URL (credentials in the URL are moved to --user)')
    .argument('[destination]', 'Output file (defaults to the last segment of the URL)')
    .option('-C, --continue', 'Resume from the size of an existing partial file')
    .option('--no-progress', 'Do not draw the progress line');

  addTransportOptions(cmd).action(
    async (source: string, destination: string | undefined, opts: FetchCommandOptions) => {
      const config = context.loadConfig(opts.verbose ? { logLevel: 'info' } : undefined);
      const transport = toTransportConfig(opts, config);

      const errors = [...validateCoordinatorConfig(config), ...validateTransportConfig(transport)];
      if (errors.length > 0) {
        configErrors(errors);
        process.exitCode = EXIT_CODES.invalidConfig;
        return;
      }

      const request = createTransferRequest(source, destination ?? defaultDestination(source), transport);
      const ui = opts.progress && context.isInteractive() ? new TerminalUI() : undefined;
      const transferer = context.createTransferer(config, ui);

      try {
        const outcome = await transferer.fetchToFile(request);
        if (outcome.kind === 'success') {
          success(`Saved ${chalk.bold(request.destination)}`);
        }
        process.exitCode = reportOutcome(outcome);
      } catch (error) {
        process.exitCode = reportError(error);
      }
    }
  );
}
