/**
 * sfetch head <source>
 *
 * Prints the response headers of a URL without downloading the body.
 */

import { Command } from 'commander';
import {
  createTransferRequest,
  validateCoordinatorConfig,
  validateTransportConfig,
} from '@supervised-fetch/core';
import {
  addTransportOptions,
  toTransportConfig,
  type TransportCliOptions,
} from '../transport-options.js';
import { EXIT_CODES, type CliContext } from '../context.js';
import { configErrors } from '../ui.js';
import { reportError, reportOutcome } from './report.js';

export function registerHeadCommand(program: Command, context: CliContext): void {
  const cmd = program
    .command('head')
    .description('Print the response headers of a URL')
    .argument('<source>', 'URL to probe');

  addTransportOptions(cmd).action(async (source: string, opts: TransportCliOptions) => {
    const config = context.loadConfig(opts.verbose ? { logLevel: 'info' } : undefined);
    const transport = toTransportConfig(opts, config);

    const errors = [...validateCoordinatorConfig(config), ...validateTransportConfig(transport)];
    if (errors.length > 0) {
      configErrors(errors);
      process.exitCode = EXIT_CODES.invalidConfig;
      return;
    }

    // HEAD writes nothing to disk; the destination is never passed to curl.
    const request = createTransferRequest(source, '', transport);
    const transferer = context.createTransferer(config);

    try {
      const { headerText, outcome } = await transferer.probeHeaders(request);
      if (headerText) {
        console.log(headerText.trimEnd());
      }
      process.exitCode = reportOutcome(outcome);
    } catch (error) {
      process.exitCode = reportError(error);
    }
  });
}
