/**
 * Progress and warning output of the library.
 *
 * Silent under tests and while machine-readable output (JSON, DOT) is written
 * to stdout; warnings then still go to stderr.
 */

import chalk from 'chalk';

let quiet = false;
let verbose = false;

export function configureLogger(options: { quiet?: boolean; verbose?: boolean }): void {
  quiet = options.quiet ?? quiet;
  verbose = options.verbose ?? verbose;
}

function enabled(): boolean {
  return process.env.NODE_ENV !== 'test';
}

export const logger = {
  info(message: string): void {
    if (enabled() && !quiet) console.log(message);
  },

  warn(message: string): void {
    if (enabled()) console.warn(chalk.yellow(`Warning: ${message}`));
  },

  /** Only with --verbose */
  debug(message: string): void {
    if (enabled() && verbose) console.error(chalk.gray(message));
  },
};
