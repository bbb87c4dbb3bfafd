import chalk from 'chalk';

import type { Logger } from '../core/context.js';

function debugEnabled(): boolean {
  return Boolean(process.env.DEBUG || process.env.TRACEWRIGHT_DEBUG);
}

/**
 * Terminal logger. Results go to stdout; warnings and debug output go to
 * stderr so `--json` output stays parseable.
 */
export const logger = {
  info(msg: string) {
    console.log(chalk.blue('ℹ'), msg);
  },

  success(msg: string) {
    console.log(chalk.green('✔'), msg);
  },

  warn(msg: string) {
    console.error(chalk.yellow('⚠'), msg);
  },

  error(msg: string) {
    console.error(chalk.red('✖'), msg);
  },

  debug(msg: string) {
    if (debugEnabled()) {
      console.error(chalk.gray('⚙'), chalk.gray(msg));
    }
  },

  header(msg: string) {
    console.log();
    console.log(chalk.bold(msg));
    console.log();
  },

  dim(msg: string) {
    console.log(chalk.dim(msg));
  },

  fileCreated(path: string) {
    console.log(chalk.green('  + Created:'), path);
  },

  fileModified(path: string, detail?: string) {
    console.log(chalk.yellow('  ~ Modified:'), path, detail ? chalk.dim(`(${detail})`) : '');
  },

  fileUnchanged(path: string) {
    console.log(chalk.dim('  = Unchanged:'), chalk.dim(path));
  },
};

/** Core-facing logger that keeps stdout free, for machine-readable runs. */
export const diagnosticsLogger: Logger = {
  info(msg: string) {
    console.error(chalk.blue('ℹ'), msg);
  },
  warn: logger.warn,
  debug: logger.debug,
};
