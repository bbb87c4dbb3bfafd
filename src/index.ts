#!/usr/bin/env node
import { program } from './cli.js';
import { logger } from './ui/logger.js';
import { errorMessage } from './utils/errors.js';

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(errorMessage(error));
  process.exitCode = 1;
});
