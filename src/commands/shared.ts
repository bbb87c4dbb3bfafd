import { z } from 'zod';

import { loadConfig } from '../core/config.js';
import { createScanContext } from '../core/context.js';
import type { ScanContext } from '../core/context.js';
import { LANGUAGES, TELEMETRY_MODES } from '../core/types.js';
import type { Language, TelemetryMode } from '../core/types.js';
import { diagnosticsLogger, logger } from '../ui/logger.js';
import {
  ApplyError,
  ClassificationError,
  ConfigError,
  PlanValidationError,
  RetrievalError,
  UnsupportedLanguageError,
  UsageError,
  UserCancelledError,
  errorMessage,
} from '../utils/errors.js';

const languageSchema = z.enum(LANGUAGES);
const modeSchema = z.enum(TELEMETRY_MODES);

export function parseLanguage(value: string): Language {
  const result = languageSchema.safeParse(value);
  if (!result.success) {
    throw new UsageError(`--language must be one of ${LANGUAGES.join(', ')} (got "${value}")`);
  }
  return result.data;
}

export function parseMode(value: string): TelemetryMode {
  const result = modeSchema.safeParse(value);
  if (!result.success) {
    throw new UsageError(`--mode must be one of ${TELEMETRY_MODES.join(', ')} (got "${value}")`);
  }
  return result.data;
}

/** Config from the working directory plus the logger suited to the output format. */
export async function commandContext(options: { json?: boolean } = {}): Promise<ScanContext> {
  const config = await loadConfig(process.cwd());
  return createScanContext({ config, logger: options.json ? diagnosticsLogger : logger });
}

function isPromptExit(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}

/** Reports a command failure and sets a non-zero exit code. */
export function handleCommandError(error: unknown): void {
  if (error instanceof UserCancelledError || isPromptExit(error)) {
    logger.warn('Cancelled.');
  } else if (
    error instanceof UsageError ||
    error instanceof ConfigError ||
    error instanceof RetrievalError ||
    error instanceof UnsupportedLanguageError ||
    error instanceof PlanValidationError ||
    error instanceof ClassificationError
  ) {
    logger.error(error.message);
  } else if (error instanceof ApplyError) {
    logger.error(error.message);
    logger.dim('  The working tree may hold partial edits; discard it before retrying.');
  } else {
    logger.error(`Unexpected error: ${errorMessage(error)}`);
    logger.debug(error instanceof Error && error.stack ? error.stack : String(error));
  }
  process.exitCode = 1;
}
