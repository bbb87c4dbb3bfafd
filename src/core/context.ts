import { defaultConfig } from './config.js';
import type { TracewrightConfig } from './config.js';

/**
 * Sink for core diagnostics. The CLI passes the terminal logger; library
 * callers may pass their own or rely on the silent default.
 */
export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
};

/** Per-request state. Nothing in the core keeps process-wide scan state. */
export interface ScanContext {
  config: TracewrightConfig;
  logger: Logger;
}

export function createScanContext(overrides: Partial<ScanContext> = {}): ScanContext {
  return {
    config: overrides.config ?? defaultConfig(),
    logger: overrides.logger ?? silentLogger,
  };
}
