import { resolve } from 'node:path';

import { scanDirectory, scanRepository } from '../core/scanner.js';
import type { ScanResult } from '../core/types.js';
import { formatScanReport, printLines } from '../ui/report.js';
import { withSpinner } from '../ui/spinner.js';
import { commandContext, handleCommandError } from './shared.js';

export interface ScanCommandOptions {
  repo?: string;
  ref?: string;
  json?: boolean;
}

export async function scanCommand(path: string | undefined, options: ScanCommandOptions): Promise<void> {
  try {
    const context = await commandContext(options);
    const target = options.repo ?? resolve(path ?? '.');

    const result: ScanResult = await withSpinner(
      `Scanning ${target}`,
      () =>
        options.repo
          ? scanRepository({ location: options.repo, ref: options.ref }, context)
          : scanDirectory(target, context),
      { enabled: !options.json },
    );

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
      return;
    }
    printLines(formatScanReport(result));
  } catch (error) {
    handleCommandError(error);
  }
}
