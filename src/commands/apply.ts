import { resolve } from 'node:path';

import chalk from 'chalk';

import { applyPlan } from '../core/applier.js';
import { generatePlan, hasGenerator, inspectLayout } from '../core/generators/index.js';
import { missingMode, resolveRequestedMode } from '../core/mode.js';
import { buildPullRequestMetadata } from '../core/pull-request.js';
import { scanDirectory } from '../core/scanner.js';
import { modeFromDetection, renderToggleSpec } from '../core/toggle-spec.js';
import { LANGUAGE_LABELS, TELEMETRY_MODES, modeIncludes } from '../core/types.js';
import type { FrameworkDetection, ScanResult, TelemetryMode } from '../core/types.js';
import { logger } from '../ui/logger.js';
import { confirmPrompt, isInteractive, selectPrompt } from '../ui/prompts.js';
import { formatPlan, printLines } from '../ui/report.js';
import { withSpinner } from '../ui/spinner.js';
import { RequestAlreadySatisfiedError, UsageError, UserCancelledError } from '../utils/errors.js';
import { commandContext, handleCommandError, parseLanguage, parseMode } from './shared.js';

export interface ApplyCommandOptions {
  mode?: string;
  language?: string;
  service?: string;
  dryRun?: boolean;
  yes?: boolean;
}

const MODE_DESCRIPTIONS: Record<TelemetryMode, string> = {
  both: 'Prometheus metrics and OpenTelemetry tracing',
  metrics: 'Prometheus metrics only',
  traces: 'OpenTelemetry tracing only',
  none: 'Nothing (leave the service as it is)',
};

async function pickDetection(
  result: ScanResult,
  language: string | undefined,
): Promise<FrameworkDetection> {
  if (language) {
    const wanted = parseLanguage(language);
    const found = result.frameworks.find((f) => f.language === wanted);
    if (!found) throw new UsageError(`${LANGUAGE_LABELS[wanted]} was not detected in this tree`);
    return found;
  }

  const supported = result.frameworks.filter((f) => hasGenerator(f.language));
  if (supported.length === 1) return supported[0];
  if (supported.length === 0) {
    throw new UsageError('No detected language has a plan generator (Go, Python, Java, Node.js)');
  }
  if (!isInteractive()) {
    throw new UsageError('Several languages detected; pass --language');
  }
  return selectPrompt(
    'Which service should be instrumented?',
    supported.map((f) => ({ name: `${LANGUAGE_LABELS[f.language]} (${f.framework})`, value: f })),
  );
}

async function pickMode(detection: FrameworkDetection, mode: string | undefined): Promise<TelemetryMode> {
  if (mode) return parseMode(mode);
  if (!isInteractive()) throw new UsageError('--mode is required when not running in a terminal');
  return selectPrompt(
    'What should be added?',
    TELEMETRY_MODES.map((value) => ({ name: value, value, description: MODE_DESCRIPTIONS[value] })),
    missingMode(detection),
  );
}

export async function applyCommand(path: string | undefined, options: ApplyCommandOptions): Promise<void> {
  try {
    const root = resolve(path ?? '.');
    const context = await commandContext();

    const result = await withSpinner(`Scanning ${root}`, () => scanDirectory(root, context));
    const detection = await pickDetection(result, options.language);

    let mode: TelemetryMode;
    try {
      mode = resolveRequestedMode(detection, await pickMode(detection, options.mode));
    } catch (error) {
      if (!(error instanceof RequestAlreadySatisfiedError)) throw error;
      logger.success(error.message);
      return;
    }

    const service = options.service ?? detection.serviceName;
    const plan = generatePlan(detection.language, service, mode, result.candidates, {
      collectorEndpoint: context.config.collectorEndpoint,
      framework: detection.framework,
      layout: await inspectLayout(root),
    });

    logger.header('Instrumentation plan');
    printLines(formatPlan(plan));

    if (plan.edits.length === 0) {
      logger.info('Nothing to apply.');
      return;
    }
    if (options.dryRun) {
      logger.dim('\nDry run: no files were written.');
      return;
    }
    if (!options.yes && isInteractive() && !(await confirmPrompt(`Apply ${plan.edits.length} edits?`))) {
      throw new UserCancelledError();
    }

    const applied = await applyPlan(root, plan, context.logger);
    logger.header('Applied');
    for (const edit of applied.edits) {
      if (edit.outcome === 'created') logger.fileCreated(edit.path);
      else if (edit.outcome === 'unchanged') logger.fileUnchanged(edit.path);
      else logger.fileModified(edit.path, edit.outcome);
    }

    const pr = buildPullRequestMetadata(plan, detection);
    logger.header('Next steps');
    logger.info(`Branch: ${chalk.cyan(pr.branch)}`);
    logger.info(`Commit: ${chalk.cyan(pr.title)}`);
    logger.dim('\nToggle spec:');
    const enabled = modeFromDetection(
      detection.hasMetrics || modeIncludes(mode, 'metrics'),
      detection.hasTracing || modeIncludes(mode, 'tracing'),
    );
    logger.dim(renderToggleSpec(service, enabled).trimEnd());
  } catch (error) {
    handleCommandError(error);
  }
}
