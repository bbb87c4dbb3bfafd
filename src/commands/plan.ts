import { resolve } from 'node:path';

import { generatePlan, inspectLayout } from '../core/generators/index.js';
import type { ProjectLayout } from '../core/generators/index.js';
import { scanDirectory } from '../core/scanner.js';
import { defaultServiceName } from '../core/types.js';
import type { DetectionCandidate, FrameworkDetection } from '../core/types.js';
import { formatPlan, printLines } from '../ui/report.js';
import { commandContext, handleCommandError, parseLanguage, parseMode } from './shared.js';

export interface PlanCommandOptions {
  language: string;
  mode: string;
  service?: string;
  path?: string;
  json?: boolean;
}

/**
 * Prints the plan for exactly the requested mode. With --path the tree is
 * scanned first so edits target the files where telemetry already lives
 * and the manifests the tree actually has.
 */
export async function planCommand(options: PlanCommandOptions): Promise<void> {
  try {
    const language = parseLanguage(options.language);
    const mode = parseMode(options.mode);
    const context = await commandContext(options);

    let candidates: readonly DetectionCandidate[] = [];
    let detection: FrameworkDetection | undefined;
    let layout: ProjectLayout | undefined;
    if (options.path) {
      const root = resolve(options.path);
      const result = await scanDirectory(root, context);
      candidates = result.candidates.filter((c) => c.language === language);
      detection = result.frameworks.find((f) => f.language === language);
      layout = await inspectLayout(root);
    }

    const service =
      options.service ??
      context.config.serviceNames[language] ??
      detection?.serviceName ??
      defaultServiceName(language);

    const plan = generatePlan(language, service, mode, candidates, {
      collectorEndpoint: context.config.collectorEndpoint,
      framework: detection?.framework,
      layout,
    });

    if (options.json) {
      console.log(JSON.stringify(plan, null, 2));
      return;
    }
    printLines(formatPlan(plan));
  } catch (error) {
    handleCommandError(error);
  }
}
