import chalk from 'chalk';

import { LANGUAGE_LABELS, TELEMETRY_KINDS } from '../core/types.js';
import type { InstrumentationPlan, ScanResult } from '../core/types.js';

export const HEURISTIC_NOTE = 'Detection is heuristic: review candidates before applying a plan.';

/** Plain-text scan summary, one block per detected language. */
export function formatScanReport(result: ScanResult): string[] {
  if (result.frameworks.length === 0) {
    return ['No supported language detected.'];
  }

  const lines: string[] = [];
  for (const detection of result.frameworks) {
    const label = LANGUAGE_LABELS[detection.language];
    lines.push(`${label} (${detection.framework}), service ${detection.serviceName}`);
    if (result.degradedLanguages.includes(detection.language)) {
      lines.push('  classifier failed; results come from the substring fallback');
    }
    for (const kind of TELEMETRY_KINDS) {
      const candidate = result.candidates.find(
        (c) => c.language === detection.language && c.kind === kind,
      );
      if (!candidate) {
        lines.push(`  ${kind}: not found`);
        continue;
      }
      const count = candidate.files.length;
      lines.push(`  ${kind}: ${count} file${count === 1 ? '' : 's'} [${candidate.patterns.join(', ')}]`);
      for (const file of candidate.files) lines.push(`    ${file}`);
    }
  }
  lines.push('', HEURISTIC_NOTE);
  return lines;
}

export function formatPlan(plan: InstrumentationPlan): string[] {
  const lines = [plan.description];
  if (plan.edits.length === 0) return [...lines, '  (no edits)'];
  plan.edits.forEach((edit, i) => {
    const anchor = edit.anchor ? ` after "${edit.anchor}"` : '';
    lines.push(`  ${i + 1}. ${edit.action} ${edit.path}${anchor}`);
  });
  return lines;
}

export function printLines(lines: readonly string[]): void {
  for (const line of lines) {
    console.log(line.startsWith(' ') || line === '' ? line : chalk.bold(line));
  }
}
