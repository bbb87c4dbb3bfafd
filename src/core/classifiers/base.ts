import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { ClassificationError, errorMessage } from '../../utils/errors.js';
import { readFileIfExists } from '../../utils/fs.js';
import type { ScanContext } from '../context.js';
import { SourceSyntaxError, textHasCodeMatch } from '../source-text.js';
import { LANGUAGE_LABELS, TELEMETRY_KINDS } from '../types.js';
import type { Language, TelemetryKind } from '../types.js';
import { filterByExtension } from '../walker.js';
import type { ClassifierOutput, FileFindings, KindRecord } from './types.js';

export function emptyFindings(): FileFindings {
  return { imports: new Set(), usages: { metrics: new Set(), tracing: new Set() } };
}

export function kindRecord<T>(make: (kind: TelemetryKind) => T): KindRecord<T> {
  return { metrics: make('metrics'), tracing: make('tracing') };
}

function orderByAllowlist(found: Set<string>, allowlist: readonly string[]): string[] {
  const rank = (name: string) => {
    const idx = allowlist.indexOf(name);
    return idx === -1 ? allowlist.length : idx;
  };
  return [...found].sort((a, b) => rank(a) - rank(b) || a.localeCompare(b));
}

export interface SourceClassification {
  language: Language;
  root: string;
  files: readonly string[];
  extensions: readonly string[];
  allowlist: KindRecord<readonly string[]>;
  analyze(text: string, file: string): FileFindings;
  context: ScanContext;
}

/**
 * Runs `analyze` over every source file of the language and keeps a file
 * for a kind only when it both imports the library and uses it.
 */
export async function classifySourceFiles(job: SourceClassification): Promise<ClassifierOutput> {
  const { language, root, context } = job;
  const files = kindRecord<string[]>(() => []);
  const matched = kindRecord(() => new Set<string>());
  let sourceFramework: string | undefined;

  for (const file of filterByExtension(job.files, job.extensions)) {
    let text: string;
    try {
      text = await readFile(join(root, file), 'utf-8');
    } catch (error) {
      throw new ClassificationError(LANGUAGE_LABELS[language], `cannot read ${file}`, {
        cause: error,
      });
    }

    let findings: FileFindings;
    try {
      findings = job.analyze(text, file);
    } catch (error) {
      if (error instanceof SourceSyntaxError) {
        context.logger.debug(`Skipping ${file}: ${error.message}`);
        continue;
      }
      throw new ClassificationError(LANGUAGE_LABELS[language], `${file}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    sourceFramework ??= findings.framework;
    for (const kind of TELEMETRY_KINDS) {
      const usages = findings.usages[kind];
      if (!findings.imports.has(kind) || usages.size === 0) continue;
      files[kind].push(file);
      for (const usage of usages) matched[kind].add(usage);
    }
  }

  return {
    files,
    patterns: kindRecord((kind) => orderByAllowlist(matched[kind], job.allowlist[kind])),
    sourceFramework,
  };
}

/**
 * Degraded single-pass search: a file counts for a kind when any pattern
 * occurs on a non-comment line. No import pass.
 */
export async function fallbackClassify(
  root: string,
  files: readonly string[],
  extensions: readonly string[],
  patterns: Readonly<KindRecord<readonly string[]>>,
): Promise<ClassifierOutput> {
  const found = kindRecord<string[]>(() => []);
  const matched = kindRecord(() => new Set<string>());

  for (const file of filterByExtension(files, extensions)) {
    const text = await readFileIfExists(join(root, file));
    if (text === null) continue;
    for (const kind of TELEMETRY_KINDS) {
      const hits = patterns[kind].filter((pattern) => textHasCodeMatch(text, pattern));
      if (hits.length === 0) continue;
      found[kind].push(file);
      for (const hit of hits) matched[kind].add(hit);
    }
  }

  return {
    files: found,
    patterns: kindRecord((kind) => orderByAllowlist(matched[kind], patterns[kind])),
  };
}
