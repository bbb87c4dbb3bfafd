import { randomBytes } from 'node:crypto';

import { ClassificationError, errorMessage } from '../utils/errors.js';
import type { GitRunner } from '../utils/git.js';
import { fallbackClassify } from './classifiers/base.js';
import { CLASSIFIERS } from './classifiers/index.js';
import type { ClassifierOutput, LanguageClassifier } from './classifiers/index.js';
import { createScanContext } from './context.js';
import type { ScanContext } from './context.js';
import { withCheckout } from './materializer.js';
import type { RepositorySource } from './materializer.js';
import { LANGUAGE_LABELS, TELEMETRY_KINDS, defaultServiceName } from './types.js';
import type { DetectionCandidate, FrameworkDetection, Language, ScanResult } from './types.js';
import { listRepoFiles } from './walker.js';
import type { RepoListing } from './walker.js';

interface LanguageScan {
  language: Language;
  detection: FrameworkDetection;
  candidates: DetectionCandidate[];
  degraded: boolean;
}

function uniqueSorted(files: readonly string[]): string[] {
  return [...new Set(files)].sort();
}

async function scanLanguage(
  classifier: LanguageClassifier,
  root: string,
  files: readonly string[],
  context: ScanContext,
): Promise<LanguageScan> {
  const { language } = classifier;
  const label = LANGUAGE_LABELS[language];

  const manifestFramework = await classifier.detectFramework(root, files).catch((error: unknown) => {
    context.logger.warn(`Could not read ${label} manifests: ${errorMessage(error)}`);
    return null;
  });

  let output: ClassifierOutput;
  let degraded = false;
  try {
    output = await classifier.classify(root, files, context);
  } catch (error) {
    context.logger.warn(
      `ClassificationDegraded: ${label} classifier failed (${errorMessage(error)}); using substring search`,
    );
    output = await fallbackClassify(root, files, classifier.sourceExtensions, classifier.fallbackPatterns);
    degraded = true;
  }

  const framework = output.sourceFramework ?? manifestFramework ?? label;
  const serviceName = context.config.serviceNames[language] ?? defaultServiceName(language);

  const candidates: DetectionCandidate[] = [];
  for (const kind of TELEMETRY_KINDS) {
    const kindFiles = uniqueSorted(output.files[kind]);
    if (kindFiles.length === 0) continue;
    candidates.push({
      language,
      framework,
      kind,
      patterns: output.patterns[kind],
      files: kindFiles,
      serviceName,
    });
  }

  context.logger.debug(
    `${label}: ${candidates.map((c) => `${c.kind}=${c.files.length}`).join(', ') || 'no telemetry'}`,
  );

  return {
    language,
    degraded,
    candidates,
    detection: {
      language,
      framework,
      hasMetrics: candidates.some((c) => c.kind === 'metrics'),
      hasTracing: candidates.some((c) => c.kind === 'tracing'),
      serviceName,
    },
  };
}

/**
 * Scans a local working tree with every classifier whose language is
 * present. Classifiers run concurrently; results keep registry order.
 */
export async function scanDirectory(
  root: string,
  context: ScanContext = createScanContext(),
  classifiers: readonly LanguageClassifier[] = CLASSIFIERS,
): Promise<ScanResult> {
  let listing: RepoListing;
  try {
    listing = await listRepoFiles(root);
  } catch (error) {
    throw new ClassificationError('repository', `cannot walk ${root}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  for (const dir of listing.unreadable) {
    context.logger.debug(`Skipping unreadable directory ${dir}`);
  }

  const detected = classifiers.filter((classifier) => classifier.detect(listing.files));
  const scans = await Promise.all(
    detected.map((classifier) => scanLanguage(classifier, root, listing.files, context)),
  );

  return {
    frameworks: scans.map((scan) => scan.detection),
    candidates: scans.flatMap((scan) => scan.candidates),
    degradedLanguages: scans.filter((scan) => scan.degraded).map((scan) => scan.language),
  };
}

/** Scratch directory name: repository name plus a random suffix. */
export function checkoutIdFor(location: string): string {
  const name =
    location
      .replace(/[/\\]+$/, '')
      .split(/[/\\:]/)
      .pop()
      ?.replace(/\.git$/, '')
      .replace(/[^A-Za-z0-9._-]/g, '-')
      .replace(/^[^A-Za-z0-9]+/, '') || 'repo';
  return `${name}-${randomBytes(4).toString('hex')}`;
}

export interface RepositoryScanOptions {
  checkoutId?: string;
  git?: GitRunner;
}

/** Clones `source` into the configured scratch directory and scans it. */
export function scanRepository(
  source: RepositorySource,
  context: ScanContext = createScanContext(),
  options: RepositoryScanOptions = {},
): Promise<ScanResult> {
  const checkoutId = options.checkoutId ?? checkoutIdFor(source.location);
  context.logger.debug(`Cloning ${source.location}${source.ref ? `@${source.ref}` : ''} as ${checkoutId}`);
  return withCheckout(source, checkoutId, (path) => scanDirectory(path, context), {
    scratchDir: context.config.scratchDir,
    timeoutMs: context.config.cloneTimeoutMs,
    git: options.git,
  });
}
