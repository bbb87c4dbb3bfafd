import { RequestAlreadySatisfiedError } from '../utils/errors.js';
import type { DetectedTelemetry } from './mode.js';
import { LANGUAGE_LABELS, modeIncludes } from './types.js';
import type { FileEdit, InstrumentationPlan, TelemetryMode } from './types.js';

export interface RepositoryCoordinates {
  host: string;
  owner: string;
  name: string;
}

const HTTPS_URL = /^(?:https?|ssh|git):\/\/(?:[^@/]+@)?([^/:]+)(?::\d+)?\/(.+?)\/([^/]+?)(?:\.git)?\/?$/;
const SCP_URL = /^(?:[^@/]+@)?([^/:]+):(.+?)\/([^/]+?)(?:\.git)?\/?$/;

/**
 * Owner and name from a clone URL: `https://host/owner/repo.git`,
 * `ssh://git@host/owner/repo` or `git@host:owner/repo.git`. Null otherwise.
 */
export function parseRepositoryUrl(url: string): RepositoryCoordinates | null {
  const trimmed = url.trim();
  const match = trimmed.includes('://') ? HTTPS_URL.exec(trimmed) : SCP_URL.exec(trimmed);
  if (!match) return null;
  const [, host, owner, name] = match;
  return { host, owner, name };
}

type Addition = 'metrics' | 'tracing' | 'both';

function additionFor(mode: TelemetryMode, detection: DetectedTelemetry): Addition {
  const metrics = modeIncludes(mode, 'metrics') && !detection.hasMetrics;
  const tracing = modeIncludes(mode, 'tracing') && !detection.hasTracing;
  if (metrics && tracing) return 'both';
  if (metrics) return 'metrics';
  if (tracing) return 'tracing';
  throw new RequestAlreadySatisfiedError(LANGUAGE_LABELS[detection.language], mode);
}

const BRANCHES: Record<Addition, string> = {
  metrics: 'feat/add-prometheus-metrics',
  tracing: 'feat/add-opentelemetry-traces',
  both: 'feat/add-observability',
};

const COMMIT_MESSAGES: Record<Addition, string> = {
  metrics: 'feat: Add Prometheus metrics instrumentation',
  tracing: 'feat: Add OpenTelemetry distributed tracing',
  both: 'feat: Add observability with Prometheus and OpenTelemetry',
};

export function branchNameFor(mode: TelemetryMode, detection: DetectedTelemetry): string {
  return BRANCHES[additionFor(mode, detection)];
}

export function commitMessageFor(mode: TelemetryMode, detection: DetectedTelemetry): string {
  return COMMIT_MESSAGES[additionFor(mode, detection)];
}

export function renderPullRequestBody(plan: InstrumentationPlan): string {
  const lines = [
    '## Observability instrumentation',
    '',
    `Adds **${plan.mode}** instrumentation to \`${plan.service}\` (${LANGUAGE_LABELS[plan.language]}).`,
    '',
    '### Changes',
    ...plan.edits.map((edit) => `- \`${edit.path}\`: ${edit.action}`),
    '',
    "### What's included",
  ];
  if (modeIncludes(plan.mode, 'metrics')) {
    lines.push('- Prometheus `/metrics` endpoint', '- HTTP request counter and duration histogram');
  }
  if (modeIncludes(plan.mode, 'tracing')) {
    lines.push('- OpenTelemetry tracer provider exporting over OTLP', '- Request tracing middleware');
  }
  lines.push(
    '',
    '> Detection is heuristic: existing instrumentation may have been missed or',
    '> misattributed. Review every change before merging.',
    '',
  );
  return lines.join('\n');
}

export interface PullRequestMetadata {
  branch: string;
  baseBranch: string;
  title: string;
  body: string;
}

export function buildPullRequestMetadata(
  plan: InstrumentationPlan,
  detection: DetectedTelemetry,
  baseBranch = 'main',
): PullRequestMetadata {
  return {
    branch: branchNameFor(plan.mode, detection),
    baseBranch,
    title: commitMessageFor(plan.mode, detection),
    body: renderPullRequestBody(plan),
  };
}

/**
 * Transport that pushes edits to a branch and opens a pull request; returns its URL.
 * Callers pass their own implementation (a forge API client, or a fake in tests)
 * together with the metadata from `buildPullRequestMetadata`.
 */
export interface PullRequestSubmitter {
  submit(
    repository: RepositoryCoordinates,
    edits: readonly FileEdit[],
    metadata: PullRequestMetadata,
  ): Promise<string>;
}
