import { UnsupportedLanguageError } from '../../utils/errors.js';
import { DEFAULT_COLLECTOR_ENDPOINT } from '../config.js';
import { LANGUAGE_LABELS, isLanguage, modeIncludes } from '../types.js';
import type {
  DetectionCandidate,
  InstrumentationPlan,
  Language,
  TelemetryKind,
  TelemetryMode,
} from '../types.js';
import { baseName } from '../walker.js';
import { goGenerator } from './go.js';
import { findFile } from './layout.js';
import type { ProjectLayout } from './layout.js';
import { javaGenerator } from './java.js';
import { nodeGenerator } from './node.js';
import { PlanBuilder } from './plan-builder.js';
import { pythonGenerator } from './python.js';
import type { GenerationOptions, InstrumentationGenerator } from './types.js';

const GENERATORS: Record<Language, InstrumentationGenerator | undefined> = {
  go: goGenerator,
  python: pythonGenerator,
  java: javaGenerator,
  nodejs: nodeGenerator,
  dotnet: undefined,
  rust: undefined,
};

export function hasGenerator(language: Language): boolean {
  return GENERATORS[language] !== undefined;
}

function firstFile(
  candidates: readonly DetectionCandidate[],
  language: Language,
  kind: TelemetryKind,
): string | undefined {
  return candidates.find((c) => c.language === language && c.kind === kind)?.files[0];
}

/** The conventional entry, or the shallowest file of the same name when the root has none. */
function locateEntry(layout: ProjectLayout, conventional: string): string {
  if (layout.files.includes(conventional)) return conventional;
  const name = baseName(conventional);
  return findFile(layout, (file) => baseName(file) === name) ?? conventional;
}

function describe(service: string, language: Language, mode: TelemetryMode): string {
  const parts = [
    ...(modeIncludes(mode, 'metrics') ? ['Prometheus metrics'] : []),
    ...(modeIncludes(mode, 'tracing') ? ['OpenTelemetry tracing'] : []),
  ];
  if (parts.length === 0) return `No instrumentation for ${service} (mode: ${mode})`;
  return `Add ${parts.join(' and ')} to ${service} (${LANGUAGE_LABELS[language]}, mode: ${mode})`;
}

/**
 * Builds the edit list that adds the requested telemetry to a service.
 * Pure: the same inputs always give the same plan, metrics edits first.
 */
export function generatePlan(
  language: string,
  service: string,
  mode: TelemetryMode,
  candidates: readonly DetectionCandidate[] = [],
  options: GenerationOptions = {},
): InstrumentationPlan {
  if (!isLanguage(language)) throw new UnsupportedLanguageError(language);

  const plan = new PlanBuilder();
  const meta = { language, service, mode, description: describe(service, language, mode) };
  if (mode === 'none') return plan.build(meta);

  const generator = GENERATORS[language];
  if (!generator) throw new UnsupportedLanguageError(LANGUAGE_LABELS[language]);

  const own = candidates.filter((c) => c.language === language);
  const framework = own[0]?.framework ?? options.framework ?? LANGUAGE_LABELS[language];
  const collectorEndpoint = options.collectorEndpoint ?? DEFAULT_COLLECTOR_ENDPOINT;
  const metricsFile = firstFile(own, language, 'metrics');
  const tracingFile = firstFile(own, language, 'tracing');
  const { layout } = options;
  const entryFor = (file: string | undefined) => {
    if (!generator.entryFromCandidates) return generator.defaultEntry;
    return file ?? (layout ? locateEntry(layout, generator.defaultEntry) : generator.defaultEntry);
  };

  if (modeIncludes(mode, 'metrics')) {
    generator.addMetrics(plan, {
      service,
      framework,
      collectorEndpoint,
      entry: entryFor(metricsFile),
      layout,
    });
  }
  if (modeIncludes(mode, 'tracing')) {
    generator.addTracing(plan, {
      service,
      framework,
      collectorEndpoint,
      entry: entryFor(tracingFile ?? metricsFile),
      layout,
    });
  }
  return plan.build(meta);
}

export { PlanBuilder } from './plan-builder.js';
export type { GenerationContext, GenerationOptions, InstrumentationGenerator } from './types.js';
export { dependencyBlockOf, inspectLayout } from './layout.js';
export type { DependencyBlock, ProjectLayout } from './layout.js';
