import type { Language } from '../types.js';
import type { ProjectLayout } from './layout.js';
import type { PlanBuilder } from './plan-builder.js';

export interface GenerationOptions {
  /** OTLP gRPC endpoint written into generated tracer setup. */
  collectorEndpoint?: string;
  /** Framework label when no candidate carries one. */
  framework?: string;
  /**
   * The working tree the plan is for. Without it, manifests and entry files
   * are assumed at their conventional repo-root paths.
   */
  layout?: ProjectLayout;
}

/** Everything a language generator needs to emit one half of a plan. */
export interface GenerationContext {
  service: string;
  framework: string;
  collectorEndpoint: string;
  /** File that receives the edit for this half: candidate file or conventional default. */
  entry: string;
  layout?: ProjectLayout;
}

export interface InstrumentationGenerator {
  readonly language: Language;
  /** Entry file used when no candidate names one. */
  readonly defaultEntry: string;
  /**
   * False when wiring always goes into `defaultEntry`, e.g. a configuration
   * file rather than a source file.
   */
  readonly entryFromCandidates: boolean;
  addMetrics(plan: PlanBuilder, context: GenerationContext): void;
  addTracing(plan: PlanBuilder, context: GenerationContext): void;
}
