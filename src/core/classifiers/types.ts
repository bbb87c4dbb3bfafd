import type { ScanContext } from '../context.js';
import type { Language, TelemetryKind } from '../types.js';

export type KindRecord<T> = Record<TelemetryKind, T>;

/** What a single file contributes, after both passes. */
export interface FileFindings {
  /** Kinds whose library the file imports or registers. */
  imports: Set<TelemetryKind>;
  /** Allowlisted usage constructs found, per kind. */
  usages: KindRecord<Set<string>>;
  /** Framework inferred from a construction call in this file, if any. */
  framework?: string;
}

export interface ClassifierOutput {
  /** Candidate files per kind: repo-relative, sorted, unique. */
  files: KindRecord<string[]>;
  /** Matched usage constructs per kind, in allowlist order. */
  patterns: KindRecord<string[]>;
  /** Framework seen in source when manifests name none. */
  sourceFramework?: string;
}

export interface LanguageClassifier {
  readonly language: Language;
  readonly sourceExtensions: readonly string[];
  /** Substring patterns for the degraded single-pass search. */
  readonly fallbackPatterns: Readonly<KindRecord<readonly string[]>>;
  /** True when the repository carries this language's manifest. */
  detect(files: readonly string[]): boolean;
  /** Framework label named by build manifests, if any. */
  detectFramework(root: string, files: readonly string[]): Promise<string | null>;
  classify(root: string, files: readonly string[], context: ScanContext): Promise<ClassifierOutput>;
}
