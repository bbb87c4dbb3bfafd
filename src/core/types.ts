export const LANGUAGES = ['go', 'python', 'java', 'nodejs', 'dotnet', 'rust'] as const;
export type Language = (typeof LANGUAGES)[number];

export const LANGUAGE_LABELS: Record<Language, string> = {
  go: 'Go',
  python: 'Python',
  java: 'Java',
  nodejs: 'Node.js',
  dotnet: '.NET',
  rust: 'Rust',
};

export const TELEMETRY_KINDS = ['metrics', 'tracing'] as const;
export type TelemetryKind = (typeof TELEMETRY_KINDS)[number];

export const TELEMETRY_MODES = ['metrics', 'traces', 'both', 'none'] as const;
export type TelemetryMode = (typeof TELEMETRY_MODES)[number];

export const EDIT_ACTIONS = ['append', 'create', 'modify'] as const;
export type EditAction = (typeof EDIT_ACTIONS)[number];

export function isLanguage(value: string): value is Language {
  return LANGUAGES.some((language) => language === value);
}

export function defaultServiceName(language: Language): string {
  return `${language}-service`;
}

export interface DetectionCandidate {
  readonly language: Language;
  readonly framework: string;
  readonly kind: TelemetryKind;
  readonly patterns: readonly string[];
  /** Repo-relative, `/`-separated, sorted and unique. */
  readonly files: readonly string[];
  readonly serviceName: string;
}

export interface FrameworkDetection {
  readonly language: Language;
  readonly framework: string;
  readonly hasMetrics: boolean;
  readonly hasTracing: boolean;
  readonly serviceName: string;
}

export interface ScanResult {
  readonly frameworks: readonly FrameworkDetection[];
  readonly candidates: readonly DetectionCandidate[];
  /** Languages whose classifier failed and were scanned with the substring fallback. */
  readonly degradedLanguages: readonly Language[];
}

export interface FileEdit {
  readonly path: string;
  readonly action: EditAction;
  readonly content: string;
  readonly anchor?: string;
}

export interface InstrumentationPlan {
  readonly language: Language;
  readonly service: string;
  readonly mode: TelemetryMode;
  readonly edits: readonly FileEdit[];
  readonly description: string;
}

export function modeIncludes(mode: TelemetryMode, kind: TelemetryKind): boolean {
  switch (mode) {
    case 'both':
      return true;
    case 'metrics':
      return kind === 'metrics';
    case 'traces':
      return kind === 'tracing';
    case 'none':
      return false;
  }
}
