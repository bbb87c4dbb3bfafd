import { join } from 'node:path';

import { readFileIfExists } from '../../utils/fs.js';
import { GO_SYNTAX, maskSource } from '../source-text.js';
import type { TelemetryKind } from '../types.js';
import { baseName } from '../walker.js';
import { classifySourceFiles, emptyFindings, kindRecord } from './base.js';
import type { CallSite } from './call-sites.js';
import { RESULT_RECEIVER, extractCallSites } from './call-sites.js';
import { frameworkFromContent, shallowestFirst } from './manifest.js';
import type { FrameworkTable } from './manifest.js';
import type { FileFindings, LanguageClassifier } from './types.js';

export interface GoImport {
  path: string;
  /** Explicit alias, `_`, `.`, or null when the package name is implied. */
  alias: string | null;
  /** Identifier the file refers to the package by; null for `_` and `.`. */
  name: string | null;
}

interface PackageRule {
  path: string;
  label: string;
  kind: TelemetryKind;
  functions: readonly string[];
}

const CLIENT_GOLANG = 'github.com/prometheus/client_golang';
const PROMETHEUS = `${CLIENT_GOLANG}/prometheus`;
const OTEL = 'go.opentelemetry.io/otel';
const OTEL_CONTRIB = 'go.opentelemetry.io/contrib/instrumentation';

const CONSTRUCTORS = [
  'NewCounter',
  'NewCounterVec',
  'NewGauge',
  'NewGaugeVec',
  'NewHistogram',
  'NewHistogramVec',
  'NewSummary',
  'NewSummaryVec',
];

const PACKAGE_RULES: readonly PackageRule[] = [
  {
    path: PROMETHEUS,
    label: 'prometheus',
    kind: 'metrics',
    functions: [
      ...CONSTRUCTORS,
      'MustRegister',
      'Register',
      'NewRegistry',
      'DefaultRegisterer.MustRegister',
      'DefaultRegisterer.Register',
    ],
  },
  { path: `${PROMETHEUS}/promauto`, label: 'promauto', kind: 'metrics', functions: [...CONSTRUCTORS, 'With'] },
  {
    path: `${PROMETHEUS}/promhttp`,
    label: 'promhttp',
    kind: 'metrics',
    functions: ['Handler', 'HandlerFor', 'InstrumentHandlerCounter', 'InstrumentHandlerDuration'],
  },
  {
    path: OTEL,
    label: 'otel',
    kind: 'tracing',
    functions: ['SetTracerProvider', 'Tracer', 'SetTextMapPropagator'],
  },
  {
    path: `${OTEL}/sdk/trace`,
    label: 'sdktrace',
    kind: 'tracing',
    functions: ['NewTracerProvider', 'WithBatcher', 'NewBatchSpanProcessor', 'WithSpanProcessor'],
  },
  {
    path: `${OTEL}/exporters/otlp/otlptrace`,
    label: 'otlptrace',
    kind: 'tracing',
    functions: ['New'],
  },
  {
    path: `${OTEL}/exporters/otlp/otlptrace/otlptracegrpc`,
    label: 'otlptracegrpc',
    kind: 'tracing',
    functions: ['New', 'NewClient'],
  },
  {
    path: `${OTEL}/exporters/otlp/otlptrace/otlptracehttp`,
    label: 'otlptracehttp',
    kind: 'tracing',
    functions: ['New', 'NewClient'],
  },
  {
    path: `${OTEL_CONTRIB}/github.com/gin-gonic/gin/otelgin`,
    label: 'otelgin',
    kind: 'tracing',
    functions: ['Middleware'],
  },
  {
    path: `${OTEL_CONTRIB}/github.com/labstack/echo/otelecho`,
    label: 'otelecho',
    kind: 'tracing',
    functions: ['Middleware'],
  },
  {
    path: `${OTEL_CONTRIB}/github.com/gorilla/mux/otelmux`,
    label: 'otelmux',
    kind: 'tracing',
    functions: ['Middleware'],
  },
  {
    path: `${OTEL_CONTRIB}/net/http/otelhttp`,
    label: 'otelhttp',
    kind: 'tracing',
    functions: ['NewHandler', 'NewTransport', 'WithRouteTag'],
  },
];

const RULES_BY_PATH = new Map(PACKAGE_RULES.map((rule) => [rule.path, rule]));

/** Methods on metric or tracer values; only counted when the library is imported. */
const RECEIVER_METHODS: Record<TelemetryKind, readonly string[]> = {
  metrics: ['Inc', 'Observe', 'WithLabelValues'],
  tracing: ['Start'],
};

const IMPORT_PREFIXES: Record<TelemetryKind, string> = {
  metrics: CLIENT_GOLANG,
  tracing: 'go.opentelemetry.io/',
};

export const GO_ALLOWLIST = kindRecord((kind) => [
  ...PACKAGE_RULES.filter((rule) => rule.kind === kind).flatMap((rule) =>
    rule.functions.map((fn) => `${rule.label}.${fn}`),
  ),
  ...RECEIVER_METHODS[kind].map((method) => `.${method}`),
]);

const GO_FRAMEWORKS: FrameworkTable = [
  ['github.com/gin-gonic/gin', 'Gin'],
  ['github.com/labstack/echo', 'Echo'],
  ['github.com/go-chi/chi', 'Chi'],
  ['github.com/gorilla/mux', 'Gorilla Mux'],
  ['github.com/gofiber/fiber', 'Fiber'],
];

const VERSION_SEGMENT = /^v\d+(\.\d+)*$/;

/** Package name implied by an import path: `.../chi/v5` is `chi`, `gopkg.in/yaml.v3` is `yaml`. */
export function defaultPackageName(importPath: string): string {
  const parts = importPath.split('/');
  let last = parts[parts.length - 1];
  if (VERSION_SEGMENT.test(last) && parts.length > 1) {
    last = parts[parts.length - 2];
  }
  return last.replace(/\.v\d+$/, '');
}

const IMPORT_SPEC = /(?:([A-Za-z_][A-Za-z0-9_]*|\.|_)[ \t]+)?"([^"\n]+)"/g;
const SINGLE_IMPORT = /^[ \t]*import[ \t]+((?:[A-Za-z_][A-Za-z0-9_]*|\.|_)[ \t]+)?"([^"\n]+)"/gm;
const GROUPED_IMPORT = /^[ \t]*import[ \t]*\(([^)]*)\)/gm;

function toImport(alias: string | undefined, path: string): GoImport {
  const explicit = alias?.trim() || null;
  const name = explicit === null ? defaultPackageName(path) : explicit === '_' || explicit === '.' ? null : explicit;
  return { path, alias: explicit, name };
}

/** Import declarations of a comment-masked Go file (string contents kept). */
export function parseGoImports(source: string): GoImport[] {
  const imports: GoImport[] = [];
  for (const match of source.matchAll(SINGLE_IMPORT)) {
    imports.push(toImport(match[1], match[2]));
  }
  for (const group of source.matchAll(GROUPED_IMPORT)) {
    for (const spec of group[1].matchAll(IMPORT_SPEC)) {
      imports.push(toImport(spec[1], spec[2]));
    }
  }
  return imports;
}

function matchPackageCall(
  site: CallSite,
  aliases: Map<string, string>,
  dotImports: readonly string[],
): PackageRule | null {
  const [head, ...rest] = site.chain;
  if (rest.length > 0) {
    const path = aliases.get(head);
    const rule = path === undefined ? undefined : RULES_BY_PATH.get(path);
    return rule && rule.functions.includes(rest.join('.')) ? rule : null;
  }
  for (const path of dotImports) {
    const rule = RULES_BY_PATH.get(path);
    if (rule?.functions.includes(head)) return rule;
  }
  return null;
}

export function analyzeGoSource(text: string): FileFindings {
  const findings = emptyFindings();
  const imports = parseGoImports(maskSource(text, GO_SYNTAX, { keepStrings: true }));

  const aliases = new Map<string, string>();
  const dotImports: string[] = [];
  for (const imp of imports) {
    if (imp.path.startsWith(IMPORT_PREFIXES.metrics)) findings.imports.add('metrics');
    if (imp.path.startsWith(IMPORT_PREFIXES.tracing)) findings.imports.add('tracing');
    if (imp.name !== null) aliases.set(imp.name, imp.path);
    else if (imp.alias === '.') dotImports.push(imp.path);
  }
  if (findings.imports.size === 0) return findings;

  for (const site of extractCallSites(maskSource(text, GO_SYNTAX))) {
    const rule = matchPackageCall(site, aliases, dotImports);
    if (rule) {
      const fn = site.chain.length === 1 ? site.chain[0] : site.chain.slice(1).join('.');
      findings.usages[rule.kind].add(`${rule.label}.${fn}`);
      continue;
    }

    const [head] = site.chain;
    const packageFunction = site.chain.length === 2 && head !== RESULT_RECEIVER && aliases.has(head);
    if (site.chain.length < 2 || packageFunction) continue;

    const method = site.chain[site.chain.length - 1];
    for (const kind of ['metrics', 'tracing'] as const) {
      if (RECEIVER_METHODS[kind].includes(method)) findings.usages[kind].add(`.${method}`);
    }
  }

  return findings;
}

export const goClassifier: LanguageClassifier = {
  language: 'go',
  sourceExtensions: ['.go'],
  fallbackPatterns: {
    metrics: [
      'http.Handle("/metrics"',
      'promhttp.Handler()',
      'prometheus.MustRegister(',
      'prometheus.NewCounterVec(',
      'promauto.New',
    ],
    tracing: ['tracer.Start(', 'sdktrace.NewTracerProvider(', 'otel.SetTracerProvider(', 'otlptrace'],
  },

  detect(files) {
    return files.some((file) => baseName(file) === 'go.mod');
  },

  async detectFramework(root, files) {
    const [goMod] = shallowestFirst(files.filter((file) => baseName(file) === 'go.mod'));
    if (!goMod) return null;
    const content = await readFileIfExists(join(root, goMod));
    return content === null ? null : frameworkFromContent(content, GO_FRAMEWORKS);
  },

  classify(root, files, context) {
    return classifySourceFiles({
      language: 'go',
      root,
      files,
      extensions: this.sourceExtensions,
      allowlist: GO_ALLOWLIST,
      analyze: analyzeGoSource,
      context,
    });
  },
};
