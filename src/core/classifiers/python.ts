import { extname } from 'node:path';

import { PYTHON_SYNTAX, maskSource } from '../source-text.js';
import type { TelemetryKind } from '../types.js';
import { classifySourceFiles, emptyFindings, kindRecord } from './base.js';
import { RESULT_RECEIVER, extractCallSites } from './call-sites.js';
import { frameworkFromContent, isRootFile, readManifests } from './manifest.js';
import type { FrameworkTable } from './manifest.js';
import type { FileFindings, LanguageClassifier } from './types.js';

export interface PythonImports {
  /** Local name → fully qualified dotted name. */
  bindings: Map<string, string>;
  /** Modules imported with `from x import *`. */
  starModules: string[];
  /** Every module named by an import statement. */
  modules: string[];
}

const LIBRARY_ROOTS: Record<TelemetryKind, string> = {
  metrics: 'prometheus_client',
  tracing: 'opentelemetry',
};

const CALLABLES: Record<TelemetryKind, readonly string[]> = {
  metrics: [
    'Counter',
    'Histogram',
    'Gauge',
    'Summary',
    'start_http_server',
    'generate_latest',
    'make_wsgi_app',
    'make_asgi_app',
  ],
  tracing: [
    'TracerProvider',
    'BatchSpanProcessor',
    'OTLPSpanExporter',
    'set_tracer_provider',
    'get_tracer',
    'FlaskInstrumentor',
    'FastAPIInstrumentor',
  ],
};

const METHODS: Record<TelemetryKind, readonly string[]> = {
  metrics: ['inc', 'observe', 'set'],
  tracing: ['start_as_current_span', 'start_span', 'instrument', 'instrument_app'],
};

export const PYTHON_ALLOWLIST = kindRecord((kind) => [
  ...CALLABLES[kind],
  ...METHODS[kind].map((method) => `.${method}`),
]);

/** Web app constructors recognised in source, by qualified name. */
const APP_CONSTRUCTORS: Record<string, string> = {
  'flask.Flask': 'Flask',
  'fastapi.FastAPI': 'FastAPI',
};

const PYTHON_MANIFESTS = ['requirements.txt', 'pyproject.toml', 'setup.py', 'Pipfile'];

const PYTHON_FRAMEWORKS: FrameworkTable = [
  ['fastapi', 'FastAPI'],
  ['flask', 'Flask'],
  ['django', 'Django'],
];

const FROM_IMPORT = /^[ \t]*from[ \t]+([\w.]+)[ \t]+import[ \t]+(\([^)]*\)|[^\n]*)/gm;
const PLAIN_IMPORT = /^[ \t]*import[ \t]+([^\n]+)/gm;

function importItems(list: string): { name: string; alias: string | null }[] {
  return list
    .replace(/[()\\]/g, ' ')
    .split(',')
    .map((item) => item.trim().split(/\s+/))
    .filter((words) => words[0])
    .map((words) => ({ name: words[0], alias: words[1] === 'as' && words[2] ? words[2] : null }));
}

/** Import statements of a comment- and string-masked Python file. */
export function parsePythonImports(masked: string): PythonImports {
  const bindings = new Map<string, string>();
  const starModules: string[] = [];
  const modules: string[] = [];

  for (const match of masked.matchAll(PLAIN_IMPORT)) {
    for (const { name, alias } of importItems(match[1])) {
      modules.push(name);
      if (alias) bindings.set(alias, name);
      else bindings.set(name.split('.')[0], name.split('.')[0]);
    }
  }

  for (const match of masked.matchAll(FROM_IMPORT)) {
    const module = match[1];
    modules.push(module);
    for (const { name, alias } of importItems(match[2])) {
      if (name === '*') starModules.push(module);
      else bindings.set(alias ?? name, `${module}.${name}`);
    }
  }

  return { bindings, starModules, modules };
}

function underRoot(qualified: string, root: string): boolean {
  return qualified === root || qualified.startsWith(`${root}.`);
}

export function analyzePythonSource(text: string): FileFindings {
  const findings = emptyFindings();
  const masked = maskSource(text, PYTHON_SYNTAX);
  const { bindings, starModules, modules } = parsePythonImports(masked);

  for (const kind of ['metrics', 'tracing'] as const) {
    if (modules.some((module) => underRoot(module, LIBRARY_ROOTS[kind]))) findings.imports.add(kind);
  }

  for (const site of extractCallSites(masked)) {
    const [head, ...rest] = site.chain;
    const last = site.chain[site.chain.length - 1];
    const bound = head === RESULT_RECEIVER ? undefined : bindings.get(head);

    if (bound !== undefined) {
      const qualified = [bound, ...rest].join('.');
      // Renamed imports resolve to the library's own name.
      const name = qualified.slice(qualified.lastIndexOf('.') + 1);
      findings.framework ??= APP_CONSTRUCTORS[qualified];
      const kind = (['metrics', 'tracing'] as const).find(
        (k) => underRoot(qualified, LIBRARY_ROOTS[k]) && CALLABLES[k].includes(name),
      );
      if (kind) {
        findings.usages[kind].add(name);
        continue;
      }
    } else if (site.chain.length === 1) {
      for (const kind of ['metrics', 'tracing'] as const) {
        const starred = starModules.some((module) => underRoot(module, LIBRARY_ROOTS[kind]));
        if (starred && CALLABLES[kind].includes(head)) findings.usages[kind].add(head);
      }
      continue;
    }

    if (site.chain.length < 2) continue;
    for (const kind of ['metrics', 'tracing'] as const) {
      if (METHODS[kind].includes(last)) findings.usages[kind].add(`.${last}`);
    }
  }

  return findings;
}

export const pythonClassifier: LanguageClassifier = {
  language: 'python',
  sourceExtensions: ['.py'],
  fallbackPatterns: {
    metrics: ['prometheus_client', 'start_http_server(', 'generate_latest(', 'Counter(', 'Histogram('],
    tracing: ['TracerProvider(', 'BatchSpanProcessor(', 'start_as_current_span(', 'FlaskInstrumentor'],
  },

  detect(files) {
    return files.some(
      (file) => (isRootFile(file) && PYTHON_MANIFESTS.includes(file)) || extname(file) === '.py',
    );
  },

  async detectFramework(root, files) {
    const present = PYTHON_MANIFESTS.filter((manifest) => files.includes(manifest));
    const content = await readManifests(root, present);
    return frameworkFromContent(content.toLowerCase(), PYTHON_FRAMEWORKS);
  },

  classify(root, files, context) {
    return classifySourceFiles({
      language: 'python',
      root,
      files,
      extensions: this.sourceExtensions,
      allowlist: PYTHON_ALLOWLIST,
      analyze: analyzePythonSource,
      context,
    });
  },
};
