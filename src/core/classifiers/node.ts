import { extname, join } from 'node:path';

import ts from 'typescript';
import { z } from 'zod';

import { readFileIfExists } from '../../utils/fs.js';
import type { TelemetryKind } from '../types.js';
import { classifySourceFiles, emptyFindings, kindRecord } from './base.js';
import { RESULT_RECEIVER } from './call-sites.js';
import type { FileFindings, LanguageClassifier } from './types.js';

/** What a local identifier refers to: a module plus a member path inside it. */
export interface ModuleBinding {
  module: string;
  path: readonly string[];
}

export interface NodeImports {
  bindings: Map<string, ModuleBinding>;
  /** Every module loaded by import, import-equals, require or dynamic import. */
  modules: string[];
}

const METRICS_MODULE = 'prom-client';
const TRACING_SCOPE = '@opentelemetry/';

function moduleKind(module: string): TelemetryKind | null {
  if (module === METRICS_MODULE) return 'metrics';
  if (module.startsWith(TRACING_SCOPE)) return 'tracing';
  return null;
}

const CALLABLES: Record<TelemetryKind, readonly string[]> = {
  metrics: [
    'Counter',
    'Gauge',
    'Histogram',
    'Summary',
    'Registry',
    'collectDefaultMetrics',
    'register.metrics',
    'register.registerMetric',
  ],
  tracing: [
    'NodeSDK',
    'NodeTracerProvider',
    'BasicTracerProvider',
    'BatchSpanProcessor',
    'SimpleSpanProcessor',
    'OTLPTraceExporter',
    'registerInstrumentations',
    'getNodeAutoInstrumentations',
    'trace.getTracer',
    'trace.setGlobalTracerProvider',
  ],
};

const METHODS: Record<TelemetryKind, readonly string[]> = {
  metrics: ['inc', 'observe', 'set', 'startTimer'],
  tracing: ['startSpan', 'startActiveSpan'],
};

export const NODE_ALLOWLIST = kindRecord((kind) => [
  ...CALLABLES[kind],
  ...METHODS[kind].map((method) => `.${method}`),
]);

export const NODE_EXTENSIONS = ['.js', '.jsx', '.mjs', '.cjs', '.ts', '.tsx', '.mts', '.cts'];
const DECLARATION_FILE = /\.d\.[cm]?ts$/;

const packageJsonSchema = z
  .object({
    dependencies: z.record(z.string()).optional(),
    devDependencies: z.record(z.string()).optional(),
  })
  .passthrough();

/** Checked in order: Nest apps also depend on express. */
const NODE_FRAMEWORKS: readonly (readonly [dependency: string, label: string])[] = [
  ['@nestjs/core', 'NestJS'],
  ['fastify', 'Fastify'],
  ['koa', 'Koa'],
  ['express', 'Express'],
];

function scriptKindFor(file: string): ts.ScriptKind {
  switch (extname(file)) {
    case '.tsx':
      return ts.ScriptKind.TSX;
    case '.jsx':
      return ts.ScriptKind.JSX;
    case '.ts':
    case '.mts':
    case '.cts':
      return ts.ScriptKind.TS;
    default:
      return ts.ScriptKind.JS;
  }
}

/** `require('x')` or `import('x')` with a literal specifier. */
function loadedModule(node: ts.Node): string | null {
  if (!ts.isCallExpression(node) || node.arguments.length !== 1) return null;
  const [arg] = node.arguments;
  if (!ts.isStringLiteralLike(arg)) return null;
  const isRequire = ts.isIdentifier(node.expression) && node.expression.text === 'require';
  const isDynamicImport = node.expression.kind === ts.SyntaxKind.ImportKeyword;
  return isRequire || isDynamicImport ? arg.text : null;
}

function bindDeclaration(decl: ts.VariableDeclaration, bindings: Map<string, ModuleBinding>): void {
  if (!decl.initializer) return;
  const path: string[] = [];
  let target: ts.Expression = decl.initializer;
  while (ts.isPropertyAccessExpression(target)) {
    path.unshift(target.name.text);
    target = target.expression;
  }
  const module = loadedModule(target);
  if (module === null) return;

  if (ts.isIdentifier(decl.name)) {
    bindings.set(decl.name.text, { module, path });
    return;
  }
  if (!ts.isObjectBindingPattern(decl.name)) return;
  for (const element of decl.name.elements) {
    if (!ts.isIdentifier(element.name)) continue;
    const key =
      element.propertyName && ts.isIdentifier(element.propertyName) ? element.propertyName.text : element.name.text;
    bindings.set(element.name.text, { module, path: [...path, key] });
  }
}

function bindImport(node: ts.ImportDeclaration, bindings: Map<string, ModuleBinding>): string | null {
  if (!ts.isStringLiteral(node.moduleSpecifier)) return null;
  const module = node.moduleSpecifier.text;
  const clause = node.importClause;
  if (clause?.isTypeOnly) return null;
  if (!clause) return module;

  if (clause.name) bindings.set(clause.name.text, { module, path: [] });
  const named = clause.namedBindings;
  if (named && ts.isNamespaceImport(named)) {
    bindings.set(named.name.text, { module, path: [] });
  } else if (named) {
    for (const element of named.elements) {
      if (element.isTypeOnly) continue;
      const imported = (element.propertyName ?? element.name).text;
      bindings.set(element.name.text, { module, path: [imported] });
    }
  }
  return module;
}

export function collectNodeImports(source: ts.SourceFile): NodeImports {
  const bindings = new Map<string, ModuleBinding>();
  const modules: string[] = [];

  const visit = (node: ts.Node): void => {
    if (ts.isImportDeclaration(node)) {
      const module = bindImport(node, bindings);
      if (module !== null) modules.push(module);
    } else if (
      ts.isImportEqualsDeclaration(node) &&
      ts.isExternalModuleReference(node.moduleReference) &&
      ts.isStringLiteral(node.moduleReference.expression)
    ) {
      const module = node.moduleReference.expression.text;
      modules.push(module);
      bindings.set(node.name.text, { module, path: [] });
    } else if (ts.isVariableDeclaration(node)) {
      bindDeclaration(node, bindings);
    } else {
      const module = loadedModule(node);
      if (module !== null) modules.push(module);
    }
    ts.forEachChild(node, visit);
  };

  visit(source);
  return { bindings, modules };
}

/** Selector chain of a callee; anything that is not a plain name or member access becomes '()'. */
export function calleeChain(expr: ts.Expression): string[] {
  if (ts.isIdentifier(expr)) return [expr.text];
  if (ts.isPropertyAccessExpression(expr)) return [...calleeChain(expr.expression), expr.name.text];
  return [RESULT_RECEIVER];
}

export function analyzeNodeSource(text: string, file: string): FileFindings {
  const findings = emptyFindings();
  const source = ts.createSourceFile(file, text, ts.ScriptTarget.Latest, false, scriptKindFor(file));
  const { bindings, modules } = collectNodeImports(source);

  for (const module of modules) {
    const kind = moduleKind(module);
    if (kind) findings.imports.add(kind);
  }
  if (findings.imports.size === 0) return findings;

  const record = (callee: ts.Expression): void => {
    const [head, ...rest] = calleeChain(callee);
    const binding = bindings.get(head);
    const kind = binding ? moduleKind(binding.module) : null;
    if (binding && kind) {
      const qualified = [...binding.path, ...rest].join('.');
      if (CALLABLES[kind].includes(qualified)) {
        findings.usages[kind].add(qualified);
        return;
      }
    }
    if (rest.length === 0) return;
    const method = rest[rest.length - 1];
    for (const k of ['metrics', 'tracing'] as const) {
      if (METHODS[k].includes(method)) findings.usages[k].add(`.${method}`);
    }
  };

  const visit = (node: ts.Node): void => {
    if (ts.isCallExpression(node) || ts.isNewExpression(node)) record(node.expression);
    ts.forEachChild(node, visit);
  };
  visit(source);

  return findings;
}

export const nodeClassifier: LanguageClassifier = {
  language: 'nodejs',
  sourceExtensions: NODE_EXTENSIONS,
  fallbackPatterns: {
    metrics: ["require('prom-client')", "from 'prom-client'", 'collectDefaultMetrics(', 'new client.Counter('],
    tracing: ['new NodeSDK(', 'NodeTracerProvider(', 'startActiveSpan(', 'registerInstrumentations('],
  },

  detect(files) {
    return files.includes('package.json');
  },

  async detectFramework(root) {
    const raw = await readFileIfExists(join(root, 'package.json'));
    if (raw === null) return null;
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return null;
    }
    const parsed = packageJsonSchema.safeParse(json);
    if (!parsed.success) return null;
    const deps = { ...parsed.data.devDependencies, ...parsed.data.dependencies };
    const match = NODE_FRAMEWORKS.find(([dependency]) => dependency in deps);
    return match ? match[1] : null;
  },

  classify(root, files, context) {
    return classifySourceFiles({
      language: 'nodejs',
      root,
      files: files.filter((file) => !DECLARATION_FILE.test(file)),
      extensions: this.sourceExtensions,
      allowlist: NODE_ALLOWLIST,
      analyze: analyzeNodeSource,
      context,
    });
  },
};
