import { extname } from 'node:path';

import { PlanValidationError } from '../../utils/errors.js';
import { nearestFile } from './layout.js';
import type { DependencyBlock, ProjectLayout } from './layout.js';
import { metricPrefix, sibling } from './paths.js';
import type { PlanBuilder } from './plan-builder.js';
import type { GenerationContext, InstrumentationGenerator } from './types.js';

type ModuleStyle = 'commonjs' | 'esm';

const ESM_EXTENSIONS = new Set(['.mjs', '.ts', '.mts', '.tsx']);
const APP_ANCHOR = 'express()';
const DEPENDENCIES_ANCHOR = '"dependencies": {';

interface EntryShape {
  style: ModuleStyle;
  /** Extension for generated modules, matching the entry file. */
  extension: string;
}

function entryShape(entry: string): EntryShape {
  const ext = extname(entry) || '.js';
  const style = ESM_EXTENSIONS.has(ext) ? 'esm' : 'commonjs';
  return { style, extension: ext === '.tsx' ? '.ts' : ext };
}

/** How the entry file refers to a generated module. */
function specifierFor(name: string, shape: EntryShape): string {
  const runtime: Record<string, string> = { '.ts': '.js', '.mts': '.mjs' };
  return `./${name}${runtime[shape.extension] ?? shape.extension}`;
}

function importLine(shape: EntryShape, names: readonly string[], name: string): string {
  const specifier = specifierFor(name, shape);
  return shape.style === 'esm'
    ? `import { ${names.join(', ')} } from '${specifier}';`
    : `const { ${names.join(', ')} } = require('${specifier}');`;
}

const ASSUMED_BLOCK: DependencyBlock = {
  kind: 'open',
  anchor: DEPENDENCIES_ANCHOR,
  indent: '    ',
  declared: [],
};

function manifestFor(entry: string, layout: ProjectLayout | undefined): string {
  return (layout && nearestFile(layout, 'package.json', entry)) ?? 'package.json';
}

/**
 * Adds `deps` to the manifest's `dependencies`, keeping it valid JSON: into
 * the open block when there is one, as a new block ahead of the first key
 * when there is none. Packages already declared are left alone.
 */
function addDependencies(
  plan: PlanBuilder,
  entry: string,
  layout: ProjectLayout | undefined,
  deps: Record<string, string>,
): void {
  const manifest = manifestFor(entry, layout);
  const found = layout?.dependencyBlocks[manifest] ?? ASSUMED_BLOCK;
  // A block added earlier in this plan is open by the time this edit applies.
  const block: DependencyBlock =
    plan.has(manifest) && found.kind === 'absent'
      ? { kind: 'open', anchor: DEPENDENCIES_ANCHOR, indent: found.indent.repeat(2), declared: [] }
      : found;

  if (block.kind === 'unsupported') {
    throw new PlanValidationError(manifest, `cannot add dependencies: ${block.reason}`);
  }
  const wanted = Object.entries(deps).filter(
    ([name]) => block.kind === 'absent' || !block.declared.includes(name),
  );
  if (wanted.length === 0) return;

  if (block.kind === 'open') {
    const lines = wanted.map(([name, version]) => `${block.indent}"${name}": "${version}",`);
    plan.modify(manifest, lines.join('\n'), block.anchor);
    return;
  }
  const entries = wanted.map(([name, version]) => `${block.indent}${block.indent}"${name}": "${version}"`);
  const lines = [`${block.indent}"dependencies": {`, entries.join(',\n'), `${block.indent}},`];
  plan.modify(manifest, lines.join('\n'), block.anchor);
}

function metricsModule(style: ModuleStyle, service: string): string {
  const prefix = metricPrefix(service);
  const header =
    style === 'esm' ? "import client from 'prom-client';" : "const client = require('prom-client');";
  const footer =
    style === 'esm'
      ? 'export { register, metricsMiddleware, metricsHandler };'
      : 'module.exports = { register, metricsMiddleware, metricsHandler };';

  return `${header}

const register = new client.Registry();
client.collectDefaultMetrics({ register });

const httpRequestsTotal = new client.Counter({
  name: '${prefix}_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'endpoint', 'status'],
  registers: [register],
});

const httpRequestDuration = new client.Histogram({
  name: '${prefix}_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'endpoint', 'status'],
  registers: [register],
});

function metricsMiddleware(req, res, next) {
  const stopTimer = httpRequestDuration.startTimer();
  res.on('finish', () => {
    const labels = {
      method: req.method,
      endpoint: req.route ? req.route.path : req.path,
      status: String(res.statusCode),
    };
    httpRequestsTotal.inc(labels);
    stopTimer(labels);
  });
  next();
}

async function metricsHandler(req, res) {
  res.set('Content-Type', register.contentType);
  res.end(await register.metrics());
}

${footer}
`;
}

function tracingModule(style: ModuleStyle, service: string, endpoint: string): string {
  const url = /^[a-z]+:\/\//i.test(endpoint) ? endpoint : `http://${endpoint}`;
  const header =
    style === 'esm'
      ? `import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc';
import { Resource } from '@opentelemetry/resources';
import { NodeSDK } from '@opentelemetry/sdk-node';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';`
      : `const { getNodeAutoInstrumentations } = require('@opentelemetry/auto-instrumentations-node');
const { OTLPTraceExporter } = require('@opentelemetry/exporter-trace-otlp-grpc');
const { Resource } = require('@opentelemetry/resources');
const { NodeSDK } = require('@opentelemetry/sdk-node');
const { SemanticResourceAttributes } = require('@opentelemetry/semantic-conventions');`;
  const footer = style === 'esm' ? 'export { startTracing };' : 'module.exports = { startTracing };';

  return `${header}

function startTracing() {
  const sdk = new NodeSDK({
    resource: new Resource({
      [SemanticResourceAttributes.SERVICE_NAME]: '${service}',
    }),
    traceExporter: new OTLPTraceExporter({ url: '${url}' }),
    instrumentations: [getNodeAutoInstrumentations()],
  });
  sdk.start();

  process.on('SIGTERM', () => {
    sdk.shutdown().finally(() => process.exit(0));
  });
  return sdk;
}

${footer}
`;
}

export const nodeGenerator: InstrumentationGenerator = {
  language: 'nodejs',
  defaultEntry: 'index.js',
  entryFromCandidates: true,

  addMetrics(plan, { service, entry, layout }: GenerationContext) {
    const shape = entryShape(entry);
    const wiring = importLine(shape, ['metricsMiddleware', 'metricsHandler'], 'metrics');
    addDependencies(plan, entry, layout, { 'prom-client': '^15.1.0' });
    plan
      .create(sibling(entry, `metrics${shape.extension}`), metricsModule(shape.style, service))
      .append(entry, wiring, APP_ANCHOR)
      .modify(entry, "app.use(metricsMiddleware);\napp.get('/metrics', metricsHandler);", wiring);
  },

  addTracing(plan, { service, collectorEndpoint, entry, layout }: GenerationContext) {
    const shape = entryShape(entry);
    const wiring = importLine(shape, ['startTracing'], 'tracing');
    const deps = {
      '@opentelemetry/auto-instrumentations-node': '^0.47.0',
      '@opentelemetry/exporter-trace-otlp-grpc': '^0.52.0',
      '@opentelemetry/resources': '^1.25.0',
      '@opentelemetry/sdk-node': '^0.52.0',
      '@opentelemetry/semantic-conventions': '^1.25.0',
    };
    addDependencies(plan, entry, layout, deps);
    plan
      .create(
        sibling(entry, `tracing${shape.extension}`),
        tracingModule(shape.style, service, collectorEndpoint),
      )
      .append(entry, wiring, APP_ANCHOR)
      .modify(entry, 'startTracing();', wiring);
  },
};
