import { classifySourceFiles } from './base.js';
import { frameworkFromContent, readManifests } from './manifest.js';
import type { FrameworkTable } from './manifest.js';
import { createSubstringAnalyzer } from './substring.js';
import type { SubstringRules } from './substring.js';
import type { LanguageClassifier } from './types.js';

const RUST_FRAMEWORKS: FrameworkTable = [
  ['actix-web', 'Actix Web'],
  ['axum', 'Axum'],
  ['rocket', 'Rocket'],
];

export const RUST_RULES: SubstringRules = {
  importMarkers: {
    metrics: ['use prometheus', 'prometheus::', 'metrics_exporter_prometheus', 'extern crate prometheus'],
    tracing: [
      'use opentelemetry',
      'opentelemetry::',
      'opentelemetry_otlp::',
      'opentelemetry_sdk::',
      'tracing_opentelemetry',
    ],
  },
  usages: {
    metrics: [
      'register_counter!',
      'register_counter_vec!',
      'register_histogram!',
      'register_histogram_vec!',
      'register_int_counter!',
      'register_gauge!',
      'Registry::new(',
      'TextEncoder::new(',
      'PrometheusBuilder::new(',
      'prometheus::register(',
      '.inc()',
      '.observe(',
    ],
    tracing: [
      'new_pipeline()',
      'TracerProvider::builder(',
      'set_tracer_provider(',
      'global::tracer(',
      'with_batch_exporter(',
      '.start(',
      'OpenTelemetryLayer::new(',
      'tracing_opentelemetry::layer(',
    ],
  },
};

const analyzeRustSource = createSubstringAnalyzer(RUST_RULES);

export const rustClassifier: LanguageClassifier = {
  language: 'rust',
  sourceExtensions: ['.rs'],
  fallbackPatterns: RUST_RULES.usages,

  detect(files) {
    return files.includes('Cargo.toml');
  },

  async detectFramework(root) {
    return frameworkFromContent(await readManifests(root, ['Cargo.toml']), RUST_FRAMEWORKS);
  },

  classify(root, files, context) {
    return classifySourceFiles({
      language: 'rust',
      root,
      files,
      extensions: this.sourceExtensions,
      allowlist: RUST_RULES.usages,
      analyze: analyzeRustSource,
      context,
    });
  },
};
