import { classifySourceFiles } from './base.js';
import { frameworkFromContent, readManifests } from './manifest.js';
import type { FrameworkTable } from './manifest.js';
import { createSubstringAnalyzer } from './substring.js';
import type { SubstringRules } from './substring.js';
import type { LanguageClassifier } from './types.js';

const JAVA_MANIFESTS = ['pom.xml', 'build.gradle', 'build.gradle.kts'];

const JAVA_FRAMEWORKS: FrameworkTable = [
  ['spring-boot', 'Spring Boot'],
  ['io.quarkus', 'Quarkus'],
  ['io.micronaut', 'Micronaut'],
];

export const JAVA_RULES: SubstringRules = {
  importMarkers: {
    metrics: ['io.micrometer.', 'io.prometheus.'],
    tracing: ['io.opentelemetry.'],
  },
  usages: {
    metrics: [
      'MeterRegistry',
      'PrometheusMeterRegistry',
      'Counter.builder(',
      'Timer.builder(',
      'Gauge.builder(',
      'DistributionSummary.builder(',
      '@Timed',
      '@Counted',
      '.increment(',
      'Counter.build(',
      'Histogram.build(',
    ],
    tracing: [
      'spanBuilder(',
      'OtlpGrpcSpanExporter',
      'OtlpHttpSpanExporter',
      'SdkTracerProvider.builder(',
      'BatchSpanProcessor.builder(',
      'GlobalOpenTelemetry.getTracer(',
      'openTelemetry.getTracer(',
      '@WithSpan',
    ],
  },
};

const analyzeJavaSource = createSubstringAnalyzer(JAVA_RULES);

export const javaClassifier: LanguageClassifier = {
  language: 'java',
  sourceExtensions: ['.java', '.kt'],
  fallbackPatterns: JAVA_RULES.usages,

  detect(files) {
    return JAVA_MANIFESTS.some((manifest) => files.includes(manifest));
  },

  async detectFramework(root, files) {
    const content = await readManifests(
      root,
      JAVA_MANIFESTS.filter((manifest) => files.includes(manifest)),
    );
    return frameworkFromContent(content, JAVA_FRAMEWORKS);
  },

  classify(root, files, context) {
    return classifySourceFiles({
      language: 'java',
      root,
      files,
      extensions: this.sourceExtensions,
      allowlist: JAVA_RULES.usages,
      analyze: analyzeJavaSource,
      context,
    });
  },
};
