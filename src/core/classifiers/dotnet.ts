import { extname } from 'node:path';

import { classifySourceFiles } from './base.js';
import { isRootFile, readManifests } from './manifest.js';
import { createSubstringAnalyzer } from './substring.js';
import type { SubstringRules } from './substring.js';
import type { LanguageClassifier } from './types.js';

export const DOTNET_RULES: SubstringRules = {
  importMarkers: {
    metrics: ['using Prometheus', 'Prometheus.'],
    tracing: ['using OpenTelemetry', 'using System.Diagnostics', 'OpenTelemetry.'],
  },
  usages: {
    metrics: [
      'UsePrometheusServer',
      'UseHttpMetrics',
      'MapMetrics',
      'Metrics.CreateCounter(',
      'Metrics.CreateHistogram(',
      'Metrics.CreateGauge(',
      'AddPrometheusExporter',
      'MapPrometheusScrapingEndpoint',
      '.Inc(',
    ],
    tracing: [
      'new ActivitySource(',
      'StartActivity(',
      'AddOpenTelemetry(',
      'WithTracing(',
      'AddOtlpExporter(',
      'CreateTracerProviderBuilder(',
      'AddAspNetCoreInstrumentation(',
    ],
  },
};

const WEB_SDK_MARKERS = ['Microsoft.NET.Sdk.Web', 'Microsoft.AspNetCore'];

function rootProjectFiles(files: readonly string[], extensions: readonly string[]): string[] {
  return files.filter((file) => isRootFile(file) && extensions.includes(extname(file)));
}

const analyzeDotnetSource = createSubstringAnalyzer(DOTNET_RULES);

export const dotnetClassifier: LanguageClassifier = {
  language: 'dotnet',
  sourceExtensions: ['.cs'],
  fallbackPatterns: DOTNET_RULES.usages,

  detect(files) {
    return rootProjectFiles(files, ['.csproj', '.sln']).length > 0;
  },

  async detectFramework(root, files) {
    const content = await readManifests(root, rootProjectFiles(files, ['.csproj']));
    return WEB_SDK_MARKERS.some((marker) => content.includes(marker)) ? 'ASP.NET Core' : null;
  },

  classify(root, files, context) {
    return classifySourceFiles({
      language: 'dotnet',
      root,
      files,
      extensions: this.sourceExtensions,
      allowlist: DOTNET_RULES.usages,
      analyze: analyzeDotnetSource,
      context,
    });
  },
};
