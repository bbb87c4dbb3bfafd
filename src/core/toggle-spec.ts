import { parse } from 'yaml';
import { z } from 'zod';

import { ConfigError, errorMessage } from '../utils/errors.js';
import { TELEMETRY_MODES, modeIncludes } from './types.js';
import type { TelemetryMode } from './types.js';

export function modeFromDetection(hasMetrics: boolean, hasTracing: boolean): TelemetryMode {
  if (hasMetrics && hasTracing) return 'both';
  if (hasMetrics) return 'metrics';
  if (hasTracing) return 'traces';
  return 'none';
}

/**
 * Per-environment toggle document for a service. One fixed shape per mode;
 * the text depends only on the arguments.
 */
export function renderToggleSpec(serviceName: string, mode: TelemetryMode): string {
  const name = serviceName.replace(/[\r\n]+/g, ' ');
  return [
    `# ToggleSpec for ${name}`,
    `telemetry_mode: ${mode}`,
    'metrics:',
    `  enabled: ${modeIncludes(mode, 'metrics')}`,
    'tracing:',
    `  enabled: ${modeIncludes(mode, 'tracing')}`,
    '',
  ].join('\n');
}

const toggleSpecSchema = z
  .object({
    telemetry_mode: z.enum(TELEMETRY_MODES),
    metrics: z.object({ enabled: z.boolean() }),
    tracing: z.object({ enabled: z.boolean() }),
  })
  .refine(
    (spec) =>
      spec.metrics.enabled === modeIncludes(spec.telemetry_mode, 'metrics') &&
      spec.tracing.enabled === modeIncludes(spec.telemetry_mode, 'tracing'),
    { message: 'enabled flags disagree with telemetry_mode' },
  );

export interface ToggleSpec {
  mode: TelemetryMode;
  metricsEnabled: boolean;
  tracingEnabled: boolean;
}

export function parseToggleSpec(text: string): ToggleSpec {
  let doc: unknown;
  try {
    doc = parse(text);
  } catch (error) {
    throw new ConfigError(`Toggle spec is not valid YAML: ${errorMessage(error)}`);
  }
  const result = toggleSpecSchema.safeParse(doc);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid toggle spec: ${issues.join('; ')}`);
  }
  return {
    mode: result.data.telemetry_mode,
    metricsEnabled: result.data.metrics.enabled,
    tracingEnabled: result.data.tracing.enabled,
  };
}
