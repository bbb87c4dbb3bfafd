import { RequestAlreadySatisfiedError } from '../utils/errors.js';
import { modeFromDetection } from './toggle-spec.js';
import { LANGUAGE_LABELS, modeIncludes } from './types.js';
import type { FrameworkDetection, TelemetryMode } from './types.js';

export type DetectedTelemetry = Pick<FrameworkDetection, 'language' | 'hasMetrics' | 'hasTracing'>;

/**
 * Narrows a requested mode to the parts the service still lacks.
 * `none` passes through; a request with nothing left to add is rejected.
 */
export function resolveRequestedMode(
  detection: DetectedTelemetry,
  requested: TelemetryMode,
): TelemetryMode {
  if (requested === 'none') return 'none';

  const addMetrics = modeIncludes(requested, 'metrics') && !detection.hasMetrics;
  const addTracing = modeIncludes(requested, 'tracing') && !detection.hasTracing;
  if (!addMetrics && !addTracing) {
    throw new RequestAlreadySatisfiedError(LANGUAGE_LABELS[detection.language], requested);
  }
  return modeFromDetection(addMetrics, addTracing);
}

/** The mode that would add everything the service lacks. */
export function missingMode(detection: DetectedTelemetry): TelemetryMode {
  return modeFromDetection(!detection.hasMetrics, !detection.hasTracing);
}
