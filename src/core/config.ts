import { readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

import { ConfigError, errorMessage } from '../utils/errors.js';
import { fileExists } from '../utils/fs.js';

export const CONFIG_FILENAME = 'tracewright.config.json';

export const DEFAULT_COLLECTOR_ENDPOINT = 'otel-collector.observability.svc.cluster.local:4317';
export const DEFAULT_CLONE_TIMEOUT_MS = 120_000;

const serviceName = z.string().min(1).optional();

const serviceNamesSchema = z
  .object({
    go: serviceName,
    python: serviceName,
    java: serviceName,
    nodejs: serviceName,
    dotnet: serviceName,
    rust: serviceName,
  })
  .strict();

const configSchema = z
  .object({
    collectorEndpoint: z.string().min(1).default(DEFAULT_COLLECTOR_ENDPOINT),
    cloneTimeoutMs: z.number().int().positive().default(DEFAULT_CLONE_TIMEOUT_MS),
    scratchDir: z.string().min(1).default(join(tmpdir(), 'tracewright')),
    serviceNames: serviceNamesSchema.default({}),
  })
  .strict();

export type TracewrightConfig = z.infer<typeof configSchema>;

export function defaultConfig(): TracewrightConfig {
  return configSchema.parse({});
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.TRACEWRIGHT_COLLECTOR_ENDPOINT) {
    overrides.collectorEndpoint = env.TRACEWRIGHT_COLLECTOR_ENDPOINT;
  }
  if (env.TRACEWRIGHT_CLONE_TIMEOUT_MS) {
    const timeout = Number(env.TRACEWRIGHT_CLONE_TIMEOUT_MS);
    if (!Number.isFinite(timeout)) {
      throw new ConfigError(
        `TRACEWRIGHT_CLONE_TIMEOUT_MS must be a number, got "${env.TRACEWRIGHT_CLONE_TIMEOUT_MS}"`,
      );
    }
    overrides.cloneTimeoutMs = timeout;
  }
  if (env.TRACEWRIGHT_SCRATCH_DIR) {
    overrides.scratchDir = env.TRACEWRIGHT_SCRATCH_DIR;
  }
  return overrides;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Loads tracewright.config.json from `dir` (optional) and layers environment
 * overrides on top. Environment wins over the file.
 */
export async function loadConfig(
  dir: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<TracewrightConfig> {
  const configPath = join(dir, CONFIG_FILENAME);
  let fromFile: Record<string, unknown> = {};

  if (await fileExists(configPath)) {
    const raw = await readFile(configPath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ConfigError(`${CONFIG_FILENAME} is not valid JSON: ${errorMessage(error)}`);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigError(`${CONFIG_FILENAME} must contain a JSON object`);
    }
    fromFile = { ...parsed };
  }

  const result = configSchema.safeParse({ ...fromFile, ...envOverrides(env) });
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}
