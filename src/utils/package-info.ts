import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

export interface PackageInfo {
  name: string;
  version: string;
  description: string;
}

const packageSchema = z.object({
  name: z.string().default('tracewright'),
  version: z.string(),
  description: z.string().default(''),
});

function readJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    return null;
  }
}

/**
 * Read package.json by walking up from the current file's directory.
 * Works both in source (src/) and compiled (dist/) contexts.
 */
export function getPackageInfo(): PackageInfo {
  let dir = dirname(fileURLToPath(import.meta.url));

  while (true) {
    const parsed = packageSchema.safeParse(readJson(join(dir, 'package.json')));
    if (parsed.success) return parsed.data;

    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return { name: 'tracewright', version: '0.0.0', description: '' };
}
