import { join } from 'node:path';

import { readFileIfExists } from '../../utils/fs.js';

/** Ordered [needle, label] pairs; the first needle found wins. */
export type FrameworkTable = readonly (readonly [needle: string, label: string])[];

export function frameworkFromContent(content: string, table: FrameworkTable): string | null {
  for (const [needle, label] of table) {
    if (content.includes(needle)) return label;
  }
  return null;
}

/** Reads the given repo-relative manifests that exist, concatenated in order. */
export async function readManifests(root: string, paths: readonly string[]): Promise<string> {
  const parts: string[] = [];
  for (const path of paths) {
    const content = await readFileIfExists(join(root, path));
    if (content !== null) parts.push(content);
  }
  return parts.join('\n');
}

export function isRootFile(file: string): boolean {
  return !file.includes('/');
}

/** Shallowest match first, then lexical order. */
export function shallowestFirst(files: readonly string[]): string[] {
  const depth = (file: string) => file.split('/').length;
  return [...files].sort((a, b) => depth(a) - depth(b) || (a < b ? -1 : a > b ? 1 : 0));
}
