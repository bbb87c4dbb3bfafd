import { join } from 'node:path';

import { z } from 'zod';

import { errorMessage } from '../../utils/errors.js';
import { readFileIfExists } from '../../utils/fs.js';
import { baseName, listRepoFiles } from '../walker.js';
import { dirOf } from './paths.js';

/**
 * Where new entries can go in a package.json `dependencies` object.
 * `indent` is the indentation the inserted lines take.
 */
export type DependencyBlock =
  | { kind: 'open'; anchor: string; indent: string; declared: readonly string[] }
  | { kind: 'absent'; anchor: string; indent: string }
  | { kind: 'unsupported'; reason: string };

/** Facts about a working tree that decide where plan edits land. */
export interface ProjectLayout {
  /** Repo-relative files, sorted. */
  readonly files: readonly string[];
  /** Dependency block of every package.json, by path. */
  readonly dependencyBlocks: Readonly<Record<string, DependencyBlock>>;
}

const manifestSchema = z
  .object({ dependencies: z.record(z.string()).optional() })
  .passthrough();

const OPEN_DEPENDENCIES = /^\s*"dependencies"\s*:\s*\{\s*$/;

function leadingSpace(line: string): string {
  return /^\s*/.exec(line)?.[0] ?? '';
}

/** Reads how a package.json declares its dependencies. */
export function dependencyBlockOf(text: string): DependencyBlock {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return { kind: 'unsupported', reason: `not valid JSON (${errorMessage(error)})` };
  }
  const manifest = manifestSchema.safeParse(parsed);
  if (!manifest.success) return { kind: 'unsupported', reason: 'not a JSON object' };

  const lines = text.split('\n');
  const { dependencies } = manifest.data;

  if (dependencies === undefined) {
    const first = lines.findIndex((line) => line.trim() !== '');
    const key = lines.slice(first + 1).find((line) => line.trim() !== '');
    if (lines[first]?.trim() !== '{' || key === undefined || key.trim().startsWith('}')) {
      return { kind: 'unsupported', reason: 'no dependencies object and no top-level key to place one before' };
    }
    return { kind: 'absent', anchor: '{', indent: leadingSpace(key) || '  ' };
  }

  const declared = Object.keys(dependencies);
  const index = lines.findIndex((line) => OPEN_DEPENDENCIES.test(line));
  if (index === -1 || declared.length === 0) {
    return { kind: 'unsupported', reason: 'dependencies must span several lines and list at least one package' };
  }
  const outer = leadingSpace(lines[index]);
  const next = lines[index + 1] ?? '';
  return {
    kind: 'open',
    anchor: lines[index].trim(),
    indent: leadingSpace(next).length > outer.length ? leadingSpace(next) : `${outer}  `,
    declared,
  };
}

export function hasFile(layout: ProjectLayout | undefined, path: string): boolean {
  return layout === undefined || layout.files.includes(path);
}

/** `name` in the directory of `from` or the closest parent that holds one. */
export function nearestFile(layout: ProjectLayout, name: string, from: string): string | undefined {
  let dir = dirOf(from);
  for (;;) {
    const candidate = dir ? `${dir}/${name}` : name;
    if (layout.files.includes(candidate)) return candidate;
    if (dir === '') return undefined;
    dir = dirOf(dir);
  }
}

/** Shallowest matching file; ties go to the first in sort order. */
export function findFile(layout: ProjectLayout, test: (file: string) => boolean): string | undefined {
  const depth = (file: string) => file.split('/').length;
  let best: string | undefined;
  for (const file of layout.files) {
    if (test(file) && (best === undefined || depth(file) < depth(best))) best = file;
  }
  return best;
}

/** Walks `root` and records its files and package.json shapes. */
export async function inspectLayout(root: string): Promise<ProjectLayout> {
  const { files } = await listRepoFiles(root);
  const dependencyBlocks: Record<string, DependencyBlock> = {};
  for (const file of files) {
    if (baseName(file) !== 'package.json') continue;
    const text = await readFileIfExists(join(root, file));
    if (text !== null) dependencyBlocks[file] = dependencyBlockOf(text);
  }
  return { files, dependencyBlocks };
}
