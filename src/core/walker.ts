import { readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';

/**
 * Directory names that are never descended into: VCS metadata, vendored
 * dependencies, build output and virtual environments.
 */
export const SKIPPED_DIRECTORIES: ReadonlySet<string> = new Set([
  '.git',
  '.hg',
  '.svn',
  'node_modules',
  'vendor',
  'third_party',
  'venv',
  '.venv',
  'env',
  '__pycache__',
  '.tox',
  '.mypy_cache',
  '.pytest_cache',
  'dist',
  'build',
  'target',
  'bin',
  'obj',
  '.gradle',
  '.idea',
  '.next',
  '.cache',
  'coverage',
]);

export interface RepoListing {
  /** Repo-relative `/`-separated file paths, sorted. */
  files: string[];
  /** Directories that could not be read. */
  unreadable: string[];
}

export async function listRepoFiles(root: string): Promise<RepoListing> {
  const files: string[] = [];
  const unreadable: string[] = [];

  async function walk(dir: string, relativeDir: string): Promise<void> {
    let entries;
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (relativeDir === '') throw error;
      unreadable.push(relativeDir);
      return;
    }

    for (const entry of entries) {
      const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        if (SKIPPED_DIRECTORIES.has(entry.name)) continue;
        await walk(join(dir, entry.name), relativePath);
      } else if (entry.isFile()) {
        files.push(relativePath);
      }
    }
  }

  await walk(root, '');
  files.sort();
  return { files, unreadable };
}

export function filterByExtension(files: readonly string[], extensions: readonly string[]): string[] {
  const wanted = new Set(extensions);
  return files.filter((file) => wanted.has(extname(file)));
}

export function baseName(file: string): string {
  const idx = file.lastIndexOf('/');
  return idx === -1 ? file : file.slice(idx + 1);
}
