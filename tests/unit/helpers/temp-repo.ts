import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export type FileMap = Record<string, string>;

/** Writes `files` (repo-relative path → content) under `root`. */
export async function writeFiles(root: string, files: FileMap): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    const target = join(root, path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, 'utf-8');
  }
}

export async function createTempRepo(files: FileMap = {}): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), 'tracewright-test-'));
  await writeFiles(root, files);
  return root;
}

export async function removeTempRepo(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}
