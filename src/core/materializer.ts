import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';

import {
  CheckoutInUseError,
  CloneTimeoutError,
  RefNotFoundError,
  RemoteUnreachableError,
  RetrievalError,
  errorMessage,
} from '../utils/errors.js';
import { GitCommandError, runGit } from '../utils/git.js';
import type { GitRunner } from '../utils/git.js';

export interface RepositorySource {
  /** Clone URL or local path git can clone from. */
  location: string;
  /** Branch or tag; the remote's default branch when omitted. */
  ref?: string;
}

export interface CheckoutOptions {
  scratchDir: string;
  timeoutMs: number;
  git?: GitRunner;
}

const CHECKOUT_ID = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const REF_MISSING = [/remote branch .* not found/i, /couldn't find remote ref/i, /did not match any/i];

const REMOTE_UNREACHABLE = [
  /could not resolve host/i,
  /repository .* not found/i,
  /does not appear to be a git repository/i,
  /unable to access/i,
  /connection refused/i,
  /could not read from remote repository/i,
  /connection timed out/i,
];

function firstLine(text: string): string {
  return (
    text
      .split('\n')
      .map((line) => line.trim())
      .find(Boolean) ?? 'no output'
  );
}

/** Maps a failed git invocation against `source` to a retrieval error. */
export function toRetrievalError(source: RepositorySource, error: unknown, timeoutMs: number): RetrievalError {
  if (!(error instanceof GitCommandError)) {
    return new RetrievalError(source.location, errorMessage(error));
  }
  if (error.killed) return new CloneTimeoutError(source.location, timeoutMs);
  if (error.code === 'ENOENT') return new RetrievalError(source.location, 'git executable not found');
  if (source.ref && REF_MISSING.some((re) => re.test(error.stderr))) {
    return new RefNotFoundError(source.location, source.ref);
  }
  if (REMOTE_UNREACHABLE.some((re) => re.test(error.stderr))) {
    return new RemoteUnreachableError(source.location, firstLine(error.stderr));
  }
  return new RetrievalError(source.location, `git failed: ${firstLine(error.stderr)}`);
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Shallow-clones `source` into `<scratchDir>/<checkoutId>`, runs `fn` on the
 * checkout and removes it afterwards, whether `fn` resolves or throws.
 * `checkoutId` must be unique among concurrent operations.
 */
export async function withCheckout<T>(
  source: RepositorySource,
  checkoutId: string,
  fn: (path: string) => Promise<T>,
  options: CheckoutOptions,
): Promise<T> {
  if (!CHECKOUT_ID.test(checkoutId)) {
    throw new RetrievalError(source.location, `Invalid checkout id "${checkoutId}"`);
  }
  const git = options.git ?? runGit;
  const path = join(options.scratchDir, checkoutId);

  await mkdir(options.scratchDir, { recursive: true });
  try {
    await mkdir(path);
  } catch (error) {
    if (isAlreadyExists(error)) throw new CheckoutInUseError(source.location, path);
    throw new RetrievalError(source.location, `Cannot create ${path}: ${errorMessage(error)}`);
  }

  try {
    const args = ['clone', '--depth=1'];
    if (source.ref) args.push('--branch', source.ref);
    args.push('--', source.location, path);
    try {
      await git(args, { timeoutMs: options.timeoutMs });
    } catch (error) {
      throw toRetrievalError(source, error, options.timeoutMs);
    }
    return await fn(path);
  } finally {
    await rm(path, { recursive: true, force: true });
  }
}

/** Branch names advertised by the remote under refs/heads, sorted. */
export async function listRemoteBranches(
  location: string,
  options: { timeoutMs: number; git?: GitRunner },
): Promise<string[]> {
  const git = options.git ?? runGit;
  let stdout: string;
  try {
    ({ stdout } = await git(['ls-remote', '--heads', '--', location], { timeoutMs: options.timeoutMs }));
  } catch (error) {
    throw toRetrievalError({ location }, error, options.timeoutMs);
  }

  const branches = stdout
    .split('\n')
    .map((line) => line.split('\t')[1]?.trim())
    .filter((ref): ref is string => ref !== undefined && ref.startsWith('refs/heads/'))
    .map((ref) => ref.slice('refs/heads/'.length));
  return [...new Set(branches)].sort();
}
