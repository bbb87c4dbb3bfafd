import { execFile } from 'node:child_process';

export interface GitResult {
  stdout: string;
  stderr: string;
}

export interface GitRunOptions {
  cwd?: string;
  /** Kill git after this many milliseconds; 0 disables the limit. */
  timeoutMs?: number;
}

export type GitRunner = (args: readonly string[], options?: GitRunOptions) => Promise<GitResult>;

/**
 * A git invocation that exited non-zero, could not start, or was killed
 * by the timeout.
 */
export class GitCommandError extends Error {
  readonly args: readonly string[];
  readonly stderr: string;
  readonly killed: boolean;
  readonly code: string | number | null;

  constructor(
    args: readonly string[],
    stderr: string,
    details: { killed: boolean; code: string | number | null; cause?: unknown },
  ) {
    super(`git ${args[0] ?? ''} failed${stderr.trim() ? `: ${stderr.trim()}` : ''}`, {
      cause: details.cause,
    });
    this.name = 'GitCommandError';
    this.args = args;
    this.stderr = stderr;
    this.killed = details.killed;
    this.code = details.code;
  }
}

export const runGit: GitRunner = (args, options = {}) =>
  new Promise((resolve, reject) => {
    execFile(
      'git',
      [...args],
      {
        cwd: options.cwd,
        timeout: options.timeoutMs ?? 0,
        encoding: 'utf-8',
        maxBuffer: 16 * 1024 * 1024,
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
      },
      (error, stdout, stderr) => {
        if (error) {
          reject(
            new GitCommandError(args, stderr, {
              killed: error.killed ?? false,
              code: error.code ?? null,
              cause: error,
            }),
          );
          return;
        }
        resolve({ stdout, stderr });
      },
    );
  });
