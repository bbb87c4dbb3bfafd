import { GitCommandError, runGit } from '../../src/utils/git.js';

const { execFileMock } = vi.hoisted(() => ({ execFileMock: vi.fn() }));

vi.mock('node:child_process', () => ({ execFile: execFileMock }));

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

describe('runGit', () => {
  beforeEach(() => {
    execFileMock.mockReset();
  });

  it('should run git without prompting and resolve its output', async () => {
    execFileMock.mockImplementation((_file: string, _args: string[], _options: object, callback: ExecCallback) => {
      callback(null, 'ok\n', '');
    });

    await expect(runGit(['ls-remote', '--heads'], { timeoutMs: 500, cwd: '/tmp' })).resolves.toEqual({
      stdout: 'ok\n',
      stderr: '',
    });
    expect(execFileMock).toHaveBeenCalledWith(
      'git',
      ['ls-remote', '--heads'],
      expect.objectContaining({
        cwd: '/tmp',
        timeout: 500,
        encoding: 'utf-8',
        env: expect.objectContaining({ GIT_TERMINAL_PROMPT: '0' }),
      }),
      expect.any(Function),
    );
  });

  it('should reject with the stderr and kill state of a failed run', async () => {
    execFileMock.mockImplementation((_file: string, _args: string[], _options: object, callback: ExecCallback) => {
      callback(Object.assign(new Error('Command failed'), { killed: true, code: 128 }), '', 'fatal: gone\n');
    });

    const error = await runGit(['clone', 'x']).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(GitCommandError);
    expect(error).toMatchObject({ killed: true, code: 128, stderr: 'fatal: gone\n' });
    expect(error).toHaveProperty('message', 'git clone failed: fatal: gone');
  });

  it('should disable the timeout when none is given', async () => {
    execFileMock.mockImplementation((_file: string, _args: string[], _options: object, callback: ExecCallback) => {
      callback(null, '', '');
    });

    await runGit(['status']);
    expect(execFileMock).toHaveBeenCalledWith(
      'git',
      ['status'],
      expect.objectContaining({ timeout: 0 }),
      expect.any(Function),
    );
  });
});
