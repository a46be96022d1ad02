import { describe, it, expect, vi, beforeEach } from 'vitest';

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

const { execFileMock, stdinEnd } = vi.hoisted(() => ({
  execFileMock: vi.fn(),
  stdinEnd: vi.fn(),
}));

vi.mock('node:child_process', () => ({ execFile: execFileMock }));

import { runCommand } from '@/storage/exec.js';

function respond(error: Error | null, stdout = '', stderr = ''): void {
  execFileMock.mockImplementationOnce(
    (_command: string, _args: string[], _options: object, callback: ExecCallback) => {
      callback(error, stdout, stderr);
      return { stdin: { end: stdinEnd } };
    }
  );
}

function exitError(code: number): Error {
  return Object.assign(new Error(`Command failed with exit code ${code}`), {
    code,
    killed: false,
    signal: null,
  });
}

describe('runCommand()', () => {
  beforeEach(() => {
    execFileMock.mockReset();
    stdinEnd.mockReset();
  });

  it('should resolve with the output of a successful command', async () => {
    respond(null, 'main\n');

    const result = await runCommand('git', ['branch'], { cwd: '/repo', timeoutMs: 1000 });

    expect(result).toEqual({ stdout: 'main\n', stderr: '', exitCode: 0 });
    expect(execFileMock).toHaveBeenCalledWith(
      'git',
      ['branch'],
      expect.objectContaining({ cwd: '/repo', timeout: 1000, encoding: 'utf8' }),
      expect.any(Function)
    );
  });

  it('should merge extra environment variables over the process environment', async () => {
    respond(null);

    await runCommand('git', ['commit'], {
      cwd: '/repo',
      timeoutMs: 1000,
      env: { GIT_AUTHOR_NAME: 'Asset Bot' },
    });

    const options = execFileMock.mock.calls[0]?.[2];
    expect(options.env.GIT_AUTHOR_NAME).toBe('Asset Bot');
    expect(options.env.PATH).toBe(process.env.PATH);
  });

  it('should write input to stdin', async () => {
    respond(null, 'Change 5 created.\n');

    await runCommand('p4', ['change', '-i'], { cwd: '/ws', timeoutMs: 1000, input: 'spec' });

    expect(stdinEnd).toHaveBeenCalledWith('spec');
  });

  it('should reject a non-zero exit with the stderr detail', async () => {
    respond(exitError(128), '', 'fatal: not a git repository\n');

    await expect(
      runCommand('git', ['status'], { cwd: '/repo', timeoutMs: 1000 })
    ).rejects.toMatchObject({
      code: 'STORAGE_BACKEND_FAILURE',
      message: 'git backend failure: "git status" failed: fatal: not a git repository',
    });
  });

  it('should resolve a non-zero exit when failure is allowed', async () => {
    respond(exitError(1), '', '');

    const result = await runCommand('git', ['show-ref'], {
      cwd: '/repo',
      timeoutMs: 1000,
      allowFailure: true,
    });

    expect(result.exitCode).toBe(1);
  });

  it('should reject a timed-out command even when failure is allowed', async () => {
    respond(Object.assign(new Error('killed'), { killed: true, signal: 'SIGTERM', code: null }));

    await expect(
      runCommand('p4', ['sync'], { cwd: '/ws', timeoutMs: 250, allowFailure: true })
    ).rejects.toMatchObject({
      message: 'p4 backend failure: "p4 sync" timed out after 250ms',
    });
  });

  it('should reject when the binary cannot start', async () => {
    respond(Object.assign(new Error('spawn p4 ENOENT'), { code: 'ENOENT' }));

    await expect(
      runCommand('p4', ['info'], { cwd: '/ws', timeoutMs: 1000, allowFailure: true })
    ).rejects.toMatchObject({
      message: 'p4 backend failure: "p4 info" could not start: spawn p4 ENOENT',
    });
  });
});
