import { describe, it, expect, vi } from 'vitest';

import type { CommandResult, CommandRunner } from '@/storage/exec.js';
import { GitCli, parseCommitFields, parseLog } from '@/storage/git-client.js';

function result(stdout = '', exitCode = 0): CommandResult {
  return { stdout, stderr: '', exitCode };
}

function createRunner(...results: CommandResult[]) {
  const runner = vi.fn<CommandRunner>();
  for (const next of results) {
    runner.mockResolvedValueOnce(next);
  }
  runner.mockResolvedValue(result());
  return runner;
}

describe('parseCommitFields()', () => {
  it('should split hash, date, author and message', () => {
    const fields = parseCommitFields(
      'abc123\x1f2024-02-01T08:00:01+00:00\x1fAlice\x1falice@example.com\x1fSubject\n\nBody line\n'
    );

    expect(fields).toEqual({
      hash: 'abc123',
      date: '2024-02-01T08:00:01+00:00',
      authorName: 'Alice',
      authorEmail: 'alice@example.com',
      message: 'Subject\n\nBody line',
    });
  });

  it('should default missing fields to empty strings', () => {
    expect(parseCommitFields('abc123')).toEqual({
      hash: 'abc123',
      date: '',
      authorName: '',
      authorEmail: '',
      message: '',
    });
  });
});

describe('parseLog()', () => {
  it('should parse one record per commit with its changed files', () => {
    const output = [
      '\x1eaaa\x1f2024-02-01T08:00:02+00:00\x1fAlice\x1fa@example.com\x1fSecond\n\x1f\n\nhero.txt\nhero.txt.metadata.json\n',
      '\x1ebbb\x1f2024-02-01T08:00:01+00:00\x1fBob\x1fb@example.com\x1fFirst\n\x1f\n\nREADME.md\n',
    ].join('');

    const commits = parseLog(output);

    expect(commits).toEqual([
      {
        hash: 'aaa',
        date: '2024-02-01T08:00:02+00:00',
        authorName: 'Alice',
        authorEmail: 'a@example.com',
        message: 'Second',
        files: ['hero.txt', 'hero.txt.metadata.json'],
      },
      {
        hash: 'bbb',
        date: '2024-02-01T08:00:01+00:00',
        authorName: 'Bob',
        authorEmail: 'b@example.com',
        message: 'First',
        files: ['README.md'],
      },
    ]);
  });

  it('should return an empty list for empty output', () => {
    expect(parseLog('')).toEqual([]);
    expect(parseLog('\n')).toEqual([]);
  });
});

describe('GitCli', () => {
  it('should run git in the worktree root with the configured deadline', async () => {
    const runner = createRunner(result('main\n'));
    const git = new GitCli({ root: '/repo', timeoutMs: 5000, runner });

    await git.currentBranch();

    expect(runner).toHaveBeenCalledWith('git', ['symbolic-ref', '--short', '-q', 'HEAD'], {
      cwd: '/repo',
      timeoutMs: 5000,
      allowFailure: true,
    });
  });

  it('should pass the configured identity through the environment', async () => {
    const runner = createRunner();
    const git = new GitCli({
      root: '/repo',
      runner,
      identity: { name: 'Asset Bot', email: 'bot@example.com' },
    });

    await git.createBranch('asset_versions/abc', 'main');

    expect(runner.mock.calls[0]?.[2].env).toEqual({
      GIT_AUTHOR_NAME: 'Asset Bot',
      GIT_AUTHOR_EMAIL: 'bot@example.com',
      GIT_COMMITTER_NAME: 'Asset Bot',
      GIT_COMMITTER_EMAIL: 'bot@example.com',
    });
  });

  describe('currentBranch()', () => {
    it('should return the symbolic branch name', async () => {
      const git = new GitCli({ root: '/repo', runner: createRunner(result('feature/x\n')) });

      expect(await git.currentBranch()).toBe('feature/x');
    });

    it('should fall back to the HEAD hash when detached', async () => {
      const runner = createRunner(result('', 1), result('deadbeef\n'));
      const git = new GitCli({ root: '/repo', runner });

      expect(await git.currentBranch()).toBe('deadbeef');
      expect(runner.mock.calls[1]?.[1]).toEqual(['rev-parse', 'HEAD']);
    });
  });

  describe('branchExists()', () => {
    it('should check the full ref name', async () => {
      const runner = createRunner(result('', 1));
      const git = new GitCli({ root: '/repo', runner });

      expect(await git.branchExists('asset_versions/abc')).toBe(false);
      expect(runner.mock.calls[0]?.[1]).toEqual([
        'show-ref',
        '--verify',
        '--quiet',
        'refs/heads/asset_versions/abc',
      ]);
    });
  });

  describe('checkout()', () => {
    it('should add -f when forced', async () => {
      const runner = createRunner();
      const git = new GitCli({ root: '/repo', runner });

      await git.checkout('main', { force: true });

      expect(runner.mock.calls[0]?.[1]).toEqual(['checkout', '-f', 'main', '--']);
    });
  });

  describe('isClean()', () => {
    it('should ignore untracked files', async () => {
      const runner = createRunner(result(''));
      const git = new GitCli({ root: '/repo', runner });

      expect(await git.isClean()).toBe(true);
      expect(runner.mock.calls[0]?.[1]).toEqual(['status', '--porcelain', '--untracked-files=no']);
    });

    it('should report modified or staged tracked files', async () => {
      const git = new GitCli({ root: '/repo', runner: createRunner(result(' M README.md\n')) });

      expect(await git.isClean()).toBe(false);
    });
  });

  describe('resolveCommit()', () => {
    it('should return the full hash', async () => {
      const git = new GitCli({ root: '/repo', runner: createRunner(result('abc123\n')) });

      expect(await git.resolveCommit('abc1')).toBe('abc123');
    });

    it('should return null when the revision names no commit', async () => {
      const git = new GitCli({ root: '/repo', runner: createRunner(result('', 1)) });

      expect(await git.resolveCommit('nope')).toBeNull();
    });
  });

  describe('commit()', () => {
    it('should stage the paths, commit and return the new HEAD', async () => {
      const runner = createRunner(result(), result(), result('feedface\n'));
      const git = new GitCli({ root: '/repo', runner });

      const hash = await git.commit(['hero.txt', 'hero.txt.metadata.json'], 'Store version');

      expect(hash).toBe('feedface');
      expect(runner.mock.calls.map((call) => call[1])).toEqual([
        ['add', '--', 'hero.txt', 'hero.txt.metadata.json'],
        ['commit', '-m', 'Store version', '--', 'hero.txt', 'hero.txt.metadata.json'],
        ['rev-parse', 'HEAD'],
      ]);
    });
  });

  describe('log()', () => {
    it('should return an empty list when there are no commits', async () => {
      const runner = createRunner(result('', 1));
      const git = new GitCli({ root: '/repo', runner });

      expect(await git.log()).toEqual([]);
      expect(runner).toHaveBeenCalledTimes(1);
    });
  });

  describe('listBranches()', () => {
    it('should map branch names to tip hashes', async () => {
      const runner = createRunner(result('aaa asset_versions/one\nbbb asset_versions/two\n'));
      const git = new GitCli({ root: '/repo', runner });

      const branches = await git.listBranches('asset_versions');

      expect([...branches]).toEqual([
        ['asset_versions/one', 'aaa'],
        ['asset_versions/two', 'bbb'],
      ]);
      expect(runner.mock.calls[0]?.[1]).toEqual([
        'for-each-ref',
        '--format=%(objectname) %(refname:short)',
        'refs/heads/asset_versions/',
      ]);
    });
  });
});
