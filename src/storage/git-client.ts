// Git worktree access for the branch backend.
//
// GitCli drives the `git` binary through a CommandRunner; every call carries
// the configured deadline. The BranchStore only sees the GitWorktree
// interface, so tests can swap in an in-process worktree.

import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import { DEFAULT_COMMAND_TIMEOUT_MS, runCommand } from './exec.js';
import type { CommandResult, CommandRunner } from './exec.js';
import { pathExists } from './fs-utils.js';

export interface GitCommitInfo {
  hash: string;
  /** Author date, strict ISO 8601 */
  date: string;
  message: string;
  authorName: string;
  authorEmail: string;
  /** Paths changed by the commit, relative to the worktree root */
  files: string[];
}

export interface GitIdentity {
  name: string;
  email: string;
}

export interface GitWorktree {
  readonly root: string;
  isRepository(): Promise<boolean>;
  init(): Promise<void>;
  hasCommits(): Promise<boolean>;
  /** Active branch name, or the HEAD commit hash when detached */
  currentBranch(): Promise<string>;
  branchExists(name: string): Promise<boolean>;
  createBranch(name: string, startPoint: string): Promise<void>;
  deleteBranch(name: string): Promise<void>;
  checkout(ref: string, options?: { force?: boolean }): Promise<void>;
  /** No staged or unstaged changes to tracked files */
  isClean(): Promise<boolean>;
  /** Full hash of the commit `rev` names, or null when it names none */
  resolveCommit(rev: string): Promise<string | null>;
  /** Stage `paths` and commit only them; returns the new commit hash */
  commit(paths: string[], message: string): Promise<string>;
  commitInfo(rev: string): Promise<GitCommitInfo>;
  /** Commits reachable from any ref, newest first */
  log(): Promise<GitCommitInfo[]>;
  /** Tips of the branches under `prefix/`, keyed by branch name */
  listBranches(prefix: string): Promise<Map<string, string>>;
}

const FIELD_SEP = '\x1f';
const RECORD_SEP = '\x1e';
const COMMIT_FORMAT = ['%H', '%aI', '%an', '%ae', '%B'].join('%x1f');

export interface GitCliOptions {
  root: string;
  timeoutMs?: number;
  /** Author and committer for commits made by the backend */
  identity?: GitIdentity;
  runner?: CommandRunner;
}

export class GitCli implements GitWorktree {
  readonly root: string;
  private readonly timeoutMs: number;
  private readonly identity?: GitIdentity;
  private readonly runner: CommandRunner;

  constructor(options: GitCliOptions) {
    this.root = options.root;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.identity = options.identity;
    this.runner = options.runner ?? runCommand;
  }

  async isRepository(): Promise<boolean> {
    return pathExists(join(this.root, '.git'));
  }

  async init(): Promise<void> {
    await mkdir(this.root, { recursive: true });
    await this.git(['init']);
  }

  async hasCommits(): Promise<boolean> {
    const result = await this.git(['rev-parse', '--verify', '--quiet', 'HEAD'], true);
    return result.exitCode === 0;
  }

  async currentBranch(): Promise<string> {
    const result = await this.git(['symbolic-ref', '--short', '-q', 'HEAD'], true);
    if (result.exitCode === 0) {
      return result.stdout.trim();
    }
    const head = await this.git(['rev-parse', 'HEAD']);
    return head.stdout.trim();
  }

  async branchExists(name: string): Promise<boolean> {
    const result = await this.git(['show-ref', '--verify', '--quiet', `refs/heads/${name}`], true);
    return result.exitCode === 0;
  }

  async createBranch(name: string, startPoint: string): Promise<void> {
    await this.git(['branch', name, startPoint]);
  }

  async deleteBranch(name: string): Promise<void> {
    await this.git(['branch', '-D', name]);
  }

  async checkout(ref: string, options: { force?: boolean } = {}): Promise<void> {
    await this.git(['checkout', ...(options.force ? ['-f'] : []), ref, '--']);
  }

  async isClean(): Promise<boolean> {
    const result = await this.git(['status', '--porcelain', '--untracked-files=no']);
    return result.stdout.trim() === '';
  }

  async resolveCommit(rev: string): Promise<string | null> {
    const result = await this.git(['rev-parse', '--verify', '--quiet', `${rev}^{commit}`], true);
    const hash = result.stdout.trim();
    return result.exitCode === 0 && hash ? hash : null;
  }

  async commit(paths: string[], message: string): Promise<string> {
    await this.git(['add', '--', ...paths]);
    await this.git(['commit', '-m', message, '--', ...paths]);
    const head = await this.git(['rev-parse', 'HEAD']);
    return head.stdout.trim();
  }

  async commitInfo(rev: string): Promise<GitCommitInfo> {
    const shown = await this.git(['show', '-s', `--format=${COMMIT_FORMAT}`, rev]);
    const files = await this.git(['diff-tree', '--no-commit-id', '--name-only', '-r', '--root', rev]);
    return {
      ...parseCommitFields(shown.stdout),
      files: splitLines(files.stdout),
    };
  }

  async log(): Promise<GitCommitInfo[]> {
    if (!(await this.hasCommits())) return [];
    const result = await this.git([
      'log',
      '--all',
      `--format=%x1e${COMMIT_FORMAT}%x1f`,
      '--name-only',
    ]);
    return parseLog(result.stdout);
  }

  async listBranches(prefix: string): Promise<Map<string, string>> {
    const result = await this.git([
      'for-each-ref',
      '--format=%(objectname) %(refname:short)',
      `refs/heads/${prefix}/`,
    ]);
    const branches = new Map<string, string>();
    for (const line of splitLines(result.stdout)) {
      const [hash, name] = line.split(' ');
      if (hash && name) branches.set(name, hash);
    }
    return branches;
  }

  private git(args: string[], allowFailure = false): Promise<CommandResult> {
    return this.runner('git', args, {
      cwd: this.root,
      timeoutMs: this.timeoutMs,
      allowFailure,
      ...(this.identity && {
        env: {
          GIT_AUTHOR_NAME: this.identity.name,
          GIT_AUTHOR_EMAIL: this.identity.email,
          GIT_COMMITTER_NAME: this.identity.name,
          GIT_COMMITTER_EMAIL: this.identity.email,
        },
      }),
    });
  }
}

// ---------------------------------------------------------------------------
// Output parsing
// ---------------------------------------------------------------------------

function splitLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** Parse `hash\x1fdate\x1fname\x1femail\x1fbody` */
export function parseCommitFields(output: string): Omit<GitCommitInfo, 'files'> {
  const [hash = '', date = '', authorName = '', authorEmail = '', ...body] =
    output.split(FIELD_SEP);
  return {
    hash: hash.trim(),
    date: date.trim(),
    authorName,
    authorEmail,
    message: body.join(FIELD_SEP).trim(),
  };
}

/**
 * Parse `git log --format=%x1e<fields>%x1f --name-only`: one record per
 * commit, the changed file names following the last field separator.
 */
export function parseLog(output: string): GitCommitInfo[] {
  const commits: GitCommitInfo[] = [];
  for (const record of output.split(RECORD_SEP)) {
    if (!record.trim()) continue;
    const lastSep = record.lastIndexOf(FIELD_SEP);
    if (lastSep === -1) continue;
    commits.push({
      ...parseCommitFields(record.slice(0, lastSep)),
      files: splitLines(record.slice(lastSep + 1)),
    });
  }
  return commits;
}
