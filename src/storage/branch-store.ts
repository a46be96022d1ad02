// Branch-per-version storage backend on a git worktree.
//
// Every version is a branch <prefix>/<id> forked from the active branch,
// holding the asset and its metadata sidecar in one commit. Reading a
// version checks its branch out temporarily.
//
// The active branch and working tree are shared mutable state: one writer
// per instance. Callers needing concurrency serialize externally or give
// each worker its own worktree and BranchStore.

import { createHash } from 'node:crypto';
import { readFile, rm, writeFile } from 'node:fs/promises';
import { basename, isAbsolute, join, relative, resolve } from 'node:path';

import type { Logger } from 'pino';

import { errorMessage } from '../errors/index.js';
import type {
  AssetMetadata,
  ReferenceType,
  StorageReference,
  StoredMetadata,
} from '../types/index.js';

import { BackendFailureError, StorageNotFoundError, UnsupportedReferenceError } from './errors.js';
import { copyFileAtomic, matchesPathPattern, pathExists, toJsonDocument } from './fs-utils.js';
import type { GitCommitInfo, GitWorktree } from './git-client.js';
import { buildSidecar, parseSidecar } from './sidecar.js';
import type { StorageBackend, StoreOptions } from './types.js';

const STORAGE_TYPE = 'git';
const SIDECAR_SUFFIX = '.metadata.json';
const VERSION_ID_LENGTH = 12;
const VERSION_ID_PATTERN = /^[a-f0-9]{12}$/;
const MAX_ID_ATTEMPTS = 100;

export const DEFAULT_BRANCH_PREFIX = 'asset_versions';

interface WorktreeFile {
  name: string;
  data: string | Buffer;
}

export interface BranchStoreOptions {
  worktree: GitWorktree;
  logger: Logger;
  branchPrefix?: string;
  /** Where retrieve() without a target places files (default: inside .git) */
  cacheDir?: string;
}

export class BranchStore implements StorageBackend {
  readonly storageType = STORAGE_TYPE;
  private readonly worktree: GitWorktree;
  private readonly root: string;
  private readonly branchPrefix: string;
  private readonly cacheDir: string;
  private readonly logger: Logger;
  private initialized = false;

  constructor(options: BranchStoreOptions) {
    this.worktree = options.worktree;
    this.root = resolve(options.worktree.root);
    this.branchPrefix = options.branchPrefix ?? DEFAULT_BRANCH_PREFIX;
    this.cacheDir = options.cacheDir ?? join(this.root, '.git', 'asset-version-cache');
    this.logger = options.logger.child({ backend: STORAGE_TYPE });
  }

  async store(
    filePath: string,
    metadata: AssetMetadata,
    options: StoreOptions = {}
  ): Promise<string> {
    const source = resolve(filePath);
    if (!(await pathExists(source))) {
      throw new StorageNotFoundError(STORAGE_TYPE, `source file ${source}`);
    }
    await this.ensureRepository();

    const timestamp = options.timestamp ?? new Date();
    const data = await readFile(source);
    const versionId = await this.allocateVersionId([
      contentDigest(data, timestamp.toISOString()),
    ]);
    const assetName = basename(source);

    await this.commitOnNewBranch(
      this.branchName(versionId),
      'HEAD',
      [
        { name: assetName, data },
        {
          name: `${assetName}${SIDECAR_SUFFIX}`,
          data: toJsonDocument(buildSidecar(metadata, { originalPath: source, timestamp })),
        },
      ],
      `Store version of ${assetName}`
    );

    this.logger.debug({ versionId, source }, 'Version stored');
    return versionId;
  }

  async retrieve(storageId: string, targetPath?: string): Promise<string> {
    const branch = await this.requireBranch(storageId);
    const tip = await this.worktree.commitInfo(branch);

    return this.withCheckout(branch, async () => {
      const sidecar = await this.readSidecar(storageId, tip);
      const contentPath = join(this.root, this.contentPathOf(sidecar));
      if (!(await pathExists(contentPath))) {
        throw new StorageNotFoundError(STORAGE_TYPE, `content of version ${storageId}`);
      }

      const target =
        targetPath === undefined
          ? join(this.cacheDir, storageId, basename(contentPath))
          : resolve(targetPath);
      await copyFileAtomic(contentPath, target, targetPath === undefined ? 0o444 : 0o644);
      return target;
    });
  }

  async describe(storageId: string): Promise<StoredMetadata> {
    const branch = await this.requireBranch(storageId);
    const tip = await this.worktree.commitInfo(branch);

    const sidecar = await this.withCheckout(branch, () => this.readSidecar(storageId, tip));
    return {
      ...sidecar,
      commit_hash: tip.hash,
      commit_date: tip.date,
      commit_message: tip.message,
      branch,
    };
  }

  /**
   * Promote an existing commit into a version: a version branch is created at
   * the commit and a metadata commit is added on top of it. The reference's
   * storage id may be any commit-ish, or the id of an existing version.
   */
  async createFromReference(
    reference: StorageReference,
    metadata: AssetMetadata,
    options: StoreOptions = {}
  ): Promise<string> {
    if (reference.referenceType !== 'commit') {
      throw new UnsupportedReferenceError(STORAGE_TYPE, reference.referenceType);
    }
    await this.ensureRepository();

    const versionBranch = this.branchName(reference.storageId);
    const rev = (await this.worktree.branchExists(versionBranch))
      ? versionBranch
      : reference.storageId;
    const commitHash = await this.worktree.resolveCommit(rev);
    if (!commitHash) {
      throw new StorageNotFoundError(STORAGE_TYPE, `commit ${reference.storageId}`);
    }

    const source = await this.worktree.commitInfo(commitHash);
    const timestamp = options.timestamp ?? new Date();
    const versionId = await this.allocateVersionId([
      commitHash.slice(0, VERSION_ID_LENGTH),
      contentDigest(Buffer.from(commitHash), timestamp.toISOString()),
    ]);
    const sidecar = buildSidecar(metadata, {
      originalPath: reference.path,
      timestamp,
      reference,
      extra: {
        source_commit: {
          hash: source.hash,
          date: source.date,
          message: source.message,
          author: source.authorName,
        },
      },
    });

    await this.commitOnNewBranch(
      this.branchName(versionId),
      commitHash,
      [{ name: `${basename(reference.path)}${SIDECAR_SUFFIX}`, data: toJsonDocument(sidecar) }],
      `Add metadata for ${reference.path}`
    );

    this.logger.debug({ versionId, commit: commitHash }, 'Version created from commit reference');
    return versionId;
  }

  async listReferences(
    referenceType?: ReferenceType,
    pathPattern?: string
  ): Promise<StorageReference[]> {
    if (referenceType && referenceType !== 'commit') {
      return [];
    }
    if (!(await this.worktree.isRepository())) {
      return [];
    }

    const tips = new Map<string, string>();
    for (const [branch, hash] of await this.worktree.listBranches(this.branchPrefix)) {
      tips.set(hash, branch);
    }

    const refs: StorageReference[] = [];
    for (const commit of await this.worktree.log()) {
      const branch = tips.get(commit.hash);
      for (const file of commit.files) {
        if (file.endsWith(SIDECAR_SUFFIX)) continue;
        if (!matchesPathPattern(file, pathPattern)) continue;

        refs.push({
          storageType: STORAGE_TYPE,
          storageId: branch ? branch.slice(this.branchPrefix.length + 1) : commit.hash,
          path: file,
          referenceType: 'commit',
          metadata: {
            date: commit.date,
            message: commit.message,
            author: commit.authorName,
            author_email: commit.authorEmail,
            commit_hash: commit.hash,
            ...(branch ? { branch } : {}),
          },
        });
      }
    }
    return refs;
  }

  // ---- Scoped checkout ----

  /**
   * Run `body` with `ref` checked out. The branch active before the call is
   * restored on every exit path, discarding anything `body` left behind, so
   * a worktree with uncommitted changes is refused up front.
   */
  private async withCheckout<T>(ref: string, body: () => Promise<T>): Promise<T> {
    if (!(await this.worktree.isClean())) {
      throw new BackendFailureError(
        STORAGE_TYPE,
        `worktree ${this.root} has uncommitted changes; commit or stash them first`
      );
    }
    const original = await this.worktree.currentBranch();
    try {
      await this.worktree.checkout(ref);
      return await body();
    } finally {
      await this.worktree.checkout(original, { force: true });
    }
  }

  /**
   * Create `branch` at `startPoint` and commit `files` on it. If anything
   * fails the files are removed and the branch is deleted again.
   */
  private async commitOnNewBranch(
    branch: string,
    startPoint: string,
    files: WorktreeFile[],
    message: string
  ): Promise<string> {
    const names = files.map((file) => file.name);
    await this.worktree.createBranch(branch, startPoint);

    let committed = false;
    try {
      const hash = await this.withCheckout(branch, async () => {
        try {
          for (const file of files) {
            await writeFile(join(this.root, file.name), file.data);
          }
          return await this.worktree.commit(names, message);
        } catch (error) {
          for (const name of names) {
            await rm(join(this.root, name), { force: true });
          }
          throw error;
        }
      });
      committed = true;
      return hash;
    } catch (error) {
      if (error instanceof StorageNotFoundError || error instanceof BackendFailureError) {
        throw error;
      }
      throw new BackendFailureError(STORAGE_TYPE, `commit on ${branch}: ${errorMessage(error)}`);
    } finally {
      if (!committed) {
        await this.discardBranch(branch);
      }
    }
  }

  private async discardBranch(branch: string): Promise<void> {
    try {
      await this.worktree.deleteBranch(branch);
    } catch (error) {
      this.logger.warn(
        { branch, err: errorMessage(error) },
        'Failed to delete incomplete version branch'
      );
    }
  }

  // ---- Private helpers ----

  private branchName(versionId: string): string {
    return `${this.branchPrefix}/${versionId}`;
  }

  private async requireBranch(versionId: string): Promise<string> {
    const branch = this.branchName(versionId);
    if (!VERSION_ID_PATTERN.test(versionId) || !(await this.worktree.isRepository())) {
      throw new StorageNotFoundError(STORAGE_TYPE, `version ${versionId}`);
    }
    if (!(await this.worktree.branchExists(branch))) {
      throw new StorageNotFoundError(STORAGE_TYPE, `version ${versionId}`);
    }
    return branch;
  }

  /** First candidate id whose branch does not exist yet. */
  private async allocateVersionId(candidates: string[]): Promise<string> {
    const seed = candidates[candidates.length - 1] ?? '';
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const candidate = candidates[attempt] ?? contentDigest(Buffer.from(seed), String(attempt));
      if (!(await this.worktree.branchExists(this.branchName(candidate)))) {
        return candidate;
      }
    }
    throw new BackendFailureError(STORAGE_TYPE, 'no free version branch name');
  }

  /** Read the sidecar committed at the version tip; the branch must be checked out. */
  private async readSidecar(versionId: string, tip: GitCommitInfo): Promise<StoredMetadata> {
    const sidecarFile = tip.files.find((file) => file.endsWith(SIDECAR_SUFFIX));
    if (!sidecarFile) {
      throw new StorageNotFoundError(STORAGE_TYPE, `metadata for version ${versionId}`);
    }
    const sidecarPath = join(this.root, sidecarFile);
    let content: string;
    try {
      content = await readFile(sidecarPath, 'utf-8');
    } catch {
      throw new StorageNotFoundError(STORAGE_TYPE, `metadata for version ${versionId}`);
    }
    return parseSidecar(STORAGE_TYPE, content, sidecarFile);
  }

  /**
   * Worktree-relative path of a version's content: the referenced path for
   * versions promoted from a commit, the asset's base name otherwise.
   */
  private contentPathOf(sidecar: StoredMetadata): string {
    const reference = sidecar.reference;
    if (typeof reference === 'object' && reference !== null && 'path' in reference) {
      const refPath = reference.path;
      if (typeof refPath === 'string' && refPath) {
        return isAbsolute(refPath) ? relative(this.root, refPath) : refPath;
      }
    }
    const originalPath = typeof sidecar.original_path === 'string' ? sidecar.original_path : '';
    return basename(originalPath);
  }

  private async ensureRepository(): Promise<void> {
    if (this.initialized) return;
    if (!(await this.worktree.isRepository())) {
      this.logger.info({ root: this.root }, 'Initializing git repository');
      await this.worktree.init();
    }
    if (!(await this.worktree.hasCommits())) {
      await writeFile(
        join(this.root, 'README.md'),
        '# Asset Version Storage\n\nVersion branches are managed by the asset versioning store.\n'
      );
      await this.worktree.commit(['README.md'], 'Initial commit');
    }
    this.initialized = true;
  }
}

/** Short id from content and a timestamp: equal content at distinct instants differs. */
function contentDigest(data: Buffer, salt: string): string {
  return createHash('sha256').update(data).update(salt).digest('hex').slice(0, VERSION_ID_LENGTH);
}
