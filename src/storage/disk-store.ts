// Content-addressed disk storage backend.
//
// Version ids are the SHA-256 of the content followed by the creation instant.
// Content lives in two-level buckets (<root>/ab/cd/<id>) to bound directory
// fan-out; one JSON sidecar per id lives in <root>/_metadata. A version
// exists once its sidecar does: content is linked into place first, then the
// sidecar is renamed in, so a half-written version is never visible.

import { randomUUID } from 'node:crypto';
import { constants } from 'node:fs';
import { chmod, copyFile, link, mkdir, readdir, readFile, rm, stat } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';

import type { Logger } from 'pino';

import { errorMessage } from '../errors/index.js';
import type {
  AssetMetadata,
  ReferenceType,
  StorageReference,
  StoredMetadata,
} from '../types/index.js';

import { BackendFailureError, StorageNotFoundError, UnsupportedReferenceError } from './errors.js';
import {
  copyFileAtomic,
  hasErrorCode,
  hashFile,
  matchesPathPattern,
  pathExists,
  syncFile,
  toJsonDocument,
  writeFileAtomic,
} from './fs-utils.js';
import { buildSidecar, parseSidecar } from './sidecar.js';
import type { StorageBackend, StoreOptions } from './types.js';

const STORAGE_TYPE = 'disk';
const METADATA_DIR = '_metadata';
const STAGING_DIR = '_staging';

/** <sha256>_<yyyymmddThhmmssmmmZ>[-n] */
const VERSION_ID_PATTERN = /^[a-f0-9]{64}_\d{8}T\d{9}Z(?:-\d+)?$/;

/** Upper bound on disambiguator attempts for same-content, same-millisecond writes. */
const MAX_ID_ATTEMPTS = 1000;

/** 20240115T103000123Z */
export function compactTimestamp(timestamp: Date): string {
  return timestamp.toISOString().replace(/[-:.]/g, '');
}

export function isDiskVersionId(value: string): boolean {
  return VERSION_ID_PATTERN.test(value);
}

export interface DiskStoreOptions {
  root: string;
  logger: Logger;
}

export class DiskStore implements StorageBackend {
  readonly storageType = STORAGE_TYPE;
  private readonly root: string;
  private readonly metadataRoot: string;
  private readonly stagingRoot: string;
  private readonly logger: Logger;
  private initialized = false;

  constructor(options: DiskStoreOptions) {
    this.root = resolve(options.root);
    this.metadataRoot = join(this.root, METADATA_DIR);
    this.stagingRoot = join(this.root, STAGING_DIR);
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
    await this.ensureDirs();

    const timestamp = options.timestamp ?? new Date();
    const staged = join(this.stagingRoot, randomUUID());
    try {
      await copyFile(source, staged, constants.COPYFILE_EXCL);
      await chmod(staged, 0o444);
      await syncFile(staged);
      const contentHash = await hashFile(staged);

      const versionId = await this.placeContent(contentHash, timestamp, (target) =>
        link(staged, target)
      );
      await this.writeSidecar(
        versionId,
        buildSidecar(metadata, { originalPath: source, timestamp })
      );

      this.logger.debug({ versionId, source }, 'Version stored');
      return versionId;
    } catch (error) {
      throw this.wrapFailure(error, 'store');
    } finally {
      await rm(staged, { force: true });
    }
  }

  async retrieve(storageId: string, targetPath?: string): Promise<string> {
    const contentPath = await this.requireVersion(storageId);
    if (targetPath === undefined) {
      return contentPath;
    }

    const target = resolve(targetPath);
    try {
      await copyFileAtomic(contentPath, target, 0o644);
    } catch (error) {
      throw this.wrapFailure(error, 'retrieve');
    }
    return target;
  }

  async describe(storageId: string): Promise<StoredMetadata> {
    if (!isDiskVersionId(storageId)) {
      throw new StorageNotFoundError(STORAGE_TYPE, `version ${storageId}`);
    }
    const sidecarPath = this.sidecarPath(storageId);
    let content: string;
    try {
      content = await readFile(sidecarPath, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw new StorageNotFoundError(STORAGE_TYPE, `metadata for version ${storageId}`);
      }
      throw this.wrapFailure(error, 'describe');
    }
    return parseSidecar(STORAGE_TYPE, content, sidecarPath);
  }

  /**
   * Promote a file already on disk into a version. The file is hard-linked
   * into the bucket when possible and copied otherwise (for example across
   * file systems).
   */
  async createFromReference(
    reference: StorageReference,
    metadata: AssetMetadata,
    options: StoreOptions = {}
  ): Promise<string> {
    if (reference.referenceType !== 'file') {
      throw new UnsupportedReferenceError(STORAGE_TYPE, reference.referenceType);
    }
    const source = resolve(reference.path);
    if (!(await pathExists(source))) {
      throw new StorageNotFoundError(STORAGE_TYPE, `referenced file ${source}`);
    }
    await this.ensureDirs();

    const timestamp = options.timestamp ?? new Date();
    const staged = join(this.stagingRoot, randomUUID());
    try {
      const contentHash = await hashFile(source);
      const versionId = await this.placeContent(contentHash, timestamp, async (target) => {
        try {
          await link(source, target);
        } catch (error) {
          if (hasErrorCode(error, 'EEXIST')) throw error;
          this.logger.debug({ source, err: errorMessage(error) }, 'Hard link failed, copying');
          await copyFile(source, staged, constants.COPYFILE_EXCL);
          await syncFile(staged);
          await link(staged, target);
        }
      });

      await this.writeSidecar(
        versionId,
        buildSidecar(metadata, { originalPath: source, timestamp, reference })
      );

      this.logger.debug({ versionId, source }, 'Version created from file reference');
      return versionId;
    } catch (error) {
      throw this.wrapFailure(error, 'createFromReference');
    } finally {
      await rm(staged, { force: true });
    }
  }

  async listReferences(
    referenceType?: ReferenceType,
    pathPattern?: string
  ): Promise<StorageReference[]> {
    if (referenceType && referenceType !== 'file') {
      return [];
    }

    let entries: string[];
    try {
      entries = await readdir(this.metadataRoot);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return [];
      throw this.wrapFailure(error, 'listReferences');
    }

    const refs: StorageReference[] = [];
    for (const entry of entries) {
      if (!entry.endsWith('.json')) continue;
      const versionId = basename(entry, '.json');
      if (!isDiskVersionId(versionId)) continue;

      const contentPath = this.contentPath(versionId);
      let size: number;
      let modified: Date;
      try {
        const info = await stat(contentPath);
        size = info.size;
        modified = info.mtime;
      } catch {
        // Sidecar without content: not a valid version
        continue;
      }

      let sidecar: StoredMetadata;
      try {
        sidecar = await this.describe(versionId);
      } catch (error) {
        this.logger.warn({ versionId, err: errorMessage(error) }, 'Skipping unreadable sidecar');
        continue;
      }
      const originalPath = typeof sidecar.original_path === 'string' ? sidecar.original_path : '';
      if (
        !matchesPathPattern(originalPath, pathPattern) &&
        !matchesPathPattern(contentPath, pathPattern)
      ) {
        continue;
      }

      refs.push({
        storageType: STORAGE_TYPE,
        storageId: versionId,
        path: contentPath,
        referenceType: 'file',
        metadata: {
          size,
          modified: modified.toISOString(),
          timestamp: sidecar.timestamp,
          original_path: originalPath,
          content_hash: versionId.slice(0, 64),
        },
      });
    }

    return refs.sort((a, b) => a.storageId.localeCompare(b.storageId));
  }

  // ---- Private helpers ----

  private contentPath(versionId: string): string {
    return join(this.root, versionId.slice(0, 2), versionId.slice(2, 4), versionId);
  }

  private sidecarPath(versionId: string): string {
    return join(this.metadataRoot, `${versionId}.json`);
  }

  /** Content path of a complete version (content and sidecar both present). */
  private async requireVersion(versionId: string): Promise<string> {
    if (!isDiskVersionId(versionId)) {
      throw new StorageNotFoundError(STORAGE_TYPE, `version ${versionId}`);
    }
    const contentPath = this.contentPath(versionId);
    const complete =
      (await pathExists(this.sidecarPath(versionId))) && (await pathExists(contentPath));
    if (!complete) {
      throw new StorageNotFoundError(STORAGE_TYPE, `version ${versionId}`);
    }
    return contentPath;
  }

  /**
   * Find a free id for the content and put the content there with `place`,
   * which must fail with EEXIST when the target exists. Identical content
   * written within the same millisecond gets a -1, -2, ... suffix.
   */
  private async placeContent(
    contentHash: string,
    timestamp: Date,
    place: (target: string) => Promise<void>
  ): Promise<string> {
    const baseId = `${contentHash}_${compactTimestamp(timestamp)}`;
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const versionId = attempt === 0 ? baseId : `${baseId}-${attempt}`;
      const target = this.contentPath(versionId);
      await mkdir(dirname(target), { recursive: true });
      try {
        await place(target);
        return versionId;
      } catch (error) {
        if (!hasErrorCode(error, 'EEXIST')) throw error;
      }
    }
    throw new BackendFailureError(STORAGE_TYPE, `no free version id for ${baseId}`);
  }

  private async writeSidecar(versionId: string, sidecar: StoredMetadata): Promise<void> {
    await writeFileAtomic(this.sidecarPath(versionId), toJsonDocument(sidecar), this.stagingRoot);
  }

  private wrapFailure(error: unknown, operation: string): Error {
    if (error instanceof StorageNotFoundError || error instanceof BackendFailureError) {
      return error;
    }
    return new BackendFailureError(STORAGE_TYPE, `${operation}: ${errorMessage(error)}`);
  }

  private async ensureDirs(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.metadataRoot, { recursive: true });
    await mkdir(this.stagingRoot, { recursive: true });
    this.initialized = true;
  }
}
