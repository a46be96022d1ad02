// Changelist-per-version storage backend on a Perforce workspace.
//
// store() opens a changelist, adds or edits the asset under the depot root,
// adds a metadata file under <depotRoot>/asset_versions/metadata and submits.
// The submitted changelist number is the storage id.
//
// The workspace is shared mutable state: one writer per instance.

import { copyFile, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join, resolve } from 'node:path';

import type { Logger } from 'pino';

import { errorMessage } from '../errors/index.js';
import type {
  AssetMetadata,
  MetadataMap,
  ReferenceType,
  StorageReference,
  StoredMetadata,
} from '../types/index.js';

import { BackendFailureError, StorageNotFoundError, UnsupportedReferenceError } from './errors.js';
import { matchesPathPattern, pathExists, toJsonDocument } from './fs-utils.js';
import type { P4Change, P4File, PerforceClient } from './perforce-client.js';
import { buildSidecar, parseSidecar } from './sidecar.js';
import type { StorageBackend, StoreOptions } from './types.js';

const STORAGE_TYPE = 'perforce';
const METADATA_SUBDIR = 'asset_versions/metadata';
const CHANGE_ID_PATTERN = /^\d+$/;

export interface ChangelistStoreOptions {
  client: PerforceClient;
  logger: Logger;
  /** Local directory the depot root maps to in the client view */
  workspaceRoot: string;
  /** Depot path assets are submitted under, e.g. //depot/assets */
  depotRoot?: string;
}

export class ChangelistStore implements StorageBackend {
  readonly storageType = STORAGE_TYPE;
  private readonly client: PerforceClient;
  private readonly workspaceRoot: string;
  private readonly depotRoot: string;
  private readonly metadataDepotRoot: string;
  private readonly logger: Logger;

  constructor(options: ChangelistStoreOptions) {
    this.client = options.client;
    this.workspaceRoot = resolve(options.workspaceRoot);
    this.depotRoot = (options.depotRoot ?? '//depot').replace(/\/+$/, '');
    this.metadataDepotRoot = `${this.depotRoot}/${METADATA_SUBDIR}`;
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
    const assetName = basename(source);
    const assetDepotPath = `${this.depotRoot}/${assetName}`;
    const assetLocalPath = this.localPath(assetDepotPath);
    const timestamp = options.timestamp ?? new Date();

    const changelist = await this.inChangelist(
      `Store version of ${assetName}\n\nManaged by asset versioning`,
      async (change, stagingDir) => {
        const exists = await this.client.fileExists(assetDepotPath);
        if (exists) {
          await this.client.sync(assetDepotPath);
          await this.client.edit(change, [assetLocalPath]);
        }
        if (assetLocalPath !== source) {
          await mkdir(dirname(assetLocalPath), { recursive: true });
          await rm(assetLocalPath, { force: true });
          await copyFile(source, assetLocalPath);
        }
        if (!exists) {
          await this.client.add(change, [assetLocalPath]);
        }

        await this.addMetadataFile(
          change,
          stagingDir,
          buildSidecar(metadata, { originalPath: source, timestamp, extra: { changelist: change } })
        );
      }
    );

    this.logger.debug({ changelist, source }, 'Version submitted');
    return changelist;
  }

  async retrieve(storageId: string, targetPath?: string): Promise<string> {
    const files = await this.requireFiles(storageId);
    const asset = files.find((file) => !this.isMetadataFile(file.depotFile));

    let fileSpec: string;
    if (asset) {
      fileSpec = `${asset.depotFile}@${storageId}`;
    } else {
      // Versions promoted from a reference carry only metadata; the content
      // is the referenced file at the referenced changelist.
      const sidecar = await this.describe(storageId);
      const reference = referencedSource(sidecar);
      if (!reference) {
        throw new StorageNotFoundError(STORAGE_TYPE, `content of changelist ${storageId}`);
      }
      fileSpec = `${reference.path}@${reference.change}`;
    }

    try {
      if (targetPath !== undefined) {
        const target = resolve(targetPath);
        await mkdir(dirname(target), { recursive: true });
        await rm(target, { force: true });
        await this.client.printTo(fileSpec, target);
        return target;
      }
      await this.client.sync(fileSpec);
    } catch (error) {
      throw wrapFailure(error, 'retrieve');
    }
    return this.localPath(fileSpec.slice(0, fileSpec.lastIndexOf('@')));
  }

  async describe(storageId: string): Promise<StoredMetadata> {
    const files = await this.requireFiles(storageId);
    const metadataFile = files.find((file) => this.isMetadataFile(file.depotFile));
    if (!metadataFile) {
      throw new StorageNotFoundError(STORAGE_TYPE, `metadata for changelist ${storageId}`);
    }

    const content = await this.client.printText(`${metadataFile.depotFile}@${storageId}`);
    const sidecar = parseSidecar(STORAGE_TYPE, content, metadataFile.depotFile);
    const change = await this.client.describeChange(storageId);
    return {
      ...sidecar,
      changelist: storageId,
      user: change?.user ?? '',
      client: change?.client ?? '',
      time: change?.time ?? '',
      change_description: change?.description ?? '',
    };
  }

  /**
   * Promote a submitted changelist into a version: a new changelist holding
   * only a metadata file that points back at the referenced one.
   */
  async createFromReference(
    reference: StorageReference,
    metadata: AssetMetadata,
    options: StoreOptions = {}
  ): Promise<string> {
    if (reference.referenceType !== 'changelist') {
      throw new UnsupportedReferenceError(STORAGE_TYPE, reference.referenceType);
    }
    const source = CHANGE_ID_PATTERN.test(reference.storageId)
      ? await this.client.describeChange(reference.storageId)
      : null;
    if (!source) {
      throw new StorageNotFoundError(STORAGE_TYPE, `changelist ${reference.storageId}`);
    }

    const timestamp = options.timestamp ?? new Date();
    const changelist = await this.inChangelist(
      `Add metadata for ${reference.path}\n\nReferencing CL: ${reference.storageId}`,
      (change, stagingDir) =>
        this.addMetadataFile(
          change,
          stagingDir,
          buildSidecar(metadata, {
            originalPath: reference.path,
            timestamp,
            reference,
            extra: {
              original_changelist: reference.storageId,
              source_change: sourceChangeFields(source),
            },
          })
        )
    );

    this.logger.debug(
      { changelist, referenced: reference.storageId },
      'Version created from changelist reference'
    );
    return changelist;
  }

  async listReferences(
    referenceType?: ReferenceType,
    pathPattern?: string
  ): Promise<StorageReference[]> {
    if (referenceType && referenceType !== 'changelist') {
      return [];
    }

    const refs: StorageReference[] = [];
    for (const change of await this.client.changes(`${this.depotRoot}/...`)) {
      const files = await this.client.filesInChange(change.change);
      const assets = files.filter((file) => !this.isMetadataFile(file.depotFile));

      for (const file of assets) {
        if (!matchesPathPattern(file.depotFile, pathPattern)) continue;
        refs.push({
          storageType: STORAGE_TYPE,
          storageId: change.change,
          path: file.depotFile,
          referenceType: 'changelist',
          metadata: {
            description: change.description,
            user: change.user,
            client: change.client,
            time: change.time,
            action: file.action,
          },
        });
      }
    }
    return refs;
  }

  // ---- Changelist scope ----

  /**
   * Open a changelist, let `body` populate it, and submit. The staging
   * directory handed to `body` is removed on every exit path; a changelist
   * that was not submitted is reverted and deleted.
   */
  private async inChangelist(
    description: string,
    body: (change: string, stagingDir: string) => Promise<void>
  ): Promise<string> {
    const stagingDir = await mkdtemp(join(tmpdir(), 'asset-changelist-'));
    let change: string | undefined;
    let submitted = false;
    try {
      change = await this.client.createChange(description);
      await body(change, stagingDir);
      const result = await this.client.submit(change);
      submitted = true;
      return result;
    } catch (error) {
      throw wrapFailure(error, 'submit');
    } finally {
      await rm(stagingDir, { recursive: true, force: true });
      if (change !== undefined && !submitted) {
        await this.abandon(change);
      }
    }
  }

  private async abandon(change: string): Promise<void> {
    try {
      await this.client.revert(change);
      await this.client.deleteChange(change);
    } catch (error) {
      this.logger.warn({ change, err: errorMessage(error) }, 'Failed to discard pending changelist');
    }
  }

  /** Serialize the sidecar in the staging dir, then open it for add in the workspace. */
  private async addMetadataFile(
    change: string,
    stagingDir: string,
    sidecar: StoredMetadata
  ): Promise<void> {
    const staged = join(stagingDir, `${change}.json`);
    await writeFile(staged, toJsonDocument(sidecar));

    const localPath = this.localPath(`${this.metadataDepotRoot}/${change}.json`);
    await mkdir(dirname(localPath), { recursive: true });
    await copyFile(staged, localPath);
    await this.client.add(change, [localPath], 'text');
  }

  // ---- Private helpers ----

  private async requireFiles(storageId: string): Promise<P4File[]> {
    if (!CHANGE_ID_PATTERN.test(storageId)) {
      throw new StorageNotFoundError(STORAGE_TYPE, `changelist ${storageId}`);
    }
    const files = await this.client.filesInChange(storageId);
    if (files.length === 0) {
      throw new StorageNotFoundError(STORAGE_TYPE, `changelist ${storageId}`);
    }
    return files;
  }

  private isMetadataFile(depotFile: string): boolean {
    return depotFile.startsWith(`${this.metadataDepotRoot}/`);
  }

  /** Workspace path of a depot path under the depot root. */
  private localPath(depotPath: string): string {
    const relativePath = depotPath.startsWith(`${this.depotRoot}/`)
      ? depotPath.slice(this.depotRoot.length + 1)
      : basename(depotPath);
    return join(this.workspaceRoot, ...relativePath.split('/'));
  }
}

function sourceChangeFields(change: P4Change): MetadataMap {
  return {
    description: change.description,
    user: change.user,
    client: change.client,
    time: change.time,
  };
}

function referencedSource(sidecar: StoredMetadata): { path: string; change: string } | null {
  const change = sidecar.original_changelist;
  const reference = sidecar.reference;
  if (typeof change !== 'string' || typeof reference !== 'object' || reference === null) {
    return null;
  }
  if (!('path' in reference) || typeof reference.path !== 'string') {
    return null;
  }
  return { path: reference.path, change };
}

function wrapFailure(error: unknown, operation: string): Error {
  if (error instanceof StorageNotFoundError || error instanceof BackendFailureError) {
    return error;
  }
  return new BackendFailureError(STORAGE_TYPE, `${operation}: ${errorMessage(error)}`);
}
