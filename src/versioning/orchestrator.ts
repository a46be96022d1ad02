// Creates logical versions across the configured backends and the optional
// version repository.
//
// Failure policy of createVersion / createFromReference:
//   1. repository create fails  -> abort, nothing written to any backend
//   2. backend store fails      -> abort; earlier backends keep their copy,
//                                  later backends are never attempted
//   3. location register fails  -> logged and reported, loop continues
// Backends are written strictly one after another in the requested order.

import type { Logger } from 'pino';

import {
  RepositoryFailureError,
  RepositoryNotConfiguredError,
  UnknownBackendError,
  errorMessage,
} from '../errors/index.js';
import { HistoryReconciler } from '../history/reconciler.js';
import type { DumpHistoryOptions, HistoryReport } from '../history/reconciler.js';
import { captureFailure } from '../instrument.js';
import type {
  FindVersionsFilter,
  StorageLocation,
  VersionRecord,
  VersionRepository,
} from '../repository/types.js';
import type { StorageBackend } from '../storage/types.js';
import { fromSidecarFields, parseAssetMetadata } from '../types/index.js';
import type {
  AssetMetadata,
  AssetMetadataInput,
  MetadataMap,
  StorageReference,
  StoredMetadata,
  VersionIdentifier,
} from '../types/index.js';

export interface RepositoryVersionEntry {
  versionId: number;
  creator: string;
  toolVersion: string;
  description: string | null;
  /** ISO 8601 */
  createdAt: string;
  tags: string[];
  customData: MetadataMap;
  storageLocations?: StorageLocation[];
}

export interface AssetHistoryReport extends HistoryReport {
  repositoryVersions?: RepositoryVersionEntry[];
  /** Set instead of repositoryVersions when the repository could not be read */
  repositoryError?: string;
}

export interface AssetHistoryOptions extends DumpHistoryOptions {
  /** Limit repository versions to this id */
  versionId?: number;
}

export interface AssetVersionOrchestratorDeps {
  /** Backends by name; iteration order is the default write order */
  backends: ReadonlyMap<string, StorageBackend>;
  repository?: VersionRepository;
  logger: Logger;
  reconciler?: HistoryReconciler;
}

export class AssetVersionOrchestrator {
  private readonly backends: ReadonlyMap<string, StorageBackend>;
  private readonly repository?: VersionRepository;
  private readonly reconciler: HistoryReconciler;
  private readonly logger: Logger;

  constructor(deps: AssetVersionOrchestratorDeps) {
    this.backends = deps.backends;
    this.repository = deps.repository;
    this.reconciler =
      deps.reconciler ?? new HistoryReconciler({ backends: deps.backends, logger: deps.logger });
    this.logger = deps.logger.child({ component: 'orchestrator' });
  }

  /**
   * Store `filePath` as one logical version on each backend in
   * `backendNames` (default: all, in configuration order).
   * Returns one identifier per backend that stored it.
   */
  async createVersion(
    filePath: string,
    metadataInput: AssetMetadataInput,
    backendNames?: readonly string[]
  ): Promise<Map<string, VersionIdentifier>> {
    const metadata = parseAssetMetadata(metadataInput);
    const targets = this.selectBackends(backendNames);
    const versionId = await this.recordVersion(filePath, metadata);

    const identifiers = new Map<string, VersionIdentifier>();
    for (const [name, backend] of targets) {
      const timestamp = new Date();
      const storageId = await backend.store(filePath, metadata, { timestamp });
      identifiers.set(name, {
        storageType: name,
        storageId,
        filePath,
        timestamp,
        metadata,
      });
      this.logger.info({ backend: name, storageId, filePath }, 'Version stored');

      if (versionId !== undefined) {
        await this.registerLocation(versionId, name, storageId);
      }
    }
    return identifiers;
  }

  /**
   * Promote existing content on one backend into a tracked version, with
   * the same repository policy as createVersion.
   */
  async createFromReference(
    backendName: string,
    reference: StorageReference,
    metadataInput: AssetMetadataInput
  ): Promise<VersionIdentifier> {
    const metadata = parseAssetMetadata(metadataInput);
    const backend = this.getBackend(backendName);
    const versionId = await this.recordVersion(reference.path, metadata);

    const timestamp = new Date();
    const storageId = await backend.createFromReference(reference, metadata, { timestamp });
    this.logger.info(
      { backend: backendName, storageId, reference: reference.storageId },
      'Version created from reference'
    );
    if (versionId !== undefined) {
      await this.registerLocation(versionId, backendName, storageId);
    }

    return {
      storageType: backendName,
      storageId,
      filePath: reference.path,
      timestamp,
      metadata,
    };
  }

  async retrieve(backendName: string, storageId: string, targetPath?: string): Promise<string> {
    return this.getBackend(backendName).retrieve(storageId, targetPath);
  }

  /** The metadata a version was stored with. */
  async describe(backendName: string, storageId: string): Promise<AssetMetadata> {
    return fromSidecarFields(await this.getBackend(backendName).describe(storageId));
  }

  /** Everything the backend records about a version, injected fields included. */
  async inspect(backendName: string, storageId: string): Promise<StoredMetadata> {
    return this.getBackend(backendName).describe(storageId);
  }

  async findVersions(filter: FindVersionsFilter = {}): Promise<VersionRecord[]> {
    return this.requireRepository('findVersions').findVersions(filter);
  }

  async getStorageLocations(versionId: number): Promise<StorageLocation[]> {
    return this.requireRepository('getStorageLocations').getStorageLocations(versionId);
  }

  listBackends(): string[] {
    return [...this.backends.keys()];
  }

  get history(): HistoryReconciler {
    return this.reconciler;
  }

  /**
   * Backend history of an asset plus, when a repository is attached, its
   * repository versions. A repository failure is reported in the result.
   */
  async dumpAssetHistory(
    filePath: string,
    options: AssetHistoryOptions = {}
  ): Promise<AssetHistoryReport> {
    const includeStorageData = options.includeStorageData ?? true;
    const report: AssetHistoryReport = await this.reconciler.dumpHistory(filePath, options);
    const repository = this.repository;
    if (!repository) {
      return report;
    }

    try {
      let versions = await repository.findVersions({ filePath });
      if (options.versionId !== undefined) {
        versions = versions.filter((version) => version.id === options.versionId);
      }

      const entries: RepositoryVersionEntry[] = [];
      for (const version of versions) {
        entries.push({
          versionId: version.id,
          creator: version.creator,
          toolVersion: version.toolVersion,
          description: version.description,
          createdAt: version.createdAt.toISOString(),
          tags: version.tags,
          customData: version.customData,
          ...(includeStorageData && {
            storageLocations: await repository.getStorageLocations(version.id),
          }),
        });
      }
      report.repositoryVersions = entries;

      const latest = versions[versions.length - 1];
      if (latest) {
        report.metadata.repositoryLatestVersion = latest.id;
        report.metadata.repositoryTotalVersions = versions.length;
      }
    } catch (error) {
      this.logger.error({ filePath, err: errorMessage(error) }, 'Failed to read repository history');
      captureFailure(error, { filePath, operation: 'dumpAssetHistory' });
      report.repositoryError = errorMessage(error);
    }
    return report;
  }

  // ---- Private helpers ----

  private getBackend(name: string): StorageBackend {
    const backend = this.backends.get(name);
    if (!backend) {
      throw new UnknownBackendError(name);
    }
    return backend;
  }

  /** Resolve every requested name before anything is written. */
  private selectBackends(names?: readonly string[]): [string, StorageBackend][] {
    if (names === undefined) {
      return [...this.backends];
    }
    return names.map((name): [string, StorageBackend] => [name, this.getBackend(name)]);
  }

  private requireRepository(operation: string): VersionRepository {
    if (!this.repository) {
      throw new RepositoryNotConfiguredError(operation);
    }
    return this.repository;
  }

  /** Repository row for a new version; undefined when no repository is attached. */
  private async recordVersion(
    filePath: string,
    metadata: AssetMetadata
  ): Promise<number | undefined> {
    if (!this.repository) return undefined;
    try {
      return await this.repository.createVersion({
        filePath,
        creator: metadata.creator,
        toolVersion: metadata.toolVersion,
        description: metadata.description ?? null,
        tags: metadata.tags,
        customData: { ...metadata.customData },
      });
    } catch (error) {
      this.logger.error({ filePath, err: errorMessage(error) }, 'Failed to record version');
      if (error instanceof RepositoryFailureError) throw error;
      throw new RepositoryFailureError(`createVersion: ${errorMessage(error)}`);
    }
  }

  private async registerLocation(
    versionId: number,
    backendName: string,
    storageId: string
  ): Promise<void> {
    try {
      await this.repository?.addStorageLocation(versionId, backendName, storageId);
    } catch (error) {
      this.logger.error(
        { versionId, backend: backendName, storageId, err: errorMessage(error) },
        'Failed to register storage location'
      );
      captureFailure(error, { versionId, backend: backendName, storageId });
    }
  }
}
