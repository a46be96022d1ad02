// Version repository contract: the canonical cross-backend version index.
//
// The orchestrator depends only on VersionRepository; SqliteVersionRepository
// is the shipped implementation.

import type { MetadataMap } from '../types/index.js';

/** One logical version as recorded in the repository. */
export interface VersionRecord {
  /** Repository-assigned, globally unique */
  id: number;
  filePath: string;
  creator: string;
  toolVersion: string;
  description: string | null;
  createdAt: Date;
  customData: MetadataMap;
  /** Distinct tags in first-seen order */
  tags: string[];
}

/** A backend that holds a copy of a version. */
export interface StorageLocation {
  storageType: string;
  storageId: string;
  createdAt: Date;
}

export interface NewVersion {
  filePath: string;
  creator: string;
  toolVersion: string;
  description?: string | null;
  tags: readonly string[];
  customData: MetadataMap;
}

/** All given criteria must hold; `after` and `before` are inclusive. */
export interface FindVersionsFilter {
  filePath?: string;
  /** A version matches only if it carries every listed tag */
  tags?: readonly string[];
  creator?: string;
  after?: Date;
  before?: Date;
}

/** Fields left undefined are not changed. */
export interface VersionMetadataUpdate {
  description?: string;
  tags?: readonly string[];
  customData?: MetadataMap;
}

export interface VersionRepository {
  createVersion(version: NewVersion): Promise<number>;
  addStorageLocation(versionId: number, storageType: string, storageId: string): Promise<void>;
  /** Throws STORAGE_NOT_FOUND for unknown ids */
  getVersionInfo(versionId: number): Promise<VersionRecord>;
  getStorageLocations(versionId: number): Promise<StorageLocation[]>;
  findVersions(filter?: FindVersionsFilter): Promise<VersionRecord[]>;
}
