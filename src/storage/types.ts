// Storage backend contract.
//
// One backend owns one storage technology. The contract is the same whether
// the technology is content-addressed (disk), a mutable checkout (git) or a
// changelist server (perforce); ids are only meaningful to the backend that
// issued them.

import type { AssetMetadata, ReferenceType, StorageReference, StoredMetadata } from '../types/index.js';

export interface StoreOptions {
  /** Instant recorded for the new version; defaults to now */
  timestamp?: Date;
}

export interface StorageBackend {
  /** Technology tag reported in identifiers and references */
  readonly storageType: string;

  /**
   * Persist the file's bytes and a metadata record. Every call yields a new
   * storage id.
   */
  store(filePath: string, metadata: AssetMetadata, options?: StoreOptions): Promise<string>;

  /**
   * Return the stored bytes at `targetPath`, or at a backend-owned read-only
   * path when no target is given. Throws STORAGE_NOT_FOUND for unknown ids.
   */
  retrieve(storageId: string, targetPath?: string): Promise<string>;

  /**
   * Metadata passed to `store`, plus backend-injected fields (at least
   * `original_path` and `timestamp`). Throws STORAGE_NOT_FOUND for unknown ids.
   */
  describe(storageId: string): Promise<StoredMetadata>;

  /**
   * Promote existing content into a tracked version without re-uploading it.
   * Throws STORAGE_UNSUPPORTED_REFERENCE for reference types the backend
   * does not accept.
   */
  createFromReference(
    reference: StorageReference,
    metadata: AssetMetadata,
    options?: StoreOptions
  ): Promise<string>;

  /** Enumerate existing content. No match is an empty list, not an error. */
  listReferences(referenceType?: ReferenceType, pathPattern?: string): Promise<StorageReference[]>;
}
