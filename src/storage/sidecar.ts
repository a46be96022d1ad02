// Metadata sidecar documents written next to stored content by the disk and
// branch backends, and as the metadata file of a changelist.

import type { AssetMetadata, MetadataMap, StorageReference, StoredMetadata } from '../types/index.js';
import { readStoredMetadata, referenceToRecord, toSidecarFields } from '../types/index.js';

import { BackendFailureError } from './errors.js';

export interface SidecarOptions {
  originalPath: string;
  timestamp: Date;
  reference?: StorageReference;
  /** Backend-specific keys merged in last */
  extra?: MetadataMap;
}

export function buildSidecar(metadata: AssetMetadata, options: SidecarOptions): StoredMetadata {
  return {
    ...toSidecarFields(metadata),
    original_path: options.originalPath,
    timestamp: options.timestamp.toISOString(),
    ...(options.reference && { reference: referenceToRecord(options.reference) }),
    ...options.extra,
  };
}

/**
 * Parse a sidecar document read from storage.
 * A document that is not JSON or lacks the metadata fields is a backend failure.
 */
export function parseSidecar(storageType: string, content: string, source: string): StoredMetadata {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new BackendFailureError(storageType, `metadata ${source} is not valid JSON`);
  }
  const stored = readStoredMetadata(raw);
  if (!stored) {
    throw new BackendFailureError(storageType, `metadata ${source} is missing required fields`);
  }
  return stored;
}
