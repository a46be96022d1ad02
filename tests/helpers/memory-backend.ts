// Scriptable StorageBackend for orchestrator and reconciler tests.

import { vi } from 'vitest';

import { StorageNotFoundError, UnsupportedReferenceError } from '@/storage/errors.js';
import type { StorageBackend, StoreOptions } from '@/storage/types.js';
import { buildSidecar } from '@/storage/sidecar.js';
import type {
  AssetMetadata,
  ReferenceType,
  StorageReference,
  StoredMetadata,
} from '@/types/index.js';

export class MemoryBackend implements StorageBackend {
  readonly storageType: string;
  readonly versions = new Map<string, { filePath: string; sidecar: StoredMetadata }>();
  references: StorageReference[] = [];
  private counter = 0;

  readonly store = vi.fn(
    async (filePath: string, metadata: AssetMetadata, options: StoreOptions = {}): Promise<string> => {
      const storageId = `${this.storageType}-${++this.counter}`;
      this.versions.set(storageId, {
        filePath,
        sidecar: buildSidecar(metadata, {
          originalPath: filePath,
          timestamp: options.timestamp ?? new Date(),
        }),
      });
      return storageId;
    }
  );

  readonly retrieve = vi.fn(async (storageId: string, targetPath?: string): Promise<string> => {
    const version = this.versions.get(storageId);
    if (!version) throw new StorageNotFoundError(this.storageType, `version ${storageId}`);
    return targetPath ?? `/memory/${this.storageType}/${storageId}`;
  });

  readonly describe = vi.fn(async (storageId: string): Promise<StoredMetadata> => {
    const version = this.versions.get(storageId);
    if (!version) throw new StorageNotFoundError(this.storageType, `version ${storageId}`);
    return version.sidecar;
  });

  readonly createFromReference = vi.fn(
    async (
      reference: StorageReference,
      metadata: AssetMetadata,
      options: StoreOptions = {}
    ): Promise<string> => {
      if (reference.referenceType !== 'file') {
        throw new UnsupportedReferenceError(this.storageType, reference.referenceType);
      }
      return this.store(reference.path, metadata, options);
    }
  );

  readonly listReferences = vi.fn(
    async (referenceType?: ReferenceType, pathPattern?: string): Promise<StorageReference[]> =>
      this.references.filter(
        (ref) =>
          (!referenceType || ref.referenceType === referenceType) &&
          (!pathPattern || ref.path.includes(pathPattern))
      )
  );

  constructor(storageType: string) {
    this.storageType = storageType;
  }
}

export function reference(
  storageId: string,
  path: string,
  metadata: Record<string, unknown> = {},
  referenceType: ReferenceType = 'file'
): StorageReference {
  return { storageType: 'memory', storageId, path, referenceType, metadata };
}
