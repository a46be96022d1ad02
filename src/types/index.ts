// Shared data model: asset metadata, version identifiers, storage references.
//
// Metadata is camelCase on the TypeScript side and snake_case in the sidecar
// documents that backends persist (see toSidecarFields / fromSidecarFields).

import { z } from 'zod';

import { InvalidMetadataError } from '../errors/metadata.js';

// ---------------------------------------------------------------------------
// Asset metadata
// ---------------------------------------------------------------------------

/** Opaque, string-keyed map used for custom data and reference metadata. */
export type MetadataMap = Record<string, unknown>;

export const AssetMetadataSchema = z.object({
  creator: z.string().min(1, 'creator is required'),
  toolVersion: z.string().min(1, 'toolVersion is required'),
  description: z.string().optional(),
  /** Ordered, duplicates allowed */
  tags: z.array(z.string()).default(() => []),
  customData: z.record(z.string(), z.unknown()).default(() => ({})),
  creationTime: z.coerce.date().default(() => new Date()),
});

/** Caller-supplied metadata; optional fields take their defaults on parse. */
export type AssetMetadataInput = z.input<typeof AssetMetadataSchema>;

/** Immutable once parsed: identifiers on every backend share one value. */
export type AssetMetadata = Readonly<
  Omit<z.output<typeof AssetMetadataSchema>, 'tags' | 'customData'>
> & {
  readonly tags: readonly string[];
  readonly customData: Readonly<MetadataMap>;
};

/**
 * Normalize caller input into an AssetMetadata value.
 * The result is frozen and owns frozen copies of the tag list and custom data.
 */
export function parseAssetMetadata(input: AssetMetadataInput): AssetMetadata {
  const result = AssetMetadataSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new InvalidMetadataError(issues);
  }
  const parsed = result.data;
  return Object.freeze({
    ...parsed,
    tags: Object.freeze([...parsed.tags]),
    customData: Object.freeze({ ...parsed.customData }),
  });
}

/**
 * Metadata as persisted in a backend sidecar, plus whatever keys the backend
 * injected (original_path, timestamp, reference, commit or changelist fields).
 */
export interface StoredMetadata extends MetadataMap {
  creator: string;
  tool_version: string;
  description?: string | null;
  tags: string[];
  custom_data: MetadataMap;
  creation_time: string;
}

export function toSidecarFields(metadata: AssetMetadata): StoredMetadata {
  return {
    creator: metadata.creator,
    tool_version: metadata.toolVersion,
    description: metadata.description ?? null,
    tags: [...metadata.tags],
    custom_data: { ...metadata.customData },
    creation_time: metadata.creationTime.toISOString(),
  };
}

const StoredMetadataSchema = z.looseObject({
  creator: z.string(),
  tool_version: z.string(),
  description: z.string().nullish(),
  tags: z.array(z.string()).default(() => []),
  custom_data: z.record(z.string(), z.unknown()).default(() => ({})),
  creation_time: z.string().optional(),
});

/** Validate a parsed sidecar document. Returns null when it lacks required fields. */
export function readStoredMetadata(raw: unknown): StoredMetadata | null {
  const result = StoredMetadataSchema.safeParse(raw);
  if (!result.success) return null;
  const { creation_time, ...rest } = result.data;
  return { ...rest, creation_time: creation_time ?? '' };
}

/** Map a stored sidecar document back to AssetMetadata. */
export function fromSidecarFields(stored: StoredMetadata): AssetMetadata {
  return parseAssetMetadata({
    creator: stored.creator,
    toolVersion: stored.tool_version,
    description: stored.description ?? undefined,
    tags: stored.tags,
    customData: stored.custom_data,
    ...(stored.creation_time ? { creationTime: stored.creation_time } : {}),
  });
}

// ---------------------------------------------------------------------------
// Storage references
// ---------------------------------------------------------------------------

export const ReferenceTypes = ['file', 'commit', 'changelist', 'snapshot'] as const;

export type ReferenceType = (typeof ReferenceTypes)[number];

/** Storage technology tags reported by the built-in backends. */
export type StorageKind = 'disk' | 'git' | 'perforce';

/**
 * Pointer to content that already exists in a backend. A backend can promote
 * it into a tracked version without re-uploading the bytes.
 */
export interface StorageReference {
  storageType: string;
  storageId: string;
  path: string;
  referenceType: ReferenceType;
  metadata: MetadataMap;
}

/** Snake_case form of a reference, stored under the `reference` sidecar key. */
export function referenceToRecord(reference: StorageReference): MetadataMap {
  return {
    storage_type: reference.storageType,
    storage_id: reference.storageId,
    path: reference.path,
    reference_type: reference.referenceType,
    metadata: { ...reference.metadata },
  };
}

// ---------------------------------------------------------------------------
// Version identifiers
// ---------------------------------------------------------------------------

/**
 * One logical version as stored in one backend. The storageId is local to
 * that backend's namespace and means nothing to any other backend.
 */
export interface VersionIdentifier {
  readonly storageType: string;
  readonly storageId: string;
  readonly filePath: string;
  readonly timestamp: Date;
  readonly metadata: AssetMetadata;
}
