// Cross-backend history: merges every backend's reference listing into a
// per-backend summary and one timeline.
//
// Backends report timestamps in their own formats (ISO strings, epoch
// seconds, git dates). The timeline is ordered by the raw timestamp string;
// `parsedTime` carries a normalized ISO value for callers that need true
// chronological order.

import type { Logger } from 'pino';

import { errorMessage } from '../errors/index.js';
import { captureFailure } from '../instrument.js';
import type { StorageBackend } from '../storage/types.js';
import type { MetadataMap, ReferenceType, StorageReference, StoredMetadata } from '../types/index.js';

/** Metadata keys consulted for an event time, highest priority first */
export const TIMESTAMP_KEYS = ['timestamp', 'time', 'date'] as const;

const DEFAULT_ACTION = 'unknown';

/** Epoch values below this are seconds, above it milliseconds */
const EPOCH_MILLIS_THRESHOLD = 1e11;

const MAX_DATE_MILLIS = 8.64e15;

export type ReferencesByBackend = Map<string, StorageReference[]>;

export interface ReferenceDetail {
  id: string;
  path: string;
  type: ReferenceType;
  metadata: MetadataMap;
}

export interface BackendSummary {
  versionCount: number;
  references: ReferenceDetail[];
  /** Number of distinct values seen per metadata key */
  uniqueValues: Record<string, number>;
}

export interface TimelineEvent {
  /** Backend name */
  backend: string;
  referenceId: string;
  path: string;
  type: ReferenceType;
  /** Raw timestamp as the backend reported it */
  timestamp: string | null;
  /** `timestamp` normalized to ISO 8601, when it could be parsed */
  parsedTime: string | null;
  action: string;
  metadata: MetadataMap;
}

export interface StorageVersionEntry {
  backend: string;
  storageId: string;
  path: string;
  referenceType: ReferenceType;
  metadata: StoredMetadata;
}

export interface HistoryMetadata {
  storageSummary: Record<string, BackendSummary>;
  firstVersion?: string;
  latestVersion?: string;
  totalReferences?: number;
  repositoryLatestVersion?: number;
  repositoryTotalVersions?: number;
}

export interface HistoryReport {
  assetPath: string;
  metadata: HistoryMetadata;
  timeline?: TimelineEvent[];
  storageVersions?: StorageVersionEntry[];
}

export interface DumpHistoryOptions {
  includeStorageData?: boolean;
  includeTimeline?: boolean;
}

export interface HistoryReconcilerDeps {
  /** Backends by name, in configuration order */
  backends: ReadonlyMap<string, StorageBackend>;
  logger: Logger;
}

export class HistoryReconciler {
  private readonly backends: ReadonlyMap<string, StorageBackend>;
  private readonly logger: Logger;

  constructor(deps: HistoryReconcilerDeps) {
    this.backends = deps.backends;
    this.logger = deps.logger.child({ component: 'history' });
  }

  /**
   * List references on every backend. A backend whose listing fails
   * contributes an empty list; the failure is logged and reported.
   */
  async collectReferences(pathFilter?: string): Promise<ReferencesByBackend> {
    const references: ReferencesByBackend = new Map();
    for (const [name, backend] of this.backends) {
      try {
        references.set(name, await backend.listReferences(undefined, pathFilter || undefined));
      } catch (error) {
        this.logger.warn(
          { backend: name, pathFilter, err: errorMessage(error) },
          'Listing references failed, treating backend as empty'
        );
        captureFailure(error, { backend: name, operation: 'listReferences' });
        references.set(name, []);
      }
    }
    return references;
  }

  buildSummary(references: ReferencesByBackend): Record<string, BackendSummary> {
    const summary: Record<string, BackendSummary> = {};
    for (const [name, refs] of references) {
      const distinct = new Map<string, Set<string>>();
      for (const ref of refs) {
        for (const [key, value] of Object.entries(ref.metadata)) {
          let seen = distinct.get(key);
          if (!seen) {
            seen = new Set();
            distinct.set(key, seen);
          }
          seen.add(valueKey(value));
        }
      }

      summary[name] = {
        versionCount: refs.length,
        references: refs.map((ref) => ({
          id: ref.storageId,
          path: ref.path,
          type: ref.referenceType,
          metadata: ref.metadata,
        })),
        uniqueValues: Object.fromEntries(
          [...distinct].map(([key, values]) => [key, values.size])
        ),
      };
    }
    return summary;
  }

  /**
   * Flatten all references into events sorted by their raw timestamp string.
   * Events without a timestamp sort first; ties keep listing order.
   */
  extractTimeline(references: ReferencesByBackend): TimelineEvent[] {
    const events: TimelineEvent[] = [];
    for (const [name, refs] of references) {
      for (const ref of refs) {
        const timestamp = pickTimestamp(ref.metadata);
        const action = ref.metadata.action;
        events.push({
          backend: name,
          referenceId: ref.storageId,
          path: ref.path,
          type: ref.referenceType,
          timestamp,
          parsedTime: parseTimestamp(timestamp),
          action: typeof action === 'string' && action ? action : DEFAULT_ACTION,
          metadata: ref.metadata,
        });
      }
    }
    return events.sort((a, b) => compareStrings(a.timestamp ?? '', b.timestamp ?? ''));
  }

  async dumpHistory(assetPath: string, options: DumpHistoryOptions = {}): Promise<HistoryReport> {
    const { includeStorageData = true, includeTimeline = true } = options;
    const references = await this.collectReferences(assetPath);

    const report: HistoryReport = {
      assetPath,
      metadata: { storageSummary: this.buildSummary(references) },
    };

    const timeline = this.extractTimeline(references);
    if (includeTimeline) {
      report.timeline = timeline;
    }

    if (timeline.length > 0) {
      const stamps = timeline
        .map((event) => event.timestamp)
        .filter((stamp): stamp is string => stamp !== null);
      const sorted = [...stamps].sort(compareStrings);
      const first = sorted[0];
      const latest = sorted[sorted.length - 1];
      if (first !== undefined && latest !== undefined) {
        report.metadata.firstVersion = first;
        report.metadata.latestVersion = latest;
      }
      report.metadata.totalReferences = timeline.length;
    }

    if (includeStorageData) {
      report.storageVersions = await this.describeAll(references);
    }

    this.logger.debug({ assetPath, totalReferences: timeline.length }, 'History dumped');
    return report;
  }

  /** Describe every collected reference; entries whose describe fails are skipped. */
  private async describeAll(references: ReferencesByBackend): Promise<StorageVersionEntry[]> {
    const entries: StorageVersionEntry[] = [];
    for (const [name, refs] of references) {
      const backend = this.backends.get(name);
      if (!backend) continue;

      for (const ref of refs) {
        try {
          entries.push({
            backend: name,
            storageId: ref.storageId,
            path: ref.path,
            referenceType: ref.referenceType,
            metadata: await backend.describe(ref.storageId),
          });
        } catch (error) {
          this.logger.warn(
            { backend: name, storageId: ref.storageId, err: errorMessage(error) },
            'Describe failed, omitting entry from history'
          );
          captureFailure(error, { backend: name, storageId: ref.storageId, operation: 'describe' });
        }
      }
    }
    return entries;
  }
}

// ---------------------------------------------------------------------------
// Timestamp handling
// ---------------------------------------------------------------------------

/** First present value among TIMESTAMP_KEYS, as a string */
export function pickTimestamp(metadata: MetadataMap): string | null {
  for (const key of TIMESTAMP_KEYS) {
    const value = metadata[key];
    if (value === undefined || value === null || value === '') continue;
    if (value instanceof Date) return value.toISOString();
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
  }
  return null;
}

/**
 * Normalize a backend timestamp to ISO 8601. Integers are epoch seconds
 * (or milliseconds when large); anything else goes through Date.parse.
 */
export function parseTimestamp(raw: string | null): string | null {
  if (raw === null) return null;
  const trimmed = raw.trim();
  let millis: number;
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    const epoch = Number(trimmed);
    millis = epoch < EPOCH_MILLIS_THRESHOLD ? epoch * 1000 : epoch;
  } else {
    millis = Date.parse(trimmed);
  }
  return Number.isFinite(millis) && Math.abs(millis) <= MAX_DATE_MILLIS
    ? new Date(millis).toISOString()
    : null;
}

/** Plain code-unit comparison, independent of locale */
function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function valueKey(value: unknown): string {
  if (value === undefined) return 'undefined';
  return JSON.stringify(value) ?? String(value);
}
