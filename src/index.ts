// Public API.

export { createAssetVersioning } from './app.js';
export type { AssetVersioning, CreateAssetVersioningOptions } from './app.js';

export { loadConfig, parseConfig } from './config/index.js';
export type {
  BackendConfig,
  Config,
  DiskBackendConfig,
  GitBackendConfig,
  PerforceBackendConfig,
} from './config/index.js';

export { createLogger } from './logger.js';
export { initSentry } from './instrument.js';

export { AssetVersionOrchestrator } from './versioning/orchestrator.js';
export type {
  AssetHistoryOptions,
  AssetHistoryReport,
  AssetVersionOrchestratorDeps,
  RepositoryVersionEntry,
} from './versioning/orchestrator.js';

export { HistoryReconciler, parseTimestamp, pickTimestamp } from './history/reconciler.js';
export type {
  BackendSummary,
  DumpHistoryOptions,
  HistoryReport,
  ReferencesByBackend,
  StorageVersionEntry,
  TimelineEvent,
} from './history/reconciler.js';

export * from './storage/index.js';
export * from './repository/index.js';

export {
  AssetMetadataSchema,
  ReferenceTypes,
  fromSidecarFields,
  parseAssetMetadata,
} from './types/index.js';
export type {
  AssetMetadata,
  AssetMetadataInput,
  MetadataMap,
  ReferenceType,
  StorageKind,
  StorageReference,
  StoredMetadata,
  VersionIdentifier,
} from './types/index.js';

export {
  ConfigInvalidError,
  ConfigMissingError,
  ConfigParseError,
  InvalidMetadataError,
  RepositoryNotConfiguredError,
  UnknownBackendError,
  errorCode,
  isConfigurationError,
} from './errors/index.js';
