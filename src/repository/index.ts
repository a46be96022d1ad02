// Repository module barrel export and factory function.

import type { Logger } from 'pino';

import { SqliteVersionRepository } from './sqlite-repository.js';

export type {
  FindVersionsFilter,
  NewVersion,
  StorageLocation,
  VersionMetadataUpdate,
  VersionRecord,
  VersionRepository,
} from './types.js';
export { SqliteVersionRepository } from './sqlite-repository.js';
export { SqlDatabase } from './database.js';
export { RepositoryFailureError } from './errors.js';

export interface RepositoryConfig {
  /** Database file; in-memory only when omitted */
  path?: string;
}

/**
 * Open the SQLite version repository described by the configuration.
 */
export function createVersionRepository(
  config: RepositoryConfig,
  logger: Logger
): Promise<SqliteVersionRepository> {
  return SqliteVersionRepository.open({ path: config.path, logger });
}
