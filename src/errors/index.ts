import createError from '@fastify/error';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);

/** A backend name was requested that is not configured (400) */
export const UnknownBackendError = createError<[string]>(
  'CONFIG_UNKNOWN_BACKEND',
  'Storage backend not configured: %s',
  400
);

/** A repository-only operation was called without a repository (400) */
export const RepositoryNotConfiguredError = createError<[string]>(
  'CONFIG_NO_REPOSITORY',
  'No version repository attached: %s',
  400
);

// Storage errors (STORAGE_*) - re-exported from storage domain
export {
  StorageNotFoundError,
  UnsupportedReferenceError,
  BackendFailureError,
} from '../storage/errors.js';

// Metadata errors (METADATA_*)
export { InvalidMetadataError } from './metadata.js';

// Repository errors (REPOSITORY_*) - re-exported from repository domain
export { RepositoryFailureError } from '../repository/errors.js';

/**
 * Whether an error belongs to the configuration family (CONFIG_*).
 * Covers both config-file problems and unknown backend / missing repository.
 */
export function isConfigurationError(error: unknown): boolean {
  return errorCode(error)?.startsWith('CONFIG_') ?? false;
}

/** Extract the `code` of an error, if it carries one. */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Message of an unknown thrown value, for logging. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
