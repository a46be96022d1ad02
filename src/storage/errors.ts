import createError from '@fastify/error';

// Storage backend errors (STORAGE_*)

/** Unknown storage id, or its metadata record is missing (404) */
export const StorageNotFoundError = createError<[string, string]>(
  'STORAGE_NOT_FOUND',
  '%s: %s not found',
  404
);

/** Reference type not accepted by the backend (400) */
export const UnsupportedReferenceError = createError<[string, string]>(
  'STORAGE_UNSUPPORTED_REFERENCE',
  '%s backend does not accept %s references',
  400
);

/** Underlying technology failed: VCS command, changelist server, file system (502) */
export const BackendFailureError = createError<[string, string]>(
  'STORAGE_BACKEND_FAILURE',
  '%s backend failure: %s',
  502
);
