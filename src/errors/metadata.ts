import createError from '@fastify/error';

/** Caller-supplied asset metadata failed validation (400) */
export const InvalidMetadataError = createError<[string]>(
  'METADATA_INVALID',
  'Invalid asset metadata: %s',
  400
);
