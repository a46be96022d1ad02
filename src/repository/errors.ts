import createError from '@fastify/error';

/** Version index read or write failed (500) */
export const RepositoryFailureError = createError<[string]>(
  'REPOSITORY_FAILURE',
  'Version repository failure: %s',
  500
);
