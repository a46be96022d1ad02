import * as Sentry from '@sentry/node';
import type { Logger } from 'pino';

export interface SentryOptions {
  dsn?: string;
  environment: string;
  tracesSampleRate?: number;
}

// Only initialize if DSN is provided
// This allows running without Sentry in development
export function initSentry(options: SentryOptions, logger: Logger): boolean {
  if (!options.dsn) {
    logger.debug('Sentry DSN not configured, error tracking disabled');
    return false;
  }

  Sentry.init({
    dsn: options.dsn,
    environment: options.environment,
    tracesSampleRate: options.tracesSampleRate ?? 0.1,
    // Capture unhandled promise rejections
    integrations: [Sentry.onUnhandledRejectionIntegration()],
  });

  logger.info({ environment: options.environment }, 'Sentry initialized');
  return true;
}

/**
 * Report a failure that is logged and then tolerated (a skipped backend, a
 * missing storage location). No-op while Sentry is not initialized.
 */
export function captureFailure(error: unknown, extra: Record<string, unknown>): void {
  Sentry.captureException(error, { extra });
}
