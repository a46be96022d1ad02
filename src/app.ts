import type { Logger } from 'pino';

import type { Config } from './config/index.js';
import { HistoryReconciler } from './history/reconciler.js';
import { initSentry } from './instrument.js';
import { createLogger } from './logger.js';
import { createVersionRepository } from './repository/index.js';
import type { SqliteVersionRepository } from './repository/index.js';
import { createStorageBackend } from './storage/index.js';
import type { CommandRunner, StorageBackend } from './storage/index.js';
import { AssetVersionOrchestrator } from './versioning/orchestrator.js';

export interface CreateAssetVersioningOptions {
  config: Config;
  /** Use this logger instead of one built from config.logging */
  logger?: Logger;
  /** Override the git / p4 process runner */
  runner?: CommandRunner;
}

export interface AssetVersioning {
  orchestrator: AssetVersionOrchestrator;
  history: HistoryReconciler;
  backends: ReadonlyMap<string, StorageBackend>;
  repository?: SqliteVersionRepository;
  logger: Logger;
  /** Flush and close the repository */
  close(): Promise<void>;
}

/**
 * Build the backends, the optional repository, the orchestrator and the
 * history reconciler described by `config`.
 */
export async function createAssetVersioning(
  options: CreateAssetVersioningOptions
): Promise<AssetVersioning> {
  const { config } = options;
  const logger = options.logger ?? createLogger(config.logging);

  initSentry(
    {
      dsn: config.sentry?.dsn,
      environment: config.sentry?.environment ?? config.env,
      tracesSampleRate: config.sentry?.tracesSampleRate,
    },
    logger
  );

  const backends = new Map<string, StorageBackend>();
  for (const backendConfig of config.backends) {
    backends.set(
      backendConfig.name,
      createStorageBackend(backendConfig, {
        logger,
        timeoutMs: config.commands.timeoutMs,
        runner: options.runner,
      })
    );
  }

  const repository = config.repository
    ? await createVersionRepository(config.repository, logger)
    : undefined;

  const history = new HistoryReconciler({ backends, logger });
  const orchestrator = new AssetVersionOrchestrator({
    backends,
    repository,
    reconciler: history,
    logger,
  });

  logger.info(
    { backends: [...backends.keys()], repository: Boolean(repository) },
    'Asset versioning ready'
  );

  return {
    orchestrator,
    history,
    backends,
    repository,
    logger,
    close: async () => {
      await repository?.close();
    },
  };
}
