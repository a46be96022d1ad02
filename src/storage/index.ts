// Storage module barrel export and factory function.

import type { Logger } from 'pino';

import type { BackendConfig } from '../config/index.js';

import { BranchStore } from './branch-store.js';
import { ChangelistStore } from './changelist-store.js';
import { DiskStore } from './disk-store.js';
import type { CommandRunner } from './exec.js';
import { GitCli } from './git-client.js';
import { P4Cli } from './perforce-client.js';
import type { StorageBackend } from './types.js';

export type { StorageBackend, StoreOptions } from './types.js';
export { DiskStore, compactTimestamp, isDiskVersionId } from './disk-store.js';
export { BranchStore, DEFAULT_BRANCH_PREFIX } from './branch-store.js';
export { ChangelistStore } from './changelist-store.js';
export { GitCli, parseCommitFields, parseLog } from './git-client.js';
export type { GitCommitInfo, GitIdentity, GitWorktree } from './git-client.js';
export { P4Cli, parseTagged, withDescription } from './perforce-client.js';
export type { P4Change, P4File, PerforceClient } from './perforce-client.js';
export { DEFAULT_COMMAND_TIMEOUT_MS, runCommand } from './exec.js';
export type { CommandOptions, CommandResult, CommandRunner } from './exec.js';
export { BackendFailureError, StorageNotFoundError, UnsupportedReferenceError } from './errors.js';

export interface StorageBackendDeps {
  logger: Logger;
  /** Deadline for each git / p4 command */
  timeoutMs: number;
  /** Override the child-process runner (tests) */
  runner?: CommandRunner;
}

/**
 * Create a storage backend from its configuration entry.
 */
export function createStorageBackend(
  config: BackendConfig,
  deps: StorageBackendDeps
): StorageBackend {
  const logger = deps.logger.child({ backendName: config.name });

  switch (config.type) {
    case 'disk':
      return new DiskStore({ root: config.root, logger });
    case 'git':
      return new BranchStore({
        worktree: new GitCli({
          root: config.repoPath,
          timeoutMs: deps.timeoutMs,
          identity: config.identity,
          runner: deps.runner,
        }),
        branchPrefix: config.branchPrefix,
        logger,
      });
    case 'perforce':
      return new ChangelistStore({
        client: new P4Cli({
          workspaceRoot: config.workspaceRoot,
          port: config.port,
          user: config.user,
          client: config.client,
          password: config.password,
          charset: config.charset,
          timeoutMs: deps.timeoutMs,
          runner: deps.runner,
        }),
        workspaceRoot: config.workspaceRoot,
        depotRoot: config.depotRoot,
        logger,
      });
  }
}
