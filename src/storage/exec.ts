// Child-process runner for the git and p4 command line tools.
//
// Every command runs with a deadline. A non-zero exit rejects with
// STORAGE_BACKEND_FAILURE unless the caller opts into inspecting it.

import { execFile } from 'node:child_process';

import { BackendFailureError } from './errors.js';

export const DEFAULT_COMMAND_TIMEOUT_MS = 60_000;

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export interface CommandOptions {
  cwd: string;
  timeoutMs: number;
  /** Written to the child's stdin, which is then closed */
  input?: string;
  env?: Record<string, string>;
  /** Resolve on a non-zero exit instead of rejecting */
  allowFailure?: boolean;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: CommandOptions
) => Promise<CommandResult>;

/**
 * Run a command with execFile. Spawn errors and timeouts always reject;
 * non-zero exits reject unless `allowFailure` is set.
 */
export const runCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = execFile(
      command,
      args,
      {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
        encoding: 'utf8',
        env: { ...process.env, ...options.env },
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }

        const summary = `${command} ${args.join(' ')}`;
        if (error.killed || error.signal) {
          reject(
            new BackendFailureError(command, `"${summary}" timed out after ${options.timeoutMs}ms`)
          );
          return;
        }
        if (typeof error.code === 'number') {
          if (options.allowFailure) {
            resolve({ stdout, stderr, exitCode: error.code });
            return;
          }
          const detail = stderr.trim() || stdout.trim() || `exit code ${error.code}`;
          reject(new BackendFailureError(command, `"${summary}" failed: ${detail}`));
          return;
        }
        reject(new BackendFailureError(command, `"${summary}" could not start: ${error.message}`));
      }
    );

    if (options.input !== undefined) {
      child.stdin?.end(options.input);
    }
  });
