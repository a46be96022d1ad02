// Perforce access for the changelist backend.
//
// P4Cli drives the `p4` binary with tagged output (-ztag) through a
// CommandRunner. The ChangelistStore only sees the PerforceClient interface.

import { DEFAULT_COMMAND_TIMEOUT_MS, runCommand } from './exec.js';
import type { CommandResult, CommandRunner } from './exec.js';
import { BackendFailureError } from './errors.js';

export interface P4Change {
  change: string;
  user: string;
  client: string;
  /** Seconds since the epoch, as p4 reports it */
  time: string;
  description: string;
  status: string;
}

export interface P4File {
  depotFile: string;
  action: string;
  change: string;
}

export interface PerforceClient {
  /** Open a new pending changelist; returns its number */
  createChange(description: string): Promise<string>;
  /** Whether the depot has a live head revision of the file */
  fileExists(depotPath: string): Promise<boolean>;
  sync(fileSpec: string): Promise<void>;
  add(change: string, localPaths: string[], fileType?: string): Promise<void>;
  edit(change: string, localPaths: string[]): Promise<void>;
  /** Submit; returns the final number, which may differ after renumbering */
  submit(change: string): Promise<string>;
  revert(change: string): Promise<void>;
  deleteChange(change: string): Promise<void>;
  describeChange(change: string): Promise<P4Change | null>;
  filesInChange(change: string): Promise<P4File[]>;
  /** Write the content of a file revision to a local path */
  printTo(fileSpec: string, targetPath: string): Promise<void>;
  printText(fileSpec: string): Promise<string>;
  /** Submitted changes touching `pathSpec`, newest first */
  changes(pathSpec: string): Promise<P4Change[]>;
}

export interface P4CliOptions {
  workspaceRoot: string;
  port?: string;
  user?: string;
  client?: string;
  password?: string;
  charset?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

export class P4Cli implements PerforceClient {
  private readonly options: P4CliOptions;
  private readonly runner: CommandRunner;
  private readonly timeoutMs: number;

  constructor(options: P4CliOptions) {
    this.options = options;
    this.runner = options.runner ?? runCommand;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  }

  async createChange(description: string): Promise<string> {
    const template = await this.p4(['change', '-o']);
    const spec = withDescription(template.stdout, description);
    const result = await this.p4(['change', '-i'], { input: spec });
    const match = /Change (\d+) created/.exec(result.stdout);
    if (!match?.[1]) {
      throw new BackendFailureError('p4', `unexpected change output: ${result.stdout.trim()}`);
    }
    return match[1];
  }

  async fileExists(depotPath: string): Promise<boolean> {
    const result = await this.p4(['-ztag', 'fstat', '-T', 'headAction', depotPath], {
      allowFailure: true,
    });
    return parseTagged(result.stdout).some(
      (record) => record.headAction !== undefined && !record.headAction.includes('delete')
    );
  }

  async sync(fileSpec: string): Promise<void> {
    await this.p4(['sync', fileSpec]);
  }

  async add(change: string, localPaths: string[], fileType?: string): Promise<void> {
    await this.p4(['add', '-c', change, ...(fileType ? ['-t', fileType] : []), ...localPaths]);
  }

  async edit(change: string, localPaths: string[]): Promise<void> {
    await this.p4(['edit', '-c', change, ...localPaths]);
  }

  async submit(change: string): Promise<string> {
    const result = await this.p4(['-ztag', 'submit', '-c', change]);
    const submitted = parseTagged(result.stdout).find((record) => record.submittedChange);
    return submitted?.submittedChange ?? change;
  }

  async revert(change: string): Promise<void> {
    await this.p4(['revert', '-c', change, '//...'], { allowFailure: true });
  }

  async deleteChange(change: string): Promise<void> {
    await this.p4(['change', '-d', change]);
  }

  async describeChange(change: string): Promise<P4Change | null> {
    const result = await this.p4(['-ztag', 'describe', '-s', change], { allowFailure: true });
    const record = parseTagged(result.stdout).find((entry) => entry.change === change);
    return record ? toChange(record) : null;
  }

  async filesInChange(change: string): Promise<P4File[]> {
    const result = await this.p4(['-ztag', 'files', `@=${change}`], { allowFailure: true });
    return parseTagged(result.stdout)
      .filter((record) => record.depotFile)
      .map((record) => ({
        depotFile: record.depotFile ?? '',
        action: record.action ?? '',
        change: record.change ?? change,
      }));
  }

  async printTo(fileSpec: string, targetPath: string): Promise<void> {
    await this.p4(['print', '-q', '-o', targetPath, fileSpec]);
  }

  async printText(fileSpec: string): Promise<string> {
    const result = await this.p4(['print', '-q', fileSpec]);
    return result.stdout;
  }

  async changes(pathSpec: string): Promise<P4Change[]> {
    const result = await this.p4(['-ztag', 'changes', '-l', '-s', 'submitted', pathSpec]);
    return parseTagged(result.stdout)
      .filter((record) => record.change)
      .map(toChange);
  }

  private p4(
    args: string[],
    extra: { input?: string; allowFailure?: boolean } = {}
  ): Promise<CommandResult> {
    const { port, user, client, password, charset } = this.options;
    const globalArgs = [
      ...(port ? ['-p', port] : []),
      ...(user ? ['-u', user] : []),
      ...(client ? ['-c', client] : []),
      ...(password ? ['-P', password] : []),
      ...(charset ? ['-C', charset] : []),
    ];
    return this.runner('p4', [...globalArgs, ...args], {
      cwd: this.options.workspaceRoot,
      timeoutMs: this.timeoutMs,
      ...extra,
    });
  }
}

// ---------------------------------------------------------------------------
// Tagged output parsing
// ---------------------------------------------------------------------------

export type TaggedRecord = Record<string, string | undefined>;

/**
 * Parse `p4 -ztag` output into records. A line `... key value` sets a field;
 * a key already present in the current record starts a new record; other
 * lines continue the previous field's value (multi-line descriptions).
 */
export function parseTagged(output: string): TaggedRecord[] {
  const records: TaggedRecord[] = [];
  let current: TaggedRecord = {};
  let lastKey: string | null = null;

  const flush = (): void => {
    if (Object.keys(current).length > 0) records.push(current);
    current = {};
    lastKey = null;
  };

  for (const line of output.split(/\r?\n/)) {
    const match = /^\.\.\. (\S+)(?: (.*))?$/.exec(line);
    if (match?.[1]) {
      const key = match[1];
      if (key in current) flush();
      current[key] = match[2] ?? '';
      lastKey = key;
    } else if (lastKey !== null) {
      current[lastKey] = `${current[lastKey] ?? ''}\n${line}`;
    }
  }
  flush();

  for (const record of records) {
    for (const [key, value] of Object.entries(record)) {
      if (value !== undefined) record[key] = value.trimEnd();
    }
  }
  return records;
}

function toChange(record: TaggedRecord): P4Change {
  return {
    change: record.change ?? '',
    user: record.user ?? '',
    client: record.client ?? '',
    time: record.time ?? '',
    description: record.desc ?? '',
    status: record.status ?? '',
  };
}

/**
 * Replace the Description of a `p4 change -o` template and drop its Files
 * section, so files opened in the default changelist are not moved over.
 */
export function withDescription(template: string, description: string): string {
  const body = description
    .split('\n')
    .map((line) => `\t${line}`)
    .join('\n');
  return template
    .replace(/^Files:\n(?:\t.*(?:\n|$))*/m, '')
    .replace(/^Description:\n(?:\t.*(?:\n|$))*/m, `Description:\n${body}\n\n`);
}
