// File-system helpers shared by the backends.

import { createHash, randomUUID } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { access, chmod, copyFile, mkdir, open, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, isAbsolute, join } from 'node:path';

/** Whether an error is a Node.js system error with the given code. */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** SHA-256 of a file's content, streamed. */
export async function hashFile(path: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/** Flush a file's content to stable storage. */
export async function syncFile(path: string): Promise<void> {
  const handle = await open(path, 'r');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Write a file so that readers only ever see the complete content: the data
 * goes to a uniquely named file in `stagingDir` and is renamed into place.
 * `stagingDir` must be on the same file system as `finalPath`.
 */
export async function writeFileAtomic(
  finalPath: string,
  data: string | Uint8Array,
  stagingDir: string
): Promise<void> {
  await mkdir(stagingDir, { recursive: true });
  await mkdir(dirname(finalPath), { recursive: true });
  const staged = join(stagingDir, `${randomUUID()}.tmp`);
  try {
    await writeFile(staged, data);
    await syncFile(staged);
    await rename(staged, finalPath);
  } catch (error) {
    await rm(staged, { force: true });
    throw error;
  }
}

/**
 * Copy `source` to `finalPath` through a staging file beside it, so the
 * target is replaced in one rename or left as it was.
 */
export async function copyFileAtomic(source: string, finalPath: string, mode: number): Promise<void> {
  await mkdir(dirname(finalPath), { recursive: true });
  const staged = join(dirname(finalPath), `.${basename(finalPath)}.${randomUUID()}.tmp`);
  try {
    await copyFile(source, staged);
    await chmod(staged, mode);
    await syncFile(staged);
    await rename(staged, finalPath);
  } catch (error) {
    await rm(staged, { force: true });
    throw error;
  }
}

/**
 * Path filter shared by every backend's listReferences: a substring match,
 * or for a pattern that is a path (absolute or relative, such as a caller's
 * asset path) a match on the file name, since the vcs backends keep assets
 * under their base name.
 */
export function matchesPathPattern(path: string, pattern: string | undefined): boolean {
  if (!pattern) return true;
  if (path.includes(pattern)) return true;
  const isPath = isAbsolute(pattern) || pattern.includes('/');
  return isPath && basename(pattern) === basename(path);
}

/** Serialize a sidecar or metadata document the way every backend writes it. */
export function toJsonDocument(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}
