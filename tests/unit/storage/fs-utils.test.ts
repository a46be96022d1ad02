import { mkdir, mkdtemp, readdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import {
  copyFileAtomic,
  hashFile,
  hasErrorCode,
  matchesPathPattern,
  pathExists,
  toJsonDocument,
  writeFileAtomic,
} from '@/storage/fs-utils.js';

describe('fs-utils', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'asset-fs-utils-test-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('writeFileAtomic()', () => {
    it('should write the final file and leave the staging dir empty', async () => {
      const staging = join(testDir, '_staging');
      const target = join(testDir, 'nested', 'out.json');

      await writeFileAtomic(target, '{"a":1}', staging);

      expect(await readFile(target, 'utf-8')).toBe('{"a":1}');
      expect(await readdir(staging)).toEqual([]);
    });

    it('should replace an existing file', async () => {
      const target = join(testDir, 'out.txt');
      await writeFile(target, 'old');

      await writeFileAtomic(target, 'new', join(testDir, '_staging'));

      expect(await readFile(target, 'utf-8')).toBe('new');
    });
  });

  describe('copyFileAtomic()', () => {
    it('should replace the target and apply the mode', async () => {
      const source = join(testDir, 'source.txt');
      const target = join(testDir, 'out', 'target.txt');
      await writeFile(source, 'v2');
      await mkdir(join(testDir, 'out'));
      await writeFile(target, 'v1');

      await copyFileAtomic(source, target, 0o444);

      expect(await readFile(target, 'utf-8')).toBe('v2');
      expect((await stat(target)).mode & 0o777).toBe(0o444);
      expect(await readdir(join(testDir, 'out'))).toEqual(['target.txt']);
    });

    it('should leave an existing target untouched when the copy fails', async () => {
      const target = join(testDir, 'target.txt');
      await writeFile(target, 'keep me');
      await mkdir(join(testDir, 'not-a-file'));

      await expect(copyFileAtomic(join(testDir, 'not-a-file'), target, 0o644)).rejects.toThrow();

      expect(await readFile(target, 'utf-8')).toBe('keep me');
      expect((await readdir(testDir)).sort()).toEqual(['not-a-file', 'target.txt']);
    });
  });

  describe('hashFile()', () => {
    it('should return the SHA-256 of the content', async () => {
      const path = join(testDir, 'v1.txt');
      await writeFile(path, 'v1');

      expect(await hashFile(path)).toBe(
        '3bfc269594ef649228e9a74bab00f042efc91d5acc6fbee31a382e80d42388fe'
      );
    });
  });

  describe('pathExists()', () => {
    it('should report whether a path exists', async () => {
      expect(await pathExists(testDir)).toBe(true);
      expect(await pathExists(join(testDir, 'missing'))).toBe(false);
    });
  });

  describe('hasErrorCode()', () => {
    it('should match a system error code', async () => {
      const error = await readFile(join(testDir, 'missing')).catch((err: unknown) => err);

      expect(hasErrorCode(error, 'ENOENT')).toBe(true);
      expect(hasErrorCode(error, 'EACCES')).toBe(false);
      expect(hasErrorCode(new Error('plain'), 'ENOENT')).toBe(false);
      expect(hasErrorCode('ENOENT', 'ENOENT')).toBe(false);
    });
  });

  describe('matchesPathPattern()', () => {
    it('should match everything without a pattern', () => {
      expect(matchesPathPattern('textures/hero.png', undefined)).toBe(true);
      expect(matchesPathPattern('textures/hero.png', '')).toBe(true);
    });

    it('should match a substring', () => {
      expect(matchesPathPattern('textures/hero.png', 'hero')).toBe(true);
      expect(matchesPathPattern('textures/hero.png', 'villain')).toBe(false);
    });

    it('should match an absolute pattern by file name', () => {
      expect(matchesPathPattern('//depot/assets/hero.png', '/home/artist/work/hero.png')).toBe(true);
      expect(matchesPathPattern('//depot/assets/hero.png', '/home/artist/work/villain.png')).toBe(
        false
      );
    });

    it('should match a relative path pattern by file name', () => {
      expect(matchesPathPattern('hero.png', 'work/hero.png')).toBe(true);
      expect(matchesPathPattern('hero.png', 'work/villain.png')).toBe(false);
    });

    it('should not match a bare name that is not a substring', () => {
      expect(matchesPathPattern('textures/hero.png', 'hero.tga')).toBe(false);
    });
  });

  describe('toJsonDocument()', () => {
    it('should pretty-print with a trailing newline', () => {
      expect(toJsonDocument({ a: 1 })).toBe('{\n  "a": 1\n}\n');
    });
  });
});
