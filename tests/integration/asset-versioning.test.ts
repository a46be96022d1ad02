import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { createAssetVersioning, parseConfig } from '@/index.js';
import { SqliteVersionRepository } from '@/repository/index.js';
import { BranchStore } from '@/storage/branch-store.js';
import { DiskStore } from '@/storage/disk-store.js';
import type { StorageBackend } from '@/storage/types.js';
import type { AssetMetadataInput } from '@/types/index.js';
import { AssetVersionOrchestrator } from '@/versioning/orchestrator.js';

import { createMockLogger } from '../helpers/logger.js';
import { MemoryGitWorktree } from '../helpers/memory-git.js';

const input: AssetMetadataInput = {
  creator: 'alice',
  toolVersion: 'blender-4.1',
  description: 'hero texture',
  tags: ['character', 'texture'],
};

describe('Asset versioning across backends', () => {
  let testDir: string;
  let assetPath: string;
  let repository: SqliteVersionRepository;
  let orchestrator: AssetVersionOrchestrator;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'asset-integration-test-'));
    assetPath = join(testDir, 'work', 'hero.txt');
    await mkdir(join(testDir, 'work'));
    await writeFile(assetPath, 'v1');

    const logger = createMockLogger();
    const backends = new Map<string, StorageBackend>([
      ['local', new DiskStore({ root: join(testDir, 'store'), logger })],
      [
        'vcs',
        new BranchStore({ worktree: new MemoryGitWorktree(join(testDir, 'repo')), logger }),
      ],
    ]);
    repository = await SqliteVersionRepository.open({ logger });
    orchestrator = new AssetVersionOrchestrator({ backends, repository, logger });
  });

  afterEach(async () => {
    await repository.close();
    await rm(testDir, { recursive: true, force: true });
  });

  it('should keep each stored revision retrievable on the disk backend', async () => {
    const first = await orchestrator.createVersion(assetPath, input, ['local']);
    await writeFile(assetPath, 'v2');
    const second = await orchestrator.createVersion(assetPath, input, ['local']);

    const id1 = first.get('local')?.storageId ?? '';
    const id2 = second.get('local')?.storageId ?? '';
    expect(id1).not.toBe(id2);
    expect(await readFile(await orchestrator.retrieve('local', id1), 'utf-8')).toBe('v1');
    expect(await readFile(await orchestrator.retrieve('local', id2), 'utf-8')).toBe('v2');
  });

  it('should record one repository version with a location on each backend', async () => {
    const ids = await orchestrator.createVersion(assetPath, input);

    const versions = await orchestrator.findVersions({ filePath: assetPath });
    expect(versions).toHaveLength(1);
    const locations = await orchestrator.getStorageLocations(versions[0]?.id ?? 0);
    expect(locations.map((loc) => [loc.storageType, loc.storageId])).toEqual([
      ['local', ids.get('local')?.storageId],
      ['vcs', ids.get('vcs')?.storageId],
    ]);

    const out = join(testDir, 'out', 'hero.txt');
    const vcsId = ids.get('vcs')?.storageId ?? '';
    expect(await readFile(await orchestrator.retrieve('vcs', vcsId, out), 'utf-8')).toBe('v1');
    expect((await orchestrator.describe('vcs', vcsId)).tags).toEqual(['character', 'texture']);
  });

  it('should return empty reference lists for a pattern that matches nothing', async () => {
    await orchestrator.createVersion(assetPath, input);

    const refs = await orchestrator.history.collectReferences('no-such-asset');

    expect(refs.get('local')).toEqual([]);
    expect(refs.get('vcs')).toEqual([]);
  });

  it('should report zero versions on every backend for an unknown path', async () => {
    await orchestrator.createVersion(assetPath, input);

    const report = await orchestrator.dumpAssetHistory(join(testDir, 'work', 'villain.txt'));

    expect(report.metadata.storageSummary.local?.versionCount).toBe(0);
    expect(report.metadata.storageSummary.vcs?.versionCount).toBe(0);
    expect(report.timeline).toEqual([]);
    expect(report.repositoryVersions).toEqual([]);
  });

  it('should merge both backends into one history for a stored asset', async () => {
    await orchestrator.createVersion(assetPath, input);

    const report = await orchestrator.dumpAssetHistory(assetPath);

    expect(report.metadata.storageSummary.local?.versionCount).toBe(1);
    expect(report.metadata.storageSummary.vcs?.versionCount).toBe(1);
    expect(report.metadata.totalReferences).toBe(2);
    expect(report.storageVersions?.map((entry) => entry.backend).sort()).toEqual(['local', 'vcs']);
    expect(report.repositoryVersions).toHaveLength(1);
    expect(report.metadata.repositoryTotalVersions).toBe(1);
  });
});

describe('createAssetVersioning()', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'asset-app-test-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should wire configured backends and a file repository', async () => {
    const config = parseConfig({
      env: 'test',
      backends: [{ name: 'local', type: 'disk', root: join(testDir, 'store') }],
      repository: { path: join(testDir, 'versions.db') },
    });
    const assetPath = join(testDir, 'hero.txt');
    await writeFile(assetPath, 'v1');

    const app = await createAssetVersioning({ config, logger: createMockLogger() });
    try {
      expect(app.orchestrator.listBackends()).toEqual(['local']);

      const ids = await app.orchestrator.createVersion(assetPath, input);

      expect(ids.get('local')?.storageType).toBe('local');
      expect(await app.orchestrator.findVersions({ creator: 'alice' })).toHaveLength(1);
    } finally {
      await app.close();
    }

    const reopened = await createAssetVersioning({ config, logger: createMockLogger() });
    try {
      expect(await reopened.orchestrator.findVersions({ filePath: assetPath })).toHaveLength(1);
    } finally {
      await reopened.close();
    }
  });

  it('should run without a repository', async () => {
    const config = parseConfig({
      backends: [{ name: 'local', type: 'disk', root: join(testDir, 'store') }],
    });

    const app = await createAssetVersioning({ config, logger: createMockLogger() });

    expect(app.repository).toBeUndefined();
    await expect(app.orchestrator.findVersions()).rejects.toThrow(
      'No version repository attached: findVersions'
    );
    await app.close();
  });
});
