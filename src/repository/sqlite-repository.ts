// SQLite version repository on sql.js.
//
// Tables: versions, version_storage (one row per backend copy), tags and the
// version_tags join. Timestamps are stored as ISO 8601 UTC strings, which
// order correctly as text.

import type { Logger } from 'pino';

import { StorageNotFoundError } from '../storage/errors.js';
import type { MetadataMap } from '../types/index.js';

import { SqlDatabase } from './database.js';
import type { SqlDatabaseOptions, SqlRow } from './database.js';
import { RepositoryFailureError } from './errors.js';
import type {
  FindVersionsFilter,
  NewVersion,
  StorageLocation,
  VersionMetadataUpdate,
  VersionRecord,
  VersionRepository,
} from './types.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS versions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    file_path TEXT NOT NULL,
    creator TEXT NOT NULL,
    tool_version TEXT NOT NULL,
    description TEXT,
    created_at TEXT NOT NULL,
    custom_data TEXT NOT NULL DEFAULT '{}'
  );
  CREATE TABLE IF NOT EXISTS version_storage (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    version_id INTEGER NOT NULL REFERENCES versions(id) ON DELETE CASCADE,
    storage_type TEXT NOT NULL,
    storage_id TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS tags (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE
  );
  CREATE TABLE IF NOT EXISTS version_tags (
    version_id INTEGER NOT NULL REFERENCES versions(id) ON DELETE CASCADE,
    tag_id INTEGER NOT NULL REFERENCES tags(id),
    position INTEGER NOT NULL,
    PRIMARY KEY (version_id, tag_id)
  );
  CREATE INDEX IF NOT EXISTS idx_versions_file_path ON versions(file_path);
  CREATE INDEX IF NOT EXISTS idx_versions_creator ON versions(creator);
  CREATE INDEX IF NOT EXISTS idx_version_storage_version ON version_storage(version_id);
`;

const VERSION_COLUMNS =
  'v.id, v.file_path, v.creator, v.tool_version, v.description, v.created_at, v.custom_data';

export interface SqliteVersionRepositoryOptions extends SqlDatabaseOptions {
  logger: Logger;
  /** Clock for created_at (tests) */
  now?: () => Date;
}

export class SqliteVersionRepository implements VersionRepository {
  private readonly db: SqlDatabase;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private constructor(db: SqlDatabase, logger: Logger, now: () => Date) {
    this.db = db;
    this.logger = logger;
    this.now = now;
  }

  /** Open (or create) the database and make sure the schema exists. */
  static async open(options: SqliteVersionRepositoryOptions): Promise<SqliteVersionRepository> {
    const logger = options.logger.child({ component: 'repository' });
    try {
      const db = await SqlDatabase.open({ path: options.path, sqlJs: options.sqlJs });
      await db.transaction(() => db.exec(SCHEMA));
      logger.debug({ path: options.path ?? ':memory:' }, 'Version repository opened');
      return new SqliteVersionRepository(db, logger, options.now ?? (() => new Date()));
    } catch (error) {
      throw wrapFailure(error, 'open');
    }
  }

  async createVersion(version: NewVersion): Promise<number> {
    const createdAt = this.now().toISOString();
    const id = await this.mutate('createVersion', () => {
      this.db.run(
        `INSERT INTO versions (file_path, creator, tool_version, description, created_at, custom_data)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [
          version.filePath,
          version.creator,
          version.toolVersion,
          version.description ?? null,
          createdAt,
          JSON.stringify(version.customData),
        ]
      );
      const versionId = this.db.lastInsertRowId();
      this.setTags(versionId, version.tags);
      return versionId;
    });
    this.logger.debug({ versionId: id, filePath: version.filePath }, 'Version recorded');
    return id;
  }

  async addStorageLocation(
    versionId: number,
    storageType: string,
    storageId: string
  ): Promise<void> {
    await this.mutate('addStorageLocation', () => {
      this.requireVersionRow(versionId);
      this.db.run(
        `INSERT INTO version_storage (version_id, storage_type, storage_id, created_at)
         VALUES (?, ?, ?, ?)`,
        [versionId, storageType, storageId, this.now().toISOString()]
      );
    });
  }

  async getVersionInfo(versionId: number): Promise<VersionRecord> {
    return this.read('getVersionInfo', () => this.toRecord(this.requireVersionRow(versionId)));
  }

  async getStorageLocations(versionId: number): Promise<StorageLocation[]> {
    return this.read('getStorageLocations', () =>
      this.db
        .query(
          `SELECT storage_type, storage_id, created_at FROM version_storage
           WHERE version_id = ? ORDER BY id`,
          [versionId]
        )
        .map((row) => ({
          storageType: text(row, 'storage_type'),
          storageId: text(row, 'storage_id'),
          createdAt: new Date(text(row, 'created_at')),
        }))
    );
  }

  async findVersions(filter: FindVersionsFilter = {}): Promise<VersionRecord[]> {
    return this.read('findVersions', () => {
      const clauses: string[] = [];
      const params: (string | number)[] = [];

      if (filter.filePath) {
        clauses.push('v.file_path = ?');
        params.push(filter.filePath);
      }
      if (filter.creator) {
        clauses.push('v.creator = ?');
        params.push(filter.creator);
      }
      if (filter.after) {
        clauses.push('v.created_at >= ?');
        params.push(filter.after.toISOString());
      }
      if (filter.before) {
        clauses.push('v.created_at <= ?');
        params.push(filter.before.toISOString());
      }
      for (const tag of new Set(filter.tags ?? [])) {
        clauses.push(
          `EXISTS (SELECT 1 FROM version_tags vt JOIN tags t ON t.id = vt.tag_id
                   WHERE vt.version_id = v.id AND t.name = ?)`
        );
        params.push(tag);
      }

      const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
      return this.db
        .query(`SELECT ${VERSION_COLUMNS} FROM versions v ${where} ORDER BY v.id`, params)
        .map((row) => this.toRecord(row));
    });
  }

  // ---- Beyond the orchestrator contract ----

  /** Every tag in use, alphabetically */
  async getAllTags(): Promise<string[]> {
    return this.read('getAllTags', () =>
      this.db
        .query(
          `SELECT DISTINCT t.name FROM tags t JOIN version_tags vt ON vt.tag_id = t.id
           ORDER BY t.name`
        )
        .map((row) => text(row, 'name'))
    );
  }

  async getVersionsByCreator(creator: string): Promise<VersionRecord[]> {
    return this.findVersions({ creator });
  }

  /** Versions of one file, newest first */
  async getVersionHistory(filePath: string): Promise<VersionRecord[]> {
    return this.read('getVersionHistory', () =>
      this.db
        .query(
          `SELECT ${VERSION_COLUMNS} FROM versions v WHERE v.file_path = ?
           ORDER BY v.created_at DESC, v.id DESC`,
          [filePath]
        )
        .map((row) => this.toRecord(row))
    );
  }

  /** Remove a version with its tags and storage locations. Unknown ids are ignored. */
  async deleteVersion(versionId: number): Promise<void> {
    await this.mutate('deleteVersion', () => {
      this.db.run('DELETE FROM version_tags WHERE version_id = ?', [versionId]);
      this.db.run('DELETE FROM version_storage WHERE version_id = ?', [versionId]);
      this.db.run('DELETE FROM versions WHERE id = ?', [versionId]);
    });
  }

  async updateVersionMetadata(
    versionId: number,
    update: VersionMetadataUpdate
  ): Promise<VersionRecord> {
    return this.mutate('updateVersionMetadata', () => {
      this.requireVersionRow(versionId);
      if (update.description !== undefined) {
        this.db.run('UPDATE versions SET description = ? WHERE id = ?', [
          update.description,
          versionId,
        ]);
      }
      if (update.customData !== undefined) {
        this.db.run('UPDATE versions SET custom_data = ? WHERE id = ?', [
          JSON.stringify(update.customData),
          versionId,
        ]);
      }
      if (update.tags !== undefined) {
        this.db.run('DELETE FROM version_tags WHERE version_id = ?', [versionId]);
        this.setTags(versionId, update.tags);
      }
      return this.toRecord(this.requireVersionRow(versionId));
    });
  }

  async close(): Promise<void> {
    try {
      await this.db.close();
    } catch (error) {
      throw wrapFailure(error, 'close');
    }
  }

  // ---- Private helpers ----

  private async mutate<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return await this.db.transaction(fn);
    } catch (error) {
      throw wrapFailure(error, operation);
    }
  }

  private async read<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return fn();
    } catch (error) {
      throw wrapFailure(error, operation);
    }
  }

  private requireVersionRow(versionId: number): SqlRow {
    const [row] = this.db.query(`SELECT ${VERSION_COLUMNS} FROM versions v WHERE v.id = ?`, [
      versionId,
    ]);
    if (!row) {
      throw new StorageNotFoundError('repository', `version ${versionId}`);
    }
    return row;
  }

  /** Attach tags in order; repeated names collapse to their first position. */
  private setTags(versionId: number, tags: readonly string[]): void {
    let position = 0;
    for (const name of new Set(tags)) {
      this.db.run('INSERT OR IGNORE INTO tags (name) VALUES (?)', [name]);
      const [tag] = this.db.query('SELECT id FROM tags WHERE name = ?', [name]);
      if (!tag) continue;
      this.db.run('INSERT INTO version_tags (version_id, tag_id, position) VALUES (?, ?, ?)', [
        versionId,
        integer(tag, 'id'),
        position++,
      ]);
    }
  }

  private tagsOf(versionId: number): string[] {
    return this.db
      .query(
        `SELECT t.name FROM version_tags vt JOIN tags t ON t.id = vt.tag_id
         WHERE vt.version_id = ? ORDER BY vt.position`,
        [versionId]
      )
      .map((row) => text(row, 'name'));
  }

  private toRecord(row: SqlRow): VersionRecord {
    const id = integer(row, 'id');
    const description = row.description;
    return {
      id,
      filePath: text(row, 'file_path'),
      creator: text(row, 'creator'),
      toolVersion: text(row, 'tool_version'),
      description: typeof description === 'string' ? description : null,
      createdAt: new Date(text(row, 'created_at')),
      customData: parseCustomData(text(row, 'custom_data')),
      tags: this.tagsOf(id),
    };
  }
}

function text(row: SqlRow, column: string): string {
  const value = row[column];
  return typeof value === 'string' ? value : String(value ?? '');
}

function integer(row: SqlRow, column: string): number {
  const value = row[column];
  return typeof value === 'number' ? value : Number(value);
}

function parseCustomData(json: string): MetadataMap {
  const parsed: unknown = JSON.parse(json || '{}');
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return { ...parsed };
}

function wrapFailure(error: unknown, operation: string): Error {
  if (error instanceof StorageNotFoundError || error instanceof RepositoryFailureError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new RepositoryFailureError(`${operation}: ${message}`);
}
