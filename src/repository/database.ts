// Thin wrapper over a sql.js database.
//
// sql.js keeps SQLite in memory; when a file path is given the database is
// loaded from it on open and written back (write-then-rename) after every
// committed transaction. The file is the source of truth: a commit that
// cannot be written out is dropped from memory again.

import { readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import initSqlJs from 'sql.js';
import type { BindParams, Database, SqlJsStatic, SqlValue } from 'sql.js';

import { hasErrorCode, writeFileAtomic } from '../storage/fs-utils.js';

export type SqlRow = Record<string, SqlValue>;

export interface SqlDatabaseOptions {
  /** Database file; in-memory only when omitted */
  path?: string;
  /** Pre-loaded sql.js module */
  sqlJs?: SqlJsStatic;
}

export class SqlDatabase {
  private db: Database;
  private readonly SQL: SqlJsStatic;
  private readonly path?: string;

  private constructor(SQL: SqlJsStatic, db: Database, path?: string) {
    this.SQL = SQL;
    this.db = db;
    this.path = path;
  }

  static async open(options: SqlDatabaseOptions = {}): Promise<SqlDatabase> {
    // sql.js is CommonJS; its init function is also exposed as `.default`
    const SQL = options.sqlJs ?? (await initSqlJs.default());
    const data = options.path ? await readDatabaseFile(options.path) : undefined;
    return new SqlDatabase(SQL, new SQL.Database(data), options.path);
  }

  /** Rows of a query, as column-keyed objects */
  query(sql: string, params: BindParams = []): SqlRow[] {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params);
      const rows: SqlRow[] = [];
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
      return rows;
    } finally {
      stmt.free();
    }
  }

  run(sql: string, params: BindParams = []): void {
    this.db.run(sql, params);
  }

  /** Run statements separated by semicolons, without parameters */
  exec(sql: string): void {
    this.db.exec(sql);
  }

  lastInsertRowId(): number {
    const [row] = this.query('SELECT last_insert_rowid() AS id');
    return typeof row?.id === 'number' ? row.id : 0;
  }

  /**
   * Run `fn` in a transaction and persist the database once it commits.
   * sql.js is synchronous, so nothing else can interleave inside `fn`.
   */
  async transaction<T>(fn: () => T): Promise<T> {
    this.db.run('BEGIN TRANSACTION');
    let result: T;
    try {
      result = fn();
      this.db.run('COMMIT');
    } catch (error) {
      this.db.run('ROLLBACK');
      throw error;
    }
    try {
      await this.persist();
    } catch (error) {
      await this.reload();
      throw error;
    }
    return result;
  }

  async close(): Promise<void> {
    await this.persist();
    this.db.close();
  }

  private async persist(): Promise<void> {
    if (!this.path) return;
    await writeFileAtomic(this.path, this.db.export(), dirname(this.path));
  }

  /** Replace the in-memory database with the last state written to the file. */
  private async reload(): Promise<void> {
    if (!this.path) return;
    const data = await readDatabaseFile(this.path);
    this.db.close();
    this.db = new this.SQL.Database(data);
  }
}

async function readDatabaseFile(path: string): Promise<Uint8Array | undefined> {
  try {
    return await readFile(path);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return undefined;
    throw error;
  }
}
