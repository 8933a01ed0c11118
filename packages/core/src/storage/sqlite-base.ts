/**
 * SqliteBaseStorage - Base class for the SQLite-backed stores.
 *
 * Stores either open their own database file or share one handle opened by
 * the bootstrap; only the owner closes it.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname } from 'node:path';

export interface SqliteStorageOptions {
  /** Database file, or ':memory:' (default) */
  dbPath?: string;
  /** Shared handle; takes precedence over dbPath */
  db?: Database.Database;
}

/**
 * Open a database with WAL journaling, creating its directory when needed.
 */
export function openDatabase(dbPath = ':memory:'): Database.Database {
  const resolved = dbPath.startsWith('~/') ? `${homedir()}${dbPath.slice(1)}` : dbPath;

  if (resolved !== ':memory:') {
    mkdirSync(dirname(resolved), { recursive: true });
  }

  const db = new Database(resolved);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  return db;
}

export class SqliteBaseStorage {
  protected readonly db: Database.Database;
  private readonly ownsDb: boolean;

  constructor(opts: SqliteStorageOptions = {}) {
    this.ownsDb = opts.db === undefined;
    this.db = opts.db ?? openDatabase(opts.dbPath);
  }

  protected queryOne<T>(sql: string, ...params: unknown[]): T | null {
    return this.db.prepare<unknown[], T>(sql).get(...params) ?? null;
  }

  protected queryMany<T>(sql: string, ...params: unknown[]): T[] {
    return this.db.prepare<unknown[], T>(sql).all(...params);
  }

  protected execute(sql: string, ...params: unknown[]): number {
    return this.db.prepare(sql).run(...params).changes;
  }

  protected withTransaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    if (this.ownsDb && this.db.open) {
      this.db.close();
    }
  }
}
