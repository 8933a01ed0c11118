/**
 * Credential Storage - persistence for sealed credential envelopes.
 *
 * Stores hold ciphertext only; encryption happens in CredentialVault.
 */

import { SqliteBaseStorage, type SqliteStorageOptions } from '../storage/sqlite-base.js';

export interface CredentialRecord {
  platform: string;
  principalId: string;
  /** Base64 envelope produced by encryptCredentials() */
  ciphertext: string;
  createdAt: number;
  updatedAt: number;
  expiresAt?: number;
  isActive: boolean;
}

export interface CredentialStorage {
  get(platform: string, principalId: string): Promise<CredentialRecord | null>;
  /** Insert or replace the record for (platform, principalId) */
  put(record: CredentialRecord): Promise<void>;
  delete(platform: string, principalId: string): Promise<boolean>;
  setActive(platform: string, principalId: string, isActive: boolean, updatedAt: number): Promise<boolean>;
  listByPrincipal(principalId: string): Promise<CredentialRecord[]>;
  close?(): void;
}

function storageKey(platform: string, principalId: string): string {
  return `${platform}\u0000${principalId}`;
}

export class InMemoryCredentialStorage implements CredentialStorage {
  private readonly records = new Map<string, CredentialRecord>();

  async get(platform: string, principalId: string): Promise<CredentialRecord | null> {
    const record = this.records.get(storageKey(platform, principalId));
    return record ? { ...record } : null;
  }

  async put(record: CredentialRecord): Promise<void> {
    this.records.set(storageKey(record.platform, record.principalId), { ...record });
  }

  async delete(platform: string, principalId: string): Promise<boolean> {
    return this.records.delete(storageKey(platform, principalId));
  }

  async setActive(
    platform: string,
    principalId: string,
    isActive: boolean,
    updatedAt: number
  ): Promise<boolean> {
    const record = this.records.get(storageKey(platform, principalId));
    if (!record) return false;
    record.isActive = isActive;
    record.updatedAt = updatedAt;
    return true;
  }

  async listByPrincipal(principalId: string): Promise<CredentialRecord[]> {
    return [...this.records.values()]
      .filter((r) => r.principalId === principalId)
      .map((r) => ({ ...r }));
  }
}

interface CredentialRow {
  platform: string;
  principal_id: string;
  ciphertext: string;
  created_at: number;
  updated_at: number;
  expires_at: number | null;
  is_active: number;
}

function rowToRecord(row: CredentialRow): CredentialRecord {
  const record: CredentialRecord = {
    platform: row.platform,
    principalId: row.principal_id,
    ciphertext: row.ciphertext,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    isActive: row.is_active === 1,
  };
  if (row.expires_at !== null) record.expiresAt = row.expires_at;
  return record;
}

export class SQLiteCredentialStorage extends SqliteBaseStorage implements CredentialStorage {
  constructor(opts: SqliteStorageOptions = {}) {
    super(opts);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS credentials (
        platform TEXT NOT NULL,
        principal_id TEXT NOT NULL,
        ciphertext TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        expires_at INTEGER,
        is_active INTEGER NOT NULL DEFAULT 1,
        PRIMARY KEY (platform, principal_id)
      );

      CREATE INDEX IF NOT EXISTS idx_credentials_principal ON credentials(principal_id);
    `);
  }

  async get(platform: string, principalId: string): Promise<CredentialRecord | null> {
    const row = this.queryOne<CredentialRow>(
      'SELECT * FROM credentials WHERE platform = ? AND principal_id = ?',
      platform,
      principalId
    );
    return row ? rowToRecord(row) : null;
  }

  async put(record: CredentialRecord): Promise<void> {
    this.execute(
      `INSERT INTO credentials (
        platform, principal_id, ciphertext, created_at, updated_at, expires_at, is_active
      ) VALUES (
        @platform, @principal_id, @ciphertext, @created_at, @updated_at, @expires_at, @is_active
      )
      ON CONFLICT (platform, principal_id) DO UPDATE SET
        ciphertext = excluded.ciphertext,
        created_at = excluded.created_at,
        updated_at = excluded.updated_at,
        expires_at = excluded.expires_at,
        is_active = excluded.is_active`,
      {
        platform: record.platform,
        principal_id: record.principalId,
        ciphertext: record.ciphertext,
        created_at: record.createdAt,
        updated_at: record.updatedAt,
        expires_at: record.expiresAt ?? null,
        is_active: record.isActive ? 1 : 0,
      }
    );
  }

  async delete(platform: string, principalId: string): Promise<boolean> {
    return (
      this.execute(
        'DELETE FROM credentials WHERE platform = ? AND principal_id = ?',
        platform,
        principalId
      ) > 0
    );
  }

  async setActive(
    platform: string,
    principalId: string,
    isActive: boolean,
    updatedAt: number
  ): Promise<boolean> {
    return (
      this.execute(
        'UPDATE credentials SET is_active = ?, updated_at = ? WHERE platform = ? AND principal_id = ?',
        isActive ? 1 : 0,
        updatedAt,
        platform,
        principalId
      ) > 0
    );
  }

  async listByPrincipal(principalId: string): Promise<CredentialRecord[]> {
    return this.queryMany<CredentialRow>(
      'SELECT * FROM credentials WHERE principal_id = ? ORDER BY platform ASC',
      principalId
    ).map(rowToRecord);
  }
}
