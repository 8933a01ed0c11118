/**
 * SQLite-backed Audit Log Storage
 *
 * Persistent storage for audit entries using better-sqlite3.
 * Uses WAL mode for concurrent reads during chain verification.
 */

import { z } from 'zod';
import { AuditActionSchema, type AuditEntry } from '@relayhub/shared';
import { SqliteBaseStorage, type SqliteStorageOptions } from '../storage/sqlite-base.js';
import type { AuditLogStorage, AuditStorageQuery, RetentionPolicy } from './audit-log.js';

const PayloadSchema = z.record(z.string(), z.unknown());

interface AuditRow {
  id: string;
  platform: string;
  principal_id: string;
  action: string;
  resource: string;
  method: string;
  status_code: number;
  request_data: string | null;
  response_data: string | null;
  ip_address: string | null;
  user_agent: string | null;
  timestamp: number;
  duration_ms: number | null;
  error: string | null;
  integrity_version: string;
  integrity_signature: string;
  integrity_previous_hash: string;
}

function parsePayload(text: string | null): Record<string, unknown> | undefined {
  if (text === null) return undefined;
  return PayloadSchema.parse(JSON.parse(text));
}

function rowToEntry(row: AuditRow): AuditEntry {
  const entry: AuditEntry = {
    id: row.id,
    platform: row.platform,
    principalId: row.principal_id,
    action: AuditActionSchema.parse(row.action),
    resource: row.resource,
    method: row.method,
    statusCode: row.status_code,
    timestamp: row.timestamp,
    integrity: {
      version: row.integrity_version,
      signature: row.integrity_signature,
      previousEntryHash: row.integrity_previous_hash,
    },
  };
  const requestData = parsePayload(row.request_data);
  const responseData = parsePayload(row.response_data);
  if (requestData) entry.requestData = requestData;
  if (responseData) entry.responseData = responseData;
  if (row.ip_address !== null) entry.ipAddress = row.ip_address;
  if (row.user_agent !== null) entry.userAgent = row.user_agent;
  if (row.duration_ms !== null) entry.durationMs = row.duration_ms;
  if (row.error !== null) entry.error = row.error;
  return entry;
}

export class SQLiteAuditStorage extends SqliteBaseStorage implements AuditLogStorage {
  constructor(opts: SqliteStorageOptions = {}) {
    super(opts);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS audit_entries (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        platform TEXT NOT NULL,
        principal_id TEXT NOT NULL,
        action TEXT NOT NULL,
        resource TEXT NOT NULL,
        method TEXT NOT NULL,
        status_code INTEGER NOT NULL,
        request_data TEXT,
        response_data TEXT,
        ip_address TEXT,
        user_agent TEXT,
        timestamp INTEGER NOT NULL,
        duration_ms REAL,
        error TEXT,
        integrity_version TEXT NOT NULL,
        integrity_signature TEXT NOT NULL,
        integrity_previous_hash TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_audit_timestamp ON audit_entries(timestamp);
      CREATE INDEX IF NOT EXISTS idx_audit_platform ON audit_entries(platform);
      CREATE INDEX IF NOT EXISTS idx_audit_principal ON audit_entries(principal_id);
      CREATE INDEX IF NOT EXISTS idx_audit_action ON audit_entries(action);
    `);
  }

  async append(entry: AuditEntry): Promise<void> {
    this.execute(
      `INSERT INTO audit_entries (
        id, platform, principal_id, action, resource, method, status_code,
        request_data, response_data, ip_address, user_agent, timestamp,
        duration_ms, error, integrity_version, integrity_signature, integrity_previous_hash
      ) VALUES (
        @id, @platform, @principal_id, @action, @resource, @method, @status_code,
        @request_data, @response_data, @ip_address, @user_agent, @timestamp,
        @duration_ms, @error, @integrity_version, @integrity_signature, @integrity_previous_hash
      )`,
      {
        id: entry.id,
        platform: entry.platform,
        principal_id: entry.principalId,
        action: entry.action,
        resource: entry.resource,
        method: entry.method,
        status_code: entry.statusCode,
        request_data: entry.requestData ? JSON.stringify(entry.requestData) : null,
        response_data: entry.responseData ? JSON.stringify(entry.responseData) : null,
        ip_address: entry.ipAddress ?? null,
        user_agent: entry.userAgent ?? null,
        timestamp: entry.timestamp,
        duration_ms: entry.durationMs ?? null,
        error: entry.error ?? null,
        integrity_version: entry.integrity.version,
        integrity_signature: entry.integrity.signature,
        integrity_previous_hash: entry.integrity.previousEntryHash,
      }
    );
  }

  async getLast(): Promise<AuditEntry | null> {
    const row = this.queryOne<AuditRow>('SELECT * FROM audit_entries ORDER BY seq DESC LIMIT 1');
    return row ? rowToEntry(row) : null;
  }

  async *iterate(): AsyncIterableIterator<AuditEntry> {
    const rows = this.queryMany<AuditRow>('SELECT * FROM audit_entries ORDER BY seq ASC');
    for (const row of rows) {
      yield rowToEntry(row);
    }
  }

  async count(): Promise<number> {
    return this.queryOne<{ cnt: number }>('SELECT COUNT(*) as cnt FROM audit_entries')?.cnt ?? 0;
  }

  async query(query: AuditStorageQuery): Promise<AuditEntry[]> {
    const conditions: string[] = [];
    const params: Record<string, unknown> = { limit: query.limit };

    if (query.platform !== undefined) {
      conditions.push('platform = @platform');
      params.platform = query.platform;
    }
    if (query.principalId !== undefined) {
      conditions.push('principal_id = @principal_id');
      params.principal_id = query.principalId;
    }
    if (query.action !== undefined) {
      conditions.push('action = @action');
      params.action = query.action;
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';

    return this.queryMany<AuditRow>(
      `SELECT * FROM audit_entries ${where} ORDER BY seq DESC LIMIT @limit`,
      params
    ).map(rowToEntry);
  }

  /**
   * Enforce retention policy by purging old entries.
   * Returns the count of deleted entries.
   */
  async enforceRetention(policy: RetentionPolicy, now: number): Promise<number> {
    return this.withTransaction(() => {
      let totalDeleted = 0;

      if (policy.maxAgeDays !== undefined) {
        const cutoff = now - policy.maxAgeDays * 86_400_000;
        totalDeleted += this.execute('DELETE FROM audit_entries WHERE timestamp < ?', cutoff);
      }

      if (policy.maxEntries !== undefined) {
        const count =
          this.queryOne<{ cnt: number }>('SELECT COUNT(*) as cnt FROM audit_entries')?.cnt ?? 0;
        if (count > policy.maxEntries) {
          totalDeleted += this.execute(
            `DELETE FROM audit_entries WHERE seq IN (
              SELECT seq FROM audit_entries ORDER BY seq ASC LIMIT ?
            )`,
            count - policy.maxEntries
          );
        }
      }

      return totalDeleted;
    });
  }
}
