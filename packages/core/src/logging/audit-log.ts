/**
 * Audit Log for Relayhub
 *
 * Security considerations:
 * - Append-only log structure; entries are never mutated
 * - Request/response payloads are redacted before they are stored
 * - Each entry is signed with HMAC-SHA256 and linked to its predecessor
 *   by hash, so modification of historical entries is detectable
 * - Appends are serialized so concurrent adapters cannot fork the chain
 */

import { sha256, hmacSha256, secureCompare, uuidv7 } from '../utils/crypto.js';
import {
  AuditEntrySchema,
  type AuditAction,
  type AuditEntry,
  type AuditQuery,
} from '@relayhub/shared';
import { createNoopLogger, type SecureLogger } from './logger.js';
import { redactPayload } from './redaction.js';

export const GENESIS_HASH = '0'.repeat(64);
const CHAIN_VERSION = '1.0.0';
const MIN_SIGNING_KEY_LENGTH = 32;
const DEFAULT_QUERY_LIMIT = 100;

export interface AuditStorageQuery {
  platform?: string;
  principalId?: string;
  action?: AuditAction;
  limit: number;
}

export interface RetentionPolicy {
  maxAgeDays?: number;
  maxEntries?: number;
}

export interface AuditLogStorage {
  /** Append an entry to storage */
  append(entry: AuditEntry): Promise<void>;
  /** Get the last entry (for chain continuation) */
  getLast(): Promise<AuditEntry | null>;
  /** Iterate all entries in insertion order */
  iterate(): AsyncIterableIterator<AuditEntry>;
  count(): Promise<number>;
  /** Matching entries, newest first */
  query(query: AuditStorageQuery): Promise<AuditEntry[]>;
  /** Purge old entries; returns the number deleted */
  enforceRetention(policy: RetentionPolicy, now: number): Promise<number>;
  close?(): void;
}

export interface AuditRecordInput {
  platform: string;
  principalId: string;
  action: AuditAction;
  resource?: string;
  method?: string;
  statusCode?: number;
  requestData?: Record<string, unknown>;
  responseData?: Record<string, unknown>;
  ipAddress?: string;
  userAgent?: string;
  durationMs?: number;
  error?: string;
}

export interface AuditLogConfig {
  storage: AuditLogStorage;
  /** Signing key for HMAC (from environment) */
  signingKey: string;
  logger?: SecureLogger;
  defaultQueryLimit?: number;
  now?: () => number;
}

export interface VerificationResult {
  valid: boolean;
  entriesChecked: number;
  brokenAt?: string;
  error?: string;
}

/**
 * JSON with object keys sorted at every depth.
 */
function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (typeof val !== 'object' || val === null || Array.isArray(val)) {
      return val;
    }
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(val).sort()) {
      sorted[key] = Reflect.get(val, key);
    }
    return sorted;
  });
}

/**
 * Compute the hash of an audit entry (excluding integrity fields)
 */
export function computeEntryHash(entry: AuditEntry): string {
  const { integrity: _integrity, ...hashData } = entry;
  return sha256(canonicalJson(hashData));
}

function computeSignature(entryHash: string, previousHash: string, signingKey: string): string {
  return hmacSha256(`${entryHash}:${previousHash}`, signingKey);
}

export class AuditLog {
  private readonly storage: AuditLogStorage;
  private readonly signingKey: string;
  private readonly logger: SecureLogger;
  private readonly defaultQueryLimit: number;
  private readonly now: () => number;
  private lastHash = GENESIS_HASH;
  private initialized: Promise<void> | null = null;
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(config: AuditLogConfig) {
    if (config.signingKey.length < MIN_SIGNING_KEY_LENGTH) {
      throw new Error(`Signing key must be at least ${MIN_SIGNING_KEY_LENGTH} characters`);
    }
    this.storage = config.storage;
    this.signingKey = config.signingKey;
    this.logger = (config.logger ?? createNoopLogger()).child({ component: 'AuditLog' });
    this.defaultQueryLimit = config.defaultQueryLimit ?? DEFAULT_QUERY_LIMIT;
    this.now = config.now ?? (() => Date.now());
  }

  /**
   * Load the chain head, verifying the last stored entry's signature.
   */
  initialize(): Promise<void> {
    this.initialized ??= this.loadHead();
    return this.initialized;
  }

  private async loadHead(): Promise<void> {
    const lastEntry = await this.storage.getLast();

    if (!lastEntry) {
      this.logger.info('Audit log initialized (empty chain)');
      return;
    }

    const entryHash = computeEntryHash(lastEntry);
    const expectedSig = computeSignature(
      entryHash,
      lastEntry.integrity.previousEntryHash,
      this.signingKey
    );

    if (!secureCompare(lastEntry.integrity.signature, expectedSig)) {
      throw new Error('Audit chain integrity compromised: last entry signature invalid');
    }

    this.lastHash = entryHash;
    this.logger.info('Audit log initialized', {
      entriesCount: await this.storage.count(),
      lastEntryId: lastEntry.id,
    });
  }

  /**
   * Append one entry. Payloads are redacted before hashing and storage.
   */
  record(input: AuditRecordInput): Promise<AuditEntry> {
    const task = this.writeQueue.then(() => this.append(input));
    // A failed append rejects its own caller; later appends still run.
    this.writeQueue = task.catch((err: unknown) => {
      this.logger.error('Audit append failed', { action: input.action, error: err });
    });
    return task;
  }

  private async append(input: AuditRecordInput): Promise<AuditEntry> {
    await this.initialize();

    const entry: AuditEntry = {
      id: uuidv7(),
      platform: input.platform,
      principalId: input.principalId,
      action: input.action,
      resource: input.resource ?? '',
      method: input.method ?? '',
      statusCode: input.statusCode ?? 0,
      timestamp: this.now(),
      integrity: {
        version: CHAIN_VERSION,
        signature: '',
        previousEntryHash: this.lastHash,
      },
    };
    if (input.requestData) entry.requestData = redactPayload(input.requestData);
    if (input.responseData) entry.responseData = redactPayload(input.responseData);
    if (input.ipAddress !== undefined) entry.ipAddress = input.ipAddress;
    if (input.userAgent !== undefined) entry.userAgent = input.userAgent;
    if (input.durationMs !== undefined) entry.durationMs = input.durationMs;
    if (input.error !== undefined) entry.error = input.error;

    const entryHash = computeEntryHash(entry);
    entry.integrity.signature = computeSignature(entryHash, this.lastHash, this.signingKey);

    const validation = AuditEntrySchema.safeParse(entry);
    if (!validation.success) {
      throw new Error(`Invalid audit entry: ${validation.error.message}`);
    }

    await this.storage.append(entry);
    this.lastHash = entryHash;

    return entry;
  }

  /**
   * Entries matching every given filter, newest first.
   */
  async query(query: AuditQuery = {}): Promise<AuditEntry[]> {
    await this.initialize();
    const storageQuery: AuditStorageQuery = { limit: query.limit ?? this.defaultQueryLimit };
    if (query.platform !== undefined) storageQuery.platform = query.platform;
    if (query.principalId !== undefined) storageQuery.principalId = query.principalId;
    if (query.action !== undefined) storageQuery.action = query.action;
    return this.storage.query(storageQuery);
  }

  /**
   * Walk the whole chain and report the first broken link or signature.
   *
   * The oldest stored entry anchors the chain: after retention purges its
   * predecessors, its signed previous hash is taken as given.
   */
  async verify(): Promise<VerificationResult> {
    await this.initialize();

    let entriesChecked = 0;
    let expectedPreviousHash: string | null = null;

    for await (const entry of this.storage.iterate()) {
      entriesChecked++;

      if (
        expectedPreviousHash !== null &&
        entry.integrity.previousEntryHash !== expectedPreviousHash
      ) {
        return {
          valid: false,
          entriesChecked,
          brokenAt: entry.id,
          error: 'Chain link broken: previous hash mismatch',
        };
      }

      const entryHash = computeEntryHash(entry);
      const expectedSig = computeSignature(
        entryHash,
        entry.integrity.previousEntryHash,
        this.signingKey
      );

      if (!secureCompare(entry.integrity.signature, expectedSig)) {
        return {
          valid: false,
          entriesChecked,
          brokenAt: entry.id,
          error: 'Signature verification failed',
        };
      }

      expectedPreviousHash = entryHash;
    }

    return { valid: true, entriesChecked };
  }

  /**
   * Purge entries past the retention policy. Runs behind pending appends.
   */
  enforceRetention(policy: RetentionPolicy): Promise<number> {
    const task = this.writeQueue.then(async () => {
      const deleted = await this.storage.enforceRetention(policy, this.now());
      if (deleted > 0) {
        this.logger.info('Audit retention enforced', { deleted });
      }
      return deleted;
    });
    this.writeQueue = task.catch((err: unknown) => {
      this.logger.error('Audit retention failed', { error: err });
    });
    return task;
  }

  async count(): Promise<number> {
    return this.storage.count();
  }

  /** Resolves once every queued append has settled. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }
}

/**
 * In-memory storage for tests and ephemeral deployments
 */
export class InMemoryAuditStorage implements AuditLogStorage {
  private entries: AuditEntry[] = [];

  async append(entry: AuditEntry): Promise<void> {
    this.entries.push(entry);
  }

  async getLast(): Promise<AuditEntry | null> {
    return this.entries[this.entries.length - 1] ?? null;
  }

  async *iterate(): AsyncIterableIterator<AuditEntry> {
    for (const entry of this.entries) {
      yield entry;
    }
  }

  async count(): Promise<number> {
    return this.entries.length;
  }

  async query(query: AuditStorageQuery): Promise<AuditEntry[]> {
    const matches: AuditEntry[] = [];
    for (let i = this.entries.length - 1; i >= 0 && matches.length < query.limit; i--) {
      const entry = this.entries[i];
      if (!entry) continue;
      if (query.platform !== undefined && entry.platform !== query.platform) continue;
      if (query.principalId !== undefined && entry.principalId !== query.principalId) continue;
      if (query.action !== undefined && entry.action !== query.action) continue;
      matches.push(entry);
    }
    return matches;
  }

  async enforceRetention(policy: RetentionPolicy, now: number): Promise<number> {
    const before = this.entries.length;
    if (policy.maxAgeDays !== undefined) {
      const cutoff = now - policy.maxAgeDays * 86_400_000;
      this.entries = this.entries.filter((e) => e.timestamp >= cutoff);
    }
    if (policy.maxEntries !== undefined && this.entries.length > policy.maxEntries) {
      this.entries = this.entries.slice(this.entries.length - policy.maxEntries);
    }
    return before - this.entries.length;
  }
}
