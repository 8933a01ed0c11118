/**
 * Credential Vault for Relayhub
 *
 * Security considerations:
 * - Credentials are encrypted with AES-256-GCM before they reach storage
 * - Plaintext is never logged; audit entries carry field names only
 * - Expired or deactivated credentials are indistinguishable from missing ones
 * - Every access is recorded in the audit log
 */

import type { CredentialMap, CredentialMetadata } from '@relayhub/shared';
import { createNoopLogger, type SecureLogger } from '../logging/logger.js';
import type { AuditLog } from '../logging/audit-log.js';
import type { PlatformCatalog } from '../integrations/platform-catalog.js';
import { ConfigurationError, toErrorMessage } from '../utils/errors.js';
import { decryptCredentials, encryptCredentials } from './secrets.js';
import type { CredentialRecord, CredentialStorage } from './credential-storage.js';

const MIN_MASTER_KEY_LENGTH = 16;

export interface CredentialVaultConfig {
  storage: CredentialStorage;
  /** Master key (from environment, or generated at bootstrap) */
  masterKey: string;
  auditLog: AuditLog;
  /** Supplies required fields for validateCredentials() */
  catalog?: PlatformCatalog;
  logger?: SecureLogger;
  now?: () => number;
}

type WriteAction = 'credential_stored' | 'credential_rotated';

/** Supplies an adapter's credentials at request time. */
export interface CredentialSource {
  /** Current credentials, or null once they are missing, inactive or expired */
  current(): Promise<CredentialMap | null>;
}

export class CredentialVault {
  private readonly storage: CredentialStorage;
  private readonly masterKey: string;
  private readonly auditLog: AuditLog;
  private readonly catalog: PlatformCatalog | undefined;
  private readonly logger: SecureLogger;
  private readonly now: () => number;

  constructor(config: CredentialVaultConfig) {
    if (config.masterKey.length < MIN_MASTER_KEY_LENGTH) {
      throw new Error(`Master key must be at least ${MIN_MASTER_KEY_LENGTH} characters`);
    }
    this.storage = config.storage;
    this.masterKey = config.masterKey;
    this.auditLog = config.auditLog;
    this.catalog = config.catalog;
    this.logger = (config.logger ?? createNoopLogger()).child({ component: 'CredentialVault' });
    this.now = config.now ?? (() => Date.now());
  }

  /**
   * Encrypt and persist credentials. Replacing an existing record keeps its
   * original creation time.
   */
  async store(
    platform: string,
    principalId: string,
    credentials: CredentialMap,
    expiresAt?: number
  ): Promise<void> {
    await this.write('credential_stored', platform, principalId, credentials, expiresAt);
  }

  /**
   * Replace credentials in place, preserving createdAt.
   */
  async rotate(
    platform: string,
    principalId: string,
    credentials: CredentialMap,
    expiresAt?: number
  ): Promise<void> {
    await this.write('credential_rotated', platform, principalId, credentials, expiresAt);
  }

  private async write(
    action: WriteAction,
    platform: string,
    principalId: string,
    credentials: CredentialMap,
    expiresAt: number | undefined
  ): Promise<void> {
    const now = this.now();
    const existing = await this.storage.get(platform, principalId);

    const record: CredentialRecord = {
      platform,
      principalId,
      ciphertext: encryptCredentials(credentials, this.masterKey),
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
      isActive: true,
    };
    if (expiresAt !== undefined) record.expiresAt = expiresAt;

    await this.storage.put(record);

    this.logger.info(action === 'credential_rotated' ? 'Credentials rotated' : 'Credentials stored', {
      platform,
      principalId,
    });
    await this.auditLog.record({
      platform,
      principalId,
      action,
      resource: 'credentials',
      method: existing ? 'UPDATE' : 'CREATE',
      statusCode: 200,
      requestData: { fields: Object.keys(credentials), expiresAt: expiresAt ?? null },
    });
  }

  /**
   * Decrypted credentials, or null when they are missing, inactive or expired.
   *
   * @throws CredentialDecryptionError when the stored envelope does not open
   */
  async retrieve(platform: string, principalId: string): Promise<CredentialMap | null> {
    const record = await this.storage.get(platform, principalId);
    return this.open(platform, principalId, record);
  }

  /**
   * Credentials for one (platform, principal), read from storage on every
   * call. Decrypts again only when the stored envelope has changed.
   */
  sourceFor(platform: string, principalId: string): CredentialSource {
    let cached: { ciphertext: string; credentials: CredentialMap } | undefined;

    return {
      current: async () => {
        const record = await this.storage.get(platform, principalId);
        if (record && !this.unavailableReason(record) && cached?.ciphertext === record.ciphertext) {
          return cached.credentials;
        }

        const credentials = await this.open(platform, principalId, record);
        cached = credentials && record ? { ciphertext: record.ciphertext, credentials } : undefined;
        return credentials;
      },
    };
  }

  private async open(
    platform: string,
    principalId: string,
    record: CredentialRecord | null
  ): Promise<CredentialMap | null> {
    const reason = this.unavailableReason(record);

    if (!record || reason) {
      this.logger.debug('Credentials unavailable', { platform, principalId, reason });
      await this.auditLog.record({
        platform,
        principalId,
        action: 'credential_missing',
        resource: 'credentials',
        method: 'READ',
        statusCode: 404,
        requestData: { reason: reason ?? 'not_found' },
      });
      return null;
    }

    let credentials: CredentialMap;
    try {
      credentials = decryptCredentials(record.ciphertext, this.masterKey, platform);
    } catch (err) {
      this.logger.error('Credential decryption failed', { platform, principalId, error: err });
      await this.auditLog.record({
        platform,
        principalId,
        action: 'credential_accessed',
        resource: 'credentials',
        method: 'READ',
        statusCode: 500,
        error: toErrorMessage(err),
      });
      throw err;
    }

    await this.auditLog.record({
      platform,
      principalId,
      action: 'credential_accessed',
      resource: 'credentials',
      method: 'READ',
      statusCode: 200,
    });
    return credentials;
  }

  private unavailableReason(record: CredentialRecord | null): string | undefined {
    if (!record) return 'not_found';
    if (!record.isActive) return 'inactive';
    if (record.expiresAt !== undefined && record.expiresAt <= this.now()) return 'expired';
    return undefined;
  }

  /**
   * Remove credentials. Returns false when there was nothing to delete.
   */
  async delete(platform: string, principalId: string): Promise<boolean> {
    const deleted = await this.storage.delete(platform, principalId);
    if (deleted) {
      this.logger.info('Credentials deleted', { platform, principalId });
      await this.auditLog.record({
        platform,
        principalId,
        action: 'credential_deleted',
        resource: 'credentials',
        method: 'DELETE',
        statusCode: 200,
      });
    }
    return deleted;
  }

  /**
   * Keep the record but stop serving it from retrieve().
   */
  async deactivate(platform: string, principalId: string): Promise<boolean> {
    const updated = await this.storage.setActive(platform, principalId, false, this.now());
    if (updated) {
      await this.auditLog.record({
        platform,
        principalId,
        action: 'credential_deactivated',
        resource: 'credentials',
        method: 'UPDATE',
        statusCode: 200,
      });
    }
    return updated;
  }

  /** Metadata for every credential a principal holds. Never plaintext. */
  async list(principalId: string): Promise<CredentialMetadata[]> {
    const records = await this.storage.listByPrincipal(principalId);
    return records.map((record) => {
      const metadata: CredentialMetadata = {
        platform: record.platform,
        principalId: record.principalId,
        createdAt: record.createdAt,
        updatedAt: record.updatedAt,
        isActive: record.isActive,
      };
      if (record.expiresAt !== undefined) metadata.expiresAt = record.expiresAt;
      return metadata;
    });
  }

  /**
   * @throws ConfigurationError for unknown platforms or missing required fields
   */
  validateCredentials(platform: string, credentials: CredentialMap): void {
    if (!this.catalog) {
      throw new ConfigurationError('No platform catalog configured for credential validation', platform);
    }
    const missing = this.catalog.missingCredentials(platform, credentials);
    if (missing.length > 0) {
      throw new ConfigurationError(
        `Missing required credentials for ${platform}: ${missing.join(', ')}`,
        platform
      );
    }
  }
}
