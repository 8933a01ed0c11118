/**
 * Relayhub - Main Entry Point
 *
 * Constructs and wires every component once: storage, audit log, credential
 * vault, webhook verifier, platform catalog and orchestrator. Nothing here is
 * a module-level singleton; each instance owns its own lifecycle.
 *
 * Security considerations:
 * - Secrets come from environment variables named in config
 * - A missing master key is replaced by an ephemeral one, with a warning
 * - Graceful shutdown drains the audit queue before storage closes
 */

import type Database from 'better-sqlite3';
import type { AuditEntry, AuditQuery, Config } from '@relayhub/shared';
import { getSecret, loadConfig, requireSecret, type LoadConfigOptions } from './config/loader.js';
import { createLogger, type SecureLogger } from './logging/logger.js';
import { AuditLog, type AuditLogStorage, type VerificationResult } from './logging/audit-log.js';
import { SQLiteAuditStorage } from './logging/sqlite-storage.js';
import { CredentialVault } from './security/credential-vault.js';
import { SQLiteCredentialStorage, type CredentialStorage } from './security/credential-storage.js';
import { generateMasterKey } from './security/secrets.js';
import { WebhookVerifier } from './security/webhook-verifier.js';
import { PlatformCatalog } from './integrations/platform-catalog.js';
import { Orchestrator } from './integrations/orchestrator.js';
import { openDatabase } from './storage/sqlite-base.js';
import { randomHex } from './utils/crypto.js';

export interface RelayhubOptions {
  /** Configuration loading options */
  config?: LoadConfigOptions;
  /** Environment for secrets (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Platform catalog (defaults to the bundled one) */
  catalog?: PlatformCatalog;
  logger?: SecureLogger;
  /** Custom storage backends; SQLite at storage.dbPath otherwise */
  auditStorage?: AuditLogStorage;
  credentialStorage?: CredentialStorage;
}

export interface RelayhubState {
  initialized: boolean;
  startedAt?: number;
  config: Config;
}

interface Components {
  config: Config;
  logger: SecureLogger;
  db: Database.Database | null;
  auditStorage: AuditLogStorage;
  credentialStorage: CredentialStorage;
  auditLog: AuditLog;
  vault: CredentialVault;
  webhookVerifier: WebhookVerifier;
  catalog: PlatformCatalog;
  orchestrator: Orchestrator;
  startedAt: number;
}

export class Relayhub {
  private components: Components | null = null;
  private shutdownPromise: Promise<void> | null = null;

  constructor(private readonly options: RelayhubOptions = {}) {}

  /**
   * Initialize Relayhub
   * Must be called before any other operations
   */
  async initialize(): Promise<void> {
    if (this.components) {
      throw new Error('Relayhub is already initialized');
    }

    const env = this.options.env ?? process.env;

    // Step 1: Load and validate configuration
    const config = loadConfig({ env, ...this.options.config });

    // Step 2: Catalog, then the logger that redacts its credential fields
    const catalog = this.options.catalog ?? PlatformCatalog.bundled();
    const logger =
      this.options.logger ??
      createLogger(config.logging, { sensitiveNames: catalog.sensitiveNames() });
    logger.info('Relayhub initializing', {
      environment: config.core.environment,
      version: config.version,
    });

    // Step 3: Secrets
    const signingKey = this.resolveSigningKey(config, env, logger);
    const masterKey = this.resolveMasterKey(config, env, logger);

    // Step 4: Storage (one shared database handle)
    const needsDb = !this.options.auditStorage || !this.options.credentialStorage;
    const db = needsDb ? openDatabase(config.storage.dbPath) : null;
    const auditStorage = this.options.auditStorage ?? new SQLiteAuditStorage({ db: db ?? undefined });
    const credentialStorage =
      this.options.credentialStorage ?? new SQLiteCredentialStorage({ db: db ?? undefined });

    // Step 5: Audit log
    const auditLog = new AuditLog({
      storage: auditStorage,
      signingKey,
      logger,
      defaultQueryLimit: config.security.audit.defaultQueryLimit,
    });
    await auditLog.initialize();
    await auditLog.enforceRetention({
      maxAgeDays: config.security.audit.retentionDays,
      maxEntries: config.security.audit.maxEntries,
    });

    // Step 6: Security boundary and orchestration
    const vault = new CredentialVault({ storage: credentialStorage, masterKey, auditLog, catalog, logger });
    const webhookVerifier = new WebhookVerifier({ auditLog, logger });
    const orchestrator = new Orchestrator({
      catalog,
      vault,
      auditLog,
      webhookVerifier,
      config,
      logger,
    });

    this.components = {
      config,
      logger,
      db,
      auditStorage,
      credentialStorage,
      auditLog,
      vault,
      webhookVerifier,
      catalog,
      orchestrator,
      startedAt: Date.now(),
    };
    this.shutdownPromise = null;

    logger.info('Relayhub initialized', { platforms: catalog.list().length });
  }

  private resolveSigningKey(config: Config, env: NodeJS.ProcessEnv, logger: SecureLogger): string {
    const { signingKeyEnv } = config.security.audit;
    if (config.core.environment === 'production') {
      return requireSecret(signingKeyEnv, env);
    }

    const signingKey = getSecret(signingKeyEnv, env);
    if (signingKey) return signingKey;

    logger.warn(`${signingKeyEnv} not set; generated an ephemeral audit signing key`, {
      consequence: 'audit chain cannot be verified after restart',
    });
    return randomHex(32);
  }

  private resolveMasterKey(config: Config, env: NodeJS.ProcessEnv, logger: SecureLogger): string {
    const { keyEnv } = config.security.vault;
    const masterKey = getSecret(keyEnv, env);
    if (masterKey) return masterKey;

    logger.warn(`${keyEnv} not set; generated an ephemeral master key`, {
      consequence: 'stored credentials cannot be decrypted after restart',
    });
    return generateMasterKey();
  }

  private require(): Components {
    if (!this.components) {
      throw new Error('Relayhub is not initialized. Call initialize() first.');
    }
    return this.components;
  }

  get orchestrator(): Orchestrator {
    return this.require().orchestrator;
  }

  get vault(): CredentialVault {
    return this.require().vault;
  }

  get auditLog(): AuditLog {
    return this.require().auditLog;
  }

  get catalog(): PlatformCatalog {
    return this.require().catalog;
  }

  get logger(): SecureLogger {
    return this.require().logger;
  }

  /**
   * Audit entries, newest first.
   */
  queryAudit(query: AuditQuery = {}): Promise<AuditEntry[]> {
    return this.require().auditLog.query(query);
  }

  verifyAuditChain(): Promise<VerificationResult> {
    return this.require().auditLog.verify();
  }

  getState(): RelayhubState {
    const { config, startedAt } = this.require();
    return { initialized: true, startedAt, config };
  }

  /**
   * Graceful shutdown. Safe to call more than once.
   */
  close(): Promise<void> {
    this.shutdownPromise ??= this.performShutdown();
    return this.shutdownPromise;
  }

  private async performShutdown(): Promise<void> {
    const components = this.components;
    if (!components) return;
    this.components = null;

    components.logger.info('Relayhub shutting down');

    await components.orchestrator.close();
    await components.auditLog.flush();

    components.credentialStorage.close?.();
    components.auditStorage.close?.();
    if (components.db?.open) {
      components.db.close();
    }

    components.logger.info('Relayhub shutdown complete', {
      uptimeMs: Date.now() - components.startedAt,
    });
  }
}

/**
 * Create and initialize a Relayhub instance
 */
export async function createRelayhub(options?: RelayhubOptions): Promise<Relayhub> {
  const relayhub = new Relayhub(options);
  await relayhub.initialize();
  return relayhub;
}
