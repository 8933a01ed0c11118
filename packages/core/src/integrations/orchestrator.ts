/**
 * Orchestrator - owns the connected adapters and fans work out to them.
 *
 * Handles factory registration, connect/disconnect with credential storage,
 * restoring registrations from the vault, health status, concurrent
 * dispatch with per-adapter failure isolation, and webhook routing by
 * (platform, principal) or per-registration token.
 *
 * Registered adapters read their credentials from the vault before every
 * request; the plaintext passed to connect() is used for the connection
 * test only.
 */

import {
  ApiResponseSchema,
  type Config,
  type ConnectionResult,
  type CredentialMap,
  type DispatchOutcome,
  type DispatchResult,
  type ErrorKind,
  type PlatformStatus,
  type UnifiedMessage,
} from '@relayhub/shared';
import type { AuditLog } from '../logging/audit-log.js';
import { createNoopLogger, type SecureLogger } from '../logging/logger.js';
import type { CredentialSource, CredentialVault } from '../security/credential-vault.js';
import type { WebhookVerifier } from '../security/webhook-verifier.js';
import { generateSecureToken } from '../utils/crypto.js';
import {
  AuthenticationFailedError,
  ConfigurationError,
  errorKindOf,
  toErrorMessage,
} from '../utils/errors.js';
import {
  platformIdFor,
  type AdapterContext,
  type AdapterFactory,
  type BasePlatformAdapter,
  type InboundWebhook,
} from './adapter.js';
import { resolvePlatformSettings, type PlatformCatalog } from './platform-catalog.js';
import type { Sleep } from './request-executor.js';

export interface OrchestratorDeps {
  catalog: PlatformCatalog;
  vault: CredentialVault;
  auditLog: AuditLog;
  webhookVerifier: WebhookVerifier;
  config: Pick<Config, 'defaults' | 'platforms'>;
  logger?: SecureLogger;
  now?: () => number;
  /** Backoff sleep handed to every adapter's executor */
  sleep?: Sleep;
}

export interface ConnectOptions {
  /** Credential expiry (epoch ms) */
  expiresAt?: number;
}

/**
 * A named unit of work run against each adapter. Failure is a thrown error,
 * or an ApiResponse with `success: false`.
 */
export interface PlatformOperation<T = unknown> {
  name: string;
  run: (adapter: BasePlatformAdapter) => Promise<T>;
}

export interface WebhookDelivery extends InboundWebhook {
  platform: string;
  principalId?: string;
  webhookToken?: string;
}

export interface WebhookHandlingResult {
  accepted: boolean;
  platformId: string;
  messages: UnifiedMessage[];
  error?: string;
}

export interface DispatchStatistics {
  totalDispatches: number;
  successfulDispatches: number;
  failedDispatches: number;
  lastDispatchAt: number | null;
  connectedPlatforms: number;
}

interface Registration {
  adapter: BasePlatformAdapter;
  webhookToken: string;
  registeredAt: number;
}

type Settled =
  | { ok: true; data: unknown }
  | { ok: false; error: string; errorKind: ErrorKind };

function settle(result: PromiseSettledResult<unknown>): Settled {
  if (result.status === 'rejected') {
    return { ok: false, error: toErrorMessage(result.reason), errorKind: errorKindOf(result.reason) };
  }

  const response = ApiResponseSchema.safeParse(result.value);
  if (response.success && !response.data.success) {
    return {
      ok: false,
      error: response.data.error ?? `HTTP ${response.data.statusCode}`,
      errorKind: response.data.errorKind ?? 'transient_network',
    };
  }
  return { ok: true, data: result.value };
}

export class Orchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly logger: SecureLogger;
  private readonly now: () => number;
  private readonly factories = new Map<string, AdapterFactory>();
  private readonly registry = new Map<string, Registration>();
  private readonly webhookTokens = new Map<string, string>();

  private readonly stats: Omit<DispatchStatistics, 'connectedPlatforms'> = {
    totalDispatches: 0,
    successfulDispatches: 0,
    failedDispatches: 0,
    lastDispatchAt: null,
  };

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.logger = (deps.logger ?? createNoopLogger()).child({ component: 'Orchestrator' });
    this.now = deps.now ?? (() => Date.now());
  }

  // ── Factory Registration ─────────────────────────────────

  registerPlatform(platform: string, factory: AdapterFactory): void {
    this.deps.catalog.require(platform);
    this.factories.set(platform, factory);
    this.logger.info(`Registered adapter factory: ${platform}`);
  }

  getSupportedPlatforms(): string[] {
    return [...this.factories.keys()];
  }

  // ── Registry ─────────────────────────────────────────────

  /**
   * Add a constructed adapter. Replaces any adapter with the same
   * platformId. Returns the webhook token for the registration.
   */
  register(adapter: BasePlatformAdapter): string {
    const existing = this.registry.get(adapter.platformId);
    if (existing) {
      this.logger.warn('Replacing registered adapter', { platformId: adapter.platformId });
      this.webhookTokens.delete(existing.webhookToken);
    }

    const webhookToken = generateSecureToken(24);
    this.registry.set(adapter.platformId, { adapter, webhookToken, registeredAt: this.now() });
    this.webhookTokens.set(webhookToken, adapter.platformId);
    return webhookToken;
  }

  deregister(platformId: string): boolean {
    const registration = this.registry.get(platformId);
    if (!registration) return false;

    this.registry.delete(platformId);
    this.webhookTokens.delete(registration.webhookToken);
    return true;
  }

  getAdapter(principalId: string, platformId: string): BasePlatformAdapter | undefined {
    const registration = this.registry.get(platformId);
    return registration?.adapter.principalId === principalId ? registration.adapter : undefined;
  }

  listAdapters(principalId: string): BasePlatformAdapter[] {
    return [...this.registry.values()]
      .map((r) => r.adapter)
      .filter((adapter) => adapter.principalId === principalId);
  }

  // ── Connect / Disconnect ─────────────────────────────────

  /**
   * Validate, build, authenticate, store credentials and register.
   *
   * @throws ConfigurationError for unknown platforms or missing credentials
   * @throws AuthenticationFailedError when the connection test fails
   */
  async connect(
    principalId: string,
    platform: string,
    credentials: CredentialMap,
    options: ConnectOptions = {}
  ): Promise<ConnectionResult> {
    try {
      this.deps.catalog.require(platform);
      const factory = this.factories.get(platform);
      if (!factory) {
        throw new ConfigurationError(`No adapter registered for platform: ${platform}`, platform);
      }
      this.deps.vault.validateCredentials(platform, credentials);

      const adapter = factory(this.adapterContext(principalId, platform, credentials));

      const test = await adapter.testConnection();
      if (!test.ok) {
        throw new AuthenticationFailedError(test.message, platform);
      }

      await this.deps.vault.store(platform, principalId, credentials, options.expiresAt);
      adapter.bindCredentialSource(this.deps.vault.sourceFor(platform, principalId));
      const webhookToken = this.register(adapter);

      this.logger.info('Platform connected', { platform, principalId, platformId: adapter.platformId });
      await this.deps.auditLog.record({
        platform,
        principalId,
        action: 'platform_connected',
        resource: adapter.platformId,
        method: 'CONNECT',
        statusCode: 200,
      });

      return { platformId: adapter.platformId, success: true, message: test.message, webhookToken };
    } catch (err) {
      this.logger.error('Platform connection failed', { platform, principalId, error: err });
      await this.deps.auditLog.record({
        platform,
        principalId,
        action: 'connection_failed',
        resource: platformIdFor(platform, principalId),
        method: 'CONNECT',
        statusCode: 400,
        error: toErrorMessage(err),
      });
      throw err;
    }
  }

  /**
   * Rebuild registrations from the credentials the vault holds for a
   * principal, as after a restart. Platforms already registered are left
   * alone. No connection test is made; one result per stored credential.
   */
  async restore(principalId: string): Promise<ConnectionResult[]> {
    const results: ConnectionResult[] = [];

    for (const { platform } of await this.deps.vault.list(principalId)) {
      const platformId = platformIdFor(platform, principalId);
      if (this.registry.has(platformId)) continue;

      const result = await this.restoreOne(principalId, platform, platformId);
      if (!result.success) {
        this.logger.warn('Platform not restored', { platform, principalId, reason: result.message });
      }
      results.push(result);
    }

    this.logger.info('Registrations restored', {
      principalId,
      restored: results.filter((r) => r.success).length,
      skipped: results.filter((r) => !r.success).length,
    });
    return results;
  }

  private async restoreOne(
    principalId: string,
    platform: string,
    platformId: string
  ): Promise<ConnectionResult> {
    const factory = this.factories.get(platform);
    if (!factory) {
      return { platformId, success: false, message: `No adapter registered for platform: ${platform}` };
    }

    const source = this.deps.vault.sourceFor(platform, principalId);
    let adapter: BasePlatformAdapter;
    try {
      const credentials = await source.current();
      if (!credentials) {
        return { platformId, success: false, message: 'Stored credentials are inactive or expired' };
      }
      adapter = factory(this.adapterContext(principalId, platform, credentials, source));
    } catch (err) {
      return { platformId, success: false, message: toErrorMessage(err) };
    }

    const webhookToken = this.register(adapter);

    await this.deps.auditLog.record({
      platform,
      principalId,
      action: 'platform_connected',
      resource: platformId,
      method: 'RESTORE',
      statusCode: 200,
    });
    return { platformId, success: true, message: `Restored ${adapter.platformId}`, webhookToken };
  }

  private adapterContext(
    principalId: string,
    platform: string,
    credentials: CredentialMap,
    credentialSource?: CredentialSource
  ): AdapterContext {
    const descriptor = this.deps.catalog.require(platform);
    return {
      principalId,
      credentials,
      credentialSource,
      descriptor,
      settings: resolvePlatformSettings(this.deps.config, platform, descriptor),
      auditLog: this.deps.auditLog,
      webhookVerifier: this.deps.webhookVerifier,
      logger: this.deps.logger,
      now: this.now,
      sleep: this.deps.sleep,
    };
  }

  /**
   * Deregister the adapter and delete its stored credentials.
   */
  async disconnect(principalId: string, platformId: string): Promise<boolean> {
    const adapter = this.getAdapter(principalId, platformId);
    if (!adapter) return false;

    this.deregister(platformId);
    await adapter.close();
    await this.deps.vault.delete(adapter.platform, principalId);

    this.logger.info('Platform disconnected', { platform: adapter.platform, principalId, platformId });
    await this.deps.auditLog.record({
      platform: adapter.platform,
      principalId,
      action: 'platform_disconnected',
      resource: platformId,
      method: 'DISCONNECT',
      statusCode: 200,
    });
    return true;
  }

  // ── Status ───────────────────────────────────────────────

  async getStatus(principalId: string, platformId: string): Promise<PlatformStatus> {
    const adapter = this.getAdapter(principalId, platformId);
    if (!adapter) {
      return { status: 'not_found', lastCheck: this.now(), error: `Platform ${platformId} not connected` };
    }

    const health = await adapter.getHealth();
    const status: PlatformStatus = {
      status: health.healthy ? 'active' : 'error',
      platform: adapter.platform,
      health,
      lastCheck: health.lastCheck,
    };
    if (health.error !== undefined) status.error = health.error;
    return status;
  }

  async getAllStatuses(principalId: string): Promise<Record<string, PlatformStatus>> {
    const adapters = this.listAdapters(principalId);
    const statuses = await Promise.all(
      adapters.map((adapter) => this.getStatus(principalId, adapter.platformId))
    );

    const result: Record<string, PlatformStatus> = {};
    adapters.forEach((adapter, i) => {
      const status = statuses[i];
      if (status) result[adapter.platformId] = status;
    });
    return result;
  }

  // ── Dispatch ─────────────────────────────────────────────

  /**
   * Run an operation concurrently against every adapter the principal has
   * connected. One failure never cancels or delays another.
   *
   * @throws ConfigurationError when the principal has no adapters
   */
  async dispatchAll<T>(principalId: string, operation: PlatformOperation<T>): Promise<DispatchResult> {
    const adapters = this.listAdapters(principalId);
    if (adapters.length === 0) {
      throw new ConfigurationError(`No platforms connected for principal ${principalId}`);
    }
    return this.fanOut(principalId, adapters, operation);
  }

  /**
   * @throws ConfigurationError when the platform is not connected
   */
  async dispatch<T>(
    principalId: string,
    platformId: string,
    operation: PlatformOperation<T>
  ): Promise<DispatchResult> {
    const adapter = this.getAdapter(principalId, platformId);
    if (!adapter) {
      throw new ConfigurationError(`Platform ${platformId} is not connected for principal ${principalId}`);
    }
    return this.fanOut(principalId, [adapter], operation);
  }

  private async fanOut<T>(
    principalId: string,
    adapters: BasePlatformAdapter[],
    operation: PlatformOperation<T>
  ): Promise<DispatchResult> {
    const startedAt = this.now();
    const durations = new Map<string, number>();

    const settled = await Promise.allSettled(
      adapters.map(async (adapter) => {
        const adapterStart = this.now();
        try {
          return await operation.run(adapter);
        } finally {
          durations.set(adapter.platformId, this.now() - adapterStart);
        }
      })
    );

    const result: DispatchResult = {
      principalId,
      operation: operation.name,
      attempted: adapters.map((a) => a.platformId),
      succeeded: [],
      failed: [],
      errors: [],
      outcomes: [],
      startedAt,
      durationMs: 0,
    };

    for (const [i, adapter] of adapters.entries()) {
      const settledResult = settled[i];
      if (!settledResult) continue;

      const outcome = settle(settledResult);
      const base = {
        platformId: adapter.platformId,
        platform: adapter.platform,
        durationMs: durations.get(adapter.platformId) ?? 0,
      };

      if (outcome.ok) {
        result.succeeded.push(adapter.platformId);
        result.outcomes.push({ ...base, success: true, data: outcome.data } satisfies DispatchOutcome);
        continue;
      }

      result.failed.push(adapter.platformId);
      result.errors.push(`${adapter.platformId}: ${outcome.error}`);
      result.outcomes.push({
        ...base,
        success: false,
        error: outcome.error,
        errorKind: outcome.errorKind,
      } satisfies DispatchOutcome);

      this.logger.warn('Dispatch failed', {
        platformId: adapter.platformId,
        operation: operation.name,
        errorKind: outcome.errorKind,
      });
      await this.deps.auditLog.record({
        platform: adapter.platform,
        principalId,
        action: 'dispatch_failed',
        resource: operation.name,
        method: 'DISPATCH',
        statusCode: 0,
        durationMs: base.durationMs,
        error: outcome.error,
        requestData: { errorKind: outcome.errorKind },
      });
    }

    result.durationMs = this.now() - startedAt;
    this.stats.totalDispatches += adapters.length;
    this.stats.successfulDispatches += result.succeeded.length;
    this.stats.failedDispatches += result.failed.length;
    this.stats.lastDispatchAt = startedAt;

    this.logger.info('Dispatch completed', {
      principalId,
      operation: operation.name,
      succeeded: result.succeeded.length,
      failed: result.failed.length,
    });
    return result;
  }

  // ── Webhooks ─────────────────────────────────────────────

  /**
   * Route an inbound delivery to its adapter, verify it, and extract messages.
   *
   * @throws ConfigurationError when no connected adapter matches the route
   */
  async handleWebhook(delivery: WebhookDelivery): Promise<WebhookHandlingResult> {
    const startedAt = this.now();
    const adapter = this.resolveWebhookTarget(delivery);
    if (!adapter) {
      this.logger.warn('Webhook for unknown registration', { platform: delivery.platform });
      const error = new ConfigurationError('No connected platform matches this webhook', delivery.platform);
      await this.auditWebhookFailure(delivery, delivery.principalId ?? '', 'unrouted', error, startedAt);
      throw error;
    }

    let messages: UnifiedMessage[];
    try {
      messages = await adapter.handleWebhook(delivery);
    } catch (err) {
      if (err instanceof AuthenticationFailedError) {
        return { accepted: false, platformId: adapter.platformId, messages: [], error: err.message };
      }
      this.logger.error('Webhook processing failed', { platformId: adapter.platformId, error: err });
      await this.auditWebhookFailure(delivery, adapter.principalId, adapter.platformId, err, startedAt);
      throw err;
    }

    const durationMs = this.now() - startedAt;
    await this.deps.auditLog.record({
      platform: adapter.platform,
      principalId: adapter.principalId,
      action: 'webhook_received',
      resource: adapter.platformId,
      method: 'POST',
      statusCode: 200,
      durationMs,
      requestData: { payloadSize: Buffer.byteLength(delivery.rawBody), messages: messages.length },
      ipAddress: delivery.ipAddress,
      userAgent: delivery.userAgent,
    });

    return { accepted: true, platformId: adapter.platformId, messages };
  }

  private resolveWebhookTarget(delivery: WebhookDelivery): BasePlatformAdapter | undefined {
    let platformId: string | undefined;
    if (delivery.webhookToken !== undefined) {
      platformId = this.webhookTokens.get(delivery.webhookToken);
    } else if (delivery.principalId !== undefined) {
      platformId = platformIdFor(delivery.platform, delivery.principalId);
    }

    const adapter = platformId ? this.registry.get(platformId)?.adapter : undefined;
    return adapter?.platform === delivery.platform ? adapter : undefined;
  }

  private async auditWebhookFailure(
    delivery: WebhookDelivery,
    principalId: string,
    resource: string,
    err: unknown,
    startedAt: number
  ): Promise<void> {
    await this.deps.auditLog.record({
      platform: delivery.platform,
      principalId,
      action: 'webhook_processing_failed',
      resource,
      method: 'POST',
      statusCode: err instanceof ConfigurationError ? 404 : 500,
      durationMs: this.now() - startedAt,
      error: toErrorMessage(err),
      requestData: { payloadSize: Buffer.byteLength(delivery.rawBody) },
      ipAddress: delivery.ipAddress,
      userAgent: delivery.userAgent,
    });
  }

  // ── Statistics / Cleanup ─────────────────────────────────

  getStatistics(): DispatchStatistics {
    return { ...this.stats, connectedPlatforms: this.registry.size };
  }

  async close(): Promise<void> {
    const adapters = [...this.registry.values()].map((r) => r.adapter);
    this.registry.clear();
    this.webhookTokens.clear();
    await Promise.all(adapters.map((adapter) => adapter.close()));
    this.logger.info('Orchestrator closed', { adapters: adapters.length });
  }
}
