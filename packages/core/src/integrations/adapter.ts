/**
 * BasePlatformAdapter - the contract every platform adapter implements.
 *
 * An adapter instance serves one (platform, principal) pair. It owns its
 * rate limiter and request executor; the audit log and webhook verifier are
 * shared and injected. Field mapping for orders, products and the like
 * lives in subclasses.
 */

import {
  UnifiedMessageSchema,
  type AdapterHealth,
  type ApiRequest,
  type ApiResponse,
  type CredentialMap,
  type PlatformDescriptor,
  type RateLimitStatus,
  type UnifiedMessage,
} from '@relayhub/shared';
import { PlatformRateLimiter } from '../security/rate-limiter.js';
import type { CredentialSource } from '../security/credential-vault.js';
import type { WebhookVerifier } from '../security/webhook-verifier.js';
import type { AuditLog } from '../logging/audit-log.js';
import { createNoopLogger, type SecureLogger } from '../logging/logger.js';
import { uuidv7 } from '../utils/crypto.js';
import { ConfigurationError, toErrorMessage } from '../utils/errors.js';
import {
  RetryingRequestExecutor,
  type ExecuteOptions,
  type RequestTarget,
  type Sleep,
} from './request-executor.js';
import { buildAuthHeaders, resolveBaseUrl, type PlatformSettings } from './platform-catalog.js';

export interface AdapterContext {
  principalId: string;
  /** Credentials used until a credential source is bound */
  credentials: CredentialMap;
  /** Read before every request once set; see bindCredentialSource() */
  credentialSource?: CredentialSource;
  descriptor: PlatformDescriptor;
  settings: PlatformSettings;
  auditLog: AuditLog;
  webhookVerifier: WebhookVerifier;
  logger?: SecureLogger;
  now?: () => number;
  sleep?: Sleep;
}

export type AdapterFactory = (context: AdapterContext) => BasePlatformAdapter;

export interface ConnectionTestResult {
  ok: boolean;
  message: string;
}

export interface InboundWebhook {
  rawBody: Buffer | string;
  signatureHeader?: string;
  timestampHeader?: string;
  /** Parsed body, handed to extraction only after verification */
  payload: unknown;
  ipAddress?: string;
  userAgent?: string;
}

/** Fields an adapter supplies when building a UnifiedMessage. */
export interface MessageFields {
  senderId?: string;
  chatId?: string;
  text?: string;
  platformMessageId?: string;
  metadata?: Record<string, unknown>;
  timestamp?: number;
}

export function platformIdFor(platform: string, principalId: string): string {
  return `${platform}:${principalId}`;
}

export abstract class BasePlatformAdapter {
  readonly platform: string;
  readonly principalId: string;
  readonly platformId: string;

  protected readonly descriptor: PlatformDescriptor;
  protected readonly settings: PlatformSettings;
  protected readonly rateLimiter: PlatformRateLimiter;
  protected readonly executor: RetryingRequestExecutor;
  protected readonly auditLog: AuditLog;
  protected readonly logger: SecureLogger;
  protected readonly now: () => number;
  private readonly webhookVerifier: WebhookVerifier;
  private readonly initialCredentials: CredentialMap;
  private credentialSource: CredentialSource | undefined;

  constructor(context: AdapterContext) {
    this.descriptor = context.descriptor;
    this.platform = context.descriptor.platform;
    this.principalId = context.principalId;
    this.platformId = platformIdFor(this.platform, this.principalId);
    this.initialCredentials = context.credentials;
    this.credentialSource = context.credentialSource;
    // Fails fast on a base URL that needs a credential the map lacks.
    resolveBaseUrl(context.descriptor, context.credentials);
    this.settings = context.settings;
    this.auditLog = context.auditLog;
    this.webhookVerifier = context.webhookVerifier;
    this.now = context.now ?? (() => Date.now());
    this.logger = (context.logger ?? createNoopLogger()).child({
      component: 'PlatformAdapter',
      platform: this.platform,
      principalId: this.principalId,
    });

    this.rateLimiter = new PlatformRateLimiter({
      ...context.settings.rateLimit,
      platform: this.platform,
      now: this.now,
      logger: this.logger,
    });

    this.executor = new RetryingRequestExecutor({
      platform: this.platform,
      principalId: this.principalId,
      resolveTarget: () => this.resolveTarget(),
      rateLimiter: this.rateLimiter,
      retry: context.settings.retry,
      auditLog: context.auditLog,
      logger: this.logger,
      now: this.now,
      sleep: context.sleep,
    });
  }

  /**
   * Read credentials from `source` before every later request, so rotation,
   * expiry and deactivation take effect on the next call.
   */
  bindCredentialSource(source: CredentialSource): void {
    this.credentialSource = source;
  }

  /**
   * @throws ConfigurationError once the bound source has no usable credentials
   */
  protected async currentCredentials(): Promise<CredentialMap> {
    if (!this.credentialSource) return this.initialCredentials;

    const credentials = await this.credentialSource.current();
    if (!credentials) {
      throw new ConfigurationError(
        `Missing credentials for ${this.platformId}: missing, inactive or expired`,
        this.platform
      );
    }
    return credentials;
  }

  private async resolveTarget(): Promise<RequestTarget> {
    const credentials = await this.currentCredentials();
    return {
      baseUrl: resolveBaseUrl(this.descriptor, credentials),
      headers: buildAuthHeaders(this.descriptor, credentials),
    };
  }

  /**
   * Send one API request through rate admission and retry.
   */
  request(request: ApiRequest, options?: ExecuteOptions): Promise<ApiResponse> {
    return this.executor.execute(request, options);
  }

  /** Cheap authenticated call used to check credentials. */
  protected abstract connectionTestRequest(): ApiRequest;

  /**
   * Turn a verified webhook payload into messages.
   */
  protected abstract extractWebhookMessages(payload: unknown): Promise<UnifiedMessage[]>;

  async testConnection(): Promise<ConnectionTestResult> {
    const response = await this.request(this.connectionTestRequest());
    if (response.success) {
      return { ok: true, message: `Connected to ${this.descriptor.displayName}` };
    }
    return {
      ok: false,
      message: `${this.descriptor.displayName} connection test failed: ${response.error ?? `HTTP ${response.statusCode}`}`,
    };
  }

  async getHealth(): Promise<AdapterHealth> {
    const startedAt = this.now();
    let result: ConnectionTestResult;
    try {
      result = await this.testConnection();
    } catch (err) {
      result = { ok: false, message: toErrorMessage(err) };
    }

    const health: AdapterHealth = {
      platform: this.platform,
      healthy: result.ok,
      lastCheck: this.now(),
      latencyMs: this.now() - startedAt,
      rateLimitStatus: this.rateLimiter.getStatus(),
    };
    if (!result.ok) health.error = result.message;
    return health;
  }

  getRateLimitStatus(): RateLimitStatus {
    return this.rateLimiter.getStatus();
  }

  /**
   * @throws AuthenticationFailedError when the delivery fails verification
   */
  async verifyWebhook(webhook: InboundWebhook): Promise<void> {
    const { webhook: descriptor } = this.descriptor;
    const credentials = await this.currentCredentials();
    const secret = descriptor.secretField ? credentials[descriptor.secretField] : undefined;

    await this.webhookVerifier.verify(
      {
        platform: this.platform,
        principalId: this.principalId,
        rawBody: webhook.rawBody,
        signatureHeader: webhook.signatureHeader,
        timestampHeader: webhook.timestampHeader,
        ipAddress: webhook.ipAddress,
        userAgent: webhook.userAgent,
      },
      {
        scheme: descriptor.scheme,
        secret,
        enabled: this.settings.webhook.verify,
        maxTimestampDriftMs: descriptor.timestampHeader
          ? this.settings.webhook.maxTimestampDriftMs
          : undefined,
      }
    );
  }

  /**
   * Verify, then extract. The payload never reaches extraction unverified.
   */
  async handleWebhook(webhook: InboundWebhook): Promise<UnifiedMessage[]> {
    await this.verifyWebhook(webhook);
    return this.extractWebhookMessages(webhook.payload);
  }

  /** Release resources held by the adapter. */
  async close(): Promise<void> {
    this.logger.debug('Adapter closed');
  }

  protected createMessage(fields: MessageFields): UnifiedMessage {
    return UnifiedMessageSchema.parse({
      id: uuidv7(),
      platformId: this.platformId,
      platform: this.platform,
      principalId: this.principalId,
      timestamp: this.now(),
      ...fields,
    });
  }
}
