/**
 * Test Helpers
 *
 * In-process fake adapters and a fully-wired component stack with
 * in-memory backends. No test reaches the network: fetch is stubbed.
 */

import { z } from 'zod';
import {
  ConfigSchema,
  type ApiRequest,
  type ApiResponse,
  type Config,
  type CredentialMap,
  type OutboundMessage,
  type PlatformDescriptorInput,
  type UnifiedMessage,
} from '@relayhub/shared';
import { AuditLog, InMemoryAuditStorage } from '../logging/audit-log.js';
import type { SecureLogger } from '../logging/logger.js';
import { CredentialVault } from '../security/credential-vault.js';
import { InMemoryCredentialStorage } from '../security/credential-storage.js';
import { WebhookVerifier } from '../security/webhook-verifier.js';
import { BasePlatformAdapter, type AdapterContext } from '../integrations/adapter.js';
import { MessagingAdapter } from '../integrations/messaging-adapter.js';
import { PlatformCatalog, resolvePlatformSettings } from '../integrations/platform-catalog.js';
import type { ExecuteOptions } from '../integrations/request-executor.js';

// ── Constants ──────────────────────────────────────────────────────

export const TEST_SIGNING_KEY = 'test-audit-signing-key-0123456789abcdef';
export const TEST_MASTER_KEY = 'test-master-key-0123456789abcdef';
export const TEST_NOW = 1_700_000_000_000;

// ── Noop Logger ────────────────────────────────────────────────────

export function noopLogger(): SecureLogger {
  const noop = () => {};
  return {
    trace: noop,
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    fatal: noop,
    child: () => noopLogger(),
    level: 'trace' as const,
  };
}

// ── Catalog ────────────────────────────────────────────────────────

export const TEST_STORE: PlatformDescriptorInput = {
  platform: 'teststore',
  displayName: 'Test Store',
  category: 'storefront',
  baseUrl: 'https://{shop}.example.com/api',
  auth: { type: 'headers', headers: [{ name: 'X-Api-Key', field: 'api_key' }] },
  requiredCredentials: ['shop', 'api_key'],
  rateLimit: {
    requestsPerMinute: 100,
    requestsPerHour: 1000,
    burstSize: 50,
    burstIntervalMs: 1000,
    pollIntervalMs: 1,
  },
  webhook: {
    scheme: { type: 'hmac-sha256-prefixed', prefix: 'sha256=' },
    signatureHeader: 'X-Signature',
    secretField: 'webhook_secret',
  },
};

export const TEST_CHAT: PlatformDescriptorInput = {
  platform: 'testchat',
  displayName: 'Test Chat',
  category: 'messaging',
  baseUrl: 'https://chat.example.com/bot{bot_token}',
  auth: { type: 'none' },
  requiredCredentials: ['bot_token'],
  rateLimit: {
    requestsPerMinute: 100,
    requestsPerHour: 1000,
    burstSize: 50,
    burstIntervalMs: 1000,
    messagesPerSecond: 10,
    perChatLimit: 1,
    pollIntervalMs: 1,
  },
  webhook: {
    scheme: { type: 'static-token' },
    signatureHeader: 'X-Chat-Token',
    secretField: 'webhook_secret',
    timestampHeader: 'X-Chat-Timestamp',
  },
  messaging: { maxTextLength: 20, supportsAttachments: false },
};

export function testCatalog(): PlatformCatalog {
  const catalog = new PlatformCatalog();
  catalog.register(TEST_STORE);
  catalog.register(TEST_CHAT);
  return catalog;
}

// ── Fake adapters ──────────────────────────────────────────────────

const StoreWebhookSchema = z.object({
  events: z.array(z.object({ id: z.string(), text: z.string() })),
});

export class FakeStoreAdapter extends BasePlatformAdapter {
  extracted = 0;

  protected connectionTestRequest(): ApiRequest {
    return { method: 'GET', url: '/ping' };
  }

  syncOrders(): Promise<ApiResponse> {
    return this.request({ method: 'GET', url: '/orders', resource: 'orders.sync' });
  }

  protected async extractWebhookMessages(payload: unknown): Promise<UnifiedMessage[]> {
    this.extracted++;
    const { events } = StoreWebhookSchema.parse(payload);
    return events.map((event) => this.createMessage({ platformMessageId: event.id, text: event.text }));
  }
}

const ChatWebhookSchema = z.object({
  message: z.object({ id: z.string(), chat: z.string(), from: z.string(), text: z.string() }),
});

const SendResultSchema = z.object({ result: z.object({ message_id: z.number() }) });

export class FakeChatAdapter extends MessagingAdapter {
  limiterStats(): { totalHits: number; totalChecks: number } {
    return this.rateLimiter.getStats();
  }

  protected connectionTestRequest(): ApiRequest {
    return { method: 'GET', url: '/getMe' };
  }

  protected sendPlatformMessage(
    chatId: string,
    message: OutboundMessage,
    options: ExecuteOptions
  ): Promise<ApiResponse> {
    return this.request(
      { method: 'POST', url: '/sendMessage', json: { chat_id: chatId, text: message.text } },
      options
    );
  }

  protected messageIdFrom(data: unknown): string | undefined {
    const parsed = SendResultSchema.safeParse(data);
    return parsed.success ? String(parsed.data.result.message_id) : undefined;
  }

  protected async extractWebhookMessages(payload: unknown): Promise<UnifiedMessage[]> {
    const { message } = ChatWebhookSchema.parse(payload);
    return [
      this.createMessage({
        platformMessageId: message.id,
        chatId: message.chat,
        senderId: message.from,
        text: message.text,
      }),
    ];
  }
}

// ── Test Stack ─────────────────────────────────────────────────────

export interface TestStack {
  config: Config;
  catalog: PlatformCatalog;
  auditStorage: InMemoryAuditStorage;
  auditLog: AuditLog;
  vault: CredentialVault;
  webhookVerifier: WebhookVerifier;
  logger: SecureLogger;
  clock: { now: number };
}

export function createTestStack(): TestStack {
  const clock = { now: TEST_NOW };
  const now = () => clock.now;
  const logger = noopLogger();
  const catalog = testCatalog();
  const auditStorage = new InMemoryAuditStorage();
  const auditLog = new AuditLog({ storage: auditStorage, signingKey: TEST_SIGNING_KEY, logger, now });

  return {
    config: ConfigSchema.parse({ defaults: { retry: { maxRetries: 2, baseDelayMs: 1 } } }),
    catalog,
    auditStorage,
    auditLog,
    vault: new CredentialVault({
      storage: new InMemoryCredentialStorage(),
      masterKey: TEST_MASTER_KEY,
      auditLog,
      catalog,
      logger,
      now,
    }),
    webhookVerifier: new WebhookVerifier({ auditLog, logger, now }),
    logger,
    clock,
  };
}

/**
 * Adapter context for one of the test platforms.
 */
export function createAdapterContext(
  stack: TestStack,
  platform: string,
  credentials: CredentialMap,
  principalId = 'tenant-1'
): AdapterContext {
  const descriptor = stack.catalog.require(platform);
  return {
    principalId,
    credentials,
    descriptor,
    settings: resolvePlatformSettings(stack.config, platform, descriptor),
    auditLog: stack.auditLog,
    webhookVerifier: stack.webhookVerifier,
    logger: stack.logger,
    now: () => stack.clock.now,
    sleep: async () => {},
  };
}
