import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { AuditEntry } from '@relayhub/shared';
import { AuditLog, GENESIS_HASH, InMemoryAuditStorage, computeEntryHash } from './audit-log.js';
import type { SecureLogger } from './logger.js';

const SIGNING_KEY = 'test-audit-signing-key-0123456789abcdef';

class FlakyStorage extends InMemoryAuditStorage {
  failNext = false;

  async append(entry: AuditEntry): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('disk full');
    }
    await super.append(entry);
  }
}

function createMockLogger(): SecureLogger {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
    level: 'info',
  };
}

describe('AuditLog', () => {
  let storage: InMemoryAuditStorage;
  let audit: AuditLog;

  beforeEach(async () => {
    storage = new InMemoryAuditStorage();
    audit = new AuditLog({ storage, signingKey: SIGNING_KEY });
    await audit.initialize();
  });

  describe('constructor', () => {
    it('should reject signing keys shorter than 32 characters', () => {
      expect(() => new AuditLog({ storage, signingKey: 'short' })).toThrow(
        'Signing key must be at least 32 characters'
      );
    });
  });

  describe('record()', () => {
    it('should link the first entry to the genesis hash', async () => {
      const entry = await audit.record({
        platform: 'ozon',
        principalId: 'tenant-1',
        action: 'platform_connected',
      });
      expect(entry.integrity.previousEntryHash).toBe(GENESIS_HASH);
      expect(entry.resource).toBe('');
      expect(entry.statusCode).toBe(0);
    });

    it('should link each entry to the hash of its predecessor', async () => {
      const first = await audit.record({ platform: 'ozon', principalId: 'p', action: 'api_call' });
      const second = await audit.record({ platform: 'ozon', principalId: 'p', action: 'api_call' });
      expect(second.integrity.previousEntryHash).toBe(computeEntryHash(first));
    });

    it('should redact sensitive payload values', async () => {
      const entry = await audit.record({
        platform: 'shopify',
        principalId: 'tenant-1',
        action: 'api_call',
        requestData: { headers: { 'X-Shopify-Access-Token': 'test-token-abcd' }, page: 2 },
        responseData: { client_secret: 'ab' },
      });
      expect(entry.requestData).toEqual({
        headers: { 'X-Shopify-Access-Token': '***abcd' },
        page: 2,
      });
      expect(entry.responseData).toEqual({ client_secret: '***' });
    });

    it('should keep the chain linear under concurrent appends', async () => {
      await Promise.all(
        Array.from({ length: 20 }, (_, i) =>
          audit.record({ platform: 'vk', principalId: `p-${i % 3}`, action: 'webhook_received' })
        )
      );
      expect(await audit.verify()).toEqual({ valid: true, entriesChecked: 20 });
    });

    it('should keep accepting appends after a storage failure', async () => {
      const flaky = new FlakyStorage();
      const logger = createMockLogger();
      const log = new AuditLog({ storage: flaky, signingKey: SIGNING_KEY, logger });
      flaky.failNext = true;

      const failed = log.record({ platform: 'ozon', principalId: 'p', action: 'api_call' });
      const next = log.record({ platform: 'ozon', principalId: 'p', action: 'api_call' });

      await expect(failed).rejects.toThrow('disk full');
      const entry = await next;
      expect(entry.integrity.previousEntryHash).toBe(GENESIS_HASH);
      expect(await log.verify()).toEqual({ valid: true, entriesChecked: 1 });
      expect(logger.error).toHaveBeenCalledWith('Audit append failed', expect.objectContaining({ action: 'api_call' }));
    });
  });

  describe('query()', () => {
    beforeEach(async () => {
      await audit.record({ platform: 'ozon', principalId: 'p1', action: 'api_call', resource: 'a' });
      await audit.record({ platform: 'vk', principalId: 'p1', action: 'api_call_failed', resource: 'b' });
      await audit.record({ platform: 'ozon', principalId: 'p2', action: 'api_call', resource: 'c' });
    });

    it('should return entries newest first', async () => {
      expect((await audit.query()).map((e) => e.resource)).toEqual(['c', 'b', 'a']);
    });

    it('should filter by platform, principal and action', async () => {
      expect((await audit.query({ platform: 'ozon' })).map((e) => e.resource)).toEqual(['c', 'a']);
      expect((await audit.query({ principalId: 'p1' })).map((e) => e.resource)).toEqual(['b', 'a']);
      expect((await audit.query({ action: 'api_call_failed' })).map((e) => e.resource)).toEqual(['b']);
    });

    it('should apply the default limit of 100', async () => {
      for (let i = 0; i < 100; i++) {
        await audit.record({ platform: 'telegram', principalId: 'p3', action: 'api_call' });
      }
      expect(await audit.query()).toHaveLength(100);
      expect(await audit.query({ limit: 2 })).toHaveLength(2);
    });
  });

  describe('verify()', () => {
    it('should return valid for an empty chain', async () => {
      expect(await audit.verify()).toEqual({ valid: true, entriesChecked: 0 });
    });

    it('should detect a modified entry', async () => {
      await audit.record({ platform: 'ozon', principalId: 'p', action: 'api_call' });
      const tampered = await audit.record({
        platform: 'ozon',
        principalId: 'p',
        action: 'api_call',
        statusCode: 200,
      });
      await audit.record({ platform: 'ozon', principalId: 'p', action: 'api_call' });

      tampered.statusCode = 500;

      expect(await audit.verify()).toEqual({
        valid: false,
        entriesChecked: 2,
        brokenAt: tampered.id,
        error: 'Signature verification failed',
      });
    });

    it('should stay valid after retention purges the oldest entries', async () => {
      for (let i = 0; i < 5; i++) {
        await audit.record({ platform: 'ozon', principalId: 'p', action: 'api_call' });
      }
      expect(await audit.enforceRetention({ maxEntries: 2 })).toBe(3);
      expect(await audit.verify()).toEqual({ valid: true, entriesChecked: 2 });
    });
  });

  describe('initialize()', () => {
    it('should refuse to continue a chain whose head was modified', async () => {
      const head = await audit.record({ platform: 'ozon', principalId: 'p', action: 'api_call' });
      head.principalId = 'someone-else';

      const reopened = new AuditLog({ storage, signingKey: SIGNING_KEY });
      await expect(
        reopened.record({ platform: 'ozon', principalId: 'p', action: 'api_call' })
      ).rejects.toThrow('Audit chain integrity compromised: last entry signature invalid');
    });

    it('should refuse a chain signed with a different key', async () => {
      await audit.record({ platform: 'ozon', principalId: 'p', action: 'api_call' });
      const reopened = new AuditLog({ storage, signingKey: 'another-test-signing-key-0123456789' });
      await expect(reopened.initialize()).rejects.toThrow('Audit chain integrity compromised');
    });
  });

  describe('enforceRetention()', () => {
    it('should purge by age using the injected clock', async () => {
      let now = 1_700_000_000_000;
      const log = new AuditLog({ storage: new InMemoryAuditStorage(), signingKey: SIGNING_KEY, now: () => now });
      await log.record({ platform: 'ozon', principalId: 'p', action: 'api_call' });
      now += 2 * 86_400_000;
      await log.record({ platform: 'ozon', principalId: 'p', action: 'api_call' });

      expect(await log.enforceRetention({ maxAgeDays: 1 })).toBe(1);
      expect(await log.count()).toBe(1);
    });
  });
});
