import { describe, it, expect } from 'vitest';
import { PlatformCatalog } from './platform-catalog.js';

describe('PlatformCatalog', () => {
  describe('sensitiveNames()', () => {
    const names = PlatformCatalog.bundled().sensitiveNames();

    it('collects auth header names with the fields that fill them', () => {
      expect(names).toEqual(
        expect.arrayContaining(['Client-Id', 'client_id', 'Api-Key', 'X-Shopify-Access-Token'])
      );
    });

    it('includes basic-auth fields and webhook secrets', () => {
      expect(names).toEqual(
        expect.arrayContaining(['consumer_key', 'consumer_secret', 'Authorization', 'app_secret', 'X-Vk-Secret'])
      );
    });

    it('treats base URL placeholders as secrets only when auth travels in the URL', () => {
      expect(names).toContain('webhook_url');
      expect(names).toContain('bot_token');
      expect(names).not.toContain('shop_domain');
      expect(names).not.toContain('domain');
      expect(names).not.toContain('phone_number_id');
    });

    it('returns each name once, sorted', () => {
      expect(names).toEqual([...new Set(names)].sort());
      expect(names).toHaveLength(28);
    });
  });
});
