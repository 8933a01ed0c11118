import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CredentialVault } from './credential-vault.js';
import {
  InMemoryCredentialStorage,
  SQLiteCredentialStorage,
  type CredentialStorage,
} from './credential-storage.js';
import { AuditLog, InMemoryAuditStorage } from '../logging/audit-log.js';
import { PlatformCatalog } from '../integrations/platform-catalog.js';
import { ConfigurationError, CredentialDecryptionError } from '../utils/errors.js';

const MASTER_KEY = 'test-master-key-0123456789abcdef';
const SIGNING_KEY = 'test-audit-signing-key-0123456789abcdef';

const storages: [string, () => CredentialStorage & { close?: () => void }][] = [
  ['in-memory', () => new InMemoryCredentialStorage()],
  ['sqlite', () => new SQLiteCredentialStorage()],
];

describe.each(storages)('CredentialVault (%s storage)', (_name, createStorage) => {
  let now: number;
  let storage: CredentialStorage & { close?: () => void };
  let auditLog: AuditLog;
  let vault: CredentialVault;

  beforeEach(() => {
    now = 1_700_000_000_000;
    storage = createStorage();
    auditLog = new AuditLog({ storage: new InMemoryAuditStorage(), signingKey: SIGNING_KEY });
    vault = new CredentialVault({
      storage,
      masterKey: MASTER_KEY,
      auditLog,
      catalog: PlatformCatalog.bundled(),
      now: () => now,
    });
  });

  afterEach(() => {
    storage.close?.();
  });

  it('round-trips a credential map', async () => {
    const credentials = { client_id: 'test-client', api_key: 'test-key' };
    await vault.store('ozon', 'tenant-1', credentials);
    expect(await vault.retrieve('ozon', 'tenant-1')).toEqual(credentials);
  });

  it('keeps only ciphertext in storage', async () => {
    await vault.store('ozon', 'tenant-1', { api_key: 'test-key-plaintext' });
    const record = await storage.get('ozon', 'tenant-1');
    expect(record?.ciphertext).not.toContain('test-key-plaintext');
    expect(record?.isActive).toBe(true);
  });

  it('returns null for credentials that expired a second ago', async () => {
    await vault.store('telegram', 'tenant-1', { bot_token: 'test-token' }, now - 1000);
    expect(await vault.retrieve('telegram', 'tenant-1')).toBeNull();
  });

  it('returns credentials that expire in the future', async () => {
    await vault.store('telegram', 'tenant-1', { bot_token: 'test-token' }, now + 60_000);
    expect(await vault.retrieve('telegram', 'tenant-1')).toEqual({ bot_token: 'test-token' });
  });

  it('returns null for missing and deactivated credentials', async () => {
    expect(await vault.retrieve('vk', 'nobody')).toBeNull();

    await vault.store('vk', 'tenant-1', { access_token: 'test-token', group_id: '1' });
    expect(await vault.deactivate('vk', 'tenant-1')).toBe(true);
    expect(await vault.retrieve('vk', 'tenant-1')).toBeNull();
    expect(await vault.deactivate('vk', 'nobody')).toBe(false);
  });

  it('preserves createdAt across store and rotate', async () => {
    await vault.store('shopify', 'tenant-1', { shop_domain: 'a.example.com', access_token: 'v1' });
    now += 5_000;
    await vault.rotate('shopify', 'tenant-1', { shop_domain: 'a.example.com', access_token: 'v2' });
    now += 5_000;
    await vault.store('shopify', 'tenant-1', { shop_domain: 'a.example.com', access_token: 'v3' });

    const [metadata] = await vault.list('tenant-1');
    expect(metadata).toEqual({
      platform: 'shopify',
      principalId: 'tenant-1',
      createdAt: 1_700_000_000_000,
      updatedAt: 1_700_000_010_000,
      isActive: true,
    });
    expect(await vault.retrieve('shopify', 'tenant-1')).toEqual({
      shop_domain: 'a.example.com',
      access_token: 'v3',
    });
  });

  describe('sourceFor()', () => {
    it('decrypts once until the stored envelope changes', async () => {
      await vault.store('ozon', 'tenant-1', { client_id: 'c', api_key: 'v1' });
      const source = vault.sourceFor('ozon', 'tenant-1');

      expect(await source.current()).toEqual({ client_id: 'c', api_key: 'v1' });
      expect(await source.current()).toEqual({ client_id: 'c', api_key: 'v1' });
      expect(await auditLog.query({ action: 'credential_accessed' })).toHaveLength(1);

      await vault.rotate('ozon', 'tenant-1', { client_id: 'c', api_key: 'v2' });

      expect(await source.current()).toEqual({ client_id: 'c', api_key: 'v2' });
      expect(await auditLog.query({ action: 'credential_accessed' })).toHaveLength(2);
    });

    it('stops serving credentials once they expire or are deactivated', async () => {
      await vault.store('ozon', 'tenant-1', { client_id: 'c', api_key: 'k' }, now + 1000);
      await vault.store('vk', 'tenant-1', { access_token: 't', group_id: 'g' });
      const expiring = vault.sourceFor('ozon', 'tenant-1');
      const deactivated = vault.sourceFor('vk', 'tenant-1');
      await expiring.current();
      await deactivated.current();

      now += 5000;
      await vault.deactivate('vk', 'tenant-1');

      expect(await expiring.current()).toBeNull();
      expect(await deactivated.current()).toBeNull();
      const missing = await auditLog.query({ action: 'credential_missing' });
      expect(missing.map((e) => e.requestData)).toEqual([{ reason: 'inactive' }, { reason: 'expired' }]);
    });
  });

  it('makes delete idempotent', async () => {
    await vault.store('ozon', 'tenant-1', { client_id: 'c', api_key: 'k' });
    expect(await vault.delete('ozon', 'tenant-1')).toBe(true);
    expect(await vault.delete('ozon', 'tenant-1')).toBe(false);
    expect(await vault.retrieve('ozon', 'tenant-1')).toBeNull();
  });

  it('fails closed when the stored envelope was tampered with', async () => {
    await vault.store('ozon', 'tenant-1', { client_id: 'c', api_key: 'k' });
    const record = await storage.get('ozon', 'tenant-1');
    if (!record) throw new Error('record missing');

    const raw = Buffer.from(record.ciphertext, 'base64');
    const last = raw.length - 1;
    raw[last] = (raw[last] ?? 0) ^ 0xff;
    await storage.put({ ...record, ciphertext: raw.toString('base64') });

    await expect(vault.retrieve('ozon', 'tenant-1')).rejects.toThrow(CredentialDecryptionError);
    const [entry] = await auditLog.query({ action: 'credential_accessed' });
    expect(entry?.statusCode).toBe(500);
  });

  it('audits every access without plaintext', async () => {
    await vault.store('ozon', 'tenant-1', { client_id: 'c', api_key: 'test-key-1234' });
    await vault.retrieve('ozon', 'tenant-1');
    await vault.retrieve('ozon', 'tenant-2');
    await vault.delete('ozon', 'tenant-1');

    const entries = await auditLog.query();
    expect(entries.map((e) => e.action)).toEqual([
      'credential_deleted',
      'credential_missing',
      'credential_accessed',
      'credential_stored',
    ]);
    expect(entries[3]?.requestData).toEqual({ fields: ['client_id', 'api_key'], expiresAt: null });
    expect(JSON.stringify(entries)).not.toContain('test-key-1234');
  });

  it('lists metadata for one principal only', async () => {
    await vault.store('ozon', 'tenant-1', { client_id: 'c', api_key: 'k' });
    await vault.store('vk', 'tenant-1', { access_token: 't', group_id: 'g' }, now + 1000);
    await vault.store('ozon', 'tenant-2', { client_id: 'c', api_key: 'k' });

    const listed = await vault.list('tenant-1');
    expect(listed.map((m) => m.platform).sort()).toEqual(['ozon', 'vk']);
    expect(listed.find((m) => m.platform === 'vk')?.expiresAt).toBe(now + 1000);
  });
});

describe('CredentialVault.validateCredentials', () => {
  const vault = new CredentialVault({
    storage: new InMemoryCredentialStorage(),
    masterKey: MASTER_KEY,
    auditLog: new AuditLog({ storage: new InMemoryAuditStorage(), signingKey: SIGNING_KEY }),
    catalog: PlatformCatalog.bundled(),
  });

  it('accepts complete credentials', () => {
    expect(() =>
      vault.validateCredentials('woocommerce', {
        site_url: 'https://shop.example.com',
        consumer_key: 'ck',
        consumer_secret: 'cs',
      })
    ).not.toThrow();
  });

  it('names every missing or blank field', () => {
    expect(() => vault.validateCredentials('insales', { domain: 'x', api_key: ' ' })).toThrow(
      'Missing required credentials for insales: api_key, password'
    );
  });

  it('rejects unknown platforms', () => {
    expect(() => vault.validateCredentials('myspace', {})).toThrow(ConfigurationError);
  });

  it('rejects a short master key', () => {
    expect(
      () =>
        new CredentialVault({
          storage: new InMemoryCredentialStorage(),
          masterKey: 'short',
          auditLog: new AuditLog({ storage: new InMemoryAuditStorage(), signingKey: SIGNING_KEY }),
        })
    ).toThrow('Master key must be at least 16 characters');
  });
});
