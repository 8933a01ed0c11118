import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { homedir, tmpdir } from 'node:os';
import { stringify as stringifyYaml } from 'yaml';
import { ConfigurationError } from '../utils/errors.js';
import { expandPath, getSecret, loadConfig, mergeConfigs, requireSecret } from './loader.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'relayhub-config-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: unknown): string {
    const path = join(dir, name);
    writeFileSync(path, typeof content === 'string' ? content : stringifyYaml(content));
    return path;
  }

  it('should apply schema defaults', () => {
    const config = loadConfig({ configPath: writeConfig('empty.yaml', ''), skipEnv: true });

    expect(config.version).toBe('1.0');
    expect(config.core.environment).toBe('development');
    expect(config.defaults.retry).toEqual({ maxRetries: 3, baseDelayMs: 1000, timeoutMs: 30_000 });
    expect(config.defaults.webhook).toEqual({ verify: true, maxTimestampDriftMs: 300_000 });
    expect(config.security.vault.keyEnv).toBe('RELAYHUB_ENCRYPTION_KEY');
    expect(config.security.audit.signingKeyEnv).toBe('RELAYHUB_AUDIT_SIGNING_KEY');
    expect(config.platforms).toEqual({});
  });

  it('should read values and platform overrides from the file', () => {
    const path = writeConfig('relayhub.yaml', {
      core: { environment: 'staging' },
      defaults: { retry: { maxRetries: 5 } },
      platforms: { ozon: { rateLimit: { requestsPerMinute: 30 } } },
    });

    const config = loadConfig({ configPath: path, skipEnv: true });

    expect(config.core.environment).toBe('staging');
    expect(config.defaults.retry.maxRetries).toBe(5);
    expect(config.defaults.retry.baseDelayMs).toBe(1000);
    expect(config.platforms.ozon).toEqual({
      rateLimit: { requestsPerMinute: 30 },
      retry: {},
      webhook: {},
    });
  });

  it('should discover relayhub.yaml in the working directory', () => {
    writeConfig('relayhub.yaml', { core: { name: 'Discovered' } });
    vi.spyOn(process, 'cwd').mockReturnValue(dir);

    const config = loadConfig({ skipEnv: true });

    expect(config.core.name).toBe('Discovered');
  });

  it('should let environment variables override the file', () => {
    const path = writeConfig('relayhub.yaml', { core: { environment: 'staging' } });

    const config = loadConfig({
      configPath: path,
      env: { RELAYHUB_ENV: 'production', RELAYHUB_LOG_LEVEL: 'debug', RELAYHUB_DB_PATH: ':memory:' },
    });

    expect(config.core.environment).toBe('production');
    expect(config.logging.level).toBe('debug');
    expect(config.storage.dbPath).toBe(':memory:');
  });

  it('should let programmatic overrides win over environment variables', () => {
    const config = loadConfig({
      configPath: writeConfig('empty.yaml', ''),
      env: { RELAYHUB_ENV: 'production' },
      overrides: { core: { environment: 'development' }, defaults: { webhook: { verify: false } } },
    });

    expect(config.core.environment).toBe('development');
    expect(config.defaults.webhook).toEqual({ verify: false, maxTimestampDriftMs: 300_000 });
  });

  it('should ignore environment variables when skipped', () => {
    const config = loadConfig({
      configPath: writeConfig('empty.yaml', ''),
      skipEnv: true,
      env: { RELAYHUB_ENV: 'production' },
    });

    expect(config.core.environment).toBe('development');
  });

  it('should reject invalid environment values', () => {
    expect(() =>
      loadConfig({ configPath: writeConfig('empty.yaml', ''), env: { RELAYHUB_LOG_LEVEL: 'loud' } })
    ).toThrow(/^Invalid configuration:\n {2}logging\.level:/);
  });

  it('should reject out-of-range file values', () => {
    const path = writeConfig('bad.yaml', { defaults: { retry: { maxRetries: 99 } } });

    expect(() => loadConfig({ configPath: path, skipEnv: true })).toThrow(ConfigurationError);
    expect(() => loadConfig({ configPath: path, skipEnv: true })).toThrow(
      `Invalid configuration in ${path}`
    );
  });

  it('should reject path traversal in the database path', () => {
    const path = writeConfig('traversal.yaml', { storage: { dbPath: '../../etc/relayhub.db' } });

    expect(() => loadConfig({ configPath: path, skipEnv: true })).toThrow(ConfigurationError);
  });

  it('should reject malformed YAML', () => {
    const path = writeConfig('broken.yaml', 'core: [unclosed');

    expect(() => loadConfig({ configPath: path, skipEnv: true })).toThrow(
      `Failed to load config from ${path}`
    );
  });

  it('should throw for a missing explicit config file', () => {
    const path = join(dir, 'missing.yaml');
    expect(() => loadConfig({ configPath: path })).toThrow(`Config file not found: ${path}`);
  });
});

describe('mergeConfigs', () => {
  it('should merge nested objects and replace arrays', () => {
    const merged = mergeConfigs(
      { logging: { level: 'info', output: [{ type: 'stdout' }] }, core: { name: 'a' } },
      { logging: { output: [{ type: 'file', path: '/var/log/relayhub.log' }] }, core: undefined }
    );

    expect(merged).toEqual({
      logging: { level: 'info', output: [{ type: 'file', path: '/var/log/relayhub.log' }] },
      core: { name: 'a' },
    });
  });
});

describe('expandPath', () => {
  it('should expand the home directory', () => {
    expect(expandPath('~/.relayhub/config.yaml')).toBe(join(homedir(), '.relayhub/config.yaml'));
  });
});

describe('secrets', () => {
  it('should read secrets from the given environment', () => {
    expect(getSecret('RELAYHUB_ENCRYPTION_KEY', { RELAYHUB_ENCRYPTION_KEY: 'test-secret' })).toBe(
      'test-secret'
    );
    expect(getSecret('RELAYHUB_ENCRYPTION_KEY', { RELAYHUB_ENCRYPTION_KEY: '' })).toBeUndefined();
  });

  it('should throw for a missing required secret', () => {
    expect(() => requireSecret('RELAYHUB_AUDIT_SIGNING_KEY', {})).toThrow(
      'Required secret not set: RELAYHUB_AUDIT_SIGNING_KEY'
    );
  });
});
