import { describe, it, expect } from 'vitest';
import {
  sha256,
  hmacSha256,
  hmacSha1,
  secureCompare,
  randomHex,
  uuidv7,
  generateSecureToken,
  sanitizeForLogging,
} from './crypto.js';

describe('sha256', () => {
  it('should hash a string correctly', () => {
    expect(sha256('hello world')).toBe(
      'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9'
    );
  });

  it('should hash a buffer the same as the equivalent string', () => {
    expect(sha256(Buffer.from('hello world'))).toBe(sha256('hello world'));
  });
});

describe('hmacSha256', () => {
  it('should match the RFC 4231 test vector', () => {
    expect(hmacSha256('what do ya want for nothing?', 'Jefe')).toBe(
      '5bdcc146bf60754e6a042426089575c75a003f089d2739839dec58b964ec3843'
    );
  });

  it('should produce different signatures for different keys', () => {
    expect(hmacSha256('payload', 'key1')).not.toBe(hmacSha256('payload', 'key2'));
  });
});

describe('hmacSha1', () => {
  it('should match the RFC 2202 test vector', () => {
    expect(hmacSha1('what do ya want for nothing?', 'Jefe')).toBe(
      'effcdf6ae5eb2fa2d27416d5f184df9c259a7c79'
    );
  });
});

describe('secureCompare', () => {
  it('should return true for identical strings', () => {
    expect(secureCompare('signature', 'signature')).toBe(true);
  });

  it('should return false for different strings of equal length', () => {
    expect(secureCompare('abcdef', 'abcdeg')).toBe(false);
  });

  it('should return false for strings with different lengths', () => {
    expect(secureCompare('short', 'longer string')).toBe(false);
  });

  it('should compare buffers', () => {
    expect(secureCompare(Buffer.from('test'), Buffer.from('test'))).toBe(true);
    expect(secureCompare(Buffer.from('test1'), Buffer.from('test2'))).toBe(false);
  });

  it('should handle empty strings', () => {
    expect(secureCompare('', '')).toBe(true);
    expect(secureCompare('', 'x')).toBe(false);
  });
});

describe('randomHex', () => {
  it('should generate two hex chars per byte', () => {
    expect(randomHex(16)).toMatch(/^[a-f0-9]{32}$/);
  });

  it('should generate different values each time', () => {
    expect(randomHex(16)).not.toBe(randomHex(16));
  });
});

describe('uuidv7', () => {
  it('should generate a valid version 7 UUID', () => {
    expect(uuidv7()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('should generate unique UUIDs', () => {
    const uuids = new Set(Array.from({ length: 500 }, () => uuidv7()));
    expect(uuids.size).toBe(500);
  });
});

describe('generateSecureToken', () => {
  it('should generate a base64url-encoded token', () => {
    expect(generateSecureToken()).toMatch(/^[A-Za-z0-9_-]{43}$/);
  });

  it('should respect custom byte length', () => {
    expect(generateSecureToken(24)).toHaveLength(32);
  });
});

describe('sanitizeForLogging', () => {
  it('should return primitives as-is', () => {
    expect(sanitizeForLogging(null)).toBeNull();
    expect(sanitizeForLogging(undefined)).toBeUndefined();
    expect(sanitizeForLogging(42)).toBe(42);
  });

  it('should redact Bearer tokens', () => {
    expect(sanitizeForLogging('Authorization: Bearer abc.def-ghi')).toBe(
      'Authorization: Bearer [REDACTED_TOKEN]'
    );
  });

  it('should redact passwords', () => {
    expect(sanitizeForLogging('password: hunter2')).toBe('[REDACTED_PASSWORD]');
  });

  it('should redact sensitive object keys', () => {
    const result = sanitizeForLogging({
      shopDomain: 'demo.example.com',
      accessToken: 'test-token',
      client_secret: 'test-secret',
    });
    expect(result).toEqual({
      shopDomain: 'demo.example.com',
      accessToken: '[REDACTED]',
      client_secret: '[REDACTED]',
    });
  });

  it('should handle nested objects and arrays', () => {
    const result = sanitizeForLogging({
      request: { headers: [{ authorization: 'x' }], path: '/orders' },
    });
    expect(result).toEqual({
      request: { headers: [{ authorization: '[REDACTED]' }], path: '/orders' },
    });
  });

  it('should reduce errors to name and message', () => {
    expect(sanitizeForLogging(new TypeError('fetch failed'))).toEqual({
      name: 'TypeError',
      message: 'fetch failed',
    });
  });

  it('should not modify non-sensitive strings', () => {
    const input = 'Order 1024 shipped';
    expect(sanitizeForLogging(input)).toBe(input);
  });
});
