/**
 * Cryptographic Utilities for Relayhub
 *
 * Security considerations:
 * - Uses Node.js built-in crypto module (FIPS-compliant)
 * - Constant-time comparison for signatures to prevent timing attacks
 * - Secure random generation for IDs and keys
 * - No custom crypto implementations
 */

import { createHash, createHmac, randomBytes, timingSafeEqual } from 'node:crypto';

/**
 * Generate a SHA-256 hash of the input
 * Used for hashing audit entries (not for passwords)
 */
export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Generate an HMAC-SHA256 signature
 * Used for webhook verification and audit chain integrity
 */
export function hmacSha256(data: string | Buffer, key: string | Buffer): string {
  return createHmac('sha256', key).update(data).digest('hex');
}

/**
 * Generate an HMAC-SHA1 signature (legacy webhook hubs only)
 */
export function hmacSha1(data: string | Buffer, key: string | Buffer): string {
  return createHmac('sha1', key).update(data).digest('hex');
}

/**
 * Constant-time comparison of two strings/buffers.
 *
 * Both sides are first reduced to SHA-256 digests, so the comparison always
 * runs over 32 bytes: neither the input lengths nor the position of the
 * first differing byte affect timing.
 */
export function secureCompare(a: string | Buffer, b: string | Buffer): boolean {
  const digestA = createHash('sha256').update(a).digest();
  const digestB = createHash('sha256').update(b).digest();
  return timingSafeEqual(digestA, digestB);
}

/**
 * Generate cryptographically secure random bytes as hex string
 */
export function randomHex(bytes: number): string {
  return randomBytes(bytes).toString('hex');
}

/**
 * Generate a UUID v7 (time-sortable)
 * Based on RFC 9562
 */
export function uuidv7(): string {
  const timestamp = Date.now();
  const random = randomBytes(10);

  // Timestamp in 48 bits (6 bytes)
  const timestampBytes = Buffer.alloc(6);
  timestampBytes.writeUIntBE(timestamp, 0, 6);

  const uuid = Buffer.alloc(16);
  timestampBytes.copy(uuid, 0);

  // version (4 bits) + rand_a (12 bits)
  uuid.writeUInt8(0x70 | (random.readUInt8(0) & 0x0f), 6); // Version 7
  uuid.writeUInt8(random.readUInt8(1), 7);

  // variant (2 bits) + rand_b (62 bits)
  uuid.writeUInt8(0x80 | (random.readUInt8(2) & 0x3f), 8); // Variant 10
  random.copy(uuid, 9, 3, 10);

  const hex = uuid.toString('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

/**
 * Generate a secure random token for webhook URLs and secrets
 */
export function generateSecureToken(bytes = 32): string {
  return randomBytes(bytes).toString('base64url');
}

const SECRET_STRING_PATTERNS: { regex: RegExp; replacement: string }[] = [
  // API keys
  { regex: /sk-[a-zA-Z0-9-_]{20,}/g, replacement: '[REDACTED_API_KEY]' },
  {
    regex: /api[_-]?key["\s:=]+["']?[a-zA-Z0-9-_]{16,}["']?/gi,
    replacement: '[REDACTED_API_KEY]',
  },
  // Tokens
  { regex: /bearer\s+[a-zA-Z0-9-_.]+/gi, replacement: 'Bearer [REDACTED_TOKEN]' },
  { regex: /token["\s:=]+["']?[a-zA-Z0-9-_.]{20,}["']?/gi, replacement: '[REDACTED_TOKEN]' },
  // Passwords
  { regex: /password["\s:=]+["']?[^"'\s]{1,}["']?/gi, replacement: '[REDACTED_PASSWORD]' },
  // Private keys
  {
    regex: /-----BEGIN[^-]+PRIVATE KEY-----[\s\S]*?-----END[^-]+PRIVATE KEY-----/g,
    replacement: '[REDACTED_PRIVATE_KEY]',
  },
];

const SENSITIVE_LOG_KEYS = [
  'password',
  'secret',
  'token',
  'key',
  'apikey',
  'api_key',
  'authorization',
  'auth',
  'credential',
];

/**
 * Sanitize a value for safe logging (remove potential secrets)
 */
export function sanitizeForLogging(input: unknown): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (typeof input === 'string') {
    let sanitized = input;
    for (const { regex, replacement } of SECRET_STRING_PATTERNS) {
      sanitized = sanitized.replace(regex, replacement);
    }
    return sanitized;
  }

  if (Array.isArray(input)) {
    return input.map(sanitizeForLogging);
  }

  if (input instanceof Error) {
    return { name: input.name, message: sanitizeForLogging(input.message) };
  }

  if (typeof input === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_LOG_KEYS.some((s) => lowerKey.includes(s))) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitizeForLogging(value);
      }
    }
    return sanitized;
  }

  return input;
}
