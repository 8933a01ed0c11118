/**
 * Audit payload redaction.
 *
 * Values stored under sensitive-looking keys keep only their last four
 * characters so operators can still tell two credentials apart.
 */

const SENSITIVE_KEY_FRAGMENTS = [
  'password',
  'token',
  'secret',
  'key',
  'auth',
  'credential',
  'private',
];

const MASK = '***';

export function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEY_FRAGMENTS.some((fragment) => lower.includes(fragment));
}

/** `***` plus the last four characters, or bare `***` for short or non-string values. */
export function maskValue(value: unknown): string {
  if (typeof value === 'string' && value.length > 4) {
    return `${MASK}${value.slice(-4)}`;
  }
  return MASK;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-copy a payload with sensitive values masked. Arrays are walked for
 * nested objects; other values are kept as-is.
 */
export function redactPayload(data: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (isSensitiveKey(key)) {
      redacted[key] = maskValue(value);
    } else if (isPlainRecord(value)) {
      redacted[key] = redactPayload(value);
    } else if (Array.isArray(value)) {
      redacted[key] = value.map((item: unknown) => (isPlainRecord(item) ? redactPayload(item) : item));
    } else {
      redacted[key] = value;
    }
  }

  return redacted;
}
