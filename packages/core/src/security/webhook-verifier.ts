/**
 * Webhook Signature Verification
 *
 * Security considerations:
 * - Comparison runs over fixed-length digests (see secureCompare), so the
 *   header length and the first mismatching byte do not affect timing
 * - Malformed headers are rejected by explicit checks, never by catch-all
 * - `unsigned` is accepted only when no secret is configured, and audited
 * - A failed check throws before the payload reaches extraction
 */

import type { SignatureScheme } from '@relayhub/shared';
import { hmacSha1, hmacSha256, secureCompare } from '../utils/crypto.js';
import { AuthenticationFailedError } from '../utils/errors.js';
import { createNoopLogger, type SecureLogger } from '../logging/logger.js';
import type { AuditLog } from '../logging/audit-log.js';

const SHA256_HEX = /^[0-9a-f]{64}$/i;
const SHA1_HEX = /^[0-9a-f]{40}$/i;
const DIGITS = /^\d{1,16}$/;

/** Values below this are Unix seconds, above it milliseconds. */
const SECONDS_THRESHOLD = 100_000_000_000;

/**
 * Check a webhook signature header against the raw request body.
 * Returns false for any malformed input.
 */
export function verifySignature(
  scheme: SignatureScheme,
  rawBody: Buffer | string,
  signatureHeader: string | undefined,
  secret: string | undefined
): boolean {
  if (scheme.type === 'unsigned') {
    return !secret;
  }
  if (!secret || !signatureHeader) {
    return false;
  }

  const header = signatureHeader.trim();

  switch (scheme.type) {
    case 'static-token':
      return secureCompare(header, secret);

    case 'hmac-sha256':
      return SHA256_HEX.test(header) && secureCompare(header.toLowerCase(), hmacSha256(rawBody, secret));

    case 'hmac-sha256-prefixed': {
      if (!header.startsWith(scheme.prefix)) return false;
      const digest = header.slice(scheme.prefix.length);
      return SHA256_HEX.test(digest) && secureCompare(digest.toLowerCase(), hmacSha256(rawBody, secret));
    }

    case 'hmac-sha1-prefixed': {
      if (!header.startsWith(scheme.prefix)) return false;
      const digest = header.slice(scheme.prefix.length);
      return SHA1_HEX.test(digest) && secureCompare(digest.toLowerCase(), hmacSha1(rawBody, secret));
    }
  }
}

export type TimestampCheck =
  | { outcome: 'ok'; timestampMs: number }
  | { outcome: 'unparseable' }
  | { outcome: 'out_of_range'; timestampMs: number; driftMs: number };

/**
 * Validate a delivery timestamp header (Unix seconds or milliseconds).
 */
export function checkTimestamp(
  header: string | undefined,
  now: number,
  maxDriftMs: number
): TimestampCheck {
  const value = header?.trim() ?? '';
  if (!DIGITS.test(value)) {
    return { outcome: 'unparseable' };
  }

  const parsed = Number(value);
  const timestampMs = parsed < SECONDS_THRESHOLD ? parsed * 1000 : parsed;
  const driftMs = Math.abs(now - timestampMs);

  return driftMs <= maxDriftMs
    ? { outcome: 'ok', timestampMs }
    : { outcome: 'out_of_range', timestampMs, driftMs };
}

export interface WebhookRequest {
  platform: string;
  principalId: string;
  rawBody: Buffer | string;
  signatureHeader?: string;
  /** Value of the platform's timestamp header, when it sends one */
  timestampHeader?: string;
  ipAddress?: string;
  userAgent?: string;
}

export interface WebhookVerificationPolicy {
  scheme: SignatureScheme;
  secret?: string;
  /** false skips verification; every such delivery is audited as unsigned */
  enabled?: boolean;
  /** When set, a timestamp header within this drift is required */
  maxTimestampDriftMs?: number;
}

export interface WebhookVerifierConfig {
  auditLog: AuditLog;
  logger?: SecureLogger;
  now?: () => number;
}

type RejectionReason = 'invalid_signature' | 'timestamp_unparseable' | 'timestamp_out_of_range';

export class WebhookVerifier {
  private readonly auditLog: AuditLog;
  private readonly logger: SecureLogger;
  private readonly now: () => number;

  constructor(config: WebhookVerifierConfig) {
    this.auditLog = config.auditLog;
    this.logger = (config.logger ?? createNoopLogger()).child({ component: 'WebhookVerifier' });
    this.now = config.now ?? (() => Date.now());
  }

  /**
   * @throws AuthenticationFailedError when the delivery must be rejected
   */
  async verify(request: WebhookRequest, policy: WebhookVerificationPolicy): Promise<void> {
    const unsigned = policy.enabled === false || policy.scheme.type === 'unsigned';

    if (unsigned) {
      if (policy.enabled === false || verifySignature(policy.scheme, request.rawBody, undefined, policy.secret)) {
        this.logger.warn('Accepting unsigned webhook', {
          platform: request.platform,
          principalId: request.principalId,
        });
        await this.audit(request, 'webhook_unsigned_accepted', 200, {
          reason: policy.enabled === false ? 'verification_disabled' : 'no_secret_configured',
        });
        return;
      }
      await this.reject(request, 'invalid_signature');
    }

    if (!verifySignature(policy.scheme, request.rawBody, request.signatureHeader, policy.secret)) {
      await this.reject(request, 'invalid_signature');
    }

    if (policy.maxTimestampDriftMs !== undefined) {
      const check = checkTimestamp(request.timestampHeader, this.now(), policy.maxTimestampDriftMs);
      if (check.outcome === 'unparseable') {
        await this.reject(request, 'timestamp_unparseable');
      } else if (check.outcome === 'out_of_range') {
        await this.reject(request, 'timestamp_out_of_range', { driftMs: check.driftMs });
      }
    }
  }

  private async reject(
    request: WebhookRequest,
    reason: RejectionReason,
    details: Record<string, unknown> = {}
  ): Promise<never> {
    this.logger.warn('Webhook rejected', {
      platform: request.platform,
      principalId: request.principalId,
      reason,
    });
    await this.audit(request, 'webhook_rejected', 401, { reason, ...details });
    throw new AuthenticationFailedError(`Webhook rejected: ${reason}`, request.platform);
  }

  private async audit(
    request: WebhookRequest,
    action: 'webhook_rejected' | 'webhook_unsigned_accepted',
    statusCode: number,
    requestData: Record<string, unknown>
  ): Promise<void> {
    await this.auditLog.record({
      platform: request.platform,
      principalId: request.principalId,
      action,
      resource: 'webhook',
      method: 'POST',
      statusCode,
      requestData: { ...requestData, payloadSize: Buffer.byteLength(request.rawBody) },
      ipAddress: request.ipAddress,
      userAgent: request.userAgent,
    });
  }
}
