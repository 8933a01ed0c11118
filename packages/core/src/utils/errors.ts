/**
 * Error taxonomy shared by every adapter.
 *
 * Each class carries a `kind` so results and audit entries can report the
 * failure class without instanceof checks across package boundaries.
 */

import type { ErrorKind } from '@relayhub/shared';

/**
 * Extracts a readable message from an unknown error value.
 */
export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

export abstract class IntegrationError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    public readonly platform?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Admission denied locally, or the platform answered 429. */
export class RateLimitedError extends IntegrationError {
  readonly kind = 'rate_limited' as const;
  readonly retryable = true;

  constructor(
    message: string,
    platform?: string,
    public readonly retryAfterMs?: number
  ) {
    super(message, platform);
  }
}

/** Bad credentials or a failed webhook signature. Never retried. */
export class AuthenticationFailedError extends IntegrationError {
  readonly kind = 'authentication_failed' as const;
  readonly retryable = false;
}

/** Timeout, connection reset, or a 5xx answer. */
export class TransientNetworkError extends IntegrationError {
  readonly kind = 'transient_network' as const;
  readonly retryable = true;

  constructor(
    message: string,
    platform?: string,
    public readonly statusCode = 0,
    options?: { cause?: unknown }
  ) {
    super(message, platform, options);
  }
}

/** A 4xx answer other than 429. */
export class FatalClientError extends IntegrationError {
  readonly kind = 'fatal_client' as const;
  readonly retryable = false;

  constructor(
    message: string,
    platform: string | undefined,
    public readonly statusCode: number
  ) {
    super(message, platform);
  }
}

/** Missing credentials, unknown platform, zero adapters. Raised before any network attempt. */
export class ConfigurationError extends IntegrationError {
  readonly kind = 'configuration' as const;
  readonly retryable = false;
}

/** Stored ciphertext failed authentication or did not parse. */
export class CredentialDecryptionError extends IntegrationError {
  readonly kind = 'credential_decryption' as const;
  readonly retryable = false;
}

export function isIntegrationError(err: unknown): err is IntegrationError {
  return err instanceof IntegrationError;
}

/**
 * Error kind for an unknown thrown value. Plain errors are treated as
 * transient network failures: that is what fetch rejects with.
 */
export function errorKindOf(err: unknown): ErrorKind {
  return isIntegrationError(err) ? err.kind : 'transient_network';
}

export type StatusClass = 'success' | 'retry' | 'fatal';

/**
 * Classify an HTTP status: 2xx/3xx succeed, 429 and 5xx are retried,
 * any other 4xx is fatal.
 */
export function classifyStatus(status: number): StatusClass {
  if (status === 429 || status >= 500) return 'retry';
  if (status >= 400) return 'fatal';
  return 'success';
}

/** Error kind for a failed HTTP status. */
export function errorKindForStatus(status: number): ErrorKind {
  if (status === 429) return 'rate_limited';
  if (status === 401 || status === 403) return 'authentication_failed';
  if (status >= 500) return 'transient_network';
  return 'fatal_client';
}
