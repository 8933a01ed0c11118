/**
 * Security Types for Relayhub
 *
 * Webhook signature schemes, credential metadata and the audit entry.
 */

import { z } from 'zod';
import { PlatformSchema } from './integration.js';

// ─── Webhook signature schemes ───────────────────────────────

export const SignatureSchemeSchema = z.discriminatedUnion('type', [
  /** HMAC-SHA256 hex digest of the raw body, behind a prefix such as "sha256=" */
  z.object({ type: z.literal('hmac-sha256-prefixed'), prefix: z.string().min(1) }),
  /** HMAC-SHA256 hex digest of the raw body, no prefix */
  z.object({ type: z.literal('hmac-sha256') }),
  /** HMAC-SHA1 hex digest behind a prefix (legacy hub signatures) */
  z.object({ type: z.literal('hmac-sha1-prefixed'), prefix: z.string().min(1) }),
  /** The header carries the shared secret itself */
  z.object({ type: z.literal('static-token') }),
  /** No secret configured; accepted only when explicitly chosen */
  z.object({ type: z.literal('unsigned') }),
]);
export type SignatureScheme = z.infer<typeof SignatureSchemeSchema>;

// ─── Credentials ─────────────────────────────────────────────

export const CredentialMapSchema = z.record(z.string(), z.string());
export type CredentialMap = z.infer<typeof CredentialMapSchema>;

export const CredentialMetadataSchema = z.object({
  platform: PlatformSchema,
  principalId: z.string().min(1),
  createdAt: z.number().int().nonnegative(),
  updatedAt: z.number().int().nonnegative(),
  expiresAt: z.number().int().nonnegative().optional(),
  isActive: z.boolean(),
});
export type CredentialMetadata = z.infer<typeof CredentialMetadataSchema>;

// ─── Audit ───────────────────────────────────────────────────

export const AuditActionSchema = z.enum([
  'credential_stored',
  'credential_rotated',
  'credential_accessed',
  'credential_missing',
  'credential_deactivated',
  'credential_deleted',
  'api_call',
  'api_call_failed',
  'webhook_received',
  'webhook_rejected',
  'webhook_unsigned_accepted',
  'webhook_processing_failed',
  'platform_connected',
  'platform_disconnected',
  'connection_failed',
  'dispatch_failed',
]);
export type AuditAction = z.infer<typeof AuditActionSchema>;

export const AuditEntrySchema = z.object({
  id: z.string().uuid(),
  platform: z.string().min(1),
  principalId: z.string(),
  action: AuditActionSchema,
  resource: z.string(),
  method: z.string(),
  statusCode: z.number().int().nonnegative(),

  // Sanitized payloads (no secrets)
  requestData: z.record(z.string(), z.unknown()).optional(),
  responseData: z.record(z.string(), z.unknown()).optional(),

  ipAddress: z.string().optional(),
  userAgent: z.string().optional(),
  timestamp: z.number().int().positive(),
  durationMs: z.number().nonnegative().optional(),
  error: z.string().optional(),

  // Chain integrity
  integrity: z.object({
    version: z.string(),
    signature: z.string().length(64), // HMAC-SHA256 hex
    previousEntryHash: z.string().length(64), // SHA-256 hex
  }),
});
export type AuditEntry = z.infer<typeof AuditEntrySchema>;

export const AuditQuerySchema = z.object({
  platform: z.string().optional(),
  principalId: z.string().optional(),
  action: AuditActionSchema.optional(),
  limit: z.number().int().positive().max(10_000).optional(),
});
export type AuditQuery = z.infer<typeof AuditQuerySchema>;
