/**
 * Integration Types for Relayhub
 *
 * Platform identity, outbound request/response contracts, fan-out results
 * and the unified message shape adapters extract from webhooks.
 */

import { z } from 'zod';

// ─── Platform ────────────────────────────────────────────────

export const PlatformSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[a-z0-9][a-z0-9_-]*$/, 'Platform names are lowercase slugs');
export type Platform = z.infer<typeof PlatformSchema>;

export const PlatformCategorySchema = z.enum(['marketplace', 'storefront', 'crm', 'messaging']);
export type PlatformCategory = z.infer<typeof PlatformCategorySchema>;

// ─── Errors ──────────────────────────────────────────────────

export const ErrorKindSchema = z.enum([
  'rate_limited',
  'authentication_failed',
  'transient_network',
  'fatal_client',
  'configuration',
  'credential_decryption',
]);
export type ErrorKind = z.infer<typeof ErrorKindSchema>;

// ─── Outbound API ────────────────────────────────────────────

export const HttpMethodSchema = z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']);
export type HttpMethod = z.infer<typeof HttpMethodSchema>;

export const ApiRequestSchema = z.object({
  method: HttpMethodSchema,
  /** Absolute, or relative to the adapter's base URL */
  url: z.string().min(1),
  headers: z.record(z.string(), z.string()).optional(),
  query: z.record(z.string(), z.string()).optional(),
  json: z.unknown().optional(),
  /** Audit resource label; defaults to the URL path */
  resource: z.string().optional(),
});
export type ApiRequest = z.infer<typeof ApiRequestSchema>;

export const ApiResponseSchema = z.object({
  platform: PlatformSchema,
  success: z.boolean(),
  data: z.unknown(),
  error: z.string().optional(),
  errorKind: ErrorKindSchema.optional(),
  /** 0 when no HTTP response was received */
  statusCode: z.number().int().nonnegative(),
  attempts: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative(),
  retryAfterMs: z.number().int().nonnegative().optional(),
});
export type ApiResponse = z.infer<typeof ApiResponseSchema>;

// ─── Rate status / health ────────────────────────────────────

export const RateLimitStatusSchema = z.object({
  requestsInLastMinute: z.number().int().nonnegative(),
  requestsInLastHour: z.number().int().nonnegative(),
  requestsInLastSecond: z.number().int().nonnegative().optional(),
  burstCount: z.number().int().nonnegative(),
  trackedChats: z.number().int().nonnegative().optional(),
  canMakeRequest: z.boolean(),
});
export type RateLimitStatus = z.infer<typeof RateLimitStatusSchema>;

export const AdapterHealthSchema = z.object({
  platform: PlatformSchema,
  healthy: z.boolean(),
  lastCheck: z.number().int().nonnegative(),
  latencyMs: z.number().nonnegative(),
  error: z.string().optional(),
  rateLimitStatus: RateLimitStatusSchema,
});
export type AdapterHealth = z.infer<typeof AdapterHealthSchema>;

// ─── Connections ─────────────────────────────────────────────

export const ConnectionResultSchema = z.object({
  platformId: z.string().min(1),
  success: z.boolean(),
  message: z.string(),
  /** Opaque token to embed in the platform's webhook URL */
  webhookToken: z.string().optional(),
});
export type ConnectionResult = z.infer<typeof ConnectionResultSchema>;

export const PlatformStatusSchema = z.object({
  status: z.enum(['active', 'not_found', 'error']),
  platform: PlatformSchema.optional(),
  health: AdapterHealthSchema.optional(),
  lastCheck: z.number().int().nonnegative(),
  error: z.string().optional(),
});
export type PlatformStatus = z.infer<typeof PlatformStatusSchema>;

// ─── Fan-out ─────────────────────────────────────────────────

export const DispatchOutcomeSchema = z.object({
  platformId: z.string(),
  platform: PlatformSchema,
  success: z.boolean(),
  durationMs: z.number().nonnegative(),
  data: z.unknown().optional(),
  error: z.string().optional(),
  errorKind: ErrorKindSchema.optional(),
});
export type DispatchOutcome = z.infer<typeof DispatchOutcomeSchema>;

export const DispatchResultSchema = z.object({
  principalId: z.string(),
  operation: z.string(),
  attempted: z.array(z.string()),
  succeeded: z.array(z.string()),
  failed: z.array(z.string()),
  errors: z.array(z.string()),
  outcomes: z.array(DispatchOutcomeSchema),
  startedAt: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative(),
});
export type DispatchResult = z.infer<typeof DispatchResultSchema>;

// ─── Messages ────────────────────────────────────────────────

export const MessageAttachmentSchema = z.object({
  type: z.enum(['image', 'audio', 'video', 'file', 'location']),
  url: z.string().optional(),
  mimeType: z.string().optional(),
  fileName: z.string().optional(),
  size: z.number().int().nonnegative().optional(),
});
export type MessageAttachment = z.infer<typeof MessageAttachmentSchema>;

export const UnifiedMessageSchema = z.object({
  id: z.string().min(1),
  platformId: z.string().min(1),
  platform: PlatformSchema,
  principalId: z.string().min(1),
  senderId: z.string().default(''),
  chatId: z.string().default(''),
  text: z.string().default(''),
  attachments: z.array(MessageAttachmentSchema).default([]),
  platformMessageId: z.string().optional(),
  metadata: z.record(z.string(), z.unknown()).default({}),
  timestamp: z.number().int().nonnegative(),
});
export type UnifiedMessage = z.infer<typeof UnifiedMessageSchema>;

export const OutboundMessageSchema = z.object({
  text: z.string().default(''),
  attachments: z.array(MessageAttachmentSchema).default([]),
  metadata: z.record(z.string(), z.unknown()).default({}),
});
export type OutboundMessage = z.infer<typeof OutboundMessageSchema>;
export type OutboundMessageInput = z.input<typeof OutboundMessageSchema>;

export const DeliveryResultSchema = z.object({
  success: z.boolean(),
  status: z.enum(['sent', 'failed']),
  platformMessageId: z.string().optional(),
  error: z.string().optional(),
  errorKind: ErrorKindSchema.optional(),
  sentAt: z.number().int().nonnegative().optional(),
});
export type DeliveryResult = z.infer<typeof DeliveryResultSchema>;

export const MessageStatsSchema = z.object({
  platform: PlatformSchema,
  totalSent: z.number().int().nonnegative(),
  totalReceived: z.number().int().nonnegative(),
  totalFailed: z.number().int().nonnegative(),
  avgDeliveryTimeMs: z.number().nonnegative(),
  successRate: z.number().min(0).max(100),
  rateLimitHits: z.number().int().nonnegative(),
});
export type MessageStats = z.infer<typeof MessageStatsSchema>;
