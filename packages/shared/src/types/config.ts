/**
 * Configuration Types for Relayhub
 *
 * Security considerations:
 * - Secret values are never stored in config, only references (env vars)
 * - All paths are validated to prevent path traversal
 * - Timeouts and limits have maximum bounds
 */

import { z } from 'zod';

// Safe path validation (no path traversal)
const SafePathSchema = z
  .string()
  .min(1)
  .max(4096)
  .refine((path) => !path.includes('..') && !path.includes('\0'), {
    message: 'Path contains forbidden characters',
  });

// Environment variable reference (for secrets)
const EnvVarRefSchema = z
  .string()
  .regex(/^[A-Z][A-Z0-9_]*$/, 'Must be a valid environment variable name');

// Core configuration
export const CoreConfigSchema = z.object({
  name: z.string().default('Relayhub'),
  environment: z.enum(['development', 'staging', 'production']).default('development'),
});

export type CoreConfig = z.infer<typeof CoreConfigSchema>;

// ─── Rate tiers ──────────────────────────────────────────────

export const RateTierConfigSchema = z.object({
  requestsPerMinute: z.number().int().positive().max(1_000_000).default(60),
  requestsPerHour: z.number().int().positive().max(10_000_000).default(3600),
  burstSize: z.number().int().positive().max(100_000).default(10),
  burstIntervalMs: z.number().int().positive().max(3_600_000).default(60_000),
  /** Messaging platforms only */
  messagesPerSecond: z.number().int().positive().max(10_000).optional(),
  /** Messaging platforms only: messages per chat per second */
  perChatLimit: z.number().int().positive().max(1000).optional(),
  chatIdleEvictionMs: z.number().int().positive().max(86_400_000).default(600_000),
  pollIntervalMs: z.number().int().positive().max(10_000).default(100),
  /** Ceiling for a single wait on admission; undefined waits until aborted */
  admissionTimeoutMs: z.number().int().positive().max(3_600_000).optional(),
});

export type RateTierConfig = z.infer<typeof RateTierConfigSchema>;

// ─── Retry ───────────────────────────────────────────────────

export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).max(10).default(3),
  baseDelayMs: z.number().int().min(0).max(60_000).default(1000),
  timeoutMs: z.number().int().positive().max(300_000).default(30_000),
  deadlineMs: z.number().int().positive().max(3_600_000).optional(),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

// ─── Webhooks ────────────────────────────────────────────────

export const WebhookConfigSchema = z.object({
  verify: z.boolean().default(true),
  maxTimestampDriftMs: z.number().int().positive().max(3_600_000).default(300_000),
});

export type WebhookConfig = z.infer<typeof WebhookConfigSchema>;

export const PlatformOverrideSchema = z.object({
  rateLimit: RateTierConfigSchema.partial().default({}),
  retry: RetryConfigSchema.partial().default({}),
  webhook: WebhookConfigSchema.partial().default({}),
});

export type PlatformOverride = z.infer<typeof PlatformOverrideSchema>;

// ─── Security ────────────────────────────────────────────────

const VaultConfigSchema = z
  .object({
    keyEnv: EnvVarRefSchema.default('RELAYHUB_ENCRYPTION_KEY'),
  })
  .default({});

const AuditConfigSchema = z
  .object({
    signingKeyEnv: EnvVarRefSchema.default('RELAYHUB_AUDIT_SIGNING_KEY'),
    retentionDays: z.number().int().min(1).default(90),
    maxEntries: z.number().int().min(1000).default(1_000_000),
    defaultQueryLimit: z.number().int().positive().max(10_000).default(100),
  })
  .default({});

export const SecurityConfigSchema = z.object({
  vault: VaultConfigSchema,
  audit: AuditConfigSchema,
});

export type SecurityConfig = z.infer<typeof SecurityConfigSchema>;

// ─── Logging ─────────────────────────────────────────────────

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),

  output: z
    .array(
      z.discriminatedUnion('type', [
        z.object({
          type: z.literal('file'),
          path: SafePathSchema,
        }),
        z.object({
          type: z.literal('stdout'),
          format: z.enum(['json', 'pretty']).default('json'),
        }),
      ])
    )
    .default([{ type: 'stdout', format: 'json' }]),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ─── Storage ─────────────────────────────────────────────────

export const StorageConfigSchema = z.object({
  dbPath: z.union([z.literal(':memory:'), SafePathSchema]).default('~/.relayhub/data/relayhub.db'),
});

export type StorageConfig = z.infer<typeof StorageConfigSchema>;

// ─── Root ────────────────────────────────────────────────────

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  core: CoreConfigSchema.default({}),
  security: SecurityConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  defaults: z
    .object({
      rateLimit: RateTierConfigSchema.default({}),
      retry: RetryConfigSchema.default({}),
      webhook: WebhookConfigSchema.default({}),
    })
    .default({}),
  platforms: z.record(z.string(), PlatformOverrideSchema).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

// Partial config for merging
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
