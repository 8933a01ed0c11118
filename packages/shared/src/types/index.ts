/**
 * Shared Types - Main Export
 *
 * Re-exports all shared types for convenient importing
 */

// Integration types
export {
  PlatformSchema,
  PlatformCategorySchema,
  ErrorKindSchema,
  HttpMethodSchema,
  ApiRequestSchema,
  ApiResponseSchema,
  RateLimitStatusSchema,
  AdapterHealthSchema,
  ConnectionResultSchema,
  PlatformStatusSchema,
  DispatchOutcomeSchema,
  DispatchResultSchema,
  MessageAttachmentSchema,
  UnifiedMessageSchema,
  OutboundMessageSchema,
  DeliveryResultSchema,
  MessageStatsSchema,
  type Platform,
  type PlatformCategory,
  type ErrorKind,
  type HttpMethod,
  type ApiRequest,
  type ApiResponse,
  type RateLimitStatus,
  type AdapterHealth,
  type ConnectionResult,
  type PlatformStatus,
  type DispatchOutcome,
  type DispatchResult,
  type MessageAttachment,
  type UnifiedMessage,
  type OutboundMessage,
  type OutboundMessageInput,
  type DeliveryResult,
  type MessageStats,
} from './integration.js';

// Security types
export {
  SignatureSchemeSchema,
  CredentialMapSchema,
  CredentialMetadataSchema,
  AuditActionSchema,
  AuditEntrySchema,
  AuditQuerySchema,
  type SignatureScheme,
  type CredentialMap,
  type CredentialMetadata,
  type AuditAction,
  type AuditEntry,
  type AuditQuery,
} from './security.js';

// Config types
export {
  CoreConfigSchema,
  RateTierConfigSchema,
  RetryConfigSchema,
  WebhookConfigSchema,
  PlatformOverrideSchema,
  SecurityConfigSchema,
  LoggingConfigSchema,
  StorageConfigSchema,
  ConfigSchema,
  PartialConfigSchema,
  type CoreConfig,
  type RateTierConfig,
  type RetryConfig,
  type WebhookConfig,
  type PlatformOverride,
  type SecurityConfig,
  type LoggingConfig,
  type StorageConfig,
  type Config,
  type PartialConfig,
} from './config.js';

// Platform catalog types
export {
  AuthHeaderSchema,
  AuthStrategySchema,
  WebhookDescriptorSchema,
  MessagingLimitsSchema,
  PlatformDescriptorSchema,
  PlatformCatalogSchema,
  type AuthHeader,
  type AuthStrategy,
  type WebhookDescriptor,
  type MessagingLimits,
  type PlatformDescriptor,
  type PlatformDescriptorInput,
  type PlatformCatalogData,
} from './catalog.js';
