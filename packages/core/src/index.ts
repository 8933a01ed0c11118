/**
 * @relayhub/core
 *
 * Dispatch and security core shared by every platform adapter: rate
 * admission, retrying requests, concurrent fan-out, credential encryption,
 * webhook verification and a signed audit trail.
 */

// Main entry point
export {
  Relayhub,
  createRelayhub,
  type RelayhubOptions,
  type RelayhubState,
} from './relayhub.js';

export { VERSION } from './version.js';

// Configuration
export {
  loadConfig,
  mergeConfigs,
  expandPath,
  getSecret,
  requireSecret,
  type LoadConfigOptions,
} from './config/loader.js';

// Logging
export {
  createLogger,
  createNoopLogger,
  redactPaths,
  wrapPino,
  type CreateLoggerOptions,
  type SecureLogger,
  type LogContext,
  type LogLevel,
} from './logging/logger.js';

export {
  AuditLog,
  InMemoryAuditStorage,
  computeEntryHash,
  GENESIS_HASH,
  type AuditLogStorage,
  type AuditLogConfig,
  type AuditRecordInput,
  type AuditStorageQuery,
  type RetentionPolicy,
  type VerificationResult,
} from './logging/audit-log.js';

export { SQLiteAuditStorage } from './logging/sqlite-storage.js';
export { redactPayload, isSensitiveKey } from './logging/redaction.js';

// Security
export {
  RateWindow,
  BurstCounter,
  ChatRateLimiter,
  PlatformRateLimiter,
  type Clock,
  type ChatRateLimiterOptions,
  type PlatformRateLimiterOptions,
  type AwaitAdmissionOptions,
} from './security/rate-limiter.js';

export {
  CredentialVault,
  type CredentialSource,
  type CredentialVaultConfig,
} from './security/credential-vault.js';

export {
  InMemoryCredentialStorage,
  SQLiteCredentialStorage,
  type CredentialRecord,
  type CredentialStorage,
} from './security/credential-storage.js';

export {
  encryptCredentials,
  decryptCredentials,
  generateMasterKey,
} from './security/secrets.js';

export {
  WebhookVerifier,
  verifySignature,
  checkTimestamp,
  type TimestampCheck,
  type WebhookRequest,
  type WebhookVerificationPolicy,
  type WebhookVerifierConfig,
} from './security/webhook-verifier.js';

// Integrations
export {
  BasePlatformAdapter,
  platformIdFor,
  type AdapterContext,
  type AdapterFactory,
  type ConnectionTestResult,
  type InboundWebhook,
  type MessageFields,
} from './integrations/adapter.js';

export { MessagingAdapter } from './integrations/messaging-adapter.js';

export {
  Orchestrator,
  type OrchestratorDeps,
  type ConnectOptions,
  type PlatformOperation,
  type WebhookDelivery,
  type WebhookHandlingResult,
  type DispatchStatistics,
} from './integrations/orchestrator.js';

export {
  PlatformCatalog,
  resolveBaseUrl,
  buildAuthHeaders,
  resolvePlatformSettings,
  type PlatformSettings,
} from './integrations/platform-catalog.js';

export {
  RetryingRequestExecutor,
  parseRetryAfter,
  type RequestExecutorConfig,
  type ExecuteOptions,
  type RequestTarget,
  type Sleep,
} from './integrations/request-executor.js';

// Storage
export { openDatabase, SqliteBaseStorage, type SqliteStorageOptions } from './storage/sqlite-base.js';

// Errors and utilities
export {
  IntegrationError,
  RateLimitedError,
  AuthenticationFailedError,
  TransientNetworkError,
  FatalClientError,
  ConfigurationError,
  CredentialDecryptionError,
  isIntegrationError,
  errorKindOf,
  classifyStatus,
  errorKindForStatus,
  toErrorMessage,
  type StatusClass,
} from './utils/errors.js';

export {
  sha256,
  hmacSha256,
  secureCompare,
  uuidv7,
  generateSecureToken,
  sanitizeForLogging,
} from './utils/crypto.js';
