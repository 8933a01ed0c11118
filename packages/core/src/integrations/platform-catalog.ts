/**
 * Platform Catalog - static knowledge about each supported platform.
 *
 * The bundled catalog lives in platform-catalog.json beside this module.
 * Deployments can register additional descriptors at runtime.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  PlatformCatalogSchema,
  PlatformDescriptorSchema,
  type Config,
  type CredentialMap,
  type PlatformDescriptor,
  type PlatformDescriptorInput,
  type RateTierConfig,
  type RetryConfig,
  type WebhookConfig,
} from '@relayhub/shared';
import { ConfigurationError } from '../utils/errors.js';

const BUNDLED_CATALOG_PATH = join(
  dirname(fileURLToPath(import.meta.url)),
  'platform-catalog.json'
);

const PLACEHOLDER_PATTERN = /\{([a-z0-9_]+)\}/gi;

export interface PlatformSettings {
  rateLimit: RateTierConfig;
  retry: RetryConfig;
  webhook: WebhookConfig;
}

export class PlatformCatalog {
  private readonly descriptors = new Map<string, PlatformDescriptor>();

  constructor(descriptors: PlatformDescriptor[] = []) {
    for (const descriptor of descriptors) {
      this.descriptors.set(descriptor.platform, descriptor);
    }
  }

  /**
   * Load and validate a catalog file.
   */
  static fromFile(path: string): PlatformCatalog {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    const result = PlatformCatalogSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid platform catalog ${path}: ${issues}`);
    }
    return new PlatformCatalog(result.data.platforms);
  }

  static bundled(): PlatformCatalog {
    return PlatformCatalog.fromFile(BUNDLED_CATALOG_PATH);
  }

  register(input: PlatformDescriptorInput): PlatformDescriptor {
    const descriptor = PlatformDescriptorSchema.parse(input);
    this.descriptors.set(descriptor.platform, descriptor);
    return descriptor;
  }

  has(platform: string): boolean {
    return this.descriptors.has(platform);
  }

  get(platform: string): PlatformDescriptor | undefined {
    return this.descriptors.get(platform);
  }

  require(platform: string): PlatformDescriptor {
    const descriptor = this.descriptors.get(platform);
    if (!descriptor) {
      throw new ConfigurationError(`Unsupported platform: ${platform}`, platform);
    }
    return descriptor;
  }

  list(): PlatformDescriptor[] {
    return [...this.descriptors.values()];
  }

  /**
   * Credential fields and header names that carry secrets on any platform.
   * Log redaction is built from this list.
   */
  sensitiveNames(): string[] {
    const names = new Set<string>();
    for (const descriptor of this.descriptors.values()) {
      for (const name of sensitiveNamesOf(descriptor)) names.add(name);
    }
    return [...names].sort();
  }

  /**
   * Required credential fields that are absent or blank.
   */
  missingCredentials(platform: string, credentials: CredentialMap): string[] {
    return this.require(platform).requiredCredentials.filter(
      (field) => !credentials[field]?.trim()
    );
  }
}

function sensitiveNamesOf(descriptor: PlatformDescriptor): string[] {
  const { auth, webhook } = descriptor;
  const names: string[] = [];

  switch (auth.type) {
    case 'headers':
      for (const header of auth.headers) names.push(header.field, header.name);
      break;
    case 'basic':
      names.push(auth.usernameField, auth.passwordField, 'Authorization');
      break;
    case 'none':
      // Credentials travel in the URL
      for (const [, field] of descriptor.baseUrl.matchAll(PLACEHOLDER_PATTERN)) {
        if (field) names.push(field);
      }
      break;
  }

  if (webhook.secretField) names.push(webhook.secretField);
  if (webhook.signatureHeader) names.push(webhook.signatureHeader);
  return names;
}

/**
 * Substitute `{field}` placeholders in a descriptor's base URL.
 */
export function resolveBaseUrl(descriptor: PlatformDescriptor, credentials: CredentialMap): string {
  const url = descriptor.baseUrl.replace(PLACEHOLDER_PATTERN, (_match, field: string) => {
    const value = credentials[field];
    if (!value) {
      throw new ConfigurationError(
        `Credential "${field}" is required to build the ${descriptor.displayName} API URL`,
        descriptor.platform
      );
    }
    return value;
  });
  return url.replace(/\/+$/, '');
}

/**
 * Authentication headers for a platform, built from its credentials.
 */
export function buildAuthHeaders(
  descriptor: PlatformDescriptor,
  credentials: CredentialMap
): Record<string, string> {
  const { auth } = descriptor;

  switch (auth.type) {
    case 'headers': {
      const headers: Record<string, string> = {};
      for (const header of auth.headers) {
        const value = credentials[header.field];
        if (value) {
          headers[header.name] = `${header.prefix}${value}`;
        }
      }
      return headers;
    }
    case 'basic': {
      const username = credentials[auth.usernameField] ?? '';
      const password = credentials[auth.passwordField] ?? '';
      const encoded = Buffer.from(`${username}:${password}`).toString('base64');
      return { Authorization: `Basic ${encoded}` };
    }
    case 'none':
      return {};
  }
}

/**
 * Effective settings for a platform: global defaults, then the catalog's
 * tiers, then per-platform overrides from config.
 */
export function resolvePlatformSettings(
  config: Pick<Config, 'defaults' | 'platforms'>,
  platform: string,
  descriptor?: PlatformDescriptor
): PlatformSettings {
  const override = config.platforms[platform];
  return {
    rateLimit: {
      ...config.defaults.rateLimit,
      ...descriptor?.rateLimit,
      ...override?.rateLimit,
    },
    retry: { ...config.defaults.retry, ...override?.retry },
    webhook: { ...config.defaults.webhook, ...override?.webhook },
  };
}
