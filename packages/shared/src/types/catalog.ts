/**
 * Platform Catalog Types for Relayhub
 *
 * Static facts about each supported platform: where its API lives, how it
 * authenticates, its default rate tiers and how its webhooks are signed.
 */

import { z } from 'zod';
import { PlatformSchema, PlatformCategorySchema } from './integration.js';
import { SignatureSchemeSchema } from './security.js';
import { RateTierConfigSchema } from './config.js';

export const AuthHeaderSchema = z.object({
  name: z.string().min(1),
  /** Credential field whose value fills the header */
  field: z.string().min(1),
  prefix: z.string().default(''),
});
export type AuthHeader = z.infer<typeof AuthHeaderSchema>;

export const AuthStrategySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('headers'), headers: z.array(AuthHeaderSchema).min(1) }),
  z.object({
    type: z.literal('basic'),
    usernameField: z.string().min(1),
    passwordField: z.string().min(1),
  }),
  /** Credentials travel in the URL (bot tokens, inbound webhook URLs) */
  z.object({ type: z.literal('none') }),
]);
export type AuthStrategy = z.infer<typeof AuthStrategySchema>;

export const WebhookDescriptorSchema = z.object({
  scheme: SignatureSchemeSchema,
  /** Header carrying the signature or static token */
  signatureHeader: z.string().optional(),
  /** Credential field holding the webhook secret */
  secretField: z.string().optional(),
  /** Header carrying the delivery timestamp, for replay checks */
  timestampHeader: z.string().optional(),
});
export type WebhookDescriptor = z.infer<typeof WebhookDescriptorSchema>;

export const MessagingLimitsSchema = z.object({
  maxTextLength: z.number().int().positive(),
  supportsAttachments: z.boolean(),
});
export type MessagingLimits = z.infer<typeof MessagingLimitsSchema>;

export const PlatformDescriptorSchema = z.object({
  platform: PlatformSchema,
  displayName: z.string().min(1),
  category: PlatformCategorySchema,
  /** May reference credential fields as `{field}` */
  baseUrl: z.string().min(1),
  auth: AuthStrategySchema,
  requiredCredentials: z.array(z.string().min(1)),
  rateLimit: RateTierConfigSchema.partial().default({}),
  webhook: WebhookDescriptorSchema,
  messaging: MessagingLimitsSchema.optional(),
});
export type PlatformDescriptor = z.infer<typeof PlatformDescriptorSchema>;
export type PlatformDescriptorInput = z.input<typeof PlatformDescriptorSchema>;

export const PlatformCatalogSchema = z.object({
  platforms: z.array(PlatformDescriptorSchema),
});
export type PlatformCatalogData = z.infer<typeof PlatformCatalogSchema>;
