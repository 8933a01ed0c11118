/**
 * MessagingAdapter - base for chat platforms (Telegram, WhatsApp, Viber, VK).
 *
 * Adds outbound message validation against the platform's limits, the
 * per-chat rate limit, and delivery statistics.
 */

import {
  OutboundMessageSchema,
  type ApiResponse,
  type DeliveryResult,
  type MessageStats,
  type MessagingLimits,
  type OutboundMessage,
  type OutboundMessageInput,
  type UnifiedMessage,
} from '@relayhub/shared';
import { BasePlatformAdapter, type InboundWebhook } from './adapter.js';
import type { ExecuteOptions } from './request-executor.js';

const DEFAULT_LIMITS: MessagingLimits = { maxTextLength: 4096, supportsAttachments: false };

export abstract class MessagingAdapter extends BasePlatformAdapter {
  private totalSent = 0;
  private totalReceived = 0;
  private totalFailed = 0;
  private avgDeliveryTimeMs = 0;
  private rateLimitHits = 0;

  get limits(): MessagingLimits {
    return this.descriptor.messaging ?? DEFAULT_LIMITS;
  }

  /**
   * Deliver the message through the platform API. Implementations pass
   * `options` on to request() so the per-chat limit applies.
   */
  protected abstract sendPlatformMessage(
    chatId: string,
    message: OutboundMessage,
    options: ExecuteOptions
  ): Promise<ApiResponse>;

  /** Platform message id from a successful send response. */
  protected messageIdFrom(_data: unknown): string | undefined {
    return undefined;
  }

  async sendMessage(
    chatId: string,
    input: OutboundMessageInput,
    signal?: AbortSignal
  ): Promise<DeliveryResult> {
    const message = OutboundMessageSchema.parse(input);

    const invalid = this.validateOutgoing(message);
    if (invalid) {
      this.totalFailed++;
      this.logger.warn('Outbound message rejected', { chatId, reason: invalid });
      return { success: false, status: 'failed', error: invalid, errorKind: 'fatal_client' };
    }

    if (this.rateLimiter.msUntilAdmission(chatId) > 0) {
      this.rateLimitHits++;
    }

    const startedAt = this.now();
    const response = await this.sendPlatformMessage(chatId, message, { chatId, signal });
    const deliveryTimeMs = this.now() - startedAt;

    if (!response.success) {
      this.totalFailed++;
      const result: DeliveryResult = { success: false, status: 'failed' };
      if (response.error !== undefined) result.error = response.error;
      if (response.errorKind !== undefined) result.errorKind = response.errorKind;
      return result;
    }

    this.totalSent++;
    this.avgDeliveryTimeMs =
      (this.avgDeliveryTimeMs * (this.totalSent - 1) + deliveryTimeMs) / this.totalSent;

    const result: DeliveryResult = { success: true, status: 'sent', sentAt: this.now() };
    const platformMessageId = this.messageIdFrom(response.data);
    if (platformMessageId !== undefined) result.platformMessageId = platformMessageId;
    return result;
  }

  async handleWebhook(webhook: InboundWebhook): Promise<UnifiedMessage[]> {
    const messages = await super.handleWebhook(webhook);
    this.totalReceived += messages.length;
    return messages;
  }

  getMessageStats(): MessageStats {
    const attempts = this.totalSent + this.totalFailed;
    return {
      platform: this.platform,
      totalSent: this.totalSent,
      totalReceived: this.totalReceived,
      totalFailed: this.totalFailed,
      avgDeliveryTimeMs: this.avgDeliveryTimeMs,
      successRate: attempts > 0 ? (this.totalSent / attempts) * 100 : 100,
      rateLimitHits: this.rateLimitHits,
    };
  }

  private validateOutgoing(message: OutboundMessage): string | undefined {
    const { maxTextLength, supportsAttachments } = this.limits;

    if (message.text === '' && message.attachments.length === 0) {
      return 'Message has neither text nor attachments';
    }
    if (message.text.length > maxTextLength) {
      return `Message text exceeds ${this.descriptor.displayName} limit of ${maxTextLength} characters`;
    }
    if (message.attachments.length > 0 && !supportsAttachments) {
      return `${this.descriptor.displayName} adapter does not support attachments`;
    }
    return undefined;
  }
}
