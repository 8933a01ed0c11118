/**
 * Rate Limiter for Relayhub
 *
 * Admission control for one adapter's outbound traffic:
 * - Sliding windows per second (messaging), minute and hour
 * - Burst counter reset by elapsed wall-clock time
 * - Optional per-chat sub-limiter with idle eviction
 *
 * Pure bookkeeping: no I/O, admission checks never throw.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { RateLimitStatus, RateTierConfig } from '@relayhub/shared';
import { RateLimitedError } from '../utils/errors.js';
import { createNoopLogger, type SecureLogger } from '../logging/logger.js';

const SECOND_MS = 1000;
const MINUTE_MS = 60_000;
const HOUR_MS = 3_600_000;

export type Clock = () => number;

const systemClock: Clock = () => Date.now();

/**
 * Timestamps of admitted requests within a trailing interval ending at now.
 */
export class RateWindow {
  private timestamps: number[] = [];

  constructor(
    readonly durationMs: number,
    readonly maxRequests: number
  ) {}

  /** Drop timestamps that fell out of the window. */
  prune(now: number): void {
    let expired = 0;
    while (expired < this.timestamps.length) {
      const ts = this.timestamps[expired];
      if (ts === undefined || now - ts < this.durationMs) break;
      expired++;
    }
    if (expired > 0) {
      this.timestamps = this.timestamps.slice(expired);
    }
  }

  count(now: number): number {
    this.prune(now);
    return this.timestamps.length;
  }

  hasCapacity(now: number): boolean {
    return this.count(now) < this.maxRequests;
  }

  add(now: number): void {
    this.timestamps.push(now);
  }

  /** Milliseconds until the oldest timestamp leaves the window (0 if there is room). */
  msUntilCapacity(now: number): number {
    if (this.hasCapacity(now)) return 0;
    const oldest = this.timestamps[0] ?? now;
    return Math.max(0, oldest + this.durationMs - now);
  }
}

/**
 * Counts requests since the last reset; resets lazily once the burst
 * interval has elapsed.
 */
export class BurstCounter {
  private count = 0;
  private resetAt: number;

  constructor(
    readonly burstSize: number,
    readonly intervalMs: number,
    now: number
  ) {
    this.resetAt = now;
  }

  private refresh(now: number): void {
    if (now - this.resetAt >= this.intervalMs) {
      this.count = 0;
      this.resetAt = now;
    }
  }

  current(now: number): number {
    this.refresh(now);
    return this.count;
  }

  hasCapacity(now: number): boolean {
    return this.current(now) < this.burstSize;
  }

  increment(now: number): void {
    this.refresh(now);
    this.count++;
  }

  /** Milliseconds until the counter resets (0 if there is room). */
  msUntilReset(now: number): number {
    if (this.hasCapacity(now)) return 0;
    return Math.max(0, this.resetAt + this.intervalMs - now);
  }
}

export interface ChatRateLimiterOptions {
  perChatLimit: number;
  windowMs?: number;
  /** Chats unseen for this long are forgotten */
  idleEvictionMs: number;
  now?: Clock;
}

interface ChatEntry {
  window: RateWindow;
  lastSeen: number;
}

/**
 * Per-conversation windows. The map keeps insertion order as LRU order
 * (entries are re-inserted on use), so eviction scans from the front and
 * stops at the first chat that is still live.
 */
export class ChatRateLimiter {
  private readonly chats = new Map<string, ChatEntry>();
  private readonly perChatLimit: number;
  private readonly windowMs: number;
  private readonly idleEvictionMs: number;
  private readonly now: Clock;

  constructor(options: ChatRateLimiterOptions) {
    this.perChatLimit = options.perChatLimit;
    this.windowMs = options.windowMs ?? SECOND_MS;
    this.idleEvictionMs = options.idleEvictionMs;
    this.now = options.now ?? systemClock;
  }

  admit(chatId: string): boolean {
    const now = this.now();
    this.evictIdle(now);
    const entry = this.chats.get(chatId);
    return entry ? entry.window.hasCapacity(now) : true;
  }

  record(chatId: string): void {
    const now = this.now();
    let entry = this.chats.get(chatId);
    if (entry) {
      this.chats.delete(chatId);
    } else {
      entry = { window: new RateWindow(this.windowMs, this.perChatLimit), lastSeen: now };
    }
    entry.window.add(now);
    entry.lastSeen = now;
    this.chats.set(chatId, entry);
  }

  msUntilCapacity(chatId: string): number {
    const entry = this.chats.get(chatId);
    return entry ? entry.window.msUntilCapacity(this.now()) : 0;
  }

  /** Forget chats idle for longer than the eviction interval. */
  evictIdle(now = this.now()): number {
    let evicted = 0;
    for (const [chatId, entry] of this.chats) {
      if (now - entry.lastSeen < this.idleEvictionMs) break;
      this.chats.delete(chatId);
      evicted++;
    }
    return evicted;
  }

  get size(): number {
    return this.chats.size;
  }
}

export type PlatformRateLimiterOptions = Pick<
  RateTierConfig,
  'requestsPerMinute' | 'requestsPerHour' | 'burstSize' | 'burstIntervalMs'
> &
  Partial<
    Pick<
      RateTierConfig,
      | 'messagesPerSecond'
      | 'perChatLimit'
      | 'chatIdleEvictionMs'
      | 'pollIntervalMs'
      | 'admissionTimeoutMs'
    >
  > & {
    platform?: string;
    now?: Clock;
    logger?: SecureLogger;
  };

export interface AwaitAdmissionOptions {
  chatId?: string;
  signal?: AbortSignal;
  /** Overrides the configured admission ceiling for this wait */
  timeoutMs?: number;
}

/**
 * Multi-window admission control for one adapter instance.
 *
 * A request is admitted only when every applicable window has room at the
 * same moment, so the tightest window dominates. `record()` must be called
 * exactly once per dispatched request.
 */
export class PlatformRateLimiter {
  private readonly minute: RateWindow;
  private readonly hour: RateWindow;
  private readonly second: RateWindow | null;
  private readonly burst: BurstCounter;
  private readonly chatLimiter: ChatRateLimiter | null;
  private readonly pollIntervalMs: number;
  private readonly admissionTimeoutMs: number | undefined;
  private readonly platform: string;
  private readonly now: Clock;
  private readonly logger: SecureLogger;

  private totalChecks = 0;
  private totalHits = 0;

  constructor(options: PlatformRateLimiterOptions) {
    this.now = options.now ?? systemClock;
    this.platform = options.platform ?? 'unknown';
    this.logger = (options.logger ?? createNoopLogger()).child({ component: 'RateLimiter' });

    this.minute = new RateWindow(MINUTE_MS, options.requestsPerMinute);
    this.hour = new RateWindow(HOUR_MS, options.requestsPerHour);
    this.second = options.messagesPerSecond
      ? new RateWindow(SECOND_MS, options.messagesPerSecond)
      : null;
    this.burst = new BurstCounter(options.burstSize, options.burstIntervalMs, this.now());
    this.chatLimiter = options.perChatLimit
      ? new ChatRateLimiter({
          perChatLimit: options.perChatLimit,
          idleEvictionMs: options.chatIdleEvictionMs ?? 600_000,
          now: this.now,
        })
      : null;
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
    this.admissionTimeoutMs = options.admissionTimeoutMs;
  }

  /**
   * Non-blocking check: true when every window has spare capacity.
   */
  admit(chatId?: string): boolean {
    const now = this.now();
    this.totalChecks++;

    const allowed =
      this.hour.hasCapacity(now) &&
      this.minute.hasCapacity(now) &&
      (this.second?.hasCapacity(now) ?? true) &&
      this.burst.hasCapacity(now) &&
      (chatId === undefined || this.chatLimiter === null || this.chatLimiter.admit(chatId));

    if (!allowed) {
      this.totalHits++;
    }
    return allowed;
  }

  /**
   * Count one dispatched request against every window.
   */
  record(chatId?: string): void {
    const now = this.now();
    this.hour.add(now);
    this.minute.add(now);
    this.second?.add(now);
    this.burst.increment(now);
    if (chatId !== undefined && this.chatLimiter) {
      this.chatLimiter.record(chatId);
    }
  }

  /**
   * Suspend until admit() would succeed, polling at a fixed interval.
   *
   * Rejects with RateLimitedError once the admission ceiling passes, and
   * with an AbortError when the signal fires.
   */
  async awaitAdmission(options: AwaitAdmissionOptions = {}): Promise<void> {
    const timeoutMs = options.timeoutMs ?? this.admissionTimeoutMs;
    const startedAt = this.now();
    let waited = false;

    for (;;) {
      options.signal?.throwIfAborted();

      if (this.admit(options.chatId)) {
        if (waited) {
          this.logger.debug('Rate limit admission granted after wait', {
            platform: this.platform,
            waitedMs: this.now() - startedAt,
          });
        }
        return;
      }

      if (!waited) {
        this.logger.debug('Rate limit reached, waiting for admission', {
          platform: this.platform,
          chatId: options.chatId,
        });
        waited = true;
      }

      const elapsed = this.now() - startedAt;
      if (timeoutMs !== undefined && elapsed >= timeoutMs) {
        this.logger.warn('Rate limit admission timed out', {
          platform: this.platform,
          timeoutMs,
        });
        throw new RateLimitedError(
          `Rate limit admission timed out after ${timeoutMs}ms`,
          this.platform,
          this.msUntilAdmission(options.chatId)
        );
      }

      const remaining = timeoutMs === undefined ? this.pollIntervalMs : timeoutMs - elapsed;
      await sleep(Math.min(this.pollIntervalMs, remaining), undefined, {
        signal: options.signal,
      });
    }
  }

  /** Estimated wait until every window has room. */
  msUntilAdmission(chatId?: string): number {
    const now = this.now();
    return Math.max(
      this.hour.msUntilCapacity(now),
      this.minute.msUntilCapacity(now),
      this.second?.msUntilCapacity(now) ?? 0,
      chatId !== undefined && this.chatLimiter ? this.chatLimiter.msUntilCapacity(chatId) : 0,
      this.burst.msUntilReset(now)
    );
  }

  getStatus(): RateLimitStatus {
    const now = this.now();
    const status: RateLimitStatus = {
      requestsInLastMinute: this.minute.count(now),
      requestsInLastHour: this.hour.count(now),
      burstCount: this.burst.current(now),
      canMakeRequest:
        this.hour.hasCapacity(now) &&
        this.minute.hasCapacity(now) &&
        (this.second?.hasCapacity(now) ?? true) &&
        this.burst.hasCapacity(now),
    };
    if (this.second) {
      status.requestsInLastSecond = this.second.count(now);
    }
    if (this.chatLimiter) {
      this.chatLimiter.evictIdle(now);
      status.trackedChats = this.chatLimiter.size;
    }
    return status;
  }

  getStats(): { totalHits: number; totalChecks: number } {
    return { totalHits: this.totalHits, totalChecks: this.totalChecks };
  }
}
