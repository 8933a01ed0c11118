import { describe, it, expect, beforeEach } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import {
  BurstCounter,
  ChatRateLimiter,
  PlatformRateLimiter,
  RateWindow,
  type PlatformRateLimiterOptions,
} from './rate-limiter.js';
import { RateLimitedError } from '../utils/errors.js';

describe('RateWindow', () => {
  it('admits up to maxRequests inside the window', () => {
    const window = new RateWindow(1000, 2);
    window.add(0);
    expect(window.hasCapacity(10)).toBe(true);
    window.add(10);
    expect(window.hasCapacity(20)).toBe(false);
  });

  it('drops timestamps exactly one duration old', () => {
    const window = new RateWindow(1000, 1);
    window.add(0);
    expect(window.count(999)).toBe(1);
    expect(window.count(1000)).toBe(0);
  });

  it('reports the wait until the oldest entry expires', () => {
    const window = new RateWindow(60_000, 1);
    window.add(5_000);
    expect(window.msUntilCapacity(20_000)).toBe(45_000);
  });
});

describe('BurstCounter', () => {
  it('resets once the interval has elapsed', () => {
    const burst = new BurstCounter(2, 60_000, 0);
    burst.increment(0);
    burst.increment(1);
    expect(burst.hasCapacity(2)).toBe(false);
    expect(burst.hasCapacity(60_000)).toBe(true);
    expect(burst.current(60_000)).toBe(0);
  });
});

describe('ChatRateLimiter', () => {
  let now: number;
  let chats: ChatRateLimiter;

  beforeEach(() => {
    now = 0;
    chats = new ChatRateLimiter({ perChatLimit: 1, idleEvictionMs: 10_000, now: () => now });
  });

  it('limits each chat independently', () => {
    chats.record('a');
    expect(chats.admit('a')).toBe(false);
    expect(chats.admit('b')).toBe(true);
    now = 1000;
    expect(chats.admit('a')).toBe(true);
  });

  it('evicts chats idle past the eviction interval', () => {
    chats.record('a');
    now = 5_000;
    chats.record('b');
    now = 10_000;
    expect(chats.evictIdle()).toBe(1);
    expect(chats.size).toBe(1);
    now = 15_000;
    expect(chats.evictIdle()).toBe(1);
    expect(chats.size).toBe(0);
  });

  it('refreshes a chat on use so it is not evicted', () => {
    chats.record('a');
    now = 1_000;
    chats.record('b');
    now = 9_000;
    chats.record('a');
    now = 11_000;
    chats.evictIdle();
    expect(chats.size).toBe(1);
    expect(chats.admit('a')).toBe(true);
  });
});

describe('PlatformRateLimiter', () => {
  let now: number;
  const baseOptions: PlatformRateLimiterOptions = {
    requestsPerMinute: 2,
    requestsPerHour: 100,
    burstSize: 10,
    burstIntervalMs: 60_000,
  };

  function create(overrides: Partial<PlatformRateLimiterOptions> = {}): PlatformRateLimiter {
    return new PlatformRateLimiter({
      ...baseOptions,
      platform: 'wildberries',
      pollIntervalMs: 1,
      now: () => now,
      ...overrides,
    });
  }

  beforeEach(() => {
    now = 0;
  });

  it('never lets minute usage exceed requestsPerMinute', () => {
    const limiter = create();
    expect(limiter.admit()).toBe(true);
    limiter.record();
    expect(limiter.admit()).toBe(true);
    limiter.record();
    expect(limiter.admit()).toBe(false);
    expect(limiter.getStatus()).toEqual({
      requestsInLastMinute: 2,
      requestsInLastHour: 2,
      burstCount: 2,
      canMakeRequest: false,
    });
  });

  it('lets the tightest window dominate', () => {
    const limiter = create({ requestsPerMinute: 100, burstSize: 3 });
    for (let i = 0; i < 3; i++) {
      limiter.record();
    }
    expect(limiter.admit()).toBe(false);
    now = 60_000;
    expect(limiter.admit()).toBe(true);
  });

  it('applies the per-second window when configured', () => {
    const limiter = create({ requestsPerMinute: 100, messagesPerSecond: 1 });
    limiter.record();
    expect(limiter.admit()).toBe(false);
    now = 1_000;
    expect(limiter.admit()).toBe(true);
    expect(limiter.getStatus().requestsInLastSecond).toBe(0);
  });

  it('applies the per-chat window only when a chat id is given', () => {
    const limiter = create({ requestsPerMinute: 100, perChatLimit: 1 });
    limiter.record('chat-1');
    expect(limiter.admit('chat-1')).toBe(false);
    expect(limiter.admit('chat-2')).toBe(true);
    expect(limiter.admit()).toBe(true);
    expect(limiter.getStatus().trackedChats).toBe(1);
  });

  it('reports the time left until the burst counter resets', () => {
    const limiter = create({ requestsPerMinute: 100, burstSize: 2, burstIntervalMs: 10_000 });
    limiter.record();
    limiter.record();

    now = 4_000;

    expect(limiter.msUntilAdmission()).toBe(6_000);
  });

  it('counts denied checks', () => {
    const limiter = create({ requestsPerMinute: 1 });
    limiter.record();
    limiter.admit();
    limiter.admit();
    expect(limiter.getStats()).toEqual({ totalHits: 2, totalChecks: 2 });
  });

  describe('awaitAdmission()', () => {
    it('delays the third request until the minute window frees', async () => {
      const limiter = create();
      await limiter.awaitAdmission();
      limiter.record();
      await limiter.awaitAdmission();
      limiter.record();

      let admitted = false;
      const third = limiter.awaitAdmission().then(() => {
        admitted = true;
      });

      await sleep(20);
      expect(admitted).toBe(false);

      now = 60_000;
      await third;
      expect(admitted).toBe(true);
    });

    it('rejects with RateLimitedError once the timeout passes', async () => {
      const limiter = create();
      limiter.record();
      limiter.record();

      const error = await limiter.awaitAdmission({ timeoutMs: 0 }).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error).toMatchObject({ retryAfterMs: 60_000, platform: 'wildberries' });
    });

    it('rejects with an AbortError when cancelled', async () => {
      const limiter = create();
      limiter.record();
      limiter.record();

      const controller = new AbortController();
      const pending = limiter.awaitAdmission({ signal: controller.signal });
      await sleep(5);
      controller.abort();

      await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
    });

    it('rejects immediately for an already aborted signal', async () => {
      const limiter = create();
      await expect(
        limiter.awaitAdmission({ signal: AbortSignal.abort() })
      ).rejects.toMatchObject({ name: 'AbortError' });
    });
  });
});
