/**
 * Retrying Request Executor
 *
 * Sends one adapter's outbound API calls. Every attempt, the first
 * included, passes rate admission and is recorded before the network call.
 * 429 and 5xx answers, network errors and per-call timeouts are retried
 * with exponential backoff; any other 4xx is returned at once.
 *
 * HTTP and network failures come back as `{ success: false }` values.
 * Only an abort through the caller's signal, or a target that cannot be
 * resolved (no usable credentials), rejects.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { ApiRequest, ApiResponse, ErrorKind, RetryConfig } from '@relayhub/shared';
import type { PlatformRateLimiter } from '../security/rate-limiter.js';
import type { AuditLog } from '../logging/audit-log.js';
import { createNoopLogger, type SecureLogger } from '../logging/logger.js';
import {
  classifyStatus,
  errorKindForStatus,
  errorKindOf,
  RateLimitedError,
  toErrorMessage,
} from '../utils/errors.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/** Where requests go and the auth headers they carry. */
export interface RequestTarget {
  /** Relative request URLs are joined onto this */
  baseUrl: string;
  /** Sent with every request; request headers win on conflict */
  headers: Record<string, string>;
}

export interface RequestExecutorConfig {
  platform: string;
  principalId: string;
  /** Resolved once per request, so credential changes apply to the next call */
  resolveTarget: () => Promise<RequestTarget>;
  rateLimiter: PlatformRateLimiter;
  retry: RetryConfig;
  auditLog: AuditLog;
  logger?: SecureLogger;
  now?: () => number;
  sleep?: Sleep;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Also applies the per-chat limit during admission */
  chatId?: string;
}

/** Outcome of one attempt, before it becomes an ApiResponse. */
interface AttemptFailure {
  error: string;
  errorKind: ErrorKind;
  statusCode: number;
  retryable: boolean;
  data?: unknown;
  retryAfterMs?: number;
}

/** `dispatched` is false when the attempt never reached the network. */
type AttemptResult =
  | { ok: true; dispatched: true; statusCode: number; data: unknown }
  | ({ ok: false; dispatched: boolean } & AttemptFailure);

/**
 * Parse a Retry-After header: delay-seconds or an HTTP date.
 */
export function parseRetryAfter(header: string | null, now: number): number | undefined {
  if (header === null) return undefined;
  const value = header.trim();

  if (/^\d+$/.test(value)) {
    return Number(value) * 1000;
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/** JSON when the body parses, the raw text otherwise. */
function parseBody(text: string): unknown {
  if (text === '') return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Header names compare case-insensitively; the last spelling set wins.
 */
class HeaderMap {
  private readonly entries = new Map<string, [name: string, value: string]>();

  set(name: string, value: string): void {
    this.entries.set(name.toLowerCase(), [name, value]);
  }

  assign(headers: Record<string, string>): void {
    for (const [name, value] of Object.entries(headers)) this.set(name, value);
  }

  has(name: string): boolean {
    return this.entries.has(name.toLowerCase());
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.entries.values());
  }
}

export class RetryingRequestExecutor {
  private readonly config: RequestExecutorConfig;
  private readonly logger: SecureLogger;
  private readonly now: () => number;
  private readonly sleep: Sleep;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(config: RequestExecutorConfig) {
    this.config = config;
    this.logger = (config.logger ?? createNoopLogger()).child({
      component: 'RequestExecutor',
      platform: config.platform,
    });
    this.now = config.now ?? (() => Date.now());
    this.sleep = config.sleep ?? defaultSleep;
  }

  /**
   * Run a request after every request submitted before it has finished.
   */
  execute(request: ApiRequest, options: ExecuteOptions = {}): Promise<ApiResponse> {
    const task = this.queue.then(() => this.run(request, options));
    this.queue = task.catch((err: unknown) => {
      this.logger.debug('Queued request aborted', { error: err });
    });
    return task;
  }

  private async run(request: ApiRequest, options: ExecuteOptions): Promise<ApiResponse> {
    const { retry } = this.config;
    const resource = request.resource ?? request.url;
    const startedAt = this.now();
    const target = await this.config.resolveTarget();
    let attempts = 0;
    let lastFailure: AttemptFailure | undefined;

    for (let attempt = 0; attempt <= retry.maxRetries; attempt++) {
      if (attempt > 0 && lastFailure) {
        const backoff = retry.baseDelayMs * 2 ** (attempt - 1);
        const wait = Math.max(backoff, lastFailure.retryAfterMs ?? 0);

        if (retry.deadlineMs !== undefined && this.now() - startedAt + wait > retry.deadlineMs) {
          this.logger.warn('Retry deadline reached', { resource, attempts, deadlineMs: retry.deadlineMs });
          break;
        }
        await this.sleep(wait, options.signal);
      }

      const result = await this.attempt(request, target, options);
      if (result.dispatched) attempts++;

      if (result.ok) {
        const response: ApiResponse = {
          platform: this.config.platform,
          success: true,
          data: result.data,
          statusCode: result.statusCode,
          attempts,
          durationMs: this.now() - startedAt,
        };
        await this.audit(request, response);
        return response;
      }

      lastFailure = result;
      if (!result.retryable) break;
    }

    const failure: AttemptFailure = lastFailure ?? {
      error: 'No attempt was made',
      errorKind: 'configuration',
      statusCode: 0,
      retryable: false,
    };
    const response: ApiResponse = {
      platform: this.config.platform,
      success: false,
      data: failure.data ?? null,
      error: failure.error,
      errorKind: failure.errorKind,
      statusCode: failure.statusCode,
      attempts,
      durationMs: this.now() - startedAt,
    };
    if (failure.retryAfterMs !== undefined) response.retryAfterMs = failure.retryAfterMs;

    this.logger.warn('API request failed', {
      resource,
      attempts,
      statusCode: failure.statusCode,
      errorKind: failure.errorKind,
    });
    await this.audit(request, response);
    return response;
  }

  private async attempt(
    request: ApiRequest,
    target: RequestTarget,
    options: ExecuteOptions
  ): Promise<AttemptResult> {
    const { rateLimiter, retry } = this.config;
    const resource = request.resource ?? request.url;
    const url = this.buildUrl(request, target.baseUrl);
    if (url === null) {
      return {
        ok: false,
        dispatched: false,
        error: `Invalid request URL: ${resource}`,
        errorKind: 'configuration',
        statusCode: 0,
        retryable: false,
      };
    }

    try {
      await rateLimiter.awaitAdmission({ chatId: options.chatId, signal: options.signal });
    } catch (err) {
      if (options.signal?.aborted) throw err;
      // Admission timed out; the backoff loop waits at least until the window frees.
      return {
        ok: false,
        dispatched: false,
        error: toErrorMessage(err),
        errorKind: errorKindOf(err),
        statusCode: 0,
        retryable: err instanceof RateLimitedError,
        retryAfterMs: err instanceof RateLimitedError ? err.retryAfterMs : undefined,
      };
    }
    rateLimiter.record(options.chatId);

    const attemptStart = this.now();
    const timeout = AbortSignal.timeout(retry.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    let res: Response;
    let text: string;
    try {
      res = await fetch(url, {
        method: request.method,
        headers: this.buildHeaders(request, target.headers),
        body: request.json === undefined ? undefined : JSON.stringify(request.json),
        signal,
      });
      text = await res.text();
    } catch (err) {
      if (options.signal?.aborted) throw options.signal.reason;

      const timedOut = timeout.aborted;
      const error = timedOut ? `Request timed out after ${retry.timeoutMs}ms` : toErrorMessage(err);
      this.logger.debug('API attempt failed', {
        resource,
        latencyMs: this.now() - attemptStart,
        outcome: timedOut ? 'timeout' : 'network_error',
        error,
      });
      return {
        ok: false,
        dispatched: true,
        error,
        errorKind: 'transient_network',
        statusCode: 0,
        retryable: true,
      };
    }

    const latencyMs = this.now() - attemptStart;
    const statusClass = classifyStatus(res.status);
    this.logger.debug('API attempt', { resource, statusCode: res.status, latencyMs, outcome: statusClass });

    if (statusClass === 'success') {
      return { ok: true, dispatched: true, statusCode: res.status, data: parseBody(text) };
    }

    const failure: AttemptFailure & { ok: false; dispatched: true } = {
      ok: false,
      dispatched: true,
      error: text || `HTTP ${res.status} ${res.statusText}`.trim(),
      errorKind: errorKindForStatus(res.status),
      statusCode: res.status,
      retryable: statusClass === 'retry',
      data: parseBody(text),
    };
    const retryAfterMs = parseRetryAfter(res.headers.get('retry-after'), this.now());
    if (retryAfterMs !== undefined) failure.retryAfterMs = retryAfterMs;
    return failure;
  }

  private buildUrl(request: ApiRequest, baseUrl: string): string | null {
    const raw = /^https?:\/\//i.test(request.url)
      ? request.url
      : `${baseUrl}/${request.url.replace(/^\/+/, '')}`;
    if (!URL.canParse(raw)) return null;

    const url = new URL(raw);

    for (const [key, value] of Object.entries(request.query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private buildHeaders(
    request: ApiRequest,
    targetHeaders: Record<string, string>
  ): Record<string, string> {
    const headers = new HeaderMap();
    headers.set('Accept', 'application/json');
    headers.assign(targetHeaders);
    headers.assign(request.headers ?? {});
    if (request.json !== undefined && !headers.has('Content-Type')) {
      headers.set('Content-Type', 'application/json');
    }
    return headers.toRecord();
  }

  private async audit(request: ApiRequest, response: ApiResponse): Promise<void> {
    const requestData: Record<string, unknown> = { attempts: response.attempts };
    if (request.query) requestData.query = request.query;

    await this.config.auditLog.record({
      platform: this.config.platform,
      principalId: this.config.principalId,
      action: response.success ? 'api_call' : 'api_call_failed',
      resource: request.resource ?? request.url,
      method: request.method,
      statusCode: response.statusCode,
      requestData,
      durationMs: response.durationMs,
      error: response.error,
    });
  }
}
