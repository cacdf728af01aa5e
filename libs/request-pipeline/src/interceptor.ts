// ============================================================================
// Request Interceptor: auth injection and retry decisions
// ============================================================================

import { setTimeout as sleep } from 'node:timers/promises';
import { classifyTransportFailure, describeError } from './errors';
import type { TransportFailureReason } from './errors';
import { getHeader, withHeader } from './headers';
import type { TokenSession } from './session';
import type { HttpRequest, Logger, RawHttpResponse } from './types';

/**
 * Retry bookkeeping for one top-level call. Created by the executor, never shared.
 */
export interface RetryState {
  /** Transient-failure retries spent so far. */
  attempts: number;
  limit: number;
  /** The 401 refresh retry has its own single-use budget. */
  refreshAttempted: boolean;
}

export function createRetryState(limit: number): RetryState {
  return { attempts: 0, limit: Math.max(0, limit), refreshAttempted: false };
}

export interface RetryContext {
  /** The adapted request that failed. */
  request: HttpRequest;
  response?: RawHttpResponse;
  error?: unknown;
  state: RetryState;
  signal?: AbortSignal;
}

export interface RequestInterceptor {
  adapt(request: HttpRequest): HttpRequest | Promise<HttpRequest>;
  /**
   * Decides whether the failed attempt described by `ctx` should be sent again.
   * Implementations may wait before resolving; a wait must reject when `ctx.signal` aborts.
   */
  shouldRetry(ctx: RetryContext): Promise<boolean>;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface DefaultRequestInterceptorOptions {
  session?: TokenSession;
  retryDelayMs?: number;
  retryableStatuses?: Iterable<number>;
  logger?: Logger;
  sleep?: Sleep;
}

export const DEFAULT_RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 500, 502, 503, 504]);
const RETRYABLE_TRANSPORT_FAILURES = new Set<TransportFailureReason>(['timeout', 'offline', 'connection_lost']);
const DEFAULT_RETRY_DELAY_MS = 1_000;

const abortableSleep: Sleep = async (ms, signal) => {
  await sleep(ms, undefined, { signal });
};

/**
 * Settles with `promise`, or rejects with the abort reason as soon as `signal` aborts.
 * The underlying promise keeps running.
 */
function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

function bearerToken(request: HttpRequest): string | undefined {
  const value = getHeader(request.headers, 'Authorization');
  return value?.startsWith('Bearer ') ? value.slice('Bearer '.length) : undefined;
}

export class DefaultRequestInterceptor implements RequestInterceptor {
  private readonly session?: TokenSession;
  private readonly retryDelayMs: number;
  private readonly retryableStatuses: ReadonlySet<number>;
  private readonly logger?: Logger;
  private readonly sleep: Sleep;
  private refreshInFlight?: Promise<boolean>;

  constructor(options: DefaultRequestInterceptorOptions = {}) {
    this.session = options.session;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.retryableStatuses = options.retryableStatuses
      ? new Set(options.retryableStatuses)
      : DEFAULT_RETRYABLE_STATUSES;
    this.logger = options.logger;
    this.sleep = options.sleep ?? abortableSleep;
  }

  adapt(request: HttpRequest): HttpRequest {
    let headers = withHeader(request.headers, 'Content-Type', 'application/json');
    const accessToken = this.session?.getAccessToken();
    if (accessToken) {
      headers = withHeader(headers, 'Authorization', `Bearer ${accessToken}`);
    }
    return { ...request, headers };
  }

  async shouldRetry(ctx: RetryContext): Promise<boolean> {
    const { state } = ctx;
    if (state.attempts >= state.limit) {
      return false;
    }

    if (ctx.response) {
      const { status } = ctx.response;
      if (status === 401) {
        return this.retryUnauthorized(ctx);
      }
      if (this.retryableStatuses.has(status)) {
        return this.backOff(ctx);
      }
      return false;
    }

    if (ctx.error !== undefined && RETRYABLE_TRANSPORT_FAILURES.has(classifyTransportFailure(ctx.error))) {
      return this.backOff(ctx);
    }
    return false;
  }

  private async backOff(ctx: RetryContext): Promise<boolean> {
    ctx.state.attempts += 1;
    this.logger?.debug('http.request.retry.scheduled', {
      url: ctx.request.url,
      attempt: ctx.state.attempts,
      limit: ctx.state.limit,
      delayMs: this.retryDelayMs,
    });
    await this.sleep(this.retryDelayMs, ctx.signal);
    return true;
  }

  private async retryUnauthorized(ctx: RetryContext): Promise<boolean> {
    const session = this.session;
    if (!session || ctx.state.refreshAttempted) {
      return false;
    }
    ctx.state.refreshAttempted = true;

    // Another call may have refreshed while this request was in flight.
    const current = session.getAccessToken();
    const sent = bearerToken(ctx.request);
    if (current && sent && current !== sent) {
      return true;
    }

    return untilAborted(this.refreshSession(session), ctx.signal);
  }

  /**
   * Single-flight: concurrent 401s share one refresh, which is not tied to any
   * caller's abort signal.
   */
  private refreshSession(session: TokenSession): Promise<boolean> {
    if (!this.refreshInFlight) {
      this.refreshInFlight = this.runRefresh(session).finally(() => {
        this.refreshInFlight = undefined;
      });
    }
    return this.refreshInFlight;
  }

  private async runRefresh(session: TokenSession): Promise<boolean> {
    const refreshToken = session.getRefreshToken();
    if (!refreshToken) {
      this.logger?.warn('http.session.refresh.skipped', { reason: 'no_refresh_token' });
      await this.persist('clear', () => session.clearTokens());
      return false;
    }

    let accessToken: string;
    try {
      accessToken = await session.refreshAccessToken();
    } catch (error) {
      this.logger?.warn('http.session.refresh.failed', { error: describeError(error) });
      await this.persist('clear', () => session.clearTokens());
      return false;
    }

    await this.persist('set', () => session.setTokens(accessToken, refreshToken));
    this.logger?.info('http.session.refresh.succeeded');
    return true;
  }

  /** Store failures are logged; the in-memory tokens already carry the outcome. */
  private async persist(action: 'set' | 'clear', write: () => void | Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      this.logger?.warn('http.session.persist.failed', { action, error: describeError(error) });
    }
  }
}
