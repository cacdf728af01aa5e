import { resolveConfiguration } from './configuration';
import type { NetworkConfiguration, NetworkConfigurationInput } from './configuration';
import { decodeJsonBody } from './decoding';
import type { Decodable } from './decoding';
import { resolveEndpoint } from './endpoint';
import type { Endpoint, ResolvedEndpoint } from './endpoint';
import { describeError, isAbortError, NetworkError, TimeoutError } from './errors';
import { redactHeaders } from './headers';
import { createRetryState, DefaultRequestInterceptor } from './interceptor';
import type { RequestInterceptor, RetryContext } from './interceptor';
import { prettyPrintJson } from './json';
import { RequestBuilder } from './requestBuilder';
import { fetchTransport } from './transport/fetchTransport';
import type { HttpRequest, HttpTransport, Logger, RawHttpResponse } from './types';
import { DefaultResponseValidator, isHttpResponse } from './validator';
import type { ResponseValidator } from './validator';

/** Sends beyond the retry budget reserved for the single 401 refresh retry. */
const REFRESH_RETRY_ALLOWANCE = 1;

export interface RequestExecutorOptions {
  transport?: HttpTransport;
  interceptor?: RequestInterceptor;
  validator?: ResponseValidator;
  builder?: RequestBuilder;
  /**
   * `retryDelayMs` only configures the default interceptor; a custom `interceptor`
   * keeps its own delay.
   */
  configuration?: NetworkConfigurationInput;
  logger?: Logger;
}

export interface RequestOptions {
  /** Aborting cancels the in-flight send and any remaining retries. */
  signal?: AbortSignal;
}

interface SendResult {
  response: RawHttpResponse;
  sends: number;
}

/**
 * Runs endpoints through build → adapt → send → validate → decode.
 *
 * Every failure reaching the caller is a {@link NetworkError}.
 *
 * @example
 * ```typescript
 * const executor = new RequestExecutor({ interceptor: new DefaultRequestInterceptor({ session }) });
 * const products = await executor.requestJson(
 *   { baseUrl: 'https://api.example.com', path: '/products', method: 'GET' },
 *   z.array(productSchema),
 * );
 * ```
 */
export class RequestExecutor {
  readonly configuration: NetworkConfiguration;
  private readonly transport: HttpTransport;
  private readonly interceptor: RequestInterceptor;
  private readonly validator: ResponseValidator;
  private readonly builder: RequestBuilder;
  private readonly logger?: Logger;

  constructor(options: RequestExecutorOptions = {}) {
    this.configuration = resolveConfiguration(options.configuration);
    this.logger = options.logger;
    this.transport = options.transport ?? fetchTransport;
    this.interceptor =
      options.interceptor ??
      new DefaultRequestInterceptor({ retryDelayMs: this.configuration.retryDelayMs, logger: options.logger });
    this.validator = options.validator ?? new DefaultResponseValidator();
    this.builder = options.builder ?? new RequestBuilder({ logger: options.logger });
  }

  /**
   * Decodes the JSON body with `schema` after converting snake_case keys to camelCase.
   */
  async requestJson<T>(endpoint: Endpoint, schema: Decodable<T>, options: RequestOptions = {}): Promise<T> {
    return this.run(endpoint, options, (body) => decodeJsonBody(body, schema));
  }

  async requestText(endpoint: Endpoint, options: RequestOptions = {}): Promise<string> {
    return this.run(endpoint, options, (body) => new TextDecoder().decode(body));
  }

  /** For endpoints with no response content expected; the body is ignored. */
  async requestVoid(endpoint: Endpoint, options: RequestOptions = {}): Promise<void> {
    await this.run(endpoint, options, () => undefined);
  }

  private async run<T>(endpoint: Endpoint, options: RequestOptions, decode: (body: Uint8Array) => T): Promise<T> {
    const resolved = resolveEndpoint(endpoint);
    const logger = resolved.loggingEnabled ? this.logger : undefined;
    const startedAt = Date.now();

    try {
      const request = this.builder.build(resolved);
      const { response, sends } = await this.sendWithRetries(request, resolved, options.signal, logger);
      this.validator.validate(response.body, response);
      const value = decode(response.body);
      logger?.info('http.request.success', {
        method: request.method,
        url: request.url,
        status: response.status,
        sends,
        durationMs: Date.now() - startedAt,
      });
      return value;
    } catch (error) {
      const mapped = this.mapError(error, options.signal);
      logger?.error('http.request.failed', {
        method: resolved.method,
        path: resolved.path,
        kind: mapped.kind,
        status: mapped.status,
        error: mapped.message,
        durationMs: Date.now() - startedAt,
      });
      throw mapped;
    }
  }

  private async sendWithRetries(
    request: HttpRequest,
    endpoint: ResolvedEndpoint,
    signal: AbortSignal | undefined,
    logger: Logger | undefined,
  ): Promise<SendResult> {
    const state = createRetryState(Math.min(endpoint.retryLimit, this.configuration.retryLimit));
    const maxSends = state.limit + 1 + REFRESH_RETRY_ALLOWANCE;
    const deadline =
      this.configuration.overallTimeoutMs === undefined ? undefined : Date.now() + this.configuration.overallTimeoutMs;

    let adapted = await this.interceptor.adapt(request);
    let lastResponse: RawHttpResponse | undefined;
    let lastError: unknown;
    let sends = 0;

    while (sends < maxSends) {
      if (signal?.aborted) {
        throw NetworkError.cancelled();
      }
      const timeoutMs = this.attemptTimeout(adapted.timeoutMs, deadline);
      if (timeoutMs === undefined) {
        logger?.warn('http.request.budget.exhausted', { url: adapted.url, sends });
        break;
      }

      sends += 1;
      logger?.debug('http.request.attempt', {
        method: adapted.method,
        url: adapted.url,
        headers: redactHeaders(adapted.headers),
        attempt: sends,
      });

      let ctx: RetryContext;
      try {
        const response = await this.sendOnce(adapted, timeoutMs, signal);
        lastResponse = response;
        lastError = undefined;
        logger?.debug('http.response', {
          url: adapted.url,
          status: response.status,
          headers: response.headers,
          body: prettyPrintJson(new TextDecoder().decode(response.body)),
        });
        if (!isHttpResponse(response) || (response.status >= 200 && response.status <= 299)) {
          return { response, sends };
        }
        ctx = { request: adapted, response, state, signal };
      } catch (error) {
        if (signal?.aborted) {
          throw NetworkError.cancelled();
        }
        lastResponse = undefined;
        lastError = error;
        logger?.warn('http.request.attempt.failed', {
          url: adapted.url,
          attempt: sends,
          error: describeError(error),
        });
        ctx = { request: adapted, error, state, signal };
      }

      if (sends >= maxSends || !(await this.interceptor.shouldRetry(ctx))) {
        break;
      }
      adapted = await this.interceptor.adapt(request);
    }

    if (lastResponse) {
      return { response: lastResponse, sends };
    }
    throw lastError ?? NetworkError.networkFailure(new Error('Request failed'));
  }

  private async sendOnce(request: HttpRequest, timeoutMs: number, signal?: AbortSignal): Promise<RawHttpResponse> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', forwardAbort, { once: true });

    let didTimeout = false;
    const timeoutHandle = setTimeout(() => {
      didTimeout = true;
      controller.abort();
    }, timeoutMs);

    try {
      return await this.transport(
        {
          method: request.method,
          url: request.url,
          headers: request.headers,
          body: request.body,
          cachePolicy: request.cachePolicy,
        },
        controller.signal,
      );
    } catch (error) {
      if (didTimeout && !signal?.aborted) {
        throw new TimeoutError(`Request timed out after ${timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutHandle);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private attemptTimeout(timeoutMs: number, deadline?: number): number | undefined {
    if (deadline === undefined) {
      return timeoutMs;
    }
    const remaining = deadline - Date.now();
    return remaining > 0 ? Math.min(timeoutMs, remaining) : undefined;
  }

  private mapError(error: unknown, signal?: AbortSignal): NetworkError {
    if (error instanceof NetworkError) {
      return error;
    }
    if (signal?.aborted || isAbortError(error)) {
      return NetworkError.cancelled();
    }
    return NetworkError.networkFailure(error);
  }
}
