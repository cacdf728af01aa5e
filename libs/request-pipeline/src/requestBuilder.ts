import type { ResolvedEndpoint } from './endpoint';
import { NetworkError } from './errors';
import { redactHeaders } from './headers';
import { encodeJsonBody, prettyPrintJson } from './json';
import type { HttpRequest, Logger } from './types';

export interface RequestBuilderOptions {
  logger?: Logger;
}

/**
 * Turns a resolved endpoint into a concrete request.
 */
export class RequestBuilder {
  private readonly logger?: Logger;

  constructor(options: RequestBuilderOptions = {}) {
    this.logger = options.logger;
  }

  /**
   * @throws NetworkError `invalid_url` when no valid URL can be formed, `encoding` when
   * the body is not JSON-representable
   */
  build(endpoint: ResolvedEndpoint): HttpRequest {
    const url = this.buildUrl(endpoint);

    let body: string | undefined;
    if (endpoint.body !== undefined) {
      try {
        body = encodeJsonBody(endpoint.body);
      } catch (error) {
        if (endpoint.loggingEnabled) {
          this.logger?.error('http.request.encode.failed', {
            path: endpoint.path,
            error: error instanceof Error ? error.message : String(error),
          });
        }
        throw NetworkError.encoding(error);
      }
    }

    const request: HttpRequest = {
      method: endpoint.method,
      url,
      headers: { ...endpoint.headers },
      body,
      timeoutMs: endpoint.timeoutMs,
      cachePolicy: endpoint.cachePolicy,
    };

    if (endpoint.loggingEnabled) {
      this.logger?.debug('http.request.built', {
        method: request.method,
        url: request.url,
        headers: redactHeaders(request.headers),
        body: body === undefined ? undefined : prettyPrintJson(body),
      });
    }

    return request;
  }

  private buildUrl(endpoint: ResolvedEndpoint): string {
    const base = endpoint.baseUrl === undefined ? '' : String(endpoint.baseUrl).trim();
    if (!base) {
      if (endpoint.loggingEnabled) {
        this.logger?.error('http.request.url.missing_base', { path: endpoint.path });
      }
      throw NetworkError.invalidUrl();
    }

    const normalizedBase = base.replace(/\/+$/, '');
    const normalizedPath = endpoint.path.replace(/^\/+/, '');

    let url: URL;
    try {
      url = new URL(normalizedPath ? `${normalizedBase}/${normalizedPath}` : normalizedBase);
    } catch {
      if (endpoint.loggingEnabled) {
        this.logger?.error('http.request.url.invalid', { baseUrl: base, path: endpoint.path });
      }
      throw NetworkError.invalidUrl();
    }

    for (const [key, value] of endpoint.query ?? []) {
      url.searchParams.append(key, value);
    }
    return url.toString();
  }
}
