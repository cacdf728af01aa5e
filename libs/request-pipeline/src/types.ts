export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

/** Ordered query parameters; duplicate keys are kept in order. */
export type QueryItems = ReadonlyArray<readonly [string, string]>;

/**
 * Cache policy handed through to the transport. Mirrors the fetch `RequestCache`
 * modes so it can be forwarded without translation where the transport supports it.
 */
export type CachePolicy = 'default' | 'no-store' | 'reload' | 'no-cache' | 'force-cache' | 'only-if-cached';

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * A concrete request produced by the builder and adapted by the interceptor.
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: string;
  timeoutMs: number;
  cachePolicy: CachePolicy;
}

/**
 * Transport request structure.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: string;
  cachePolicy: CachePolicy;
}

/**
 * Transport layer raw HTTP response.
 */
export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: Uint8Array;
}

/**
 * Sends one request. Implementations reject with a `TransportError` when no HTTP
 * response was received, and rethrow aborts untouched.
 */
export interface HttpTransport {
  (request: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}
