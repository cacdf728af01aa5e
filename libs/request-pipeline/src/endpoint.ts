import type { JsonObject } from './json';
import type { CachePolicy, HttpHeaders, HttpMethod, QueryItems } from './types';

/**
 * Describes one API operation. Endpoints are plain values created per call;
 * unset fields take the defaults from {@link ENDPOINT_DEFAULTS}.
 *
 * @example
 * ```typescript
 * const listProducts: Endpoint = {
 *   baseUrl: 'https://api.example.com/v1',
 *   path: '/products',
 *   method: 'GET',
 *   query: [['page', '2']],
 * };
 * ```
 */
export interface Endpoint {
  baseUrl?: string | URL;
  path: string;
  method: HttpMethod;
  headers?: HttpHeaders;
  query?: QueryItems;
  body?: JsonObject;
  timeoutMs?: number;
  cachePolicy?: CachePolicy;
  /** Retries allowed for this endpoint; capped by the executor configuration. */
  retryLimit?: number;
  loggingEnabled?: boolean;
}

export type ResolvedEndpoint = Endpoint & Required<Pick<Endpoint, 'timeoutMs' | 'cachePolicy' | 'retryLimit' | 'loggingEnabled'>>;

export const ENDPOINT_DEFAULTS = {
  timeoutMs: 60_000,
  cachePolicy: 'no-store',
  retryLimit: 3,
  loggingEnabled: true,
} as const satisfies Required<Pick<Endpoint, 'timeoutMs' | 'cachePolicy' | 'retryLimit' | 'loggingEnabled'>>;

export function resolveEndpoint(endpoint: Endpoint): ResolvedEndpoint {
  return {
    ...endpoint,
    timeoutMs: endpoint.timeoutMs ?? ENDPOINT_DEFAULTS.timeoutMs,
    cachePolicy: endpoint.cachePolicy ?? ENDPOINT_DEFAULTS.cachePolicy,
    retryLimit: endpoint.retryLimit ?? ENDPOINT_DEFAULTS.retryLimit,
    loggingEnabled: endpoint.loggingEnabled ?? ENDPOINT_DEFAULTS.loggingEnabled,
  };
}
