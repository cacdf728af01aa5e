import { hasHeader } from '../headers';
import { isAbortError, toTransportError } from '../errors';
import type { CachePolicy, HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

/**
 * Node's fetch keeps no HTTP cache, so the policy is forwarded to the server and
 * intermediaries as a request directive instead.
 */
const CACHE_CONTROL: Partial<Record<CachePolicy, string>> = {
  'no-store': 'no-store',
  'no-cache': 'no-cache',
  reload: 'no-cache',
  'force-cache': 'max-stale',
  'only-if-cached': 'only-if-cached',
};

function withCacheControl(headers: HttpHeaders, policy: CachePolicy): HttpHeaders {
  const directive = CACHE_CONTROL[policy];
  if (!directive || hasHeader(headers, 'cache-control')) {
    return headers;
  }
  return { ...headers, 'Cache-Control': directive };
}

/**
 * fetch-based HTTP transport.
 * Uses the global fetch API and converts the Response to a RawHttpResponse.
 */
export const fetchTransport: HttpTransport = async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
  let response: Response;
  let body: ArrayBuffer;
  try {
    response = await fetch(req.url, {
      method: req.method,
      headers: withCacheControl(req.headers, req.cachePolicy),
      body: req.body,
      signal,
    });
    body = await response.arrayBuffer();
  } catch (error) {
    if (signal.aborted || isAbortError(error)) {
      throw error;
    }
    throw toTransportError(error);
  }

  // Convert Headers object to plain object
  const headers: HttpHeaders = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });

  return {
    status: response.status,
    headers,
    body: new Uint8Array(body),
  };
};
