import { z } from 'zod';

export const apiErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
});

/** Structured error body returned by the API alongside a 400. */
export type ApiError = z.infer<typeof apiErrorSchema>;

export type NetworkErrorKind =
  | 'invalid_url'
  | 'invalid_response'
  | 'no_data'
  | 'decoding'
  | 'encoding'
  | 'unauthorized'
  | 'forbidden'
  | 'not_found'
  | 'bad_request'
  | 'server'
  | 'network_failure'
  | 'unexpected_status'
  | 'cancelled';

/**
 * What the caller can do about a failure:
 * - 'fix_request': the request itself is wrong (URL, body, credentials, permissions)
 * - 'retry_later': a transient server or network condition
 * - 'fatal': the exchange cannot be salvaged by changing or repeating the request
 */
export type ErrorDisposition = 'fix_request' | 'retry_later' | 'fatal';

const DISPOSITIONS: Record<NetworkErrorKind, ErrorDisposition> = {
  invalid_url: 'fix_request',
  encoding: 'fix_request',
  bad_request: 'fix_request',
  unauthorized: 'fix_request',
  forbidden: 'fix_request',
  not_found: 'fix_request',
  server: 'retry_later',
  network_failure: 'retry_later',
  invalid_response: 'fatal',
  no_data: 'fatal',
  decoding: 'fatal',
  unexpected_status: 'fatal',
  cancelled: 'fatal',
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The closed set of failures surfaced by the request executor.
 *
 * Build the instances through the static factories so that `message`, `status`
 * and `apiError` stay consistent with `kind`.
 */
export class NetworkError extends Error {
  readonly kind: NetworkErrorKind;
  readonly status?: number;
  readonly apiError?: ApiError;

  constructor(
    kind: NetworkErrorKind,
    message: string,
    options: { status?: number; apiError?: ApiError; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'NetworkError';
    this.kind = kind;
    this.status = options.status;
    this.apiError = options.apiError;
  }

  get disposition(): ErrorDisposition {
    return DISPOSITIONS[this.kind];
  }

  get isRetriable(): boolean {
    return this.disposition === 'retry_later';
  }

  static invalidUrl(): NetworkError {
    return new NetworkError('invalid_url', 'Invalid URL');
  }

  static invalidResponse(): NetworkError {
    return new NetworkError('invalid_response', 'Invalid server response');
  }

  static noData(): NetworkError {
    return new NetworkError('no_data', 'No data received');
  }

  static decoding(cause: unknown): NetworkError {
    return new NetworkError('decoding', `Failed to decode response: ${describeError(cause)}`, { cause });
  }

  static encoding(cause: unknown): NetworkError {
    return new NetworkError('encoding', `Failed to encode request: ${describeError(cause)}`, { cause });
  }

  static unauthorized(): NetworkError {
    return new NetworkError('unauthorized', 'Unauthorized access', { status: 401 });
  }

  static forbidden(): NetworkError {
    return new NetworkError('forbidden', 'Access forbidden', { status: 403 });
  }

  static notFound(): NetworkError {
    return new NetworkError('not_found', 'Resource not found', { status: 404 });
  }

  static badRequest(apiError?: ApiError): NetworkError {
    return new NetworkError('bad_request', apiError?.message ?? 'Bad request', { status: 400, apiError });
  }

  static server(status: number): NetworkError {
    return new NetworkError('server', `Server error occurred (${status})`, { status });
  }

  static networkFailure(cause: unknown): NetworkError {
    return new NetworkError('network_failure', `Network failure: ${describeError(cause)}`, { cause });
  }

  static unexpectedStatus(status: number): NetworkError {
    return new NetworkError('unexpected_status', `Unexpected status code: ${status}`, { status });
  }

  static cancelled(): NetworkError {
    return new NetworkError('cancelled', 'Request was cancelled');
  }
}

export function isNetworkError(error: unknown, kind?: NetworkErrorKind): error is NetworkError {
  return error instanceof NetworkError && (kind === undefined || error.kind === kind);
}

export type TransportFailureReason = 'timeout' | 'offline' | 'connection_lost' | 'other';

/**
 * Raised by transports when no HTTP response was received.
 */
export class TransportError extends Error {
  readonly reason: TransportFailureReason;

  constructor(message: string, reason: TransportFailureReason, options: { cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TransportError';
    this.reason = reason;
  }
}

export class TimeoutError extends TransportError {
  constructor(message: string) {
    super(message, 'timeout');
    this.name = 'TimeoutError';
  }
}

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'ECONNABORTED',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const OFFLINE_CODES = new Set(['ENETUNREACH', 'ENETDOWN', 'EAI_AGAIN', 'ERR_NETWORK']);
const CONNECTION_LOST_CODES = new Set(['ECONNRESET', 'EPIPE', 'UND_ERR_SOCKET', 'UND_ERR_CLOSED']);

function errorCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

/**
 * Maps a low-level failure (undici `fetch failed` with a coded cause, a Node
 * socket error, an axios error) to a transport failure reason.
 */
export function classifyTransportFailure(error: unknown): TransportFailureReason {
  if (error instanceof TransportError) return error.reason;
  const cause = error instanceof Error ? error.cause : undefined;
  const codes = [errorCode(error), errorCode(cause)].filter((code): code is string => code !== undefined);

  if (codes.some((code) => TIMEOUT_CODES.has(code))) return 'timeout';
  if (codes.some((code) => OFFLINE_CODES.has(code))) return 'offline';
  if (codes.some((code) => CONNECTION_LOST_CODES.has(code))) return 'connection_lost';
  return 'other';
}

export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) return error;
  return new TransportError(describeError(error), classifyTransportFailure(error), { cause: error });
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'CanceledError');
}
