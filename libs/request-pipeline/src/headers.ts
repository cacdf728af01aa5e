import type { HttpHeaders } from './types';

const REDACTED_HEADERS = new Set(['authorization', 'proxy-authorization', 'cookie']);

export function hasHeader(headers: HttpHeaders, name: string): boolean {
  return Object.keys(headers).some((key) => key.toLowerCase() === name.toLowerCase());
}

/**
 * Returns a copy of `headers` where `name` is set to `value`, dropping any existing
 * entry that differs only in letter case.
 */
export function withHeader(headers: HttpHeaders, name: string, value: string): HttpHeaders {
  const result: HttpHeaders = {};
  for (const [key, existing] of Object.entries(headers)) {
    if (key.toLowerCase() !== name.toLowerCase()) {
      result[key] = existing;
    }
  }
  result[name] = value;
  return result;
}

export function getHeader(headers: HttpHeaders, name: string): string | undefined {
  const match = Object.keys(headers).find((key) => key.toLowerCase() === name.toLowerCase());
  return match === undefined ? undefined : headers[match];
}

/** Copy safe to hand to a logger. */
export function redactHeaders(headers: HttpHeaders): HttpHeaders {
  const result: HttpHeaders = {};
  for (const [key, value] of Object.entries(headers)) {
    result[key] = REDACTED_HEADERS.has(key.toLowerCase()) ? '[redacted]' : value;
  }
  return result;
}
