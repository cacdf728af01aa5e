import { describe, expect, it } from 'vitest';
import { classifyTransportFailure, isNetworkError, NetworkError, TimeoutError, TransportError } from '../errors';
import { getHeader, redactHeaders, withHeader } from '../headers';
import { encodeJsonBody, prettyPrintJson } from '../json';

describe('NetworkError', () => {
  it('derives the disposition from the kind', () => {
    expect(NetworkError.invalidUrl().disposition).toBe('fix_request');
    expect(NetworkError.server(502).disposition).toBe('retry_later');
    expect(NetworkError.networkFailure(new Error('reset')).isRetriable).toBe(true);
    expect(NetworkError.decoding(new Error('bad')).disposition).toBe('fatal');
    expect(NetworkError.cancelled().isRetriable).toBe(false);
  });

  it('keeps the wrapped cause', () => {
    const cause = new Error('socket closed');
    const error = NetworkError.networkFailure(cause);

    expect(error.cause).toBe(cause);
    expect(error.message).toBe('Network failure: socket closed');
    expect(error.name).toBe('NetworkError');
  });

  it('narrows by kind', () => {
    expect(isNetworkError(NetworkError.notFound(), 'not_found')).toBe(true);
    expect(isNetworkError(NetworkError.notFound(), 'forbidden')).toBe(false);
    expect(isNetworkError(new Error('plain'))).toBe(false);
  });
});

describe('classifyTransportFailure', () => {
  const coded = (code: string) => Object.assign(new Error(code), { code });

  it.each([
    ['ETIMEDOUT', 'timeout'],
    ['UND_ERR_HEADERS_TIMEOUT', 'timeout'],
    ['ENETUNREACH', 'offline'],
    ['EAI_AGAIN', 'offline'],
    ['ECONNRESET', 'connection_lost'],
    ['UND_ERR_SOCKET', 'connection_lost'],
    ['ECONNREFUSED', 'other'],
  ])('maps %s to %s', (code, reason) => {
    expect(classifyTransportFailure(coded(code))).toBe(reason);
    expect(classifyTransportFailure(new TypeError('fetch failed', { cause: coded(code) }))).toBe(reason);
  });

  it('keeps the reason of transport errors', () => {
    expect(classifyTransportFailure(new TimeoutError('Request timed out after 5ms'))).toBe('timeout');
    expect(classifyTransportFailure(new TransportError('gone', 'offline'))).toBe('offline');
    expect(classifyTransportFailure('not an error')).toBe('other');
  });
});

describe('headers', () => {
  it('replaces a header regardless of letter case', () => {
    expect(withHeader({ 'content-type': 'text/plain', Accept: '*/*' }, 'Content-Type', 'application/json')).toEqual({
      Accept: '*/*',
      'Content-Type': 'application/json',
    });
    expect(getHeader({ authorization: 'Bearer x' }, 'Authorization')).toBe('Bearer x');
  });

  it('redacts credentials', () => {
    expect(redactHeaders({ Authorization: 'Bearer x', Cookie: 'id=1', Accept: '*/*' })).toEqual({
      Authorization: '[redacted]',
      Cookie: '[redacted]',
      Accept: '*/*',
    });
  });
});

describe('json', () => {
  it('encodes nested JSON values', () => {
    expect(encodeJsonBody({ tags: ['a', null], nested: { ok: true } })).toBe('{"tags":["a",null],"nested":{"ok":true}}');
  });

  it('rejects values JSON cannot represent', () => {
    expect(() => encodeJsonBody({ value: Number.POSITIVE_INFINITY })).toThrow();
    expect(() => encodeJsonBody(['not', 'an', 'object'])).toThrow();
  });

  it('pretty prints JSON and passes other text through', () => {
    expect(prettyPrintJson('{"a":1}')).toBe('{\n  "a": 1\n}');
    expect(prettyPrintJson('plain text')).toBe('plain text');
  });
});
