import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import { z } from 'zod';
import type { Endpoint } from '../endpoint';
import { NetworkError, TimeoutError } from '../errors';
import { RequestExecutor } from '../executor';
import type { RequestExecutorOptions } from '../executor';
import { DefaultRequestInterceptor } from '../interceptor';
import { Session } from '../session';
import type { SessionStore, TokenSession } from '../session';
import type { HttpTransport, Logger, RawHttpResponse } from '../types';

const encoder = new TextEncoder();

const jsonResponse = (status: number, body?: unknown): RawHttpResponse => ({
  status,
  headers: { 'content-type': 'application/json' },
  body: body === undefined ? new Uint8Array() : encoder.encode(JSON.stringify(body)),
});

/** Never settles on its own; rejects with the abort reason when the attempt is aborted. */
const hangingTransport: HttpTransport = (_request, signal) =>
  new Promise<RawHttpResponse>((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });

const productSchema = z.object({ id: z.string(), name: z.string(), price: z.number() });
const widgetSchema = z.object({ name: z.string(), price: z.number() });

const listProducts: Endpoint = { baseUrl: 'https://api.example.com', path: '/products', method: 'GET' };

async function captureError(promise: Promise<unknown>): Promise<NetworkError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof NetworkError) return error;
    throw error;
  }
  throw new Error('Expected the request to fail');
}

describe('RequestExecutor', () => {
  let logger: Logger;
  let sleep: ReturnType<typeof vi.fn>;
  let transport: Mock<HttpTransport>;

  beforeEach(() => {
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    sleep = vi.fn().mockResolvedValue(undefined);
    transport = vi.fn<HttpTransport>();
  });

  afterEach(() => {
    vi.clearAllMocks();
    vi.restoreAllMocks();
  });

  const createExecutor = (options: { session?: TokenSession } & RequestExecutorOptions = {}) =>
    new RequestExecutor({
      transport,
      logger,
      interceptor: new DefaultRequestInterceptor({ session: options.session, sleep, logger }),
      ...options,
    });

  it('decodes a product list', async () => {
    transport.mockResolvedValue(jsonResponse(200, [{ id: '1', name: 'Pen', price: 1.5 }]));
    const executor = createExecutor();

    const products = await executor.requestJson(listProducts, z.array(productSchema));

    expect(products).toHaveLength(1);
    expect(products[0]?.name).toBe('Pen');
    expect(transport).toHaveBeenCalledTimes(1);
    expect(transport.mock.calls[0]?.[0]).toMatchObject({
      method: 'GET',
      url: 'https://api.example.com/products',
      headers: { 'Content-Type': 'application/json' },
      cachePolicy: 'no-store',
    });
  });

  it('sends the encoded body and decodes the echoed value', async () => {
    transport.mockImplementation(async (request) => ({
      status: 201,
      headers: {},
      body: encoder.encode(request.body ?? ''),
    }));
    const executor = createExecutor();

    const widget = await executor.requestJson(
      { ...listProducts, method: 'POST', body: { name: 'Widget', price: 9.99 } },
      widgetSchema,
    );

    expect(widget).toEqual({ name: 'Widget', price: 9.99 });
    expect(transport.mock.calls[0]?.[0].body).toBe('{"name":"Widget","price":9.99}');
  });

  it('retries a 503 until the limit and then fails with server(503)', async () => {
    transport.mockResolvedValue(jsonResponse(503));
    const executor = createExecutor({ configuration: { retryLimit: 2 } });

    const error = await captureError(executor.requestJson(listProducts, productSchema));

    expect(error.kind).toBe('server');
    expect(error.status).toBe(503);
    expect(transport).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('uses the lower of the endpoint and configured retry limits', async () => {
    transport.mockResolvedValue(jsonResponse(502));
    const executor = createExecutor({ configuration: { retryLimit: 3 } });

    await captureError(executor.requestJson({ ...listProducts, retryLimit: 1 }, productSchema));

    expect(transport).toHaveBeenCalledTimes(2);
  });

  it('recovers once a retried request succeeds', async () => {
    transport
      .mockResolvedValueOnce(jsonResponse(500))
      .mockResolvedValueOnce(jsonResponse(200, { id: '2', name: 'Pencil', price: 0.5 }));
    const executor = createExecutor();

    await expect(executor.requestJson(listProducts, productSchema)).resolves.toEqual({
      id: '2',
      name: 'Pencil',
      price: 0.5,
    });
    expect(transport).toHaveBeenCalledTimes(2);
  });

  it('refreshes the token on a 401 and retries with the new one', async () => {
    const refresher = vi.fn().mockResolvedValue('new-access');
    const session = new Session({ refresher });
    await session.setTokens('old-access', 'test-refresh');
    transport
      .mockResolvedValueOnce(jsonResponse(401))
      .mockResolvedValueOnce(jsonResponse(200, { id: '1', name: 'Pen', price: 1.5 }));
    const executor = createExecutor({ session });

    const product = await executor.requestJson(listProducts, productSchema);

    expect(product.name).toBe('Pen');
    expect(transport).toHaveBeenCalledTimes(2);
    expect(refresher).toHaveBeenCalledTimes(1);
    expect(transport.mock.calls[0]?.[0].headers.Authorization).toBe('Bearer old-access');
    expect(transport.mock.calls[1]?.[0].headers.Authorization).toBe('Bearer new-access');
  });

  it('fails with unauthorized after one send when there is no refresh token', async () => {
    const session: TokenSession = {
      getAccessToken: vi.fn(() => 'stale-access'),
      getRefreshToken: vi.fn(() => undefined),
      setTokens: vi.fn(),
      clearTokens: vi.fn(),
      refreshAccessToken: vi.fn(),
    };
    transport.mockResolvedValue(jsonResponse(401));
    const executor = createExecutor({ session });

    const error = await captureError(executor.requestJson(listProducts, productSchema));

    expect(error.kind).toBe('unauthorized');
    expect(transport).toHaveBeenCalledTimes(1);
    expect(session.clearTokens).toHaveBeenCalledTimes(1);
  });

  it('refreshes at most once per call', async () => {
    const refresher = vi.fn().mockResolvedValue('new-access');
    const session = new Session({ refresher });
    await session.setTokens('old-access', 'test-refresh');
    transport.mockResolvedValue(jsonResponse(401));
    const executor = createExecutor({ session });

    const error = await captureError(executor.requestJson(listProducts, productSchema));

    expect(error.kind).toBe('unauthorized');
    expect(refresher).toHaveBeenCalledTimes(1);
    expect(transport).toHaveBeenCalledTimes(2);
  });

  it('does not retry client errors', async () => {
    transport.mockResolvedValue(jsonResponse(404));
    const executor = createExecutor();

    const error = await captureError(executor.requestJson(listProducts, productSchema));

    expect(error.kind).toBe('not_found');
    expect(transport).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('does not retry decoding failures', async () => {
    transport.mockResolvedValue(jsonResponse(200, { id: 1 }));
    const executor = createExecutor();

    const error = await captureError(executor.requestJson(listProducts, productSchema));

    expect(error.kind).toBe('decoding');
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('fails with no_data for an empty successful body', async () => {
    transport.mockResolvedValue(jsonResponse(200));
    const executor = createExecutor();

    const error = await captureError(executor.requestJson(listProducts, productSchema));

    expect(error.kind).toBe('no_data');
  });

  it('fails with invalid_url without sending when the base URL is missing', async () => {
    const executor = createExecutor();

    const error = await captureError(executor.requestJson({ path: '/products', method: 'GET' }, productSchema));

    expect(error.kind).toBe('invalid_url');
    expect(transport).not.toHaveBeenCalled();
  });

  it('times out a send and retries it', async () => {
    transport
      .mockImplementationOnce(hangingTransport)
      .mockResolvedValueOnce(jsonResponse(200, { id: '1', name: 'Pen', price: 1.5 }));
    const executor = createExecutor();

    const product = await executor.requestJson({ ...listProducts, timeoutMs: 20 }, productSchema);

    expect(product.id).toBe('1');
    expect(transport).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith('http.request.attempt.failed', {
      url: 'https://api.example.com/products',
      attempt: 1,
      error: 'Request timed out after 20ms',
    });
  });

  it('surfaces the last timeout as a network failure once retries run out', async () => {
    transport.mockImplementation(hangingTransport);
    const executor = createExecutor({ configuration: { retryLimit: 0 } });

    const error = await captureError(executor.requestJson({ ...listProducts, timeoutMs: 20 }, productSchema));

    expect(error.kind).toBe('network_failure');
    expect(error.message).toBe('Network failure: Request timed out after 20ms');
    expect(error.cause).toBeInstanceOf(TimeoutError);
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('does not retry unclassified transport failures', async () => {
    transport.mockRejectedValue(new Error('boom'));
    const executor = createExecutor();

    const error = await captureError(executor.requestJson(listProducts, productSchema));

    expect(error.kind).toBe('network_failure');
    expect(error.message).toBe('Network failure: boom');
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('stops retrying when the overall deadline passes', async () => {
    transport.mockImplementation(hangingTransport);
    const executor = createExecutor({ configuration: { retryLimit: 3, overallTimeoutMs: 30 } });

    const error = await captureError(executor.requestJson(listProducts, productSchema));

    expect(error.kind).toBe('network_failure');
    expect(error.cause).toBeInstanceOf(TimeoutError);
    expect(transport.mock.calls.length).toBeLessThan(5);
  });

  describe('cancellation', () => {
    it('fails with cancelled without sending when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const executor = createExecutor();

      const error = await captureError(executor.requestJson(listProducts, productSchema, { signal: controller.signal }));

      expect(error.kind).toBe('cancelled');
      expect(transport).not.toHaveBeenCalled();
    });

    it('fails with cancelled and sends nothing more when aborted during backoff', async () => {
      const controller = new AbortController();
      transport.mockImplementation(async () => {
        setTimeout(() => controller.abort(), 10);
        return jsonResponse(503);
      });
      const executor = new RequestExecutor({
        transport,
        interceptor: new DefaultRequestInterceptor({ retryDelayMs: 60_000 }),
      });

      const error = await captureError(executor.requestJson(listProducts, productSchema, { signal: controller.signal }));

      expect(error.kind).toBe('cancelled');
      expect(transport).toHaveBeenCalledTimes(1);
    });

    it('fails with cancelled when aborted while a send is in flight', async () => {
      const controller = new AbortController();
      transport.mockImplementation((request, signal) => {
        setTimeout(() => controller.abort(), 10);
        return hangingTransport(request, signal);
      });
      const executor = createExecutor();

      const error = await captureError(executor.requestJson(listProducts, productSchema, { signal: controller.signal }));

      expect(error.kind).toBe('cancelled');
      expect(transport).toHaveBeenCalledTimes(1);
    });

    it('fails with cancelled while a token refresh is still pending', async () => {
      const controller = new AbortController();
      let finishRefresh: (token: string) => void = () => undefined;
      const refresher = vi.fn(
        () =>
          new Promise<string>((resolve) => {
            finishRefresh = resolve;
          }),
      );
      const session = new Session({ refresher });
      await session.setTokens('old-access', 'test-refresh');
      transport.mockImplementation(async () => {
        setTimeout(() => controller.abort(), 10);
        return jsonResponse(401);
      });
      const executor = createExecutor({ session });

      const error = await captureError(executor.requestJson(listProducts, productSchema, { signal: controller.signal }));

      expect(error.kind).toBe('cancelled');
      expect(transport).toHaveBeenCalledTimes(1);
      expect(refresher).toHaveBeenCalledTimes(1);

      finishRefresh('new-access');
      await vi.waitFor(() => expect(session.getAccessToken()).toBe('new-access'));
    });
  });

  describe('text and void requests', () => {
    it('returns the raw body as text', async () => {
      transport.mockResolvedValue({ status: 200, headers: {}, body: encoder.encode('pong') });
      const executor = createExecutor();

      await expect(executor.requestText({ ...listProducts, path: '/ping' })).resolves.toBe('pong');
    });

    it('accepts an empty body for void requests', async () => {
      transport.mockResolvedValue(jsonResponse(204));
      const executor = createExecutor();

      await expect(executor.requestVoid({ ...listProducts, method: 'DELETE' })).resolves.toBeUndefined();
    });
  });

  describe('logging', () => {
    it('logs a successful call', async () => {
      transport.mockResolvedValue(jsonResponse(200, { id: '1', name: 'Pen', price: 1.5 }));
      const executor = createExecutor();

      await executor.requestJson(listProducts, productSchema);

      expect(logger.info).toHaveBeenCalledWith(
        'http.request.success',
        expect.objectContaining({ method: 'GET', url: 'https://api.example.com/products', status: 200, sends: 1 }),
      );
    });

    it('logs a failed call with its error kind', async () => {
      transport.mockResolvedValue(jsonResponse(404));
      const executor = createExecutor();

      await captureError(executor.requestJson(listProducts, productSchema));

      expect(logger.error).toHaveBeenCalledWith(
        'http.request.failed',
        expect.objectContaining({
          method: 'GET',
          path: '/products',
          kind: 'not_found',
          status: 404,
          error: 'Resource not found',
        }),
      );
    });

    it('redacts the bearer token in attempt logs', async () => {
      const session = new Session();
      await session.setTokens('test-access', 'test-refresh');
      transport.mockResolvedValue(jsonResponse(204));
      const executor = createExecutor({ session });

      await executor.requestVoid(listProducts);

      expect(logger.debug).toHaveBeenCalledWith(
        'http.request.attempt',
        expect.objectContaining({ headers: { 'Content-Type': 'application/json', Authorization: '[redacted]' } }),
      );
    });

    it('stays silent for endpoints with logging disabled', async () => {
      transport.mockResolvedValue(jsonResponse(200, { id: '1', name: 'Pen', price: 1.5 }));
      const executor = createExecutor();

      await executor.requestJson({ ...listProducts, loggingEnabled: false }, productSchema);

      expect(logger.debug).not.toHaveBeenCalled();
      expect(logger.info).not.toHaveBeenCalled();
    });
  });
  describe('session store failures', () => {
    it('still fails with unauthorized when clearing the store fails', async () => {
      const session: TokenSession = {
        getAccessToken: vi.fn(() => 'stale-access'),
        getRefreshToken: vi.fn(() => undefined),
        setTokens: vi.fn(),
        clearTokens: vi.fn().mockRejectedValue(new Error('disk full')),
        refreshAccessToken: vi.fn(),
      };
      transport.mockResolvedValue(jsonResponse(401));
      const executor = createExecutor({ session });

      const error = await captureError(executor.requestJson(listProducts, productSchema));

      expect(error.kind).toBe('unauthorized');
      expect(transport).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith('http.session.persist.failed', { action: 'clear', error: 'disk full' });
    });

    it('retries with the refreshed token when saving it fails', async () => {
      const store: SessionStore = {
        load: vi.fn().mockResolvedValue(undefined),
        save: vi.fn().mockResolvedValueOnce(undefined).mockRejectedValue(new Error('disk full')),
        clear: vi.fn().mockResolvedValue(undefined),
      };
      const session = new Session({ store, refresher: vi.fn().mockResolvedValue('new-access') });
      await session.setTokens('old-access', 'test-refresh');
      transport
        .mockResolvedValueOnce(jsonResponse(401))
        .mockResolvedValueOnce(jsonResponse(200, { id: '1', name: 'Pen', price: 1.5 }));
      const executor = createExecutor({ session });

      const product = await executor.requestJson(listProducts, productSchema);

      expect(product.name).toBe('Pen');
      expect(transport).toHaveBeenCalledTimes(2);
      expect(transport.mock.calls[1]?.[0].headers.Authorization).toBe('Bearer new-access');
      expect(logger.warn).toHaveBeenCalledWith('http.session.persist.failed', { action: 'set', error: 'disk full' });
    });
  });

  it('waits the configured delay with the default interceptor', async () => {
    transport
      .mockResolvedValueOnce(jsonResponse(503))
      .mockResolvedValueOnce(jsonResponse(200, { id: '1', name: 'Pen', price: 1.5 }));
    const executor = new RequestExecutor({ transport, configuration: { retryLimit: 1, retryDelayMs: 0 } });

    await expect(executor.requestJson(listProducts, productSchema)).resolves.toMatchObject({ name: 'Pen' });
    expect(transport).toHaveBeenCalledTimes(2);
  });
});
