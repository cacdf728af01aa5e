import { isAbortError, toTransportError } from '../errors';
import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

export interface AxiosInstanceLike {
  request<T = unknown>(config: {
    url?: string;
    method?: string;
    headers?: Record<string, string>;
    data?: unknown;
    signal?: AbortSignal;
    responseType?: 'arraybuffer';
    validateStatus?: (status: number) => boolean;
  }): Promise<{
    status: number;
    headers: Record<string, unknown>;
    data: T;
  }>;
}

function toBytes(data: unknown): Uint8Array {
  if (data instanceof Uint8Array) return data;
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  if (typeof data === 'string') return new TextEncoder().encode(data);
  return new Uint8Array(0);
}

/**
 * axios-based HTTP transport.
 * Every status resolves so that validation and retries stay with the executor;
 * only failures without a response reject.
 */
export const createAxiosTransport = (axiosInstance: AxiosInstanceLike): HttpTransport => {
  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    let response: Awaited<ReturnType<AxiosInstanceLike['request']>>;
    try {
      response = await axiosInstance.request<ArrayBuffer>({
        url: req.url,
        method: req.method,
        headers: req.headers,
        data: req.body,
        signal,
        responseType: 'arraybuffer',
        validateStatus: () => true,
      });
    } catch (error) {
      if (signal.aborted || isAbortError(error)) {
        throw error;
      }
      throw toTransportError(error);
    }

    // Normalize headers to plain object
    const headers: HttpHeaders = {};
    for (const [key, value] of Object.entries(response.headers)) {
      if (value !== undefined && value !== null) {
        headers[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
      }
    }

    return {
      status: response.status,
      headers,
      body: toBytes(response.data),
    };
  };
};
