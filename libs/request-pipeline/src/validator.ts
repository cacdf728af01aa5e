import { camelizeKeys } from './decoding';
import { apiErrorSchema, NetworkError } from './errors';
import type { ApiError } from './errors';
import type { RawHttpResponse } from './types';

export interface ResponseValidator {
  /**
   * @throws NetworkError when the response does not represent success
   */
  validate(body: Uint8Array, response: RawHttpResponse): void;
}

export function isHttpResponse(response: RawHttpResponse): boolean {
  return Number.isInteger(response.status) && response.status >= 100 && response.status <= 599;
}

export class DefaultResponseValidator implements ResponseValidator {
  validate(body: Uint8Array, response: RawHttpResponse): void {
    if (!isHttpResponse(response)) {
      throw NetworkError.invalidResponse();
    }

    const { status } = response;
    if (status >= 200 && status <= 299) return;
    if (status === 400) throw NetworkError.badRequest(this.parseApiError(body));
    if (status === 401) throw NetworkError.unauthorized();
    if (status === 403) throw NetworkError.forbidden();
    if (status === 404) throw NetworkError.notFound();
    if (status >= 500 && status <= 599) throw NetworkError.server(status);
    throw NetworkError.unexpectedStatus(status);
  }

  private parseApiError(body: Uint8Array): ApiError | undefined {
    if (body.byteLength === 0) {
      return undefined;
    }
    let payload: unknown;
    try {
      payload = JSON.parse(new TextDecoder().decode(body));
    } catch {
      return undefined;
    }
    const parsed = apiErrorSchema.safeParse(camelizeKeys(payload));
    return parsed.success ? parsed.data : undefined;
  }
}
