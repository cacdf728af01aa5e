import { z } from 'zod';
import type { Endpoint } from './endpoint';
import type { RequestExecutor } from './executor';
import type { TokenRefresher } from './session';

/** Refresh responses carry `access_token`; keys arrive camelized. */
export const tokenResponseSchema = z.object({
  accessToken: z.string().min(1),
});

export interface EndpointTokenRefresherOptions {
  /**
   * Executor used for the refresh call. It must not inject the session's bearer
   * token, otherwise an expired token would be sent to the refresh endpoint.
   */
  executor: RequestExecutor;
  endpoint: (refreshToken: string) => Endpoint;
}

/**
 * Builds a {@link TokenRefresher} that posts the refresh token to an API endpoint.
 *
 * @example
 * ```typescript
 * const refresher = createEndpointTokenRefresher({
 *   executor: new RequestExecutor(),
 *   endpoint: (refreshToken) => ({
 *     baseUrl: 'https://auth.example.com',
 *     path: '/oauth/refresh',
 *     method: 'POST',
 *     body: { refresh_token: refreshToken },
 *     loggingEnabled: false,
 *   }),
 * });
 * ```
 */
export function createEndpointTokenRefresher(options: EndpointTokenRefresherOptions): TokenRefresher {
  return async (refreshToken: string) => {
    const response = await options.executor.requestJson(options.endpoint(refreshToken), tokenResponseSchema);
    return response.accessToken;
  };
}
