import { createToken } from '@relaykit/dependency-registry';
import type { Registry } from '@relaykit/dependency-registry';
import { resolveConfiguration } from './configuration';
import type { NetworkConfiguration, NetworkConfigurationInput } from './configuration';
import { RequestExecutor } from './executor';
import { DefaultRequestInterceptor } from './interceptor';
import type { RequestInterceptor } from './interceptor';
import { Session } from './session';
import type { TokenSession } from './session';
import { fetchTransport } from './transport/fetchTransport';
import type { HttpTransport, Logger } from './types';
import { ConsoleLogger } from './factories';

export const NetworkingKeys = {
  configuration: createToken<NetworkConfiguration>('networking.configuration'),
  logger: createToken<Logger>('networking.logger'),
  transport: createToken<HttpTransport>('networking.transport'),
  session: createToken<TokenSession>('networking.session'),
  interceptor: createToken<RequestInterceptor>('networking.interceptor'),
  executor: createToken<RequestExecutor>('networking.executor'),
} as const;

export interface NetworkingModuleOptions {
  configuration?: NetworkConfigurationInput;
  logger?: Logger;
  transport?: HttpTransport;
  /** Defaults to an in-memory {@link Session} without a refresher. */
  session?: TokenSession;
}

/**
 * Registers the request pipeline in `registry`. Values passed in `options` are
 * registered eagerly; the interceptor and executor are created on first resolution
 * from whatever is registered under the other keys at that time.
 */
export function registerNetworking(registry: Registry, options: NetworkingModuleOptions = {}): Registry {
  const logger = options.logger ?? new ConsoleLogger();

  registry
    .register(resolveConfiguration(options.configuration), NetworkingKeys.configuration)
    .register(logger, NetworkingKeys.logger)
    .register(options.transport ?? fetchTransport, NetworkingKeys.transport)
    .register(options.session ?? new Session({ logger }), NetworkingKeys.session)
    .registerFactory(NetworkingKeys.interceptor, (r) =>
      new DefaultRequestInterceptor({
        session: r.resolve(NetworkingKeys.session),
        retryDelayMs: r.resolve(NetworkingKeys.configuration).retryDelayMs,
        logger: r.resolve(NetworkingKeys.logger),
      }),
    )
    .registerFactory(NetworkingKeys.executor, (r) =>
      new RequestExecutor({
        configuration: r.resolve(NetworkingKeys.configuration),
        transport: r.resolve(NetworkingKeys.transport),
        interceptor: r.resolve(NetworkingKeys.interceptor),
        logger: r.resolve(NetworkingKeys.logger),
      }),
    );

  return registry;
}
