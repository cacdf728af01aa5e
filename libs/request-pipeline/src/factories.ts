import { resolveConfiguration } from './configuration';
import type { NetworkConfigurationInput } from './configuration';
import { RequestExecutor } from './executor';
import { DefaultRequestInterceptor } from './interceptor';
import type { TokenSession } from './session';
import { fetchTransport } from './transport/fetchTransport';
import type { HttpTransport, Logger, LoggerMeta } from './types';

/**
 * Console logger implementation for use with the default factories.
 * Logs to console.debug, console.info, console.warn, and console.error.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, meta?: LoggerMeta): void {
    console.debug(message, meta);
  }
  info(message: string, meta?: LoggerMeta): void {
    console.info(message, meta);
  }
  warn(message: string, meta?: LoggerMeta): void {
    console.warn(message, meta);
  }
  error(message: string, meta?: LoggerMeta): void {
    console.error(message, meta);
  }
}

export interface DefaultRequestExecutorConfig {
  session?: TokenSession;
  transport?: HttpTransport;
  configuration?: NetworkConfigurationInput;
  /** Optional override for the console logger. */
  logger?: Logger;
}

/**
 * Creates a RequestExecutor with defaults suitable for most use cases.
 *
 * Defaults applied:
 * - Transport: fetch-based (via fetchTransport)
 * - Retries: 3, with a fixed 1s delay on 408/500/502/503/504 and lost connectivity
 * - Auth: bearer token from `config.session`, refreshed once on a 401
 * - Logger: console logger
 *
 * @example
 * ```typescript
 * const session = await Session.restore({ store: new FileSessionStore('.relaykit/session.json') });
 * const executor = createDefaultRequestExecutor({ session });
 * ```
 */
export function createDefaultRequestExecutor(config: DefaultRequestExecutorConfig = {}): RequestExecutor {
  const configuration = resolveConfiguration(config.configuration);
  const logger = config.logger ?? new ConsoleLogger();

  return new RequestExecutor({
    transport: config.transport ?? fetchTransport,
    configuration,
    logger,
    interceptor: new DefaultRequestInterceptor({
      session: config.session,
      retryDelayMs: configuration.retryDelayMs,
      logger,
    }),
  });
}
