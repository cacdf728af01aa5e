import { z } from 'zod';

export const networkConfigurationSchema = z.object({
  /** Upper bound on retries for every endpoint; endpoints may only lower it. */
  retryLimit: z.number().int().min(0).default(3),
  /** Fixed wait between a failed attempt and the next one. */
  retryDelayMs: z.number().int().min(0).default(1_000),
  /** Wall-clock budget across all attempts of one call. Unbounded when unset. */
  overallTimeoutMs: z.number().int().positive().optional(),
});

export type NetworkConfiguration = z.output<typeof networkConfigurationSchema>;
export type NetworkConfigurationInput = z.input<typeof networkConfigurationSchema>;

export const DEFAULT_NETWORK_CONFIGURATION: NetworkConfiguration = networkConfigurationSchema.parse({});

/**
 * @throws ZodError when a value is out of range
 */
export function resolveConfiguration(input: NetworkConfigurationInput = {}): NetworkConfiguration {
  return networkConfigurationSchema.parse(input);
}

const envSchema = z.object({
  HTTP_RETRY_LIMIT: z.coerce.number().int().min(0).optional(),
  HTTP_RETRY_DELAY_MS: z.coerce.number().int().min(0).optional(),
  HTTP_OVERALL_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

/**
 * Reads `HTTP_RETRY_LIMIT`, `HTTP_RETRY_DELAY_MS` and `HTTP_OVERALL_TIMEOUT_MS`.
 * Unset or empty variables keep their defaults.
 */
export function configurationFromEnv(env: Record<string, string | undefined> = process.env): NetworkConfiguration {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('HTTP_') && value !== undefined && value.trim() !== ''),
  );
  const parsed = envSchema.parse(present);
  return resolveConfiguration({
    retryLimit: parsed.HTTP_RETRY_LIMIT,
    retryDelayMs: parsed.HTTP_RETRY_DELAY_MS,
    overallTimeoutMs: parsed.HTTP_OVERALL_TIMEOUT_MS,
  });
}
