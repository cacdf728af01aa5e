import { z } from 'zod';
import { NetworkError } from './errors';

/** Any zod schema producing `T`, whatever its input shape. */
export type Decodable<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * ISO-8601 timestamp decoded into a `Date`.
 *
 * @example
 * ```typescript
 * const order = z.object({ id: z.string(), createdAt: isoDate });
 * ```
 */
export const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

/**
 * `order_id` → `orderId`, `user_ID` → `userId`, `User_Name` → `userName`. Leading and trailing underscores are kept
 * and keys without an inner underscore are returned unchanged.
 */
export function snakeToCamel(key: string): string {
  const match = /^(_*)(.*?)(_*)$/.exec(key);
  if (!match) return key;
  const [, leading = '', core = '', trailing = ''] = match;
  if (!core.includes('_')) return key;

  const [first = '', ...rest] = core.split('_').filter((part) => part.length > 0);
  const capitalized = rest.map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase());
  return `${leading}${first.toLowerCase()}${capitalized.join('')}${trailing}`;
}

export function camelizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(camelizeKeys);
  }
  if (typeof value === 'object' && value !== null) {
    // fromEntries defines own properties, so a `__proto__` key stays a plain key.
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [snakeToCamel(key), camelizeKeys(entry)]));
  }
  return value;
}

/**
 * Decodes a JSON response body: parse, convert snake_case keys, then validate with `schema`.
 *
 * @throws NetworkError `no_data` for an empty body, `decoding` for malformed JSON or a
 * schema mismatch
 */
export function decodeJsonBody<T>(body: Uint8Array, schema: Decodable<T>): T {
  if (body.byteLength === 0) {
    throw NetworkError.noData();
  }

  let payload: unknown;
  try {
    payload = JSON.parse(new TextDecoder().decode(body));
  } catch (error) {
    throw NetworkError.decoding(error);
  }

  const parsed = schema.safeParse(camelizeKeys(payload));
  if (!parsed.success) {
    throw NetworkError.decoding(parsed.error);
  }
  return parsed.data;
}
