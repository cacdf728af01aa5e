import { z } from 'zod';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

/**
 * Serializes a request body. The value is checked against the JSON value schema first,
 * because `JSON.stringify` silently rewrites `NaN` as `null` and drops `undefined` members.
 *
 * @throws a ZodError listing the offending paths, or the error raised while walking a cyclic value
 */
export function encodeJsonBody(body: unknown): string {
  const parsed = jsonObjectSchema.safeParse(body);
  if (!parsed.success) {
    throw parsed.error;
  }
  return JSON.stringify(parsed.data);
}

export function prettyPrintJson(text: string): string {
  try {
    return JSON.stringify(JSON.parse(text), null, 2);
  } catch {
    return text;
  }
}
