import { z } from 'zod';

/**
 * Strict JSON-serializable value type.
 * Session context and durable records hold only these, so snapshots round-trip
 * through storage without loss (no functions, class instances, Maps, Sets, ...).
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Throws a TypeError naming the offending path for functions, class instances,
 * undefined, non-finite numbers, Sets, Maps, etc.
 */
export function assertJsonValue(path: string, value: unknown): asserts value is JsonValue {
  if (value === null) return;
  const t = typeof value;
  if (t === 'string' || t === 'boolean') return;
  if (t === 'number') {
    if (Number.isFinite(value)) return;
    throw new TypeError(`${path}: numbers must be finite`);
  }
  if (Array.isArray(value)) {
    value.forEach((item: unknown, i) => assertJsonValue(`${path}[${i}]`, item));
    return;
  }
  if (typeof value === 'object' && isPlainObject(value)) {
    for (const [k, v] of Object.entries(value)) {
      assertJsonValue(`${path}.${k}`, v);
    }
    return;
  }
  throw new TypeError(
    `${path}: value must be a JSON-serializable type (string, number, boolean, null, array, or plain object). Got: ${t}`
  );
}

export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema)
  ])
);

export const jsonObjectSchema = z.record(jsonValueSchema);
