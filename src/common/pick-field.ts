import { JsonValue, isJsonObject } from './json';

/**
 * Resolves the first of `keys` holding a usable value in `record`.
 * `null`, `undefined` and `''` count as absent.
 */
export function pickField<D extends JsonValue>(
  record: unknown,
  keys: readonly string[],
  fallback: D,
): JsonValue | D {
  if (!isJsonObject(record)) {
    return fallback;
  }

  for (const key of keys) {
    const value = record[key];
    if (value !== undefined && value !== null && value !== '') {
      return value;
    }
  }

  return fallback;
}
