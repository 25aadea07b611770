import { JsonObject, JsonValue, isJsonObject } from './json';

export const SECRET_KEYS: ReadonlySet<string> = new Set([
  'password',
  'integritySalt',
  'integrity_salt',
  'secret',
  'salt',
  'apiKey',
  'api_key',
]);

export const SECRET_MASK = '***';

/**
 * Returns a copy of `value` with every entry under a key in {@link SECRET_KEYS}
 * replaced by {@link SECRET_MASK}, at any depth. The input is never modified.
 */
export function sanitize(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(item => sanitize(item));
  }

  if (isJsonObject(value)) {
    const masked: JsonObject = {};
    for (const [key, child] of Object.entries(value)) {
      masked[key] = SECRET_KEYS.has(key) ? SECRET_MASK : sanitize(child);
    }
    return masked;
  }

  return value;
}
