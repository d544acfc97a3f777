// Open-ended JSON values carried through the pipeline verbatim (alert properties, sensor payloads)

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && isJsonValue(value);
}

/**
 * Parses an MQTT/HTTP payload into a JSON object. Returns null for anything
 * that is not a JSON object (arrays, scalars, malformed text).
 */
export function parseJsonObject(raw: string | Buffer | JsonObject): JsonObject | null {
  if (typeof raw !== 'string' && !Buffer.isBuffer(raw)) return raw;
  let parsed: unknown;
  try {
    parsed = JSON.parse(typeof raw === 'string' ? raw : raw.toString('utf8'));
  } catch {
    return null;
  }
  return isJsonObject(parsed) ? parsed : null;
}
