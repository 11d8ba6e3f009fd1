export type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Follows `keys` through nested objects; undefined as soon as a step is missing. */
export function getPath(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isObject(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

export function getString(value: unknown, ...keys: string[]): string | undefined {
  const found = getPath(value, ...keys);
  return typeof found === 'string' ? found : undefined;
}

export function getNumber(value: unknown, ...keys: string[]): number | undefined {
  const found = getPath(value, ...keys);
  return typeof found === 'number' && Number.isFinite(found) ? found : undefined;
}

export function getArray(value: unknown, ...keys: string[]): unknown[] {
  const found = getPath(value, ...keys);
  return Array.isArray(found) ? found : [];
}
