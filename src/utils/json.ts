export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Returns undefined for empty or non-JSON text. */
export function parseJsonSafe(text: string): unknown {
  if (text.trim() === '') {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function readString(source: unknown, key: string): string | undefined {
  if (!isJsonObject(source)) {
    return undefined;
  }
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

/** Follows `keys` through nested objects, returning undefined at the first gap. */
export function readPath(source: unknown, ...keys: string[]): unknown {
  let current: unknown = source;
  for (const key of keys) {
    if (!isJsonObject(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

export function objectList(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isJsonObject) : [];
}
