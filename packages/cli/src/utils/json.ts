// pattern: Functional Core

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Look up a dotted path (`info.version`) in parsed JSON.
 * Any missing step, or a step through a non-object, yields null.
 */
export function getPath(value: JsonValue, path: string): JsonValue {
  let current: JsonValue = value;
  for (const key of path.split(".")) {
    if (!isJsonObject(current)) {
      return null;
    }
    const next = current[key];
    if (next === undefined) {
      return null;
    }
    current = next;
  }
  return current;
}

/**
 * Build a function extracting several dotted paths at once, keyed by path
 */
export function pathsGetter(
  paths: readonly string[]
): (value: JsonValue) => JsonObject {
  return value => {
    const extracted: JsonObject = {};
    for (const path of paths) {
      extracted[path] = getPath(value, path);
    }
    return extracted;
  };
}
