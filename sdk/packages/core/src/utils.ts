export interface KeyConversionOptions {
  /**
   * Keys whose object values hold caller data (e.g. participant attributes).
   * The key itself is converted, the keys of its value are kept verbatim.
   */
  preserveChildKeys?: readonly string[];
}

/** Convert a camelCase string to snake_case */
export function camelToSnake(str: string): string {
  return str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

/** Convert a snake_case string to camelCase */
export function snakeToCamel(str: string): string {
  return str.replace(/_([a-z0-9])/g, (_, char: string) => char.toUpperCase());
}

export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function convertKeys(
  obj: unknown,
  convert: (key: string) => string,
  options: KeyConversionOptions,
): unknown {
  if (obj === null || obj === undefined) return obj;
  if (Array.isArray(obj)) {
    return obj.map((item) => convertKeys(item, convert, options));
  }
  if (isPlainObject(obj)) {
    const preserved = options.preserveChildKeys ?? [];
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[convert(key)] =
        preserved.includes(key) && isPlainObject(value)
          ? { ...value }
          : convertKeys(value, convert, options);
    }
    return result;
  }
  return obj;
}

/** Recursively convert all object keys to snake_case */
export function toSnakeCase(
  obj: unknown,
  options: KeyConversionOptions = {},
): unknown {
  return convertKeys(obj, camelToSnake, options);
}

/** Recursively convert all object keys to camelCase */
export function toCamelCase(
  obj: unknown,
  options: KeyConversionOptions = {},
): unknown {
  return convertKeys(obj, snakeToCamel, options);
}

/**
 * Recursively drop `undefined` and `null` values from objects.
 * Absent array elements are removed as well.
 */
export function pruneAbsent(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj
      .filter((item) => item !== null && item !== undefined)
      .map(pruneAbsent);
  }
  if (isPlainObject(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value === null || value === undefined) continue;
      result[key] = pruneAbsent(value);
    }
    return result;
  }
  return obj;
}
