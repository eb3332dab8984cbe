/**
 * Plain-object helpers shared by the config loader and variable sources
 * @module utils/objects
 */

/**
 * Narrow an unknown value to a plain (non-array, non-null) object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Recursively remove undefined values and empty nested objects
 */
export function filterUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) {
      continue;
    }
    if (isRecord(value)) {
      const filtered = filterUndefined(value);
      if (Object.keys(filtered).length > 0) {
        result[key] = filtered;
      }
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Deep merge `source` into `target`, with source overwriting target
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (sourceValue === undefined) {
      continue;
    }

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      deepMerge(targetValue, sourceValue);
    } else if (isRecord(sourceValue)) {
      const copy: Record<string, unknown> = {};
      deepMerge(copy, sourceValue);
      target[key] = copy;
    } else {
      target[key] = sourceValue;
    }
  }
}
