/**
 * Deep-merge helpers for protocol frames.
 *
 * @module
 */

/** Narrows an unknown value to a plain string-keyed object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface MergeOptions {
  /**
   * When set, keys of the patch that the base does not already have are
   * dropped instead of added. Applies at every nesting level.
   */
  noNewField?: boolean;
}

/**
 * Recursively merges `patch` into a copy of `base`.
 *
 * Nested objects are merged key by key; any other patch value (arrays
 * included) replaces the base value. `undefined` in the patch leaves the base
 * value untouched. Neither argument is mutated.
 */
export function deepMerge(
  base: Record<string, unknown>,
  patch: Record<string, unknown>,
  options: MergeOptions = {},
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;

    if (!Object.hasOwn(result, key)) {
      if (options.noNewField) continue;
      result[key] = value;
      continue;
    }

    const current = result[key];
    result[key] = isRecord(current) && isRecord(value)
      ? deepMerge(current, value, options)
      : value;
  }

  return result;
}
