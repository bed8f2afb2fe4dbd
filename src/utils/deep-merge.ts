/**
 * Plain-object check: arrays and null are values, not branches
 */
export function isPlainObject(item: unknown): item is Record<string, unknown> {
  return typeof item === 'object' && item !== null && !Array.isArray(item);
}

/**
 * Merge layers left to right; later layers win.
 *
 * Nested objects are merged key by key. `undefined` never overrides, so an
 * unset CLI flag leaves the config file value in place.
 */
export function deepMerge(...layers: Array<Record<string, unknown> | undefined>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const layer of layers) {
    if (!layer) continue;

    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;

      const existing = result[key];
      result[key] = isPlainObject(value) && isPlainObject(existing) ? deepMerge(existing, value) : value;
    }
  }

  return result;
}
