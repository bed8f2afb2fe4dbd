import { z } from 'zod';

/**
 * Helper to create enum-like object with Zod schema
 * - Creates object with uppercase keys: DEBUG -> 'debug'
 * - Creates Zod schema for validation
 * - Infers TypeScript type as string literals
 * - Keeps declaration order, so `values` doubles as an ordered list
 *
 * @example
 * ```ts
 * const level = createEnum(['low', 'high'] as const);
 *
 * // level.object.LOW === 'low'
 * // level.schema - Zod schema
 * // level.is('high') === true
 * // typeof level.type === 'low' | 'high'
 * ```
 */
export function createEnum<const T extends readonly string[]>(values: T) {
  const obj = Object.fromEntries(values.map((v) => [v.toUpperCase(), v])) as Record<Uppercase<T[number]>, T[number]>;

  return {
    values,
    object: obj,
    schema: z.enum(values),
    type: null as unknown as T[number],
    is: (value: string): value is T[number] => values.includes(value),
  };
}
