/**
 * Returns a shallow copy of the provided record without any `undefined` values.
 *
 * Useful when building option bags for Node APIs from optional inputs: the
 * resulting object only carries the keys the caller actually provided.
 */
export function omitUndefinedEntries<
  T extends Record<string, unknown | undefined>,
>(entries: T): Partial<{ [K in keyof T]: Exclude<T[K], undefined> }> {
  const result: Partial<{ [K in keyof T]: Exclude<T[K], undefined> }> = {};
  for (const key of Object.keys(entries) as (keyof T)[]) {
    const value = entries[key];
    if (value !== undefined) {
      (result as Record<keyof T, unknown>)[key] = value as Exclude<T[typeof key], undefined>;
    }
  }
  return result;
}
