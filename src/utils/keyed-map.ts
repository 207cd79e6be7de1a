/**
 * Map keyed by a composite struct. Two keys are equal when `keyOf` derives the
 * same string for them; the struct given on first insert is kept.
 */
export class KeyedMap<K, V> {
  private entriesByKey = new Map<string, { key: K; value: V }>();

  constructor(private keyOf: (key: K) => string) {}

  get(key: K): V | undefined {
    return this.entriesByKey.get(this.keyOf(key))?.value;
  }

  set(key: K, value: V): this {
    const derived = this.keyOf(key);
    const existing = this.entriesByKey.get(derived);
    this.entriesByKey.set(derived, { key: existing?.key ?? key, value });
    return this;
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  *entries(): IterableIterator<[K, V]> {
    for (const { key, value } of this.entriesByKey.values()) {
      yield [key, value];
    }
  }

  *values(): IterableIterator<V> {
    for (const { value } of this.entriesByKey.values()) {
      yield value;
    }
  }
}

/**
 * Derive a key string from the ordered field values of a struct
 */
export function tupleKey(values: readonly (string | number | null)[]): string {
  return JSON.stringify(values);
}
