/**
 * Atomic Map
 * Map with insert-if-absent as a primitive
 */

/**
 * Every operation completes synchronously, so no other caller can
 * interleave between the lookup and the write of putIfAbsent().
 */
export class AtomicMap<K, V> {
  private readonly map = new Map<K, V>();

  get size(): number {
    return this.map.size;
  }

  get(key: K): V | undefined {
    return this.map.get(key);
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  /** Store value, returning the previous one */
  set(key: K, value: V): V | undefined {
    const previous = this.map.get(key);
    this.map.set(key, value);
    return previous;
  }

  /** Store value unless the key is taken; returns whichever value is mapped afterwards */
  putIfAbsent(key: K, value: V): V {
    const existing = this.map.get(key);
    if (existing !== undefined) {
      return existing;
    }
    this.map.set(key, value);
    return value;
  }

  delete(key: K): boolean {
    return this.map.delete(key);
  }

  /** Remove every key mapped to value; returns the removed keys */
  deleteValue(value: V): K[] {
    const removed: K[] = [];
    for (const [key, mapped] of this.map) {
      if (mapped === value) {
        removed.push(key);
      }
    }
    for (const key of removed) {
      this.map.delete(key);
    }
    return removed;
  }

  values(): V[] {
    return [...this.map.values()];
  }
}
