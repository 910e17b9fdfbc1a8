/**
 * Bounded LRU over Map insertion order.
 *
 * A hit re-inserts the entry so the first key in the map is always the least
 * recently used; set() evicts from the front until the size fits.
 */
export class LruCache<K, V> {
  #maxEntries: number;
  #entries = new Map<K, { value: V }>();

  constructor(maxEntries: number) {
    this.#maxEntries = Number.isInteger(maxEntries) && maxEntries > 0 ? maxEntries : 1;
  }

  get size(): number {
    return this.#entries.size;
  }

  get capacity(): number {
    return this.#maxEntries;
  }

  has(key: K): boolean {
    return this.#entries.has(key);
  }

  get(key: K): V | undefined {
    const hit = this.#entries.get(key);
    if (hit === undefined) return undefined;
    this.#entries.delete(key);
    this.#entries.set(key, hit);
    return hit.value;
  }

  set(key: K, value: V): void {
    if (this.#entries.has(key)) {
      this.#entries.delete(key);
    }
    this.#entries.set(key, { value });
    while (this.#entries.size > this.#maxEntries) {
      const oldest = this.#entries.keys().next();
      if (oldest.done === true) break;
      this.#entries.delete(oldest.value);
    }
  }

  delete(key: K): boolean {
    return this.#entries.delete(key);
  }

  /** Drops every entry whose key matches; returns how many were dropped. */
  deleteWhere(match: (key: K) => boolean): number {
    let dropped = 0;
    for (const key of [...this.#entries.keys()]) {
      if (!match(key)) continue;
      this.#entries.delete(key);
      dropped++;
    }
    return dropped;
  }

  clear(): void {
    this.#entries.clear();
  }
}
