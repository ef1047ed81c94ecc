/**
 * A walk encoded for the embedding trainer: names at even positions,
 * round-specific labels at odd positions.
 * @public
 */
export type CanonicalWalk = readonly string[];

/**
 * Set of canonical walks with structural equality.
 * Walks are keyed by their JSON encoding, so labels stay opaque strings.
 * Iteration follows insertion order.
 * @public
 */
export class CanonicalWalkSet implements Iterable<CanonicalWalk> {
  private walks = new Map<string, CanonicalWalk>();

  /**
   * @returns true if the walk was not already present
   */
  add(walk: CanonicalWalk): boolean {
    const key = CanonicalWalkSet.keyOf(walk);
    if (this.walks.has(key)) return false;
    this.walks.set(key, Object.freeze([...walk]));
    return true;
  }

  has(walk: CanonicalWalk): boolean {
    return this.walks.has(CanonicalWalkSet.keyOf(walk));
  }

  get size(): number {
    return this.walks.size;
  }

  toArray(): CanonicalWalk[] {
    return Array.from(this.walks.values());
  }

  [Symbol.iterator](): IterableIterator<CanonicalWalk> {
    return this.walks.values();
  }

  static keyOf(walk: CanonicalWalk): string {
    return JSON.stringify(walk);
  }
}
