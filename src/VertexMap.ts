import { Vertex } from './Vertex';

/**
 * Map keyed by vertex identity (Vertex.hashKey), so equal entities share an entry.
 * Iteration follows insertion order; the stored key is the first vertex set.
 * @public
 */
export class VertexMap<T> {
  private entriesByKey = new Map<string, [Vertex, T]>();

  get(vertex: Vertex): T | undefined {
    return this.entriesByKey.get(vertex.hashKey)?.[1];
  }

  has(vertex: Vertex): boolean {
    return this.entriesByKey.has(vertex.hashKey);
  }

  set(vertex: Vertex, value: T): this {
    const existing = this.entriesByKey.get(vertex.hashKey);
    this.entriesByKey.set(vertex.hashKey, [existing ? existing[0] : vertex, value]);
    return this;
  }

  delete(vertex: Vertex): boolean {
    return this.entriesByKey.delete(vertex.hashKey);
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  *keys(): IterableIterator<Vertex> {
    for (const [vertex] of this.entriesByKey.values()) yield vertex;
  }

  *values(): IterableIterator<T> {
    for (const [, value] of this.entriesByKey.values()) yield value;
  }

  *entries(): IterableIterator<[Vertex, T]> {
    for (const [vertex, value] of this.entriesByKey.values()) yield [vertex, value];
  }

  [Symbol.iterator](): IterableIterator<[Vertex, T]> {
    return this.entries();
  }
}

/**
 * Set of vertices under the same identity rules as {@link VertexMap}.
 * @public
 */
export class VertexSet implements Iterable<Vertex> {
  private members = new VertexMap<true>();

  constructor(vertices: Iterable<Vertex> = []) {
    for (const v of vertices) this.add(v);
  }

  add(vertex: Vertex): this {
    this.members.set(vertex, true);
    return this;
  }

  has(vertex: Vertex): boolean {
    return this.members.has(vertex);
  }

  delete(vertex: Vertex): boolean {
    return this.members.delete(vertex);
  }

  get size(): number {
    return this.members.size;
  }

  [Symbol.iterator](): IterableIterator<Vertex> {
    return this.members.keys();
  }
}
