import { Vertex } from './Vertex';
import { GraphError, assert } from './errors';

export interface CreateVertexOptions {
  isPredicate?: boolean;
  /** Subject of the predicate edge (predicates only) */
  previous?: Vertex;
  /** Object of the predicate edge (predicates only) */
  next?: Vertex;
}

/**
 * Arena that issues vertex ids and resolves back-references.
 *
 * Each registry owns its own counter, starting at 0, so separate graph
 * construction sessions get reproducible ids.
 * Back-reference rules:
 * - previous/next are stored by id, never as object links
 * - the stored id is the canonical id for that vertex's identity: the id of
 *   the first vertex registered with the same hash key
 * @public
 */
export class VertexRegistry {
  private vertices: Vertex[] = [];
  private canonicalIds = new Map<string, number>();

  /**
   * Allocate a new vertex with a fresh id.
   */
  create(name: string, options: CreateVertexOptions = {}): Vertex {
    const { isPredicate = false, previous, next } = options;
    const previousId = previous === undefined ? undefined : this.canonicalIdOf(previous);
    const nextId = next === undefined ? undefined : this.canonicalIdOf(next);

    const vertex = new Vertex(name, this.vertices.length, isPredicate, previousId, nextId);
    this.vertices.push(vertex);
    if (!this.canonicalIds.has(vertex.hashKey)) {
      this.canonicalIds.set(vertex.hashKey, vertex.id);
    }
    return vertex;
  }

  /**
   * Get Vertex by ID
   */
  get(id: number): Vertex {
    const vertex = this.vertices[id];
    if (vertex === undefined) {
      throw new GraphError(`Vertex ${id} not registered`);
    }
    return vertex;
  }

  /**
   * Whether this exact vertex instance was issued by this registry.
   */
  owns(vertex: Vertex): boolean {
    return this.vertices[vertex.id] === vertex;
  }

  previousOf(vertex: Vertex): Vertex | undefined {
    return vertex.previousId === undefined ? undefined : this.get(vertex.previousId);
  }

  nextOf(vertex: Vertex): Vertex | undefined {
    return vertex.nextId === undefined ? undefined : this.get(vertex.nextId);
  }

  /**
   * Total number of vertices issued
   */
  get size(): number {
    return this.vertices.length;
  }

  private canonicalIdOf(vertex: Vertex): number {
    assert(this.owns(vertex), `${vertex.toString()} belongs to another registry`);
    const id = this.canonicalIds.get(vertex.hashKey);
    assert(id !== undefined, `${vertex.toString()} has no canonical id`);
    return id;
  }
}
