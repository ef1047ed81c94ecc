import { GraphAccessor } from './GraphAccessor';
import { Vertex } from './Vertex';
import { VertexMap, VertexSet } from './VertexMap';
import { VertexRegistry } from './VertexRegistry';

/**
 * In-memory knowledge graph.
 *
 * Triples are stored as two edges through a predicate vertex:
 *   subject --> predicate --> object
 * so walks alternate entity / predicate / entity hops.
 *
 * @example
 * ```typescript
 * const kg = new KnowledgeGraph();
 * kg.addTriple('Alice', 'knows', 'Bob');
 * kg.neighbors(kg.entity('Alice')); // [Vertex(knows, predicate #2)]
 * ```
 * @public
 */
export class KnowledgeGraph implements GraphAccessor {
  readonly registry: VertexRegistry;

  private vertices = new VertexSet();
  private entities = new Map<string, Vertex>();
  private outgoing = new VertexMap<VertexSet>();
  private incoming = new VertexMap<VertexSet>();

  constructor(registry: VertexRegistry = new VertexRegistry()) {
    this.registry = registry;
  }

  /**
   * Entity vertex with this name, created and added when absent.
   */
  entity(name: string): Vertex {
    const existing = this.entities.get(name);
    if (existing) return existing;
    const vertex = this.registry.create(name);
    this.addVertex(vertex);
    return vertex;
  }

  addVertex(vertex: Vertex): void {
    if (this.vertices.has(vertex)) return;
    this.vertices.add(vertex);
    if (!vertex.isPredicate) {
      this.entities.set(vertex.name, vertex);
    }
  }

  /**
   * Add a directed edge. Both endpoints are added as vertices; duplicate edges are ignored.
   */
  addEdge(from: Vertex, to: Vertex): void {
    this.addVertex(from);
    this.addVertex(to);
    this.edgesOf(this.outgoing, from).add(to);
    this.edgesOf(this.incoming, to).add(from);
  }

  /**
   * @returns true if an edge was removed
   */
  removeEdge(from: Vertex, to: Vertex): boolean {
    const removed = this.outgoing.get(from)?.delete(to) ?? false;
    if (removed) {
      this.incoming.get(to)?.delete(from);
    }
    return removed;
  }

  /**
   * Add (subject, predicate, object) as subject --> predicate --> object.
   * Subject and object are interned by name; the predicate gets a fresh occurrence.
   * All three vertices are resolved before the graph changes, so a failure leaves it untouched.
   * @returns The new predicate vertex
   */
  addTriple(subject: string, predicate: string, object: string): Vertex {
    const subj = this.entities.get(subject) ?? this.registry.create(subject);
    const obj = object === subject ? subj : this.entities.get(object) ?? this.registry.create(object);
    const pred = this.registry.create(predicate, { isPredicate: true, previous: subj, next: obj });
    this.addEdge(subj, pred);
    this.addEdge(pred, obj);
    return pred;
  }

  allVertices(): Iterable<Vertex> {
    return this.vertices;
  }

  neighbors(vertex: Vertex): readonly Vertex[] {
    const edges = this.outgoing.get(vertex);
    return edges ? Array.from(edges) : [];
  }

  inverseNeighbors(vertex: Vertex): readonly Vertex[] {
    const edges = this.incoming.get(vertex);
    return edges ? Array.from(edges) : [];
  }

  hasVertex(vertex: Vertex): boolean {
    return this.vertices.has(vertex);
  }

  getEntity(name: string): Vertex | undefined {
    return this.entities.get(name);
  }

  get vertexCount(): number {
    return this.vertices.size;
  }

  get entityCount(): number {
    return this.entities.size;
  }

  private edgesOf(index: VertexMap<VertexSet>, vertex: Vertex): VertexSet {
    let edges = index.get(vertex);
    if (!edges) {
      edges = new VertexSet();
      index.set(vertex, edges);
    }
    return edges;
  }
}

/**
 * Build a graph from (subject, predicate, object) name triples.
 * @public
 */
export function graphFromTriples(triples: Iterable<readonly [string, string, string]>): KnowledgeGraph {
  const kg = new KnowledgeGraph();
  for (const [subject, predicate, object] of triples) {
    kg.addTriple(subject, predicate, object);
  }
  return kg;
}
