import { Vertex } from './Vertex';
import { VertexSet } from './VertexMap';

/**
 * Read-only view of a knowledge graph consumed by the walkers.
 * Implementations must stay stable for the duration of one extraction call.
 * @public
 */
export interface GraphAccessor {
  /** Every vertex in the graph, entities and predicate occurrences alike */
  allVertices(): Iterable<Vertex>;

  /** Outgoing neighbors */
  neighbors(vertex: Vertex): readonly Vertex[];

  /** Incoming neighbors, used for relabeling */
  inverseNeighbors(vertex: Vertex): readonly Vertex[];

  /** Membership; answered from allVertices() when absent */
  hasVertex?(vertex: Vertex): boolean;

  /** Entity vertex with the given name; looked up in allVertices() when absent */
  getEntity?(name: string): Vertex | undefined;
}

/**
 * Membership test for the graph. Without `hasVertex`, allVertices() is indexed once.
 * @internal
 */
export function membershipOf(graph: GraphAccessor): (vertex: Vertex) => boolean {
  const hasVertex = graph.hasVertex?.bind(graph);
  if (hasVertex) return hasVertex;
  const members = new VertexSet(graph.allVertices());
  return vertex => members.has(vertex);
}

/**
 * Entity lookup by name. Without `getEntity`, the first non-predicate vertex
 * of each name in allVertices() is indexed once.
 * @internal
 */
export function entityLookupOf(graph: GraphAccessor): (name: string) => Vertex | undefined {
  const getEntity = graph.getEntity?.bind(graph);
  if (getEntity) return getEntity;
  const entities = new Map<string, Vertex>();
  for (const v of graph.allVertices()) {
    if (!v.isPredicate && !entities.has(v.name)) entities.set(v.name, v);
  }
  return name => entities.get(name);
}
