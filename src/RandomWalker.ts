import { GraphAccessor, membershipOf } from './GraphAccessor';
import { Rng, createRng, sampleIndices } from './Random';
import { Vertex } from './Vertex';
import { WalkerOptions, WalkerOptionsInput, parseWalkerOptions } from './WalkerOptions';

/**
 * Ordered hops of one walk, root first.
 * @public
 */
export type Walk = readonly Vertex[];

/**
 * Breadth-first random walk extraction.
 *
 * Each depth level extends every walk by a predicate hop and then an entity
 * hop. Walks that reach a vertex without outgoing edges stop growing but are
 * kept. When a level leaves more than `walksPerGraph` walks, a uniform sample
 * without replacement is kept, in breadth-first order.
 * @public
 */
export class RandomWalker {
  readonly depth: number;
  readonly walksPerGraph: number;
  readonly seed: number;

  /** Validated, defaulted options */
  protected readonly options: WalkerOptions;

  constructor(options: WalkerOptionsInput) {
    const parsed = parseWalkerOptions(options);
    this.options = parsed;
    this.depth = parsed.depth;
    this.walksPerGraph = parsed.walksPerGraph;
    this.seed = parsed.seed;
  }

  /**
   * Walks rooted at `root`, each holding at most 2 * depth + 1 vertices.
   *
   * @param rng - Sampling source; defaults to a fresh generator seeded with `seed`
   * @returns [] when the graph does not contain root, [[root]] when root has no outgoing edges
   */
  extractRandomWalks(graph: GraphAccessor, root: Vertex, rng: Rng = createRng(this.seed)): Walk[] {
    if (!membershipOf(graph)(root)) return [];
    return this.walkFrom(graph, root, rng);
  }

  /**
   * Walks from a root already known to be in the graph.
   */
  protected walkFrom(graph: GraphAccessor, root: Vertex, rng: Rng): Walk[] {
    let walks: Walk[] = [[root]];
    for (let level = 0; level < this.depth; level++) {
      // predicate hop, then entity hop
      walks = this.extendWalks(graph, this.extendWalks(graph, walks));

      if (walks.length > this.walksPerGraph) {
        const keep = sampleIndices(walks.length, this.walksPerGraph, rng);
        walks = keep.map(i => walks[i]);
      }
    }
    return walks;
  }

  private extendWalks(graph: GraphAccessor, walks: Walk[]): Walk[] {
    const extended: Walk[] = [];
    for (const walk of walks) {
      const neighbors = graph.neighbors(walk[walk.length - 1]);
      if (neighbors.length === 0) {
        extended.push(walk);
        continue;
      }
      for (const neighbor of neighbors) {
        extended.push([...walk, neighbor]);
      }
    }
    return extended;
  }
}
