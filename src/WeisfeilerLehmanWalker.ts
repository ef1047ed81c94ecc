import { CanonicalWalk, CanonicalWalkSet } from './CanonicalWalkSet';
import { GraphAccessor, entityLookupOf, membershipOf } from './GraphAccessor';
import { RandomWalker, Walk } from './RandomWalker';
import { createRng } from './Random';
import { InverseLabelMap, LabelMap, RelabelResult, relabelGraph } from './WeisfeilerLehman';
import { WalkerOptionsInput } from './WalkerOptions';
import { GraphError } from './errors';
import { verboseLog } from './log';

/**
 * Random walks encoded with Weisfeiler-Lehman labels.
 *
 * Every raw walk is emitted once per round 0..wlIterations. Even positions
 * keep the raw vertex name; odd positions carry the round's label for that hop.
 *
 * @example
 * ```typescript
 * const kg = graphFromTriples([['A', 'p', 'B'], ['B', 'q', 'C']]);
 * const walker = new WeisfeilerLehmanWalker({ depth: 1, walksPerGraph: 10, wlIterations: 1 });
 * walker.extract(kg, ['A']).toArray();
 * // [['A', 'p', 'B'], ['A', '<round 1 label of p>', 'B']]
 * ```
 * @public
 */
export class WeisfeilerLehmanWalker extends RandomWalker {
  readonly wlIterations: number;

  private relabeled?: RelabelResult;

  constructor(options: WalkerOptionsInput) {
    super(options);
    this.wlIterations = this.options.wlIterations;
  }

  /**
   * Label map from the most recent relabeling.
   */
  get labelMap(): LabelMap {
    return this.requireRelabeled().labelMap;
  }

  get inverseLabelMap(): InverseLabelMap {
    return this.requireRelabeled().inverseLabelMap;
  }

  /**
   * Relabel the graph and keep the result for {@link canonicalize}.
   */
  relabel(graph: GraphAccessor): RelabelResult {
    this.relabeled = relabelGraph(graph, this.wlIterations);
    return this.relabeled;
  }

  /**
   * Encode one raw walk at one round.
   */
  canonicalize(walk: Walk, round: number): CanonicalWalk {
    const { labelMap } = this.requireRelabeled();
    return walk.map((hop, i) => {
      if (i % 2 === 0) return hop.name;
      const label = labelMap.get(hop)?.[round];
      if (label === undefined) {
        throw new GraphError(`No round ${round} label for ${hop.toString()}`);
      }
      return label;
    });
  }

  /**
   * Canonical walks rooted at the given instances, deduplicated across
   * instances, rounds and samples. Instances are matched to entity names as
   * strings; those that name no entity of the graph contribute nothing.
   */
  extract(graph: GraphAccessor, instances: readonly (string | number)[]): CanonicalWalkSet {
    const t0 = performance.now();
    this.relabel(graph);

    const rng = createRng(this.seed);
    const canonicalWalks = new CanonicalWalkSet();
    const lookupEntity = entityLookupOf(graph);
    const contains = membershipOf(graph);
    let rawWalkCount = 0;

    for (const instance of instances) {
      const root = lookupEntity(String(instance));
      if (!root || !contains(root)) continue;

      const walks = this.walkFrom(graph, root, rng);
      rawWalkCount += walks.length;
      for (let n = 0; n <= this.wlIterations; n++) {
        for (const walk of walks) {
          canonicalWalks.add(this.canonicalize(walk, n));
        }
      }
    }

    verboseLog('WeisfeilerLehmanWalker', `${instances.length} instances, ${rawWalkCount} raw walks, ${canonicalWalks.size} canonical walks in ${(performance.now() - t0).toFixed(1)}ms`);
    return canonicalWalks;
  }

  private requireRelabeled(): RelabelResult {
    if (!this.relabeled) {
      throw new GraphError('Graph has not been relabeled yet; call relabel() or extract() first');
    }
    return this.relabeled;
  }
}
