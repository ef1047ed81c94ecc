import { createHash } from 'crypto';
import { GraphAccessor } from './GraphAccessor';
import { Vertex } from './Vertex';
import { VertexMap, VertexSet } from './VertexMap';
import { GraphError } from './errors';
import { verboseLog } from './log';

/**
 * WEISFEILER-LEHMAN RELABELING
 *
 * Round 0: every vertex is labeled with its own name.
 * Round n: md5(own round n-1 label + "-" + sorted distinct round n-1 labels of
 * the inverse neighbors, joined by "-"), as lowercase hex.
 *
 * Sorting the distinct neighbor labels makes a label depend on the set of
 * neighbor labels only, never on how the accessor enumerates them.
 * A vertex without inverse neighbors gets md5(label + "-").
 *
 * @internal
 */

export const LABEL_SEPARATOR = '-';

/**
 * Labels per vertex, indexed by round (0..wlIterations).
 * @public
 */
export type LabelMap = VertexMap<readonly string[]>;

/**
 * Round per label, per vertex. Derived lookup only.
 * @public
 */
export type InverseLabelMap = VertexMap<ReadonlyMap<string, number>>;

export interface RelabelResult {
  labelMap: LabelMap;
  inverseLabelMap: InverseLabelMap;
}

export function md5Hex(text: string): string {
  return createHash('md5').update(text, 'utf8').digest('hex');
}

/**
 * Composite string hashed into the next-round label.
 */
export function compositeLabel(ownLabel: string, neighborLabels: Iterable<string>): string {
  const suffix = Array.from(new Set(neighborLabels))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .join(LABEL_SEPARATOR);
  return ownLabel + LABEL_SEPARATOR + suffix;
}

/**
 * Relabel every vertex of the graph for rounds 0..wlIterations.
 *
 * Each round reads a complete snapshot of the previous one, so round n never
 * sees partially updated round n data.
 *
 * @param graph - Read-only accessor; must not change during the call
 * @param wlIterations - Number of refinement rounds after round 0
 */
export function relabelGraph(graph: GraphAccessor, wlIterations: number): RelabelResult {
  const t0 = performance.now();
  const vertices: Vertex[] = Array.from(new VertexSet(graph.allVertices()));
  const labels = new VertexMap<string[]>();

  for (const v of vertices) {
    labels.set(v, [v.name]);
  }

  for (let n = 1; n <= wlIterations; n++) {
    const round: [Vertex, string][] = [];
    for (const v of vertices) {
      const own = labelAt(labels, v, n - 1);
      const neighborLabels = graph.inverseNeighbors(v).map(u => labelAt(labels, u, n - 1));
      round.push([v, md5Hex(compositeLabel(own, neighborLabels))]);
    }
    // barrier: publish round n only once it is complete
    for (const [v, label] of round) {
      labels.get(v)?.push(label);
    }
  }

  const inverseLabelMap = new VertexMap<Map<string, number>>();
  for (const [v, history] of labels) {
    const rounds = new Map<string, number>();
    history.forEach((label, n) => rounds.set(label, n));
    inverseLabelMap.set(v, rounds);
  }

  verboseLog('WeisfeilerLehman', `relabeled ${labels.size} vertices x ${wlIterations + 1} rounds in ${(performance.now() - t0).toFixed(1)}ms`);

  return { labelMap: labels, inverseLabelMap };
}

function labelAt(labels: VertexMap<string[]>, v: Vertex, n: number): string {
  const label = labels.get(v)?.[n];
  if (label === undefined) {
    throw new GraphError(`No round ${n} label for ${v.toString()}; is it missing from allVertices()?`);
  }
  return label;
}
