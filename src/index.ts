export { CanonicalWalkSet, type CanonicalWalk } from './CanonicalWalkSet';
export { GraphError } from './errors';
export { type GraphAccessor } from './GraphAccessor';
export { KnowledgeGraph, graphFromTriples } from './KnowledgeGraph';
export { createRng, type Rng } from './Random';
export { RandomWalker, type Walk } from './RandomWalker';
export { Vertex } from './Vertex';
export { VertexMap, VertexSet } from './VertexMap';
export { VertexRegistry, type CreateVertexOptions } from './VertexRegistry';
export { parseWalkerOptions, walkerOptionsSchema, type WalkerOptions, type WalkerOptionsInput } from './WalkerOptions';
export {
  LABEL_SEPARATOR,
  compositeLabel,
  md5Hex,
  relabelGraph,
  type InverseLabelMap,
  type LabelMap,
  type RelabelResult
} from './WeisfeilerLehman';
export { WeisfeilerLehmanWalker } from './WeisfeilerLehmanWalker';
