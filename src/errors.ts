/**
 * Raised when a graph, vertex or label lookup is used in a way the library cannot honor.
 * @public
 */
export class GraphError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphError';
  }
}

export function assert(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new GraphError(message);
  }
}
