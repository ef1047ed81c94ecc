import { assert } from './errors';

/**
 * A vertex of a knowledge graph: either an entity or an occurrence of a predicate.
 *
 * Identity rules:
 * - Entities are interned by name. Two entities with the same name are equal
 *   and share a hash key, whatever their ids.
 * - Predicates carry positional identity. They are equal only when
 *   (id, previousId, nextId, name) all match, so in practice a predicate
 *   vertex only equals itself.
 * - Ordering looks at the name alone, for entities and predicates alike.
 *   It is intentionally not consistent with equality.
 *
 * Instances are frozen. Create them through a VertexRegistry, which issues ids
 * and resolves the previous/next back-references.
 * @public
 */
export class Vertex {
  /**
   * Entity name or predicate IRI.
   * @public
   */
  readonly name: string;

  /** @public */
  readonly isPredicate: boolean;

  /**
   * Unique within the issuing registry, never reused.
   * @public
   */
  readonly id: number;

  /**
   * Registry id of the subject a predicate vertex hangs off.
   * @public
   */
  readonly previousId?: number;

  /**
   * Registry id of the object a predicate vertex points to.
   * @public
   */
  readonly nextId?: number;

  /**
   * Cached hash key; see {@link Vertex.hash}.
   * @public
   */
  readonly hashKey: string;

  /** @internal */
  constructor(name: string, id: number, isPredicate = false, previousId?: number, nextId?: number) {
    assert(typeof name === 'string', `Invalid vertex name: ${String(name)}`);
    assert(typeof isPredicate === 'boolean', `Invalid predicate flag for vertex ${name}: ${String(isPredicate)}`);
    assert(Number.isInteger(id) && id >= 0, `Invalid vertex id for ${name}: ${id}`);
    assert(
      isPredicate || (previousId === undefined && nextId === undefined),
      `Entity vertex ${name} cannot have previous/next references`
    );

    this.name = name;
    this.isPredicate = isPredicate;
    this.id = id;
    if (previousId !== undefined) this.previousId = previousId;
    if (nextId !== undefined) this.nextId = nextId;
    this.hashKey = isPredicate
      ? JSON.stringify(['p', id, previousId ?? null, nextId ?? null, name])
      : JSON.stringify(['e', name]);
    Object.freeze(this);
  }

  /**
   * Equality per the identity rules above. Predicates and entities never compare equal.
   */
  equals(other: Vertex | null | undefined): boolean {
    if (other === null || other === undefined) return false;
    if (this.isPredicate !== other.isPredicate) return false;
    if (this.isPredicate) {
      return this.id === other.id &&
        this.previousId === other.previousId &&
        this.nextId === other.nextId &&
        this.name === other.name;
    }
    return this.name === other.name;
  }

  /**
   * Strict order on name only.
   */
  lessThan(other: Vertex): boolean {
    return this.name < other.name;
  }

  toString(): string {
    return this.isPredicate ? `Vertex(${this.name}, predicate #${this.id})` : `Vertex(${this.name})`;
  }

  static equals(a: Vertex | null | undefined, b: Vertex | null | undefined): boolean {
    if (a === null || a === undefined) return false;
    return a.equals(b);
  }

  static hash(v: Vertex): string {
    return v.hashKey;
  }

  static lessThan(a: Vertex, b: Vertex): boolean {
    return a.lessThan(b);
  }

  /**
   * Comparator matching {@link Vertex.lessThan}, for Array.prototype.sort.
   */
  static compare(a: Vertex, b: Vertex): number {
    if (a.name < b.name) return -1;
    if (a.name > b.name) return 1;
    return 0;
  }
}
