import { UnknownEntityError, UnknownRelationError } from '../types/errors.js';
import type { AttributeValue, Neighbor, NeighborDirection, Triple } from '../types/knowledge-base.js';

export type AttributeMap = Map<string, AttributeValue>;

/** `neighbor -> predicate -> attributes`, insertion ordered. */
type Adjacency = Map<string, Map<string, Map<string, AttributeMap>>>;

/**
 * Directed, attributed multigraph keyed by entity name. Two entities may be linked by
 * several predicates, but a `(subject, predicate, object)` triple has at most one edge.
 * The attribute maps returned here are live; node and edge handles read and write them.
 */
export class GraphStore {
  readonly #entities: Map<string, AttributeMap> = new Map();
  readonly #outgoing: Adjacency = new Map();
  readonly #incoming: Adjacency = new Map();
  #relationCount = 0;

  get entityCount(): number {
    return this.#entities.size;
  }

  get relationCount(): number {
    return this.#relationCount;
  }

  hasEntity(name: string): boolean {
    return this.#entities.has(name);
  }

  /** Returns true when the entity did not exist before. */
  addEntity(name: string): boolean {
    if (this.#entities.has(name)) {
      return false;
    }
    this.#entities.set(name, new Map());
    this.#outgoing.set(name, new Map());
    this.#incoming.set(name, new Map());
    return true;
  }

  hasRelation(subject: string, predicate: string, object: string): boolean {
    return this.#outgoing.get(subject)?.get(object)?.has(predicate) ?? false;
  }

  /** Adds both endpoints as needed. Returns true when the edge did not exist before. */
  addRelation(subject: string, predicate: string, object: string): boolean {
    this.addEntity(subject);
    this.addEntity(object);
    const forward = linksBetween(this.#outgoing, subject, object);
    if (forward.has(predicate)) {
      return false;
    }
    const attributes: AttributeMap = new Map();
    forward.set(predicate, attributes);
    linksBetween(this.#incoming, object, subject).set(predicate, attributes);
    this.#relationCount += 1;
    return true;
  }

  removeRelation(subject: string, predicate: string, object: string): boolean {
    const forward = this.#outgoing.get(subject)?.get(object);
    if (!forward?.delete(predicate)) {
      return false;
    }
    if (forward.size === 0) {
      this.#outgoing.get(subject)?.delete(object);
    }
    const backward = this.#incoming.get(object)?.get(subject);
    backward?.delete(predicate);
    if (backward?.size === 0) {
      this.#incoming.get(object)?.delete(subject);
    }
    this.#relationCount -= 1;
    return true;
  }

  entityAttributes(name: string): AttributeMap {
    const attributes = this.#entities.get(name);
    if (!attributes) {
      throw new UnknownEntityError(name);
    }
    return attributes;
  }

  relationAttributes(subject: string, predicate: string, object: string): AttributeMap {
    const attributes = this.#outgoing.get(subject)?.get(object)?.get(predicate);
    if (!attributes) {
      throw new UnknownRelationError(subject, predicate, object);
    }
    return attributes;
  }

  /**
   * Adjacent entities and the predicates linking them. `'out'` follows edges from
   * `name` as subject, `'in'` follows them backwards from `name` as object.
   */
  neighbors(name: string, direction: NeighborDirection = 'out'): Neighbor[] {
    const adjacency = direction === 'out' ? this.#outgoing : this.#incoming;
    const links = adjacency.get(name);
    if (!links) {
      throw new UnknownEntityError(name);
    }
    return [...links].map(([neighbor, predicates]) => ({
      name: neighbor,
      predicates: [...predicates.keys()].map((pred) => ({ pred })),
    }));
  }

  entities(): IterableIterator<string> {
    return this.#entities.keys();
  }

  *relations(): Generator<Triple> {
    for (const [subject, objects] of this.#outgoing) {
      for (const [object, predicates] of objects) {
        for (const predicate of predicates.keys()) {
          yield [subject, predicate, object];
        }
      }
    }
  }
}

function linksBetween(adjacency: Adjacency, from: string, to: string): Map<string, AttributeMap> {
  let byNeighbor = adjacency.get(from);
  if (!byNeighbor) {
    byNeighbor = new Map();
    adjacency.set(from, byNeighbor);
  }
  let predicates = byNeighbor.get(to);
  if (!predicates) {
    predicates = new Map();
    byNeighbor.set(to, predicates);
  }
  return predicates;
}
