import type { Rule } from '../logic/rule.js';
import type { KnowledgeBase } from '../services/knowledge-base.js';
import type { AttributeValue, Neighbor, NeighborDirection } from '../types/knowledge-base.js';
import { logThought } from '../utils/logger.js';
import { AttributedElement } from './attributed-element.js';
import type { AttributeMap } from './graph-store.js';

export type NewNeighborCallback = (neighbor: string) => void;

/** Handle on one entity. Obtain it with `kb.node(name)`; the same handle is returned every time. */
export class GraphNode extends AttributedElement {
  readonly name: string;
  readonly #kb: KnowledgeBase;
  #newNeighborFn: NewNeighborCallback | null = null;

  constructor(kb: KnowledgeBase, name: string) {
    super(kb.propagation);
    this.#kb = kb;
    this.name = name;
  }

  get key(): string {
    return `node:${this.name}`;
  }

  protected get attributes(): AttributeMap {
    return this.#kb.graph.entityAttributes(this.name);
  }

  get neighbors(): Neighbor[] {
    return this.#kb.neighbors(this.name);
  }

  neighborsIn(direction: NeighborDirection): Neighbor[] {
    return this.#kb.neighbors(this.name, direction);
  }

  /** Predicates of the arity-1 facts stored about this entity, e.g. `sku` for `sku(jeans)`. */
  get types(): string[] {
    return this.#kb.typesOf(this.name);
  }

  /** Inference rules with a goal on one of this node's types. */
  get rules(): Rule[] {
    return this.#kb.rulesAffecting(this);
  }

  watchForNewNeighbor(fn: NewNeighborCallback | null): void {
    this.#newNeighborFn = fn;
  }

  /** Called by the knowledge base when a stored statement links a newly created entity to this one. */
  notifyNewNeighbor(neighbor: string): void {
    if (!this.#newNeighborFn) return;
    try {
      this.#newNeighborFn(neighbor);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      void logThought(`[GraphNode] New-neighbor callback of '${this.name}' failed for '${neighbor}': ${message}`);
    }
  }

  protected override afterWatches(attribute: string, value: AttributeValue, previous: AttributeValue | undefined): void {
    for (const rule of this.rules) {
      rule.executeChange(this, attribute, value, previous);
    }
  }

  toString(): string {
    return this.name;
  }
}
