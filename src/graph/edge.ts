import type { KnowledgeBase } from '../services/knowledge-base.js';
import { UnknownRelationError } from '../types/errors.js';
import type { Triple } from '../types/knowledge-base.js';
import { AttributedElement } from './attributed-element.js';
import type { AttributeMap } from './graph-store.js';
import type { GraphNode } from './node.js';

/** Handle on one `(subject, predicate, object)` relation. */
export class GraphEdge extends AttributedElement {
  readonly subject: string;
  readonly predicate: string;
  readonly object: string;
  readonly #kb: KnowledgeBase;
  #detached = false;

  constructor(kb: KnowledgeBase, subject: string, predicate: string, object: string) {
    super(kb.propagation);
    this.#kb = kb;
    this.subject = subject;
    this.predicate = predicate;
    this.object = object;
  }

  static keyOf(subject: string, predicate: string, object: string): string {
    return `edge:${subject}\u0000${predicate}\u0000${object}`;
  }

  get key(): string {
    return GraphEdge.keyOf(this.subject, this.predicate, this.object);
  }

  protected get attributes(): AttributeMap {
    if (this.#detached) {
      throw new UnknownRelationError(this.subject, this.predicate, this.object);
    }
    return this.#kb.graph.relationAttributes(this.subject, this.predicate, this.object);
  }

  /** Called when the fact behind this edge is deleted; a later re-store gets a new handle. */
  detach(): void {
    this.#detached = true;
  }

  get triple(): Triple {
    return [this.subject, this.predicate, this.object];
  }

  get nodes(): [GraphNode, GraphNode] {
    return [this.#kb.node(this.subject), this.#kb.node(this.object)];
  }

  toString(): string {
    return `${this.subject}___${this.predicate}___${this.object}`;
  }
}
