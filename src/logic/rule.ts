import type { GraphNode } from '../graph/node.js';
import type { AttributeRecord, AttributeValue, QueryAnswer, WriteResult } from '../types/knowledge-base.js';
import type { Term } from './term.js';

/**
 * Called when an attribute relevant to a rule changes: either a node of a type the
 * rule's goals mention, or one of the rule's own attributes.
 */
export type RuleChangeHook = (
  rule: Rule,
  affectedNodes: GraphNode[],
  changed: GraphNode | Rule,
  attribute: string,
  value: AttributeValue,
  previous: AttributeValue | undefined,
) => void;

/** The parts of the knowledge base a rule reaches back into. */
export interface RuleHost {
  query(statement: string): Iterable<QueryAnswer>;
  hasEntity(name: string): boolean;
  node(name: string): GraphNode;
  dontPropagate<T>(fn: () => T): T;
}

export class Rule {
  readonly head: Term;
  readonly goals: readonly Term[];
  onChange: RuleChangeHook | null = null;

  readonly #host: RuleHost;
  readonly #attributes: Map<string, AttributeValue> = new Map();
  #executing = false;

  constructor(host: RuleHost, head: Term, goals: readonly Term[] = []) {
    this.#host = host;
    this.head = head;
    this.goals = goals;
  }

  get isFact(): boolean {
    return this.goals.length === 0;
  }

  get isExecuting(): boolean {
    return this.#executing;
  }

  /** Full clause text, `head :- goal, goal` for inference rules. */
  get definition(): string {
    if (this.isFact) {
      return String(this.head);
    }
    return `${String(this.head)} :- ${this.goals.map(String).join(', ')}`;
  }

  /** Nodes bound by the first proof of this rule's head. */
  get affectedNodes(): GraphNode[] {
    const first = firstAnswer(this.#host.query(String(this.head)));
    if (first === undefined || first === true) {
      return [];
    }
    return Object.values(first)
      .filter((name) => this.#host.hasEntity(name))
      .map((name) => this.#host.node(name));
  }

  /** True when one of the goals calls `predicate`. */
  references(predicate: string): boolean {
    return this.goals.some((goal) => goal.pred === predicate);
  }

  get attrs(): AttributeRecord {
    return Object.fromEntries(this.#attributes);
  }

  get(attribute: string): AttributeValue | undefined {
    return this.#attributes.get(attribute);
  }

  /**
   * Writes a rule attribute. When the attribute already had a value, the change hook
   * sees the pending value first, with propagation suppressed.
   */
  set(attribute: string, value: AttributeValue): WriteResult {
    const previous = this.#attributes.get(attribute);
    if (this.onChange && previous !== undefined && !this.#executing) {
      const hook = this.onChange;
      this.#runExclusive(() =>
        this.#host.dontPropagate(() => hook(this, this.affectedNodes, this, attribute, value, previous)),
      );
    }
    this.#attributes.set(attribute, value);
    return { applied: true, previous };
  }

  /** Runs the change hook for a node change. Returns false when no hook ran. */
  executeChange(
    changed: GraphNode,
    attribute: string,
    value: AttributeValue,
    previous: AttributeValue | undefined,
  ): boolean {
    if (!this.onChange || this.#executing) {
      return false;
    }
    const hook = this.onChange;
    this.#runExclusive(() => hook(this, this.affectedNodes, changed, attribute, value, previous));
    return true;
  }

  toString(): string {
    return String(this.head);
  }

  #runExclusive(fn: () => void): void {
    this.#executing = true;
    try {
      fn();
    } finally {
      this.#executing = false;
    }
  }
}

function firstAnswer(answers: Iterable<QueryAnswer>): QueryAnswer | undefined {
  for (const answer of answers) {
    return answer;
  }
  return undefined;
}
