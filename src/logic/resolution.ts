import type { QueryAnswer, ResolutionLimits } from '../types/knowledge-base.js';
import { Term } from './term.js';
import { unify, type Bindings } from './unify.js';

export interface Clause {
  readonly head: Term;
  readonly goals: readonly Term[];
}

/** Where the engine finds clauses whose head may match a goal. */
export interface ClauseSource {
  readonly size: number;
  candidates(pred: string, arity: number): Iterable<Clause>;
}

export const DEFAULT_RESOLUTION_LIMITS: ResolutionLimits = {
  minIterations: 100,
  growthExponent: 1.5,
};

const QUERY_PREDICATE = '__query__';
const COMPACT_THRESHOLD = 1024;

/** One node of the search frontier: a clause, how far it is proved, and its bindings. */
class Goal {
  readonly clause: Clause;
  readonly parent: Goal | null;
  readonly bindings: Bindings;
  cursor = 0;

  constructor(clause: Clause, parent: Goal | null, bindings: Bindings = new Map()) {
    this.clause = clause;
    this.parent = parent;
    this.bindings = bindings;
  }

  get done(): boolean {
    return this.cursor >= this.clause.goals.length;
  }

  get current(): Term {
    return this.clause.goals[this.cursor];
  }

  /** Copy that can advance independently of sibling branches. */
  fork(): Goal {
    const copy = new Goal(this.clause, this.parent, new Map(this.bindings));
    copy.cursor = this.cursor;
    return copy;
  }
}

export function iterationBudget(ruleCount: number, limits: ResolutionLimits = DEFAULT_RESOLUTION_LIMITS): number {
  return Math.max(limits.minIterations, (ruleCount + 1) ** limits.growthExponent);
}

/**
 * Breadth-first SLD resolution of `query` against `source`. A list of terms is
 * proved as a conjunction, left to right.
 *
 * Yields one answer per completed proof. The search stops silently once the
 * iteration budget is spent, so recursive rule sets produce a finite prefix of
 * their answers rather than an error.
 */
export function* solve(
  query: Term | readonly Term[],
  source: ClauseSource,
  limits: ResolutionLimits = DEFAULT_RESOLUTION_LIMITS,
): Generator<QueryAnswer, void, undefined> {
  const root = new Goal({ head: new Term(QUERY_PREDICATE), goals: query instanceof Term ? [query] : query }, null);
  const budget = iterationBudget(source.size, limits);
  let queue: Goal[] = [root];
  let head = 0;
  let iterations = 0;

  while (head < queue.length && iterations < budget) {
    iterations += 1;
    const goal = queue[head];
    head += 1;
    if (head >= COMPACT_THRESHOLD && head * 2 >= queue.length) {
      queue = queue.slice(head);
      head = 0;
    }

    if (goal.done) {
      if (!goal.parent) {
        yield toAnswer(goal.bindings);
        continue;
      }
      const parent = goal.parent.fork();
      if (unify(goal.clause.head, goal.bindings, parent.current, parent.bindings)) {
        parent.cursor += 1;
        queue.push(parent);
      }
      continue;
    }

    const term = goal.current;
    for (const clause of source.candidates(term.pred, term.arity)) {
      const child = new Goal(clause, goal);
      if (unify(term, goal.bindings, clause.head, child.bindings)) {
        queue.push(child);
      }
    }
  }
}

function toAnswer(bindings: Bindings): QueryAnswer {
  if (bindings.size === 0) {
    return true;
  }
  const answer: Record<string, string> = {};
  for (const [name, value] of bindings) {
    answer[name] = String(value);
  }
  return answer;
}
