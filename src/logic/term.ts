export const LIST_PREDICATE = '__list__';

/**
 * Immutable predicate-with-arguments structure. Facts, rule heads, goals, list cells,
 * atoms and variables are all terms; an atom or variable is a term without arguments.
 */
export class Term {
  readonly pred: string;
  readonly args: readonly Term[];
  #ground: boolean | undefined;

  constructor(pred: string, args: readonly Term[] = []) {
    this.pred = pred;
    this.args = args;
  }

  get arity(): number {
    return this.args.length;
  }

  /** Zero-arg terms starting with an uppercase letter stand for variables. */
  get isVariable(): boolean {
    return this.args.length === 0 && /^[A-Z]/.test(this.pred);
  }

  get isAtom(): boolean {
    return this.args.length === 0 && !this.isVariable;
  }

  get isList(): boolean {
    return this.pred === LIST_PREDICATE;
  }

  /** Cached on every subterm it visits; lists nest one level per element, so no recursion. */
  get isGround(): boolean {
    const stack: Term[] = [this];
    while (stack.length > 0) {
      const term = stack[stack.length - 1];
      if (term.#ground !== undefined) {
        stack.pop();
        continue;
      }
      const pending = term.args.filter((arg) => arg.#ground === undefined);
      if (pending.length > 0) {
        stack.push(...pending);
        continue;
      }
      term.#ground = !term.isVariable && term.args.every((arg) => arg.#ground === true);
      stack.pop();
    }
    return this.#ground === true;
  }

  equals(other: Term): boolean {
    const pending: Array<[Term, Term]> = [[this, other]];
    for (let pair = pending.pop(); pair !== undefined; pair = pending.pop()) {
      const [left, right] = pair;
      if (left === right) {
        continue;
      }
      if (left.pred !== right.pred || left.args.length !== right.args.length) {
        return false;
      }
      for (let i = 0; i < left.args.length; i += 1) {
        pending.push([left.args[i], right.args[i]]);
      }
    }
    return true;
  }

  toString(): string {
    if (this.isList) {
      return renderList(this);
    }
    if (this.args.length === 0) {
      return this.pred;
    }
    return `${this.pred}(${this.args.map(String).join(', ')})`;
  }
}

export function nil(): Term {
  return new Term(LIST_PREDICATE);
}

export function cons(head: Term, tail: Term): Term {
  return new Term(LIST_PREDICATE, [head, tail]);
}

/** Builds `[e1, e2, ...|tail]` as right-nested cons cells. */
export function listOf(elements: readonly Term[], tail: Term = nil()): Term {
  return elements.reduceRight((acc, element) => cons(element, acc), tail);
}

function renderList(term: Term): string {
  const items: string[] = [];
  let cursor: Term = term;
  while (cursor.isList && cursor.args.length === 2) {
    items.push(String(cursor.args[0]));
    cursor = cursor.args[1];
  }
  if (cursor.isList && cursor.args.length === 0) {
    return `[${items.join(', ')}]`;
  }
  if (items.length === 0) {
    // malformed cell, built by hand rather than parsed
    return `${term.pred}(${term.args.map(String).join(', ')})`;
  }
  return `[${items.join(', ')}|${String(cursor)}]`;
}
