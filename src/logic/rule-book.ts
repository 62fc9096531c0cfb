import type { ClauseSource } from './resolution.js';
import type { Rule } from './rule.js';

/**
 * Stored rules in insertion order. Deleting a rule leaves a hole, so the index
 * handed out by `add` stays valid for every other rule.
 */
export class RuleBook implements ClauseSource {
  readonly #slots: Array<Rule | undefined> = [];
  readonly #byDefinition: Map<string, number> = new Map();
  readonly #byHead: Map<string, Set<number>> = new Map();
  #size = 0;

  /** Number of live rules; drives the resolution iteration budget. */
  get size(): number {
    return this.#size;
  }

  add(rule: Rule): number {
    const index = this.#slots.length;
    this.#slots.push(rule);
    this.#byDefinition.set(rule.definition, index);
    const key = headKey(rule.head.pred, rule.head.arity);
    const indices = this.#byHead.get(key) ?? new Set<number>();
    indices.add(index);
    this.#byHead.set(key, indices);
    this.#size += 1;
    return index;
  }

  remove(index: number): Rule | undefined {
    const rule = this.#slots[index];
    if (!rule) {
      return undefined;
    }
    this.#slots[index] = undefined;
    this.#byDefinition.delete(rule.definition);
    this.#byHead.get(headKey(rule.head.pred, rule.head.arity))?.delete(index);
    this.#size -= 1;
    return rule;
  }

  at(index: number): Rule | undefined {
    return Number.isInteger(index) ? this.#slots[index] : undefined;
  }

  indexOf(definition: string): number | undefined {
    return this.#byDefinition.get(definition);
  }

  /** First live rule whose head renders as `head`. */
  findByHead(head: string): Rule | undefined {
    for (const rule of this) {
      if (String(rule.head) === head) {
        return rule;
      }
    }
    return undefined;
  }

  *candidates(pred: string, arity: number): Generator<Rule> {
    const indices = this.#byHead.get(headKey(pred, arity));
    if (!indices) {
      return;
    }
    // copy: a caller may store rules between answers
    for (const index of [...indices]) {
      const rule = this.#slots[index];
      if (rule) {
        yield rule;
      }
    }
  }

  *entries(): Generator<[number, Rule]> {
    for (let index = 0; index < this.#slots.length; index += 1) {
      const rule = this.#slots[index];
      if (rule) {
        yield [index, rule];
      }
    }
  }

  *[Symbol.iterator](): Generator<Rule> {
    for (const [, rule] of this.entries()) {
      yield rule;
    }
  }
}

function headKey(pred: string, arity: number): string {
  return `${pred}/${arity}`;
}
