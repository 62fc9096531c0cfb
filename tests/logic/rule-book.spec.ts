import { describe, expect, it } from 'vitest';
import { RuleBook } from '../../src/logic/rule-book.js';
import { Rule, type RuleHost } from '../../src/logic/rule.js';
import { parseStatement } from '../../src/logic/statement-parser.js';

const host: RuleHost = {
  query: () => [],
  hasEntity: () => false,
  node: (name) => {
    throw new Error(`unexpected node lookup: ${name}`);
  },
  dontPropagate: <T>(fn: () => T): T => fn(),
};

function ruleOf(statement: string): Rule {
  const parsed = parseStatement(statement);
  return new Rule(host, parsed.head, parsed.goals);
}

describe('RuleBook', () => {
  it('hands out insertion indices and finds rules by definition', () => {
    const book = new RuleBook();
    expect(book.add(ruleOf('a(b)'))).toBe(0);
    expect(book.add(ruleOf('c(X) :- a(X)'))).toBe(1);
    expect(book.indexOf('c(X) :- a(X)')).toBe(1);
    expect(book.size).toBe(2);
  });

  it('keeps other indices stable after a removal', () => {
    const book = new RuleBook();
    book.add(ruleOf('a(b)'));
    book.add(ruleOf('a(c)'));
    book.add(ruleOf('a(d)'));

    expect(String(book.remove(1))).toBe('a(c)');
    expect(book.remove(1)).toBeUndefined();
    expect(String(book.at(2))).toBe('a(d)');
    expect(book.size).toBe(2);
    expect([...book.entries()].map(([index]) => index)).toEqual([0, 2]);
    expect(book.add(ruleOf('a(e)'))).toBe(3);
  });

  it('indexes candidates by predicate and arity', () => {
    const book = new RuleBook();
    book.add(ruleOf('a(b)'));
    book.add(ruleOf('a(b, c)'));
    book.add(ruleOf('z(b)'));
    book.add(ruleOf('a(X) :- z(X)'));

    expect([...book.candidates('a', 1)].map((rule) => rule.definition)).toEqual(['a(b)', 'a(X) :- z(X)']);
    expect([...book.candidates('missing', 1)]).toEqual([]);
  });

  it('finds the first rule with a given head', () => {
    const book = new RuleBook();
    book.add(ruleOf('w(X) :- a(X)'));
    book.add(ruleOf('w(X) :- b(X)'));
    expect(book.findByHead('w(X)')?.definition).toBe('w(X) :- a(X)');
    expect(book.at(1.5)).toBeUndefined();
  });
});
