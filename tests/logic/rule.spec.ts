import { beforeEach, describe, expect, it } from 'vitest';
import type { GraphNode } from '../../src/graph/node.js';
import { KnowledgeBase } from '../../src/services/knowledge-base.js';
import type { AttributeValue } from '../../src/types/knowledge-base.js';

describe('Rule', () => {
  let kb: KnowledgeBase;
  let ruleIndex: number;

  beforeEach(() => {
    kb = new KnowledgeBase();
    kb.store('bought_ticket(tom)');
    const index = kb.store('winner(X) :- bought_ticket(X), had_correct_numbers(X)');
    if (typeof index !== 'number') throw new Error('expected a rule index');
    ruleIndex = index;
  });

  it('renders its head and full definition', () => {
    const rule = kb.rule(ruleIndex);
    expect(String(rule)).toBe('winner(X)');
    expect(rule.definition).toBe('winner(X) :- bought_ticket(X), had_correct_numbers(X)');
    expect(rule.isFact).toBe(false);
    expect(rule.references('bought_ticket')).toBe(true);
    expect(rule.references('winner')).toBe(false);
  });

  it('maps the first proof of its head to nodes', () => {
    const rule = kb.rule(ruleIndex);
    expect(rule.affectedNodes).toEqual([]);
    kb.store('had_correct_numbers(tom)');
    expect(rule.affectedNodes).toEqual([kb.node('tom')]);
  });

  it('runs its change hook when a node of a referenced type changes', () => {
    const calls: Array<{ affected: string[]; changed: string; attribute: string; value: AttributeValue }> = [];
    kb.rule(ruleIndex).onChange = (_rule, affected, changed, attribute, value) => {
      calls.push({ affected: affected.map(String), changed: String(changed), attribute, value });
    };

    let fullWinnerCalls = 0;
    const fullWinner = (node: GraphNode) => {
      if (node.get('correct_numbers') !== 6) return;
      kb.dontPropagate(() => node.set('is_winner', true));
      kb.store(`had_correct_numbers(${node.name})`);
      fullWinnerCalls += 1;
    };

    const tom = kb.node('tom');
    tom.watch('correct_numbers', fullWinner);
    tom.set('correct_numbers', 5);
    tom.set('correct_numbers', 6);

    expect(tom.get('is_winner')).toBe(true);
    expect(fullWinnerCalls).toBe(1);
    expect(calls).toEqual([
      { affected: [], changed: 'tom', attribute: 'correct_numbers', value: 5 },
      { affected: ['tom'], changed: 'tom', attribute: 'correct_numbers', value: 6 },
    ]);
    expect([...kb.query('winner(X)')]).toEqual([{ X: 'tom' }]);
  });

  it('does not re-enter its hook while it is running', () => {
    const rule = kb.rule(ruleIndex);
    let runs = 0;
    rule.onChange = (_rule, _affected, changed) => {
      runs += 1;
      if (changed !== rule) {
        expect(rule.isExecuting).toBe(true);
        expect(rule.executeChange(kb.node('tom'), 'again', 1, undefined)).toBe(false);
      }
    };

    expect(rule.executeChange(kb.node('tom'), 'correct_numbers', 1, undefined)).toBe(true);
    expect(runs).toBe(1);
    expect(rule.isExecuting).toBe(false);
  });

  it('runs the hook on its own attributes with propagation suppressed', () => {
    const rule = kb.rule(ruleIndex);
    const seen: Array<[boolean, AttributeValue, AttributeValue | undefined]> = [];
    rule.onChange = (_rule, _affected, changed, _attribute, value, previous) => {
      expect(changed).toBe(rule);
      seen.push([kb.propagation.suppressed, value, previous]);
    };

    expect(rule.set('threshold', 1)).toEqual({ applied: true, previous: undefined });
    expect(rule.set('threshold', 2)).toEqual({ applied: true, previous: 1 });
    expect(seen).toEqual([[true, 2, 1]]);
    expect(rule.get('threshold')).toBe(2);
    expect(rule.attrs).toEqual({ threshold: 2 });
    expect(kb.propagation.suppressed).toBe(false);
  });

  it('skips the hook when none is set', () => {
    expect(kb.rule(ruleIndex).executeChange(kb.node('tom'), 'x', 1, undefined)).toBe(false);
  });
});
