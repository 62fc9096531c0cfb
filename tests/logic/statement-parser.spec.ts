import { describe, expect, it } from 'vitest';
import { parseStatement, parseTerm, splitTopLevel } from '../../src/logic/statement-parser.js';
import { StatementSyntaxError } from '../../src/types/errors.js';

describe('parseStatement', () => {
  it('parses a fact and ignores whitespace', () => {
    const parsed = parseStatement('  knows( tom , shamala )');
    expect(String(parsed.head)).toBe('knows(tom, shamala)');
    expect(parsed.goals).toEqual([]);
    expect(parsed.negative).toBe(false);
    expect(parsed.source).toBe('knows(tom,shamala)');
  });

  it('parses an inference rule into head and goals', () => {
    const parsed = parseStatement('winner(X) :- bought_ticket(X), had_correct_numbers(X)');
    expect(String(parsed.head)).toBe('winner(X)');
    expect(parsed.goals.map(String)).toEqual(['bought_ticket(X)', 'had_correct_numbers(X)']);
  });

  it('marks negative examples', () => {
    const parsed = parseStatement('~likes(tom, spinach)');
    expect(parsed.negative).toBe(true);
    expect(String(parsed.head)).toBe('likes(tom, spinach)');
  });

  it('keeps commas inside nested arguments together', () => {
    const parsed = parseStatement('path(a, b) :- edge(a, f(b, c)), member(b, [b, c])');
    expect(parsed.goals.map(String)).toEqual(['edge(a, f(b, c))', 'member(b, [b, c])']);
  });

  it.each([
    ['', 'Empty statement'],
    ['a :- b :- c', "Expected at most one ':-'"],
    ['X :- a', 'Statement head cannot be a variable'],
    ['~a(b) :- c(b)', 'Negative examples must be facts'],
    ['knows(tom', "Missing ')'"],
    ['knows(tom))', "Unbalanced ')'"],
    ['knows()', 'Empty argument list'],
    ['knows(a)b', 'Unexpected text after argument list'],
  ])('rejects %j', (input, message) => {
    expect(() => parseStatement(input)).toThrow(StatementSyntaxError);
    expect(() => parseStatement(input)).toThrow(message);
  });

  it('keeps the offending text on the error', () => {
    try {
      parseStatement('X');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(StatementSyntaxError);
      if (error instanceof StatementSyntaxError) {
        expect(error.kind).toBe('SyntaxError');
        expect(error.source).toBe('X');
      }
    }
  });
});

describe('parseTerm', () => {
  it('parses list literals with and without a tail', () => {
    expect(String(parseTerm('[a, b]'))).toBe('[a, b]');
    expect(String(parseTerm('[H|T]'))).toBe('[H|T]');
    expect(String(parseTerm('[]'))).toBe('[]');
  });

  it('rejects a list with two tails', () => {
    expect(() => parseTerm('[a|b|c]')).toThrow("Expected at most one '|' in list");
  });

  it('rejects names with reserved characters', () => {
    expect(() => parseTerm('a|b')).toThrow("Invalid name 'a|b'");
  });
});

describe('splitTopLevel', () => {
  it('splits only outside brackets', () => {
    expect(splitTopLevel('a(b,c),[d,e],f', ',')).toEqual(['a(b,c)', '[d,e]', 'f']);
  });

  it('detects mismatched brackets', () => {
    expect(() => splitTopLevel('a(b]', ',')).toThrow("Unbalanced ']'");
  });
});
