import { StatementSyntaxError } from '../types/errors.js';
import { listOf, nil, Term } from './term.js';

export interface ParsedStatement {
  head: Term;
  goals: Term[];
  negative: boolean;
  /** Whitespace-free text the statement was parsed from, without the `~` marker. */
  source: string;
}

const NAME_PATTERN = /^[^()[\]{},|]+$/;
const RULE_SEPARATOR = ':-';
const CLOSERS: Record<string, string> = { '(': ')', '[': ']' };

export function stripWhitespace(text: string): string {
  return text.replace(/\s+/g, '');
}

/**
 * Parses `head`, `head :- goal, goal` or `~fact`.
 * Throws {@link StatementSyntaxError} before anything is stored.
 */
export function parseStatement(text: string): ParsedStatement {
  let source = stripWhitespace(text);
  if (!source) {
    throw new StatementSyntaxError('Empty statement', text);
  }

  const negative = source.startsWith('~');
  if (negative) {
    source = source.slice(1);
  }

  const parts = splitTopLevel(source, RULE_SEPARATOR);
  if (parts.length > 2) {
    throw new StatementSyntaxError(`Expected at most one '${RULE_SEPARATOR}'`, text);
  }

  const head = parseTerm(parts[0]);
  if (head.isVariable) {
    throw new StatementSyntaxError('Statement head cannot be a variable', text);
  }

  const goals = parts.length === 2 ? splitTopLevel(parts[1], ',').map(parseTerm) : [];
  if (negative && goals.length > 0) {
    throw new StatementSyntaxError('Negative examples must be facts', text);
  }

  return { head, goals, negative, source };
}

/** Parses a single term: `pred(args)`, an atom, a variable or a list literal. */
export function parseTerm(text: string): Term {
  const expr = stripWhitespace(text);
  if (!expr) {
    throw new StatementSyntaxError('Empty term', text);
  }

  if (expr.startsWith('[')) {
    return parseList(expr);
  }

  const open = expr.indexOf('(');
  if (open === -1) {
    assertName(expr, expr);
    return new Term(expr);
  }

  const pred = expr.slice(0, open);
  assertName(pred, expr);
  if (findClosing(expr, open) !== expr.length - 1) {
    throw new StatementSyntaxError('Unexpected text after argument list', expr);
  }

  const inner = expr.slice(open + 1, -1);
  if (!inner) {
    throw new StatementSyntaxError('Empty argument list', expr);
  }
  return new Term(pred, splitTopLevel(inner, ',').map(parseTerm));
}

function parseList(expr: string): Term {
  if (findClosing(expr, 0) !== expr.length - 1) {
    throw new StatementSyntaxError('Unexpected text after list', expr);
  }

  const inner = expr.slice(1, -1);
  if (!inner) {
    return nil();
  }

  const parts = splitTopLevel(inner, '|');
  if (parts.length > 2) {
    throw new StatementSyntaxError("Expected at most one '|' in list", expr);
  }

  const elements = splitTopLevel(parts[0], ',').map(parseTerm);
  const tail = parts.length === 2 ? parseTerm(parts[1]) : nil();
  return listOf(elements, tail);
}

/**
 * Splits on `separator` wherever it occurs outside parentheses and brackets.
 * Unbalanced or mismatched nesting is a syntax error.
 */
export function splitTopLevel(expr: string, separator: string): string[] {
  const parts: string[] = [];
  const stack: string[] = [];
  let start = 0;
  let i = 0;

  while (i < expr.length) {
    const ch = expr[i];
    if (ch === '(' || ch === '[') {
      stack.push(CLOSERS[ch]);
    } else if (ch === ')' || ch === ']') {
      if (stack.pop() !== ch) {
        throw new StatementSyntaxError(`Unbalanced '${ch}'`, expr);
      }
    } else if (stack.length === 0 && expr.startsWith(separator, i)) {
      parts.push(expr.slice(start, i));
      i += separator.length;
      start = i;
      continue;
    }
    i += 1;
  }

  if (stack.length > 0) {
    throw new StatementSyntaxError(`Missing '${stack[stack.length - 1]}'`, expr);
  }
  parts.push(expr.slice(start));
  return parts;
}

function findClosing(expr: string, openIndex: number): number {
  const stack: string[] = [];
  for (let i = openIndex; i < expr.length; i += 1) {
    const ch = expr[i];
    if (ch === '(' || ch === '[') {
      stack.push(CLOSERS[ch]);
    } else if (ch === ')' || ch === ']') {
      if (stack.pop() !== ch) {
        throw new StatementSyntaxError(`Unbalanced '${ch}'`, expr);
      }
      if (stack.length === 0) {
        return i;
      }
    }
  }
  throw new StatementSyntaxError(`Missing '${stack[stack.length - 1] ?? ')'}'`, expr);
}

function assertName(name: string, context: string): void {
  if (!NAME_PATTERN.test(name)) {
    throw new StatementSyntaxError(`Invalid name '${name}'`, context);
  }
}
