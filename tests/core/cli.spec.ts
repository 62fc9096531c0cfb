import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { PassThrough, Readable } from 'node:stream';
import {
  evaluateReplLine,
  handleCheckCli,
  handleHelpCli,
  handleQueryCli,
  handleReplCli,
  handleUnknownCommand,
  loadStatements,
  readStatements,
  runCli,
} from '../../src/core/cli.js';
import { KnowledgeBase } from '../../src/services/knowledge-base.js';

// Capture console output during tests
let consoleOutput: string[] = [];
let consoleErrors: string[] = [];
let tempDir = '';

async function statementsFile(name: string, contents: string): Promise<string> {
  const file = path.join(tempDir, name);
  await writeFile(file, contents, 'utf8');
  return file;
}

beforeEach(async () => {
  consoleOutput = [];
  consoleErrors = [];
  vi.spyOn(console, 'log').mockImplementation((...args) => {
    consoleOutput.push(args.join(' '));
  });
  vi.spyOn(console, 'error').mockImplementation((...args) => {
    consoleErrors.push(args.join(' '));
  });
  tempDir = await mkdtemp(path.join(os.tmpdir(), 'factgraph-cli-'));
  process.exitCode = undefined;
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(tempDir, { recursive: true, force: true });
  process.exitCode = undefined;
});

// ── Statements files ─────────────────────────────────────────────────────────

describe('readStatements', () => {
  it('skips blank lines and % comments and keeps line numbers', () => {
    expect(readStatements('% family\n\nparent(a, b)\r\n  parent(b, c)  \n')).toEqual([
      { line: 3, text: 'parent(a, b)' },
      { line: 4, text: 'parent(b, c)' },
    ]);
  });
});

describe('loadStatements', () => {
  it('stores every statement and names the failing line', () => {
    const kb = new KnowledgeBase();
    expect(loadStatements(kb, 'a(b)\nc(d)')).toBe(2);
    expect(() => loadStatements(kb, 'e(f)\n\ng(h', 'facts.pl')).toThrow("facts.pl:3: Missing ')': 'g(h'");
  });
});

// ── handleHelpCli ────────────────────────────────────────────────────────────

describe('handleHelpCli', () => {
  it('returns false when no help flag is present', () => {
    expect(handleHelpCli([])).toBe(false);
    expect(handleHelpCli(['check', 'facts.pl'])).toBe(false);
  });

  it('prints usage for help, --help and -h', () => {
    for (const argv of [['help'], ['--help'], ['query', '-h']]) {
      consoleOutput = [];
      expect(handleHelpCli(argv)).toBe(true);
      expect(consoleOutput.join('\n')).toMatch(/^Usage: factgraph/);
      expect(process.exitCode).toBe(0);
    }
  });
});

// ── handleUnknownCommand ─────────────────────────────────────────────────────

describe('handleUnknownCommand', () => {
  it('lets known commands through', () => {
    expect(handleUnknownCommand(['query'])).toBe(false);
    expect(handleUnknownCommand([])).toBe(false);
  });

  it('rejects unknown commands', () => {
    expect(handleUnknownCommand(['serve'])).toBe(true);
    expect(consoleErrors[0]).toBe("[FactGraph] Unknown command: 'serve'");
    expect(process.exitCode).toBe(1);
  });
});

// ── handleCheckCli ───────────────────────────────────────────────────────────

describe('handleCheckCli', () => {
  it('ignores other commands', async () => {
    expect(await handleCheckCli(['query'])).toBe(false);
  });

  it('accepts a valid file', async () => {
    const file = await statementsFile('ok.pl', '% rules\nparent(a, b)\nancestor(X, Y) :- parent(X, Y)\n');
    expect(await handleCheckCli(['check', file])).toBe(true);
    expect(consoleOutput).toEqual(['OK 2 statement(s).']);
    expect(process.exitCode).toBe(0);
  });

  it('reports every bad line', async () => {
    const file = await statementsFile('bad.pl', 'parent(a, b)\nX :- parent(X, b)\nknows(tom\n');
    expect(await handleCheckCli(['check', file])).toBe(true);
    expect(consoleErrors).toEqual([
      `[FactGraph] ${file}:2: Statement head cannot be a variable: 'X :- parent(X, b)'`,
      `[FactGraph] ${file}:3: Missing ')': 'knows(tom'`,
      '[FactGraph] 2 of 3 statement(s) failed to parse.',
    ]);
    expect(process.exitCode).toBe(1);
  });

  it('fails on a missing file', async () => {
    expect(await handleCheckCli(['check', path.join(tempDir, 'missing.pl')])).toBe(true);
    expect(consoleErrors[0]).toContain('[FactGraph] Cannot read');
    expect(process.exitCode).toBe(1);
  });
});

// ── handleQueryCli ───────────────────────────────────────────────────────────

describe('handleQueryCli', () => {
  it('prints one JSON answer per line', async () => {
    const file = await statementsFile('knows.pl', 'knows(tom, shamala)\nknows(tom, bob)\n');
    expect(await handleQueryCli(['query', file, 'knows(tom, X)'])).toBe(true);
    expect(consoleOutput).toEqual(['{"X":"shamala"}', '{"X":"bob"}']);
    expect(process.exitCode).toBe(0);
  });

  it('honours --limit', async () => {
    const file = await statementsFile('knows.pl', 'knows(tom, shamala)\nknows(tom, bob)\n');
    await handleQueryCli(['query', file, 'knows(tom, X)', '--limit', '1']);
    expect(consoleOutput).toEqual(['{"X":"shamala"}']);
  });

  it('prints false when nothing is proven', async () => {
    const file = await statementsFile('knows.pl', 'knows(tom, shamala)\n');
    await handleQueryCli(['query', file, 'knows(bob, X)']);
    expect(consoleOutput).toEqual(['false']);
  });

  it('rejects a bad limit and a missing goal', async () => {
    await handleQueryCli(['query', 'knows.pl', 'knows(X, Y)', '--limit', 'zero']);
    expect(consoleErrors).toEqual(['[FactGraph] --limit expects a positive integer.']);
    await handleQueryCli(['query', 'knows.pl']);
    expect(consoleErrors[1]).toBe('[FactGraph] Usage: factgraph query <file> <goal>');
    expect(process.exitCode).toBe(1);
  });

  it('reports statements that fail to load', async () => {
    const file = await statementsFile('broken.pl', 'knows(tom, shamala)\nknows(tom\n');
    await handleQueryCli(['query', file, 'knows(X, Y)']);
    expect(consoleErrors).toEqual([`[FactGraph] Query failed: ${file}:2: Missing ')': 'knows(tom'`]);
    expect(process.exitCode).toBe(1);
  });
});

// ── REPL ─────────────────────────────────────────────────────────────────────

describe('evaluateReplLine', () => {
  it('stores statements, answers queries and reports errors', () => {
    const kb = new KnowledgeBase();
    expect(evaluateReplLine(kb, 'knows(tom, shamala)')).toBe(true);
    expect(evaluateReplLine(kb, '?- knows(X, Y)')).toBe(true);
    expect(evaluateReplLine(kb, '?- knows(bob, X)')).toBe(true);
    expect(evaluateReplLine(kb, 'bad(')).toBe(true);
    expect(evaluateReplLine(kb, '% comment')).toBe(true);
    expect(evaluateReplLine(kb, ':quit')).toBe(false);

    expect(consoleOutput).toEqual(['Stored 0.', '{"X":"tom","Y":"shamala"}', 'false']);
    expect(consoleErrors).toEqual(["[FactGraph] Missing ')': 'bad('"]);
  });
});

describe('handleReplCli', () => {
  it('reads lines until :quit', async () => {
    const input = Readable.from(['knows(tom, shamala)\n?- knows(tom, X)\n', ':quit\n']);
    expect(await handleReplCli(['repl'], input, new PassThrough())).toBe(true);
    expect(consoleOutput).toEqual(['Stored 0.', '{"X":"shamala"}']);
    expect(process.exitCode).toBe(0);
  });

  it('preloads a statements file and ends with the input', async () => {
    const file = await statementsFile('knows.pl', 'knows(tom, shamala)\n');
    const input = Readable.from(['?- knows(X, shamala)\n']);
    await handleReplCli(['repl', file], input, new PassThrough());
    expect(consoleOutput).toEqual([`Loaded 1 statement(s) from ${file}.`, '{"X":"tom"}']);
  });
});

// ── runCli ───────────────────────────────────────────────────────────────────

describe('runCli', () => {
  it('prints help without arguments', async () => {
    await runCli([]);
    expect(consoleOutput.join('\n')).toMatch(/^Usage: factgraph/);
  });

  it('dispatches to the matching command', async () => {
    const file = await statementsFile('ok.pl', 'a(b)\n');
    await runCli(['check', file]);
    expect(consoleOutput).toEqual(['OK 1 statement(s).']);
  });

  it('stops at an unknown command', async () => {
    await runCli(['serve']);
    expect(process.exitCode).toBe(1);
  });
});
