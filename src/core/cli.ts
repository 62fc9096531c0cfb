import * as fsPromises from 'node:fs/promises';
import * as readline from 'node:readline';
import { parseStatement } from '../logic/statement-parser.js';
import { KnowledgeBase } from '../services/knowledge-base.js';
import type { QueryAnswer } from '../types/knowledge-base.js';
import { logThought } from '../utils/logger.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: factgraph <command> [options]

Commands:
  check <file>          Check the syntax of a statements file
  query <file> <goal>   Load a statements file and print every answer to <goal>
  repl [file]           Interactive session; lines starting with '?-' are queries
  help                  Show this help message

Statements files hold one statement per line. Lines starting with '%' are comments.

Options:
  --limit <n>           Stop after n answers (query only)
  --help, -h            Show this help message

Examples:
  factgraph check family.pl
  factgraph query family.pl "grandparent(X, Y)"
  factgraph query family.pl "knows(X, Y)" --limit 5
  factgraph repl family.pl
`.trim();

const KNOWN_COMMANDS = new Set(['check', 'query', 'repl', 'help', '--help', '-h']);

// ── Statements files ─────────────────────────────────────────────────────────

export interface StatementLine {
  line: number;
  text: string;
}

export function readStatements(contents: string): StatementLine[] {
  const statements: StatementLine[] = [];
  contents.split(/\r?\n/).forEach((raw, index) => {
    const text = raw.trim();
    if (text && !text.startsWith('%')) {
      statements.push({ line: index + 1, text });
    }
  });
  return statements;
}

/** Stores every statement of a file into `kb`. Errors carry the line number. */
export function loadStatements(kb: KnowledgeBase, contents: string, fileName = '<input>'): number {
  const statements = readStatements(contents);
  for (const { line, text } of statements) {
    try {
      kb.store(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`${fileName}:${line}: ${message}`, { cause: error });
    }
  }
  return statements.length;
}

export function formatAnswer(answer: QueryAnswer): string {
  return JSON.stringify(answer);
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `help`, `--help` or `-h`.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (argv[0] !== 'help' && !argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

/**
 * Handle `check <file>`.
 * Parses every statement without storing anything and reports each bad line.
 */
export async function handleCheckCli(argv: string[]): Promise<boolean> {
  if (argv[0] !== 'check') return false;

  const contents = await readInputFile(argv[1], 'check');
  if (contents === null) return true;

  const statements = readStatements(contents);
  let failures = 0;
  for (const { line, text } of statements) {
    try {
      parseStatement(text);
    } catch (error) {
      failures += 1;
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[FactGraph] ${argv[1]}:${line}: ${message}`);
    }
  }

  if (failures > 0) {
    console.error(`[FactGraph] ${failures} of ${statements.length} statement(s) failed to parse.`);
    process.exitCode = 1;
  } else {
    console.log(`OK ${statements.length} statement(s).`);
    process.exitCode = 0;
  }
  return true;
}

/**
 * Handle `query <file> <goal> [--limit n]`.
 * Prints one JSON answer per line, or `false` when the goal has no proof.
 */
export async function handleQueryCli(argv: string[]): Promise<boolean> {
  if (argv[0] !== 'query') return false;

  const [, file, goal] = argv;
  if (!goal) {
    console.error(`[FactGraph] Usage: factgraph query <file> <goal>`);
    process.exitCode = 1;
    return true;
  }
  const limit = parseLimitFlag(argv);
  if (limit === null) {
    console.error(`[FactGraph] --limit expects a positive integer.`);
    process.exitCode = 1;
    return true;
  }

  const contents = await readInputFile(file, 'query');
  if (contents === null) return true;

  try {
    const kb = new KnowledgeBase();
    loadStatements(kb, contents, file);
    let printed = 0;
    for (const answer of kb.query(goal)) {
      console.log(formatAnswer(answer));
      printed += 1;
      if (printed >= limit) break;
    }
    if (printed === 0) {
      console.log('false');
    }
    process.exitCode = 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[FactGraph] Query failed: ${message}`);
    process.exitCode = 1;
  }
  return true;
}

/**
 * Handle `repl [file]`.
 * Resolves once the input ends or `:quit` is entered.
 */
export async function handleReplCli(
  argv: string[],
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<boolean> {
  if (argv[0] !== 'repl') return false;

  const kb = new KnowledgeBase();
  const file = argv[1];
  if (file) {
    const contents = await readInputFile(file, 'repl');
    if (contents === null) return true;
    try {
      const count = loadStatements(kb, contents, file);
      console.log(`Loaded ${count} statement(s) from ${file}.`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[FactGraph] ${message}`);
      process.exitCode = 1;
      return true;
    }
  }

  void logThought('[REPL] Session started.');
  const rl = readline.createInterface({ input, output, terminal: false });
  await new Promise<void>((resolve) => {
    rl.on('line', (line) => {
      if (!evaluateReplLine(kb, line.trim())) {
        rl.close();
      }
    });
    rl.on('close', () => resolve());
  });
  void logThought('[REPL] Session ended.');
  process.exitCode = 0;
  return true;
}

/** Runs one REPL line. Returns false when the session should end. */
export function evaluateReplLine(kb: KnowledgeBase, line: string): boolean {
  if (!line || line.startsWith('%')) return true;
  if (line === ':quit' || line === ':q') return false;

  try {
    if (line.startsWith('?-')) {
      let printed = 0;
      for (const answer of kb.query(line.slice(2))) {
        console.log(formatAnswer(answer));
        printed += 1;
      }
      if (printed === 0) {
        console.log('false');
      }
    } else {
      console.log(`Stored ${String(kb.store(line))}.`);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[FactGraph] ${message}`);
  }
  return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when one is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  const command = argv[0];
  if (command === undefined || KNOWN_COMMANDS.has(command)) return false;

  console.error(`[FactGraph] Unknown command: '${command}'`);
  console.error(`Run 'factgraph --help' to see available commands.`);
  process.exitCode = 1;
  return true;
}

export async function runCli(argv: string[]): Promise<void> {
  if (handleHelpCli(argv.length === 0 ? ['help'] : argv)) return;
  if (handleUnknownCommand(argv)) return;
  if (await handleCheckCli(argv)) return;
  if (await handleQueryCli(argv)) return;
  await handleReplCli(argv);
}

// ── Helpers ──────────────────────────────────────────────────────────────────

async function readInputFile(file: string | undefined, command: string): Promise<string | null> {
  if (!file) {
    console.error(`[FactGraph] Usage: factgraph ${command} <file>`);
    process.exitCode = 1;
    return null;
  }
  try {
    return await fsPromises.readFile(file, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[FactGraph] Cannot read ${file}: ${message}`);
    process.exitCode = 1;
    return null;
  }
}

/** `Infinity` without the flag, `null` when the value is not a positive integer. */
function parseLimitFlag(argv: string[]): number | null {
  const position = argv.indexOf('--limit');
  if (position === -1) return Infinity;
  const value = Number(argv[position + 1]);
  return Number.isInteger(value) && value > 0 ? value : null;
}
