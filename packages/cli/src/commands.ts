// ============================================================================
// @toonbench/cli — Commands
// ============================================================================
// Commands:
//   toonbench run      [--dry-run] [--provider openai|anthropic] [--model id]
//                      [--scenarios file.json] [--limit N] [--json-style pretty|compact]
//                      [--delay ms] [--out report.json]
//   toonbench encode   <file.json> [--indent N] [--delimiter comma|tab|pipe] [--out file.toon]
//   toonbench decode   <file.toon> [--indent N] [--out file.json]
//   toonbench validate <file.json> [--indent N] [--delimiter comma|tab|pipe]
//   toonbench sizes    [dir]
//   toonbench help
// ============================================================================

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import {
  type JsonValue,
  ToonbenchError,
  TokenizerManager,
  type ToonDelimiter,
  analyzePayloads,
  decodeToon,
  encodeToon,
  verifyRoundTrip,
} from '@toonbench/core';
import { type BenchConfig, loadConfig } from './config.js';
import { renderSizes, runSizeBenchmark } from './csv_sizes.js';
import { runBenchmark } from './driver.js';
import { type ChatModel, DryRunChatModel, createChatModel } from './provider.js';
import { renderReport, summarize, toJsonReport } from './reporter.js';
import { fixturesDir, loadScenarios } from './scenarios.js';
import { type Theme, createTheme, supportsColor, supportsUnicode } from './ui.js';

/** Where command output goes. */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  isTTY: boolean;
}

/** Seams replaced in tests. */
export interface CliDeps {
  createModel?: (config: BenchConfig) => ChatModel;
  sleep?: (ms: number) => Promise<void>;
}

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_ROUND_TRIP = 2;

/** Bad command-line usage. */
export class UsageError extends ToonbenchError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

const BOOLEAN_FLAGS = new Set(['dry-run', 'no-color', 'color', 'ascii', 'unicode', 'help']);

export interface ParsedArgs {
  positionals: string[];
  flags: Map<string, string | true>;
}

/**
 * Split argv into positionals and `--flag value` / `--flag=value` pairs.
 */
export function parseArgv(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (BOOLEAN_FLAGS.has(name)) {
      flags.set(name, true);
    } else if (eq !== -1) {
      flags.set(name, arg.slice(eq + 1));
    } else {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`--${name} needs a value`);
      }
      flags.set(name, value);
      i++;
    }
  }

  return { positionals, flags };
}

function getFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

function hasFlag(args: ParsedArgs, name: string): boolean {
  return args.flags.has(name);
}

function intFlag(args: ParsedArgs, name: string, min: number): number | undefined {
  const raw = getFlag(args, name);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new UsageError(`--${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return n;
}

const DELIMITERS = new Map<string, ToonDelimiter>([
  ['comma', ','],
  ['tab', '\t'],
  ['pipe', '|'],
]);

function delimiterFlag(args: ParsedArgs): ToonDelimiter | undefined {
  const raw = getFlag(args, 'delimiter');
  if (raw === undefined) return undefined;
  const delimiter = DELIMITERS.get(raw);
  if (delimiter === undefined) {
    throw new UsageError(`--delimiter must be one of comma, tab, pipe, got "${raw}"`);
  }
  return delimiter;
}

function inputPath(args: ParsedArgs, command: string): string {
  const file = args.positionals[1];
  if (!file) throw new UsageError(`${command} needs an input file`);
  return file;
}

async function writeOutput(file: string, text: string): Promise<void> {
  await mkdir(path.dirname(path.resolve(file)), { recursive: true });
  await writeFile(file, text.endsWith('\n') ? text : `${text}\n`, 'utf-8');
}

async function readJson(file: string): Promise<JsonValue> {
  const text = await readFile(file, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new UsageError(`${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

interface Context {
  args: ParsedArgs;
  io: CliIO;
  deps: CliDeps;
  theme: Theme;
}

async function runCommand({ args, io, deps, theme }: Context): Promise<number> {
  const config = loadConfig(io.env, {
    provider: getFlag(args, 'provider'),
    model: getFlag(args, 'model'),
    delay: getFlag(args, 'delay'),
    jsonStyle: getFlag(args, 'json-style'),
    dryRun: hasFlag(args, 'dry-run'),
  });

  let cases = loadScenarios(getFlag(args, 'scenarios'));
  const limit = intFlag(args, 'limit', 1);
  if (limit !== undefined) cases = cases.slice(0, limit);

  const model = (deps.createModel ?? createChatModel)(config);
  const mode = config.dryRun ? theme.warn(' [dry run: prompts are counted, not sent]') : '';
  io.stdout(`${theme.heading('toonbench run')} ${theme.dimText(`${cases.length} cases`)}${mode}`);

  try {
    const run = await runBenchmark(cases, {
      model,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
      delayMs: config.delayMs,
      jsonStyle: config.jsonStyle,
      sleep: deps.sleep,
      onCase: (result, index, total) => {
        const mark = (ok: boolean, correct: boolean) =>
          !ok ? theme.warn('error') : correct ? theme.pass(theme.chars.check) : theme.fail(theme.chars.cross);
        io.stdout(
          `  [${index + 1}/${total}] ${result.caseId}  JSON ${mark(result.json.ok, result.json.correct)}  TOON ${mark(result.toon.ok, result.toon.correct)}`,
        );
      },
    });

    const summary = summarize(run);
    io.stdout('');
    io.stdout(renderReport(summary, theme, run.skipped));

    const out = getFlag(args, 'out');
    if (out) {
      await writeOutput(out, toJsonReport(run, summary));
      io.stdout(theme.dimText(`Report written to ${out}`));
    }

    if (run.allCallsFailed) {
      io.stderr('Error: every model call failed');
      return EXIT_ERROR;
    }
    return EXIT_OK;
  } finally {
    if (model instanceof DryRunChatModel) model.dispose();
  }
}

async function encodeCommand({ args, io }: Context): Promise<number> {
  const file = inputPath(args, 'encode');
  const value = await readJson(file);
  const toon = encodeToon(value, { indent: intFlag(args, 'indent', 1), delimiter: delimiterFlag(args) });

  const out = getFlag(args, 'out');
  if (out) {
    await writeOutput(out, toon);
  } else {
    io.stdout(toon);
  }
  return EXIT_OK;
}

async function decodeCommand({ args, io }: Context): Promise<number> {
  const file = inputPath(args, 'decode');
  const text = await readFile(file, 'utf-8');
  const json = JSON.stringify(decodeToon(text, { indent: intFlag(args, 'indent', 1) }), null, 2);

  const out = getFlag(args, 'out');
  if (out) {
    await writeOutput(out, json);
  } else {
    io.stdout(json);
  }
  return EXIT_OK;
}

async function validateCommand({ args, io, theme }: Context): Promise<number> {
  const file = inputPath(args, 'validate');
  const value = await readJson(file);
  const result = verifyRoundTrip(value, { indent: intFlag(args, 'indent', 1), delimiter: delimiterFlag(args) });

  const tokenizer = new TokenizerManager();
  try {
    for (const a of analyzePayloads(value, tokenizer)) {
      io.stdout(`  ${a.format.padEnd(12)} ${String(a.chars).padStart(8)} chars ${String(a.tokens ?? 0).padStart(8)} tokens`);
    }
  } finally {
    tokenizer.dispose();
  }

  if (result.ok) {
    io.stdout(theme.pass(`${theme.chars.check} ${file}: round trip OK`));
    return EXIT_OK;
  }

  const m = result.mismatch;
  const detail = m ? ` at ${m.path}: expected ${m.expected}, got ${m.actual}` : '';
  io.stderr(theme.fail(`${theme.chars.cross} ${file}: round trip failed${detail}`));
  return EXIT_ROUND_TRIP;
}

async function sizesCommand({ args, io, theme }: Context): Promise<number> {
  const dir = args.positionals[1] ?? path.join(fixturesDir(), 'csv');
  const tokenizer = new TokenizerManager();
  try {
    const results = await runSizeBenchmark(dir, tokenizer);
    if (results.length === 0) {
      throw new UsageError(`no .csv files in ${dir}`);
    }
    io.stdout(renderSizes(results, theme));
    for (const r of results) {
      for (const w of r.warnings) io.stdout(theme.warn(`  ${w}`));
    }
    return results.every((r) => r.roundTripOk) ? EXIT_OK : EXIT_ROUND_TRIP;
  } finally {
    tokenizer.dispose();
  }
}

export function usage(): string {
  return [
    'Usage: toonbench <command> [options]',
    '',
    'Commands:',
    '  run                  Ask the model every scenario question with JSON and TOON payloads',
    '  encode <file.json>   Print the TOON encoding of a JSON file',
    '  decode <file.toon>   Print the JSON value of a TOON file',
    '  validate <file.json> Check that a JSON file survives a TOON round trip',
    '  sizes [dir]          Compare CSV, JSON and TOON sizes for CSV tables',
    '  help                 Show this message',
    '',
    'Options:',
    '  --dry-run                    Count prompt tokens locally instead of calling the API',
    '  --provider openai|anthropic  Model provider (env: TOONBENCH_PROVIDER)',
    '  --model <id>                 Model id (env: TOONBENCH_MODEL)',
    '  --scenarios <file.json>      Scenario fixture file',
    '  --limit <N>                  Run only the first N cases',
    '  --json-style pretty|compact  JSON payload layout (env: TOONBENCH_JSON_STYLE)',
    '  --delay <ms>                 Pause between model calls (env: TOONBENCH_DELAY_MS)',
    '  --out <file>                 Write the result to a file',
    '  --indent <N>                 TOON indentation width',
    '  --delimiter comma|tab|pipe   TOON value delimiter',
    '  --no-color                   Disable colored output',
  ].join('\n');
}

const COMMANDS = new Map<string, (ctx: Context) => Promise<number>>([
  ['run', runCommand],
  ['encode', encodeCommand],
  ['decode', decodeCommand],
  ['validate', validateCommand],
  ['sizes', sizesCommand],
]);

/**
 * Run one CLI invocation and return its exit code. Errors are printed as
 * `Error: <message>`.
 */
export async function runCli(argv: string[], io: CliIO, deps: CliDeps = {}): Promise<number> {
  const theme = createTheme({
    color: supportsColor(argv, io.env, io.isTTY),
    unicode: supportsUnicode(argv, io.env),
  });

  try {
    const args = parseArgv(argv);
    const command = args.positionals[0];

    if (command === undefined || command === 'help' || hasFlag(args, 'help')) {
      io.stdout(usage());
      return EXIT_OK;
    }

    const handler = COMMANDS.get(command);
    if (!handler) {
      io.stderr(`Error: unknown command "${command}"`);
      io.stderr(usage());
      return EXIT_ERROR;
    }

    return await handler({ args, io, deps, theme });
  } catch (error) {
    io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_ERROR;
  }
}
