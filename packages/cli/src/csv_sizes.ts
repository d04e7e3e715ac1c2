// ============================================================================
// @toonbench/cli — CSV Size Benchmark
// ============================================================================
//
// Loads tabular clinical exports, re-encodes each table as JSON and TOON, and
// compares their sizes against the CSV source. Every table also has to
// survive a TOON round trip.
// ============================================================================

import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import {
  type JsonObject,
  type TokenizerManager,
  formatPayload,
  logger,
  parseBareToken,
  verifyRoundTrip,
} from '@toonbench/core';
import Papa from 'papaparse';
import type { Theme } from './ui.js';
import { deltaPct, formatDelta } from './reporter.js';

export interface CsvTable {
  source: string;
  fields: string[];
  rows: JsonObject[];
  /** Non-fatal problems, e.g. rows with too few or too many cells */
  warnings: string[];
}

export interface SizeMeasure {
  chars: number;
  tokens: number;
}

export interface CsvSizeResult {
  source: string;
  rows: number;
  columns: number;
  csv: SizeMeasure;
  json: SizeMeasure;
  toon: SizeMeasure;
  /** TOON chars relative to CSV chars, percent */
  toonVsCsvPct: number | null;
  /** TOON tokens relative to JSON tokens, percent */
  toonVsJsonTokensPct: number | null;
  roundTripOk: boolean;
  /** First mismatch when the round trip failed */
  mismatch?: string;
  warnings: string[];
}

/**
 * Parse CSV text with a header row. Cells are typed the way a bare TOON
 * token would be: numbers and `true`/`false`/`null` become values, anything
 * else stays a string. Missing cells become null; extra cells are dropped.
 */
export function parseCsv(text: string, source: string): CsvTable {
  const parsed = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    delimiter: ',',
    skipEmptyLines: true,
  });

  const fields = parsed.meta.fields ?? [];
  const warnings = parsed.errors.map((e) =>
    e.row === undefined ? `${source}: ${e.message}` : `${source}: row ${e.row + 1}: ${e.message}`,
  );

  const rows = parsed.data.map((raw) => {
    const row: JsonObject = {};
    for (const field of fields) {
      const cell = raw[field];
      row[field] = typeof cell === 'string' ? parseBareToken(cell) : null;
    }
    return row;
  });

  return { source, fields, rows, warnings };
}

/**
 * Measure one parsed table against its CSV source text.
 */
export function measureCsv(table: CsvTable, csvText: string, tokenizer: TokenizerManager): CsvSizeResult {
  const json = formatPayload(table.rows, 'json');
  const toon = formatPayload(table.rows, 'toon');
  const check = verifyRoundTrip(table.rows);

  const measure = (text: string): SizeMeasure => ({ chars: text.length, tokens: tokenizer.countTokens(text) });
  const csvSize = measure(csvText);
  const jsonSize = measure(json);
  const toonSize = measure(toon);

  const result: CsvSizeResult = {
    source: table.source,
    rows: table.rows.length,
    columns: table.fields.length,
    csv: csvSize,
    json: jsonSize,
    toon: toonSize,
    toonVsCsvPct: deltaPct(csvSize.chars, toonSize.chars),
    toonVsJsonTokensPct: deltaPct(jsonSize.tokens, toonSize.tokens),
    roundTripOk: check.ok,
    warnings: table.warnings,
  };
  if (check.mismatch) {
    result.mismatch = `${check.mismatch.path}: expected ${check.mismatch.expected}, got ${check.mismatch.actual}`;
  }
  return result;
}

/**
 * Measure every `*.csv` file in a directory, in file-name order.
 */
export async function runSizeBenchmark(dir: string, tokenizer: TokenizerManager): Promise<CsvSizeResult[]> {
  const files = (await readdir(dir)).filter((f) => f.toLowerCase().endsWith('.csv')).sort();
  const results: CsvSizeResult[] = [];

  for (const file of files) {
    const text = await readFile(path.join(dir, file), 'utf-8');
    const table = parseCsv(text, file);
    for (const warning of table.warnings) {
      logger.warn('Malformed CSV row', { warning });
    }
    const result = measureCsv(table, text, tokenizer);
    if (!result.roundTripOk) {
      logger.error('TOON round trip failed', { file, mismatch: result.mismatch });
    }
    results.push(result);
  }

  return results;
}

export function renderSizes(results: CsvSizeResult[], theme: Theme): string {
  const rows = results.map((r) => [
    r.source,
    String(r.rows),
    r.csv.chars.toLocaleString('en-US'),
    r.json.chars.toLocaleString('en-US'),
    r.toon.chars.toLocaleString('en-US'),
    formatDelta(r.toonVsCsvPct),
    r.json.tokens.toLocaleString('en-US'),
    r.toon.tokens.toLocaleString('en-US'),
    formatDelta(r.toonVsJsonTokensPct),
    r.roundTripOk ? theme.pass(theme.chars.check) : theme.fail(theme.chars.cross),
  ]);

  return theme.drawComparisonTable(
    'CSV vs JSON vs TOON',
    ['File', 'Rows', 'CSV ch', 'JSON ch', 'TOON ch', 'vs CSV', 'JSON tok', 'TOON tok', 'vs JSON', 'RT'],
    rows,
  );
}
