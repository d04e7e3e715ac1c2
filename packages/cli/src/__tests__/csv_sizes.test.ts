import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { TokenizerManager, encodeToon } from '@toonbench/core';
import { afterAll, afterEach, beforeEach, describe, expect, it } from 'vitest';
import { measureCsv, parseCsv, renderSizes, runSizeBenchmark } from '../csv_sizes.js';
import { fixturesDir } from '../scenarios.js';
import { createTheme } from '../ui.js';

const tokenizer = new TokenizerManager('o200k_base');

afterAll(() => {
  tokenizer.dispose();
});

describe('parseCsv', () => {
  it('types cells like bare TOON tokens', () => {
    const table = parseCsv('patient_id,age,code,on_pressors\nP-1,61,007,true\nP-2,,"Rivera, J.",false\n', 'units.csv');
    expect(table.fields).toEqual(['patient_id', 'age', 'code', 'on_pressors']);
    expect(table.rows).toEqual([
      { patient_id: 'P-1', age: 61, code: '007', on_pressors: true },
      { patient_id: 'P-2', age: '', code: 'Rivera, J.', on_pressors: false },
    ]);
    expect(table.warnings).toEqual([]);
  });

  it('keeps malformed rows and reports them as warnings', () => {
    const table = parseCsv('a,b,c\n1,2,3\n4,5\n6,7,8,9\n', 'bad.csv');
    expect(table.rows).toEqual([
      { a: 1, b: 2, c: 3 },
      { a: 4, b: 5, c: null },
      { a: 6, b: 7, c: 8 },
    ]);
    expect(table.warnings).toHaveLength(2);
    expect(table.warnings.every((w) => w.startsWith('bad.csv: row '))).toBe(true);
  });

  it('returns no rows for empty input', () => {
    const table = parseCsv('', 'empty.csv');
    expect(table.rows).toEqual([]);
  });
});

describe('measureCsv', () => {
  it('compares CSV, JSON and TOON sizes and checks the round trip', () => {
    const csv = 'test,value,flag\nLactate,4.6,HIGH\nWBC,19.2,HIGH\n';
    const table = parseCsv(csv, 'labs.csv');
    const result = measureCsv(table, csv, tokenizer);
    const toon = encodeToon(table.rows);

    expect(toon).toBe('[2]{test,value,flag}:\n  Lactate,4.6,HIGH\n  WBC,19.2,HIGH');
    expect(result).toMatchObject({
      source: 'labs.csv',
      rows: 2,
      columns: 3,
      csv: { chars: csv.length, tokens: tokenizer.countTokens(csv) },
      toon: { chars: toon.length, tokens: tokenizer.countTokens(toon) },
      roundTripOk: true,
    });
    expect(result.json.chars).toBe(JSON.stringify(table.rows, null, 2).length);
    expect(result.mismatch).toBeUndefined();
  });
});

describe('runSizeBenchmark', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'toonbench-csv-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('measures every bundled table', async () => {
    const results = await runSizeBenchmark(path.join(fixturesDir(), 'csv'), tokenizer);
    expect(results.map((r) => r.source)).toEqual([
      'census.csv',
      'demographics.csv',
      'labs.csv',
      'medications.csv',
      'vitals.csv',
    ]);
    expect(results.every((r) => r.roundTripOk)).toBe(true);
    expect(results.every((r) => r.warnings.length === 0)).toBe(true);
  });

  it('ignores other files and sorts by name', async () => {
    fs.writeFileSync(path.join(tmpDir, 'b.csv'), 'x\n1\n');
    fs.writeFileSync(path.join(tmpDir, 'a.csv'), 'y\n2\n');
    fs.writeFileSync(path.join(tmpDir, 'notes.txt'), 'not a table');

    const results = await runSizeBenchmark(tmpDir, tokenizer);
    expect(results.map((r) => r.source)).toEqual(['a.csv', 'b.csv']);
  });

  it('renders one table row per file', async () => {
    fs.writeFileSync(path.join(tmpDir, 'one.csv'), 'x,y\n1,2\n');
    const results = await runSizeBenchmark(tmpDir, tokenizer);
    const lines = renderSizes(results, createTheme({ color: false, unicode: false })).split('\n');
    expect(lines.filter((l) => l.startsWith('| one.csv'))).toHaveLength(1);
    expect(lines.find((l) => l.startsWith('| one.csv'))).toMatch(/\[ok\] \|$/);
  });
});
