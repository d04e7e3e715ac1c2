import { describe, expect, it } from 'vitest';
import { deltaPct, priceFor, renderReport, round1, summarize, toJsonReport, verdictFor } from '../reporter.js';
import type { BenchRun, CallResult, CaseResult, Encoding } from '../types.js';
import { createTheme } from '../ui.js';

function call(encoding: Encoding, overrides: Partial<CallResult> = {}): CallResult {
  return {
    encoding,
    ok: true,
    payloadChars: 100,
    usage: { promptTokens: 100, completionTokens: 10, totalTokens: 110 },
    latencyMs: 500,
    answer: 'yes',
    predicted: 'yes',
    correct: true,
    keywordScore: 1,
    ...overrides,
  };
}

function caseResult(id: string, json: CallResult, toon: CallResult, kind = 'lookup'): CaseResult {
  return { caseId: id, scenario: id.split('/')[0], kind, expected: 'yes', json, toon };
}

function makeRun(results: CaseResult[], model = 'test-model'): BenchRun {
  return {
    provider: 'openai',
    model,
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:01:00.000Z',
    jsonStyle: 'pretty',
    results,
    skipped: [],
    allCallsFailed: false,
  };
}

const usage = (promptTokens: number) => ({ promptTokens, completionTokens: 0, totalTokens: promptTokens });

const tokenRun = makeRun([
  caseResult('s1/q1', call('json', { usage: usage(100) }), call('toon', { usage: usage(80) })),
  caseResult('s1/q2', call('json', { usage: usage(120) }), call('toon', { usage: usage(90) })),
]);

describe('summarize', () => {
  it('averages prompt tokens and reports the relative delta', () => {
    const summary = summarize(tokenRun);
    expect(summary.json.meanPromptTokens).toBe(110);
    expect(summary.toon.meanPromptTokens).toBe(85);
    expect(summary.metrics.find((m) => m.metric === 'Prompt tokens')?.deltaPct).toBe(-22.7);
  });

  it('counts failed calls as incorrect but leaves them out of token means', () => {
    const failed = call('json', {
      ok: false,
      usage: usage(0),
      correct: false,
      predicted: null,
      keywordScore: 0,
      payloadChars: 300,
      error: 'timeout',
    });
    const summary = summarize(
      makeRun([
        caseResult('s1/q1', call('json', { usage: usage(100) }), call('toon')),
        caseResult('s1/q2', failed, call('toon')),
      ]),
    );

    expect(summary.json).toMatchObject({ attempted: 2, succeeded: 1, failed: 1, correct: 1, accuracyPct: 50 });
    expect(summary.json.meanPromptTokens).toBe(100);
    expect(summary.json.meanPayloadChars).toBe(200);
    expect(summary.json.keywordCoveragePct).toBe(50);
    expect(summary.toon.accuracyPct).toBe(100);
    expect(summary.accuracyDiffPts).toBe(50);
    expect(summary.verdict).toBe('toon-better');
  });

  it('breaks accuracy down by question kind', () => {
    const summary = summarize(
      makeRun([
        caseResult('s1/q1', call('json'), call('toon', { correct: false }), 'trend'),
        caseResult('s1/q2', call('json'), call('toon'), 'diagnosis'),
        caseResult('s1/q3', call('json', { correct: false }), call('toon'), 'trend'),
      ]),
    );
    expect(summary.byKind).toEqual([
      { kind: 'diagnosis', cases: 1, jsonAccuracyPct: 100, toonAccuracyPct: 100 },
      { kind: 'trend', cases: 2, jsonAccuracyPct: 50, toonAccuracyPct: 50 },
    ]);
  });

  it('estimates cost for priced models only', () => {
    const priced = summarize(
      makeRun(
        [
          caseResult(
            's1/q1',
            call('json', { usage: { promptTokens: 1000, completionTokens: 100, totalTokens: 1100 } }),
            call('toon', { usage: { promptTokens: 500, completionTokens: 100, totalTokens: 600 } }),
          ),
        ],
        'gpt-4o-mini-2024-07-18',
      ),
    );
    expect(priced.json.costUsd).toBeCloseTo(0.00021, 10);
    expect(priced.toon.costUsd).toBeCloseTo(0.000135, 10);
    expect(priced.metrics.at(-1)?.metric).toBe('Est. cost (USD)');

    const unpriced = summarize(tokenRun);
    expect(unpriced.json.costUsd).toBeNull();
    expect(unpriced.metrics.some((m) => m.metric === 'Est. cost (USD)')).toBe(false);
  });

  it('handles an empty run', () => {
    const summary = summarize(makeRun([]));
    expect(summary.cases).toBe(0);
    expect(summary.json.accuracyPct).toBe(0);
    expect(summary.metrics.every((m) => m.deltaPct === null)).toBe(true);
    expect(summary.verdict).toBe('equivalent');
  });
});

describe('deltaPct', () => {
  it('rounds to one decimal', () => {
    expect(deltaPct(110, 85)).toBe(-22.7);
    expect(deltaPct(200, 250)).toBe(25);
  });

  it('is null when the JSON value is zero', () => {
    expect(deltaPct(0, 5)).toBeNull();
  });
});

describe('round1', () => {
  it('rounds to one decimal place', () => {
    expect(round1(1.25)).toBe(1.3);
    expect(round1(2)).toBe(2);
  });
});

describe('verdictFor', () => {
  it('calls differences under ten points equivalent', () => {
    expect(verdictFor(0)).toBe('equivalent');
    expect(verdictFor(9.9)).toBe('equivalent');
    expect(verdictFor(-9.9)).toBe('equivalent');
  });

  it('names the better encoding from ten points up', () => {
    expect(verdictFor(10)).toBe('toon-better');
    expect(verdictFor(-10)).toBe('json-better');
  });
});

describe('priceFor', () => {
  it('matches the longest known prefix', () => {
    expect(priceFor('gpt-4o-mini-2024-07-18')).toEqual({ input: 0.15, output: 0.6 });
    expect(priceFor('gpt-4o-2024-08-06')).toEqual({ input: 2.5, output: 10 });
    expect(priceFor('claude-3-5-haiku-latest')).toEqual({ input: 0.8, output: 4 });
  });

  it('returns undefined for unknown models', () => {
    expect(priceFor('local-llama')).toBeUndefined();
  });
});

describe('renderReport', () => {
  const theme = createTheme({ color: false, unicode: false });

  it('prints a comparison row per metric', () => {
    const lines = renderReport(summarize(tokenRun), theme).split('\n');
    expect(lines[0]).toBe('JSON vs TOON: test-model (openai)');
    expect(lines[1]).toBe('2 cases, 4 model calls');
    expect(lines.find((l) => l.startsWith('| Prompt tokens'))).toMatch(/^\| Prompt tokens +\| +110 \| +85 \| +-22\.7% \|$/);
    expect(lines.find((l) => l.startsWith('| Accuracy (%)'))).toMatch(/^\| Accuracy \(%\) +\| +100 \| +100 \| +0\.0% \|$/);
  });

  it('ends with the verdict', () => {
    const lines = renderReport(summarize(tokenRun), theme).split('\n');
    expect(lines.at(-1)).toBe('Verdict: TOON and JSON are equivalent on accuracy (0.0 pts)');
  });

  it('lists skipped cases', () => {
    const text = renderReport(summarize(tokenRun), theme, [{ caseId: 's1/q9', reason: 'Cannot encode value at $.x: NaN' }]);
    expect(text.split('\n')).toContain('Skipped s1/q9: Cannot encode value at $.x: NaN');
  });
});

describe('toJsonReport', () => {
  it('serializes the summary and the raw run', () => {
    const summary = summarize(tokenRun);
    const parsed = JSON.parse(toJsonReport(tokenRun, summary));
    expect(parsed.summary.verdict).toBe('equivalent');
    expect(parsed.run.results).toHaveLength(2);
  });
});
