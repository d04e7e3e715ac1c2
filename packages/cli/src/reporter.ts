// ============================================================================
// @toonbench/cli — Reporter
// ============================================================================
//
// Aggregates a BenchRun into per-encoding means and JSON→TOON deltas, and
// renders them as a comparison table.
// ============================================================================

import type { Theme } from './ui.js';
import type { BenchRun, CallResult, CaseResult, Encoding } from './types.js';

/** USD per 1M tokens. */
export interface ModelPrice {
  input: number;
  output: number;
}

export const MODEL_PRICES: Record<string, ModelPrice> = {
  'gpt-4o-mini': { input: 0.15, output: 0.6 },
  'gpt-4o': { input: 2.5, output: 10 },
  'gpt-4.1-mini': { input: 0.4, output: 1.6 },
  'gpt-4.1': { input: 2, output: 8 },
  'claude-3-5-haiku': { input: 0.8, output: 4 },
  'claude-3-5-sonnet': { input: 3, output: 15 },
  'claude-3-7-sonnet': { input: 3, output: 15 },
};

/** Accuracy differences below this many percentage points are a tie. */
export const EQUIVALENCE_THRESHOLD_PTS = 10;

export type Verdict = 'equivalent' | 'toon-better' | 'json-better';

export interface EncodingSummary {
  attempted: number;
  succeeded: number;
  failed: number;
  correct: number;
  /** correct / attempted × 100; failed calls count as incorrect */
  accuracyPct: number;
  meanPromptTokens: number;
  meanCompletionTokens: number;
  meanTotalTokens: number;
  meanPayloadChars: number;
  meanLatencyMs: number;
  keywordCoveragePct: number;
  /** Total estimated spend, null when the model has no known price */
  costUsd: number | null;
}

export interface MetricRow {
  metric: string;
  json: number;
  toon: number;
  /** (toon − json) / json × 100, one decimal; null when json is 0 */
  deltaPct: number | null;
  better: 'lower' | 'higher';
}

export interface KindBreakdown {
  kind: string;
  cases: number;
  jsonAccuracyPct: number;
  toonAccuracyPct: number;
}

export interface Summary {
  provider: string;
  model: string;
  cases: number;
  skipped: number;
  json: EncodingSummary;
  toon: EncodingSummary;
  metrics: MetricRow[];
  byKind: KindBreakdown[];
  /** toon − json accuracy, in percentage points */
  accuracyDiffPts: number;
  verdict: Verdict;
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function deltaPct(json: number, toon: number): number | null {
  if (json === 0) return null;
  return round1(((toon - json) / json) * 100);
}

/**
 * Price for a model id, matched by the longest known prefix so that dated
 * and `-latest` ids resolve to their family.
 */
export function priceFor(model: string): ModelPrice | undefined {
  let best: string | undefined;
  for (const prefix of Object.keys(MODEL_PRICES)) {
    if (model.startsWith(prefix) && (best === undefined || prefix.length > best.length)) {
      best = prefix;
    }
  }
  return best === undefined ? undefined : MODEL_PRICES[best];
}

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

function summarizeCalls(calls: CallResult[], price: ModelPrice | undefined): EncodingSummary {
  const ok = calls.filter((c) => c.ok);
  const correct = calls.filter((c) => c.correct).length;

  let costUsd: number | null = null;
  if (price) {
    costUsd = ok.reduce(
      (sum, c) => sum + (c.usage.promptTokens * price.input + c.usage.completionTokens * price.output) / 1_000_000,
      0,
    );
  }

  return {
    attempted: calls.length,
    succeeded: ok.length,
    failed: calls.length - ok.length,
    correct,
    accuracyPct: calls.length === 0 ? 0 : (correct / calls.length) * 100,
    meanPromptTokens: mean(ok.map((c) => c.usage.promptTokens)),
    meanCompletionTokens: mean(ok.map((c) => c.usage.completionTokens)),
    meanTotalTokens: mean(ok.map((c) => c.usage.totalTokens)),
    meanPayloadChars: mean(calls.map((c) => c.payloadChars)),
    meanLatencyMs: mean(ok.map((c) => c.latencyMs)),
    keywordCoveragePct: mean(calls.map((c) => c.keywordScore)) * 100,
    costUsd,
  };
}

function accuracyOf(results: CaseResult[], encoding: Encoding): number {
  if (results.length === 0) return 0;
  return (results.filter((r) => r[encoding].correct).length / results.length) * 100;
}

export function verdictFor(accuracyDiffPts: number): Verdict {
  if (Math.abs(accuracyDiffPts) < EQUIVALENCE_THRESHOLD_PTS) return 'equivalent';
  return accuracyDiffPts > 0 ? 'toon-better' : 'json-better';
}

export function summarize(run: BenchRun): Summary {
  const price = priceFor(run.model);
  const json = summarizeCalls(
    run.results.map((r) => r.json),
    price,
  );
  const toon = summarizeCalls(
    run.results.map((r) => r.toon),
    price,
  );

  const row = (metric: string, j: number, t: number, better: MetricRow['better']): MetricRow => ({
    metric,
    json: j,
    toon: t,
    deltaPct: deltaPct(j, t),
    better,
  });

  const metrics: MetricRow[] = [
    row('Prompt tokens', json.meanPromptTokens, toon.meanPromptTokens, 'lower'),
    row('Completion tokens', json.meanCompletionTokens, toon.meanCompletionTokens, 'lower'),
    row('Total tokens', json.meanTotalTokens, toon.meanTotalTokens, 'lower'),
    row('Payload chars', json.meanPayloadChars, toon.meanPayloadChars, 'lower'),
    row('Latency (ms)', json.meanLatencyMs, toon.meanLatencyMs, 'lower'),
    row('Accuracy (%)', json.accuracyPct, toon.accuracyPct, 'higher'),
    row('Keyword coverage (%)', json.keywordCoveragePct, toon.keywordCoveragePct, 'higher'),
  ];
  if (json.costUsd !== null && toon.costUsd !== null) {
    metrics.push(row('Est. cost (USD)', json.costUsd, toon.costUsd, 'lower'));
  }

  const kinds = new Map<string, CaseResult[]>();
  for (const r of run.results) {
    const list = kinds.get(r.kind) ?? [];
    list.push(r);
    kinds.set(r.kind, list);
  }
  const byKind = [...kinds.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([kind, results]) => ({
      kind,
      cases: results.length,
      jsonAccuracyPct: accuracyOf(results, 'json'),
      toonAccuracyPct: accuracyOf(results, 'toon'),
    }));

  const accuracyDiffPts = round1(toon.accuracyPct - json.accuracyPct);

  return {
    provider: run.provider,
    model: run.model,
    cases: run.results.length,
    skipped: run.skipped.length,
    json,
    toon,
    metrics,
    byKind,
    accuracyDiffPts,
    verdict: verdictFor(accuracyDiffPts),
  };
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

function formatValue(metric: string, value: number): string {
  if (metric.startsWith('Est. cost')) return `$${value.toFixed(4)}`;
  return round1(value).toLocaleString('en-US');
}

export function formatDelta(delta: number | null): string {
  if (delta === null) return 'n/a';
  return `${delta > 0 ? '+' : ''}${delta.toFixed(1)}%`;
}

function colorDelta(theme: Theme, row: MetricRow): string {
  const text = formatDelta(row.deltaPct);
  if (row.deltaPct === null || row.deltaPct === 0) return theme.dimText(text);
  const improved = row.better === 'lower' ? row.deltaPct < 0 : row.deltaPct > 0;
  return improved ? theme.pass(text) : theme.fail(text);
}

const VERDICT_TEXT: Record<Verdict, string> = {
  equivalent: 'TOON and JSON are equivalent on accuracy',
  'toon-better': 'TOON is more accurate than JSON',
  'json-better': 'JSON is more accurate than TOON',
};

/**
 * Render the summary for the terminal.
 */
export function renderReport(summary: Summary, theme: Theme, skipped: BenchRun['skipped'] = []): string {
  const out: string[] = [];
  out.push(theme.heading(`JSON vs TOON: ${summary.model} (${summary.provider})`));
  out.push(theme.dimText(`${summary.cases} cases, ${summary.json.attempted + summary.toon.attempted} model calls`));
  out.push('');

  out.push(
    theme.drawComparisonTable(
      'Mean per call',
      ['Metric', 'JSON', 'TOON', 'Delta'],
      summary.metrics.map((row) => [
        row.metric,
        formatValue(row.metric, row.json),
        formatValue(row.metric, row.toon),
        colorDelta(theme, row),
      ]),
    ),
  );

  if (summary.byKind.length > 0) {
    out.push('');
    out.push(
      theme.drawComparisonTable(
        'Accuracy by question kind',
        ['Kind', 'Cases', 'JSON %', 'TOON %'],
        summary.byKind.map((k) => [
          k.kind,
          String(k.cases),
          formatValue('', k.jsonAccuracyPct),
          formatValue('', k.toonAccuracyPct),
        ]),
      ),
    );
  }

  out.push('');
  for (const [name, s] of [
    ['JSON', summary.json],
    ['TOON', summary.toon],
  ] as const) {
    const line = `${name}: ${s.correct}/${s.attempted} correct, ${s.failed} failed calls`;
    out.push(s.failed > 0 ? theme.warn(line) : line);
  }

  for (const s of skipped) {
    out.push(theme.warn(`Skipped ${s.caseId}: ${s.reason}`));
  }

  const diff = `${summary.accuracyDiffPts > 0 ? '+' : ''}${summary.accuracyDiffPts.toFixed(1)} pts`;
  const verdict = `Verdict: ${VERDICT_TEXT[summary.verdict]} (${diff})`;
  out.push(summary.verdict === 'equivalent' ? theme.info(verdict) : theme.heading(verdict));

  return out.join('\n');
}

/**
 * Machine-readable report written by `--out`.
 */
export function toJsonReport(run: BenchRun, summary: Summary): string {
  return JSON.stringify({ summary, run }, null, 2);
}
