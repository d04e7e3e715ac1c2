// ============================================================================
// @toonbench/cli — Benchmark Driver
// ============================================================================
//
// For every case the same record is embedded twice, once as JSON and once as
// TOON, and the model is asked the same question about each. Calls run one
// at a time, JSON first, with a fixed pause between consecutive calls.
// ============================================================================

import { EncodingError, ModelCallError, logger } from '@toonbench/core';
import { type CompiledLabel, compileLabels, extractLabel, scoreKeywords } from './answers.js';
import { buildPrompt, renderPayload } from './prompt.js';
import type { ChatModel } from './provider.js';
import type { BenchCase, BenchRun, CallResult, CaseResult, Encoding, JsonStyle, SkippedCase } from './types.js';

export interface DriverOptions {
  model: ChatModel;
  temperature: number;
  maxTokens: number;
  /** Pause between consecutive model calls (default: 0) */
  delayMs?: number;
  jsonStyle?: JsonStyle;
  /** Replaceable for tests */
  sleep?: (ms: number) => Promise<void>;
  /** Called after each completed case */
  onCase?: (result: CaseResult, index: number, total: number) => void;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

async function pause(options: DriverOptions): Promise<void> {
  const ms = options.delayMs ?? 0;
  if (ms > 0) await (options.sleep ?? defaultSleep)(ms);
}

async function callModel(
  testCase: BenchCase,
  labels: CompiledLabel[],
  encoding: Encoding,
  payload: string,
  options: DriverOptions,
): Promise<CallResult> {
  const built = buildPrompt(
    payload,
    encoding,
    testCase.question,
    testCase.labels.map((l) => l.label),
  );
  const t = logger.timer(`${testCase.id} [${encoding}]`);

  try {
    const completion = await options.model.complete({
      system: built.system,
      prompt: built.prompt,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
    });
    const latencyMs = t.end({ totalTokens: completion.usage.totalTokens });
    const predicted = extractLabel(completion.text, labels);

    return {
      encoding,
      ok: true,
      payloadChars: payload.length,
      usage: completion.usage,
      latencyMs,
      answer: completion.text,
      predicted,
      correct: predicted === testCase.expected,
      keywordScore: scoreKeywords(completion.text, testCase.keywords).score,
      model: completion.model,
    };
  } catch (err) {
    if (!(err instanceof ModelCallError)) throw err;
    logger.warn('Model call failed', { case: testCase.id, encoding, status: err.status, error: err.message });
    return {
      encoding,
      ok: false,
      payloadChars: payload.length,
      usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
      latencyMs: t.elapsed(),
      answer: '',
      predicted: null,
      correct: false,
      keywordScore: 0,
      error: err.message,
    };
  }
}

/**
 * Run one case against both encodings. Both payloads are rendered before
 * any call is made, so an {@link EncodingError} leaves no partial result.
 */
export async function runCase(testCase: BenchCase, options: DriverOptions): Promise<CaseResult> {
  const style = options.jsonStyle ?? 'pretty';
  const jsonPayload = renderPayload(testCase.record, 'json', style);
  const toonPayload = renderPayload(testCase.record, 'toon');
  const labels = compileLabels(testCase.labels);

  const json = await callModel(testCase, labels, 'json', jsonPayload, options);
  await pause(options);
  const toon = await callModel(testCase, labels, 'toon', toonPayload, options);

  return {
    caseId: testCase.id,
    scenario: testCase.scenario,
    kind: testCase.kind,
    expected: testCase.expected,
    json,
    toon,
  };
}

/**
 * Run every case in order. Cases whose record cannot be encoded are skipped
 * and logged; model failures are recorded as failed calls.
 */
export async function runBenchmark(cases: BenchCase[], options: DriverOptions): Promise<BenchRun> {
  const startedAt = new Date().toISOString();
  const results: CaseResult[] = [];
  const skipped: SkippedCase[] = [];

  logger.info('Benchmark started', {
    provider: options.model.provider,
    model: options.model.model,
    cases: cases.length,
  });

  for (let i = 0; i < cases.length; i++) {
    const testCase = cases[i];
    if (results.length > 0) await pause(options);

    let result: CaseResult;
    try {
      result = await runCase(testCase, options);
    } catch (err) {
      if (!(err instanceof EncodingError)) throw err;
      logger.error('Skipping case: record cannot be encoded', {
        case: testCase.id,
        path: err.path,
        reason: err.reason,
      });
      skipped.push({ caseId: testCase.id, reason: err.message });
      continue;
    }

    results.push(result);
    options.onCase?.(result, i, cases.length);
  }

  const attempted = results.length * 2;
  const succeeded = results.reduce((n, r) => n + (r.json.ok ? 1 : 0) + (r.toon.ok ? 1 : 0), 0);
  if (attempted > 0 && succeeded < attempted) {
    logger.warn('Some model calls failed', { attempted, failed: attempted - succeeded });
  }

  return {
    provider: options.model.provider,
    model: options.model.model,
    startedAt,
    finishedAt: new Date().toISOString(),
    jsonStyle: options.jsonStyle ?? 'pretty',
    results,
    skipped,
    allCallsFailed: attempted > 0 && succeeded === 0,
  };
}
