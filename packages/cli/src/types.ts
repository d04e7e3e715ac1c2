// ============================================================================
// @toonbench/cli — Benchmark Types
// ============================================================================

import type { JsonValue } from '@toonbench/core';

/** The two prompt encodings being compared. */
export type Encoding = 'json' | 'toon';

export const ENCODINGS: readonly Encoding[] = ['json', 'toon'];

/** One recognised answer and the case-insensitive patterns that identify it. */
export interface LabelPattern {
  label: string;
  patterns: string[];
}

/**
 * A single benchmark question against a single clinical record.
 */
export interface BenchCase {
  /** `${scenario}/${question}` */
  id: string;
  scenario: string;
  scenarioName: string;
  /** Question category used for the per-kind breakdown */
  kind: string;
  record: JsonValue;
  question: string;
  /** Must be one of `labels[].label` */
  expected: string;
  labels: LabelPattern[];
  keywords: string[];
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/** Outcome of one model call for one encoding. */
export interface CallResult {
  encoding: Encoding;
  /** False when the model call failed */
  ok: boolean;
  payloadChars: number;
  usage: TokenUsage;
  latencyMs: number;
  answer: string;
  predicted: string | null;
  correct: boolean;
  /** Fraction of expected keywords found in the answer, 0..1 */
  keywordScore: number;
  model?: string;
  error?: string;
}

export interface CaseResult {
  caseId: string;
  scenario: string;
  kind: string;
  expected: string;
  json: CallResult;
  toon: CallResult;
}

export interface SkippedCase {
  caseId: string;
  reason: string;
}

export interface BenchRun {
  provider: string;
  model: string;
  startedAt: string;
  finishedAt: string;
  jsonStyle: JsonStyle;
  results: CaseResult[];
  skipped: SkippedCase[];
  /** At least one call was attempted and none succeeded */
  allCallsFailed: boolean;
}

export type JsonStyle = 'pretty' | 'compact';
