// ============================================================================
// @toonbench/cli — Answer Extraction
// ============================================================================
//
// Model answers are free text. Each question carries an explicit list of
// labels, each with one or more case-insensitive patterns; the label whose
// pattern matches earliest in the answer is the prediction.
// ============================================================================

import type { LabelPattern } from './types.js';

export interface CompiledLabel {
  label: string;
  patterns: RegExp[];
}

export interface KeywordScore {
  /** found / expected, 1 when nothing is expected */
  score: number;
  found: string[];
  missing: string[];
}

/**
 * Compile label patterns. Throws a SyntaxError naming the label when a
 * pattern is not a valid regular expression.
 */
export function compileLabels(labels: LabelPattern[]): CompiledLabel[] {
  return labels.map(({ label, patterns }) => ({
    label,
    patterns: patterns.map((source) => {
      try {
        return new RegExp(source, 'i');
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new SyntaxError(`Invalid pattern for label "${label}": ${reason}`);
      }
    }),
  }));
}

/**
 * Pick the label whose patterns match earliest in `text`. Ties on position
 * go to the label declared first. Returns null when nothing matches.
 */
export function extractLabel(text: string, labels: CompiledLabel[]): string | null {
  let best: { label: string; index: number } | null = null;

  for (const { label, patterns } of labels) {
    for (const pattern of patterns) {
      const match = pattern.exec(text);
      if (match && (best === null || match.index < best.index)) {
        best = { label, index: match.index };
      }
    }
  }

  return best?.label ?? null;
}

/** Case-insensitive substring coverage of the expected keywords. */
export function scoreKeywords(text: string, keywords: string[]): KeywordScore {
  if (keywords.length === 0) {
    return { score: 1, found: [], missing: [] };
  }

  const haystack = text.toLowerCase();
  const found: string[] = [];
  const missing: string[] = [];
  for (const keyword of keywords) {
    (haystack.includes(keyword.toLowerCase()) ? found : missing).push(keyword);
  }
  return { score: found.length / keywords.length, found, missing };
}

/** Escape a literal for use inside a RegExp. */
export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
