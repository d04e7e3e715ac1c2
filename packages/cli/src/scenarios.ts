// ============================================================================
// @toonbench/cli — Scenario Fixtures
// ============================================================================

import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { type JsonValue, ScenarioError } from '@toonbench/core';
import { z } from 'zod';
import { compileLabels, escapeRegExp } from './answers.js';
import type { BenchCase } from './types.js';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const labelSchema = z.object({
  label: z.string().min(1),
  patterns: z.array(z.string().min(1)).optional(),
});

const questionSchema = z
  .object({
    id: z.string().regex(/^[a-z0-9_-]+$/, 'question ids are lowercase slugs'),
    kind: z.string().min(1),
    question: z.string().min(1),
    expected: z.string().min(1),
    labels: z.array(labelSchema).min(2),
    keywords: z.array(z.string()).default([]),
  })
  .superRefine((q, ctx) => {
    if (!q.labels.some((l) => l.label === q.expected)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['expected'],
        message: `"${q.expected}" is not one of the labels`,
      });
    }
    for (const l of q.labels) {
      for (const source of l.patterns ?? []) {
        try {
          new RegExp(source, 'i');
        } catch {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['labels'],
            message: `invalid pattern ${JSON.stringify(source)} for label "${l.label}"`,
          });
        }
      }
    }
  });

const scenarioSchema = z.object({
  id: z.string().regex(/^[a-z0-9_-]+$/, 'scenario ids are lowercase slugs'),
  name: z.string().min(1),
  record: jsonValueSchema,
  questions: z.array(questionSchema).min(1),
});

export const scenarioFileSchema = z.object({
  version: z.literal(1),
  scenarios: z.array(scenarioSchema).min(1),
});

export type ScenarioFile = z.infer<typeof scenarioFileSchema>;

/**
 * Validate parsed fixture JSON and expand it into benchmark cases.
 * Labels without patterns match their own text as a whole word.
 */
export function parseScenarios(data: unknown, source: string): BenchCase[] {
  const parsed = scenarioFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ScenarioError(source, `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }

  const cases: BenchCase[] = [];
  const seen = new Set<string>();
  for (const scenario of parsed.data.scenarios) {
    for (const q of scenario.questions) {
      const id = `${scenario.id}/${q.id}`;
      if (seen.has(id)) {
        throw new ScenarioError(source, `duplicate case id ${id}`);
      }
      seen.add(id);

      const labels = q.labels.map((l) => ({
        label: l.label,
        patterns: l.patterns ?? [`\\b${escapeRegExp(l.label)}\\b`],
      }));
      compileLabels(labels);

      cases.push({
        id,
        scenario: scenario.id,
        scenarioName: scenario.name,
        kind: q.kind,
        record: scenario.record,
        question: q.question,
        expected: q.expected,
        labels,
        keywords: q.keywords,
      });
    }
  }
  return cases;
}

/**
 * Load cases from a fixture file. Without a path, the bundled
 * `fixtures/scenarios.json` is used.
 */
export function loadScenarios(file?: string): BenchCase[] {
  const resolved = file ? path.resolve(file) : defaultScenarioPath();
  if (!existsSync(resolved)) {
    throw new ScenarioError(resolved, 'file not found');
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(resolved, 'utf-8'));
  } catch (err) {
    throw new ScenarioError(resolved, err instanceof Error ? err.message : String(err));
  }
  return parseScenarios(data, resolved);
}

/** Directory holding the bundled fixtures. */
export function fixturesDir(): string {
  const candidates = [
    path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../fixtures'),
    path.resolve(process.cwd(), 'packages/cli/fixtures'),
    path.resolve(process.cwd(), 'fixtures'),
  ];
  return candidates.find((p) => existsSync(p)) ?? candidates[0];
}

function defaultScenarioPath(): string {
  return path.join(fixturesDir(), 'scenarios.json');
}
