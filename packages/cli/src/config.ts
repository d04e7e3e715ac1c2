// ============================================================================
// @toonbench/cli — Configuration
// ============================================================================
//
// Settings come from the environment (a `.env` file is loaded by the CLI
// entry point through dotenv) and are overridden by command-line flags.
//
//   OPENAI_API_KEY          key for the openai provider
//   ANTHROPIC_API_KEY       key for the anthropic provider
//   TOONBENCH_PROVIDER      openai | anthropic            (default: openai)
//   TOONBENCH_MODEL         model id                      (default per provider)
//   TOONBENCH_TEMPERATURE   sampling temperature          (default: 0.1)
//   TOONBENCH_MAX_TOKENS    completion token limit        (default: 500)
//   TOONBENCH_DELAY_MS      pause between model calls     (default: 500)
//   TOONBENCH_JSON_STYLE    pretty | compact              (default: pretty)
// ============================================================================

import { ConfigError } from '@toonbench/core';
import { z } from 'zod';
import type { JsonStyle } from './types.js';

export type Provider = 'openai' | 'anthropic';

export const DEFAULT_MODELS: Record<Provider, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
};

const API_KEY_VARS: Record<Provider, 'OPENAI_API_KEY' | 'ANTHROPIC_API_KEY'> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

const envSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  TOONBENCH_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
  TOONBENCH_MODEL: z.string().optional(),
  TOONBENCH_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  TOONBENCH_MAX_TOKENS: z.coerce.number().int().positive().default(500),
  TOONBENCH_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  TOONBENCH_JSON_STYLE: z.enum(['pretty', 'compact']).default('pretty'),
});

export interface BenchConfig {
  provider: Provider;
  model: string;
  apiKey?: string;
  temperature: number;
  maxTokens: number;
  delayMs: number;
  jsonStyle: JsonStyle;
  dryRun: boolean;
}

/** Flag values as typed on the command line. */
export interface ConfigOverrides {
  provider?: string;
  model?: string;
  delay?: string;
  jsonStyle?: string;
  dryRun?: boolean;
}

/**
 * Resolve the benchmark configuration. Throws {@link ConfigError} for invalid
 * values, and for a missing API key unless this is a dry run.
 */
export function loadConfig(env: NodeJS.ProcessEnv, overrides: ConfigOverrides = {}): BenchConfig {
  const merged: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    // Unset and empty variables both fall back to defaults.
    if (value !== undefined && value.trim() !== '') merged[key] = value.trim();
  }
  if (overrides.provider !== undefined) merged.TOONBENCH_PROVIDER = overrides.provider;
  if (overrides.model !== undefined) merged.TOONBENCH_MODEL = overrides.model;
  if (overrides.delay !== undefined) merged.TOONBENCH_DELAY_MS = overrides.delay;
  if (overrides.jsonStyle !== undefined) merged.TOONBENCH_JSON_STYLE = overrides.jsonStyle;

  const parsed = envSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = String(issue.path[0] ?? '');
    throw new ConfigError(`Invalid ${variable}: ${issue.message}`, variable);
  }

  const e = parsed.data;
  const provider = e.TOONBENCH_PROVIDER;
  const keyVar = API_KEY_VARS[provider];
  const apiKey = e[keyVar];
  const dryRun = overrides.dryRun ?? false;

  if (!apiKey && !dryRun) {
    throw new ConfigError(
      `${keyVar} is not set. Add it to the environment or .env, or use --dry-run to count tokens without calling the API.`,
      keyVar,
    );
  }

  return {
    provider,
    model: e.TOONBENCH_MODEL ?? DEFAULT_MODELS[provider],
    apiKey,
    temperature: e.TOONBENCH_TEMPERATURE,
    maxTokens: e.TOONBENCH_MAX_TOKENS,
    delayMs: e.TOONBENCH_DELAY_MS,
    jsonStyle: e.TOONBENCH_JSON_STYLE,
    dryRun,
  };
}
