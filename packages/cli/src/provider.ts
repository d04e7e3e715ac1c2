// ============================================================================
// @toonbench/cli — Model Providers
// ============================================================================
//
// A ChatModel sends one system + user prompt pair and reports the provider's
// own token usage. SDK clients are created with retries disabled so that a
// failed call shows up as a failed data point rather than a slow success.
// ============================================================================

import Anthropic from '@anthropic-ai/sdk';
import { ConfigError, ModelCallError, TokenizerManager, resolveEncoding } from '@toonbench/core';
import OpenAI from 'openai';
import type { BenchConfig } from './config.js';
import type { TokenUsage } from './types.js';

export interface CompletionRequest {
  system: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
}

export interface Completion {
  text: string;
  usage: TokenUsage;
  /** Model id reported by the provider */
  model: string;
  id?: string;
}

export interface ChatModel {
  readonly provider: string;
  readonly model: string;
  complete(request: CompletionRequest): Promise<Completion>;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function toModelCallError(provider: string, error: unknown): ModelCallError {
  if (error instanceof ModelCallError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ModelCallError(provider, message, statusOf(error));
}

// ---------------------------------------------------------------------------
// OpenAI
// ---------------------------------------------------------------------------

export class OpenAIChatModel implements ChatModel {
  readonly provider = 'openai';

  constructor(
    private readonly client: OpenAI,
    readonly model: string,
  ) {}

  async complete(request: CompletionRequest): Promise<Completion> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      });

      const usage = response.usage;
      return {
        text: response.choices[0]?.message.content ?? '',
        usage: {
          promptTokens: usage?.prompt_tokens ?? 0,
          completionTokens: usage?.completion_tokens ?? 0,
          totalTokens: usage?.total_tokens ?? 0,
        },
        model: response.model,
        id: response.id,
      };
    } catch (error) {
      throw toModelCallError(this.provider, error);
    }
  }
}

// ---------------------------------------------------------------------------
// Anthropic
// ---------------------------------------------------------------------------

export class AnthropicChatModel implements ChatModel {
  readonly provider = 'anthropic';

  constructor(
    private readonly client: Anthropic,
    readonly model: string,
  ) {}

  async complete(request: CompletionRequest): Promise<Completion> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      });

      const text = response.content.flatMap((block) => (block.type === 'text' ? [block.text] : [])).join('');
      const promptTokens = response.usage.input_tokens;
      const completionTokens = response.usage.output_tokens;
      return {
        text,
        usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
        model: response.model,
        id: response.id,
      };
    } catch (error) {
      throw toModelCallError(this.provider, error);
    }
  }
}

// ---------------------------------------------------------------------------
// Dry run
// ---------------------------------------------------------------------------

/**
 * Counts prompt tokens locally and returns an empty answer. Lets the
 * benchmark measure payload cost without network access or an API key.
 */
export class DryRunChatModel implements ChatModel {
  readonly provider = 'dry-run';
  private readonly tokenizer: TokenizerManager;

  constructor(readonly model: string) {
    this.tokenizer = new TokenizerManager(resolveEncoding(model));
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    const promptTokens = this.tokenizer.countTokens(request.system) + this.tokenizer.countTokens(request.prompt);
    return {
      text: '',
      usage: { promptTokens, completionTokens: 0, totalTokens: promptTokens },
      model: this.model,
    };
  }

  dispose(): void {
    this.tokenizer.dispose();
  }
}

/**
 * Create the model selected by the configuration.
 */
export function createChatModel(config: BenchConfig): ChatModel {
  if (config.dryRun) {
    return new DryRunChatModel(config.model);
  }
  if (!config.apiKey) {
    const variable = config.provider === 'openai' ? 'OPENAI_API_KEY' : 'ANTHROPIC_API_KEY';
    throw new ConfigError(`${variable} is not set`, variable);
  }

  switch (config.provider) {
    case 'openai':
      return new OpenAIChatModel(new OpenAI({ apiKey: config.apiKey, maxRetries: 0 }), config.model);
    case 'anthropic':
      return new AnthropicChatModel(new Anthropic({ apiKey: config.apiKey, maxRetries: 0 }), config.model);
  }
}
