import type Anthropic from '@anthropic-ai/sdk';
import { ConfigError, ModelCallError, TokenizerManager } from '@toonbench/core';
import type OpenAI from 'openai';
import { describe, expect, it, vi } from 'vitest';
import type { BenchConfig } from '../config.js';
import { AnthropicChatModel, DryRunChatModel, OpenAIChatModel, createChatModel } from '../provider.js';

const request = {
  system: 'You are a test assistant.',
  prompt: 'Patient Data (TOON format):\npatient_id: P1',
  temperature: 0.1,
  maxTokens: 500,
};

// =============================================================================
// Mock clients
// =============================================================================
function createMockOpenAIClient(create: ReturnType<typeof vi.fn>) {
  return { chat: { completions: { create } } };
}

function createMockAnthropicClient(create: ReturnType<typeof vi.fn>) {
  return { messages: { create } };
}

const baseConfig: BenchConfig = {
  provider: 'openai',
  model: 'gpt-4o-mini',
  temperature: 0.1,
  maxTokens: 500,
  delayMs: 0,
  jsonStyle: 'pretty',
  dryRun: false,
};

describe('OpenAIChatModel', () => {
  it('sends the system and user prompt and maps usage', async () => {
    const create = vi.fn().mockResolvedValue({
      id: 'chatcmpl-test',
      model: 'gpt-4o-mini-2024-07-18',
      choices: [{ message: { content: 'Septic shock.' } }],
      usage: { prompt_tokens: 120, completion_tokens: 8, total_tokens: 128 },
    });
    const model = new OpenAIChatModel(createMockOpenAIClient(create) as unknown as OpenAI, 'gpt-4o-mini');

    const completion = await model.complete(request);

    expect(create).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.prompt },
      ],
      temperature: 0.1,
      max_tokens: 500,
    });
    expect(completion).toEqual({
      text: 'Septic shock.',
      usage: { promptTokens: 120, completionTokens: 8, totalTokens: 128 },
      model: 'gpt-4o-mini-2024-07-18',
      id: 'chatcmpl-test',
    });
  });

  it('wraps API errors with their status', async () => {
    const create = vi.fn().mockRejectedValue(Object.assign(new Error('Rate limit reached'), { status: 429 }));
    const model = new OpenAIChatModel(createMockOpenAIClient(create) as unknown as OpenAI, 'gpt-4o-mini');

    const err = await model.complete(request).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ModelCallError);
    expect(err instanceof ModelCallError && err.status).toBe(429);
    expect(err instanceof Error && err.message).toBe('openai request failed (HTTP 429): Rate limit reached');
  });

  it('treats a missing usage block as zero tokens', async () => {
    const create = vi.fn().mockResolvedValue({
      id: 'chatcmpl-test',
      model: 'gpt-4o-mini',
      choices: [{ message: { content: null } }],
    });
    const model = new OpenAIChatModel(createMockOpenAIClient(create) as unknown as OpenAI, 'gpt-4o-mini');

    const completion = await model.complete(request);
    expect(completion.text).toBe('');
    expect(completion.usage).toEqual({ promptTokens: 0, completionTokens: 0, totalTokens: 0 });
  });
});

describe('AnthropicChatModel', () => {
  it('joins text blocks and totals usage', async () => {
    const create = vi.fn().mockResolvedValue({
      id: 'msg-test',
      model: 'claude-3-5-haiku-20241022',
      content: [
        { type: 'text', text: 'Heart ' },
        { type: 'text', text: 'failure.' },
      ],
      usage: { input_tokens: 200, output_tokens: 12 },
    });
    const model = new AnthropicChatModel(
      createMockAnthropicClient(create) as unknown as Anthropic,
      'claude-3-5-haiku-latest',
    );

    const completion = await model.complete(request);

    expect(create).toHaveBeenCalledWith({
      model: 'claude-3-5-haiku-latest',
      system: request.system,
      messages: [{ role: 'user', content: request.prompt }],
      temperature: 0.1,
      max_tokens: 500,
    });
    expect(completion.text).toBe('Heart failure.');
    expect(completion.usage).toEqual({ promptTokens: 200, completionTokens: 12, totalTokens: 212 });
  });

  it('wraps errors without a status', async () => {
    const create = vi.fn().mockRejectedValue(new Error('socket hang up'));
    const model = new AnthropicChatModel(
      createMockAnthropicClient(create) as unknown as Anthropic,
      'claude-3-5-haiku-latest',
    );

    await expect(model.complete(request)).rejects.toThrow('anthropic request failed: socket hang up');
  });
});

describe('DryRunChatModel', () => {
  it('counts prompt tokens locally and answers nothing', async () => {
    const model = new DryRunChatModel('gpt-4o-mini');
    const tokenizer = new TokenizerManager('o200k_base');
    const expected = tokenizer.countTokens(request.system) + tokenizer.countTokens(request.prompt);

    const completion = await model.complete(request);

    expect(completion).toEqual({
      text: '',
      usage: { promptTokens: expected, completionTokens: 0, totalTokens: expected },
      model: 'gpt-4o-mini',
    });
    model.dispose();
    tokenizer.dispose();
  });
});

describe('createChatModel', () => {
  it('returns a dry-run model without needing a key', () => {
    const model = createChatModel({ ...baseConfig, dryRun: true });
    expect(model).toBeInstanceOf(DryRunChatModel);
    expect(model.provider).toBe('dry-run');
  });

  it('builds SDK-backed models', () => {
    expect(createChatModel({ ...baseConfig, apiKey: 'test-key' })).toBeInstanceOf(OpenAIChatModel);
    expect(
      createChatModel({ ...baseConfig, provider: 'anthropic', model: 'claude-3-5-haiku-latest', apiKey: 'test-key' }),
    ).toBeInstanceOf(AnthropicChatModel);
  });

  it('refuses to build a live model without a key', () => {
    expect(() => createChatModel(baseConfig)).toThrow(ConfigError);
  });
});
