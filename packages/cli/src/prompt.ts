import { type JsonValue, formatPayload } from '@toonbench/core';
import type { Encoding, JsonStyle } from './types.js';

export const SYSTEM_PROMPT = 'You are a medical AI assistant. Provide accurate, evidence-based answers.';

const FORMAT_NAMES: Record<Encoding, string> = {
  json: 'JSON',
  toon: 'TOON',
};

export interface BuiltPrompt {
  system: string;
  prompt: string;
  /** The serialized record embedded in the prompt */
  payload: string;
}

/**
 * Render the record in the requested encoding. Throws EncodingError when the
 * record cannot be represented.
 */
export function renderPayload(record: JsonValue, encoding: Encoding, jsonStyle: JsonStyle = 'pretty'): string {
  if (encoding === 'toon') return formatPayload(record, 'toon');
  return formatPayload(record, jsonStyle === 'compact' ? 'json-compact' : 'json');
}

/**
 * Build the user prompt for one question. Both encodings share every word
 * except the format name and the payload itself.
 */
export function buildPrompt(payload: string, encoding: Encoding, question: string, labels: string[]): BuiltPrompt {
  const prompt = [
    'You are a medical AI assistant analyzing patient data.',
    '',
    `Patient Data (${FORMAT_NAMES[encoding]} format):`,
    payload,
    '',
    `Question: ${question}`,
    '',
    `Start your answer with one of: ${labels.join(', ')}.`,
    'Provide a clear, accurate answer based on the data provided.',
  ].join('\n');

  return { system: SYSTEM_PROMPT, prompt, payload };
}
