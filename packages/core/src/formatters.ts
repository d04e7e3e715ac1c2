import { encodeToon } from './toon_encoder.js';
import type { TokenizerManager } from './tokenizer.js';
import type { JsonValue, PayloadFormat, ToonEncodeOptions } from './types.js';

const cachedByteEncoder = new TextEncoder();

export const PAYLOAD_FORMATS: readonly PayloadFormat[] = ['json', 'json-compact', 'toon'];

/** Size of one payload rendering. */
export interface PayloadAnalysis {
  format: PayloadFormat;
  /** UTF-16 code units, as `string.length` reports them */
  chars: number;
  /** UTF-8 bytes */
  bytes: number;
  /** Local token count, when a tokenizer was supplied */
  tokens?: number;
  output: string;
}

/**
 * Render a record for embedding in a prompt.
 *
 * @example
 * ```ts
 * formatPayload({ patient_id: 'P1', shock: true }, 'json-compact');
 * // → '{"patient_id":"P1","shock":true}'
 *
 * formatPayload({ patient_id: 'P1', shock: true }, 'toon');
 * // → 'patient_id: P1\nshock: true'
 * ```
 */
export function formatPayload(value: JsonValue, format: PayloadFormat, toon?: ToonEncodeOptions): string {
  switch (format) {
    case 'json':
      return JSON.stringify(value, null, 2);
    case 'json-compact':
      return JSON.stringify(value);
    case 'toon':
      return encodeToon(value, toon);
  }
}

/**
 * Render a value in every payload format and measure each rendering.
 */
export function analyzePayloads(value: JsonValue, tokenizer?: TokenizerManager): PayloadAnalysis[] {
  return PAYLOAD_FORMATS.map((format) => {
    const output = formatPayload(value, format);
    return {
      format,
      chars: output.length,
      bytes: cachedByteEncoder.encode(output).length,
      tokens: tokenizer?.countTokens(output),
      output,
    };
  });
}
