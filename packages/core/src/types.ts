// ============================================================================
// @toonbench/core — Type Definitions
// ============================================================================
//
// The value model shared by the TOON encoder/decoder, the payload formatters
// and the benchmark driver. It mirrors the JSON data model: mappings keep
// their insertion order, which is also the order fields are emitted in.
// ============================================================================

/** A JSON scalar. */
export type JsonPrimitive = string | number | boolean | null;

/** An ordered JSON mapping. */
export interface JsonObject {
  [key: string]: JsonValue;
}

/** A JSON sequence. */
export type JsonArray = JsonValue[];

/** Any value the encoders accept. */
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

/**
 * Supported tokenizer encodings.
 * - `cl100k_base` — GPT-4, GPT-3.5-Turbo
 * - `o200k_base`  — GPT-4o, GPT-4o-mini, o-series
 */
export type TokenizerEncoding = 'cl100k_base' | 'o200k_base';

/** Value separator used in tabular rows and inline arrays. */
export type ToonDelimiter = ',' | '\t' | '|';

/** Options accepted by the TOON encoder. */
export interface ToonEncodeOptions {
  /** Spaces per nesting level (default: 2) */
  indent?: number;
  /** Separator for inline arrays and tabular rows (default: ',') */
  delimiter?: ToonDelimiter;
}

/** Options accepted by the TOON decoder. */
export interface ToonDecodeOptions {
  /** Spaces per nesting level (default: 2) */
  indent?: number;
}

/** Serializations the benchmark can embed in a prompt. */
export type PayloadFormat = 'json' | 'json-compact' | 'toon';
