// ============================================================================
// @toonbench/core — Public API
// ============================================================================

// TOON codec
export { ToonEncoder, encodeToon, DEFAULT_INDENT, tabularRun } from './toon_encoder.js';
export type { TabularRun } from './toon_encoder.js';
export { ToonDecoder, decodeToon } from './toon_decoder.js';
export { needsQuotes, parseBareToken } from './toon_literals.js';

// Round-trip verification
export { deepEqualOrdered, findMismatch, verifyRoundTrip } from './roundtrip.js';
export type { Mismatch, RoundTripResult } from './roundtrip.js';

// Payload formatters & tokenizer
export { formatPayload, analyzePayloads, PAYLOAD_FORMATS } from './formatters.js';
export type { PayloadAnalysis } from './formatters.js';
export { TokenizerManager, resolveEncoding } from './tokenizer.js';
export type { CacheStats } from './tokenizer.js';

// Errors
export {
  ToonbenchError,
  EncodingError,
  ParseError,
  ConfigError,
  ModelCallError,
  ScenarioError,
} from './errors.js';

// Logger
export * as logger from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';

// Types
export type {
  JsonPrimitive,
  JsonObject,
  JsonArray,
  JsonValue,
  TokenizerEncoding,
  ToonDelimiter,
  ToonEncodeOptions,
  ToonDecodeOptions,
  PayloadFormat,
} from './types.js';
