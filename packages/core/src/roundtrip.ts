// ============================================================================
// @toonbench/core — Round-Trip Verification
// ============================================================================

import { ParseError } from './errors.js';
import { decodeToon } from './toon_decoder.js';
import { encodeToon } from './toon_encoder.js';
import type { JsonValue, ToonEncodeOptions } from './types.js';

/** First place two values differ. */
export interface Mismatch {
  /** JSON path, e.g. `$.rows[3].glucose` */
  path: string;
  expected: string;
  actual: string;
}

export interface RoundTripResult {
  ok: boolean;
  encoded: string;
  decoded?: JsonValue;
  mismatch: Mismatch | null;
}

/**
 * Structural equality that also compares key order and distinguishes `-0`.
 */
export function deepEqualOrdered(a: JsonValue, b: JsonValue): boolean {
  return findMismatch(a, b) === null;
}

/**
 * Locate the first difference between two values, depth first.
 * Returns null when they are equal in value and key order.
 */
export function findMismatch(expected: JsonValue, actual: JsonValue, path = '$'): Mismatch | null {
  if (expected === null || typeof expected !== 'object' || actual === null || typeof actual !== 'object') {
    return Object.is(expected, actual) ? null : describe(path, expected, actual);
  }

  if (Array.isArray(expected) || Array.isArray(actual)) {
    if (!Array.isArray(expected) || !Array.isArray(actual)) {
      return describe(path, expected, actual);
    }
    if (expected.length !== actual.length) {
      return { path, expected: `array of ${expected.length}`, actual: `array of ${actual.length}` };
    }
    for (let i = 0; i < expected.length; i++) {
      const m = findMismatch(expected[i], actual[i], `${path}[${i}]`);
      if (m) return m;
    }
    return null;
  }

  const expectedKeys = Object.keys(expected);
  const actualKeys = Object.keys(actual);
  if (expectedKeys.join('\u0000') !== actualKeys.join('\u0000')) {
    return {
      path,
      expected: `keys ${JSON.stringify(expectedKeys)}`,
      actual: `keys ${JSON.stringify(actualKeys)}`,
    };
  }
  for (const key of expectedKeys) {
    const childPath = /^[A-Za-z_$][\w$]*$/.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`;
    const m = findMismatch(expected[key], actual[key], childPath);
    if (m) return m;
  }
  return null;
}

function describe(path: string, expected: JsonValue, actual: JsonValue): Mismatch {
  return { path, expected: show(expected), actual: show(actual) };
}

function show(value: JsonValue): string {
  if (typeof value === 'number' && Object.is(value, -0)) return '-0';
  return JSON.stringify(value);
}

/**
 * Encode, decode and compare. Decode failures are reported as a mismatch at
 * `$` carrying the parse error message; encoding errors propagate.
 */
export function verifyRoundTrip(value: JsonValue, options?: ToonEncodeOptions): RoundTripResult {
  const encoded = encodeToon(value, options);

  let decoded: JsonValue;
  try {
    decoded = decodeToon(encoded, options?.indent !== undefined ? { indent: options.indent } : undefined);
  } catch (err) {
    if (err instanceof ParseError) {
      return {
        ok: false,
        encoded,
        mismatch: { path: '$', expected: 'decodable TOON', actual: err.message },
      };
    }
    throw err;
  }

  const mismatch = findMismatch(value, decoded);
  return { ok: mismatch === null, encoded, decoded, mismatch };
}
