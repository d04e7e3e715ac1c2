// ============================================================================
// @toonbench/core — TOON Literal Rules
// ============================================================================
//
// Quoting and typing rules shared by the encoder and decoder. The encoder
// quotes a string exactly when the decoder would otherwise read it as
// something else, so the two functions below must stay in sync:
//
//   needsQuotes(s) === false  ⇒  parseBareToken(s) === s
//
// ============================================================================

import type { JsonPrimitive, ToonDelimiter } from './types.js';

export const NULL_LITERAL = 'null';
export const TRUE_LITERAL = 'true';
export const FALSE_LITERAL = 'false';
export const LIST_MARKER = '-';
export const LIST_PREFIX = '- ';

/** Numbers the decoder types as numbers. */
const NUMBER_TOKEN = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

/** Anything that reads as numeric to a human or a model (superset of NUMBER_TOKEN). */
const NUMERIC_LIKE = /^-?\d+(?:\.\d+)?(?:e[+-]?\d+)?$/i;

const STRUCTURAL_CHARS = /[:"\\[\]{}\n\r\t]/;

const BARE_KEY = /^[A-Za-z_][A-Za-z0-9_.]*$/;

/** Marker written inside `[N…]` for non-comma delimiters. */
export function delimiterMarker(delimiter: ToonDelimiter): string {
  return delimiter === ',' ? '' : delimiter;
}

/**
 * Whether a string value must be quoted to survive a round trip.
 */
export function needsQuotes(value: string, delimiter: ToonDelimiter): boolean {
  if (value.length === 0) return true;
  if (value !== value.trim()) return true;
  if (value === TRUE_LITERAL || value === FALSE_LITERAL || value === NULL_LITERAL) return true;
  if (NUMERIC_LIKE.test(value)) return true;
  if (STRUCTURAL_CHARS.test(value)) return true;
  if (value.includes(delimiter)) return true;
  if (value.startsWith(LIST_MARKER)) return true;
  return false;
}

export function escapeString(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
}

export function quote(value: string): string {
  return `"${escapeString(value)}"`;
}

export function encodeKey(key: string): string {
  return BARE_KEY.test(key) ? key : quote(key);
}

export function encodeNumber(value: number): string {
  if (Object.is(value, -0)) return '-0';
  return String(value);
}

export function encodeString(value: string, delimiter: ToonDelimiter): string {
  return needsQuotes(value, delimiter) ? quote(value) : value;
}

/**
 * Type an unquoted token: exact literal matches first, then numbers,
 * everything else stays a string.
 */
export function parseBareToken(token: string): JsonPrimitive {
  if (token === NULL_LITERAL) return null;
  if (token === TRUE_LITERAL) return true;
  if (token === FALSE_LITERAL) return false;
  if (NUMBER_TOKEN.test(token)) return Number(token);
  return token;
}

/** Result of reading a quoted string starting at `start`. */
export interface QuotedRead {
  value: string;
  /** Index just past the closing quote */
  end: number;
}

/**
 * Read a quoted string starting at `text[start] === '"'`.
 * Returns an error message instead of a value when the quote is unterminated
 * or contains an unknown escape; the caller attaches line information.
 */
export function readQuoted(text: string, start: number): QuotedRead | { error: string } {
  let value = '';
  let i = start + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '"') {
      return { value, end: i + 1 };
    }
    if (ch === '\\') {
      const next = text[i + 1];
      switch (next) {
        case '\\':
          value += '\\';
          break;
        case '"':
          value += '"';
          break;
        case 'n':
          value += '\n';
          break;
        case 'r':
          value += '\r';
          break;
        case 't':
          value += '\t';
          break;
        case undefined:
          return { error: 'Unterminated string' };
        default:
          return { error: `Invalid escape sequence \\${next}` };
      }
      i += 2;
      continue;
    }
    value += ch;
    i++;
  }
  return { error: 'Unterminated string' };
}

/**
 * Split delimited values, ignoring delimiters inside quoted strings.
 * Quotes are kept in the returned pieces.
 */
export function splitDelimited(text: string, delimiter: ToonDelimiter): string[] {
  const parts: string[] = [];
  let current = '';
  let inQuotes = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      current += ch;
      if (ch === '\\' && i + 1 < text.length) {
        current += text[i + 1];
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      }
      continue;
    }
    if (ch === '"') {
      inQuotes = true;
      current += ch;
    } else if (ch === delimiter) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}
