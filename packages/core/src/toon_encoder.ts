// ============================================================================
// @toonbench/core — TOON Encoder
// ============================================================================
//
// TOON (Token-Oriented Object Notation) is a line-oriented rendering of the
// JSON data model. Nesting is carried by indentation alone; there are no
// closing delimiters. Arrays declare their length up front, and arrays of
// uniform objects declare their field names once.
//
// ─── LINE FORMS ────────────────────────────────────────────────────────────
//
//   field         = key ": " primitive
//   object        = key ":"                      (fields at depth + 1)
//   inline array  = key header " " primitive { DELIM primitive }
//   tabular array = key header "{" key { DELIM key } "}:"
//                                                (N rows at depth + 1)
//   list array    = key header                   (N items at depth + 1)
//   header        = "[" N [ "\t" | "|" ] "]" ":"
//   list item     = "- " primitive
//                 | "- " header ...              (array item)
//                 | "- " field-or-object ...     (object item; its other
//                                                 fields at depth + 1)
//                 | "-"                          (empty object)
//
//   The content after "- " is read as if it stood one level deeper than the
//   hyphen, so an object item's remaining fields line up under its first key.
//
// ─── ROOT ──────────────────────────────────────────────────────────────────
//
//   object    → its fields at depth 0 ({} encodes to the empty string)
//   array     → a header without key, e.g. "[2]{id,value}:"
//   primitive → one literal line
//
// ============================================================================

import { EncodingError } from './errors.js';
import {
  LIST_MARKER,
  LIST_PREFIX,
  delimiterMarker,
  encodeKey,
  encodeNumber,
  encodeString,
} from './toon_literals.js';
import type {
  JsonArray,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  ToonDelimiter,
  ToonEncodeOptions,
} from './types.js';

export const DEFAULT_INDENT = 2;

/**
 * Encodes JSON-shaped values into TOON text.
 *
 * @example
 * ```ts
 * const encoder = new ToonEncoder();
 * encoder.encode({ patient_id: 'P1', lactate: 4.2, shock: true });
 * // patient_id: P1
 * // lactate: 4.2
 * // shock: true
 *
 * encoder.encode([{ id: 1, value: 'a' }, { id: 2, value: 'b' }]);
 * // [2]{id,value}:
 * //   1,a
 * //   2,b
 * ```
 */
export class ToonEncoder {
  private readonly indentUnit: string;
  private readonly delimiter: ToonDelimiter;

  constructor(options: ToonEncodeOptions = {}) {
    const indent = options.indent ?? DEFAULT_INDENT;
    if (!Number.isInteger(indent) || indent < 1) {
      throw new RangeError(`indent must be a positive integer, got ${indent}`);
    }
    this.indentUnit = ' '.repeat(indent);
    this.delimiter = options.delimiter ?? ',';
  }

  /**
   * Encode a value. Throws {@link EncodingError} for anything outside the
   * JSON data model before producing any output.
   */
  encode(value: unknown): string {
    const normalized = toJsonValue(value, '$', []);
    const lines: string[] = [];

    if (isPrimitive(normalized)) {
      lines.push(this.primitive(normalized));
    } else if (Array.isArray(normalized)) {
      this.emitArray(undefined, normalized, 0, lines);
    } else {
      this.emitObject(normalized, 0, lines);
    }

    return lines.join('\n');
  }

  // ---- Emitters ----

  private emitObject(obj: JsonObject, depth: number, lines: string[]): void {
    for (const [key, val] of Object.entries(obj)) {
      const k = encodeKey(key);
      if (isPrimitive(val)) {
        lines.push(this.line(depth, `${k}: ${this.primitive(val)}`));
      } else if (Array.isArray(val)) {
        this.emitArray(k, val, depth, lines);
      } else {
        lines.push(this.line(depth, `${k}:`));
        this.emitObject(val, depth + 1, lines);
      }
    }
  }

  private emitArray(key: string | undefined, arr: JsonArray, depth: number, lines: string[]): void {
    if (arr.length === 0) {
      lines.push(this.line(depth, this.header(key, 0)));
      return;
    }

    if (arr.every(isPrimitive)) {
      const values = arr.map((v) => this.primitive(v)).join(this.delimiter);
      lines.push(this.line(depth, `${this.header(key, arr.length)} ${values}`));
      return;
    }

    const run = tabularRun(arr);
    if (run) {
      lines.push(this.line(depth, this.header(key, arr.length, run.fields)));
      for (const cells of run.rows) {
        const row = cells.map((v) => this.primitive(v)).join(this.delimiter);
        lines.push(this.line(depth + 1, row));
      }
      return;
    }

    lines.push(this.line(depth, this.header(key, arr.length)));
    for (const item of arr) {
      this.emitListItem(item, depth + 1, lines);
    }
  }

  private emitListItem(item: JsonValue, depth: number, lines: string[]): void {
    if (isPrimitive(item)) {
      lines.push(this.line(depth, `${LIST_PREFIX}${this.primitive(item)}`));
      return;
    }
    if (!Array.isArray(item) && Object.keys(item).length === 0) {
      lines.push(this.line(depth, LIST_MARKER));
      return;
    }

    // Emit one level deeper, then move the first line onto the hyphen.
    const start = lines.length;
    if (Array.isArray(item)) {
      this.emitArray(undefined, item, depth + 1, lines);
    } else {
      this.emitObject(item, depth + 1, lines);
    }
    const first = lines[start].slice(this.indentUnit.length * (depth + 1));
    lines[start] = this.line(depth, `${LIST_PREFIX}${first}`);
  }

  // ---- Pieces ----

  private header(key: string | undefined, length: number, fields?: string[]): string {
    let h = `${key ?? ''}[${length}${delimiterMarker(this.delimiter)}]`;
    if (fields) {
      h += `{${fields.map(encodeKey).join(this.delimiter)}}`;
    }
    return `${h}:`;
  }

  private primitive(value: JsonPrimitive): string {
    if (value === null) return 'null';
    if (typeof value === 'boolean') return value ? 'true' : 'false';
    if (typeof value === 'number') return encodeNumber(value);
    return encodeString(value, this.delimiter);
  }

  private line(depth: number, content: string): string {
    return this.indentUnit.repeat(depth) + content;
  }
}

const defaultEncoder = new ToonEncoder();

/**
 * Encode a value with default options (two-space indent, comma delimiter).
 */
export function encodeToon(value: unknown, options?: ToonEncodeOptions): string {
  return options ? new ToonEncoder(options).encode(value) : defaultEncoder.encode(value);
}

// ============================================================================
// Internal Helpers
// ============================================================================

export function isPrimitive(value: JsonValue): value is JsonPrimitive {
  return value === null || typeof value !== 'object';
}

function isObject(value: JsonValue): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** A uniform array of objects, split into its shared fields and row values. */
export interface TabularRun {
  fields: string[];
  rows: JsonPrimitive[][];
}

/**
 * Detect a tabular run: every element a non-empty object with the same keys
 * in the same order, and only primitive values.
 */
export function tabularRun(arr: JsonArray): TabularRun | undefined {
  const first = arr[0];
  if (first === undefined || !isObject(first)) return undefined;
  const fields = Object.keys(first);
  if (fields.length === 0) return undefined;

  const rows: JsonPrimitive[][] = [];
  for (const item of arr) {
    if (!isObject(item)) return undefined;
    const itemKeys = Object.keys(item);
    if (itemKeys.length !== fields.length) return undefined;
    const cells: JsonPrimitive[] = [];
    for (let i = 0; i < fields.length; i++) {
      if (itemKeys[i] !== fields[i]) return undefined;
      const v = item[fields[i]];
      if (v === undefined || !isPrimitive(v)) return undefined;
      cells.push(v);
    }
    rows.push(cells);
  }
  return { fields, rows };
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function childPath(path: string, key: string): string {
  return /^[A-Za-z_$][\w$]*$/.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`;
}

/** Define an own enumerable property, including keys such as `__proto__`. */
export function setEntry(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Validate an arbitrary value against the JSON data model and return it as a
 * {@link JsonValue}. `ancestors` holds the containers on the current path, so
 * shared references are accepted while cycles are rejected.
 */
function toJsonValue(value: unknown, path: string, ancestors: object[]): JsonValue {
  if (value === null) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      if (!Number.isFinite(value)) {
        throw new EncodingError(path, `non-finite number ${String(value)}`);
      }
      return value;
    case 'undefined':
      throw new EncodingError(path, 'undefined is not a JSON value');
    case 'bigint':
    case 'symbol':
    case 'function':
      throw new EncodingError(path, `unsupported type ${typeof value}`);
    default:
      break;
  }

  if (typeof value !== 'object') {
    throw new EncodingError(path, `unsupported type ${typeof value}`);
  }
  if (ancestors.includes(value)) {
    throw new EncodingError(path, 'cyclic reference');
  }

  ancestors.push(value);
  try {
    if (Array.isArray(value)) {
      const out: JsonArray = [];
      for (let i = 0; i < value.length; i++) {
        out.push(toJsonValue(value[i], `${path}[${i}]`, ancestors));
      }
      return out;
    }

    if (!isPlainObject(value)) {
      const name = value.constructor?.name ?? 'Object';
      throw new EncodingError(path, `${name} instances are not supported`);
    }

    const out: JsonObject = {};
    for (const [key, child] of Object.entries(value)) {
      setEntry(out, key, toJsonValue(child, childPath(path, key), ancestors));
    }
    return out;
  } finally {
    ancestors.pop();
  }
}
