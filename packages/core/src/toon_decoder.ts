// ============================================================================
// @toonbench/core — TOON Decoder
// ============================================================================
//
// Reads the line forms written by ToonEncoder back into JSON values.
// Decoding is strict: declared lengths, row widths and indentation are all
// checked, and every failure is reported as a ParseError carrying the
// 1-based line number of the offending line.
// ============================================================================

import { ParseError } from './errors.js';
import {
  LIST_MARKER,
  LIST_PREFIX,
  parseBareToken,
  readQuoted,
  splitDelimited,
} from './toon_literals.js';
import { DEFAULT_INDENT, setEntry } from './toon_encoder.js';
import type {
  JsonArray,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  ToonDecodeOptions,
  ToonDelimiter,
} from './types.js';

/** `[N]`, `[N\t]`, `[N|]`, optionally followed by `{fields}`, then `:` and any inline values. */
const ARRAY_HEADER = /^\[(\d+)([\t|]?)\](?:\{(.*)\})?:(.*)$/;

const BARE_KEY_PREFIX = /^[A-Za-z_][A-Za-z0-9_.]*/;

const TRAILING_SPACE_AFTER_COLON = /:[ \t]+$/;

interface Line {
  depth: number;
  content: string;
  lineNo: number;
  raw: string;
}

interface KeySplit {
  key: string;
  /** Remainder after the key, starting with `:` or `[` */
  rest: string;
}

/**
 * Decodes TOON text into JSON values.
 *
 * @example
 * ```ts
 * new ToonDecoder().decode('[2]{id,value}:\n  1,a\n  2,b');
 * // [{ id: 1, value: 'a' }, { id: 2, value: 'b' }]
 * ```
 */
export class ToonDecoder {
  private readonly indent: number;

  constructor(options: ToonDecodeOptions = {}) {
    const indent = options.indent ?? DEFAULT_INDENT;
    if (!Number.isInteger(indent) || indent < 1) {
      throw new RangeError(`indent must be a positive integer, got ${indent}`);
    }
    this.indent = indent;
  }

  decode(text: string): JsonValue {
    return new LineParser(this.scan(text)).parseRoot();
  }

  /** Split into non-blank lines with their nesting depth. */
  private scan(text: string): Line[] {
    const lines: Line[] = [];
    const rawLines = text.split('\n');

    for (let i = 0; i < rawLines.length; i++) {
      const raw = rawLines[i].endsWith('\r') ? rawLines[i].slice(0, -1) : rawLines[i];
      const trimmed = raw.trimEnd();
      if (trimmed.length === 0) continue;

      let spaces = 0;
      while (trimmed[spaces] === ' ') spaces++;
      if (trimmed[spaces] === '\t') {
        throw new ParseError('Tab character in indentation', i + 1, raw);
      }
      if (spaces % this.indent !== 0) {
        throw new ParseError(`Indentation is not a multiple of ${this.indent}`, i + 1, raw);
      }

      lines.push({
        depth: spaces / this.indent,
        content: trimmed.slice(spaces),
        lineNo: i + 1,
        raw,
      });
    }
    return lines;
  }
}

const defaultDecoder = new ToonDecoder();

/**
 * Decode TOON text with default options (two-space indent).
 */
export function decodeToon(text: string, options?: ToonDecodeOptions): JsonValue {
  return options ? new ToonDecoder(options).decode(text) : defaultDecoder.decode(text);
}

// ============================================================================
// Recursive descent over scanned lines
// ============================================================================

class LineParser {
  private pos = 0;

  constructor(private readonly lines: Line[]) {}

  parseRoot(): JsonValue {
    const first = this.peek();
    if (!first) return {};
    if (first.depth !== 0) {
      throw this.error('Unexpected indentation', first);
    }

    if (first.content.startsWith('[')) {
      this.pos++;
      const arr = this.parseArray(first.content, first, 0);
      this.expectEnd('Unexpected content after root array');
      return arr;
    }

    if (this.splitKey(first)) {
      return this.parseObject(0, {});
    }

    this.pos++;
    this.expectEnd('Unexpected content after root value');
    return this.parseToken(first.content, first);
  }

  // ---- Objects ----

  private parseObject(depth: number, target: JsonObject): JsonObject {
    for (let line = this.peek(); line && line.depth >= depth; line = this.peek()) {
      if (line.depth > depth) {
        throw this.error('Unexpected indentation', line);
      }
      const split = this.splitKey(line);
      if (!split) {
        throw this.error('Expected "key:" or "key[N]:"', line);
      }
      this.pos++;
      this.parseField(split, line, depth, target);
    }
    return target;
  }

  /** Parse one field whose key line has already been consumed. */
  private parseField(split: KeySplit, line: Line, depth: number, target: JsonObject): void {
    if (Object.prototype.hasOwnProperty.call(target, split.key)) {
      throw this.error(`Duplicate key ${JSON.stringify(split.key)}`, line);
    }
    setEntry(target, split.key, this.parseFieldValue(split.rest, line, depth));
  }

  private parseFieldValue(rest: string, line: Line, depth: number): JsonValue {
    if (rest.startsWith('[')) {
      return this.parseArray(rest, line, depth);
    }

    const after = rest.slice(1).trim();
    if (after.length > 0) {
      return this.parseToken(after, line);
    }

    if (TRAILING_SPACE_AFTER_COLON.test(line.raw)) {
      throw this.error('Missing value after "key: "', line);
    }
    const next = this.peek();
    if (next && next.depth > depth + 1) {
      throw this.error('Unexpected indentation', next);
    }
    if (next && next.depth === depth + 1) {
      return this.parseObject(depth + 1, {});
    }
    return {};
  }

  // ---- Arrays ----

  /**
   * Parse an array from its header text (`[N…]…`), consuming any rows or
   * items that follow at `depth + 1`.
   */
  private parseArray(headerText: string, line: Line, depth: number): JsonArray {
    const match = ARRAY_HEADER.exec(headerText);
    if (!match) {
      throw this.error('Invalid array header', line);
    }
    const length = Number(match[1]);
    const delimiter: ToonDelimiter = match[2] === '\t' || match[2] === '|' ? match[2] : ',';
    const fieldsText = match[3];
    const inline = match[4].trim();

    if (fieldsText !== undefined) {
      if (inline.length > 0) {
        throw this.error('Unexpected values after tabular header', line);
      }
      const fields = splitDelimited(fieldsText, delimiter).map((f) => this.parseKeyToken(f, line));
      return this.parseRows(fields, length, delimiter, line, depth + 1);
    }

    if (inline.length > 0) {
      const values = splitDelimited(inline, delimiter).map((v) => this.parseToken(v, line));
      if (values.length !== length) {
        throw this.error(`Array declares ${length} values but has ${values.length}`, line);
      }
      return values;
    }

    return this.parseListItems(length, line, depth + 1);
  }

  private parseRows(
    fields: string[],
    length: number,
    delimiter: ToonDelimiter,
    header: Line,
    depth: number,
  ): JsonArray {
    const rows: JsonArray = [];
    for (let i = 0; i < length; i++) {
      const line = this.peek();
      if (!line || line.depth !== depth) {
        throw this.error(`Tabular array declares ${length} rows but has ${i}`, line ?? header);
      }
      this.pos++;

      const cells = splitDelimited(line.content, delimiter);
      if (cells.length !== fields.length) {
        throw this.error(`Row has ${cells.length} values, expected ${fields.length}`, line);
      }
      const row: JsonObject = {};
      for (let f = 0; f < fields.length; f++) {
        setEntry(row, fields[f], this.parseToken(cells[f], line));
      }
      rows.push(row);
    }

    const extra = this.peek();
    if (extra && extra.depth >= depth) {
      throw this.error(`Tabular array declares ${length} rows but has more`, extra);
    }
    return rows;
  }

  private parseListItems(length: number, header: Line, depth: number): JsonArray {
    const items: JsonArray = [];
    for (let i = 0; i < length; i++) {
      const line = this.peek();
      if (!line || line.depth !== depth) {
        throw this.error(`List array declares ${length} items but has ${i}`, line ?? header);
      }
      if (line.content !== LIST_MARKER && !line.content.startsWith(LIST_PREFIX)) {
        throw this.error('Expected list item', line);
      }
      this.pos++;
      items.push(this.parseListItem(line, depth));
    }

    const extra = this.peek();
    if (extra && extra.depth >= depth) {
      throw this.error(`List array declares ${length} items but has more`, extra);
    }
    return items;
  }

  /** The content after "- " behaves as if it stood at `depth + 1`. */
  private parseListItem(line: Line, depth: number): JsonValue {
    const rest = line.content === LIST_MARKER ? '' : line.content.slice(LIST_PREFIX.length);
    if (rest.length === 0) return {};

    if (rest.startsWith('[')) {
      return this.parseArray(rest, line, depth + 1);
    }

    const split = this.splitKey({ ...line, content: rest });
    if (split) {
      const obj: JsonObject = {};
      this.parseField(split, line, depth + 1, obj);
      return this.parseObject(depth + 1, obj);
    }

    return this.parseToken(rest, line);
  }

  // ---- Tokens ----

  /**
   * Split a leading key (bare or quoted) from a line whose key is followed by
   * `:` or `[`. Returns undefined when the line does not start with a key.
   */
  private splitKey(line: Line): KeySplit | undefined {
    const content = line.content;
    if (content.startsWith('"')) {
      const read = readQuoted(content, 0);
      if ('error' in read) return undefined;
      const next = content[read.end];
      return next === ':' || next === '['
        ? { key: read.value, rest: content.slice(read.end) }
        : undefined;
    }

    const match = BARE_KEY_PREFIX.exec(content);
    if (!match) return undefined;
    const next = content[match[0].length];
    return next === ':' || next === '['
      ? { key: match[0], rest: content.slice(match[0].length) }
      : undefined;
  }

  private parseKeyToken(text: string, line: Line): string {
    const token = text.trim();
    if (!token.startsWith('"')) {
      if (token.length === 0) throw this.error('Empty field name', line);
      return token;
    }
    return this.readWholeQuoted(token, line);
  }

  private parseToken(text: string, line: Line): JsonPrimitive {
    const token = text.trim();
    if (token.startsWith('"')) {
      return this.readWholeQuoted(token, line);
    }
    return parseBareToken(token);
  }

  private readWholeQuoted(token: string, line: Line): string {
    const read = readQuoted(token, 0);
    if ('error' in read) {
      throw this.error(read.error, line);
    }
    if (read.end !== token.length) {
      throw this.error('Unexpected characters after closing quote', line);
    }
    return read.value;
  }

  // ---- Cursor ----

  private peek(): Line | undefined {
    return this.lines[this.pos];
  }

  private expectEnd(message: string): void {
    const extra = this.peek();
    if (extra) throw this.error(message, extra);
  }

  private error(message: string, line: Line): ParseError {
    return new ParseError(message, line.lineNo, line.raw);
  }
}
