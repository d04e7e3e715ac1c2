import { describe, expect, it } from 'vitest';
import { ParseError } from '../errors.js';
import { ToonDecoder, decodeToon } from '../toon_decoder.js';

/** Run `fn` and return the ParseError it throws. */
function parseErrorOf(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error('expected a ParseError');
}

describe('ToonDecoder — structure', () => {
  it('decodes fields', () => {
    expect(decodeToon('patient_id: P1\nlactate: 4.2\nshock: true')).toEqual({
      patient_id: 'P1',
      lactate: 4.2,
      shock: true,
    });
  });

  it('decodes a tabular run', () => {
    expect(decodeToon('[2]{id,value}:\n  1,a\n  2,b')).toEqual([
      { id: 1, value: 'a' },
      { id: 2, value: 'b' },
    ]);
  });

  it('decodes nested objects and empty containers', () => {
    expect(decodeToon('patient:\n  id: P1\n  flags:\nlabs[0]:')).toEqual({
      patient: { id: 'P1', flags: {} },
      labs: [],
    });
  });

  it('decodes list items of every kind', () => {
    expect(decodeToon('items[3]:\n  - 1\n  - a: 1\n  - [2]: 2,3')).toEqual({ items: [1, { a: 1 }, [2, 3]] });
    expect(decodeToon('meds[2]:\n  - name: x\n    dose: 5\n  - name: y')).toEqual({
      meds: [{ name: 'x', dose: 5 }, { name: 'y' }],
    });
    expect(decodeToon('[1]:\n  - vitals:\n      hr: 90\n    id: 1')).toEqual([{ vitals: { hr: 90 }, id: 1 }]);
    expect(decodeToon('[2]:\n  -\n  - 1')).toEqual([{}, 1]);
    expect(decodeToon('[1]:\n  - [2]{a}:\n      1\n      2')).toEqual([[{ a: 1 }, { a: 2 }]]);
  });

  it('reads the delimiter from the header', () => {
    expect(decodeToon('v[3|]: 1|2|3')).toEqual({ v: [1, 2, 3] });
    expect(decodeToon('rows[1\t]{a\tb}:\n  1\tx,y')).toEqual({ rows: [{ a: 1, b: 'x,y' }] });
  });

  it('decodes quoted keys and header fields', () => {
    expect(decodeToon('"first name": 1\n"": 2')).toEqual({ 'first name': 1, '': 2 });
    expect(decodeToon('[1]{"a b",c}:\n  1,2')).toEqual([{ 'a b': 1, c: 2 }]);
  });

  it('decodes root primitives and arrays', () => {
    expect(decodeToon('null')).toBeNull();
    expect(decodeToon('42')).toBe(42);
    expect(decodeToon('"42"')).toBe('42');
    expect(decodeToon('hello world')).toBe('hello world');
    expect(decodeToon('[0]:')).toEqual([]);
  });

  it('treats empty text as an empty object', () => {
    expect(decodeToon('')).toEqual({});
    expect(decodeToon('  \n\n')).toEqual({});
  });

  it('skips blank lines and tolerates CRLF', () => {
    expect(decodeToon('a: 1\n\nb: 2\n')).toEqual({ a: 1, b: 2 });
    expect(decodeToon('a: 1\r\nb:\r\n  c: x\r\n')).toEqual({ a: 1, b: { c: 'x' } });
  });

  it('keeps field order', () => {
    expect(Object.keys(decodeToon('z: 1\na: 2\nm: 3') ?? {})).toEqual(['z', 'a', 'm']);
  });

  it('honours a custom indent', () => {
    expect(new ToonDecoder({ indent: 4 }).decode('a:\n    b: 1')).toEqual({ a: { b: 1 } });
  });

  it('stores a __proto__ key as an own property', () => {
    const decoded = decodeToon('__proto__: 1');
    expect(Object.keys(decoded ?? {})).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(decoded)).toBe(Object.prototype);
  });
});

describe('ToonDecoder — tokens', () => {
  it('types bare tokens', () => {
    expect(decodeToon('a: 007\nb: 1e3\nc: true\nd: null\ne: 0.5\nf: .5')).toEqual({
      a: '007',
      b: 1000,
      c: true,
      d: null,
      e: 0.5,
      f: '.5',
    });
  });

  it('keeps -0', () => {
    const decoded = decodeToon('[1]: -0');
    expect(Array.isArray(decoded) && Object.is(decoded[0], -0)).toBe(true);
  });

  it('never types quoted tokens', () => {
    expect(decodeToon('a: "true"\nb: "1"\nc: ""')).toEqual({ a: 'true', b: '1', c: '' });
  });

  it('unescapes quoted strings', () => {
    expect(decodeToon('s: "line1\\nline2\\t\\"x\\" \\\\"')).toEqual({ s: 'line1\nline2\t"x" \\' });
  });

  it('keeps delimiters inside quoted cells', () => {
    expect(decodeToon('[2]{a,b}:\n  "x,y",1\n  "",2')).toEqual([
      { a: 'x,y', b: 1 },
      { a: '', b: 2 },
    ]);
  });
});

describe('ToonDecoder — errors', () => {
  it('rejects indentation that is not a multiple of the unit', () => {
    const err = parseErrorOf(() => decodeToon('a:\n   b: 1'));
    expect(err.line).toBe(2);
    expect(err.message).toBe('Indentation is not a multiple of 2 (line 2: "   b: 1")');
  });

  it('rejects tabs in indentation', () => {
    expect(parseErrorOf(() => decodeToon('a:\n\tb: 1')).message).toContain('Tab character in indentation');
  });

  it('rejects lines deeper than their scope', () => {
    expect(parseErrorOf(() => decodeToon('a: 1\n  b: 2')).message).toBe(
      'Unexpected indentation (line 2: "  b: 2")',
    );
    expect(parseErrorOf(() => decodeToon('a:\n    b: 1')).line).toBe(2);
  });

  it('checks row width against the header', () => {
    const err = parseErrorOf(() => decodeToon('rows[2]{a,b}:\n  1,2\n  3'));
    expect(err.message).toBe('Row has 1 values, expected 2 (line 3: "  3")');
    expect(err.lineContent).toBe('  3');
  });

  it('checks declared lengths', () => {
    expect(parseErrorOf(() => decodeToon('rows[3]{a}:\n  1\n  2')).message).toBe(
      'Tabular array declares 3 rows but has 2 (line 1: "rows[3]{a}:")',
    );
    expect(parseErrorOf(() => decodeToon('rows[1]{a}:\n  1\n  2')).line).toBe(3);
    expect(parseErrorOf(() => decodeToon('v[3]: 1,2')).message).toContain('Array declares 3 values but has 2');
    expect(parseErrorOf(() => decodeToon('v[1]:\n  - 1\n  - 2')).message).toContain(
      'List array declares 1 items but has more',
    );
  });

  it('rejects malformed quoted tokens', () => {
    expect(parseErrorOf(() => decodeToon('a: "abc')).message).toContain('Unterminated string');
    expect(parseErrorOf(() => decodeToon('a: "a\\qb"')).message).toContain('Invalid escape sequence \\q');
    expect(parseErrorOf(() => decodeToon('a: "x"y')).message).toContain('Unexpected characters after closing quote');
  });

  it('rejects a key with a missing value', () => {
    expect(parseErrorOf(() => decodeToon('a: ')).message).toContain('Missing value after "key: "');
  });

  it('rejects malformed headers and list items', () => {
    expect(parseErrorOf(() => decodeToon('v[x]: 1')).message).toContain('Invalid array header');
    expect(parseErrorOf(() => decodeToon('items[1]:\n  x')).message).toContain('Expected list item');
  });

  it('rejects several root primitives', () => {
    expect(parseErrorOf(() => decodeToon('hello\nworld')).line).toBe(2);
  });

  it('rejects duplicate keys', () => {
    expect(parseErrorOf(() => decodeToon('a: 1\na: 2')).message).toBe('Duplicate key "a" (line 2: "a: 2")');
  });

  it('rejects lines that are not fields inside an object', () => {
    expect(parseErrorOf(() => decodeToon('a: 1\njust text')).message).toContain('Expected "key:" or "key[N]:"');
  });
});
