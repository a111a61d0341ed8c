import { describe, expect, it } from 'vitest';
import { INT32_MAX } from '../src/ast.js';
import { PrintBuffer } from '../src/buffer.js';
import {
  decodeUnicodeEscape,
  escapedLength,
  formatNumber,
  readNumber,
  readString,
  writeQuoted,
} from '../src/codec.js';
import { bytes } from './helpers.js';

describe('readString', () => {
  it('reads a literal without escapes', () => {
    const step = readString(bytes('"abc",'), 0);
    expect(step).toEqual({ ok: true, value: 'abc', end: 5 });
  });

  it('decodes short and unicode escapes', () => {
    const step = readString(bytes('"a\\nb\\u00e9"'), 0);
    expect(step).toEqual({ ok: true, value: 'a\nbé', end: 12 });
  });

  it('joins surrogate pairs', () => {
    const step = readString(bytes('"\\ud83d\\ude00"'), 0);
    expect(step).toEqual({ ok: true, value: '\u{1F600}', end: 14 });
  });

  it('keeps a leading byte order mark', () => {
    expect(readString(bytes('"\uFEFFabc"'), 0)).toEqual({ ok: true, value: '\uFEFFabc', end: 8 });
    expect(readString(bytes('"\\uFEFFabc"'), 0)).toEqual({ ok: true, value: '\uFEFFabc', end: 11 });
  });

  it('rejects invalid UTF-8 at the opening quote', () => {
    for (const input of [[0x22, 0xff, 0x22], [0x20, 0x22, 0x5c, 0x6e, 0xc3, 0x22]]) {
      const start = input.indexOf(0x22);
      const step = readString(new Uint8Array(input), start);
      expect(step.ok).toBe(false);
      if (step.ok) continue;
      expect(step.error.code).toBe('MalformedValue');
      expect(step.error.at).toBe(start);
    }
  });

  it('reads from an offset', () => {
    const step = readString(bytes('{"key":1}'), 1);
    expect(step).toEqual({ ok: true, value: 'key', end: 6 });
  });

  const failures: Array<[string, string, number]> = [
    ['"\\uD800"', 'InvalidUnicodeEscape', 1],
    ['"\\uDC00"', 'InvalidUnicodeEscape', 1],
    ['"\\u0000"', 'InvalidUnicodeEscape', 1],
    ['"\\u12"', 'InvalidUnicodeEscape', 1],
    ['"\\uD800\\u0041"', 'InvalidUnicodeEscape', 1],
    ['"\\x"', 'InvalidEscape', 1],
    ['"abc', 'UnterminatedString', 4],
    ['"ab\\', 'UnterminatedString', 4],
    ['abc', 'MalformedValue', 0],
  ];

  it.each(failures)('%s fails with %s at %i', (text, code, at) => {
    const step = readString(bytes(text), 0);
    expect(step.ok).toBe(false);
    if (step.ok) return;
    expect(step.error.code).toBe(code);
    expect(step.error.at).toBe(at);
  });
});

describe('decodeUnicodeEscape', () => {
  it('decodes a single escape', () => {
    const text = bytes('\\u0041');
    expect(decodeUnicodeEscape(text, 0, text.length)).toEqual({ ok: true, value: 0x41, end: 6 });
  });

  it('accepts upper and lower case hex', () => {
    const text = bytes('\\uD83D\\uDE00');
    expect(decodeUnicodeEscape(text, 0, text.length)).toEqual({ ok: true, value: 0x1f600, end: 12 });
  });
});

describe('readNumber', () => {
  it('reads sign, fraction and exponent', () => {
    expect(readNumber(bytes('-0.5e2,'), 0)).toEqual({ ok: true, value: -50, end: 6 });
    expect(readNumber(bytes('1E+3'), 0)).toEqual({ ok: true, value: 1000, end: 4 });
  });

  it('leaves an exponent without digits unread', () => {
    expect(readNumber(bytes('1e'), 0)).toEqual({ ok: true, value: 1, end: 1 });
    expect(readNumber(bytes('1e+'), 0)).toEqual({ ok: true, value: 1, end: 1 });
  });

  it('accepts lenient forms', () => {
    expect(readNumber(bytes('-.5'), 0)).toEqual({ ok: true, value: -0.5, end: 3 });
    expect(readNumber(bytes('007'), 0)).toEqual({ ok: true, value: 7, end: 3 });
    expect(readNumber(bytes('1.'), 0)).toEqual({ ok: true, value: 1, end: 2 });
  });

  it('fails without digits', () => {
    const step = readNumber(bytes('-'), 0);
    expect(step.ok).toBe(false);
    if (step.ok) return;
    expect(step.error.code).toBe('MalformedNumber');
    expect(step.error.at).toBe(0);
  });
});

describe('escapedLength', () => {
  it('counts short and six-byte escapes', () => {
    expect(escapedLength(bytes('a"\n\u0001'))).toBe(11);
    expect(escapedLength(bytes('plain'))).toBe(5);
  });
});

describe('formatNumber', () => {
  const cases: Array<[number, number, string]> = [
    [3, 3, '3'],
    [-2147483648, -2147483648, '-2147483648'],
    [2147483648, INT32_MAX, '2147483648'],
    [1e10, INT32_MAX, '10000000000'],
    [1e100, INT32_MAX, '1.000000e+100'],
    [1.5e-7, 0, '1.500000e-07'],
    [1234567890.5, INT32_MAX, '1.234568e+09'],
    [3.14159, 3, '3.141590'],
    [0.0078125, 0, '0.007812'],
    [-0.0078125, 0, '-0.007812'],
    [0.0234375, 0, '0.023438'],
    [2.0078125, 2, '2.007812'],
    [0.9921875, 0, '0.992188'],
    [-2.5, -2, '-2.500000'],
    [Number.NaN, 0, 'null'],
    [Number.POSITIVE_INFINITY, INT32_MAX, 'null'],
    [Number.NEGATIVE_INFINITY, -2147483648, 'null'],
  ];

  it.each(cases)('%d prints as %s', (value, int, text) => {
    expect(formatNumber(value, int)).toBe(text);
  });
});

describe('escape round trip', () => {
  const every = Array.from({ length: 0x7e }, (_, i) => String.fromCharCode(i + 1)).join('');

  function quoted(text: string): PrintBuffer {
    const buffer = PrintBuffer.growable(8);
    if (buffer === null) throw new Error('buffer refused');
    expect(writeQuoted(buffer, bytes(text))).toBe(true);
    buffer.recomputeOffset();
    return buffer;
  }

  it('restores every byte from 0x01 to 0x7e', () => {
    const buffer = quoted(every);
    expect(readString(buffer.bytes, 0)).toEqual({ ok: true, value: every, end: buffer.offset });
  });

  it('restores each byte on its own', () => {
    for (const c of every) {
      const buffer = quoted(c);
      expect(readString(buffer.bytes, 0)).toEqual({ ok: true, value: c, end: buffer.offset });
    }
  });

  it('restores a leading byte order mark', () => {
    const buffer = quoted('\uFEFFx');
    expect(buffer.toString()).toBe('"\uFEFFx"');
    expect(readString(buffer.bytes, 0)).toEqual({ ok: true, value: '\uFEFFx', end: 6 });
  });
});
