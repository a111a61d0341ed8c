/**
 * String and number codec shared by the parser and the printer. Works on
 * UTF-8 bytes; a 0 byte or the end of the array terminates input.
 */

import type { PrintBuffer } from './buffer.js';
import type { JsonErrorCode, Result } from './errors.js';

export interface CodecIssue {
  code: JsonErrorCode;
  message: string;
  /** Offending byte */
  at: number;
}

export type CodecStep<T> = Result<{ value: T; end: number }, CodecIssue>;

const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const MINUS = 0x2d;
const DOT = 0x2e;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** Decode string content; null when it is not valid UTF-8. */
function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return utf8Decoder.decode(bytes);
  } catch (e) {
    if (e instanceof TypeError) return null;
    throw e;
  }
}

function decodedString(bytes: Uint8Array, start: number, end: number): CodecStep<string> {
  const value = decodeUtf8(bytes);
  return value === null
    ? issue('MalformedValue', 'String is not valid UTF-8', start)
    : { ok: true, value, end };
}

function issue(code: JsonErrorCode, message: string, at: number): { ok: false; error: CodecIssue } {
  return { ok: false, error: { code, message, at } };
}

/** Byte at `i`, or 0 past the end. */
export function byteAt(bytes: Uint8Array, i: number): number {
  return bytes[i] ?? 0;
}

function isDigit(c: number): boolean {
  return c >= 0x30 && c <= 0x39;
}

/** Four hex digits at `at`; 0 when any of them is not hex. */
function parseHex4(bytes: Uint8Array, at: number): number {
  let h = 0;
  for (let i = 0; i < 4; i++) {
    const c = byteAt(bytes, at + i);
    let nibble: number;
    if (c >= 0x30 && c <= 0x39) nibble = c - 0x30;
    else if (c >= 0x41 && c <= 0x46) nibble = c - 0x41 + 10;
    else if (c >= 0x61 && c <= 0x66) nibble = c - 0x61 + 10;
    else return 0;
    h = (h << 4) | nibble;
  }
  return h;
}

function encodeCodepoint(cp: number, out: Uint8Array, o: number): number {
  if (cp < 0x80) {
    out[o] = cp;
    return o + 1;
  }
  if (cp < 0x800) {
    out[o] = 0xc0 | (cp >> 6);
    out[o + 1] = 0x80 | (cp & 0x3f);
    return o + 2;
  }
  if (cp < 0x10000) {
    out[o] = 0xe0 | (cp >> 12);
    out[o + 1] = 0x80 | ((cp >> 6) & 0x3f);
    out[o + 2] = 0x80 | (cp & 0x3f);
    return o + 3;
  }
  out[o] = 0xf0 | (cp >> 18);
  out[o + 1] = 0x80 | ((cp >> 12) & 0x3f);
  out[o + 2] = 0x80 | ((cp >> 6) & 0x3f);
  out[o + 3] = 0x80 | (cp & 0x3f);
  return o + 4;
}

/**
 * Decode one `\uXXXX` escape, or a surrogate pair of two, starting at the
 * backslash `at`. `end` is the closing quote. `value` is the codepoint and
 * `end` the byte after the sequence.
 */
export function decodeUnicodeEscape(bytes: Uint8Array, at: number, end: number): CodecStep<number> {
  if (end - at < 6) return issue('InvalidUnicodeEscape', 'Incomplete \\u escape', at);
  const first = parseHex4(bytes, at + 2);
  if ((first >= 0xdc00 && first <= 0xdfff) || first === 0) {
    return issue('InvalidUnicodeEscape', 'Invalid \\u escape', at);
  }
  if (first < 0xd800 || first > 0xdbff) {
    return { ok: true, value: first, end: at + 6 };
  }

  const second = at + 6;
  if (end - second < 6) {
    return issue('InvalidUnicodeEscape', 'Unpaired high surrogate', at);
  }
  if (byteAt(bytes, second) !== BACKSLASH || byteAt(bytes, second + 1) !== 0x75) {
    return issue('InvalidUnicodeEscape', 'Unpaired high surrogate', at);
  }
  const low = parseHex4(bytes, second + 2);
  if (low < 0xdc00 || low > 0xdfff) {
    return issue('InvalidUnicodeEscape', 'Invalid low surrogate', at);
  }
  const codepoint = 0x10000 + (((first & 0x3ff) << 10) | (low & 0x3ff));
  if (codepoint > 0x10ffff) return issue('InvalidUnicodeEscape', 'Codepoint out of range', at);
  return { ok: true, value: codepoint, end: at + 12 };
}

/**
 * Read a quoted string literal starting at the opening quote. `end` is the
 * byte after the closing quote.
 */
export function readString(bytes: Uint8Array, start: number): CodecStep<string> {
  if (byteAt(bytes, start) !== QUOTE) return issue('MalformedValue', 'Expected string', start);

  // Find the closing quote first; escapes only ever shrink, so the literal
  // length bounds the output.
  let close = start + 1;
  let escaped = false;
  for (;;) {
    const c = byteAt(bytes, close);
    if (c === 0) return issue('UnterminatedString', 'Unterminated string', close);
    if (c === QUOTE) break;
    if (c === BACKSLASH) {
      if (byteAt(bytes, close + 1) === 0) {
        return issue('UnterminatedString', 'Unterminated string', close + 1);
      }
      escaped = true;
      close++;
    }
    close++;
  }
  if (!escaped) {
    return decodedString(bytes.subarray(start + 1, close), start, close + 1);
  }

  const out = new Uint8Array(close - start);
  let o = 0;
  let i = start + 1;
  while (i < close) {
    const c = byteAt(bytes, i);
    if (c !== BACKSLASH) {
      out[o++] = c;
      i++;
      continue;
    }
    const e = byteAt(bytes, i + 1);
    switch (e) {
      case 0x62: // b
        out[o++] = 0x08;
        break;
      case 0x66: // f
        out[o++] = 0x0c;
        break;
      case 0x6e: // n
        out[o++] = 0x0a;
        break;
      case 0x72: // r
        out[o++] = 0x0d;
        break;
      case 0x74: // t
        out[o++] = 0x09;
        break;
      case QUOTE:
      case BACKSLASH:
      case 0x2f: // /
        out[o++] = e;
        break;
      case 0x75: {
        const decoded = decodeUnicodeEscape(bytes, i, close);
        if (!decoded.ok) return decoded;
        o = encodeCodepoint(decoded.value, out, o);
        i = decoded.end;
        continue;
      }
      default:
        return issue('InvalidEscape', `Invalid escape sequence \\${String.fromCharCode(e)}`, i);
    }
    i += 2;
  }
  return decodedString(out.subarray(0, o), start, close + 1);
}

/**
 * Read a number starting at `start` with strtod-like leniency: optional
 * minus, digits, optional fraction, optional exponent. Leading zeros and a
 * bare trailing `.` are accepted; an exponent without digits is left unread.
 */
export function readNumber(bytes: Uint8Array, start: number): CodecStep<number> {
  let i = start;
  if (byteAt(bytes, i) === MINUS) i++;
  let digits = 0;
  while (isDigit(byteAt(bytes, i))) {
    i++;
    digits++;
  }
  if (byteAt(bytes, i) === DOT) {
    i++;
    while (isDigit(byteAt(bytes, i))) {
      i++;
      digits++;
    }
  }
  if (digits === 0) return issue('MalformedNumber', 'Invalid number', start);

  const e = byteAt(bytes, i);
  if (e === 0x65 || e === 0x45) {
    let j = i + 1;
    const sign = byteAt(bytes, j);
    if (sign === 0x2b || sign === MINUS) j++;
    if (isDigit(byteAt(bytes, j))) {
      while (isDigit(byteAt(bytes, j))) j++;
      i = j;
    }
  }

  let text = '';
  for (let k = start; k < i; k++) text += String.fromCharCode(byteAt(bytes, k));
  return { ok: true, value: Number(text), end: i };
}

function needsEscape(c: number): boolean {
  return c < 32 || c === QUOTE || c === BACKSLASH;
}

/** Bytes needed for the escaped body of `bytes`, quotes excluded. */
export function escapedLength(bytes: Uint8Array): number {
  let length = 0;
  for (const c of bytes) {
    if (c === QUOTE || c === BACKSLASH || c === 0x08 || c === 0x0c || c === 0x0a || c === 0x0d || c === 0x09) {
      length += 2;
    } else if (c < 32) {
      length += 6;
    } else {
      length += 1;
    }
  }
  return length;
}

function shortEscape(c: number): number {
  switch (c) {
    case QUOTE:
      return QUOTE;
    case BACKSLASH:
      return BACKSLASH;
    case 0x08:
      return 0x62;
    case 0x0c:
      return 0x66;
    case 0x0a:
      return 0x6e;
    case 0x0d:
      return 0x72;
    case 0x09:
      return 0x74;
    default:
      return 0;
  }
}

/**
 * Write `bytes` as a quoted, escaped literal plus terminator at the buffer
 * offset without advancing it. False when the buffer cannot make room.
 */
export function writeQuoted(buffer: PrintBuffer, bytes: Uint8Array): boolean {
  let special = false;
  for (const c of bytes) {
    if (needsEscape(c)) {
      special = true;
      break;
    }
  }

  if (!special) {
    const at = buffer.ensure(bytes.length + 3);
    if (at === null) return false;
    let p = buffer.put(at, QUOTE);
    p = buffer.putBytes(p, bytes);
    p = buffer.put(p, QUOTE);
    buffer.put(p, 0);
    return true;
  }

  const at = buffer.ensure(escapedLength(bytes) + 3);
  if (at === null) return false;
  let p = buffer.put(at, QUOTE);
  for (const c of bytes) {
    if (!needsEscape(c)) {
      p = buffer.put(p, c);
      continue;
    }
    p = buffer.put(p, BACKSLASH);
    const short = shortEscape(c);
    if (short !== 0) {
      p = buffer.put(p, short);
    } else {
      p = buffer.putAscii(p, `u${c.toString(16).padStart(4, '0')}`);
    }
  }
  p = buffer.put(p, QUOTE);
  buffer.put(p, 0);
  return true;
}

function padExponent(text: string): string {
  return text.replace(/e([+-])(\d)$/, (_m, sign: string, digit: string) => `e${sign}0${digit}`);
}

/** Whole-number text with no exponent, exact for any double below 1e60. */
function wholeNumber(d: number): string {
  return Number.isInteger(d) ? BigInt(d).toString() : d.toFixed(0);
}

/**
 * Six decimals with exact ties rounded to even. A double sits exactly halfway
 * between two six-decimal values only when it is an odd multiple of 1/128.
 */
function sixDecimals(d: number): string {
  const scaled = d * 128;
  if (!Number.isInteger(scaled) || scaled % 2 === 0) return d.toFixed(6);
  const truncated = d.toFixed(7).slice(0, -1);
  const last = truncated.charCodeAt(truncated.length - 1) - 0x30;
  return last % 2 === 0 ? truncated : d.toFixed(6);
}

/**
 * Locale-independent number text for a value and its integer mirror:
 * integers within 32 bits as-is, NaN and infinities as `null`, other whole
 * numbers below 1e60 without decimals, very small or large magnitudes in
 * exponent form, the rest with six decimals.
 */
export function formatNumber(value: number, int: number): string {
  const d = value;
  if (Math.abs(int - d) <= Number.EPSILON && d <= 2147483647 && d >= -2147483648) {
    return String(int);
  }
  if (d * 0 !== 0) return 'null';
  if (Math.abs(Math.floor(d) - d) <= Number.EPSILON && Math.abs(d) < 1.0e60) {
    return wholeNumber(d);
  }
  if (Math.abs(d) < 1.0e-6 || Math.abs(d) > 1.0e9) {
    return padExponent(d.toExponential(6));
  }
  return sixDecimals(d);
}
