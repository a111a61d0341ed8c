import { describe, expect, it } from 'vitest';
import { JsonError, JsonParseError, JsonPrintError, locate } from '../src/errors.js';
import { version } from '../src/version.js';
import { bytes } from './helpers.js';

describe('locate', () => {
  it('counts lines and byte columns', () => {
    const text = bytes('ab\ncd\nef');
    expect(locate(text, 0)).toEqual({ line: 1, column: 1, offset: 0 });
    expect(locate(text, 4)).toEqual({ line: 2, column: 2, offset: 4 });
    expect(locate(text, 8)).toEqual({ line: 3, column: 3, offset: 8 });
  });

  it('counts columns in bytes, not characters', () => {
    expect(locate(bytes('"é"x'), 4).column).toBe(5);
  });
});

describe('error classes', () => {
  it('builds a parse error from a failure', () => {
    const error = JsonParseError.from({
      stage: 'parse',
      code: 'MissingColon',
      message: 'Expected :',
      position: { line: 3, column: 7, offset: 20 },
    });
    expect(error).toBeInstanceOf(JsonError);
    expect(error).toBeInstanceOf(JsonParseError);
    expect(error.name).toBe('JsonParseError');
    expect(error.code).toBe('MissingColon');
    expect(error.toString()).toBe('[MissingColon] Expected : (line 3, column 7)');
  });

  it('builds a print error from a failure', () => {
    const error = JsonPrintError.from({
      stage: 'print',
      code: 'BufferOverflow',
      message: 'Output does not fit the buffer',
      byteOffset: 12,
    });
    expect(error).toBeInstanceOf(JsonPrintError);
    expect(error.location).toBe('byte offset 12');
    expect(error.toString()).toBe('[BufferOverflow] Output does not fit the buffer (byte offset 12)');
  });

  it('omits an unknown location', () => {
    const error = new JsonError('boom');
    expect(error.location).toBe('');
    expect(error.toString()).toBe('boom');
  });
});

describe('version', () => {
  it('reports major.minor.patch', () => {
    expect(version()).toBe('1.0.0');
  });
});
