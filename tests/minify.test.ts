import { describe, expect, it } from 'vitest';
import { minify } from '../src/minify.js';
import { parse } from '../src/parser.js';
import { printUnformatted } from '../src/stringify.js';

describe('minify', () => {
  it('drops whitespace outside strings', () => {
    expect(minify('{ "a" : [1, 2],\r\n\t"b c": "d e" }')).toBe('{"a":[1,2],"b c":"d e"}');
  });

  it('drops line and block comments', () => {
    const text = '{\n  // c\n  "a": 1, /* block */ "b": "x y // not comment"\n}';
    expect(minify(text)).toBe('{"a":1,"b":"x y // not comment"}');
  });

  it('keeps escaped quotes inside strings', () => {
    expect(minify('[ "a\\" b" ]')).toBe('["a\\" b"]');
  });

  it('consumes an unterminated block comment to the end', () => {
    expect(minify('[1] /* open')).toBe('[1]');
  });

  it('produces text the parser reads back', () => {
    const text = '{\n\t"list": [ 1, 2 ], // trailing\n\t"ok": true\n}';
    expect(printUnformatted(parse(minify(text)))).toBe('{"list":[1,2],"ok":true}');
  });
});
