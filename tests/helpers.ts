import type { ArrayNode, JsonNode, NumberNode, ObjectNode, StringNode } from '../src/ast.js';
import { children, isArray, isNumber, isObject, isString, resolve } from '../src/ast.js';
import type { ParseFailure, PrintFailure } from '../src/errors.js';
import type { ParseResult } from '../src/parser.js';
import type { PrintIntoResult, PrintResult } from '../src/stringify.js';

export const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

export function parsed(result: ParseResult): JsonNode {
  if (!result.ok) throw new Error(`expected a tree, got ${result.error.code}`);
  return result.value;
}

export function parseFailure(result: ParseResult): ParseFailure {
  if (result.ok) throw new Error('expected a parse failure');
  return result.error;
}

export function printed(result: PrintResult): string {
  if (!result.ok) throw new Error(`expected text, got ${result.error.code}`);
  return result.text;
}

export function printFailure(result: PrintResult | PrintIntoResult): PrintFailure {
  if (result.ok) throw new Error('expected a print failure');
  return result.error;
}

export function asArray(node: JsonNode | null): ArrayNode {
  if (node === null || !isArray(node)) throw new Error('expected an array node');
  return node;
}

export function asObject(node: JsonNode | null): ObjectNode {
  if (node === null || !isObject(node)) throw new Error('expected an object node');
  return node;
}

export function asNumber(node: JsonNode | null): NumberNode {
  if (node === null || !isNumber(node)) throw new Error('expected a number node');
  return node;
}

export function asString(node: JsonNode | null): StringNode {
  if (node === null || !isString(node)) throw new Error('expected a string node');
  return node;
}

/** Plain JS value of a tree; object members become [key, value] pairs to keep order. */
export function toPlain(node: JsonNode): unknown {
  const v = resolve(node);
  switch (v.kind) {
    case 'null':
      return null;
    case 'bool':
    case 'number':
    case 'string':
      return v.value;
    case 'raw':
      return { raw: v.value };
    case 'array':
      return [...children(v)].map(toPlain);
    case 'object':
      return [...children(v)].map((c) => [c.key, toPlain(c)]);
  }
}
