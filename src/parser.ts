/**
 * Recursive-descent JSON parser. Reads UTF-8 bytes in a single pass and
 * builds a linked node tree through the context allocator.
 *
 * Failures are returned, never thrown: the first offending byte is reported
 * and every node built for the enclosing containers is released.
 */

import type { JsonNode } from './ast.js';
import {
  arrayNode,
  boolNode,
  nullNode,
  numberNode,
  objectNode,
  stringNode,
} from './ast.js';
import { byteAt, readNumber, readString, type CodecIssue } from './codec.js';
import type { Allocator, CodecContext } from './context.js';
import { createContext } from './context.js';
import type { JsonErrorCode, ParseFailure, Result } from './errors.js';
import { JsonParseError, locate } from './errors.js';
import { deleteNode, SiblingChain } from './tree.js';

export interface ParseOptions {
  /** Reject anything but whitespace after the root value (default false) */
  requireFullConsumption?: boolean;
  /** Max container nesting (default 1000) */
  maxDepth?: number;
  /** Max input length in bytes (default unlimited) */
  maxInputLength?: number;
  /** Allocator and error sink (default: heap allocator, no sink) */
  context?: CodecContext;
}

export type ParseResult = Result<{ value: JsonNode; end: number }, ParseFailure>;

export type ParseInput = string | Uint8Array | null | undefined;

export const DEFAULT_MAX_DEPTH = 1000;

const QUOTE = 0x22;
const COMMA = 0x2c;
const MINUS = 0x2d;
const COLON = 0x3a;
const LBRACKET = 0x5b;
const RBRACKET = 0x5d;
const LBRACE = 0x7b;
const RBRACE = 0x7d;

const utf8Encoder = new TextEncoder();

interface Parsed {
  node: JsonNode;
  end: number;
}

/**
 * Parse JSON text. `end` on success is the offset just past the value (past
 * trailing whitespace too under `requireFullConsumption`).
 */
export function tryParse(input: ParseInput, options: ParseOptions = {}): ParseResult {
  const context = options.context ?? createContext();
  const result = parseBytes(input, options, context.allocator);
  if (!result.ok) context.errors?.report(result.error);
  return result;
}

/**
 * Parse JSON text and return the root node.
 * @throws JsonParseError
 */
export function parse(input: ParseInput, options: ParseOptions = {}): JsonNode {
  const result = tryParse(input, options);
  if (!result.ok) throw JsonParseError.from(result.error);
  return result.value;
}

function parseBytes(input: ParseInput, options: ParseOptions, allocator: Allocator): ParseResult {
  const bytes = typeof input === 'string' ? utf8Encoder.encode(input) : input;
  if (bytes === null || bytes === undefined || bytes.length === 0) {
    return failure(new Uint8Array(0), 'NoInput', 'No input', 0);
  }
  const maxLen = options.maxInputLength ?? Number.POSITIVE_INFINITY;
  if (bytes.length > maxLen) {
    return failure(bytes, 'InputTooLarge', `Input exceeds maximum length (${bytes.length} > ${maxLen})`, 0);
  }

  const reader = new Reader(bytes, allocator, options.maxDepth ?? DEFAULT_MAX_DEPTH);
  const root = reader.parseValue(reader.skipWs(0), 0);
  if (root === null) return { ok: false, error: reader.error() };

  let end = root.end;
  if (options.requireFullConsumption === true) {
    end = reader.skipWs(end);
    if (byteAt(bytes, end) !== 0) {
      deleteNode(root.node, allocator);
      return failure(bytes, 'TrailingGarbage', 'Unexpected data after JSON value', end);
    }
  }
  return { ok: true, value: root.node, end };
}

function failure(bytes: Uint8Array, code: JsonErrorCode, message: string, at: number): { ok: false; error: ParseFailure } {
  return { ok: false, error: { stage: 'parse', code, message, position: locate(bytes, at) } };
}

class Reader {
  private failure: ParseFailure | null = null;

  constructor(
    private readonly bytes: Uint8Array,
    private readonly allocator: Allocator,
    private readonly maxDepth: number
  ) {}

  error(): ParseFailure {
    return this.failure ?? failure(this.bytes, 'MalformedValue', 'Parse failed', 0).error;
  }

  /** Skip bytes 1..32. */
  skipWs(at: number): number {
    let p = at;
    for (;;) {
      const c = byteAt(this.bytes, p);
      if (c === 0 || c > 32) return p;
      p++;
    }
  }

  private fail(code: JsonErrorCode, message: string, at: number): null {
    this.failure = failure(this.bytes, code, message, at).error;
    return null;
  }

  private failWith(issue: CodecIssue): null {
    return this.fail(issue.code, issue.message, issue.at);
  }

  private alloc<T extends JsonNode>(node: T, at: number): T | null {
    const allocated = this.allocator.allocate(node);
    if (allocated === null) this.fail('AllocationFailure', 'Allocator refused a node', at);
    return allocated;
  }

  private matches(at: number, literal: string): boolean {
    for (let i = 0; i < literal.length; i++) {
      if (byteAt(this.bytes, at + i) !== literal.charCodeAt(i)) return false;
    }
    return true;
  }

  private scalar(node: JsonNode, at: number, end: number): Parsed | null {
    const allocated = this.alloc(node, at);
    return allocated === null ? null : { node: allocated, end };
  }

  parseValue(at: number, depth: number): Parsed | null {
    if (this.matches(at, 'null')) return this.scalar(nullNode(), at, at + 4);
    if (this.matches(at, 'false')) return this.scalar(boolNode(false), at, at + 5);
    if (this.matches(at, 'true')) return this.scalar(boolNode(true), at, at + 4);

    const c = byteAt(this.bytes, at);
    if (c === QUOTE) {
      const s = readString(this.bytes, at);
      if (!s.ok) return this.failWith(s.error);
      return this.scalar(stringNode(s.value), at, s.end);
    }
    if (c === MINUS || (c >= 0x30 && c <= 0x39)) {
      const n = readNumber(this.bytes, at);
      if (!n.ok) return this.failWith(n.error);
      return this.scalar(numberNode(n.value), at, n.end);
    }
    if (c === LBRACKET) return this.parseArray(at, depth);
    if (c === LBRACE) return this.parseObject(at, depth);

    return this.fail('MalformedValue', c === 0 ? 'Unexpected end of input' : 'Unexpected character', at);
  }

  private abandon(chain: SiblingChain): null {
    chain.release(this.allocator);
    return null;
  }

  private parseArray(at: number, depth: number): Parsed | null {
    if (depth >= this.maxDepth) {
      return this.fail('NestingTooDeep', `Maximum nesting depth exceeded (${this.maxDepth})`, at);
    }
    const chain = new SiblingChain();
    let p = this.skipWs(at + 1);
    if (byteAt(this.bytes, p) !== RBRACKET) {
      for (;;) {
        const item = this.parseValue(p, depth + 1);
        if (item === null) return this.abandon(chain);
        chain.push(item.node);
        p = this.skipWs(item.end);
        if (byteAt(this.bytes, p) !== COMMA) break;
        p = this.skipWs(p + 1);
      }
      if (byteAt(this.bytes, p) !== RBRACKET) {
        this.fail('UnterminatedContainer', 'Expected , or ]', p);
        return this.abandon(chain);
      }
    }
    const node = this.alloc(arrayNode(chain.head), at);
    if (node === null) return this.abandon(chain);
    return { node, end: p + 1 };
  }

  private parseObject(at: number, depth: number): Parsed | null {
    if (depth >= this.maxDepth) {
      return this.fail('NestingTooDeep', `Maximum nesting depth exceeded (${this.maxDepth})`, at);
    }
    const chain = new SiblingChain();
    let p = this.skipWs(at + 1);
    if (byteAt(this.bytes, p) !== RBRACE) {
      for (;;) {
        if (byteAt(this.bytes, p) !== QUOTE) {
          this.fail('MalformedValue', 'Expected member name', p);
          return this.abandon(chain);
        }
        const name = readString(this.bytes, p);
        if (!name.ok) {
          this.failWith(name.error);
          return this.abandon(chain);
        }
        p = this.skipWs(name.end);
        if (byteAt(this.bytes, p) !== COLON) {
          this.fail('MissingColon', 'Expected :', p);
          return this.abandon(chain);
        }
        const member = this.parseValue(this.skipWs(p + 1), depth + 1);
        if (member === null) return this.abandon(chain);
        member.node.key = name.value;
        member.node.keyOwnership = 'owned';
        chain.push(member.node);
        p = this.skipWs(member.end);
        if (byteAt(this.bytes, p) !== COMMA) break;
        p = this.skipWs(p + 1);
      }
      if (byteAt(this.bytes, p) !== RBRACE) {
        this.fail('UnterminatedContainer', 'Expected , or }', p);
        return this.abandon(chain);
      }
    }
    const node = this.alloc(objectNode(chain.head), at);
    if (node === null) return this.abandon(chain);
    return { node, end: p + 1 };
  }
}
