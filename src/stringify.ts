/**
 * Node tree to JSON text. Writes through a PrintBuffer that either grows on
 * demand or is pinned to caller storage.
 *
 * Pretty output puts each object member on its own line, indented by one tab
 * per level, with a tab after the colon; arrays stay on one line with `, `
 * between elements.
 */

import type { ArrayNode, JsonNode, ObjectNode } from './ast.js';
import { resolve } from './ast.js';
import { PrintBuffer } from './buffer.js';
import { formatNumber, writeQuoted } from './codec.js';
import type { CodecContext } from './context.js';
import { createContext } from './context.js';
import type { JsonErrorCode, PrintFailure, Result } from './errors.js';
import { JsonPrintError } from './errors.js';
import { DEFAULT_MAX_DEPTH } from './parser.js';

export interface PrintOptions {
  /** Newlines and tabs between object members (default true) */
  pretty?: boolean;
  /** Initial buffer capacity in bytes (default 256) */
  sizeHint?: number;
  /** Max container nesting (default 1000) */
  maxDepth?: number;
  /** Allocator and error sink (default: heap allocator, no sink) */
  context?: CodecContext;
}

export type PrintResult = Result<{ text: string }, PrintFailure>;

/** `length` excludes the terminator written after the text. */
export type PrintIntoResult = Result<{ length: number }, PrintFailure>;

export const DEFAULT_BUFFER_SIZE = 256;

const utf8Encoder = new TextEncoder();

function failure(code: JsonErrorCode, message: string, byteOffset: number): PrintFailure {
  return { stage: 'print', code, message, byteOffset };
}

class Printer {
  private failure: PrintFailure | null = null;

  constructor(
    private readonly buffer: PrintBuffer,
    private readonly pretty: boolean,
    private readonly maxDepth: number
  ) {}

  /** Print `node` at the buffer offset; the failure, or null on success. */
  run(node: JsonNode): PrintFailure | null {
    if (!this.printValue(node, 0)) {
      return this.failure ?? failure('AllocationFailure', 'Print failed', this.buffer.offset);
    }
    this.buffer.recomputeOffset();
    return null;
  }

  private fail(code: JsonErrorCode, message: string): false {
    this.failure = failure(code, message, this.buffer.offset);
    return false;
  }

  private overflow(): false {
    return this.buffer.growable
      ? this.fail('AllocationFailure', 'Could not grow output buffer')
      : this.fail('BufferOverflow', 'Output does not fit the buffer');
  }

  /** Write `text` and a terminator without advancing the offset. */
  private put(text: string): boolean {
    const at = this.buffer.ensure(text.length + 1);
    if (at === null) return this.overflow();
    this.buffer.put(this.buffer.putAscii(at, text), 0);
    return true;
  }

  /** Write `text` and move the offset past it. */
  private append(text: string): boolean {
    if (!this.put(text)) return false;
    this.buffer.offset += text.length;
    return true;
  }

  private quoted(text: string): boolean {
    return writeQuoted(this.buffer, utf8Encoder.encode(text)) || this.overflow();
  }

  private raw(text: string): boolean {
    const bytes = utf8Encoder.encode(text);
    if (bytes.includes(0)) return this.fail('MalformedValue', 'Raw fragment contains a NUL byte');
    const at = this.buffer.ensure(bytes.length + 1);
    if (at === null) return this.overflow();
    this.buffer.put(this.buffer.putBytes(at, bytes), 0);
    return true;
  }

  private printValue(node: JsonNode, depth: number): boolean {
    const v = resolve(node);
    switch (v.kind) {
      case 'null':
        return this.put('null');
      case 'bool':
        return this.put(v.value ? 'true' : 'false');
      case 'number':
        return this.put(formatNumber(v.value, v.int));
      case 'string':
        return this.quoted(v.value);
      case 'raw':
        return this.raw(v.value);
      case 'array':
        return this.printArray(v, depth);
      case 'object':
        return this.printObject(v, depth);
    }
  }

  private printArray(array: ArrayNode, depth: number): boolean {
    if (depth >= this.maxDepth) {
      return this.fail('NestingTooDeep', `Maximum nesting depth exceeded (${this.maxDepth})`);
    }
    if (array.child === null) return this.put('[]');

    if (!this.append('[')) return false;
    for (let c: JsonNode | null = array.child; c !== null; c = c.next) {
      if (!this.printValue(c, depth + 1)) return false;
      this.buffer.recomputeOffset();
      if (c.next !== null && !this.append(this.pretty ? ', ' : ',')) return false;
    }
    return this.put(']');
  }

  private printObject(object: ObjectNode, depth: number): boolean {
    if (depth >= this.maxDepth) {
      return this.fail('NestingTooDeep', `Maximum nesting depth exceeded (${this.maxDepth})`);
    }
    if (object.child === null) return this.put('{}');

    const inner = depth + 1;
    if (!this.append(this.pretty ? '{\n' : '{')) return false;
    for (let c: JsonNode | null = object.child; c !== null; c = c.next) {
      if (this.pretty && !this.append('\t'.repeat(inner))) return false;
      if (!this.quoted(c.key ?? '')) return false;
      this.buffer.recomputeOffset();
      if (!this.append(this.pretty ? ':\t' : ':')) return false;
      if (!this.printValue(c, inner)) return false;
      this.buffer.recomputeOffset();
      const tail = (c.next !== null ? ',' : '') + (this.pretty ? '\n' : '');
      if (tail.length > 0 && !this.append(tail)) return false;
    }
    return this.put(this.pretty ? `${'\t'.repeat(depth)}}` : '}');
  }
}

/** Serialize into a growable buffer; no partial text is ever returned. */
export function tryPrint(node: JsonNode, options: PrintOptions = {}): PrintResult {
  const context = options.context ?? createContext();
  const sizeHint = options.sizeHint ?? DEFAULT_BUFFER_SIZE;
  const buffer = PrintBuffer.growable(sizeHint, context.allocator);
  let error: PrintFailure | null;
  if (buffer === null) {
    error = failure('AllocationFailure', `Could not allocate a ${sizeHint}-byte output buffer`, 0);
  } else {
    error = new Printer(buffer, options.pretty ?? true, options.maxDepth ?? DEFAULT_MAX_DEPTH).run(node);
    if (error === null) return { ok: true, text: buffer.toString() };
  }
  context.errors?.report(error);
  return { ok: false, error };
}

/**
 * Serialize into caller storage, never writing past its end. The text is
 * followed by a 0 byte, so `target` needs one byte more than the text.
 */
export function printInto(
  node: JsonNode,
  target: Uint8Array,
  options: Omit<PrintOptions, 'sizeHint'> = {}
): PrintIntoResult {
  const context = options.context ?? createContext();
  const buffer = PrintBuffer.fixed(target);
  const error = new Printer(buffer, options.pretty ?? true, options.maxDepth ?? DEFAULT_MAX_DEPTH).run(node);
  if (error !== null) {
    context.errors?.report(error);
    return { ok: false, error };
  }
  return { ok: true, length: buffer.offset };
}

function orThrow(result: PrintResult): string {
  if (!result.ok) throw JsonPrintError.from(result.error);
  return result.text;
}

/**
 * Pretty-print a tree.
 * @throws JsonPrintError
 */
export function print(node: JsonNode, options: Omit<PrintOptions, 'pretty'> = {}): string {
  return orThrow(tryPrint(node, { ...options, pretty: true }));
}

/**
 * Print a tree with no whitespace between tokens.
 * @throws JsonPrintError
 */
export function printUnformatted(node: JsonNode, options: Omit<PrintOptions, 'pretty'> = {}): string {
  return orThrow(tryPrint(node, { ...options, pretty: false }));
}

/**
 * Print starting from a `sizeHint`-byte buffer to save reallocations.
 * @throws JsonPrintError
 */
export function printBuffered(
  node: JsonNode,
  sizeHint: number,
  pretty: boolean,
  options: Omit<PrintOptions, 'pretty' | 'sizeHint'> = {}
): string {
  return orThrow(tryPrint(node, { ...options, sizeHint, pretty }));
}
