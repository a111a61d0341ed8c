/**
 * jsonlink failures: the result types returned by the core, and the error
 * classes thrown by the convenience entry points.
 */

import type { SourcePosition } from './ast.js';

export type JsonErrorCode =
  | 'NoInput'
  | 'InputTooLarge'
  | 'MalformedValue'
  | 'UnterminatedString'
  | 'InvalidEscape'
  | 'InvalidUnicodeEscape'
  | 'MalformedNumber'
  | 'MissingColon'
  | 'UnterminatedContainer'
  | 'TrailingGarbage'
  | 'NestingTooDeep'
  | 'AllocationFailure'
  | 'BufferOverflow';

export interface ParseFailure {
  readonly stage: 'parse';
  readonly code: JsonErrorCode;
  readonly message: string;
  /** First offending byte. */
  readonly position: SourcePosition;
}

export interface PrintFailure {
  readonly stage: 'print';
  readonly code: JsonErrorCode;
  readonly message: string;
  /** Output offset at which printing stopped. */
  readonly byteOffset: number;
}

export type CodecFailure = ParseFailure | PrintFailure;

export type Result<T, E> = ({ readonly ok: true } & T) | { readonly ok: false; readonly error: E };

/** Locate a byte offset as 1-based line and byte column. */
export function locate(bytes: Uint8Array, offset: number): SourcePosition {
  let line = 1;
  let lineStart = 0;
  const end = Math.min(offset, bytes.length);
  for (let i = 0; i < end; i++) {
    if (bytes[i] === 0x0a) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart + 1, offset };
}

type ConstructorOptions = {
  code?: JsonErrorCode;
  position?: SourcePosition;
  byteOffset?: number;
  cause?: unknown;
};

export class JsonError extends Error {
  override readonly name: string = 'JsonError';
  readonly code?: JsonErrorCode;
  readonly position?: SourcePosition;
  readonly byteOffset?: number;

  constructor(message: string, options?: ConstructorOptions) {
    super(message);
    this.code = options?.code;
    this.position = options?.position;
    this.byteOffset = options?.byteOffset;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, JsonError.prototype);
  }

  /** `line L, column C` for parse errors, `byte offset N` for print errors. */
  get location(): string {
    if (this.position !== undefined) return `line ${this.position.line}, column ${this.position.column}`;
    return this.byteOffset === undefined ? '' : `byte offset ${this.byteOffset}`;
  }

  /** `[Code] message (location)`, omitting the parts that are unknown. */
  override toString(): string {
    const head = this.code === undefined ? this.message : `[${this.code}] ${this.message}`;
    const loc = this.location;
    return loc ? `${head} (${loc})` : head;
  }
}

export class JsonParseError extends JsonError {
  override readonly name = 'JsonParseError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, JsonParseError.prototype);
  }

  static from(failure: ParseFailure): JsonParseError {
    return new JsonParseError(failure.message, {
      code: failure.code,
      position: failure.position,
    });
  }
}

export class JsonPrintError extends JsonError {
  override readonly name = 'JsonPrintError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, JsonPrintError.prototype);
  }

  static from(failure: PrintFailure): JsonPrintError {
    return new JsonPrintError(failure.message, {
      code: failure.code,
      byteOffset: failure.byteOffset,
    });
  }
}
