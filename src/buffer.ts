/**
 * Append-only output buffer for the printer. Grows by doubling, or rejects
 * growth when it wraps caller-owned storage.
 *
 * Content is zero-terminated: writers put a 0 byte after what they wrote and
 * `recomputeOffset()` finds it again.
 */

import { constants } from 'node:buffer';
import type { Allocator } from './context.js';
import { heapAllocator } from './context.js';

/** Largest buffer the platform can represent. */
export const MAX_BUFFER_LENGTH = constants.MAX_LENGTH;

const utf8Decoder = new TextDecoder('utf-8', { ignoreBOM: true });

export class PrintBuffer {
  private storage: Uint8Array;
  offset = 0;

  private constructor(
    storage: Uint8Array,
    readonly growable: boolean,
    private readonly allocator: Allocator
  ) {
    this.storage = storage;
  }

  /** Growable buffer with `initialSize` bytes; null if the allocator refuses. */
  static growable(initialSize: number, allocator: Allocator = heapAllocator): PrintBuffer | null {
    if (initialSize < 0 || initialSize > MAX_BUFFER_LENGTH) return null;
    const storage = allocator.allocateBytes(initialSize);
    if (storage === null) return null;
    return new PrintBuffer(storage, true, allocator);
  }

  /** Fixed buffer over caller storage; never writes outside `target`. */
  static fixed(target: Uint8Array): PrintBuffer {
    return new PrintBuffer(target, false, heapAllocator);
  }

  get bytes(): Uint8Array {
    return this.storage;
  }

  get capacity(): number {
    return this.storage.length;
  }

  /**
   * Make room for `needed` bytes at the current offset. Returns the write
   * position, or null when the buffer is fixed and full, the size is beyond
   * the platform limit, or the allocator refuses.
   */
  ensure(needed: number): number | null {
    if (needed > MAX_BUFFER_LENGTH) return null;
    const required = this.offset + needed;
    if (required <= this.storage.length) return this.offset;
    if (!this.growable) return null;

    let nextSize = required * 2;
    if (nextSize > MAX_BUFFER_LENGTH) {
      if (required > MAX_BUFFER_LENGTH) return null;
      nextSize = MAX_BUFFER_LENGTH;
    }
    const next = this.allocator.allocateBytes(nextSize);
    if (next === null) return null;
    next.set(this.storage.subarray(0, Math.min(this.offset + 1, this.storage.length)));
    this.storage = next;
    return this.offset;
  }

  /** Write one byte at `at`; returns the next position. */
  put(at: number, byte: number): number {
    this.storage[at] = byte;
    return at + 1;
  }

  putBytes(at: number, bytes: Uint8Array): number {
    this.storage.set(bytes, at);
    return at + bytes.length;
  }

  /** Write ASCII text at `at`; returns the next position. */
  putAscii(at: number, text: string): number {
    for (let i = 0; i < text.length; i++) this.storage[at + i] = text.charCodeAt(i);
    return at + text.length;
  }

  /**
   * Re-derive the end of content by scanning forward from the tracked offset
   * to the terminator, after writes that did not advance the offset.
   */
  recomputeOffset(): number {
    let end = this.offset;
    while (end < this.storage.length && this.storage[end] !== 0) end++;
    this.offset = end;
    return end;
  }

  /** Content before the offset, decoded as UTF-8. */
  toString(): string {
    return utf8Decoder.decode(this.storage.subarray(0, this.offset));
  }
}
