/**
 * Allocation strategy and error reporting, passed explicitly to every parse
 * and print entry point.
 */

import type { JsonNode } from './ast.js';
import type { CodecFailure } from './errors.js';

export interface Allocator {
  /** Take ownership of a freshly built node, or refuse with null. */
  allocate<T extends JsonNode>(node: T): T | null;
  /** Return a node whose links have already been cleared. */
  release(node: JsonNode): void;
  /** Storage for the print buffer, or null when refused. */
  allocateBytes(size: number): Uint8Array | null;
}

/** Receives every failure of an operation run under the owning context. */
export interface ErrorSink {
  report(failure: CodecFailure): void;
}

export interface CodecContext {
  readonly allocator: Allocator;
  readonly errors?: ErrorSink;
}

class HeapAllocator implements Allocator {
  allocate<T extends JsonNode>(node: T): T {
    return node;
  }

  release(_node: JsonNode): void {}

  allocateBytes(size: number): Uint8Array {
    return new Uint8Array(size);
  }
}

/** Stateless allocator backed by the garbage-collected heap. */
export const heapAllocator = new HeapAllocator();

export interface NodeArenaOptions {
  /** Max live nodes (default unlimited) */
  maxNodes?: number;
  /** Max size of a single byte allocation (default unlimited) */
  maxBufferBytes?: number;
}

/**
 * Allocator that tracks every live node it handed out and refuses once a
 * budget is exhausted.
 */
export class NodeArena implements Allocator {
  private readonly live = new Set<JsonNode>();
  private readonly maxNodes: number;
  private readonly maxBufferBytes: number;
  private bytesAllocated = 0;

  constructor(options: NodeArenaOptions = {}) {
    this.maxNodes = options.maxNodes ?? Number.POSITIVE_INFINITY;
    this.maxBufferBytes = options.maxBufferBytes ?? Number.POSITIVE_INFINITY;
  }

  get liveNodes(): number {
    return this.live.size;
  }

  /** Total bytes handed out by allocateBytes. */
  get totalBytes(): number {
    return this.bytesAllocated;
  }

  owns(node: JsonNode): boolean {
    return this.live.has(node);
  }

  allocate<T extends JsonNode>(node: T): T | null {
    if (this.live.size >= this.maxNodes) return null;
    this.live.add(node);
    return node;
  }

  release(node: JsonNode): void {
    this.live.delete(node);
  }

  allocateBytes(size: number): Uint8Array | null {
    if (size > this.maxBufferBytes) return null;
    this.bytesAllocated += size;
    return new Uint8Array(size);
  }
}

/** Keeps the most recent failure. */
export class LastErrorSink implements ErrorSink {
  lastError: CodecFailure | null = null;

  report(failure: CodecFailure): void {
    this.lastError = failure;
  }

  clear(): void {
    this.lastError = null;
  }
}

export interface ContextOptions {
  allocator?: Allocator;
  errors?: ErrorSink;
}

export function createContext(options: ContextOptions = {}): CodecContext {
  return { allocator: options.allocator ?? heapAllocator, errors: options.errors };
}
