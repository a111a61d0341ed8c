/**
 * Node constructors. Without an allocator they use the heap and always
 * succeed; with one they return null when it refuses.
 */

import type {
  ArrayNode,
  BoolNode,
  JsonNode,
  NullNode,
  NumberNode,
  ObjectNode,
  RawNode,
  ReferenceNode,
  StringNode,
  ValueNode,
} from './ast.js';
import {
  arrayNode,
  boolNode,
  isContainer,
  nullNode,
  numberNode,
  objectNode,
  rawNode,
  referenceNode,
  resolve,
  saturateInt,
  siblings,
  stringNode,
} from './ast.js';
import type { Allocator } from './context.js';
import { heapAllocator } from './context.js';
import { deleteNode, SiblingChain } from './tree.js';

export function createNull(): NullNode;
export function createNull(allocator: Allocator): NullNode | null;
export function createNull(allocator: Allocator = heapAllocator): NullNode | null {
  return allocator.allocate(nullNode());
}

export function createTrue(): BoolNode;
export function createTrue(allocator: Allocator): BoolNode | null;
export function createTrue(allocator: Allocator = heapAllocator): BoolNode | null {
  return allocator.allocate(boolNode(true));
}

export function createFalse(): BoolNode;
export function createFalse(allocator: Allocator): BoolNode | null;
export function createFalse(allocator: Allocator = heapAllocator): BoolNode | null {
  return allocator.allocate(boolNode(false));
}

export function createBool(value: boolean): BoolNode;
export function createBool(value: boolean, allocator: Allocator): BoolNode | null;
export function createBool(value: boolean, allocator: Allocator = heapAllocator): BoolNode | null {
  return allocator.allocate(boolNode(value));
}

export function createNumber(value: number): NumberNode;
export function createNumber(value: number, allocator: Allocator): NumberNode | null;
export function createNumber(value: number, allocator: Allocator = heapAllocator): NumberNode | null {
  return allocator.allocate(numberNode(value));
}

export function createString(value: string): StringNode;
export function createString(value: string, allocator: Allocator): StringNode | null;
export function createString(value: string, allocator: Allocator = heapAllocator): StringNode | null {
  return allocator.allocate(stringNode(value));
}

/** A fragment printed verbatim; the caller vouches that it is valid JSON. */
export function createRaw(json: string): RawNode;
export function createRaw(json: string, allocator: Allocator): RawNode | null;
export function createRaw(json: string, allocator: Allocator = heapAllocator): RawNode | null {
  return allocator.allocate(rawNode(json));
}

export function createArray(): ArrayNode;
export function createArray(allocator: Allocator): ArrayNode | null;
export function createArray(allocator: Allocator = heapAllocator): ArrayNode | null {
  return allocator.allocate(arrayNode());
}

export function createObject(): ObjectNode;
export function createObject(allocator: Allocator): ObjectNode | null;
export function createObject(allocator: Allocator = heapAllocator): ObjectNode | null {
  return allocator.allocate(objectNode());
}

/** Borrowing view of `target`; a reference to a reference borrows the final target. */
export function createReference(target: JsonNode): ReferenceNode;
export function createReference(target: JsonNode, allocator: Allocator): ReferenceNode | null;
export function createReference(target: JsonNode, allocator: Allocator = heapAllocator): ReferenceNode | null {
  return allocator.allocate(referenceNode(target));
}

/** Set a number and keep its integer mirror in step. */
export function setNumber(node: NumberNode, value: number): number {
  node.int = saturateInt(value);
  node.value = value;
  return value;
}

function buildArray<V>(
  values: ArrayLike<V>,
  make: (value: V) => JsonNode,
  allocator: Allocator
): ArrayNode | null {
  const chain = new SiblingChain();
  for (const value of Array.from(values)) {
    const node = allocator.allocate(make(value));
    if (node === null) {
      chain.release(allocator);
      return null;
    }
    chain.push(node);
  }
  const array = allocator.allocate(arrayNode(chain.head));
  if (array === null) chain.release(allocator);
  return array;
}

/** Array of numbers saturated to 32-bit integers. */
export function createIntArray(numbers: ArrayLike<number>): ArrayNode;
export function createIntArray(numbers: ArrayLike<number>, allocator: Allocator): ArrayNode | null;
export function createIntArray(numbers: ArrayLike<number>, allocator: Allocator = heapAllocator): ArrayNode | null {
  return buildArray(numbers, (n) => numberNode(saturateInt(n)), allocator);
}

/** Array of numbers rounded to single precision. */
export function createFloatArray(numbers: ArrayLike<number>): ArrayNode;
export function createFloatArray(numbers: ArrayLike<number>, allocator: Allocator): ArrayNode | null;
export function createFloatArray(numbers: ArrayLike<number>, allocator: Allocator = heapAllocator): ArrayNode | null {
  return buildArray(numbers, (n) => numberNode(Math.fround(n)), allocator);
}

export function createDoubleArray(numbers: ArrayLike<number>): ArrayNode;
export function createDoubleArray(numbers: ArrayLike<number>, allocator: Allocator): ArrayNode | null;
export function createDoubleArray(numbers: ArrayLike<number>, allocator: Allocator = heapAllocator): ArrayNode | null {
  return buildArray(numbers, numberNode, allocator);
}

export function createStringArray(strings: ArrayLike<string>): ArrayNode;
export function createStringArray(strings: ArrayLike<string>, allocator: Allocator): ArrayNode | null;
export function createStringArray(strings: ArrayLike<string>, allocator: Allocator = heapAllocator): ArrayNode | null {
  return buildArray(strings, stringNode, allocator);
}

function copyPayload(source: ValueNode): ValueNode {
  switch (source.kind) {
    case 'null':
      return nullNode();
    case 'bool':
      return boolNode(source.value);
    case 'number': {
      const n = numberNode(source.value);
      n.int = source.int;
      return n;
    }
    case 'string':
      return stringNode(source.value);
    case 'raw':
      return rawNode(source.value);
    case 'array':
      return arrayNode();
    case 'object':
      return objectNode();
  }
}

/**
 * Copy a node with its key. A borrowed key stays borrowed; a reference is
 * copied as an owned value. Containers copy their children only when
 * `recurse` is set.
 */
export function duplicate(item: JsonNode, recurse: boolean): ValueNode;
export function duplicate(item: JsonNode, recurse: boolean, allocator: Allocator): ValueNode | null;
export function duplicate(item: JsonNode, recurse: boolean, allocator: Allocator = heapAllocator): ValueNode | null {
  const source = resolve(item);
  const copy = allocator.allocate(copyPayload(source));
  if (copy === null) return null;
  copy.key = item.key;
  copy.keyOwnership = item.keyOwnership;
  if (!recurse || !isContainer(source) || !isContainer(copy)) return copy;

  const chain = new SiblingChain();
  for (const child of siblings(source.child)) {
    const dup = duplicate(child, true, allocator);
    if (dup === null) {
      chain.release(allocator);
      deleteNode(copy, allocator);
      return null;
    }
    chain.push(dup);
  }
  copy.child = chain.head;
  return copy;
}
