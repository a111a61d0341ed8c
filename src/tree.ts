/**
 * Sibling-list primitives and the index/key helpers built on them.
 *
 * Nodes handed to an add/insert/replace helper must be standalone (no
 * parent, `prev` and `next` null); detach helpers return nodes in that state.
 */

import type { ArrayNode, ContainerNode, JsonNode, ObjectNode } from './ast.js';
import { isContainer, referenceNode, resolve, siblings } from './ast.js';
import type { Allocator } from './context.js';
import { heapAllocator } from './context.js';

/**
 * Release `node`, every sibling after it, and everything they own. References
 * are released without touching their targets.
 */
export function deleteNode(node: JsonNode | null, allocator: Allocator = heapAllocator): void {
  let c = node;
  while (c !== null) {
    const next = c.next;
    if (isContainer(c) && c.child !== null) {
      deleteNode(c.child, allocator);
      c.child = null;
    }
    c.next = null;
    c.prev = null;
    allocator.release(c);
    c = next;
  }
}

/** Accumulates a sibling chain in order; used while a container is being built. */
export class SiblingChain {
  head: JsonNode | null = null;
  private tail: JsonNode | null = null;

  push(node: JsonNode): void {
    if (this.tail === null) {
      this.head = node;
    } else {
      linkAfter(this.tail, node);
    }
    this.tail = node;
  }

  /** Release everything collected so far. */
  release(allocator: Allocator): void {
    deleteNode(this.head, allocator);
    this.head = null;
    this.tail = null;
  }
}

export function linkAfter(prev: JsonNode, item: JsonNode): void {
  prev.next = item;
  item.prev = prev;
}

function lastChild(parent: ContainerNode): JsonNode | null {
  let last: JsonNode | null = null;
  for (let c = parent.child; c !== null; c = c.next) last = c;
  return last;
}

/** Append `item` as the last child of `parent`. */
export function appendChild(parent: ContainerNode, item: JsonNode): void {
  const last = lastChild(parent);
  if (last === null) {
    parent.child = item;
  } else {
    linkAfter(last, item);
  }
}

/** Splice `item` in front of `ref`, a child of `parent`. */
export function insertBefore(parent: ContainerNode, ref: JsonNode, item: JsonNode): void {
  item.next = ref;
  item.prev = ref.prev;
  ref.prev = item;
  if (parent.child === ref) {
    parent.child = item;
  } else if (item.prev !== null) {
    item.prev.next = item;
  }
}

/** Unlink `item` from `parent` and clear its links. */
export function unlinkChild(parent: ContainerNode, item: JsonNode): JsonNode {
  if (item.prev !== null) item.prev.next = item.next;
  if (item.next !== null) item.next.prev = item.prev;
  if (parent.child === item) parent.child = item.next;
  item.prev = null;
  item.next = null;
  return item;
}

/** Put `item` where `old` was and return `old`, unlinked. */
export function replaceChild(parent: ContainerNode, old: JsonNode, item: JsonNode): JsonNode {
  item.next = old.next;
  item.prev = old.prev;
  if (item.next !== null) item.next.prev = item;
  if (parent.child === old) {
    parent.child = item;
  } else if (item.prev !== null) {
    item.prev.next = item;
  }
  old.next = null;
  old.prev = null;
  return old;
}

/** ASCII case-insensitive equality. */
function sameKey(a: string | null, b: string): boolean {
  if (a === null || a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    let x = a.charCodeAt(i);
    let y = b.charCodeAt(i);
    if (x >= 0x41 && x <= 0x5a) x += 0x20;
    if (y >= 0x41 && y <= 0x5a) y += 0x20;
    if (x !== y) return false;
  }
  return true;
}

function childAt(parent: ContainerNode, index: number): JsonNode | null {
  if (index < 0) return null;
  let c = parent.child;
  for (let i = index; c !== null && i > 0; i--) c = c.next;
  return c;
}

function memberNamed(parent: ContainerNode, key: string): JsonNode | null {
  for (const c of siblings(parent.child)) {
    if (sameKey(c.key, key)) return c;
  }
  return null;
}

export function getArraySize(node: JsonNode): number {
  const v = resolve(node);
  if (!isContainer(v)) return 0;
  let n = 0;
  for (let c = v.child; c !== null; c = c.next) n++;
  return n;
}

/** Child at `index`, or null when out of range or `node` is not a container. */
export function getArrayItem(node: JsonNode, index: number): JsonNode | null {
  const v = resolve(node);
  return isContainer(v) ? childAt(v, index) : null;
}

/** First member whose key matches `key`, ignoring ASCII case. */
export function getObjectItem(node: JsonNode, key: string): JsonNode | null {
  const v = resolve(node);
  return isContainer(v) ? memberNamed(v, key) : null;
}

export function hasObjectItem(node: JsonNode, key: string): boolean {
  return getObjectItem(node, key) !== null;
}

export function addItemToArray(array: ArrayNode, item: JsonNode): void {
  item.key = null;
  item.keyOwnership = 'owned';
  appendChild(array, item);
}

/** Add `item` under a key the tree owns. */
export function addItemToObject(object: ObjectNode, key: string, item: JsonNode): void {
  item.key = key;
  item.keyOwnership = 'owned';
  appendChild(object, item);
}

/** Add `item` under a caller-owned constant key; duplicates share it. */
export function addItemToObjectCS(object: ObjectNode, key: string, item: JsonNode): void {
  item.key = key;
  item.keyOwnership = 'borrowed';
  appendChild(object, item);
}

/** Append a borrowing reference to `item`. False if the allocator refuses. */
export function addItemReferenceToArray(
  array: ArrayNode,
  item: JsonNode,
  allocator: Allocator = heapAllocator
): boolean {
  const ref = allocator.allocate(referenceNode(item));
  if (ref === null) return false;
  addItemToArray(array, ref);
  return true;
}

export function addItemReferenceToObject(
  object: ObjectNode,
  key: string,
  item: JsonNode,
  allocator: Allocator = heapAllocator
): boolean {
  const ref = allocator.allocate(referenceNode(item));
  if (ref === null) return false;
  addItemToObject(object, key, ref);
  return true;
}

/** Detach the child at `index`; null when there is none. */
export function detachItemFromArray(container: ContainerNode, index: number): JsonNode | null {
  const c = childAt(container, index);
  return c === null ? null : unlinkChild(container, c);
}

export function deleteItemFromArray(
  container: ContainerNode,
  index: number,
  allocator: Allocator = heapAllocator
): void {
  deleteNode(detachItemFromArray(container, index), allocator);
}

export function detachItemFromObject(object: ObjectNode, key: string): JsonNode | null {
  const c = memberNamed(object, key);
  return c === null ? null : unlinkChild(object, c);
}

export function deleteItemFromObject(
  object: ObjectNode,
  key: string,
  allocator: Allocator = heapAllocator
): void {
  deleteNode(detachItemFromObject(object, key), allocator);
}

/**
 * Insert `item` before the element at `index`, or append it when `index` is
 * past the end. Negative indexes insert nothing and return false.
 */
export function insertItemInArray(array: ArrayNode, index: number, item: JsonNode): boolean {
  if (index < 0) return false;
  item.key = null;
  item.keyOwnership = 'owned';
  const c = childAt(array, index);
  if (c === null) {
    appendChild(array, item);
  } else {
    insertBefore(array, c, item);
  }
  return true;
}

/** Replace the element at `index` and release the old one. */
export function replaceItemInArray(
  array: ArrayNode,
  index: number,
  item: JsonNode,
  allocator: Allocator = heapAllocator
): boolean {
  const c = childAt(array, index);
  if (c === null) return false;
  item.key = null;
  item.keyOwnership = 'owned';
  deleteNode(replaceChild(array, c, item), allocator);
  return true;
}

/** Replace the member matching `key`; the new member owns `key` as given. */
export function replaceItemInObject(
  object: ObjectNode,
  key: string,
  item: JsonNode,
  allocator: Allocator = heapAllocator
): boolean {
  const c = memberNamed(object, key);
  if (c === null) return false;
  item.key = key;
  item.keyOwnership = 'owned';
  deleteNode(replaceChild(object, c, item), allocator);
  return true;
}
