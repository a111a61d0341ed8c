/**
 * jsonlink node model: a tagged variant per JSON value, linked into
 * sibling lists.
 *
 * A container owns its children through `child` and each child owns its
 * successor through `next`. `prev` is a back link for O(1) splicing and owns
 * nothing.
 */

export interface SourcePosition {
  line: number;
  column: number;
  offset: number;
}

/** Whether a member name was copied into the tree or lent by the caller. */
export type KeyOwnership = 'owned' | 'borrowed';

export interface NodeLinks {
  /** Member name inside an object; null in arrays and at the root. */
  key: string | null;
  keyOwnership: KeyOwnership;
  next: JsonNode | null;
  /** Non-owning. */
  prev: JsonNode | null;
}

export interface NullNode extends NodeLinks {
  readonly kind: 'null';
}

export interface BoolNode extends NodeLinks {
  readonly kind: 'bool';
  value: boolean;
}

export interface NumberNode extends NodeLinks {
  readonly kind: 'number';
  value: number;
  /** `value` saturated to the signed 32-bit range. */
  int: number;
}

export interface StringNode extends NodeLinks {
  readonly kind: 'string';
  value: string;
}

/** Pre-serialized JSON text, printed verbatim. */
export interface RawNode extends NodeLinks {
  readonly kind: 'raw';
  value: string;
}

export interface ArrayNode extends NodeLinks {
  readonly kind: 'array';
  child: JsonNode | null;
}

export interface ObjectNode extends NodeLinks {
  readonly kind: 'object';
  child: JsonNode | null;
}

/**
 * Borrowing view of a node that lives in another tree. Releasing a reference
 * never touches its target.
 */
export interface ReferenceNode extends NodeLinks {
  readonly kind: 'reference';
  readonly target: ValueNode;
}

export type ContainerNode = ArrayNode | ObjectNode;

export type ValueNode =
  | NullNode
  | BoolNode
  | NumberNode
  | StringNode
  | RawNode
  | ArrayNode
  | ObjectNode;

export type JsonNode = ValueNode | ReferenceNode;

export type NodeKind = JsonNode['kind'];

export const INT32_MAX = 2147483647;
export const INT32_MIN = -2147483648;

/** Clamp to the signed 32-bit range, truncating toward zero. NaN maps to 0. */
export function saturateInt(value: number): number {
  if (value >= INT32_MAX) return INT32_MAX;
  if (value <= INT32_MIN) return INT32_MIN;
  if (Number.isNaN(value)) return 0;
  return Math.trunc(value);
}

export function unlinked(): NodeLinks {
  return { key: null, keyOwnership: 'owned', next: null, prev: null };
}

/** Follow a reference to the node it borrows. */
export function resolve(node: JsonNode): ValueNode {
  return node.kind === 'reference' ? node.target : node;
}

/** Integer view of a node: the mirror for numbers, 1 for `true`, else 0. */
export function intValue(node: JsonNode): number {
  const v = resolve(node);
  if (v.kind === 'number') return v.int;
  if (v.kind === 'bool') return v.value ? 1 : 0;
  return 0;
}

export function isContainer(node: JsonNode): node is ContainerNode {
  return node.kind === 'array' || node.kind === 'object';
}

export function isArray(node: JsonNode): node is ArrayNode {
  return node.kind === 'array';
}

export function isObject(node: JsonNode): node is ObjectNode {
  return node.kind === 'object';
}

export function isString(node: JsonNode): node is StringNode {
  return node.kind === 'string';
}

export function isNumber(node: JsonNode): node is NumberNode {
  return node.kind === 'number';
}

export function isBool(node: JsonNode): node is BoolNode {
  return node.kind === 'bool';
}

export function isNull(node: JsonNode): node is NullNode {
  return node.kind === 'null';
}

export function isRaw(node: JsonNode): node is RawNode {
  return node.kind === 'raw';
}

export function isReference(node: JsonNode): node is ReferenceNode {
  return node.kind === 'reference';
}

/** Iterate a sibling chain starting at `head`. */
export function* siblings(head: JsonNode | null): IterableIterator<JsonNode> {
  for (let c = head; c !== null; c = c.next) yield c;
}

/** Children of a node (of its target, for references); empty for scalars. */
export function children(node: JsonNode): IterableIterator<JsonNode> {
  const v = resolve(node);
  return siblings(isContainer(v) ? v.child : null);
}

export function nullNode(): NullNode {
  return { kind: 'null', ...unlinked() };
}

export function boolNode(value: boolean): BoolNode {
  return { kind: 'bool', value, ...unlinked() };
}

export function numberNode(value: number): NumberNode {
  return { kind: 'number', value, int: saturateInt(value), ...unlinked() };
}

export function stringNode(value: string): StringNode {
  return { kind: 'string', value, ...unlinked() };
}

export function rawNode(value: string): RawNode {
  return { kind: 'raw', value, ...unlinked() };
}

export function arrayNode(child: JsonNode | null = null): ArrayNode {
  return { kind: 'array', child, ...unlinked() };
}

export function objectNode(child: JsonNode | null = null): ObjectNode {
  return { kind: 'object', child, ...unlinked() };
}

export function referenceNode(target: JsonNode): ReferenceNode {
  return { kind: 'reference', target: resolve(target), ...unlinked() };
}
