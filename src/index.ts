export type {
  ArrayNode,
  BoolNode,
  ContainerNode,
  JsonNode,
  KeyOwnership,
  NodeKind,
  NodeLinks,
  NullNode,
  NumberNode,
  ObjectNode,
  RawNode,
  ReferenceNode,
  SourcePosition,
  StringNode,
  ValueNode,
} from './ast.js';
export {
  INT32_MAX,
  INT32_MIN,
  children,
  intValue,
  isArray,
  isBool,
  isContainer,
  isNull,
  isNumber,
  isObject,
  isRaw,
  isReference,
  isString,
  resolve,
  saturateInt,
  siblings,
} from './ast.js';

export type { Allocator, CodecContext, ContextOptions, ErrorSink, NodeArenaOptions } from './context.js';
export { LastErrorSink, NodeArena, createContext, heapAllocator } from './context.js';

export type { CodecFailure, JsonErrorCode, ParseFailure, PrintFailure, Result } from './errors.js';
export { JsonError, JsonParseError, JsonPrintError } from './errors.js';

export { MAX_BUFFER_LENGTH, PrintBuffer } from './buffer.js';
export { formatNumber } from './codec.js';

export type { ParseInput, ParseOptions, ParseResult } from './parser.js';
export { DEFAULT_MAX_DEPTH, parse, tryParse } from './parser.js';

export type { PrintIntoResult, PrintOptions, PrintResult } from './stringify.js';
export {
  DEFAULT_BUFFER_SIZE,
  print,
  printBuffered,
  printInto,
  printUnformatted,
  tryPrint,
} from './stringify.js';

export {
  createArray,
  createBool,
  createDoubleArray,
  createFalse,
  createFloatArray,
  createIntArray,
  createNull,
  createNumber,
  createObject,
  createRaw,
  createReference,
  createString,
  createStringArray,
  createTrue,
  duplicate,
  setNumber,
} from './create.js';

export {
  addItemReferenceToArray,
  addItemReferenceToObject,
  addItemToArray,
  addItemToObject,
  addItemToObjectCS,
  appendChild,
  deleteItemFromArray,
  deleteItemFromObject,
  deleteNode,
  detachItemFromArray,
  detachItemFromObject,
  getArrayItem,
  getArraySize,
  getObjectItem,
  hasObjectItem,
  insertBefore,
  insertItemInArray,
  replaceChild,
  replaceItemInArray,
  replaceItemInObject,
  unlinkChild,
} from './tree.js';

export { minify } from './minify.js';
export { version } from './version.js';
