/**
 * @stackl/syntax
 *
 * Syntax tree shared by the parser and the evaluator of a small stack-based
 * language. Nodes are immutable once built and may be shared freely between
 * containers and consumers.
 */

export type {
  ArrayNode,
  CompositeNode,
  LeafNode,
  ObjectNode,
  ObjectProperty,
  QuoteNode,
  StringNode,
  SymbolNode,
  SyntaxNode,
  SyntaxNodeOfKind,
  WordNode,
} from './ast';
export {
  fromJSON,
  parseSyntaxTree,
  stringifySyntaxTree,
  toJSON,
  type DecodeOptions,
  type PositionJSON,
  type SymbolNodeJSON,
  type SyntaxNodeJSON,
} from './codec';
export { structurallyEqual, type EqualityOptions } from './equality';
export {
  SyntaxDecodeError,
  SyntaxLimitError,
  SyntaxModelError,
  SyntaxStructureError,
  type DecodeErrorCode,
  type DecodeIssue,
  type LimitErrorCode,
  type StructureErrorCode,
  type SyntaxErrorCode,
} from './errors';
export {
  assertKind,
  isArrayNode,
  isCompositeNode,
  isLeafNode,
  isObjectNode,
  isQuoteNode,
  isStringNode,
  isSymbolNode,
  isSyntaxNode,
  isWordNode,
  matchNode,
  type NodeHandlers,
} from './guards';
export { isSyntaxKind, SYNTAX_KIND_SIGILS, SYNTAX_KINDS, type SyntaxKind } from './kinds';
export { codePointLength, DEFAULT_LIMITS, resolveLimits, type TreeLimits } from './limits';
export {
  arrayNode,
  objectNode,
  quoteNode,
  requireSymbol,
  stringNode,
  symbolNode,
  wordNode,
} from './nodes';
export { createPosition, formatPosition, type Position } from './position';
export { validateTree, type TreeStats } from './validate';
