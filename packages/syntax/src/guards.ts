import type {
  ArrayNode,
  CompositeNode,
  LeafNode,
  ObjectNode,
  QuoteNode,
  StringNode,
  SymbolNode,
  SyntaxNode,
  SyntaxNodeOfKind,
  WordNode,
} from './ast';
import { SyntaxStructureError } from './errors';
import { isSyntaxKind, type SyntaxKind } from './kinds';

export function isArrayNode(node: SyntaxNode): node is ArrayNode {
  return node.kind === 'array';
}

export function isObjectNode(node: SyntaxNode): node is ObjectNode {
  return node.kind === 'object';
}

export function isQuoteNode(node: SyntaxNode): node is QuoteNode {
  return node.kind === 'quote';
}

export function isStringNode(node: SyntaxNode): node is StringNode {
  return node.kind === 'string';
}

export function isSymbolNode(node: SyntaxNode): node is SymbolNode {
  return node.kind === 'symbol';
}

export function isWordNode(node: SyntaxNode): node is WordNode {
  return node.kind === 'word';
}

/**
 * Array, object and quote nodes contain other nodes
 */
export function isCompositeNode(node: SyntaxNode): node is CompositeNode {
  return node.kind === 'array' || node.kind === 'object' || node.kind === 'quote';
}

export function isLeafNode(node: SyntaxNode): node is LeafNode {
  return node.kind === 'string' || node.kind === 'symbol';
}

/**
 * Shallow check for values coming from outside the type checker: an object
 * with a known kind and a position object. Payloads are not inspected.
 */
export function isSyntaxNode(value: unknown): value is SyntaxNode {
  if (typeof value !== 'object' || value === null) return false;
  if (!('kind' in value) || !('position' in value)) return false;
  return isSyntaxKind(value.kind) && typeof value.position === 'object' && value.position !== null;
}

const KIND_GUARDS: { [K in SyntaxKind]: (node: SyntaxNode) => node is SyntaxNodeOfKind<K> } = {
  array: isArrayNode,
  object: isObjectNode,
  quote: isQuoteNode,
  string: isStringNode,
  symbol: isSymbolNode,
  word: isWordNode,
};

/**
 * Narrow a node to the given kind
 *
 * @throws {SyntaxStructureError} UNEXPECTED_KIND when the node is of another kind
 */
export function assertKind<K extends SyntaxKind>(node: SyntaxNode, kind: K): SyntaxNodeOfKind<K> {
  const guard = KIND_GUARDS[kind];
  if (guard(node)) {
    return node;
  }
  throw new SyntaxStructureError(
    'UNEXPECTED_KIND',
    `Expected ${kind} node but found ${node.kind}`,
    node.position
  );
}

/**
 * One handler per node kind
 */
export type NodeHandlers<R> = { [K in SyntaxKind]: (node: SyntaxNodeOfKind<K>) => R };

/**
 * Dispatch on the node kind. Every kind must be handled.
 */
export function matchNode<R>(node: SyntaxNode, handlers: NodeHandlers<R>): R {
  switch (node.kind) {
    case 'array':
      return handlers.array(node);
    case 'object':
      return handlers.object(node);
    case 'quote':
      return handlers.quote(node);
    case 'string':
      return handlers.string(node);
    case 'symbol':
      return handlers.symbol(node);
    case 'word':
      return handlers.word(node);
  }
}
