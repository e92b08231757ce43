/**
 * Node builders
 *
 * The parser builds trees bottom-up: leaves first, then composites over
 * already built children. Every builder returns a frozen node. Sequences are
 * copied before freezing so the caller may keep reusing its own array; the
 * child nodes themselves are kept by identity. A frozen position is kept as
 * given, any other is copied into a frozen one.
 */

import type {
  ArrayNode,
  ObjectNode,
  ObjectProperty,
  QuoteNode,
  StringNode,
  SymbolNode,
  SyntaxNode,
  WordNode,
} from './ast';
import { SyntaxStructureError } from './errors';
import { isSyntaxNode } from './guards';
import { createPosition, type Position } from './position';

function requirePosition(position: Position | null | undefined, kind: string): Position {
  if (position === null || position === undefined) {
    throw new SyntaxStructureError('MISSING_POSITION', `Cannot build ${kind} node without a position`);
  }
  if (Object.isFrozen(position)) {
    return position;
  }
  return createPosition(position.line, position.column, position.file);
}

function requirePayload<T>(payload: T | null | undefined, what: string, position: Position): T {
  if (payload === null || payload === undefined) {
    throw new SyntaxStructureError('MISSING_PAYLOAD', `Missing ${what}`, position);
  }
  return payload;
}

function freezeNodes(
  nodes: readonly SyntaxNode[] | null | undefined,
  what: string,
  position: Position
): readonly SyntaxNode[] {
  const copy = [...requirePayload(nodes, what, position)];
  copy.forEach((node, index) => requirePayload(node, `${what}[${index}]`, position));
  return Object.freeze(copy);
}

/**
 * Check that a word's name is a symbol node
 *
 * @throws {SyntaxStructureError} WORD_REQUIRES_SYMBOL otherwise
 */
export function requireSymbol(value: unknown, position: Position): SymbolNode {
  if (isSyntaxNode(value) && value.kind === 'symbol') {
    return value;
  }
  const found = isSyntaxNode(value) ? `${value.kind} node` : typeof value;
  throw new SyntaxStructureError(
    'WORD_REQUIRES_SYMBOL',
    `Word definition requires a symbol node as its name, got ${found}`,
    position
  );
}

export function arrayNode(position: Position, elements: readonly SyntaxNode[]): ArrayNode {
  const at = requirePosition(position, 'array');
  const node: ArrayNode = {
    kind: 'array',
    position: at,
    elements: freezeNodes(elements, 'array elements', at),
  };
  return Object.freeze(node);
}

/**
 * Build an object literal. Pairs keep their order and duplicate keys are kept.
 */
export function objectNode(position: Position, properties: readonly ObjectProperty[]): ObjectNode {
  const at = requirePosition(position, 'object');
  const pairs = requirePayload(properties, 'object properties', at).map((property, index) => {
    const pair = requirePayload(property, `object properties[${index}]`, at);
    const entry: ObjectProperty = {
      key: requirePayload(pair.key, `key of object properties[${index}]`, at),
      value: requirePayload(pair.value, `value of object properties[${index}]`, at),
    };
    return Object.freeze(entry);
  });
  const node: ObjectNode = {
    kind: 'object',
    position: at,
    properties: Object.freeze(pairs),
  };
  return Object.freeze(node);
}

export function quoteNode(position: Position, children: readonly SyntaxNode[]): QuoteNode {
  const at = requirePosition(position, 'quote');
  const node: QuoteNode = {
    kind: 'quote',
    position: at,
    children: freezeNodes(children, 'quote children', at),
  };
  return Object.freeze(node);
}

export function stringNode(position: Position, value: string): StringNode {
  const at = requirePosition(position, 'string');
  const node: StringNode = {
    kind: 'string',
    position: at,
    value: requirePayload(value, 'string value', at),
  };
  return Object.freeze(node);
}

export function symbolNode(position: Position, id: string): SymbolNode {
  const at = requirePosition(position, 'symbol');
  const node: SymbolNode = {
    kind: 'symbol',
    position: at,
    id: requirePayload(id, 'symbol id', at),
  };
  return Object.freeze(node);
}

/**
 * Build a word definition. The name must be a symbol node; the type rules out
 * anything else and the check below catches untyped callers.
 */
export function wordNode(position: Position, symbol: SymbolNode): WordNode {
  const at = requirePosition(position, 'word');
  const node: WordNode = {
    kind: 'word',
    position: at,
    symbol: requireSymbol(requirePayload(symbol, 'word name', at), at),
  };
  return Object.freeze(node);
}
