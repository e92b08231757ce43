import type { ObjectProperty, SyntaxNode } from './ast';
import type { Position } from './position';

export interface EqualityOptions {
  /** Also require equal positions (default false) */
  comparePositions?: boolean;
}

function positionsEqual(a: Position, b: Position): boolean {
  return a.file === b.file && a.line === b.line && a.column === b.column;
}

type Pair = [SyntaxNode, SyntaxNode];

function pushSequences(stack: Pair[], a: readonly SyntaxNode[], b: readonly SyntaxNode[]): boolean {
  if (a.length !== b.length) return false;
  a.forEach((node, i) => stack.push([node, b[i]]));
  return true;
}

function pushProperties(
  stack: Pair[],
  a: readonly ObjectProperty[],
  b: readonly ObjectProperty[]
): boolean {
  if (a.length !== b.length) return false;
  if (!a.every((property, i) => property.key === b[i].key)) return false;
  a.forEach((property, i) => stack.push([property.value, b[i].value]));
  return true;
}

function pairEqual(stack: Pair[], a: SyntaxNode, b: SyntaxNode): boolean {
  switch (a.kind) {
    case 'array':
      return b.kind === 'array' && pushSequences(stack, a.elements, b.elements);
    case 'quote':
      return b.kind === 'quote' && pushSequences(stack, a.children, b.children);
    case 'object':
      return b.kind === 'object' && pushProperties(stack, a.properties, b.properties);
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'symbol':
      return b.kind === 'symbol' && a.id === b.id;
    case 'word':
      if (b.kind !== 'word') return false;
      stack.push([a.symbol, b.symbol]);
      return true;
  }
}

/**
 * Compare two trees by kind and payload, in order. Object properties are
 * compared pair by pair, so duplicate keys and their order matter.
 */
export function structurallyEqual(
  a: SyntaxNode,
  b: SyntaxNode,
  options: EqualityOptions = {}
): boolean {
  const comparePositions = options.comparePositions ?? false;
  const stack: Pair[] = [[a, b]];

  for (let pair = stack.pop(); pair !== undefined; pair = stack.pop()) {
    const [left, right] = pair;
    if (left === right) continue;
    if (comparePositions && !positionsEqual(left.position, right.position)) return false;
    if (!pairEqual(stack, left, right)) return false;
  }
  return true;
}
