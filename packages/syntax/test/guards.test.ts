import { describe, expect, it } from 'vitest';
import type { SyntaxNode } from '../src/ast';
import { SyntaxStructureError } from '../src/errors';
import {
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
} from '../src/guards';
import { isSyntaxKind, SYNTAX_KIND_SIGILS, SYNTAX_KINDS } from '../src/kinds';
import { stringNode, symbolNode } from '../src/nodes';
import { createPosition, formatPosition } from '../src/position';
import { at, sampleTree, thrown } from './fixtures';

function render(node: SyntaxNode): string {
  return matchNode(node, {
    array: (array) => `[${array.elements.map(render).join(', ')}]`,
    object: (object) =>
      `{${object.properties.map((p) => `${JSON.stringify(p.key)}: ${render(p.value)}`).join(', ')}}`,
    quote: (quote) => `(${quote.children.map(render).join(' ')})`,
    string: (string) => JSON.stringify(string.value),
    symbol: (symbol) => symbol.id,
    word: (word) => `: ${word.symbol.id} ;`,
  });
}

describe('kinds', () => {
  it('lists the six kinds', () => {
    expect(SYNTAX_KINDS).toEqual(['array', 'object', 'quote', 'string', 'symbol', 'word']);
  });

  it('maps each kind to its sigil', () => {
    expect(SYNTAX_KINDS.map((kind) => SYNTAX_KIND_SIGILS[kind]).join('')).toBe('[{("s:');
  });

  it('recognizes kinds', () => {
    expect(isSyntaxKind('quote')).toBe(true);
    expect(isSyntaxKind('Quote')).toBe(false);
    expect(isSyntaxKind(1)).toBe(false);
  });
});

describe('position', () => {
  it('creates frozen positions', () => {
    const position = createPosition(3, 9, 'lib.stk');

    expect(position).toEqual({ file: 'lib.stk', line: 3, column: 9 });
    expect(Object.isFrozen(position)).toBe(true);
  });

  it('formats named and anonymous positions', () => {
    expect(formatPosition(createPosition(3, 9, 'lib.stk'))).toBe('lib.stk:3:9');
    expect(formatPosition(createPosition(3, 9))).toBe('3:9');
  });
});

describe('guards', () => {
  const tree = sampleTree();
  const [string, quote, object, word] = tree.elements;

  it('narrows each kind', () => {
    expect(isArrayNode(tree)).toBe(true);
    expect(isStringNode(string)).toBe(true);
    expect(isQuoteNode(quote)).toBe(true);
    expect(isObjectNode(object)).toBe(true);
    expect(isWordNode(word)).toBe(true);
    expect(isSymbolNode(string)).toBe(false);
  });

  it('separates composites from leaves', () => {
    expect([tree, string, quote, object, word].map(isCompositeNode)).toEqual([
      true,
      false,
      true,
      true,
      false,
    ]);
    expect([tree, string, quote, object, word].map(isLeafNode)).toEqual([
      false,
      true,
      false,
      false,
      false,
    ]);
  });

  it('recognizes nodes among unknown values', () => {
    expect(isSyntaxNode(string)).toBe(true);
    expect(isSyntaxNode({ kind: 'string', position: at(1), value: 'a' })).toBe(true);
    expect(isSyntaxNode({ kind: 'number', position: at(1) })).toBe(false);
    expect(isSyntaxNode({ kind: 'string' })).toBe(false);
    expect(isSyntaxNode({ kind: 'string', position: null })).toBe(false);
    expect(isSyntaxNode(null)).toBe(false);
    expect(isSyntaxNode('string')).toBe(false);
  });
});

describe('assertKind', () => {
  it('returns the node narrowed to the kind', () => {
    const node: SyntaxNode = symbolNode(at(1), 'dup');

    expect(assertKind(node, 'symbol').id).toBe('dup');
  });

  it('throws for another kind', () => {
    const error = thrown(() => assertKind(stringNode(at(2, 5), 'dup'), 'symbol'));

    expect(error).toBeInstanceOf(SyntaxStructureError);
    expect(error).toMatchObject({
      code: 'UNEXPECTED_KIND',
      message: 'Expected symbol node but found string at main.stk:2:5',
    });
  });
});

describe('matchNode', () => {
  it('dispatches every kind', () => {
    expect(render(sampleTree())).toBe('["a", (dup drop), {"x": "1"}, : foo ;]');
  });
});
