import { describe, expect, it } from 'vitest';
import {
  arrayNode,
  assertKind,
  createPosition,
  objectNode,
  parseSyntaxTree,
  quoteNode,
  stringifySyntaxTree,
  stringNode,
  structurallyEqual,
  SyntaxModelError,
  SyntaxStructureError,
  symbolNode,
  validateTree,
  wordNode,
  type SyntaxNode,
} from '../src/index';

const P1 = createPosition(1, 1);
const P2 = createPosition(1, 3);
const P3 = createPosition(1, 7);

describe('public API', () => {
  it('builds an array of two strings', () => {
    const node = arrayNode(P1, [stringNode(P2, 'a'), stringNode(P3, 'b')]);

    expect(node.kind).toBe('array');
    expect(node.position).toBe(P1);
    expect(node.elements.length).toBe(2);
    expect(assertKind(node.elements[0], 'string').value).toBe('a');
    expect(assertKind(node.elements[1], 'string').value).toBe('b');
  });

  it('builds a quote nested inside an array', () => {
    const node = arrayNode(P1, [quoteNode(P2, [symbolNode(P3, 'dup')])]);

    expect(node.elements[0].kind).toBe('quote');
    expect(assertKind(assertKind(node.elements[0], 'quote').children[0], 'symbol').id).toBe('dup');
  });

  it('builds a word over a symbol and refuses a string', () => {
    expect(wordNode(P1, symbolNode(P2, 'foo')).symbol.id).toBe('foo');

    const name: SyntaxNode = stringNode(P2, 'foo');
    // @ts-expect-error a word's name must be a symbol node
    expect(() => wordNode(P1, name)).toThrow(SyntaxStructureError);
  });

  it('builds an object with a duplicated key', () => {
    const node = objectNode(P1, [
      { key: 'x', value: stringNode(P2, '1') },
      { key: 'x', value: stringNode(P3, '2') },
    ]);

    expect(node.properties.length).toBe(2);
    expect(node.properties.map((p) => [p.key, assertKind(p.value, 'string').value])).toEqual([
      ['x', '1'],
      ['x', '2'],
    ]);
  });

  it('keeps the kind fixed for the life of a node', () => {
    const node = symbolNode(P1, 'drop');
    const kinds = [node.kind];

    validateTree(node);
    stringifySyntaxTree(node);
    kinds.push(node.kind);

    expect(kinds).toEqual(['symbol', 'symbol']);
    expect(node.position).toBe(P1);
  });

  it('shares one error base class', () => {
    expect(() => parseSyntaxTree('[')).toThrow(SyntaxModelError);
  });

  it('round-trips a tree through text', () => {
    const tree = quoteNode(P1, [
      wordNode(P2, symbolNode(P3, 'square')),
      objectNode(P2, [{ key: 'k', value: arrayNode(P3, []) }]),
    ]);

    const copy = parseSyntaxTree(stringifySyntaxTree(tree));

    expect(structurallyEqual(copy, tree, { comparePositions: true })).toBe(true);
    expect(copy).not.toBe(tree);
  });
});
