import type { SyntaxKind } from './kinds';
import type { Position } from './position';

/**
 * Base interface for all syntax nodes
 */
interface BaseNode {
  /** Variant discriminator, fixed at construction */
  readonly kind: SyntaxKind;
  /** Where the node was found in source code */
  readonly position: Position;
}

/**
 * Array literal: [1 2 3]
 */
export interface ArrayNode extends BaseNode {
  readonly kind: 'array';
  readonly elements: readonly SyntaxNode[];
}

/**
 * Single key/value pair of an object literal
 */
export interface ObjectProperty {
  readonly key: string;
  readonly value: SyntaxNode;
}

/**
 * Object literal: { "key": value, ... }
 *
 * Properties keep insertion order. Duplicate keys are kept as separate pairs;
 * resolving them is up to the evaluator.
 */
export interface ObjectNode extends BaseNode {
  readonly kind: 'object';
  readonly properties: readonly ObjectProperty[];
}

/**
 * Quote literal: ( ... ), a block of code executed later
 */
export interface QuoteNode extends BaseNode {
  readonly kind: 'quote';
  readonly children: readonly SyntaxNode[];
}

/**
 * String literal
 */
export interface StringNode extends BaseNode {
  readonly kind: 'string';
  /** Unescaped text contents */
  readonly value: string;
}

/**
 * Symbol, such as `dup` or `+`
 */
export interface SymbolNode extends BaseNode {
  readonly kind: 'symbol';
  readonly id: string;
}

/**
 * Word definition: : name ... ;
 */
export interface WordNode extends BaseNode {
  readonly kind: 'word';
  /** Name of the word being defined */
  readonly symbol: SymbolNode;
}

/**
 * Union of all syntax node types
 */
export type SyntaxNode = ArrayNode | ObjectNode | QuoteNode | StringNode | SymbolNode | WordNode;

export type CompositeNode = ArrayNode | ObjectNode | QuoteNode;

export type LeafNode = StringNode | SymbolNode;

export type SyntaxNodeOfKind<K extends SyntaxKind> = Extract<SyntaxNode, { kind: K }>;
