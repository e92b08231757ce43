/**
 * Plain JSON form of syntax trees
 *
 * Object properties are written as an array of `{ key, value }` pairs, never
 * as a JSON object, so their order and duplicate keys survive a round trip.
 */

import type { Logger } from '@stackl/logger';
import { z } from 'zod';
import type { SyntaxNode } from './ast';
import { SyntaxDecodeError, SyntaxLimitError, SyntaxModelError, SyntaxStructureError } from './errors';
import { resolveLimits, type TreeLimits } from './limits';
import {
  arrayNode,
  objectNode,
  quoteNode,
  requireSymbol,
  stringNode,
  symbolNode,
  wordNode,
} from './nodes';
import { createPosition, type Position } from './position';
import { validateTree } from './validate';

export interface PositionJSON {
  file: string;
  line: number;
  column: number;
}

export interface SymbolNodeJSON {
  kind: 'symbol';
  position: PositionJSON;
  id: string;
}

export type SyntaxNodeJSON =
  | { kind: 'array'; position: PositionJSON; elements: SyntaxNodeJSON[] }
  | { kind: 'object'; position: PositionJSON; properties: { key: string; value: SyntaxNodeJSON }[] }
  | { kind: 'quote'; position: PositionJSON; children: SyntaxNodeJSON[] }
  | { kind: 'string'; position: PositionJSON; value: string }
  | SymbolNodeJSON
  | { kind: 'word'; position: PositionJSON; symbol: SymbolNodeJSON };

/**
 * Shape accepted by the decoder. A word's name may be any node here so that
 * the builders report it as a structural error rather than a shape error.
 */
type SyntaxNodeInput =
  | { kind: 'array'; position: PositionJSON; elements: SyntaxNodeInput[] }
  | { kind: 'object'; position: PositionJSON; properties: { key: string; value: SyntaxNodeInput }[] }
  | { kind: 'quote'; position: PositionJSON; children: SyntaxNodeInput[] }
  | { kind: 'string'; position: PositionJSON; value: string }
  | { kind: 'symbol'; position: PositionJSON; id: string }
  | { kind: 'word'; position: PositionJSON; symbol: SyntaxNodeInput };

const positionSchema = z.object({
  file: z.string(),
  line: z.number().int(),
  column: z.number().int(),
});

const nodeSchema: z.ZodType<SyntaxNodeInput> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('array'), position: positionSchema, elements: z.array(nodeSchema) }),
    z.object({
      kind: z.literal('object'),
      position: positionSchema,
      properties: z.array(z.object({ key: z.string(), value: nodeSchema })),
    }),
    z.object({ kind: z.literal('quote'), position: positionSchema, children: z.array(nodeSchema) }),
    z.object({ kind: z.literal('string'), position: positionSchema, value: z.string() }),
    z.object({ kind: z.literal('symbol'), position: positionSchema, id: z.string() }),
    z.object({ kind: z.literal('word'), position: positionSchema, symbol: nodeSchema }),
  ])
);

export interface DecodeOptions {
  /** Override default limits (set to Infinity to disable) */
  limits?: Partial<TreeLimits>;
  /** Receives `syntax_decoded` and `syntax_decode_rejected` events */
  logger?: Logger;
}

function positionToJSON(position: Position): PositionJSON {
  return { file: position.file, line: position.line, column: position.column };
}

interface EncodeFrame {
  node: SyntaxNode;
  emit: (json: SyntaxNodeJSON) => void;
}

function pushInOrder(
  stack: EncodeFrame[],
  nodes: readonly SyntaxNode[],
  emit: (json: SyntaxNodeJSON) => void
): void {
  for (let i = nodes.length - 1; i >= 0; i--) {
    stack.push({ node: nodes[i], emit });
  }
}

/**
 * Convert a tree to its plain JSON form. Works on an explicit stack, so any
 * tree the builders accept can be converted.
 */
export function toJSON(root: SyntaxNode): SyntaxNodeJSON {
  const converted: SyntaxNodeJSON[] = [];
  const stack: EncodeFrame[] = [{ node: root, emit: (json) => converted.push(json) }];

  for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
    const { node, emit } = frame;
    const position = positionToJSON(node.position);
    switch (node.kind) {
      case 'array': {
        const elements: SyntaxNodeJSON[] = [];
        emit({ kind: 'array', position, elements });
        pushInOrder(stack, node.elements, (json) => elements.push(json));
        break;
      }
      case 'object': {
        const properties: { key: string; value: SyntaxNodeJSON }[] = [];
        emit({ kind: 'object', position, properties });
        for (let i = node.properties.length - 1; i >= 0; i--) {
          const { key, value } = node.properties[i];
          stack.push({ node: value, emit: (json) => properties.push({ key, value: json }) });
        }
        break;
      }
      case 'quote': {
        const children: SyntaxNodeJSON[] = [];
        emit({ kind: 'quote', position, children });
        pushInOrder(stack, node.children, (json) => children.push(json));
        break;
      }
      case 'string':
        emit({ kind: 'string', position, value: node.value });
        break;
      case 'symbol':
        emit({ kind: 'symbol', position, id: node.id });
        break;
      case 'word':
        emit({
          kind: 'word',
          position,
          symbol: {
            kind: 'symbol',
            position: positionToJSON(node.symbol.position),
            id: node.symbol.id,
          },
        });
        break;
    }
  }

  return converted[0];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function listOf(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Nested values the schema will recurse into for this record's kind. Fields
 * that do not belong to the kind are stripped by the schema and not counted.
 */
function rawChildren(value: Record<string, unknown>): unknown[] {
  switch (value.kind) {
    case 'array':
      return listOf(value.elements);
    case 'quote':
      return listOf(value.children);
    case 'object':
      return listOf(value.properties).map((property) =>
        isRecord(property) ? property.value : undefined
      );
    case 'word':
      return [value.symbol];
    default:
      return [];
  }
}

/**
 * Bound depth and size of untrusted input before the schema recurses into it,
 * and reject cyclic objects.
 */
function guardInput(input: unknown, limits: TreeLimits): void {
  const stack: { value: unknown; depth: number; exit: boolean }[] = [
    { value: input, depth: 1, exit: false },
  ];
  const onPath = new Set<object>();
  let nodes = 0;

  for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
    const { value } = frame;
    if (!isRecord(value)) continue;
    if (frame.exit) {
      onPath.delete(value);
      continue;
    }
    if (onPath.has(value)) {
      throw new SyntaxStructureError('CYCLE', 'Input contains a cycle');
    }

    nodes++;
    if (nodes > limits.maxNodes) {
      throw new SyntaxLimitError(
        'MAX_NODES',
        `Tree exceeds maximum of ${limits.maxNodes} nodes`,
        limits.maxNodes,
        nodes
      );
    }
    if (frame.depth > limits.maxDepth) {
      throw new SyntaxLimitError(
        'MAX_DEPTH',
        `Tree exceeds maximum depth of ${limits.maxDepth}`,
        limits.maxDepth,
        frame.depth
      );
    }

    onPath.add(value);
    stack.push({ value, depth: frame.depth, exit: true });
    for (const child of rawChildren(value)) {
      stack.push({ value: child, depth: frame.depth + 1, exit: false });
    }
  }
}

function build(input: SyntaxNodeInput): SyntaxNode {
  const { file, line, column } = input.position;
  const position = createPosition(line, column, file);
  switch (input.kind) {
    case 'array':
      return arrayNode(position, input.elements.map((element) => build(element)));
    case 'object':
      return objectNode(
        position,
        input.properties.map((property) => ({ key: property.key, value: build(property.value) }))
      );
    case 'quote':
      return quoteNode(position, input.children.map((child) => build(child)));
    case 'string':
      return stringNode(position, input.value);
    case 'symbol':
      return symbolNode(position, input.id);
    case 'word':
      return wordNode(position, requireSymbol(build(input.symbol), position));
  }
}

/**
 * Rebuild a tree from its plain JSON form
 *
 * @throws {SyntaxDecodeError} INVALID_SHAPE if the input is not a syntax tree
 * @throws {SyntaxStructureError} If a word's name is not a symbol or the input is cyclic
 * @throws {SyntaxLimitError} If the input exceeds a limit
 */
export function fromJSON(input: unknown, options: DecodeOptions = {}): SyntaxNode {
  const { logger } = options;
  const limits = resolveLimits(options.limits);

  try {
    guardInput(input, limits);

    const result = nodeSchema.safeParse(input);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      const first = issues[0];
      const where = first.path ? ` at ${first.path}` : '';
      throw new SyntaxDecodeError('INVALID_SHAPE', `Invalid syntax tree${where}: ${first.message}`, issues);
    }

    const root = build(result.data);
    const stats = validateTree(root, limits);
    logger?.debug('syntax_decoded', { nodes: stats.nodes, depth: stats.depth });
    return root;
  } catch (error) {
    if (error instanceof SyntaxModelError) {
      logger?.warn('syntax_decode_rejected', { code: error.code, message: error.message });
    }
    throw error;
  }
}

/**
 * Serialize a tree to JSON text
 *
 * Any tree can be written, but `parseSyntaxTree` applies the default limits
 * when reading it back: text for a tree deeper than `DEFAULT_LIMITS.maxDepth`
 * or larger than `DEFAULT_LIMITS.maxNodes` only decodes with raised limits.
 */
export function stringifySyntaxTree(node: SyntaxNode, space?: number): string {
  return JSON.stringify(toJSON(node), null, space);
}

/**
 * Parse JSON text produced by `stringifySyntaxTree`
 *
 * @throws {SyntaxDecodeError} INVALID_JSON if the text is not valid JSON
 */
export function parseSyntaxTree(text: string, options: DecodeOptions = {}): SyntaxNode {
  let input: unknown;
  try {
    input = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    const decodeError = new SyntaxDecodeError('INVALID_JSON', `Invalid JSON: ${reason}`);
    options.logger?.warn('syntax_decode_rejected', {
      code: decodeError.code,
      message: decodeError.message,
    });
    throw decodeError;
  }
  return fromJSON(input, options);
}
