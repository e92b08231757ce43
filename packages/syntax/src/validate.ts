/**
 * Whole-tree checks
 *
 * Trees built through the builders cannot contain cycles, but nodes are plain
 * objects and hand-assembled ones can. The walk uses an explicit stack so deep
 * trees are reported against the limits instead of overflowing.
 */

import type { SyntaxNode } from './ast';
import { SyntaxLimitError, SyntaxStructureError } from './errors';
import type { SyntaxKind } from './kinds';
import { codePointLength, resolveLimits, type TreeLimits } from './limits';

export interface TreeStats {
  /** Nodes visited; a node shared by two parents counts twice */
  nodes: number;
  /** Deepest nesting level, the root being at depth 1 */
  depth: number;
  kinds: Record<SyntaxKind, number>;
}

interface Frame {
  node: SyntaxNode;
  depth: number;
  exit: boolean;
}

function childNodes(node: SyntaxNode): readonly SyntaxNode[] {
  switch (node.kind) {
    case 'array':
      return node.elements;
    case 'quote':
      return node.children;
    case 'object':
      return node.properties.map((property) => property.value);
    case 'word':
      return [node.symbol];
    case 'string':
    case 'symbol':
      return [];
  }
}

function checkString(value: string, what: string, node: SyntaxNode, limits: TreeLimits): void {
  const length = codePointLength(value);
  if (length > limits.maxStringLength) {
    throw new SyntaxLimitError(
      'MAX_STRING_LENGTH',
      `${what} exceeds maximum length of ${limits.maxStringLength} characters`,
      limits.maxStringLength,
      length,
      node.position
    );
  }
}

function checkContainer(size: number, node: SyntaxNode, limits: TreeLimits): void {
  if (size > limits.maxContainerSize) {
    throw new SyntaxLimitError(
      'MAX_CONTAINER_SIZE',
      `${node.kind} literal exceeds maximum size of ${limits.maxContainerSize} entries`,
      limits.maxContainerSize,
      size,
      node.position
    );
  }
}

function checkPayload(node: SyntaxNode, limits: TreeLimits): void {
  switch (node.kind) {
    case 'array':
      checkContainer(node.elements.length, node, limits);
      break;
    case 'quote':
      checkContainer(node.children.length, node, limits);
      break;
    case 'object':
      checkContainer(node.properties.length, node, limits);
      for (const property of node.properties) {
        checkString(property.key, 'Object key', node, limits);
      }
      break;
    case 'string':
      checkString(node.value, 'String literal', node, limits);
      break;
    case 'symbol':
      checkString(node.id, 'Symbol', node, limits);
      break;
    case 'word':
      // The name is checked as a child
      break;
  }
}

/**
 * Check a tree for cycles and against the limits
 *
 * @returns Statistics about the tree
 * @throws {SyntaxStructureError} CYCLE if a node contains itself
 * @throws {SyntaxLimitError} If a limit is exceeded
 */
export function validateTree(root: SyntaxNode, overrides?: Partial<TreeLimits>): TreeStats {
  const limits = resolveLimits(overrides);
  const kinds: Record<SyntaxKind, number> = {
    array: 0,
    object: 0,
    quote: 0,
    string: 0,
    symbol: 0,
    word: 0,
  };
  const onPath = new Set<SyntaxNode>();
  const stack: Frame[] = [{ node: root, depth: 1, exit: false }];
  let nodes = 0;
  let depth = 0;

  for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
    const { node } = frame;
    if (frame.exit) {
      onPath.delete(node);
      continue;
    }

    if (onPath.has(node)) {
      throw new SyntaxStructureError('CYCLE', `${node.kind} node contains itself`, node.position);
    }

    nodes++;
    if (nodes > limits.maxNodes) {
      throw new SyntaxLimitError(
        'MAX_NODES',
        `Tree exceeds maximum of ${limits.maxNodes} nodes`,
        limits.maxNodes,
        nodes,
        node.position
      );
    }
    if (frame.depth > limits.maxDepth) {
      throw new SyntaxLimitError(
        'MAX_DEPTH',
        `Tree exceeds maximum depth of ${limits.maxDepth}`,
        limits.maxDepth,
        frame.depth,
        node.position
      );
    }

    depth = Math.max(depth, frame.depth);
    kinds[node.kind]++;
    checkPayload(node, limits);

    const children = childNodes(node);
    if (children.length === 0) continue;

    onPath.add(node);
    stack.push({ node, depth: frame.depth, exit: true });
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ node: children[i], depth: frame.depth + 1, exit: false });
    }
  }

  return { nodes, depth, kinds };
}
