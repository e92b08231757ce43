import type { ArrayNode } from '../src/ast';
import { arrayNode, objectNode, quoteNode, stringNode, symbolNode, wordNode } from '../src/nodes';
import { createPosition, type Position } from '../src/position';

export function at(line: number, column = 1): Position {
  return createPosition(line, column, 'main.stk');
}

/**
 * Tree for: [ "a" ( dup drop ) { "x": "1" } : foo ; ]
 */
export function sampleTree(): ArrayNode {
  return arrayNode(at(1, 1), [
    stringNode(at(1, 3), 'a'),
    quoteNode(at(1, 7), [symbolNode(at(1, 9), 'dup'), symbolNode(at(1, 13), 'drop')]),
    objectNode(at(1, 20), [{ key: 'x', value: stringNode(at(1, 27), '1') }]),
    wordNode(at(1, 33), symbolNode(at(1, 35), 'foo')),
  ]);
}

/**
 * `depth` arrays nested inside each other
 */
export function nestedArrays(depth: number): ArrayNode {
  let node = arrayNode(at(depth), []);
  for (let level = depth - 1; level >= 1; level--) {
    node = arrayNode(at(level), [node]);
  }
  return node;
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
