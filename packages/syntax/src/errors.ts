/**
 * Error types for the syntax model
 *
 * Every error carries a stable code and, where one is known, the position of
 * the node being built or checked.
 */

import { formatPosition, type Position } from './position';

export type StructureErrorCode =
  | 'WORD_REQUIRES_SYMBOL'
  | 'MISSING_POSITION'
  | 'MISSING_PAYLOAD'
  | 'UNEXPECTED_KIND'
  | 'CYCLE';

export type LimitErrorCode = 'MAX_DEPTH' | 'MAX_NODES' | 'MAX_CONTAINER_SIZE' | 'MAX_STRING_LENGTH';

export type DecodeErrorCode = 'INVALID_JSON' | 'INVALID_SHAPE';

export type SyntaxErrorCode = StructureErrorCode | LimitErrorCode | DecodeErrorCode;

/**
 * Base class for syntax model errors
 */
export abstract class SyntaxModelError extends Error {
  readonly code: SyntaxErrorCode;
  /** Position of the offending node (if available) */
  readonly position: Position | null;

  constructor(code: SyntaxErrorCode, message: string, position: Position | null = null) {
    super(position ? `${message} at ${formatPosition(position)}` : message);
    this.name = this.constructor.name;
    this.code = code;
    this.position = position;
  }
}

/**
 * Thrown when a node or tree breaks a structural rule, such as a word whose
 * name is not a symbol
 */
export class SyntaxStructureError extends SyntaxModelError {
  declare readonly code: StructureErrorCode;

  constructor(code: StructureErrorCode, message: string, position: Position | null = null) {
    super(code, message, position);
  }
}

/**
 * Thrown when a tree exceeds a configured limit
 */
export class SyntaxLimitError extends SyntaxModelError {
  declare readonly code: LimitErrorCode;
  readonly limit: number;
  readonly actual: number;

  constructor(
    code: LimitErrorCode,
    message: string,
    limit: number,
    actual: number,
    position: Position | null = null
  ) {
    super(code, message, position);
    this.limit = limit;
    this.actual = actual;
  }
}

export interface DecodeIssue {
  /** Dotted path into the input, empty for the root */
  path: string;
  message: string;
}

/**
 * Thrown when serialized input cannot be turned back into a tree
 */
export class SyntaxDecodeError extends SyntaxModelError {
  declare readonly code: DecodeErrorCode;
  readonly issues: readonly DecodeIssue[];

  constructor(code: DecodeErrorCode, message: string, issues: readonly DecodeIssue[] = []) {
    super(code, message, null);
    this.issues = issues;
  }
}
