/**
 * Source position attached to every syntax node.
 *
 * Positions are produced by the scanner and treated as opaque here: nodes
 * never adjust the line or column they were given.
 */
export interface Position {
  /** Name of the source file, empty for anonymous input */
  readonly file: string;
  /** Line number as reported by the scanner */
  readonly line: number;
  /** Column number as reported by the scanner */
  readonly column: number;
}

/**
 * Create a frozen position value
 */
export function createPosition(line: number, column: number, file = ''): Position {
  return Object.freeze({ file, line, column });
}

/**
 * Render a position for messages: `file:line:column`, or `line:column` for
 * anonymous input
 */
export function formatPosition(position: Position): string {
  const location = `${position.line}:${position.column}`;
  return position.file ? `${position.file}:${location}` : location;
}
