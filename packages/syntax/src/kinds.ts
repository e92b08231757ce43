/**
 * Discriminators of the six syntax node variants
 */
export const SYNTAX_KINDS = ['array', 'object', 'quote', 'string', 'symbol', 'word'] as const;

export type SyntaxKind = (typeof SYNTAX_KINDS)[number];

/**
 * Source character that introduces each kind of node. Symbols have no
 * delimiter of their own and use `s`.
 */
export const SYNTAX_KIND_SIGILS: Record<SyntaxKind, string> = {
  array: '[',
  object: '{',
  quote: '(',
  string: '"',
  symbol: 's',
  word: ':',
};

export function isSyntaxKind(value: unknown): value is SyntaxKind {
  return SYNTAX_KINDS.some((kind) => kind === value);
}
