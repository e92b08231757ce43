/**
 * Default limits applied when checking or decoding a tree
 */
export const DEFAULT_LIMITS = {
  /** Maximum nesting depth, the root being at depth 1 */
  maxDepth: 256,
  /** Maximum number of nodes visited in one tree */
  maxNodes: 100_000,
  /** Maximum elements, children or properties in one container */
  maxContainerSize: 10_000,
  /** Maximum length of a string, symbol id or object key, in code points */
  maxStringLength: 1_000_000,
} as const;

export type TreeLimits = { readonly [K in keyof typeof DEFAULT_LIMITS]: number };

/**
 * Merge overrides into the defaults. Set a limit to Infinity to disable it.
 *
 * @throws {RangeError} If an override is negative or NaN
 */
export function resolveLimits(overrides: Partial<TreeLimits> = {}): TreeLimits {
  const limits: TreeLimits = {
    maxDepth: overrides.maxDepth ?? DEFAULT_LIMITS.maxDepth,
    maxNodes: overrides.maxNodes ?? DEFAULT_LIMITS.maxNodes,
    maxContainerSize: overrides.maxContainerSize ?? DEFAULT_LIMITS.maxContainerSize,
    maxStringLength: overrides.maxStringLength ?? DEFAULT_LIMITS.maxStringLength,
  };
  for (const [name, value] of Object.entries(limits)) {
    if (Number.isNaN(value) || value < 0) {
      throw new RangeError(`Limit ${name} must be a non-negative number, got ${value}`);
    }
  }
  return limits;
}

/**
 * Length of a string in Unicode code points
 */
export function codePointLength(value: string): number {
  let length = 0;
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (code >= 0xd800 && code <= 0xdbff && i + 1 < value.length) {
      const next = value.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        i++;
      }
    }
    length++;
  }
  return length;
}
