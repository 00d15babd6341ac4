/**
 * Scriptlet Delimiters
 */

/** Opening and closing delimiter of one scriptlet style */
export interface DelimiterPair {
  readonly start: string;
  readonly end: string;
}

/** Style A (`<% %>`) wins over style B (`<? ?>`) */
export const DEFAULT_DELIMITERS: readonly DelimiterPair[] = [
  { start: '<%', end: '%>' },
  { start: '<?', end: '?>' },
];

/** Shorthand markers recognized right after the opening delimiter */
export const SHORTHAND = {
  expression: '=',
  include: '&',
  inFlow: ':',
} as const;

/**
 * Pick the delimiter style a document uses: the first pair whose start
 * delimiter occurs anywhere in the text.
 */
export function detectDelimiters(
  source: string,
  pairs: readonly DelimiterPair[] = DEFAULT_DELIMITERS
): DelimiterPair | undefined {
  return pairs.find((pair) => source.includes(pair.start));
}
