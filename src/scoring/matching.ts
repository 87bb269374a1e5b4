/**
 * Word matching helpers.
 */

export const DEFAULT_MAX_LENGTH_DIFF = 2;

/**
 * Exact match, or an inflection of the expected word: one word is a prefix of
 * the other and the lengths differ by at most maxLengthDiff. "books" and
 * "clouds" match; "and" does not match "hand".
 */
export function fuzzyWordMatch(
  spoken: string,
  expected: string,
  maxLengthDiff = DEFAULT_MAX_LENGTH_DIFF
): boolean {
  const a = spoken.toLowerCase();
  const b = expected.toLowerCase();
  if (a === "" || b === "") return false;
  if (a === b) return true;
  if (Math.abs(a.length - b.length) > maxLengthDiff) return false;
  return a.startsWith(b) || b.startsWith(a);
}

/**
 * Substring containment in either direction. Empty strings never match, since
 * every string contains "".
 */
export function containsEitherWay(text: string, candidate: string): boolean {
  if (text === "" || candidate === "") return false;
  return text === candidate || text.includes(candidate) || candidate.includes(text);
}
