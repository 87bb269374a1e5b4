/**
 * Text normalisation shared by every scorer.
 */

export interface NormalizeOptions {
  /** Keep "." so that "st. louis" survives; used by orientation. */
  keepPeriods?: boolean;
}

/**
 * Lowercase, replace anything outside [a-z0-9 ] (plus "." when requested) with
 * a space, collapse whitespace and trim. normalizeText(normalizeText(x)) === normalizeText(x).
 */
export function normalizeText(text: string, options: NormalizeOptions = {}): string {
  const disallowed = options.keepPeriods ? /[^a-z0-9\s.]/g : /[^a-z0-9\s]/g;
  return text
    .toLowerCase()
    .replace(disallowed, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function tokenize(text: string, options: NormalizeOptions = {}): string[] {
  const normalized = normalizeText(text, options);
  return normalized === "" ? [] : normalized.split(" ");
}

const ARTICLES = new Set(["the", "a", "an"]);

/** Drop standalone articles: "the hospital" -> "hospital". */
export function stripArticles(text: string): string {
  return text
    .split(" ")
    .filter((w) => w !== "" && !ARTICLES.has(w))
    .join(" ");
}
