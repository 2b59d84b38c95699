/**
 * Keyword matching shared by the scope guard and the intent fallback.
 *
 * Multi-word terms match as substrings of the lower-cased text; single
 * words match on word boundaries so "ips" does not fire on "tips".
 */

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * True when `term` occurs in already lower-cased `text`.
 */
export function matchesTerm(text: string, term: string): boolean {
  const needle = term.toLowerCase().trim();
  if (needle.length === 0) {
    return false;
  }
  if (/\s/.test(needle)) {
    return text.includes(needle);
  }
  return new RegExp(`\\b${escapeRegExp(needle)}\\b`).test(text);
}

/**
 * Terms from `terms` found in `text`, in lexicon order.
 */
export function findTerms(text: string, terms: readonly string[]): string[] {
  const lower = text.toLowerCase();
  return terms.filter((term) => matchesTerm(lower, term));
}
