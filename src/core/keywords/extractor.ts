const WORD = /\p{L}+/gu;
const STARTS_UPPERCASE = /^\p{Lu}/u;

export const MIN_KEYWORD_LENGTH = 2;

/**
 * Extract capitalized word tokens (a proxy for brand and proper names).
 *
 * A token is a maximal run of letters. It counts when it starts with an
 * uppercase letter, has at least MIN_KEYWORD_LENGTH letters and its
 * lowercase form is not excluded. Keys keep the original casing and appear
 * in first-seen order.
 */
export function extractKeywords(
  text: string,
  exclusions: ReadonlySet<string>,
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const match of text.matchAll(WORD)) {
    const token = match[0];
    if (!isCandidate(token, exclusions)) continue;
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

function isCandidate(token: string, exclusions: ReadonlySet<string>): boolean {
  return (
    [...token].length >= MIN_KEYWORD_LENGTH &&
    STARTS_UPPERCASE.test(token) &&
    !exclusions.has(token.toLowerCase())
  );
}

/** Non-overlapping, case-insensitive occurrences of `keyword` in `text`. */
export function countOccurrences(text: string, keyword: string): number {
  const needle = keyword.toLowerCase();
  if (needle.length === 0) return 0;

  const haystack = text.toLowerCase();
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}
