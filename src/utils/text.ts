/**
 * Text helpers shared by resolution and analysis
 */

const STOP_WORDS = new Set(['the', 'a', 'an', 'and', 'or', 'to', 'of', 'in', 'on', 'for', 'by', 'with']);

/**
 * Lower-case, collapse whitespace, straighten apostrophes
 */
export function normalizeName(raw: string): string {
  return raw.replace(/[’]/g, "'").replace(/\s+/g, ' ').trim().toLowerCase();
}

/**
 * Meaningful tokens: words longer than two characters that are not stop words
 */
export function meaningfulTokens(text: string): Set<string> {
  const tokens = text.toLowerCase().match(/\w+/g) ?? [];
  return new Set(tokens.filter((t) => t.length > 2 && !STOP_WORDS.has(t)));
}

export function tokenOverlap(a: Set<string>, b: Set<string>): number {
  let overlap = 0;
  for (const token of a) {
    if (b.has(token)) overlap++;
  }
  return overlap;
}

/**
 * Case-insensitive containment in either direction
 */
export function looselyMatches(a: string, b: string): boolean {
  const left = normalizeName(a);
  const right = normalizeName(b);
  if (!left || !right) return false;
  return left.includes(right) || right.includes(left);
}

/**
 * A reported item covers a requirement when it contains the requirement,
 * or when every meaningful word it has appears in the requirement.
 */
export function coversRequirement(required: string, reported: string): boolean {
  const need = normalizeName(required);
  const have = normalizeName(reported);
  if (!need || !have) return false;
  if (have.includes(need)) return true;

  const reportedTokens = meaningfulTokens(have);
  if (reportedTokens.size === 0) return false;
  return tokenOverlap(reportedTokens, meaningfulTokens(need)) === reportedTokens.size;
}

/**
 * Append values not already present, preserving order
 */
export function unionInto(existing: readonly string[], incoming: readonly string[]): string[] {
  const result = [...existing];
  const seen = new Set(existing);
  for (const value of incoming) {
    if (value && !seen.has(value)) {
      seen.add(value);
      result.push(value);
    }
  }
  return result;
}
