/**
 * Key normalization shared by the join and the catalog matcher
 */

/**
 * Lowercase and trim a name so that two spellings differing only in case or
 * surrounding whitespace compare equal.
 */
export function normalizeName(value: string): string {
  return value.toLowerCase().trim();
}
