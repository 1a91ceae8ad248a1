/**
 * Format filter utilities
 * A filter is a list of lowercase substrings matched against file names
 */

/**
 * Parse a comma/space separated format list ("jpg,png" or "jpg png")
 * Returns an empty list (no filtering) when nothing is given
 */
export function parseFormatFilter(format?: string): string[] {
  if (!format) {
    return [];
  }

  const tokens = format
    .split(/[\s,]+/)
    .map((token) => token.toLowerCase())
    .filter((token) => token.length > 0);

  return [...new Set(tokens)];
}

/**
 * Case-insensitive substring match of a file name against any filter token
 */
export function matchesFormatFilter(
  filename: string,
  filter: readonly string[],
): boolean {
  if (filter.length === 0) {
    return true;
  }

  const name = filename.toLowerCase();
  return filter.some((token) => name.includes(token));
}
