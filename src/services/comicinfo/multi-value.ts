/**
 * Multi-value Fields
 *
 * Characters, Teams, Locations, Genre, StoryArc and StoryArcNumber are stored
 * as one comma-delimited string; Web as whitespace-delimited URLs. The array
 * views are always derived from the stored string, never stored themselves.
 */

/**
 * Parse comma-separated field into array.
 */
export function splitCommaSeparated(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Join array into comma-separated string.
 */
export function joinCommaSeparated(values: readonly string[]): string {
  return values.join(', ');
}

/**
 * Parse whitespace-separated URLs, dropping tokens that are not absolute URLs.
 */
export function splitWebUrls(value: string | undefined): URL[] {
  if (!value) return [];
  return value
    .split(/\s+/)
    .filter((token) => token !== '' && URL.canParse(token))
    .map((token) => new URL(token));
}
