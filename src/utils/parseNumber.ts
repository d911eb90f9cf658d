/**
 * Parse a base-10 integer from a header or env value
 * Returns null for missing, empty or non-numeric input
 */
export function parseIntegerOrNull(value: string | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    return null;
  }
  return Number.parseInt(trimmed, 10);
}
