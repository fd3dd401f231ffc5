/**
 * Recipe quantity helpers
 */

const INTEGER_TOKEN = /^[+-]?\d+$/;

/**
 * Leading integer of a recipe quantity.
 *
 * Only the first whitespace-separated token is considered and it must be a
 * whole number: "15 leaves" → 15, 60 → 60, "1/2" → 0, "22.5" → 0.
 * Missing quantities count as 0.
 */
export function parseLeadingInteger(qty: string | number | undefined): number {
  if (qty === undefined) {
    return 0;
  }
  const [first] = String(qty).trim().split(/\s+/);
  if (!first || !INTEGER_TOKEN.test(first)) {
    return 0;
  }
  return parseInt(first, 10);
}
