const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_PATTERN = /^[+-]?(?:nan|inf|infinity)$/i;

/**
 * Parse a whole cell as a float.
 *
 * Unlike Number.parseFloat, trailing garbage ("500nm") and empty cells are
 * rejected. Surrounding whitespace is allowed, as are nan/inf spellings.
 */
export function parseFloatStrict(cell: string | undefined): number | undefined {
  if (cell === undefined) return undefined;
  const text = cell.trim();
  if (DECIMAL_PATTERN.test(text)) {
    return Number(text);
  }
  if (SPECIAL_PATTERN.test(text)) {
    const negative = text.startsWith('-');
    if (/nan/i.test(text)) return Number.NaN;
    return negative ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  return undefined;
}

/**
 * Min and max of the values that are not NaN, or undefined if there are none.
 */
export function finiteRange(values: readonly number[]): { min: number; max: number } | undefined {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  let seen = false;
  for (const value of values) {
    if (Number.isNaN(value)) continue;
    seen = true;
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return seen ? { min, max } : undefined;
}
