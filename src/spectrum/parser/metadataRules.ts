/**
 * Ordered extraction rules for header metadata.
 *
 * Each field has a list of rules tried in order; the first rule that returns
 * a string wins (an empty string counts as found). When no rule matches, the
 * caller keeps its default.
 */

import type { RawRow } from '../types.js';

export interface MetadataRule {
  name: string;
  extract: (header: readonly RawRow[]) => string | undefined;
}

export const UNKNOWN = 'Unknown';
export const UNKNOWN_UNITS = 'unknown units';

function lastCell(row: RawRow): string {
  return row[row.length - 1] ?? '';
}

/**
 * First header row whose label (first cell) matches; value is its last cell.
 */
function labelRule(name: string, label: RegExp, transform: (value: string) => string = (v) => v): MetadataRule {
  return {
    name,
    extract(header) {
      const row = header.find((r) => label.test(r[0] ?? ''));
      return row ? transform(lastCell(row)) : undefined;
    },
  };
}

/**
 * Pattern searched in the joined cells of the first header row.
 *
 * Only the first row is inspected, never the rest of the header.
 */
function firstRowPatternRule(name: string, pattern: RegExp): MetadataRule {
  return {
    name,
    extract(header) {
      const first = header[0];
      if (!first) return undefined;
      const match = pattern.exec(first.join(''));
      return match ? match[0] : undefined;
    },
  };
}

export const TITLE_RULES: readonly MetadataRule[] = [
  {
    name: 'first-row-last-cell',
    extract: (header) => (header[0] ? lastCell(header[0]) : undefined),
  },
];

export const DATE_RULES: readonly MetadataRule[] = [
  labelRule('date-label', /date|Datum| am/i, (value) => value.replaceAll('/', '.')),
  firstRowPatternRule('date-pattern', /[0-9][0-9][./][0-9][0-9][./][0-9][0-9][0-9][0-9]/),
];

export const TIME_RULES: readonly MetadataRule[] = [
  labelRule('time-label', /time|Zeit| um/i),
  firstRowPatternRule('time-pattern', /[0-9][0-9]:[0-9][0-9]:[0-9][0-9]/),
];

export const MODE_RULES: readonly MetadataRule[] = [
  labelRule('mode-label', /YUNITS|Modus/i),
  {
    name: 'row-before-data',
    extract: (header) => {
      const last = header[header.length - 1];
      return last ? lastCell(last) : undefined;
    },
  },
];

/**
 * Apply rules in order and return the first result, or the fallback.
 */
export function resolveField(rules: readonly MetadataRule[], header: readonly RawRow[], fallback: string): string {
  for (const rule of rules) {
    const value = rule.extract(header);
    if (value !== undefined) return value;
  }
  return fallback;
}
