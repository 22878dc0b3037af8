/**
 * FormatSniffer: delimiter and decimal-separator detection for instrument exports.
 *
 * Detection looks at the whole file content, never per line, and the order
 * of the checks is fixed: tab, then ", ", then ";". Existing exports rely on
 * tab winning even when the other patterns are present.
 */

import { FormatError } from '../errors.js';
import type { RawRow, SpectrumShell } from '../types.js';

export type DelimiterSource = 'tab' | 'comma-space' | 'semicolon' | 'manual';

export interface DelimiterConvention {
  delimiter: string;
  /** Rewrite every "," to "." before splitting */
  rewriteDecimalComma: boolean;
  source: DelimiterSource;
}

export interface SniffResult extends DelimiterConvention {
  rows: RawRow[];
}

/**
 * Split content into lines. LF, CRLF and a bare CR all end a line.
 *
 * A final terminator does not open a new line, and blank lines at the very
 * end of the file are dropped.
 */
export function splitLines(content: string): string[] {
  const lines = content.split(/\r\n|\r|\n/);
  while (lines.length > 0 && (lines[lines.length - 1] ?? '').trim() === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Pick a delimiter from the file content, or null when none of the known
 * conventions applies.
 */
export function detectDelimiter(content: string): DelimiterConvention | null {
  if (content.includes('\t')) {
    return { delimiter: '\t', rewriteDecimalComma: true, source: 'tab' };
  }
  if (content.includes(', ')) {
    return { delimiter: ', ', rewriteDecimalComma: false, source: 'comma-space' };
  }
  if (content.includes(';')) {
    return { delimiter: ';', rewriteDecimalComma: true, source: 'semicolon' };
  }
  return null;
}

/**
 * Convention for a delimiter typed in by the user.
 *
 * A delimiter containing "." would collide with decimal points and is refused.
 */
export function manualConvention(delimiter: string): DelimiterConvention {
  if (delimiter.length === 0) {
    throw new FormatError('The delimiter must not be empty');
  }
  if (delimiter.includes('.')) {
    throw new FormatError(`"." is not allowed in a delimiter (got "${delimiter}")`);
  }
  return {
    delimiter,
    rewriteDecimalComma: !delimiter.includes(','),
    source: 'manual',
  };
}

export function splitRows(lines: readonly string[], convention: DelimiterConvention): RawRow[] {
  return lines.map((line) => {
    const text = convention.rewriteDecimalComma ? line.replaceAll(',', '.') : line;
    return text.split(convention.delimiter);
  });
}

/**
 * Sniffs the format and falls back to asking the shell for a delimiter.
 */
export class FormatSniffer {
  async sniff(content: string, displayName: string, shell: SpectrumShell): Promise<SniffResult> {
    const lines = splitLines(content);
    if (lines.length === 0) {
      throw new FormatError(`${displayName} is empty`);
    }

    const detected = detectDelimiter(content);
    if (detected) {
      return { ...detected, rows: splitRows(lines, detected) };
    }

    const answer = await shell.promptDelimiter(displayName);
    if (!answer.accepted) {
      throw new FormatError(`No delimiter could be determined for ${displayName}`);
    }
    const convention = manualConvention(answer.delimiter);
    return { ...convention, rows: splitRows(lines, convention) };
  }
}
