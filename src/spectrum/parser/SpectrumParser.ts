/**
 * SpectrumParser: turns sniffed rows into an immutable Spectrum.
 *
 * Rows before the first numeric row form the header block and feed the
 * metadata rules; the remaining rows form the data block. A wavelength cell
 * that is not a number aborts the file, an intensity cell that is not a
 * number becomes NaN.
 */

import { DegenerateDataError, FormatError } from '../errors.js';
import { finiteRange, parseFloatStrict } from '../numeric.js';
import type { MetadataPair, RawRow, Spectrum } from '../types.js';
import {
  DATE_RULES,
  MODE_RULES,
  TIME_RULES,
  TITLE_RULES,
  UNKNOWN,
  UNKNOWN_UNITS,
  resolveField,
} from './metadataRules.js';
import { resolveUnitLabel } from './units.js';

export interface ParseOptions {
  /** Delimiter the rows were split on, recorded on the spectrum */
  delimiter?: string;
  /** Throw DegenerateDataError instead of leaving yMin/yMax undefined */
  rejectDegenerate?: boolean;
}

/**
 * Base name of a path, accepting both separators.
 */
export function displayNameOf(sourcePath: string): string {
  const parts = sourcePath.split(/[\\/]/);
  return parts[parts.length - 1] ?? sourcePath;
}

/**
 * Index of the first row whose first cell is a number, or -1.
 */
export function findDataStart(rows: readonly RawRow[]): number {
  return rows.findIndex((row) => parseFloatStrict(row[0]) !== undefined);
}

function padHeader(rows: readonly RawRow[]): RawRow[] {
  return rows.map((row) => (row.length < 2 ? [...row, ...Array<string>(2 - row.length).fill('')] : [...row]));
}

export class SpectrumParser {
  parse(rows: readonly RawRow[], sourcePath: string, options: ParseOptions = {}): Spectrum {
    const displayName = displayNameOf(sourcePath);
    const dataStart = findDataStart(rows);
    if (dataStart < 0) {
      throw new FormatError(`${displayName} contains no numeric data rows`);
    }

    const header = padHeader(rows.slice(0, dataStart));
    const metadataPairs: MetadataPair[] = header.map((row) => [row[0] ?? '', row[row.length - 1] ?? '']);

    let title = UNKNOWN;
    let date = UNKNOWN;
    let time = UNKNOWN;
    let modeCode = UNKNOWN_UNITS;
    if (header.length > 0) {
      title = resolveField(TITLE_RULES, header, UNKNOWN);
      date = resolveField(DATE_RULES, header, UNKNOWN);
      time = resolveField(TIME_RULES, header, UNKNOWN);
      modeCode = resolveField(MODE_RULES, header, UNKNOWN_UNITS);
    }

    const wavelength: number[] = [];
    const intensity: number[] = [];
    for (let i = dataStart; i < rows.length; i += 1) {
      const row = rows[i] ?? [];
      const x = parseFloatStrict(row[0]);
      if (x === undefined) {
        throw new FormatError(`${displayName}, line ${i + 1}: wavelength "${row[0] ?? ''}" is not a number`);
      }
      wavelength.push(x);
      intensity.push(parseFloatStrict(row[1]) ?? Number.NaN);
    }

    const range = finiteRange(intensity);
    if (!range && options.rejectDegenerate) {
      throw new DegenerateDataError(displayName);
    }

    const first = wavelength[0] ?? Number.NaN;
    const second = wavelength[1];
    const last = wavelength[wavelength.length - 1] ?? Number.NaN;

    return Object.freeze({
      sourcePath,
      displayName,
      delimiter: options.delimiter ?? '',
      dataStart,
      wavelength: Object.freeze(wavelength),
      intensity: Object.freeze(intensity),
      metadataPairs: Object.freeze(metadataPairs),
      title,
      date,
      time,
      modeCode,
      unitLabel: resolveUnitLabel(modeCode),
      xMin: first,
      xMax: last,
      yMin: range?.min,
      yMax: range?.max,
      deltaX: second !== undefined ? second - first : undefined,
    });
  }
}

/**
 * Intensity range of a spectrum, for consumers that cannot work without one.
 */
export function intensityRange(spectrum: Spectrum): { min: number; max: number } {
  if (spectrum.yMin === undefined || spectrum.yMax === undefined) {
    throw new DegenerateDataError(spectrum.displayName);
  }
  return { min: spectrum.yMin, max: spectrum.yMax };
}
