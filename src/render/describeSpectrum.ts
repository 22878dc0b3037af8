import { formatUnitLabel } from '../spectrum/parser/units.js';
import type { MetadataPair, Spectrum } from '../spectrum/types.js';

export const NOT_AVAILABLE = 'n/a';

/**
 * Text shown in the details panel for one spectrum.
 */
export interface SpectrumDetails {
  name: string;
  path: string;
  title: string;
  mode: string;
  date: string;
  time: string;
  points: number;
  range: string;
  deltaX: string;
  minMax: string;
  metadata: readonly MetadataPair[];
}

export function describeSpectrum(spectrum: Spectrum): SpectrumDetails {
  const symbol = spectrum.unitLabel[2];
  const minMax =
    spectrum.yMin === undefined || spectrum.yMax === undefined
      ? NOT_AVAILABLE
      : `${spectrum.yMin}/${spectrum.yMax} ${symbol}`.trimEnd();

  return {
    name: spectrum.displayName,
    path: spectrum.sourcePath,
    title: spectrum.title,
    mode: spectrum.modeCode,
    date: spectrum.date,
    time: spectrum.time,
    points: spectrum.wavelength.length,
    range: `${spectrum.xMin} nm to ${spectrum.xMax} nm`,
    deltaX: spectrum.deltaX === undefined ? NOT_AVAILABLE : String(spectrum.deltaX),
    minMax,
    metadata: spectrum.metadataPairs,
  };
}

/**
 * Short form used in listings.
 */
export interface SpectrumSummary {
  name: string;
  path: string;
  title: string;
  unit: string;
  points: number;
  xMin: number;
  xMax: number;
}

export function summarizeSpectrum(spectrum: Spectrum): SpectrumSummary {
  return {
    name: spectrum.displayName,
    path: spectrum.sourcePath,
    title: spectrum.title,
    unit: formatUnitLabel(spectrum.unitLabel),
    points: spectrum.wavelength.length,
    xMin: spectrum.xMin,
    xMax: spectrum.xMax,
  };
}

/**
 * JSON has no NaN; missing values travel as null.
 */
export function toNullable(values: readonly number[]): Array<number | null> {
  return values.map((v) => (Number.isNaN(v) ? null : v));
}
