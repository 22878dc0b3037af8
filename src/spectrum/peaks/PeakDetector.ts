/**
 * PeakDetector: local maxima of the smoothed (optionally normalized) series.
 */

import type { Peak, Spectrum } from '../types.js';
import { savitzkyGolaySmooth } from './savitzkyGolay.js';

export const SMOOTHING_WINDOW = 31;
export const SMOOTHING_POLYORDER = 3;

/**
 * Scale to 0..100 using the spectrum's range.
 *
 * Left raw when yMax is exactly 0. Only yMax is checked; a flat series with a
 * non-zero yMax divides by zero.
 */
export function normalizeIntensity(
  intensity: readonly number[],
  yMin: number | undefined,
  yMax: number | undefined,
): number[] {
  if (yMin === undefined || yMax === undefined || yMax === 0) {
    return [...intensity];
  }
  return intensity.map((y) => ((y - yMin) / (yMax - yMin)) * 100);
}

/**
 * Indices of strict interior maxima. Plateaus and endpoints never qualify.
 */
export function findStrictMaxima(values: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < values.length - 1; i += 1) {
    const v = values[i] ?? Number.NaN;
    if (v > (values[i - 1] ?? Number.NaN) && v > (values[i + 1] ?? Number.NaN)) {
      out.push(i);
    }
  }
  return out;
}

/**
 * Round to `digits` decimals on the exact stored value, ties to even:
 * 0.125 gives 0.12 and 2.675 (stored just below) gives 2.67.
 */
export function roundHalfEven(value: number, digits: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return value;
  }
  const sign = value < 0 ? -1 : 1;
  const exact = Math.abs(value).toFixed(100);
  const cut = exact.indexOf('.') + 1 + digits;
  const tail = exact.slice(cut);

  // toFixed rounds exact ties away from zero; only those need correcting
  if (/^50*$/.test(tail)) {
    const truncated = exact.slice(0, digits > 0 ? cut : cut - 1);
    const lastDigit = Number(truncated.charAt(truncated.length - 1));
    if (lastDigit % 2 === 0) {
      return sign * Number(truncated);
    }
  }
  return sign * Number(Math.abs(value).toFixed(digits));
}

export function formatPeakLabel(x: number, y: number, normalized: boolean): string {
  if (normalized) {
    return `${x} nm`;
  }
  return `(${x}|${roundHalfEven(y, 2)})`;
}

/**
 * Values as they are plotted for the given normalize flag.
 */
export function displayValues(spectrum: Spectrum, normalize: boolean): number[] {
  return normalize
    ? normalizeIntensity(spectrum.intensity, spectrum.yMin, spectrum.yMax)
    : [...spectrum.intensity];
}

/**
 * Throws SeriesTooShortError when the series is shorter than the window.
 */
export function detectPeaks(spectrum: Spectrum, normalize: boolean): Peak[] {
  const values = displayValues(spectrum, normalize);
  const smoothed = savitzkyGolaySmooth(values, {
    windowLength: SMOOTHING_WINDOW,
    polyorder: SMOOTHING_POLYORDER,
  });

  return findStrictMaxima(smoothed).map((index) => {
    const x = spectrum.wavelength[index] ?? Number.NaN;
    const y = smoothed[index] ?? Number.NaN;
    return {
      index,
      x,
      y,
      label: formatPeakLabel(x, y, normalize),
      baseline: spectrum.yMin,
    };
  });
}
