/**
 * Pure view model of the spectra plot.
 *
 * Embedded and standalone views both call renderSpectra with the current
 * collection and flags; there is no shared figure state.
 */

import type { UnitsMismatchWarning } from '../spectrum/errors.js';
import { SeriesTooShortError } from '../spectrum/errors.js';
import { detectPeaks, displayValues } from '../spectrum/peaks/PeakDetector.js';
import { formatUnitLabel } from '../spectrum/parser/units.js';
import type { Peak, Spectrum, SpectrumShell, ViewFlags } from '../spectrum/types.js';

export const X_AXIS_LABEL = 'Wavelength λ in nm';
export const MIXED_UNITS_LABEL = 'Warning: different units.';
export const MIXED_UNITS_NORMALIZED_LABEL = 'Warning: different units (normalized to 100 %)';

export interface DrawableSeries {
  name: string;
  /** Display name without the .txt extension */
  legend: string;
  x: readonly number[];
  y: number[];
  peaks?: Peak[];
  /** Set when peaks were requested but could not be computed for this series */
  peakError?: string;
}

export interface Drawable {
  xLabel: string;
  yLabel: string;
  unitsUniform: boolean;
  normalized: boolean;
  series: DrawableSeries[];
  warnings: UnitsMismatchWarning[];
}

export function legendName(displayName: string): string {
  return displayName.replace('.txt', '');
}

function yAxisLabel(spectra: readonly Spectrum[], normalize: boolean): {
  label: string;
  uniform: boolean;
  warning?: UnitsMismatchWarning;
} {
  const labels = spectra.map((s) => formatUnitLabel(s.unitLabel));
  const first = spectra[0];
  if (!first) {
    return { label: '', uniform: false };
  }

  const uniform = labels.every((label) => label === labels[0]);
  if (uniform) {
    return {
      label: normalize ? `Normalized ${first.unitLabel[0]} in %` : (labels[0] ?? ''),
      uniform,
    };
  }

  if (normalize) {
    return { label: MIXED_UNITS_NORMALIZED_LABEL, uniform };
  }
  return {
    label: MIXED_UNITS_LABEL,
    uniform,
    warning: {
      kind: 'UnitsMismatchWarning',
      message: 'The units of the loaded files differ; the data may not be comparable.',
      labels: [...new Set(labels)],
    },
  };
}

function renderSeries(spectrum: Spectrum, flags: ViewFlags): DrawableSeries {
  const series: DrawableSeries = {
    name: spectrum.displayName,
    legend: legendName(spectrum.displayName),
    x: spectrum.wavelength,
    y: displayValues(spectrum, flags.normalize),
  };
  if (!flags.showPeaks) {
    return series;
  }

  try {
    return { ...series, peaks: detectPeaks(spectrum, flags.normalize) };
  } catch (err) {
    if (err instanceof SeriesTooShortError) {
      return { ...series, peakError: err.message };
    }
    throw err;
  }
}

export function renderSpectra(spectra: readonly Spectrum[], flags: ViewFlags): Drawable {
  const axis = yAxisLabel(spectra, flags.normalize);
  return {
    xLabel: X_AXIS_LABEL,
    yLabel: axis.label,
    unitsUniform: axis.uniform,
    normalized: flags.normalize,
    series: spectra.map((spectrum) => renderSeries(spectrum, flags)),
    warnings: axis.warning ? [axis.warning] : [],
  };
}

/**
 * Pass the plot's warnings to the shell.
 */
export function reportWarnings(drawable: Drawable, shell: SpectrumShell): void {
  for (const warning of drawable.warnings) {
    shell.reportError(warning.kind, warning.message);
  }
}
