/**
 * Core types for spectrum import.
 *
 * A Spectrum is built once from a single instrument export and is never
 * mutated afterwards; the collection owns it until it is removed.
 */

/**
 * One file line split into cells.
 */
export type RawRow = string[];

/**
 * Display unit as (quantity name, separator text, unit symbol).
 */
export type UnitLabel = readonly [quantity: string, separator: string, symbol: string];

/**
 * Header row reduced to a (label, value) pair.
 */
export type MetadataPair = readonly [label: string, value: string];

export interface Spectrum {
  readonly sourcePath: string;
  /** Base name of sourcePath; unique key in the collection */
  readonly displayName: string;
  /** Delimiter the rows were split on */
  readonly delimiter: string;
  /** Number of header rows preceding the data block */
  readonly dataStart: number;
  readonly wavelength: readonly number[];
  /** Aligned with wavelength; NaN marks a malformed cell */
  readonly intensity: readonly number[];
  readonly metadataPairs: readonly MetadataPair[];
  readonly title: string;
  readonly date: string;
  readonly time: string;
  readonly modeCode: string;
  readonly unitLabel: UnitLabel;
  /** First wavelength in source order */
  readonly xMin: number;
  /** Last wavelength in source order */
  readonly xMax: number;
  /** Undefined when every intensity is NaN */
  readonly yMin: number | undefined;
  readonly yMax: number | undefined;
  /** Undefined with fewer than two points */
  readonly deltaX: number | undefined;
}

/**
 * Peak overlay entry.
 */
export interface Peak {
  /** Index into the series */
  index: number;
  x: number;
  /** Smoothed (and possibly normalized) value */
  y: number;
  label: string;
  /** Where the stem starts: the spectrum's raw yMin */
  baseline: number | undefined;
}

/**
 * View flags owned by the display layer.
 */
export interface ViewFlags {
  normalize: boolean;
  showPeaks: boolean;
}

/**
 * Answer of the shell when asked for a delimiter.
 */
export interface DelimiterAnswer {
  delimiter: string;
  accepted: boolean;
}

export type ReportKind =
  | 'FormatError'
  | 'DuplicateNameError'
  | 'DegenerateDataError'
  | 'SeriesTooShortError'
  | 'SpectrumNotFoundError'
  | 'UnitsMismatchWarning';

export interface ShellReport {
  kind: ReportKind;
  message: string;
}

/**
 * Display-layer collaborator. Implemented by the HTTP and MCP surfaces.
 */
export interface SpectrumShell {
  promptDelimiter(displayName: string): Promise<DelimiterAnswer>;
  reportError(kind: ReportKind, message: string): void;
}
