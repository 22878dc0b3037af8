import type { ReportKind } from './types.js';

/**
 * Base class for every failure the import core raises.
 */
export class SpectrumError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly kind: ReportKind;

  constructor(kind: ReportKind, code: string, message: string, statusCode: number) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.code = code;
    this.statusCode = statusCode;
  }
}

/**
 * The file has no numeric data block, or a wavelength cell is not a number,
 * or no usable delimiter could be determined.
 */
export class FormatError extends SpectrumError {
  constructor(message: string) {
    super('FormatError', 'FORMAT_ERROR', message, 422);
  }
}

export class DuplicateNameError extends SpectrumError {
  readonly displayName: string;

  constructor(displayName: string) {
    super(
      'DuplicateNameError',
      'DUPLICATE_NAME',
      `A spectrum named ${displayName} is already loaded. Remove it first or rename the file.`,
      409,
    );
    this.displayName = displayName;
  }
}

/**
 * Every intensity value is NaN, so min/max are undefined.
 */
export class DegenerateDataError extends SpectrumError {
  constructor(displayName: string) {
    super('DegenerateDataError', 'DEGENERATE_DATA', `${displayName} contains no numeric intensity values`, 422);
  }
}

export class SeriesTooShortError extends SpectrumError {
  readonly length: number;
  readonly windowLength: number;

  constructor(length: number, windowLength: number) {
    super(
      'SeriesTooShortError',
      'SERIES_TOO_SHORT',
      `Series has ${length} points; smoothing needs at least ${windowLength}`,
      422,
    );
    this.length = length;
    this.windowLength = windowLength;
  }
}

export class SpectrumNotFoundError extends SpectrumError {
  constructor(what: string) {
    super('SpectrumNotFoundError', 'NOT_FOUND', `Not found: ${what}`, 404);
  }
}

/**
 * Informational: spectra with different unit labels are shown together.
 */
export interface UnitsMismatchWarning {
  kind: 'UnitsMismatchWarning';
  message: string;
  labels: string[];
}
