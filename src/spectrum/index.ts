/**
 * Spectrum module exports.
 */

export * from './types.js';
export * from './errors.js';
export * from './numeric.js';
export * from './sniffer/FormatSniffer.js';
export * from './parser/metadataRules.js';
export * from './parser/units.js';
export * from './parser/SpectrumParser.js';
export * from './peaks/savitzkyGolay.js';
export * from './peaks/PeakDetector.js';
export * from './SpectrumCollection.js';
export * from './SpectrumImportService.js';
export * from './RecordingShell.js';
