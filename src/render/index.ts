/**
 * Render module exports.
 */

export * from './renderSpectra.js';
export * from './describeSpectrum.js';
