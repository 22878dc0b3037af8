/**
 * Source directory exports.
 */

export * from './types.js';
export * from './LocalSpectrumSource.js';
