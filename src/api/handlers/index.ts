/**
 * Handler exports for the API layer.
 */

export * from './SpectrumHandlers.js';
