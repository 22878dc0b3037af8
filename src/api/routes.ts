/**
 * Route configuration for the API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers around the import core.
 */

import type { FastifyInstance } from 'fastify';
import type { SpectrumHandlers } from './handlers/SpectrumHandlers.js';
import type { HealthResponse } from './types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  spectrumHandlers: SpectrumHandlers;
  spectrumCount: () => number;
  sourceDirectory: () => string;
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { spectrumHandlers, spectrumCount, sourceDirectory } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      components: {
        spectra: { loaded: spectrumCount() },
        source: { directory: sourceDirectory() },
      },
    };
  });

  // ============================================================================
  // Source Files
  // ============================================================================

  fastify.get('/files', spectrumHandlers.listFiles.bind(spectrumHandlers));

  // ============================================================================
  // Spectrum Routes
  // ============================================================================

  // List loaded spectra
  fastify.get('/spectra', spectrumHandlers.listSpectra.bind(spectrumHandlers));

  // Batch import from the source directory
  fastify.post('/spectra/import', spectrumHandlers.importSpectra.bind(spectrumHandlers));

  // Import inline content
  fastify.post('/spectra/upload', spectrumHandlers.uploadSpectrum.bind(spectrumHandlers));

  // Details and series
  fastify.get('/spectra/:name', spectrumHandlers.getSpectrum.bind(spectrumHandlers));

  // Remove from the collection
  fastify.delete('/spectra/:name', spectrumHandlers.removeSpectrum.bind(spectrumHandlers));

  // Peak list
  fastify.get('/spectra/:name/peaks', spectrumHandlers.getPeaks.bind(spectrumHandlers));

  // ============================================================================
  // Rendering
  // ============================================================================

  fastify.get('/render', spectrumHandlers.render.bind(spectrumHandlers));
}
