/**
 * MCP tools for importing, inspecting and rendering spectra.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { describeSpectrum, summarizeSpectrum, toNullable } from '../../render/describeSpectrum.js';
import { renderSpectra, reportWarnings } from '../../render/renderSpectra.js';
import { SpectrumNotFoundError } from '../../spectrum/errors.js';
import { detectPeaks } from '../../spectrum/peaks/PeakDetector.js';
import { RecordingShell } from '../../spectrum/RecordingShell.js';
import { jsonResult, toolError } from '../helpers.js';

export function registerSpectrumTools(server: McpServer, ctx: AppContext): void {
  // spectrum_import: Batch import from the source directory
  server.tool(
    'spectrum_import',
    'Import instrument exports (plain-text wavelength/intensity files) from the source directory. Files are imported one after another; a failing file does not stop the others.',
    {
      paths: z.array(z.string()).min(1).describe('Paths relative to the source directory'),
      delimiter: z.string().optional().describe('Delimiter to use when it cannot be detected (tab, ", " and ";" are detected)'),
    },
    async (args) => {
      try {
        const shell = new RecordingShell({ delimiter: args.delimiter });
        const result = await ctx.importer.importBatch(args.paths, shell);
        return jsonResult({ ...result, reports: shell.reports });
      } catch (err) {
        return toolError(err);
      }
    }
  );

  // spectrum_upload: Import inline text
  server.tool(
    'spectrum_upload',
    'Import a single spectrum from inline file content.',
    {
      fileName: z.string().min(1).describe('File name; its base name becomes the display name'),
      content: z.string().describe('Raw file content'),
      delimiter: z.string().optional().describe('Delimiter to use when it cannot be detected'),
    },
    async (args) => {
      try {
        const shell = new RecordingShell({ delimiter: args.delimiter });
        const spectrum = await ctx.importer.importContent(args.fileName, args.content, shell);
        return jsonResult({ spectrum: summarizeSpectrum(spectrum), reports: shell.reports });
      } catch (err) {
        return toolError(err);
      }
    }
  );

  // spectrum_list: Loaded spectra
  server.tool(
    'spectrum_list',
    'List loaded spectra in import order.',
    {},
    async () => {
      const spectra = ctx.collection.list().map(summarizeSpectrum);
      return jsonResult({ spectra, total: spectra.length });
    }
  );

  // spectrum_get: Details and series
  server.tool(
    'spectrum_get',
    'Get metadata, derived statistics and the wavelength/intensity series of a loaded spectrum.',
    { name: z.string().describe('Display name (file base name)') },
    async (args) => {
      const spectrum = ctx.collection.get(args.name);
      if (!spectrum) {
        return toolError(new SpectrumNotFoundError(`spectrum ${args.name}`));
      }
      return jsonResult({
        details: describeSpectrum(spectrum),
        wavelength: spectrum.wavelength,
        intensity: toNullable(spectrum.intensity),
      });
    }
  );

  // spectrum_remove: Drop from the collection
  server.tool(
    'spectrum_remove',
    'Remove a loaded spectrum.',
    { name: z.string().describe('Display name (file base name)') },
    async (args) => {
      try {
        const removed = ctx.collection.remove(args.name);
        return jsonResult({ success: true, name: removed.displayName });
      } catch (err) {
        return toolError(err);
      }
    }
  );

  // spectrum_peaks: Local maxima of the smoothed series
  server.tool(
    'spectrum_peaks',
    'Detect peaks (local maxima after Savitzky-Golay smoothing, window 31, cubic) of a loaded spectrum.',
    {
      name: z.string().describe('Display name (file base name)'),
      normalize: z.boolean().optional().describe('Scale intensities to 0-100 before smoothing'),
    },
    async (args) => {
      try {
        const spectrum = ctx.collection.get(args.name);
        if (!spectrum) {
          throw new SpectrumNotFoundError(`spectrum ${args.name}`);
        }
        const normalize = args.normalize ?? false;
        return jsonResult({ name: spectrum.displayName, normalized: normalize, peaks: detectPeaks(spectrum, normalize) });
      } catch (err) {
        return toolError(err);
      }
    }
  );

  // spectrum_render: Plot description
  server.tool(
    'spectrum_render',
    'Describe the plot of all loaded spectra: axis labels, series, and optional peak overlays.',
    {
      normalize: z.boolean().optional().describe('Scale every series to 0-100'),
      showPeaks: z.boolean().optional().describe('Include peak overlays'),
    },
    async (args) => {
      const shell = new RecordingShell();
      const drawable = renderSpectra(ctx.collection.list(), {
        normalize: args.normalize ?? false,
        showPeaks: args.showPeaks ?? false,
      });
      reportWarnings(drawable, shell);
      return jsonResult({ ...drawable, reports: shell.reports });
    }
  );
}
