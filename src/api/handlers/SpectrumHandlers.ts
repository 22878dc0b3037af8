/**
 * SpectrumHandlers: HTTP handlers for importing, inspecting and rendering spectra.
 *
 * Each request gets its own RecordingShell: the delimiter prompt is answered
 * from the request body, and everything the core reports is logged and
 * returned with the response.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { AppContext } from '../../server.js';
import type {
  ApiError,
  ImportResponse,
  PeaksResponse,
  RenderResponse,
  SpectrumResponse,
  SpectrumSummary,
  UploadResponse,
} from '../types.js';
import { describeSpectrum, summarizeSpectrum, toNullable } from '../../render/describeSpectrum.js';
import { renderSpectra, reportWarnings } from '../../render/renderSpectra.js';
import { SpectrumError, SpectrumNotFoundError } from '../../spectrum/errors.js';
import { detectPeaks } from '../../spectrum/peaks/PeakDetector.js';
import { RecordingShell } from '../../spectrum/RecordingShell.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const ImportBodySchema = z.object({
  paths: z.array(z.string().min(1)).min(1),
  delimiter: z.string().optional(),
});

const UploadBodySchema = z.object({
  fileName: z.string().min(1),
  content: z.string(),
  delimiter: z.string().optional(),
});

const PeaksQuerySchema = z.object({
  normalize: booleanFlag,
});

const RenderQuerySchema = z.object({
  normalize: booleanFlag,
  showPeaks: booleanFlag,
});

function badRequest(reply: FastifyReply, error: z.ZodError): ApiError {
  reply.status(400);
  return {
    error: 'BAD_REQUEST',
    message: error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; '),
    details: error.issues,
  };
}

function failure(reply: FastifyReply, err: unknown): ApiError {
  if (err instanceof SpectrumError) {
    reply.status(err.statusCode);
    return { error: err.code, message: err.message };
  }
  reply.status(500);
  return {
    error: 'INTERNAL_ERROR',
    message: err instanceof Error ? err.message : String(err),
  };
}

function shellFor(request: FastifyRequest, delimiter: string | undefined): RecordingShell {
  return new RecordingShell({
    delimiter,
    onReport: (report) => request.log.warn({ kind: report.kind }, report.message),
  });
}

export function createSpectrumHandlers(ctx: AppContext) {
  return {
    /**
     * GET /files
     * List instrument exports available for import.
     */
    async listFiles(
      _request: FastifyRequest,
      reply: FastifyReply,
    ): Promise<{ directory: string; files: string[] } | ApiError> {
      try {
        const files = await ctx.source.listFiles({
          pattern: ctx.appConfig.import.pattern,
          recursive: ctx.appConfig.import.recursive,
        });
        return { directory: ctx.source.basePath, files };
      } catch (err) {
        return failure(reply, err);
      }
    },

    /**
     * GET /spectra
     * List loaded spectra in import order.
     */
    async listSpectra(): Promise<{ spectra: SpectrumSummary[]; total: number }> {
      const spectra = ctx.collection.list().map(summarizeSpectrum);
      return { spectra, total: spectra.length };
    },

    /**
     * POST /spectra/import
     * Import files from the source directory, one after another.
     */
    async importSpectra(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<ImportResponse | ApiError> {
      const parsed = ImportBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return badRequest(reply, parsed.error);
      }

      const shell = shellFor(request, parsed.data.delimiter);
      try {
        const result = await ctx.importer.importBatch(parsed.data.paths, shell);
        reply.status(result.imported.length > 0 ? 201 : 200);
        return { ...result, reports: shell.reports };
      } catch (err) {
        return failure(reply, err);
      }
    },

    /**
     * POST /spectra/upload
     * Import a single file sent inline.
     */
    async uploadSpectrum(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<UploadResponse | ApiError> {
      const parsed = UploadBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return badRequest(reply, parsed.error);
      }

      const shell = shellFor(request, parsed.data.delimiter);
      try {
        const spectrum = await ctx.importer.importContent(parsed.data.fileName, parsed.data.content, shell);
        reply.status(201);
        return { spectrum: summarizeSpectrum(spectrum), reports: shell.reports };
      } catch (err) {
        return failure(reply, err);
      }
    },

    /**
     * GET /spectra/:name
     * Details panel plus the raw series.
     */
    async getSpectrum(
      request: FastifyRequest<{ Params: { name: string } }>,
      reply: FastifyReply,
    ): Promise<SpectrumResponse | ApiError> {
      const spectrum = ctx.collection.get(request.params.name);
      if (!spectrum) {
        return failure(reply, new SpectrumNotFoundError(`spectrum ${request.params.name}`));
      }
      return {
        details: describeSpectrum(spectrum),
        wavelength: [...spectrum.wavelength],
        intensity: toNullable(spectrum.intensity),
      };
    },

    /**
     * DELETE /spectra/:name
     */
    async removeSpectrum(
      request: FastifyRequest<{ Params: { name: string } }>,
      reply: FastifyReply,
    ): Promise<{ success: boolean; name: string } | ApiError> {
      try {
        const removed = ctx.collection.remove(request.params.name);
        return { success: true, name: removed.displayName };
      } catch (err) {
        return failure(reply, err);
      }
    },

    /**
     * GET /spectra/:name/peaks?normalize=
     */
    async getPeaks(
      request: FastifyRequest<{ Params: { name: string }; Querystring: unknown }>,
      reply: FastifyReply,
    ): Promise<PeaksResponse | ApiError> {
      const query = PeaksQuerySchema.safeParse(request.query);
      if (!query.success) {
        return badRequest(reply, query.error);
      }

      try {
        const spectrum = ctx.collection.get(request.params.name);
        if (!spectrum) {
          throw new SpectrumNotFoundError(`spectrum ${request.params.name}`);
        }
        const peaks = detectPeaks(spectrum, query.data.normalize);
        return { name: spectrum.displayName, normalized: query.data.normalize, peaks };
      } catch (err) {
        return failure(reply, err);
      }
    },

    /**
     * GET /render?normalize=&showPeaks=
     * Plot description of every loaded spectrum.
     */
    async render(
      request: FastifyRequest<{ Querystring: unknown }>,
      reply: FastifyReply,
    ): Promise<RenderResponse | ApiError> {
      const query = RenderQuerySchema.safeParse(request.query);
      if (!query.success) {
        return badRequest(reply, query.error);
      }

      const shell = shellFor(request, undefined);
      const drawable = renderSpectra(ctx.collection.list(), query.data);
      reportWarnings(drawable, shell);
      return { ...drawable, reports: shell.reports };
    },
  };
}

export type SpectrumHandlers = ReturnType<typeof createSpectrumHandlers>;
