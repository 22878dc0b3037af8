/**
 * E2E tests for the HTTP API.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import type { FastifyInstance } from 'fastify';
import { initializeApp, createServer } from '../server.js';
import type { AppContext } from '../server.js';

const PARABOLA = [
  'Sample\tRun 1',
  'YUNITS\tA',
  ...Array.from({ length: 40 }, (_, i) => `${400 + i}\t${400 - (i - 20) ** 2}`),
  '',
].join('\n');

describe('API E2E Tests', () => {
  let app: FastifyInstance;
  let ctx: AppContext;
  let testDir: string;

  beforeAll(async () => {
    testDir = join(tmpdir(), `api-test-${randomUUID()}`);
    await mkdir(join(testDir, 'spectra'), { recursive: true });
    await writeFile(join(testDir, 'spectra', 'run1.txt'), PARABOLA);
    await writeFile(join(testDir, 'spectra', 'bad.txt'), 'no\tnumbers\n');
    await writeFile(join(testDir, 'spectra', 'readme.md'), 'not an export\n');

    ctx = await initializeApp(testDir, { logLevel: 'silent' });
    app = await createServer(ctx, { logLevel: 'silent' });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    await rm(testDir, { recursive: true, force: true });
  });

  describe('Health Check', () => {
    it('should return health status', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/health' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.payload);
      expect(body.status).toBe('ok');
      expect(body.timestamp).toBeDefined();
      expect(body.components.spectra.loaded).toBe(0);
      expect(body.components.source.directory).toBe(join(testDir, 'spectra'));
    });
  });

  describe('Source Files', () => {
    it('should list exports matching the configured pattern', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/files' });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.payload).files).toEqual(['bad.txt', 'run1.txt']);
    });
  });

  describe('Import', () => {
    it('should import good files and report bad ones', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/spectra/import',
        payload: { paths: ['run1.txt', 'bad.txt'] },
      });

      expect(response.statusCode).toBe(201);
      const body = JSON.parse(response.payload);
      expect(body.imported).toEqual(['run1.txt']);
      expect(body.failed).toEqual([
        { path: 'bad.txt', error: 'FORMAT_ERROR', message: 'bad.txt contains no numeric data rows' },
      ]);
      expect(body.reports).toEqual([{ kind: 'FormatError', message: 'bad.txt contains no numeric data rows' }]);
    });

    it('should report a duplicate without importing', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/spectra/import',
        payload: { paths: ['run1.txt'] },
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.payload);
      expect(body.imported).toEqual([]);
      expect(body.failed[0].error).toBe('DUPLICATE_NAME');
    });

    it('should reject an empty path list', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/spectra/import',
        payload: { paths: [] },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.payload).error).toBe('BAD_REQUEST');
    });
  });

  describe('Upload', () => {
    it('should fail without a delimiter when none is detected', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/spectra/upload',
        payload: { fileName: 'up.txt', content: '1 2\n3 4' },
      });

      expect(response.statusCode).toBe(422);
      const body = JSON.parse(response.payload);
      expect(body.error).toBe('FORMAT_ERROR');
      expect(body.message).toBe('No delimiter could be determined for up.txt');
    });

    it('should use the supplied delimiter', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/spectra/upload',
        payload: { fileName: 'up.txt', content: '1 2\n3 4', delimiter: ' ' },
      });

      expect(response.statusCode).toBe(201);
      const body = JSON.parse(response.payload);
      expect(body.spectrum.name).toBe('up.txt');
      expect(body.spectrum.points).toBe(2);
      expect(body.reports).toEqual([]);
    });
  });

  describe('Spectrum Routes', () => {
    it('should list loaded spectra in import order', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/spectra' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.payload);
      expect(body.total).toBe(2);
      expect(body.spectra.map((s: { name: string }) => s.name)).toEqual(['run1.txt', 'up.txt']);
    });

    it('should return details and series', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/spectra/run1.txt' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.payload);
      expect(body.details.title).toBe('Run 1');
      expect(body.details.points).toBe(40);
      expect(body.details.range).toBe('400 nm to 439 nm');
      expect(body.wavelength).toHaveLength(40);
      expect(body.intensity[20]).toBe(400);
    });

    it('should return 404 for an unknown spectrum', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/spectra/nope.txt' });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.payload).error).toBe('NOT_FOUND');
    });

    it('should detect peaks', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/spectra/run1.txt/peaks?normalize=true' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.payload);
      expect(body.normalized).toBe(true);
      expect(body.peaks).toHaveLength(1);
      expect(body.peaks[0].label).toBe('420 nm');
    });

    it('should refuse peaks for a series shorter than the window', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/spectra/up.txt/peaks' });

      expect(response.statusCode).toBe(422);
      expect(JSON.parse(response.payload).error).toBe('SERIES_TOO_SHORT');
    });
  });

  describe('Rendering', () => {
    it('should describe the plot', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/render?showPeaks=1' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.payload);
      expect(body.xLabel).toBe('Wavelength λ in nm');
      expect(body.yLabel).toBe('Warning: different units.');
      expect(body.series).toHaveLength(2);
      expect(body.series[0].peaks).toHaveLength(1);
      expect(body.series[1].peakError).toBe('Series has 2 points; smoothing needs at least 31');
      expect(body.warnings).toHaveLength(1);
      expect(body.reports).toEqual([
        {
          kind: 'UnitsMismatchWarning',
          message: 'The units of the loaded files differ; the data may not be comparable.',
        },
      ]);
    });

    it('should reject an invalid flag', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/render?normalize=maybe' });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('Removal', () => {
    it('should remove a spectrum once', async () => {
      const first = await app.inject({ method: 'DELETE', url: '/api/spectra/up.txt' });
      expect(first.statusCode).toBe(200);
      expect(JSON.parse(first.payload)).toEqual({ success: true, name: 'up.txt' });

      const second = await app.inject({ method: 'DELETE', url: '/api/spectra/up.txt' });
      expect(second.statusCode).toBe(404);
    });
  });

  describe('MCP endpoint', () => {
    it('should refuse GET in stateless mode', async () => {
      const response = await app.inject({ method: 'GET', url: '/mcp' });

      expect(response.statusCode).toBe(405);
    });
  });
});
