/**
 * Types for the HTTP API layer.
 *
 * These types define request/response structures for the REST API.
 * They carry no parsing logic; everything here is shaped by the core.
 */

import type { SpectrumDetails, SpectrumSummary } from '../render/describeSpectrum.js';
import type { Drawable } from '../render/renderSpectra.js';
import type { ImportFailure } from '../spectrum/SpectrumImportService.js';
import type { Peak, ShellReport } from '../spectrum/types.js';

// ============================================================================
// Error Response
// ============================================================================

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error type/code */
  error: string;
  /** Human-readable message */
  message: string;
  /** Additional details (optional) */
  details?: unknown;
}

// ============================================================================
// Spectrum Endpoints
// ============================================================================

export type { ShellReport, SpectrumSummary };

export interface ImportResponse {
  imported: string[];
  failed: ImportFailure[];
  reports: ShellReport[];
}

export interface UploadResponse {
  spectrum: SpectrumSummary;
  reports: ShellReport[];
}

/**
 * Series as sent over the wire: NaN becomes null.
 */
export interface SpectrumResponse {
  details: SpectrumDetails;
  wavelength: number[];
  intensity: Array<number | null>;
}

export interface PeaksResponse {
  name: string;
  normalized: boolean;
  peaks: Peak[];
}

/**
 * Plot description plus the warnings reported while building it.
 */
export interface RenderResponse extends Drawable {
  reports: ShellReport[];
}

// ============================================================================
// Health
// ============================================================================

export interface HealthResponse {
  /** Status */
  status: 'ok' | 'degraded' | 'error';
  /** Timestamp */
  timestamp: string;
  /** Component statuses */
  components?: {
    spectra?: { loaded: number };
    source?: { directory: string };
  };
}

// ============================================================================
// Server Configuration
// ============================================================================

/**
 * Server configuration options.
 */
export interface ServerConfig {
  /** HTTP port (default: 3001) */
  port?: number;
  /** HTTP host (default: '0.0.0.0') */
  host?: string;
  /** Directory with instrument exports, relative to the base path (default: from config.yaml) */
  spectraDir?: string;
  /** Enable CORS (default: true) */
  cors?: boolean;
  /** Log level (default: 'info') */
  logLevel?: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
}
