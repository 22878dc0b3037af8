/**
 * Configuration types for the spectrum-reader server.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to server configuration.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Top-level configuration.
 */
export interface AppConfig {
  server: ServerSettings;
  import: ImportConfig;
}

/**
 * Server settings.
 */
export interface ServerSettings {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * Where instrument exports are read from.
 */
export interface ImportConfig {
  /** Directory holding instrument exports, relative to the base path (default: 'spectra') */
  directory: string;
  /** File pattern offered for import (default: '*.txt') */
  pattern: string;
  /** List files in subdirectories too (default: false) */
  recursive: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  import: {
    directory: 'spectra',
    pattern: '*.txt',
    recursive: false,
  },
};
