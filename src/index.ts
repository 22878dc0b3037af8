/**
 * spectrum-reader: import, inspect and plot UV-Vis instrument exports.
 *
 * This is the main entry point for the library.
 */

// Parsing, collection and peak detection
export * from './spectrum/index.js';

// Plot data and spectrum details
export * from './render/index.js';

// Instrument export directory
export * from './source/index.js';

// Configuration
export type { AppConfig, ServerSettings, CorsConfig, ImportConfig, LogLevel } from './config/types.js';
export { DEFAULT_CONFIG } from './config/types.js';
export { loadConfig, ConfigValidationError } from './config/loader.js';

// HTTP API
export type {
  ApiError,
  ImportResponse,
  UploadResponse,
  SpectrumResponse,
  PeaksResponse,
  RenderResponse,
  HealthResponse,
  ServerConfig,
} from './api/types.js';
export { createSpectrumHandlers, registerRoutes } from './api/index.js';
export type { SpectrumHandlers, RouteOptions } from './api/index.js';

// MCP
export { createMcpServer, mcpPlugin } from './mcp/index.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext } from './server.js';
