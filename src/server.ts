/**
 * Server entry point for the spectrum-reader API.
 *
 * This module:
 * - Initializes all components (config, source directory, collection, importer)
 * - Creates Fastify server with routes and the MCP endpoint
 * - Provides both programmatic API and CLI usage
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { resolve } from 'node:path';

import { loadConfig } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { createLocalSpectrumSource, type LocalSpectrumSource } from './source/LocalSpectrumSource.js';
import { SpectrumCollection } from './spectrum/SpectrumCollection.js';
import { SpectrumImportService } from './spectrum/SpectrumImportService.js';
import { createSpectrumHandlers } from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';
import type { ServerConfig } from './api/types.js';
import { createMcpServer, mcpPlugin } from './mcp/index.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  basePath: string;
  appConfig: AppConfig;
  configPath: string;
  source: LocalSpectrumSource;
  collection: SpectrumCollection;
  importer: SpectrumImportService;
}

/**
 * Initialize all application components.
 */
export async function initializeApp(
  basePath: string,
  config: ServerConfig = {}
): Promise<AppContext> {
  console.log(`Initializing app with base path: ${basePath}`);

  const configPath = process.env.CONFIG_PATH || resolve(basePath, 'config.yaml');
  const appConfig = await loadConfig({ configPath });

  const spectraDir = resolve(basePath, config.spectraDir ?? appConfig.import.directory);
  console.log(`Reading instrument exports from: ${spectraDir}`);

  const source = createLocalSpectrumSource({ basePath: spectraDir });
  const collection = new SpectrumCollection();
  const importer = new SpectrumImportService(collection, source);

  console.log('App initialized');

  return {
    basePath,
    appConfig,
    configPath,
    source,
    collection,
    importer,
  };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(
  ctx: AppContext,
  config: ServerConfig = {}
): Promise<ReturnType<typeof Fastify>> {
  // Explicit options win over config.yaml
  const logLevel = config.logLevel ?? ctx.appConfig.server.logLevel;
  const corsEnabled = config.cors ?? ctx.appConfig.server.cors.enabled;

  const fastify = Fastify({
    logger: {
      level: logLevel,
    },
  });

  if (corsEnabled) {
    const origins = ctx.appConfig.server.cors.origins;
    await fastify.register(cors, {
      origin: origins.includes('*') ? true : origins,
      methods: ['GET', 'HEAD', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'Mcp-Session-Id'],
    });
  }

  const spectrumHandlers = createSpectrumHandlers(ctx);

  // MCP over Streamable HTTP on /mcp
  await fastify.register(mcpPlugin, { prefix: '/mcp', createServer: () => createMcpServer(ctx) });

  await fastify.register(async (instance) => {
    registerRoutes(instance, {
      spectrumHandlers,
      spectrumCount: () => ctx.collection.size,
      sourceDirectory: () => ctx.source.basePath,
    });
  }, { prefix: '/api' });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(
  basePath: string,
  config: ServerConfig = {}
): Promise<void> {
  try {
    const ctx = await initializeApp(basePath, config);
    const fastify = await createServer(ctx, config);

    const port = config.port ?? ctx.appConfig.server.port;
    const host = config.host ?? ctx.appConfig.server.host;
    await fastify.listen({ port, host });

    console.log(`Server listening on http://${host}:${port}`);

    const shutdown = async () => {
      console.log('\nShutting down...');
      await fastify.close();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

/**
 * Log failures nothing else caught as structured JSON on stderr, without exiting.
 */
export function installErrorBoundary(): void {
  process.on('uncaughtException', (err) => {
    console.error(JSON.stringify({
      level: 'error',
      kind: 'UncaughtException',
      name: err.name,
      message: err.message,
      stack: err.stack,
    }));
  });
  process.on('unhandledRejection', (reason) => {
    console.error(JSON.stringify({
      level: 'error',
      kind: 'UnhandledRejection',
      message: reason instanceof Error ? reason.message : String(reason),
    }));
  });
}

/**
 * CLI entry point.
 */
async function main() {
  installErrorBoundary();

  const basePath = process.env.APP_BASE_PATH || process.cwd();
  const config: ServerConfig = {};
  if (process.env.PORT) config.port = parseInt(process.env.PORT, 10);
  if (process.env.HOST) config.host = process.env.HOST;

  await startServer(basePath, config);
}

// Run if executed directly
// Note: ESM doesn't have require.main, use import.meta instead
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch((err: unknown) => {
    console.error('Fatal:', err);
    process.exit(1);
  });
}
