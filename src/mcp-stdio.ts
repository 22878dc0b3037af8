#!/usr/bin/env node
/**
 * MCP stdio transport entry point.
 *
 * Serves the spectrum tools over stdin/stdout without an HTTP server.
 * Usage: spectrum-reader-mcp [basePath]
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { initializeApp, installErrorBoundary } from './server.js';
import { createMcpServer } from './mcp/index.js';

async function main() {
  const basePath = process.argv[2] || process.env.APP_BASE_PATH || process.cwd();

  // stdout carries MCP JSON-RPC only
  const toStderr = (...args: unknown[]) => {
    process.stderr.write(args.map(String).join(' ') + '\n');
  };
  console.log = toStderr;
  console.warn = toStderr;
  console.error = toStderr;

  installErrorBoundary();

  console.log(`Initializing spectrum-reader MCP server (base: ${basePath})`);

  const ctx = await initializeApp(basePath);
  const mcpServer = createMcpServer(ctx);

  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);

  console.log('MCP server connected via stdio');
}

main().catch((err: unknown) => {
  process.stderr.write(`Fatal: ${String(err)}\n`);
  process.exit(1);
});
