/**
 * Fastify plugin that mounts MCP on a route prefix (stateless Streamable HTTP).
 *
 * Every POST gets a fresh server and transport, both closed when the
 * response ends. GET and DELETE answer 405: there is no SSE stream and no
 * session to tear down.
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

export interface McpPluginOptions extends FastifyPluginOptions {
  createServer: () => McpServer;
}

export async function mcpPlugin(
  fastify: FastifyInstance,
  opts: McpPluginOptions
): Promise<void> {
  // The transport parses the JSON-RPC body itself; keep it as a plain object here
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    try {
      done(null, JSON.parse(String(body)));
    } catch (err) {
      done(err instanceof Error ? err : new Error(String(err)), undefined);
    }
  });

  fastify.post('/', async (request, reply) => {
    const server = opts.createServer();
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    reply.raw.on('close', () => {
      transport.close().catch((err: unknown) => request.log.warn({ err }, 'MCP transport close failed'));
      server.close().catch((err: unknown) => request.log.warn({ err }, 'MCP server close failed'));
    });

    // SDK Transport type doesn't line up with exactOptionalPropertyTypes
    await server.connect(transport as unknown as Transport);

    // Fastify must not send a second response
    reply.hijack();
    await transport.handleRequest(request.raw, reply.raw, request.body);
  });

  fastify.get('/', async (_request, reply) => {
    return reply.code(405).send({ error: 'Method Not Allowed: stateless mode, no SSE' });
  });

  fastify.delete('/', async (_request, reply) => {
    return reply.code(405).send({ error: 'Method Not Allowed: stateless mode, no session teardown' });
  });
}
