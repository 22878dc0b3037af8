/**
 * Public exports for the MCP server layer.
 */

export { createMcpServer, MCP_SERVER_NAME, MCP_SERVER_VERSION } from './McpServerFactory.js';
export { mcpPlugin } from './fastifyPlugin.js';
export type { McpPluginOptions } from './fastifyPlugin.js';
export { jsonResult, errorResult, textResult, toolError } from './helpers.js';
