/**
 * MCP Server setup for PO catalog tooling
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerParseCatalog } from "./tools/parse-catalog.js";
import { registerGetCatalogStatus } from "./tools/get-catalog-status.js";
import { registerMergeCatalogs } from "./tools/merge-catalogs.js";
import { registerTranslateMessage } from "./tools/translate-message.js";

/**
 * Create and configure the MCP server
 */
export function createServer(): McpServer {
  const server = new McpServer({
    name: "po-catalog-mcp-server",
    version: "1.0.0",
  });

  // Register all tools
  registerParseCatalog(server);
  registerGetCatalogStatus(server);
  registerMergeCatalogs(server);
  registerTranslateMessage(server);

  return server;
}
