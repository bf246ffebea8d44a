#!/usr/bin/env node
/**
 * PO Catalog MCP Server Entry Point
 *
 * This MCP server lets AI assistants inspect and maintain gettext PO/POT
 * catalogs in a project.
 *
 * Tools available:
 * - parse_catalog: Parse one catalog file
 * - get_catalog_status: Translation progress of every PO file
 * - merge_catalogs: Update a PO file from a POT template
 * - translate_message: Look up a message with plural and placeholder handling
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./server.js";

async function main(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();

  await server.connect(transport);
}

main().catch((error) => {
  console.error("Failed to start PO catalog MCP server:", error);
  process.exit(1);
});
