/**
 * MCP Server setup for xcstrings-sync
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerFindCatalogs } from "./tools/find-catalogs.js";
import { registerGetTranslationStatus } from "./tools/get-translation-status.js";
import { registerExtractMissingTranslations } from "./tools/extract-missing-translations.js";
import { registerImportTranslations } from "./tools/import-translations.js";

/**
 * Create and configure the MCP server
 */
export function createServer(): McpServer {
  const server = new McpServer({
    name: "xcstrings-sync",
    version: "1.0.0",
  });

  // Register all tools
  registerFindCatalogs(server);
  registerGetTranslationStatus(server);
  registerExtractMissingTranslations(server);
  registerImportTranslations(server);

  return server;
}
