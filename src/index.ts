#!/usr/bin/env node
/**
 * xcstrings-sync MCP Server Entry Point
 *
 * Lets AI assistants drive the String Catalog translation round trip:
 * export the strings that still need a translation, then import the
 * translated text back into the catalog.
 *
 * Tools available:
 * - find_catalogs: Scan project for .xcstrings files
 * - get_translation_status: Count translated vs missing entries
 * - extract_missing_translations: Write the missing-translations report
 * - import_translations: Merge translated items into the catalog
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./server.js";

async function main(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();

  await server.connect(transport);
}

main().catch((error) => {
  console.error("Failed to start xcstrings-sync MCP server:", error);
  process.exit(1);
});
