/**
 * find_catalogs MCP Tool
 * Scan a project for String Catalog (.xcstrings) files
 */

import { z } from "zod";
import { glob } from "glob";
import { readFile } from "fs/promises";
import { relative } from "path";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { parseJsonSafe } from "../utils/json-parser.js";
import { getCatalogStrings } from "../utils/xcstrings-parser.js";
import {
  projectPathSchema,
  toToolResponse,
  type ToolResponse,
} from "./tool-helpers.js";

const CATALOG_GLOB = "**/*.xcstrings";

const IGNORED_DIRS = [
  "**/node_modules/**",
  "**/.git/**",
  "**/build/**",
  "**/DerivedData/**",
  "**/Pods/**",
];

// Input schema
const FindCatalogsSchema = z.object({
  project_path: projectPathSchema,
});

export type FindCatalogsInput = z.infer<typeof FindCatalogsSchema>;

// Output type
export interface FindCatalogsOutput {
  success: true;
  project_path: string;
  catalogs: Array<{
    path: string;
    /** null when the file is not a readable JSON object */
    key_count: number | null;
  }>;
}

/**
 * Count the entries of a catalog file
 */
async function countCatalogKeys(filePath: string): Promise<number | null> {
  const parsed = parseJsonSafe(await readFile(filePath, "utf-8"));
  if (!parsed) return null;
  return Object.keys(getCatalogStrings(parsed)).length;
}

/**
 * Run the tool against parsed arguments
 */
export async function handleFindCatalogs(
  args: unknown
): Promise<FindCatalogsOutput> {
  const input = FindCatalogsSchema.parse(args);
  const projectPath = input.project_path || process.cwd();

  const files = await glob(CATALOG_GLOB, {
    cwd: projectPath,
    absolute: true,
    nodir: true,
    ignore: IGNORED_DIRS,
  });
  files.sort();

  const catalogs: FindCatalogsOutput["catalogs"] = [];
  for (const file of files) {
    catalogs.push({
      path: relative(projectPath, file),
      key_count: await countCatalogKeys(file),
    });
  }

  return {
    success: true,
    project_path: projectPath,
    catalogs,
  };
}

/**
 * Register the find_catalogs tool with the MCP server
 */
export function registerFindCatalogs(server: McpServer): void {
  server.tool(
    "find_catalogs",
    "Scan the project for String Catalog (.xcstrings) files and report each one's path relative to the project root and its number of string keys.",
    FindCatalogsSchema.shape,
    async (args): Promise<ToolResponse> =>
      toToolResponse(await handleFindCatalogs(args))
  );
}
