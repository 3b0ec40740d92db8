/**
 * get_translation_status MCP Tool
 * Summarize how much of a catalog is translated for the target locale
 */

import { z } from "zod";
import { existsSync } from "fs";
import { readFile } from "fs/promises";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { TARGET_LOCALE, DEFAULT_CATALOG_PATH } from "../config/env.js";
import { fileNotFound } from "../handlers/index.js";
import {
  parseXCStringsContent,
  summarizeTranslationStatus,
} from "../utils/xcstrings-parser.js";
import { getSafeFilePath } from "../utils/validation.js";
import {
  projectPathSchema,
  toToolResponse,
  invalidPathOutput,
  type ToolErrorOutput,
  type ToolResponse,
} from "./tool-helpers.js";

// Input schema
const GetTranslationStatusSchema = z.object({
  project_path: projectPathSchema,
  catalog_path: z
    .string()
    .default(DEFAULT_CATALOG_PATH)
    .describe("Path to the .xcstrings catalog, relative to the project root"),
});

export type GetTranslationStatusInput = z.infer<typeof GetTranslationStatusSchema>;

// Output type
interface StatusOutput {
  success: true;
  catalog_path: string;
  locale: string;
  status: "complete" | "incomplete";
  keys: {
    total: number;
    translated: number;
    missing: number;
  };
  missing_by_reason: Record<string, number>;
}

type GetTranslationStatusOutput = StatusOutput | ToolErrorOutput;

/**
 * Run the tool against parsed arguments
 */
export async function handleGetTranslationStatus(
  args: unknown
): Promise<GetTranslationStatusOutput> {
  const input = GetTranslationStatusSchema.parse(args);
  const projectPath = input.project_path || process.cwd();

  const catalogPath = getSafeFilePath(input.catalog_path, projectPath);
  if (!catalogPath) return invalidPathOutput(input.catalog_path);

  if (!existsSync(catalogPath)) {
    return fileNotFound("CATALOG_NOT_FOUND", catalogPath);
  }

  const catalog = parseXCStringsContent(await readFile(catalogPath, "utf-8"));
  const summary = summarizeTranslationStatus(catalog, TARGET_LOCALE);

  return {
    success: true,
    catalog_path: catalogPath,
    locale: summary.locale,
    status: summary.missingCount === 0 ? "complete" : "incomplete",
    keys: {
      total: summary.totalKeys,
      translated: summary.translatedCount,
      missing: summary.missingCount,
    },
    missing_by_reason: summary.missingByReason,
  };
}

/**
 * Register the get_translation_status tool with the MCP server
 */
export function registerGetTranslationStatus(server: McpServer): void {
  server.tool(
    "get_translation_status",
    `Count how many .xcstrings entries are translated for '${TARGET_LOCALE}' and break down the missing ones by reason (no localization, or the state Xcode recorded).`,
    GetTranslationStatusSchema.shape,
    async (args): Promise<ToolResponse> =>
      toToolResponse(await handleGetTranslationStatus(args))
  );
}
