/**
 * extract_missing_translations MCP Tool
 * Write a report of catalog strings that still lack a finished translation
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  TARGET_LOCALE,
  DEFAULT_CATALOG_PATH,
  DEFAULT_REPORT_PATH,
} from "../config/env.js";
import { extractMissingTranslations } from "../handlers/index.js";
import type { MissingTranslationsReport } from "../utils/xcstrings-parser.js";
import { getSafeFilePath } from "../utils/validation.js";
import {
  projectPathSchema,
  toToolResponse,
  invalidPathOutput,
  type ToolErrorOutput,
  type ToolResponse,
} from "./tool-helpers.js";

// Input schema
const ExtractMissingTranslationsSchema = z.object({
  project_path: projectPathSchema,
  catalog_path: z
    .string()
    .default(DEFAULT_CATALOG_PATH)
    .describe("Path to the .xcstrings catalog, relative to the project root"),
  output_path: z
    .string()
    .default(DEFAULT_REPORT_PATH)
    .describe("Where to write the report, relative to the project root"),
});

export type ExtractMissingTranslationsInput = z.infer<
  typeof ExtractMissingTranslationsSchema
>;

// Output types
interface ExtractOutput {
  success: true;
  locale: string;
  missing_count: number;
  report_path: string;
  missing: MissingTranslationsReport;
  message: string;
}

type ExtractMissingTranslationsOutput = ExtractOutput | ToolErrorOutput;

/**
 * Run the tool against parsed arguments
 */
export async function handleExtractMissingTranslations(
  args: unknown
): Promise<ExtractMissingTranslationsOutput> {
  const input = ExtractMissingTranslationsSchema.parse(args);
  const projectPath = input.project_path || process.cwd();

  const catalogPath = getSafeFilePath(input.catalog_path, projectPath);
  if (!catalogPath) return invalidPathOutput(input.catalog_path);

  const reportPath = getSafeFilePath(input.output_path, projectPath);
  if (!reportPath) return invalidPathOutput(input.output_path);

  const result = await extractMissingTranslations({
    catalogPath,
    reportPath,
    targetLocale: TARGET_LOCALE,
  });

  if (!result.success) {
    return result;
  }

  return {
    success: true,
    locale: TARGET_LOCALE,
    missing_count: result.missingCount,
    report_path: result.reportPath,
    missing: result.report,
    message: `Found ${result.missingCount} missing translations. Exported to ${result.reportPath}`,
  };
}

/**
 * Register the extract_missing_translations tool with the MCP server
 */
export function registerExtractMissingTranslations(server: McpServer): void {
  server.tool(
    "extract_missing_translations",
    `Find every string in an .xcstrings catalog whose '${TARGET_LOCALE}' translation is absent or not marked translated, and write them (source text and developer comment) to a JSON report for translation.`,
    ExtractMissingTranslationsSchema.shape,
    async (args): Promise<ToolResponse> =>
      toToolResponse(await handleExtractMissingTranslations(args))
  );
}
