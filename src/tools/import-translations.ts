/**
 * import_translations MCP Tool
 * Merge translated items into an .xcstrings catalog and mark them translated
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  TARGET_LOCALE,
  DEFAULT_CATALOG_PATH,
  DEFAULT_TRANSLATIONS_PATH,
} from "../config/env.js";
import { importTranslations } from "../handlers/index.js";
import { getSafeFilePath } from "../utils/validation.js";
import {
  projectPathSchema,
  toToolResponse,
  invalidPathOutput,
  type ToolErrorOutput,
  type ToolResponse,
} from "./tool-helpers.js";

// Input schema
const ImportTranslationsSchema = z.object({
  project_path: projectPathSchema,
  catalog_path: z
    .string()
    .default(DEFAULT_CATALOG_PATH)
    .describe("Path to the .xcstrings catalog, relative to the project root"),
  translations_path: z
    .string()
    .default(DEFAULT_TRANSLATIONS_PATH)
    .describe(
      "JSON file mapping catalog keys to translated text, relative to the project root"
    ),
});

export type ImportTranslationsInput = z.infer<typeof ImportTranslationsSchema>;

// Output types
interface ImportOutput {
  success: true;
  locale: string;
  updated_count: number;
  updated_keys: string[];
  unknown_keys: string[];
  invalid_keys: string[];
  catalog_path: string;
  message: string;
}

type ImportTranslationsOutput = ImportOutput | ToolErrorOutput;

/**
 * Run the tool against parsed arguments
 */
export async function handleImportTranslations(
  args: unknown
): Promise<ImportTranslationsOutput> {
  const input = ImportTranslationsSchema.parse(args);
  const projectPath = input.project_path || process.cwd();

  const catalogPath = getSafeFilePath(input.catalog_path, projectPath);
  if (!catalogPath) return invalidPathOutput(input.catalog_path);

  const translationsPath = getSafeFilePath(input.translations_path, projectPath);
  if (!translationsPath) return invalidPathOutput(input.translations_path);

  const result = await importTranslations({
    catalogPath,
    translationsPath,
    targetLocale: TARGET_LOCALE,
  });

  if (!result.success) {
    return result;
  }

  const warnings =
    result.unknownKeys.length > 0
      ? ` ${result.unknownKeys.length} keys not found in catalog.`
      : "";

  return {
    success: true,
    locale: TARGET_LOCALE,
    updated_count: result.updatedCount,
    updated_keys: result.updatedKeys,
    unknown_keys: result.unknownKeys,
    invalid_keys: result.invalidKeys,
    catalog_path: result.catalogPath,
    message: `Successfully updated ${result.updatedCount} translations in ${result.catalogPath}.${warnings}`,
  };
}

/**
 * Register the import_translations tool with the MCP server
 */
export function registerImportTranslations(server: McpServer): void {
  server.tool(
    "import_translations",
    `Write translated text from a JSON key/value file into the '${TARGET_LOCALE}' localization of matching .xcstrings entries, set their state to translated, and save the catalog. Keys missing from the catalog are reported and skipped.`,
    ImportTranslationsSchema.shape,
    async (args): Promise<ToolResponse> =>
      toToolResponse(await handleImportTranslations(args))
  );
}
