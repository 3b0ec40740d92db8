/**
 * Import handler
 *
 * Merges translated items into the catalog's target-locale slots, marks them
 * "translated" and rewrites the catalog in place.
 */

import { existsSync } from "fs";
import { readFile } from "fs/promises";
import type { SyncConfig } from "../config/env.js";
import {
  parseXCStringsContent,
  readCatalogKeyOrder,
  applyTranslations,
  reconstructXCStringsContent,
} from "../utils/xcstrings-parser.js";
import { parseTranslatedItems } from "../utils/validation.js";
import { writeFileAtomic } from "../utils/atomic-write.js";
import { scanMemberKeys, sortBySourceOrder } from "../utils/format-preserve.js";
import {
  fileNotFound,
  type ImportResult,
  type SyncReporter,
} from "./types.js";

/**
 * Run the import
 *
 * The catalog is checked before the translations file; either one missing is
 * reported as a failure result and the catalog is left untouched. Keys the
 * catalog does not contain are collected, not fatal. Malformed input and
 * write errors are thrown.
 */
export async function importTranslations(
  config: Pick<SyncConfig, "catalogPath" | "translationsPath" | "targetLocale">,
  reporter: SyncReporter = {}
): Promise<ImportResult> {
  if (!existsSync(config.catalogPath)) {
    return fileNotFound("CATALOG_NOT_FOUND", config.catalogPath);
  }

  if (!existsSync(config.translationsPath)) {
    return fileNotFound("TRANSLATIONS_NOT_FOUND", config.translationsPath);
  }

  const catalogContent = await readFile(config.catalogPath, "utf-8");
  const translationsContent = await readFile(config.translationsPath, "utf-8");
  const catalog = parseXCStringsContent(catalogContent);
  const translations = parseTranslatedItems(translationsContent);
  const translationOrder = scanMemberKeys(translationsContent, []) ?? [];

  const { catalog: updated, updatedKeys, unknownKeys, invalidKeys } =
    applyTranslations(
      catalog,
      config.targetLocale,
      translations,
      translationOrder
    );

  // Skipped keys in input order
  const unknown = new Set(unknownKeys);
  const invalid = new Set(invalidKeys);
  for (const key of sortBySourceOrder(Object.keys(translations), translationOrder)) {
    if (unknown.has(key)) reporter.unknownKey?.(key);
    if (invalid.has(key)) reporter.invalidKey?.(key);
  }

  console.error(
    `[IMPORT] ${updatedKeys.length} of ${Object.keys(translations).length} translations applied to '${config.targetLocale}'`
  );

  await writeFileAtomic(
    config.catalogPath,
    reconstructXCStringsContent(updated, readCatalogKeyOrder(catalogContent))
  );

  return {
    success: true,
    updatedCount: updatedKeys.length,
    updatedKeys,
    unknownKeys,
    invalidKeys,
    catalogPath: config.catalogPath,
  };
}
