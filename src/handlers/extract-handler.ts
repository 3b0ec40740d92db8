/**
 * Extract handler
 *
 * Reads the catalog and writes a report of every entry whose target-locale
 * translation is absent or not marked "translated".
 */

import { existsSync } from "fs";
import { readFile, mkdir } from "fs/promises";
import { dirname } from "path";
import type { SyncConfig } from "../config/env.js";
import {
  parseXCStringsContent,
  readCatalogKeyOrder,
  collectMissingTranslations,
  reconstructReportContent,
} from "../utils/xcstrings-parser.js";
import { writeFileAtomic } from "../utils/atomic-write.js";
import {
  fileNotFound,
  type ExtractResult,
  type SyncReporter,
} from "./types.js";

/**
 * Run the extraction
 *
 * A missing catalog is reported as a failure result and nothing is written.
 * Malformed JSON and write errors are thrown.
 */
export async function extractMissingTranslations(
  config: Pick<SyncConfig, "catalogPath" | "reportPath" | "targetLocale">,
  reporter: SyncReporter = {}
): Promise<ExtractResult> {
  if (!existsSync(config.catalogPath)) {
    return fileNotFound("CATALOG_NOT_FOUND", config.catalogPath);
  }

  const content = await readFile(config.catalogPath, "utf-8");
  const catalog = parseXCStringsContent(content);
  const keyOrder = readCatalogKeyOrder(content);
  const report = collectMissingTranslations(
    catalog,
    config.targetLocale,
    keyOrder
  );
  const missingCount = Object.keys(report).length;

  console.error(
    `[EXTRACT] ${missingCount} entries missing '${config.targetLocale}' in ${config.catalogPath}`
  );

  reporter.missingFound?.(missingCount);

  // Ensure report directory exists
  await mkdir(dirname(config.reportPath), { recursive: true });
  await writeFileAtomic(
    config.reportPath,
    reconstructReportContent(report, keyOrder)
  );

  return {
    success: true,
    missingCount,
    reportPath: config.reportPath,
    report,
  };
}
