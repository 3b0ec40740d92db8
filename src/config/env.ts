/**
 * Environment variable configuration for xcstrings-sync
 */

import { resolve } from "path";

/**
 * Locale whose translations are extracted and imported
 */
export const TARGET_LOCALE = "zh-Hans";

export const DEFAULT_CATALOG_PATH = "Localizable.xcstrings";
export const DEFAULT_REPORT_PATH = "missing_translations.json";
export const DEFAULT_TRANSLATIONS_PATH = "translated_items.json";

/**
 * File locations and locale for one extract or import run
 */
export interface SyncConfig {
  /** The .xcstrings catalog read by both operations and rewritten on import */
  catalogPath: string;
  /** Where the missing-translations report is written */
  reportPath: string;
  /** Translated items consumed by the importer */
  translationsPath: string;
  targetLocale: string;
}

/**
 * Get the directory relative paths are resolved against
 */
export function getBaseDir(): string {
  return process.env.XCSTRINGS_SYNC_DIR || process.cwd();
}

/**
 * Build the sync configuration from environment variables.
 * Relative paths resolve against XCSTRINGS_SYNC_DIR (or the working
 * directory); absolute paths are used as given.
 */
export function loadSyncConfig(): SyncConfig {
  const baseDir = getBaseDir();

  return {
    catalogPath: resolve(
      baseDir,
      process.env.XCSTRINGS_CATALOG_PATH || DEFAULT_CATALOG_PATH
    ),
    reportPath: resolve(
      baseDir,
      process.env.XCSTRINGS_REPORT_PATH || DEFAULT_REPORT_PATH
    ),
    translationsPath: resolve(
      baseDir,
      process.env.XCSTRINGS_TRANSLATIONS_PATH || DEFAULT_TRANSLATIONS_PATH
    ),
    targetLocale: TARGET_LOCALE,
  };
}
