/**
 * Console front end for the extract and import operations
 *
 * Handled failures (a missing input file) print a message and return
 * normally, so the process still exits with status 0.
 */

import type { SyncConfig } from "../config/env.js";
import {
  extractMissingTranslations,
  importTranslations,
} from "../handlers/index.js";

export async function runExtractCommand(config: SyncConfig): Promise<void> {
  const result = await extractMissingTranslations(config, {
    missingFound: (count) => console.log(`Found ${count} missing translations.`),
  });

  if (!result.success) {
    console.log(result.error.message);
    return;
  }

  console.log(`Exported to ${result.reportPath}`);
}

export async function runImportCommand(config: SyncConfig): Promise<void> {
  const result = await importTranslations(config, {
    unknownKey: (key) =>
      console.log(`Warning: Key '${key}' not found in xcstrings file.`),
    invalidKey: (key) =>
      console.log(`Warning: Entry for key '${key}' is not an object; skipped.`),
  });

  if (!result.success) {
    console.log(result.error.message);
    return;
  }

  console.log(
    `Successfully updated ${result.updatedCount} translations in ${result.catalogPath}`
  );
}
