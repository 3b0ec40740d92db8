/**
 * Result shapes shared by the extract and import handlers
 */

import type { MissingTranslationsReport } from "../utils/xcstrings-parser.js";

export type SyncErrorCode = "CATALOG_NOT_FOUND" | "TRANSLATIONS_NOT_FOUND";

export interface SyncFailure {
  success: false;
  error: {
    code: SyncErrorCode;
    message: string;
  };
}

export interface ExtractSuccess {
  success: true;
  missingCount: number;
  reportPath: string;
  report: MissingTranslationsReport;
}

export interface ImportSuccess {
  success: true;
  updatedCount: number;
  updatedKeys: string[];
  unknownKeys: string[];
  invalidKeys: string[];
  catalogPath: string;
}

/**
 * Progress callbacks a front end can pass to the handlers.
 * They fire before the output file is written, so a failed write still
 * leaves the count and warnings on screen.
 */
export interface SyncReporter {
  missingFound?(count: number): void;
  unknownKey?(key: string): void;
  invalidKey?(key: string): void;
}

export type ExtractResult = ExtractSuccess | SyncFailure;
export type ImportResult = ImportSuccess | SyncFailure;

/**
 * Build the failure result for an input file that does not exist
 */
export function fileNotFound(code: SyncErrorCode, filePath: string): SyncFailure {
  return {
    success: false,
    error: {
      code,
      message: `Error: ${filePath} not found.`,
    },
  };
}
