/**
 * Handlers module
 *
 * File-level extract and import operations shared by the CLI entry points
 * and the MCP tools.
 */

export { extractMissingTranslations } from "./extract-handler.js";
export { importTranslations } from "./import-handler.js";
export {
  fileNotFound,
  type SyncErrorCode,
  type SyncFailure,
  type SyncReporter,
  type ExtractSuccess,
  type ExtractResult,
  type ImportSuccess,
  type ImportResult,
} from "./types.js";
