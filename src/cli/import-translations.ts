#!/usr/bin/env node
/**
 * Merge translated items back into the catalog.
 * Paths come from XCSTRINGS_* environment variables; see config/env.ts.
 */

import { loadSyncConfig } from "../config/env.js";
import { runImportCommand } from "./commands.js";

runImportCommand(loadSyncConfig()).catch((error) => {
  console.error("Failed to import translations:", error);
  process.exit(1);
});
