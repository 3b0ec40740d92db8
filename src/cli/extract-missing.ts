#!/usr/bin/env node
/**
 * Write the report of strings still missing a translation.
 * Paths come from XCSTRINGS_* environment variables; see config/env.ts.
 */

import { loadSyncConfig } from "../config/env.js";
import { runExtractCommand } from "./commands.js";

runExtractCommand(loadSyncConfig()).catch((error) => {
  console.error("Failed to extract missing translations:", error);
  process.exit(1);
});
