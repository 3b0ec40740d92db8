/**
 * Tests for the console output of the extract and import commands
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { join } from "path";
import { copyFixtureToTemp, type TempTestDir } from "../helpers/temp-directory.js";
import { deleteFile, writeJsonFixture } from "../helpers/fixture-loader.js";
import { runExtractCommand, runImportCommand } from "../../src/cli/commands.js";
import type { SyncConfig } from "../../src/config/env.js";

describe("CLI Commands", () => {
  let tempDir: TempTestDir;
  let config: SyncConfig;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    tempDir = await copyFixtureToTemp("app-catalog");
    config = {
      catalogPath: join(tempDir.path, "Localizable.xcstrings"),
      reportPath: join(tempDir.path, "missing_translations.json"),
      translationsPath: join(tempDir.path, "translated_items.json"),
      targetLocale: "zh-Hans",
    };
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    await tempDir.cleanup();
    vi.restoreAllMocks();
  });

  describe("runExtractCommand", () => {
    it("should print the count and the report path", async () => {
      await runExtractCommand(config);

      expect(logSpy.mock.calls).toEqual([
        ["Found 4 missing translations."],
        [`Exported to ${config.reportPath}`],
      ]);
    });

    it("should print an error and return normally when the catalog is missing", async () => {
      await deleteFile(tempDir.path, "Localizable.xcstrings");

      await expect(runExtractCommand(config)).resolves.toBeUndefined();
      expect(logSpy.mock.calls).toEqual([[`Error: ${config.catalogPath} not found.`]]);
    });
  });

  describe("runImportCommand", () => {
    it("should warn about unknown keys and print the updated count", async () => {
      await runImportCommand(config);

      expect(logSpy.mock.calls).toEqual([
        ["Warning: Key 'Bye' not found in xcstrings file."],
        [`Successfully updated 2 translations in ${config.catalogPath}`],
      ]);
    });

    it("should warn about entries that are not objects", async () => {
      await writeJsonFixture(tempDir.path, "Localizable.xcstrings", {
        strings: { Broken: "oops" },
      });
      await writeJsonFixture(tempDir.path, "translated_items.json", { Broken: "坏" });

      await runImportCommand(config);

      expect(logSpy.mock.calls).toEqual([
        ["Warning: Entry for key 'Broken' is not an object; skipped."],
        [`Successfully updated 0 translations in ${config.catalogPath}`],
      ]);
    });

    it("should print an error and return normally when translations are missing", async () => {
      await deleteFile(tempDir.path, "translated_items.json");

      await expect(runImportCommand(config)).resolves.toBeUndefined();
      expect(logSpy.mock.calls).toEqual([
        [`Error: ${config.translationsPath} not found.`],
      ]);
    });
  });
});
