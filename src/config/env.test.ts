import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { join, resolve } from "path";
import { loadSyncConfig, getBaseDir, TARGET_LOCALE } from "./env.js";

describe("loadSyncConfig", () => {
  beforeEach(() => {
    vi.stubEnv("XCSTRINGS_SYNC_DIR", "");
    vi.stubEnv("XCSTRINGS_CATALOG_PATH", "");
    vi.stubEnv("XCSTRINGS_REPORT_PATH", "");
    vi.stubEnv("XCSTRINGS_TRANSLATIONS_PATH", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should default to files in the working directory", () => {
    const config = loadSyncConfig();

    expect(config).toEqual({
      catalogPath: join(process.cwd(), "Localizable.xcstrings"),
      reportPath: join(process.cwd(), "missing_translations.json"),
      translationsPath: join(process.cwd(), "translated_items.json"),
      targetLocale: "zh-Hans",
    });
  });

  it("should resolve relative paths against XCSTRINGS_SYNC_DIR", () => {
    const baseDir = resolve("/work/scripts");
    vi.stubEnv("XCSTRINGS_SYNC_DIR", baseDir);
    vi.stubEnv("XCSTRINGS_CATALOG_PATH", "../App/Localizable.xcstrings");

    const config = loadSyncConfig();

    expect(getBaseDir()).toBe(baseDir);
    expect(config.catalogPath).toBe(resolve("/work/App/Localizable.xcstrings"));
    expect(config.reportPath).toBe(join(baseDir, "missing_translations.json"));
  });

  it("should keep absolute paths as given", () => {
    const reportPath = resolve("/tmp/out/report.json");
    vi.stubEnv("XCSTRINGS_REPORT_PATH", reportPath);

    expect(loadSyncConfig().reportPath).toBe(reportPath);
  });

  it("should always target the fixed locale", () => {
    expect(loadSyncConfig().targetLocale).toBe(TARGET_LOCALE);
  });
});
