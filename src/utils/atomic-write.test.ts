import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  mkdir,
  rm,
  readFile,
  readdir,
  writeFile,
  symlink,
  lstat,
  stat,
  chmod,
} from "fs/promises";
import { join } from "path";
import { tmpdir } from "os";
import { writeFileAtomic, getTempPath } from "./atomic-write.js";

describe("getTempPath", () => {
  it("should place the scratch file beside the target", () => {
    const result = getTempPath("/project/Localizable.xcstrings");

    expect(result).toBe(`/project/.Localizable.xcstrings.${process.pid}.tmp`);
  });
});

describe("writeFileAtomic", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `atomic-write-test-${Date.now()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("should create a new file", async () => {
    const filePath = join(testDir, "report.json");

    await writeFileAtomic(filePath, "{}\n");

    expect(await readFile(filePath, "utf-8")).toBe("{}\n");
  });

  it("should replace existing content and leave no scratch file", async () => {
    const filePath = join(testDir, "Localizable.xcstrings");
    await writeFile(filePath, "old", "utf-8");

    await writeFileAtomic(filePath, "新内容");

    expect(await readFile(filePath, "utf-8")).toBe("新内容");
    expect(await readdir(testDir)).toEqual(["Localizable.xcstrings"]);
  });

  it("should reject when the directory does not exist", async () => {
    const filePath = join(testDir, "missing", "report.json");

    await expect(writeFileAtomic(filePath, "{}")).rejects.toThrow();
  });

  it("should write through a symlink and keep the link", async () => {
    await mkdir(join(testDir, "shared"));
    const realPath = join(testDir, "shared", "Localizable.xcstrings");
    const linkPath = join(testDir, "Localizable.xcstrings");
    await writeFile(realPath, "old", "utf-8");
    await symlink(realPath, linkPath);

    await writeFileAtomic(linkPath, "new");

    expect((await lstat(linkPath)).isSymbolicLink()).toBe(true);
    expect(await readFile(realPath, "utf-8")).toBe("new");
    expect(await readdir(join(testDir, "shared"))).toEqual(["Localizable.xcstrings"]);
  });

  it("should keep the permission bits of an existing file", async () => {
    const filePath = join(testDir, "Localizable.xcstrings");
    await writeFile(filePath, "old", "utf-8");
    await chmod(filePath, 0o600);

    await writeFileAtomic(filePath, "new");

    expect((await stat(filePath)).mode & 0o777).toBe(0o600);
  });
});
