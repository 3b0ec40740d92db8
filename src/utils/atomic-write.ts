/**
 * Whole-file writes that never leave a half-written file behind
 */

import { writeFile, rename, rm, realpath, stat, chmod } from "fs/promises";
import { dirname, basename, join } from "path";

/**
 * Path of the scratch file used while writing `filePath`.
 * Lives in the same directory so the final rename stays on one filesystem.
 */
export function getTempPath(filePath: string): string {
  return join(
    dirname(filePath),
    `.${basename(filePath)}.${process.pid}.tmp`
  );
}

function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Resolve the file a write lands on: the end of a symlink chain, with its
 * permission bits. A target that does not exist yet has no mode.
 */
async function resolveWriteTarget(
  filePath: string
): Promise<{ path: string; mode: number | null }> {
  try {
    const path = await realpath(filePath);
    const { mode } = await stat(path);
    return { path, mode: mode & 0o7777 };
  } catch (err) {
    if (isNotFoundError(err)) {
      return { path: filePath, mode: null };
    }
    throw err;
  }
}

/**
 * Write UTF-8 content to a scratch file, then rename it over `filePath`.
 * Readers see either the previous content or the new content.
 *
 * A symlinked target stays a symlink: the file it points at is replaced.
 * An existing file keeps its permission bits.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string
): Promise<void> {
  const target = await resolveWriteTarget(filePath);
  const tempPath = getTempPath(target.path);

  try {
    await writeFile(tempPath, content, "utf-8");
    if (target.mode !== null) {
      await chmod(tempPath, target.mode);
    }
    await rename(tempPath, target.path);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}
