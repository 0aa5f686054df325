import * as fs from "node:fs/promises";
import * as path from "node:path";
import { randomBytes } from "node:crypto";

/**
 * Atomically replace the content of a text file.
 *
 * Uses the write-to-temp-then-rename pattern, which is atomic on POSIX
 * systems: readers see either the old content or the new, never a prefix.
 * The temp file lives beside the target so the rename never crosses a
 * filesystem. The parent directory must already exist.
 */
export async function safeWriteText(
  filePath: string,
  content: string,
): Promise<void> {
  const tmpSuffix = randomBytes(6).toString("hex");
  const tmpPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${tmpSuffix}.tmp`,
  );

  try {
    await fs.writeFile(tmpPath, content, "utf-8");
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true }).catch(() => undefined);
    throw error;
  }
}

/**
 * Atomically write JSON data to a file, creating parent directories.
 */
export async function safeWriteJson<T>(
  filePath: string,
  data: T,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await safeWriteText(filePath, JSON.stringify(data, null, 2) + "\n");
}
