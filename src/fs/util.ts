import * as fs from "node:fs/promises";

/**
 * Check if a path (file or directory) exists.
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
