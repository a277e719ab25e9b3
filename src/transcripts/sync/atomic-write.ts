import { promises as fs } from "node:fs";
import { dirname } from "node:path";

/**
 * Write a file through a uniquely named temp file and rename it into place.
 * Readers see either the old contents or the new ones, never a partial write.
 */
export async function writeFileAtomic(targetPath: string, contents: string): Promise<void> {
  await fs.mkdir(dirname(targetPath), { recursive: true });

  const tempPath = `${targetPath}.tmp.${Date.now()}.${Math.random().toString(36).substring(2, 9)}`;
  try {
    await fs.writeFile(tempPath, contents, "utf-8");
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
