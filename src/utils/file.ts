/**
 * File helpers
 */

import { randomUUID } from "crypto";
import * as fs from "fs/promises";
import * as path from "path";

/**
 * Replace a file's content in one step
 *
 * The content goes to a temporary file in the same directory, which is then
 * renamed over the target. On failure the target is left untouched and the
 * temporary file is removed.
 *
 * @param args - Configuration arguments
 * @param args.filePath - File to replace
 * @param args.content - New content
 * @param args.mode - File mode for the new file (defaults to the target's current mode, else 0o644)
 */
export const writeFileAtomic = async (args: {
  filePath: string;
  content: string;
  mode?: number | null;
}): Promise<void> => {
  const { filePath, content } = args;
  const dir = path.dirname(filePath);
  const tempPath = path.join(
    dir,
    `.${path.basename(filePath)}.${randomUUID()}.tmp`,
  );

  let mode = args.mode ?? 0o644;
  if (args.mode == null) {
    try {
      const stat = await fs.stat(filePath);
      mode = stat.mode & 0o777;
    } catch {
      // New file: keep the default mode
      mode = 0o644;
    }
  }

  try {
    await fs.writeFile(tempPath, content, { mode });
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
};
