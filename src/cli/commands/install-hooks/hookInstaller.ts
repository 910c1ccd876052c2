/**
 * Git hook installer
 *
 * Writes the prepare-commit-msg and commit-msg hooks that run
 * `pairtrail add-info` on the commit message file.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { fileURLToPath } from "url";

import { HookInstallError } from "@/cli/errors.js";

// Get directory of this file to resolve the CLI entry point
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/** Hook files written below .git, relative to it */
export const HOOK_FILES = ["hooks/prepare-commit-msg", "hooks/commit-msg"];

/**
 * Get the default command hooks use to invoke the CLI
 *
 * @returns `node <absolute path of the CLI entry point>`
 */
export const getDefaultHookCommand = (): string => {
  // This file is in cli/commands/install-hooks/, the entry point in cli/
  return `node ${path.join(__dirname, "..", "..", "pairtrail.js")}`;
};

/**
 * Render a hook script
 * @param args - Configuration arguments
 * @param args.command - Command that invokes the CLI
 *
 * @returns The shell script content
 */
export const renderHookScript = (args: { command: string }): string => {
  const { command } = args;
  return `#!/bin/sh\n${command} add-info $1\n`;
};

/**
 * Check whether a path exists
 * @param filePath - Path to check
 *
 * @returns True if it exists
 */
const pathExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};

/**
 * Get the hook files that already exist in a repository
 * @param args - Configuration arguments
 * @param args.repoDir - Repository working directory
 *
 * @returns Absolute paths of existing hook files
 */
export const findExistingHooks = async (args: {
  repoDir: string;
}): Promise<Array<string>> => {
  const gitDir = path.join(args.repoDir, ".git");
  const existing: Array<string> = [];

  for (const hookFile of HOOK_FILES) {
    const hookPath = path.join(gitDir, hookFile);
    if (await pathExists(hookPath)) {
      existing.push(hookPath);
    }
  }

  return existing;
};

/**
 * Install the hooks into a repository
 * @param args - Configuration arguments
 * @param args.repoDir - Repository working directory (must contain .git)
 * @param args.overwrite - Replace hook files that already exist
 * @param args.command - Command that invokes the CLI
 *
 * @throws HookInstallError when .git is missing, a hook exists without overwrite, or a write fails
 *
 * @returns Absolute paths of the written hook files
 */
export const installHooks = async (args: {
  repoDir: string;
  overwrite?: boolean | null;
  command?: string | null;
}): Promise<Array<string>> => {
  const { repoDir } = args;
  const overwrite = args.overwrite ?? false;
  const command = args.command || getDefaultHookCommand();
  const gitDir = path.join(repoDir, ".git");

  try {
    await fs.stat(gitDir);
  } catch (err) {
    throw new HookInstallError({
      message: `.git not found in ${repoDir}`,
      hookPath: gitDir,
      cause: err,
    });
  }

  if (!overwrite) {
    const existing = await findExistingHooks({ repoDir });
    if (existing.length > 0) {
      throw new HookInstallError({
        message: `${path.relative(gitDir, existing[0])} is already defined`,
        hookPath: existing[0],
      });
    }
  }

  const script = renderHookScript({ command });
  const written: Array<string> = [];

  for (const hookFile of HOOK_FILES) {
    const hookPath = path.join(gitDir, hookFile);
    try {
      await fs.mkdir(path.dirname(hookPath), { recursive: true });
      await fs.writeFile(hookPath, script, { mode: 0o755 });
      await fs.chmod(hookPath, 0o755);
    } catch (err) {
      throw new HookInstallError({
        message: `create hook file ${hookPath} failed`,
        hookPath,
        cause: err,
      });
    }
    written.push(hookPath);
  }

  return written;
};
