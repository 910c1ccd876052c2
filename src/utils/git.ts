/**
 * Git invocation helpers
 */

import { execFileSync } from "child_process";

import { GitCommandError } from "@/cli/errors.js";

/**
 * Read a git logical variable (see `git var -l`)
 * @param args - Configuration arguments
 * @param args.name - Variable name, e.g. GIT_AUTHOR_IDENT
 * @param args.cwd - Directory to run git in
 *
 * @throws GitCommandError when git fails
 *
 * @returns The variable's value with the trailing newline removed
 */
export const gitVar = (args: { name: string; cwd?: string | null }): string => {
  const { name } = args;
  const cwd = args.cwd ?? process.cwd();

  try {
    const output = execFileSync("git", ["var", name], {
      cwd,
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "pipe"],
    });
    return output.replace(/\r?\n$/, "");
  } catch (err) {
    throw new GitCommandError({
      message: `git var ${name} failed`,
      command: `git var ${name}`,
      cause: err,
    });
  }
};

/**
 * Get the identity git will record as the commit author
 * @param args - Configuration arguments
 * @param args.cwd - Repository directory
 *
 * @returns "Name <email> <timestamp> <tz>" as printed by git
 */
export const getAuthorIdent = (args?: { cwd?: string | null }): string => {
  return gitVar({ name: "GIT_AUTHOR_IDENT", cwd: args?.cwd });
};
