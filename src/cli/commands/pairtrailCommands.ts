/**
 * pairtrail CLI command registration functions
 *
 * Each function registers one command and hands its arguments to the
 * command's *Main implementation. A failed command exits with code 1.
 */

import * as path from "path";

import { addDevMain } from "@/cli/commands/add-dev/addDev.js";
import { addInfoMain } from "@/cli/commands/add-info/addInfo.js";
import { addRepoMain } from "@/cli/commands/add-repo/addRepo.js";
import { installHooksMain } from "@/cli/commands/install-hooks/installHooks.js";
import { showMain } from "@/cli/commands/show/show.js";
import { updateRepoDevsMain } from "@/cli/commands/update-repo-devs/updateRepoDevs.js";
import { normalizeDir, resolveConfigDir } from "@/utils/path.js";

import type { Command } from "commander";

/**
 * Options shared by every command
 */
export type GlobalOptions = {
  configDir?: string;
  silent?: boolean;
  nonInteractive?: boolean;
};

/**
 * Resolve the registry directory from the global options
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 *
 * @returns Absolute path of the config directory
 */
const getConfigDir = (args: { program: Command }): string => {
  const globalOpts = args.program.opts<GlobalOptions>();
  return resolveConfigDir({ configDir: globalOpts.configDir ?? null });
};

/**
 * Exit with a failure code when a command did not succeed
 * @param result - Command result
 * @param result.success - Whether the command succeeded
 */
const exitOnFailure = (result: { success: boolean }): void => {
  if (!result.success) {
    process.exit(1);
  }
};

/**
 * Register the 'add-dev' command
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerAddDevCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("add-dev <id> <name> <email>")
    .description("Add a developer (or replace one with the same id)")
    .action(async (id: string, name: string, email: string) => {
      exitOnFailure(
        await addDevMain({
          configDir: getConfigDir({ program }),
          id,
          name,
          email,
        }),
      );
    });
};

/**
 * Register the 'add-repo' command
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerAddRepoCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("add-repo <path> [devIds...]")
    .description("Register a repository with its default developers")
    .option(
      "--issue-id <id>",
      "Issue id to record for the repository (shown by show)",
    )
    .action(
      async (
        repoPath: string,
        devIds: Array<string>,
        options: { issueId?: string },
      ) => {
        exitOnFailure(
          await addRepoMain({
            configDir: getConfigDir({ program }),
            repoPath,
            devIds,
            issueId: options.issueId ?? null,
          }),
        );
      },
    );
};

/**
 * Register the 'update-repo-devs' command
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerUpdateRepoDevsCommand = (args: {
  program: Command;
}): void => {
  const { program } = args;

  program
    .command("update-repo-devs <devIds...>")
    .description("Replace the default developers of the current repository")
    .option("--repo <path>", "Directory inside the repository (default: cwd)")
    .action(async (devIds: Array<string>, options: { repo?: string }) => {
      exitOnFailure(
        await updateRepoDevsMain({
          configDir: getConfigDir({ program }),
          cwd: normalizeDir({ dir: options.repo ?? null }),
          devIds,
        }),
      );
    });
};

/**
 * Register the 'install-hooks' command
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerInstallHooksCommand = (args: {
  program: Command;
}): void => {
  const { program } = args;

  program
    .command("install-hooks [path]")
    .description(
      "Install prepare-commit-msg and commit-msg hooks into a repository",
    )
    .option("--overwrite", "Replace existing hooks")
    .option("--command <command>", "Command the hooks run to invoke pairtrail")
    .action(
      async (
        repoPath: string | undefined,
        options: { overwrite?: boolean; command?: string },
      ) => {
        const globalOpts = program.opts<GlobalOptions>();
        exitOnFailure(
          await installHooksMain({
            repoDir: normalizeDir({ dir: repoPath ?? null }),
            overwrite: options.overwrite ?? null,
            command: options.command ?? null,
            nonInteractive:
              (globalOpts.nonInteractive ?? false) ||
              (globalOpts.silent ?? false),
          }),
        );
      },
    );
};

/**
 * Register the 'add-info' command
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerAddInfoCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("add-info <messageFile>")
    .description(
      "Rewrite a commit message file with issue and co-author trailers (run by the hooks)",
    )
    .action(async (messageFile: string) => {
      exitOnFailure(
        await addInfoMain({
          messageFile: path.resolve(messageFile),
          cwd: process.cwd(),
          configDir: getConfigDir({ program }),
        }),
      );
    });
};

/**
 * Register the 'show' command
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerShowCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("show")
    .description("Print the registered developers and repositories")
    .action(async () => {
      exitOnFailure(await showMain({ configDir: getConfigDir({ program }) }));
    });
};
