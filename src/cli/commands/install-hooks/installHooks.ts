/**
 * Install Hooks Command
 *
 * Installs the commit message hooks into a git repository, asking before
 * replacing existing hooks when running interactively.
 */

import { cancel, confirm, isCancel } from "@clack/prompts";

import {
  findExistingHooks,
  installHooks,
} from "@/cli/commands/install-hooks/hookInstaller.js";
import { formatErrorChain } from "@/cli/errors.js";
import { error, isSilentMode, success, warn } from "@/cli/logger.js";

/**
 * Main function for install-hooks command
 * @param args - Configuration arguments
 * @param args.repoDir - Repository working directory
 * @param args.overwrite - Replace existing hooks without asking
 * @param args.command - Command the hooks use to invoke the CLI
 * @param args.nonInteractive - Never prompt
 *
 * @returns Whether the hooks were installed
 */
export const installHooksMain = async (args: {
  repoDir: string;
  overwrite?: boolean | null;
  command?: string | null;
  nonInteractive?: boolean | null;
}): Promise<{ success: boolean }> => {
  const { repoDir, command } = args;
  let overwrite = args.overwrite ?? false;
  const interactive =
    !args.nonInteractive && !isSilentMode() && process.stdin.isTTY === true;

  try {
    if (!overwrite && interactive) {
      const existing = await findExistingHooks({ repoDir });
      if (existing.length > 0) {
        const confirmed = await confirm({
          message: `Replace existing hooks (${existing.join(", ")})?`,
          initialValue: false,
        });
        if (isCancel(confirmed) || !confirmed) {
          cancel("Hooks left unchanged.");
          return { success: false };
        }
        overwrite = true;
      }
    }

    if (overwrite) {
      for (const hookPath of await findExistingHooks({ repoDir })) {
        warn({ message: `Replacing ${hookPath}` });
      }
    }

    const written = await installHooks({ repoDir, overwrite, command });
    for (const hookPath of written) {
      success({ message: `Installed ${hookPath}` });
    }
    return { success: true };
  } catch (err) {
    error({ message: formatErrorChain(err) });
    return { success: false };
  }
};
