/**
 * Update Repo Devs Command
 *
 * Replaces the default developers of the repository the working
 * directory belongs to.
 */

import {
  loadRegistry,
  lookupRepo,
  saveRegistry,
  updateRepoDevelopers,
} from "@/cli/config.js";
import { formatErrorChain } from "@/cli/errors.js";
import { error, success } from "@/cli/logger.js";

/**
 * Main function for update-repo-devs command
 * @param args - Configuration arguments
 * @param args.configDir - Directory holding the registry
 * @param args.cwd - Directory identifying the repository
 * @param args.devIds - New default developer ids
 *
 * @returns Whether the repository was updated
 */
export const updateRepoDevsMain = async (args: {
  configDir: string;
  cwd: string;
  devIds: Array<string>;
}): Promise<{ success: boolean }> => {
  const { configDir, cwd, devIds } = args;

  let repoPath: string;
  try {
    const registry = await loadRegistry({ configDir });
    const updated = updateRepoDevelopers({ registry, path: cwd, devIds });
    await saveRegistry({ configDir, registry: updated });
    repoPath = lookupRepo({ registry, path: cwd })?.repoPath ?? cwd;
  } catch (err) {
    error({ message: formatErrorChain(err) });
    return { success: false };
  }

  success({ message: `Updated devs of ${repoPath}: ${devIds.join(", ")}` });
  return { success: true };
};
