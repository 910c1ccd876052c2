/**
 * Add Repo Command
 *
 * Registers a repository path with its default developers.
 */

import { addRepo, loadRegistry, saveRegistry } from "@/cli/config.js";
import { formatErrorChain } from "@/cli/errors.js";
import { error, info, success } from "@/cli/logger.js";
import { normalizeDir } from "@/utils/path.js";

/**
 * Main function for add-repo command
 * @param args - Configuration arguments
 * @param args.configDir - Directory holding the registry
 * @param args.repoPath - Repository path, relative paths resolve against cwd
 * @param args.devIds - Default developer ids
 * @param args.issueId - Issue id stored with the repository (null for none)
 *
 * @returns Whether the repository was saved
 */
export const addRepoMain = async (args: {
  configDir: string;
  repoPath: string;
  devIds: Array<string>;
  issueId?: string | null;
}): Promise<{ success: boolean }> => {
  const { configDir, devIds, issueId } = args;
  const repoPath = normalizeDir({ dir: args.repoPath });

  try {
    const registry = await loadRegistry({ configDir });
    const updated = addRepo({ registry, path: repoPath, devIds, issueId });
    await saveRegistry({ configDir, registry: updated });
  } catch (err) {
    error({ message: formatErrorChain(err) });
    return { success: false };
  }

  const devList = devIds.length > 0 ? devIds.join(", ") : "(none)";
  success({ message: `Added repo ${repoPath} with devs ${devList}` });
  if (devIds.length === 0) {
    info({
      message: "Commits in this repo will only credit developers named in tags",
    });
  }
  return { success: true };
};
