/**
 * Add Dev Command
 *
 * Adds a developer to the registry, replacing one with the same id.
 */

import { addDeveloper, loadRegistry, saveRegistry } from "@/cli/config.js";
import { formatErrorChain } from "@/cli/errors.js";
import { error, success } from "@/cli/logger.js";

/**
 * Main function for add-dev command
 * @param args - Configuration arguments
 * @param args.configDir - Directory holding the registry
 * @param args.id - Developer id used in tags and repository lists
 * @param args.name - Display name for the co-author trailer
 * @param args.email - Email for the co-author trailer
 *
 * @returns Whether the developer was saved
 */
export const addDevMain = async (args: {
  configDir: string;
  id: string;
  name: string;
  email: string;
}): Promise<{ success: boolean }> => {
  const { configDir, id, name, email } = args;

  try {
    const registry = await loadRegistry({ configDir });
    const updated = addDeveloper({ registry, id, name, email });
    await saveRegistry({ configDir, registry: updated });
  } catch (err) {
    error({ message: formatErrorChain(err) });
    return { success: false };
  }

  success({ message: `Added dev ${id}: ${name} <${email}>` });
  return { success: true };
};
