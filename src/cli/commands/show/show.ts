/**
 * Show Command
 *
 * Prints the registry as JSON.
 */

import { getConfigPath, loadRegistry } from "@/cli/config.js";
import { formatErrorChain } from "@/cli/errors.js";
import { error } from "@/cli/logger.js";

/**
 * Main function for show command
 * @param args - Configuration arguments
 * @param args.configDir - Directory holding the registry
 *
 * @returns Whether the registry could be read
 */
export const showMain = async (args: {
  configDir: string;
}): Promise<{ success: boolean }> => {
  const { configDir } = args;

  try {
    const registry = await loadRegistry({ configDir });
    process.stdout.write(`${JSON.stringify(registry, null, 2)}\n`);
  } catch (err) {
    error({
      message: `cannot read ${getConfigPath({ configDir })}: ${formatErrorChain(err)}`,
    });
    return { success: false };
  }

  return { success: true };
};
