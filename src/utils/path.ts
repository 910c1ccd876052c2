/**
 * Path utility functions for the registry location and repository keys
 */

import * as os from "os";
import * as path from "path";

/**
 * Normalize a user-supplied directory path
 * @param args - Configuration arguments
 * @param args.dir - The directory (optional)
 * @param args.cwd - Directory that relative paths resolve against (defaults to process.cwd())
 *
 * @returns Absolute path without a trailing slash
 */
export const normalizeDir = (args: {
  dir?: string | null;
  cwd?: string | null;
}): string => {
  const { dir } = args;
  const cwd = args.cwd ?? process.cwd();

  // Use current working directory if no dir provided or empty
  if (dir == null || dir === "") {
    return cwd;
  }

  let normalizedPath = dir;

  // Expand tilde to home directory
  if (normalizedPath.startsWith("~/")) {
    normalizedPath = path.join(os.homedir(), normalizedPath.slice(2));
  } else if (normalizedPath === "~") {
    normalizedPath = os.homedir();
  }

  // Resolve relative paths to absolute
  if (!path.isAbsolute(normalizedPath)) {
    normalizedPath = path.join(cwd, normalizedPath);
  }

  // Normalize the path (resolves . and .., normalizes multiple slashes)
  normalizedPath = path.normalize(normalizedPath);

  // Remove trailing slash if present (except for root)
  if (normalizedPath.length > 1 && normalizedPath.endsWith("/")) {
    normalizedPath = normalizedPath.slice(0, -1);
  }

  return normalizedPath;
};

/**
 * Resolve the directory holding the registry file
 * Precedence: explicit option, PAIRTRAIL_CONFIG_DIR, home directory
 * @param args - Configuration arguments
 * @param args.configDir - Directory given on the command line
 *
 * @returns Absolute path of the config directory
 */
export const resolveConfigDir = (args?: {
  configDir?: string | null;
}): string => {
  const configDir = args?.configDir || process.env.PAIRTRAIL_CONFIG_DIR;
  if (configDir == null || configDir === "") {
    return os.homedir();
  }
  return normalizeDir({ dir: configDir });
};
