/**
 * Package version lookup
 */

import { existsSync, readFileSync } from "fs";
import { dirname, join, parse, resolve } from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Name of this package in package.json */
export const PACKAGE_NAME = "pairtrail";

/**
 * Read name and version from a package.json file
 * @param args - Configuration arguments
 * @param args.packageJsonPath - Path to package.json
 *
 * @returns Name and version, or null when unreadable
 */
const readPackageJson = (args: {
  packageJsonPath: string;
}): { name: string | null; version: string | null } | null => {
  try {
    const pkg: unknown = JSON.parse(readFileSync(args.packageJsonPath, "utf-8"));
    if (pkg == null || typeof pkg !== "object") {
      return null;
    }
    const name = "name" in pkg && typeof pkg.name === "string" ? pkg.name : null;
    const version =
      "version" in pkg && typeof pkg.version === "string" ? pkg.version : null;
    return { name, version };
  } catch {
    // Invalid JSON, keep searching
    return null;
  }
};

/**
 * Find the package root by walking up from the start directory
 * looking for package.json with name "pairtrail"
 *
 * @param args - Configuration arguments
 * @param args.startDir - Directory to start searching from
 *
 * @returns The path to the package root directory or null if not found
 */
export const findPackageRoot = (args: { startDir: string }): string | null => {
  const { startDir } = args;
  let currentDir = resolve(startDir);
  const root = parse(currentDir).root;
  const maxDepth = 10;
  let depth = 0;

  while (currentDir !== root && depth < maxDepth) {
    const packageJsonPath = join(currentDir, "package.json");
    if (existsSync(packageJsonPath)) {
      if (readPackageJson({ packageJsonPath })?.name === PACKAGE_NAME) {
        return currentDir;
      }
    }
    currentDir = dirname(currentDir);
    depth++;
  }

  return null;
};

/**
 * Get the current package version by reading package.json
 *
 * @param args - Optional configuration arguments
 * @param args.startDir - Directory to start searching from (defaults to current file's directory)
 *
 * @returns The current package version or null if not found
 */
export const getCurrentPackageVersion = (args?: {
  startDir?: string | null;
}): string | null => {
  const startDir = args?.startDir ?? __dirname;

  const packageRoot = findPackageRoot({ startDir });
  if (packageRoot == null) {
    return null;
  }

  return (
    readPackageJson({ packageJsonPath: join(packageRoot, "package.json") })
      ?.version ?? null
  );
};
