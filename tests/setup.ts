import * as fs from "fs";
import * as path from "path";

import { afterAll, afterEach, beforeAll, vi } from "vitest";

const REGISTRY_FILE = ".pairtrail.json";

/**
 * List pairtrail artifacts a test may have leaked into a directory
 * @param dir - Directory to inspect
 *
 * @returns Relative paths of leaked files
 */
export const detectRegistryPollution = (dir: string): Array<string> => {
  const pollution: Array<string> = [];

  if (fs.existsSync(path.join(dir, REGISTRY_FILE))) {
    pollution.push(REGISTRY_FILE);
  }

  const hooksDir = path.join(dir, ".git", "hooks");
  for (const hook of ["prepare-commit-msg", "commit-msg"]) {
    const hookPath = path.join(hooksDir, hook);
    if (
      fs.existsSync(hookPath) &&
      fs.readFileSync(hookPath, "utf-8").includes(" add-info ")
    ) {
      pollution.push(path.join(".git", "hooks", hook));
    }
  }

  return pollution;
};

beforeAll(() => {
  process.env.NODE_ENV = "test";

  // Pre-test check: the working directory must not carry a registry
  const pollution = detectRegistryPollution(process.cwd());
  if (pollution.length > 0) {
    throw new Error(
      `CONTAINMENT BREAK: ${pollution.join(", ")} exists in CWD before tests run! ` +
        `Remove it and run tests again.`,
    );
  }
});

afterEach(() => {
  vi.clearAllMocks();
});

// Post-test check: tests must write registries and hooks into temp directories
afterAll(() => {
  const pollution = detectRegistryPollution(process.cwd());
  if (pollution.length > 0) {
    throw new Error(
      `CONTAINMENT BREAK: Tests created ${pollution.join(", ")} in CWD! ` +
        `Point configDir and repoDir at temp directories.`,
    );
  }
});
