/**
 * Developer and repository registry
 * Functional library for loading, querying and updating the on-disk registry
 *
 * A loaded registry is a read-only snapshot. Mutations return a new
 * registry that callers persist with saveRegistry.
 */

import * as fs from "fs/promises";
import * as path from "path";

import AjvModule from "ajv";
import addFormatsModule from "ajv-formats";
import { minimatch } from "minimatch";

import {
  ConfigError,
  UnknownDeveloperError,
  UnresolvedRepositoryError,
} from "@/cli/errors.js";
import { writeFileAtomic } from "@/utils/file.js";

import type { Developer } from "@/cli/features/message/types.js";

// Both packages are CommonJS with the real export on `default`
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

/** Registry file name inside the config directory */
export const CONFIG_FILE_NAME = ".pairtrail.json";

/**
 * Default developers of a repository, plus an issue id kept for reference
 */
export type RepoConfig = {
  devs: ReadonlyArray<string>;
  issueId?: string | null;
};

/**
 * Registry snapshot
 */
export type Registry = {
  readonly devs: Readonly<Record<string, Developer>>;
  readonly repos: Readonly<Record<string, RepoConfig>>;
};

/**
 * Registry shape on disk, after schema defaults are applied
 */
type RawRegistry = {
  devs: Record<string, { name: string; email: string }>;
  repos: Record<string, { devs: Array<string>; issueId?: string }>;
};

// JSON schema for .pairtrail.json - single source of truth for validation
const registrySchema = {
  type: "object",
  properties: {
    devs: {
      type: "object",
      default: {},
      additionalProperties: {
        type: "object",
        properties: {
          name: { type: "string" },
          // Hand-edited entries load as long as they are non-empty
          email: { type: "string", minLength: 1 },
        },
        required: ["name", "email"],
        additionalProperties: false,
      },
    },
    repos: {
      type: "object",
      default: {},
      additionalProperties: {
        type: "object",
        properties: {
          devs: { type: "array", items: { type: "string" }, default: [] },
          issueId: { type: "string" },
        },
        additionalProperties: false,
      },
    },
  },
  required: ["devs", "repos"],
  additionalProperties: false,
};

// Configured Ajv instance for schema validation
const ajv = new Ajv({
  allErrors: true,
  useDefaults: true,
  removeAdditional: true,
});
addFormats(ajv);

// Compiled validator for registry schema
const validateRegistrySchema = ajv.compile<RawRegistry>(registrySchema);

// New developers must come with a well-formed address
const validateEmail = ajv.compile<string>({ type: "string", format: "email" });

/**
 * Get the path to the registry file
 * @param args - Configuration arguments
 * @param args.configDir - Directory holding the registry
 *
 * @returns The absolute path to .pairtrail.json
 */
export const getConfigPath = (args: { configDir: string }): string => {
  const { configDir } = args;
  return path.join(configDir, CONFIG_FILE_NAME);
};

/**
 * Create an empty registry
 *
 * @returns A registry with no developers and no repositories
 */
export const emptyRegistry = (): Registry => {
  return { devs: {}, repos: {} };
};

/**
 * Validate parsed registry data
 * @param args - Configuration arguments
 * @param args.data - Parsed JSON
 * @param args.configPath - Path reported in errors
 *
 * @throws ConfigError listing every schema violation
 *
 * @returns The validated registry
 */
export const parseRegistry = (args: {
  data: unknown;
  configPath: string;
}): Registry => {
  const { data, configPath } = args;

  // Validation applies defaults in place; never touch the caller's object
  const clone: unknown = JSON.parse(JSON.stringify(data ?? null));

  if (!validateRegistrySchema(clone)) {
    const errors = (validateRegistrySchema.errors ?? []).map(
      (err) => `${err.instancePath || "/"} ${err.message ?? "is invalid"}`,
    );
    throw new ConfigError({
      message: `invalid registry in ${configPath}: ${errors.join(", ")}`,
      configPath,
      errors,
    });
  }

  return { devs: clone.devs, repos: clone.repos };
};

/**
 * Load the registry from disk
 * A missing file yields an empty registry.
 * @param args - Configuration arguments
 * @param args.configDir - Directory holding the registry
 *
 * @throws ConfigError when the file cannot be read or is not a valid registry
 *
 * @returns The registry snapshot
 */
export const loadRegistry = async (args: {
  configDir: string;
}): Promise<Registry> => {
  const { configDir } = args;
  const configPath = getConfigPath({ configDir });

  try {
    await fs.access(configPath);
  } catch {
    return emptyRegistry();
  }

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError({
      message: `read registry from ${configPath} failed`,
      configPath,
      cause: err,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new ConfigError({
      message: `registry ${configPath} is not valid JSON`,
      configPath,
      cause: err,
    });
  }

  return parseRegistry({ data, configPath });
};

/**
 * Save the registry to disk, replacing the whole file
 * @param args - Configuration arguments
 * @param args.configDir - Directory holding the registry
 * @param args.registry - Registry to persist
 */
export const saveRegistry = async (args: {
  configDir: string;
  registry: Registry;
}): Promise<void> => {
  const { configDir, registry } = args;
  const configPath = getConfigPath({ configDir });

  await fs.mkdir(configDir, { recursive: true });
  await writeFileAtomic({
    filePath: configPath,
    content: `${JSON.stringify(registry, null, 2)}\n`,
  });
};

/**
 * Look up a developer by id
 * @param args - Configuration arguments
 * @param args.registry - Registry snapshot
 * @param args.id - Developer id
 *
 * @returns The developer, or null when the id is unknown
 */
export const lookupDeveloper = (args: {
  registry: Registry;
  id: string;
}): Developer | null => {
  const { registry, id } = args;
  if (!Object.hasOwn(registry.devs, id)) {
    return null;
  }
  return registry.devs[id];
};

/**
 * Find the repository entry for a working directory
 *
 * An exact key wins. Otherwise keys are tried in sorted order as the glob
 * `<key>/*`, which matches direct children of the key.
 *
 * @param args - Configuration arguments
 * @param args.registry - Registry snapshot
 * @param args.path - Working directory
 *
 * @returns The matched key and its entry, or null
 */
export const lookupRepo = (args: {
  registry: Registry;
  path: string;
}): { repoPath: string; repo: RepoConfig } | null => {
  const { registry } = args;
  const wd = args.path;

  if (Object.hasOwn(registry.repos, wd)) {
    return { repoPath: wd, repo: registry.repos[wd] };
  }

  const keys = Object.keys(registry.repos).sort();
  for (const key of keys) {
    const matched = minimatch(wd, `${key}/*`, {
      dot: true,
      nobrace: true,
      noext: true,
      nocomment: true,
      nonegate: true,
    });
    if (matched) {
      return { repoPath: key, repo: registry.repos[key] };
    }
  }

  return null;
};

/**
 * Check that every developer id exists
 * @param args - Configuration arguments
 * @param args.registry - Registry snapshot
 * @param args.ids - Developer ids
 *
 * @throws UnknownDeveloperError for the first unknown id
 */
export const validateDeveloperIds = (args: {
  registry: Registry;
  ids: ReadonlyArray<string>;
}): void => {
  const { registry, ids } = args;
  for (const id of ids) {
    if (lookupDeveloper({ registry, id }) == null) {
      throw new UnknownDeveloperError({ developerId: id, source: "repository" });
    }
  }
};

/**
 * Add or replace a developer
 * @param args - Configuration arguments
 * @param args.registry - Registry snapshot
 * @param args.id - Developer id
 * @param args.name - Display name
 * @param args.email - Email address
 *
 * @throws ConfigError when the email is not a valid address
 *
 * @returns The updated registry
 */
export const addDeveloper = (args: {
  registry: Registry;
  id: string;
  name: string;
  email: string;
}): Registry => {
  const { registry, id, name, email } = args;

  if (!validateEmail(email)) {
    throw new ConfigError({
      message: `invalid email "${email}" for dev ${id}`,
      configPath: CONFIG_FILE_NAME,
      errors: (validateEmail.errors ?? []).map(
        (err) => err.message ?? "is invalid",
      ),
    });
  }

  const next: Registry = {
    devs: { ...registry.devs, [id]: { name, email } },
    repos: registry.repos,
  };
  return parseRegistry({ data: next, configPath: CONFIG_FILE_NAME });
};

/**
 * Add or replace a repository
 * @param args - Configuration arguments
 * @param args.registry - Registry snapshot
 * @param args.path - Repository path (used as the lookup key)
 * @param args.devIds - Default developer ids
 * @param args.issueId - Issue id stored with the repository (null for none)
 *
 * @throws UnknownDeveloperError when a developer id is unknown
 *
 * @returns The updated registry
 */
export const addRepo = (args: {
  registry: Registry;
  path: string;
  devIds: ReadonlyArray<string>;
  issueId?: string | null;
}): Registry => {
  const { registry, devIds, issueId } = args;
  validateDeveloperIds({ registry, ids: devIds });

  const repo: RepoConfig =
    issueId != null && issueId !== ""
      ? { devs: [...devIds], issueId }
      : { devs: [...devIds] };

  return {
    devs: registry.devs,
    repos: { ...registry.repos, [args.path]: repo },
  };
};

/**
 * Replace the default developers of the repository matching a path
 * @param args - Configuration arguments
 * @param args.registry - Registry snapshot
 * @param args.path - Working directory
 * @param args.devIds - New default developer ids
 *
 * @throws UnresolvedRepositoryError when no repository matches the path
 * @throws UnknownDeveloperError when a developer id is unknown
 *
 * @returns The updated registry
 */
export const updateRepoDevelopers = (args: {
  registry: Registry;
  path: string;
  devIds: ReadonlyArray<string>;
}): Registry => {
  const { registry, devIds } = args;

  const match = lookupRepo({ registry, path: args.path });
  if (match == null) {
    throw new UnresolvedRepositoryError(args.path);
  }
  validateDeveloperIds({ registry, ids: devIds });

  return {
    devs: registry.devs,
    repos: {
      ...registry.repos,
      [match.repoPath]: { ...match.repo, devs: [...devIds] },
    },
  };
};
