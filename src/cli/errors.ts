/**
 * Error types for pairtrail
 *
 * Every failure is terminal: commands report the error with its cause chain
 * and exit, leaving the message file and registry untouched.
 */

/**
 * An identity string has no parseable `<email>` segment
 */
export class MalformedIdentityError extends Error {
  readonly identity: string;

  constructor(identity: string) {
    super(`malformed identity "${identity.trim()}": expected "Name <email>"`);
    this.name = "MalformedIdentityError";
    this.identity = identity;
  }
}

/**
 * Where an unknown developer id was referenced from
 */
export type DeveloperReferenceSource = "tag" | "repository";

/**
 * A first-line tag or a repository default list names a developer id
 * that is absent from the registry
 */
export class UnknownDeveloperError extends Error {
  readonly developerId: string;
  readonly source: DeveloperReferenceSource;
  readonly repoPath: string | null;

  constructor(args: {
    developerId: string;
    source: DeveloperReferenceSource;
    repoPath?: string | null;
  }) {
    const { developerId, source } = args;
    const repoPath = args.repoPath ?? null;
    super(
      source === "tag"
        ? `non-existing dev ${developerId} provided in the first line`
        : repoPath != null
          ? `non-existing dev ${developerId} marked as working for repo ${repoPath}`
          : `no dev with id ${developerId} found`,
    );
    this.name = "UnknownDeveloperError";
    this.developerId = developerId;
    this.source = source;
    this.repoPath = repoPath;
  }
}

/**
 * The working directory matches no configured repository
 */
export class UnresolvedRepositoryError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`no repo with path ${path} found`);
    this.name = "UnresolvedRepositoryError";
    this.path = path;
  }
}

/**
 * The registry file could not be read, parsed or validated
 */
export class ConfigError extends Error {
  readonly configPath: string;
  readonly errors: Array<string>;

  constructor(args: {
    message: string;
    configPath: string;
    errors?: Array<string> | null;
    cause?: unknown;
  }) {
    const { message, configPath, cause } = args;
    super(message, cause === undefined ? undefined : { cause });
    this.name = "ConfigError";
    this.configPath = configPath;
    this.errors = args.errors ?? [];
  }
}

/**
 * Git hooks could not be installed into a repository
 */
export class HookInstallError extends Error {
  readonly hookPath: string;

  constructor(args: { message: string; hookPath: string; cause?: unknown }) {
    const { message, hookPath, cause } = args;
    super(message, cause === undefined ? undefined : { cause });
    this.name = "HookInstallError";
    this.hookPath = hookPath;
  }
}

/**
 * A git invocation failed
 */
export class GitCommandError extends Error {
  readonly command: string;

  constructor(args: { message: string; command: string; cause?: unknown }) {
    const { message, command, cause } = args;
    super(message, cause === undefined ? undefined : { cause });
    this.name = "GitCommandError";
    this.command = command;
  }
}

/**
 * Render an error and its causes as a single line
 * @param err - The error to render
 *
 * @returns Messages of the error and each cause, joined by ": "
 */
export const formatErrorChain = (err: unknown): string => {
  const messages: Array<string> = [];
  let current: unknown = err;

  while (current != null && messages.length < 10) {
    if (current instanceof Error) {
      messages.push(current.message);
      current = current.cause;
    } else {
      messages.push(String(current));
      current = null;
    }
  }

  return messages.join(": ");
};
