/**
 * Add Info Command
 *
 * Runs from the prepare-commit-msg and commit-msg hooks. Rewrites the
 * commit message file with the resolved issue id and co-author trailers.
 */

import * as fs from "fs/promises";

import { loadRegistry, lookupDeveloper, lookupRepo } from "@/cli/config.js";
import { UnresolvedRepositoryError, formatErrorChain } from "@/cli/errors.js";
import { formatIdentity, parseIdentity } from "@/cli/features/message/identity.js";
import { rewriteMessage } from "@/cli/features/message/rewrite.js";
import { debug, error } from "@/cli/logger.js";
import { writeFileAtomic } from "@/utils/file.js";
import { getAuthorIdent } from "@/utils/git.js";

import type { RewriteResult } from "@/cli/features/message/rewrite.js";

/**
 * Rewrite a commit message file in place
 * @param args - Configuration arguments
 * @param args.messageFile - Path of the commit message file
 * @param args.cwd - Repository working directory
 * @param args.configDir - Directory holding the registry
 *
 * @throws UnresolvedRepositoryError when cwd matches no configured repository
 * @throws MalformedIdentityError when the author or a co-author line cannot be parsed
 * @throws UnknownDeveloperError when a developer id is not in the registry
 *
 * @returns What was written
 */
export const addInfo = async (args: {
  messageFile: string;
  cwd: string;
  configDir: string;
}): Promise<RewriteResult> => {
  const { messageFile, cwd, configDir } = args;

  const registry = await loadRegistry({ configDir });

  const match = lookupRepo({ registry, path: cwd });
  if (match == null) {
    throw new UnresolvedRepositoryError(cwd);
  }

  const author = parseIdentity({ identity: getAuthorIdent({ cwd }) });

  let message: string;
  try {
    message = await fs.readFile(messageFile, "utf-8");
  } catch (err) {
    throw new Error(`read commit msg from file ${messageFile} failed`, {
      cause: err,
    });
  }

  const result = rewriteMessage({
    message,
    author,
    lookupDeveloper: (id) => lookupDeveloper({ registry, id }),
    repo: {
      path: match.repoPath,
      devIds: match.repo.devs,
    },
  });

  await writeFileAtomic({ filePath: messageFile, content: result.message });

  for (const developer of result.skipped) {
    debug({
      message: `skipping ${formatIdentity({ developer })} (same as author)`,
    });
  }
  for (const developer of result.credited) {
    debug({ message: `added ${formatIdentity({ developer })} as author` });
  }

  return result;
};

/**
 * Main function for add-info command
 * @param args - Configuration arguments
 * @param args.messageFile - Path of the commit message file
 * @param args.cwd - Repository working directory
 * @param args.configDir - Directory holding the registry
 *
 * @returns Whether the message was rewritten
 */
export const addInfoMain = async (args: {
  messageFile: string;
  cwd: string;
  configDir: string;
}): Promise<{ success: boolean }> => {
  try {
    await addInfo(args);
    return { success: true };
  } catch (err) {
    error({ message: formatErrorChain(err) });
    return { success: false };
  }
};
