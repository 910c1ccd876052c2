/**
 * Commit message rewrite pipeline: scan, resolve, render
 */

import { orderCoAuthors, renderMessage } from "@/cli/features/message/renderer.js";
import { resolveAttribution } from "@/cli/features/message/resolver.js";
import { scanMessage } from "@/cli/features/message/scanner.js";

import type { DeveloperLookup } from "@/cli/features/message/resolver.js";
import type {
  Developer,
  RepositoryDefaults,
} from "@/cli/features/message/types.js";

/**
 * Outcome of rewriting one message
 */
export type RewriteResult = {
  message: string;
  issueId: string;
  credited: Array<Developer>;
  skipped: Array<Developer>;
};

/**
 * Rewrite a raw commit message
 * @param args - Configuration arguments
 * @param args.message - Raw message text
 * @param args.author - Commit author
 * @param args.lookupDeveloper - Registry lookup by developer id
 * @param args.repo - Defaults of the repository the commit belongs to
 *
 * @throws MalformedIdentityError when a co-author line cannot be parsed
 * @throws UnknownDeveloperError when a developer id is not in the registry
 *
 * @returns The replacement message and what went into it
 */
export const rewriteMessage = (args: {
  message: string;
  author: Developer;
  lookupDeveloper: DeveloperLookup;
  repo: RepositoryDefaults;
}): RewriteResult => {
  const { message, author, lookupDeveloper, repo } = args;

  const scanned = scanMessage({ message });
  const attribution = resolveAttribution({ scanned, lookupDeveloper, repo });
  const { credited, skipped } = orderCoAuthors({
    developers: attribution.developers,
    author,
  });

  return {
    message: renderMessage({ body: scanned.body, attribution, author }),
    issueId: attribution.issueId,
    credited,
    skipped,
  };
};
