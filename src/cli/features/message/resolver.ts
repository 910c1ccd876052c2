/**
 * Attribution resolver
 *
 * Decides the issue id and the developers to credit. Precedence:
 * first-line tags replace existing co-authors; repository defaults apply
 * only when neither names anybody.
 */

import { UnknownDeveloperError } from "@/cli/errors.js";
import { isIssueId } from "@/cli/features/message/issueId.js";

import type {
  Developer,
  RepositoryDefaults,
  ResolvedAttribution,
  ScannedMessage,
} from "@/cli/features/message/types.js";

/**
 * Registry lookup used by the resolver
 */
export type DeveloperLookup = (id: string) => Developer | null;

/**
 * Resolve the final issue id and developer set for a commit
 * @param args - Configuration arguments
 * @param args.scanned - Scanner output for the message
 * @param args.lookupDeveloper - Registry lookup by developer id
 * @param args.repo - Defaults of the repository the commit belongs to
 *
 * @throws UnknownDeveloperError when a tag or a repository default names an unknown id
 *
 * @returns The resolved attribution
 */
export const resolveAttribution = (args: {
  scanned: Pick<
    ScannedMessage,
    "existingIssueId" | "existingCoAuthors" | "firstLineTags"
  >;
  lookupDeveloper: DeveloperLookup;
  repo: RepositoryDefaults;
}): ResolvedAttribution => {
  const { scanned, lookupDeveloper, repo } = args;

  let developers = new Map<string, Developer>();
  let issueId = scanned.existingIssueId;

  for (const developer of scanned.existingCoAuthors) {
    developers.set(developer.email, developer);
  }

  if (scanned.firstLineTags.length > 0) {
    // Tags are an explicit override for this commit
    developers = new Map<string, Developer>();

    scanned.firstLineTags.forEach((tag, index) => {
      const developer = lookupDeveloper(tag);
      if (developer != null) {
        developers.set(developer.email, developer);
        return;
      }

      if (index === 0 && isIssueId({ candidate: tag })) {
        issueId = tag;
        return;
      }

      throw new UnknownDeveloperError({ developerId: tag, source: "tag" });
    });
  }

  if (developers.size === 0) {
    for (const devId of repo.devIds) {
      const developer = lookupDeveloper(devId);
      if (developer == null) {
        throw new UnknownDeveloperError({
          developerId: devId,
          source: "repository",
          repoPath: repo.path,
        });
      }
      developers.set(developer.email, developer);
    }
  }

  return { issueId, developers };
};
