/**
 * Message renderer
 *
 * Emits the cleaned body, the issue trailer and the co-author trailers
 * sorted by email.
 */

import { formatIdentity } from "@/cli/features/message/identity.js";
import { formatIssueLine } from "@/cli/features/message/issueId.js";

import type {
  Developer,
  ResolvedAttribution,
} from "@/cli/features/message/types.js";

/**
 * Compare two strings by their UTF-8 bytes
 * @param a - First string
 * @param b - Second string
 *
 * @returns Negative, zero or positive like Array.prototype.sort expects
 */
export const compareBytes = (a: string, b: string): number => {
  return Buffer.compare(Buffer.from(a, "utf-8"), Buffer.from(b, "utf-8"));
};

/**
 * Check whether a developer is the commit author
 * Name and email must both match exactly.
 * @param args - Configuration arguments
 * @param args.developer - Credited developer
 * @param args.author - Commit author
 *
 * @returns True for the author themselves
 */
export const isSameIdentity = (args: {
  developer: Developer;
  author: Developer;
}): boolean => {
  const { developer, author } = args;
  return developer.name === author.name && developer.email === author.email;
};

/**
 * Order developers by email and split off the author
 * @param args - Configuration arguments
 * @param args.developers - Developers keyed by email
 * @param args.author - Commit author
 *
 * @returns Developers to credit and developers skipped as the author, both sorted by email
 */
export const orderCoAuthors = (args: {
  developers: ReadonlyMap<string, Developer>;
  author: Developer;
}): { credited: Array<Developer>; skipped: Array<Developer> } => {
  const { developers, author } = args;
  const credited: Array<Developer> = [];
  const skipped: Array<Developer> = [];

  const emails = [...developers.keys()].sort(compareBytes);
  for (const email of emails) {
    const developer = developers.get(email);
    if (developer == null) {
      continue;
    }
    if (isSameIdentity({ developer, author })) {
      skipped.push(developer);
    } else {
      credited.push(developer);
    }
  }

  return { credited, skipped };
};

/**
 * Render the full replacement commit message
 * @param args - Configuration arguments
 * @param args.body - Message body without metadata
 * @param args.attribution - Resolved issue id and developers
 * @param args.author - Commit author
 *
 * @returns The new message text
 */
export const renderMessage = (args: {
  body: string;
  attribution: ResolvedAttribution;
  author: Developer;
}): string => {
  const { body, attribution, author } = args;

  let rendered = `${body.trim()}\n\n`;

  if (attribution.issueId !== "") {
    rendered += `${formatIssueLine({ issueId: attribution.issueId })}\n\n`;
  }

  const { credited } = orderCoAuthors({
    developers: attribution.developers,
    author,
  });
  for (const developer of credited) {
    rendered += `Co-authored-by: ${formatIdentity({ developer })}\n`;
  }

  return rendered;
};
