/**
 * Identity line parsing
 *
 * Handles both `git var GIT_AUTHOR_IDENT` output
 * ("Jane Doe <jane@example.com> 1700000000 +0000") and trailer lines
 * ("Co-authored-by: Jane Doe <jane@example.com>").
 */

import { MalformedIdentityError } from "@/cli/errors.js";

import type { Developer } from "@/cli/features/message/types.js";

/**
 * Parse a `[label: ]Name <email>` string
 *
 * If a `:` appears before the `<`, the name starts two characters after it.
 * The name ends one character before the `<`.
 *
 * @param args - Configuration arguments
 * @param args.identity - The identity string
 *
 * @throws MalformedIdentityError when there is no `<email>` segment
 *
 * @returns The parsed name and email
 */
export const parseIdentity = (args: { identity: string }): Developer => {
  const { identity } = args;

  const openIdx = identity.indexOf("<");
  if (openIdx === -1) {
    throw new MalformedIdentityError(identity);
  }

  const closeIdx = identity.indexOf(">", openIdx + 1);
  if (closeIdx === -1) {
    throw new MalformedIdentityError(identity);
  }

  const colonIdx = identity.indexOf(":");
  const nameStart = colonIdx !== -1 && colonIdx < openIdx ? colonIdx + 2 : 0;
  const nameEnd = openIdx - 1;
  if (nameEnd < nameStart) {
    throw new MalformedIdentityError(identity);
  }

  return {
    name: identity.slice(nameStart, nameEnd),
    email: identity.slice(openIdx + 1, closeIdx),
  };
};

/**
 * Format a developer the way git trailers and identities print them
 * @param args - Configuration arguments
 * @param args.developer - The developer to format
 *
 * @returns "Name <email>"
 */
export const formatIdentity = (args: { developer: Developer }): string => {
  const { developer } = args;
  return `${developer.name} <${developer.email}>`;
};
