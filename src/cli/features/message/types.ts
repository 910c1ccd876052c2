/**
 * Shared types for the commit message rewriting engine
 */

/**
 * A credited developer. Two developers with the same email are the same
 * person for de-duplication purposes.
 */
export type Developer = {
  name: string;
  email: string;
};

/**
 * Kind of metadata recognized in a raw commit message
 */
export type MetadataKind = "tag-group" | "issue-label" | "co-author-label";

/**
 * Location of a recognized metadata fragment in the message text
 * Offsets are string indices; `end` is exclusive.
 */
export type MetadataSpan = {
  kind: MetadataKind;
  start: number;
  end: number;
};

/**
 * Everything the scanner extracts from one raw commit message
 */
export type ScannedMessage = {
  /** Verbatim remainder of the first well-formed `Issue-id: ` line, or "" */
  existingIssueId: string;
  /** Parsed `Co-authored-by` lines in order of appearance */
  existingCoAuthors: Array<Developer>;
  /** Raw tokens of the leading `[...]` group, empty when there is none */
  firstLineTags: Array<string>;
  /** Metadata spans in message order; labels are only searched after the tag group */
  spans: Array<MetadataSpan>;
  /** Message body with all recognized metadata removed and whitespace trimmed */
  body: string;
};

/**
 * Repository defaults consulted when a message names no developers
 */
export type RepositoryDefaults = {
  /** Matched repository key, used in error messages */
  path: string;
  devIds: ReadonlyArray<string>;
};

/**
 * Final issue and developer set decided for a commit
 */
export type ResolvedAttribution = {
  issueId: string;
  /** Developers keyed by email */
  developers: Map<string, Developer>;
};
