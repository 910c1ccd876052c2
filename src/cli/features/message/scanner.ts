/**
 * Message scanner
 *
 * Extracts the issue reference, existing co-authors and the leading tag
 * group from a raw commit message. Body extraction runs in two passes:
 * the first records where metadata sits, the second rebuilds the body
 * from everything outside those spans.
 */

import { parseIdentity } from "@/cli/features/message/identity.js";
import {
  CO_AUTHOR_LABEL,
  CO_AUTHOR_LINE_PREFIX,
  ISSUE_ID_LABEL,
  isIssueId,
} from "@/cli/features/message/issueId.js";

import type {
  Developer,
  MetadataKind,
  MetadataSpan,
  ScannedMessage,
} from "@/cli/features/message/types.js";

/** A closing bracket beyond this index does not close a tag group */
export const MAX_TAG_GROUP_END = 50;

/**
 * Split a message into lines, dropping a trailing carriage return per line
 * @param args - Configuration arguments
 * @param args.message - Raw message text
 *
 * @returns The message lines
 */
const splitLines = (args: { message: string }): Array<string> => {
  const { message } = args;
  const lines = message.split("\n");
  // A final newline does not start another line
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
};

/**
 * Find the first well-formed `Issue-id: ` line
 * @param args - Configuration arguments
 * @param args.message - Raw message text
 *
 * @returns The verbatim issue id, or "" when there is none
 */
export const findExistingIssueId = (args: { message: string }): string => {
  for (const line of splitLines(args)) {
    if (!line.startsWith(ISSUE_ID_LABEL)) {
      continue;
    }

    const candidate = line.slice(ISSUE_ID_LABEL.length);
    if (isIssueId({ candidate })) {
      return candidate;
    }
  }

  return "";
};

/**
 * Parse every `Co-authored-by` line
 * @param args - Configuration arguments
 * @param args.message - Raw message text
 *
 * @throws MalformedIdentityError when a co-author line has no email
 *
 * @returns Co-authors in order of appearance
 */
export const findExistingCoAuthors = (args: {
  message: string;
}): Array<Developer> => {
  return splitLines(args)
    .filter((line) => line.startsWith(CO_AUTHOR_LINE_PREFIX))
    .map((line) => parseIdentity({ identity: line }));
};

/**
 * Extract the bracketed tag group at the very start of the message
 *
 * The group must close on the first line at an index no greater than
 * MAX_TAG_GROUP_END. Its content is split on `,` if present, else on `|`,
 * else kept as a single tag. Tokens are not trimmed.
 *
 * @param args - Configuration arguments
 * @param args.message - Raw message text
 *
 * @returns The tags and the offset right after `]`; no tags and offset 0 when absent
 */
export const findFirstLineTags = (args: {
  message: string;
}): { tags: Array<string>; end: number } => {
  const { message } = args;
  const none = { tags: [], end: 0 };

  if (!message.startsWith("[")) {
    return none;
  }

  for (let i = 0; i < message.length; i++) {
    const ch = message[i];

    if (i > MAX_TAG_GROUP_END || ch === "\n") {
      return none;
    }

    if (ch === "]") {
      const content = message.slice(1, i);
      if (content.includes(",")) {
        return { tags: content.split(","), end: i + 1 };
      }
      if (content.includes("|")) {
        return { tags: content.split("|"), end: i + 1 };
      }
      return { tags: [content], end: i + 1 };
    }
  }

  return none;
};

/**
 * Record every occurrence of a label at or after an offset
 * @param args - Configuration arguments
 * @param args.text - Text to search
 * @param args.label - Label to look for
 * @param args.kind - Span kind to record
 * @param args.from - Offset to start searching at
 *
 * @returns Spans in ascending order
 */
const findLabelSpans = (args: {
  text: string;
  label: string;
  kind: MetadataKind;
  from: number;
}): Array<MetadataSpan> => {
  const { text, label, kind, from } = args;
  const spans: Array<MetadataSpan> = [];

  let idx = text.indexOf(label, from);
  while (idx !== -1) {
    spans.push({ kind, start: idx, end: idx + label.length });
    idx = text.indexOf(label, idx + label.length);
  }

  return spans;
};

/**
 * Build the body from the text between the metadata spans
 *
 * The body starts after the tag group. Trailers start at the first issue
 * label, or at the first co-author label when there is no issue label.
 * The body ends one character before that point, which drops the newline
 * that separates it from the trailers.
 *
 * @param args - Configuration arguments
 * @param args.text - Raw message text
 * @param args.spans - Metadata spans found in `text`
 *
 * @returns The trimmed body
 */
export const extractBody = (args: {
  text: string;
  spans: ReadonlyArray<MetadataSpan>;
}): string => {
  const { text, spans } = args;

  const tagGroup = spans.find((span) => span.kind === "tag-group");
  const bodyStart = tagGroup == null ? 0 : tagGroup.end;

  const trailerStart =
    spans.find((span) => span.kind === "issue-label") ??
    spans.find((span) => span.kind === "co-author-label");

  const bodyEnd =
    trailerStart == null
      ? text.length
      : Math.max(trailerStart.start - 1, bodyStart);

  return text.slice(bodyStart, bodyEnd).trim();
};

/**
 * Scan a raw commit message
 * @param args - Configuration arguments
 * @param args.message - Raw message text
 *
 * @throws MalformedIdentityError when a co-author line has no email
 *
 * @returns The extracted metadata and cleaned body
 */
export const scanMessage = (args: { message: string }): ScannedMessage => {
  const { message } = args;

  const existingIssueId = findExistingIssueId({ message });
  const existingCoAuthors = findExistingCoAuthors({ message });
  const { tags, end } = findFirstLineTags({ message });

  // Pass 1: locate metadata
  const spans: Array<MetadataSpan> = [];
  if (tags.length > 0) {
    spans.push({ kind: "tag-group", start: 0, end });
  }
  const labelSpans = [
    ...findLabelSpans({
      text: message,
      label: ISSUE_ID_LABEL,
      kind: "issue-label",
      from: end,
    }),
    ...findLabelSpans({
      text: message,
      label: CO_AUTHOR_LABEL,
      kind: "co-author-label",
      from: end,
    }),
  ].sort((a, b) => a.start - b.start);
  spans.push(...labelSpans);

  // Pass 2: rebuild the body outside those spans
  const body = extractBody({ text: message, spans });

  return {
    existingIssueId,
    existingCoAuthors,
    firstLineTags: tags,
    spans,
    body,
  };
};
