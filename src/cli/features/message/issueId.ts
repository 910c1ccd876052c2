/**
 * Issue identifier rules shared by the scanner, resolver and renderer
 */

/** Trailer label for the issue reference */
export const ISSUE_ID_LABEL = "Issue-id: ";

/** Trailer label for co-author credits */
export const CO_AUTHOR_LABEL = "Co-authored-by:";

/** Lines starting with this are read back as existing co-authors */
export const CO_AUTHOR_LINE_PREFIX = "Co-authored-by";

// Unanchored: anything containing a digit, optionally after a leading '#'
const ISSUE_ID_PATTERN = /#?.*[0-9]+/;

const DECIMAL_INTEGER_PATTERN = /^[+-]?[0-9]+$/;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Check whether an issue id is a signed 64-bit decimal integer
 * @param args - Configuration arguments
 * @param args.issueId - Resolved issue identifier
 *
 * @returns True for values such as "42", "+7" or "-3" that fit in 64 bits
 */
export const isIntegerIssueId = (args: { issueId: string }): boolean => {
  const { issueId } = args;
  if (!DECIMAL_INTEGER_PATTERN.test(issueId)) {
    return false;
  }
  const value = BigInt(issueId);
  return value >= INT64_MIN && value <= INT64_MAX;
};

/**
 * Check the syntactic well-formedness of an issue identifier
 * @param args - Configuration arguments
 * @param args.candidate - Candidate issue identifier
 *
 * @returns True when the candidate contains at least one decimal digit
 */
export const isIssueId = (args: { candidate: string }): boolean => {
  return ISSUE_ID_PATTERN.test(args.candidate);
};

/**
 * Render the issue trailer line
 * 64-bit integers get a `#` prefix; anything else is emitted verbatim.
 * @param args - Configuration arguments
 * @param args.issueId - Resolved issue identifier
 *
 * @returns The `Issue-id: ` line without a trailing newline
 */
export const formatIssueLine = (args: { issueId: string }): string => {
  const { issueId } = args;
  if (isIntegerIssueId({ issueId })) {
    return `${ISSUE_ID_LABEL}#${issueId}`;
  }
  return `${ISSUE_ID_LABEL}${issueId}`;
};
