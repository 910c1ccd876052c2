import { describe, it, expect } from "vitest";

import { UnknownDeveloperError } from "@/cli/errors.js";

import { rewriteMessage } from "./rewrite.js";

import type { DeveloperLookup } from "./resolver.js";
import type { Developer, RepositoryDefaults } from "./types.js";

const ALICE: Developer = { name: "Alice A", email: "a@x.com" };
const BOB: Developer = { name: "Bob B", email: "b@x.com" };
const CAROL: Developer = { name: "Carol C", email: "c@x.com" };

const registryLookup =
  (developers: Record<string, Developer>): DeveloperLookup =>
  (id) =>
    Object.hasOwn(developers, id) ? developers[id] : null;

const lookupDeveloper = registryLookup({
  alice: ALICE,
  bob: BOB,
  carol: CAROL,
});

const REPO: RepositoryDefaults = { path: "/work/api", devIds: [] };

describe("rewriteMessage", () => {
  it("should take the issue from the first tag and credit the rest", () => {
    const result = rewriteMessage({
      message: "[42,alice] Fix bug",
      author: BOB,
      lookupDeveloper,
      repo: REPO,
    });

    expect(result.message).toBe(
      "Fix bug\n\nIssue-id: #42\n\nCo-authored-by: Alice A <a@x.com>\n",
    );
    expect(result.issueId).toBe("42");
    expect(result.credited).toEqual([ALICE]);
  });

  it("should reject an issue number that is not the first tag", () => {
    expect(() =>
      rewriteMessage({
        message: "[alice,42] Fix bug",
        author: BOB,
        lookupDeveloper,
        repo: REPO,
      }),
    ).toThrow(UnknownDeveloperError);
  });

  it("should fall back to repository developers for an issue-only tag", () => {
    const result = rewriteMessage({
      message: "[99] Fix bug",
      author: CAROL,
      lookupDeveloper,
      repo: { ...REPO, devIds: ["alice", "bob"] },
    });

    expect(result.message).toBe(
      "Fix bug\n\n" +
        "Issue-id: #99\n\n" +
        "Co-authored-by: Alice A <a@x.com>\n" +
        "Co-authored-by: Bob B <b@x.com>\n",
    );
  });

  it("should fail when the first tag is an unknown developer", () => {
    expect(() =>
      rewriteMessage({
        message: "[bob,carol] Fix bug",
        author: ALICE,
        lookupDeveloper: registryLookup({ alice: ALICE, carol: CAROL }),
        repo: REPO,
      }),
    ).toThrow("non-existing dev bob provided in the first line");
  });

  it("should not credit the author among repository developers", () => {
    const result = rewriteMessage({
      message: "Fix bug",
      author: ALICE,
      lookupDeveloper,
      repo: { ...REPO, devIds: ["alice", "bob"] },
    });

    expect(result.message).toBe("Fix bug\n\nCo-authored-by: Bob B <b@x.com>\n");
    expect(result.skipped).toEqual([ALICE]);
  });

  it("should render no co-author lines when only the author is credited", () => {
    const result = rewriteMessage({
      message: "Fix bug\n",
      author: ALICE,
      lookupDeveloper,
      repo: { ...REPO, devIds: ["alice"] },
    });

    expect(result.message).toBe("Fix bug\n\n");
  });

  it("should replace existing co-authors with tagged developers", () => {
    const result = rewriteMessage({
      message: "[carol] Fix\n\nCo-authored-by: Alice A <a@x.com>\n",
      author: BOB,
      lookupDeveloper,
      repo: REPO,
    });

    expect(result.message).toBe("Fix\n\nCo-authored-by: Carol C <c@x.com>\n");
  });

  it("should be idempotent when re-run on its own output", () => {
    const repo = { ...REPO, devIds: ["alice", "bob"] };
    const first = rewriteMessage({
      message: "[7] Fix bug\n\nLonger explanation.\n",
      author: CAROL,
      lookupDeveloper,
      repo,
    });
    expect(first.message).toBe(
      "Fix bug\n\nLonger explanation.\n\n" +
        "Issue-id: #7\n\n" +
        "Co-authored-by: Alice A <a@x.com>\n" +
        "Co-authored-by: Bob B <b@x.com>\n",
    );

    const second = rewriteMessage({
      message: first.message,
      author: CAROL,
      lookupDeveloper,
      repo,
    });
    expect(second.message).toBe(first.message);
  });

  it("should keep hand-written trailers it does not recognize in the body", () => {
    const result = rewriteMessage({
      message: "Fix bug\n\nSigned-off-by: Bob B <b@x.com>\n",
      author: BOB,
      lookupDeveloper,
      repo: REPO,
    });

    expect(result.message).toBe(
      "Fix bug\n\nSigned-off-by: Bob B <b@x.com>\n\n",
    );
  });
});
