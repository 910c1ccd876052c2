/**
 * Tests for git helpers
 */

import * as childProcess from "child_process";

import { describe, it, expect, beforeEach, vi } from "vitest";

import { GitCommandError } from "@/cli/errors.js";

import { getAuthorIdent, gitVar } from "./git.js";

vi.mock("child_process", () => ({
  execFileSync: vi.fn(),
}));

describe("gitVar", () => {
  beforeEach(() => {
    vi.mocked(childProcess.execFileSync).mockReset();
  });

  it("should run git var in the given directory and strip the newline", () => {
    vi.mocked(childProcess.execFileSync).mockReturnValue(
      "Alice A <a@x.com> 1700000000 +0000\n",
    );

    expect(gitVar({ name: "GIT_AUTHOR_IDENT", cwd: "/work/api" })).toBe(
      "Alice A <a@x.com> 1700000000 +0000",
    );
    expect(childProcess.execFileSync).toHaveBeenCalledWith(
      "git",
      ["var", "GIT_AUTHOR_IDENT"],
      {
        cwd: "/work/api",
        encoding: "utf-8",
        stdio: ["ignore", "pipe", "pipe"],
      },
    );
  });

  it("should wrap failures in GitCommandError", () => {
    const failure = new Error("fatal: not a git repository");
    vi.mocked(childProcess.execFileSync).mockImplementation(() => {
      throw failure;
    });

    try {
      gitVar({ name: "GIT_AUTHOR_IDENT", cwd: "/tmp" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(GitCommandError);
      if (err instanceof GitCommandError) {
        expect(err.message).toBe("git var GIT_AUTHOR_IDENT failed");
        expect(err.command).toBe("git var GIT_AUTHOR_IDENT");
        expect(err.cause).toBe(failure);
      }
    }
  });
});

describe("getAuthorIdent", () => {
  it("should read GIT_AUTHOR_IDENT", () => {
    vi.mocked(childProcess.execFileSync).mockReturnValue(
      "Bob B <b@x.com> 1700000000 +0100\r\n",
    );

    expect(getAuthorIdent({ cwd: "/work/api" })).toBe(
      "Bob B <b@x.com> 1700000000 +0100",
    );
    expect(vi.mocked(childProcess.execFileSync).mock.calls[0][1]).toEqual([
      "var",
      "GIT_AUTHOR_IDENT",
    ]);
  });
});
