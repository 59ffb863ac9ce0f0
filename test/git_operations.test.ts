import { describe, expect, it, vi } from "vitest";
import { GitOperations, type RevisionGit } from "../src/git/operations.js";

function fakeGit(isRepo: boolean, head: string | Error): RevisionGit {
  return {
    checkIsRepo: async () => isRepo,
    revparse: async () => {
      if (head instanceof Error) throw head;
      return head;
    },
  };
}

describe("GitOperations.currentSha", () => {
  it("returns the trimmed HEAD sha", async () => {
    const git = new GitOperations("/repo", fakeGit(true, "0123abcd\n"));
    expect(await git.currentSha()).toBe("0123abcd");
  });

  it("returns null outside a repository", async () => {
    const revparse = vi.fn(async () => "never");
    const git = new GitOperations("/repo", { checkIsRepo: async () => false, revparse });
    expect(await git.currentSha()).toBeNull();
    expect(revparse).not.toHaveBeenCalled();
  });

  it("warns and returns null when HEAD cannot be read", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const git = new GitOperations("/repo", fakeGit(true, new Error("ambiguous argument 'HEAD'")));

    expect(await git.currentSha()).toBeNull();
    expect(warn).toHaveBeenCalledWith("[trainctl] Could not read HEAD: ambiguous argument 'HEAD'");
    warn.mockRestore();
  });
});
