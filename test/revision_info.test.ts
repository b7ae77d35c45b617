import { describe, expect, it } from "vitest";
import { GitOperations } from "../src/git/operations.js";
import { resolveRevisionInfo } from "../src/git/revision-info.js";
import { createFakeGit, createMemoryLogger, gitOnBranch, HEAD_REV } from "./helpers/mocks.js";

describe("GitOperations", () => {
  it("returns undefined for empty quiet queries", async () => {
    const ops = new GitOperations("/repo", createFakeGit());
    expect(await ops.symbolicRef("HEAD")).toBeUndefined();
    expect(await ops.resolveCommit("HEAD")).toBeUndefined();
  });

  it("parses the commit count", async () => {
    const git = createFakeGit({ "rev-list --count abc": "17\n" });
    expect(await new GitOperations("/repo", git).countCommits("abc")).toBe(17);
    expect(git.calls).toEqual(["rev-list --count abc"]);
  });

  it("rejects output that is not a count", async () => {
    const ops = new GitOperations("/repo", createFakeGit({ "rev-list --count abc": "lots" }));
    await expect(ops.countCommits("abc")).rejects.toThrow("Unexpected output from git rev-list --count: lots");
  });
});

describe("resolveRevisionInfo", () => {
  it("resolves HEAD on a branch with its commit count", async () => {
    const git = createFakeGit(gitOnBranch(42));
    expect(await resolveRevisionInfo("/repo", { git })).toEqual({ revision: HEAD_REV, commitCount: 42 });
    expect(git.calls).toEqual([
      "symbolic-ref -q HEAD",
      "symbolic-ref -q refs/heads/main",
      "rev-parse --verify -q HEAD^{commit}",
      "rev-parse --is-shallow-repository",
      `rev-list --count ${HEAD_REV}`,
    ]);
  });

  it("accepts a detached HEAD", async () => {
    const detached = Object.entries(gitOnBranch(3)).filter(([args]) => args !== "symbolic-ref -q HEAD");
    const git = createFakeGit(Object.fromEntries(detached));
    expect(await resolveRevisionInfo("/repo", { git })).toEqual({ revision: HEAD_REV, commitCount: 3 });
  });

  it("rejects a symbolic ref pointing at another symbolic ref", async () => {
    const git = createFakeGit({ ...gitOnBranch(), "symbolic-ref -q refs/heads/main": "refs/heads/other\n" });
    await expect(resolveRevisionInfo("/repo", { git })).rejects.toThrow(
      "Symbolic revision pointing to a symbolic revision is not supported at this time",
    );
  });

  it("rejects a repository without commits", async () => {
    const git = createFakeGit({ "symbolic-ref -q HEAD": "refs/heads/main\n" });
    await expect(resolveRevisionInfo("/repo", { git })).rejects.toMatchObject({
      kind: "configuration",
      message: "Newly initialized repository detected, at least one commit is necessary",
    });
  });

  it("reports a git failure while reading HEAD", async () => {
    const git = createFakeGit({ "symbolic-ref -q HEAD": new Error("not a git repository") });
    await expect(resolveRevisionInfo("/repo", { git })).rejects.toThrow(
      "Could not read HEAD of the Git repository at /repo: not a git repository",
    );
  });

  it("leaves the count unset in a shallow clone", async () => {
    const logger = createMemoryLogger();
    const git = createFakeGit({ ...gitOnBranch(), "rev-parse --is-shallow-repository": "true\n" });
    expect(await resolveRevisionInfo("/repo", { git, logger })).toEqual({ revision: HEAD_REV, commitCount: undefined });
    expect(logger.entries.map((e) => e.code)).toEqual(["SHALLOW_CLONE"]);
    expect(git.calls).not.toContain(`rev-list --count ${HEAD_REV}`);
  });

  it("leaves the count unset when history cannot be walked", async () => {
    const logger = createMemoryLogger();
    const git = createFakeGit({ ...gitOnBranch(), [`rev-list --count ${HEAD_REV}`]: new Error("missing object") });
    expect((await resolveRevisionInfo("/repo", { git, logger })).commitCount).toBeUndefined();
    expect(logger.messages("debug")).toEqual([`Could not walk history from ${HEAD_REV}: missing object`]);
  });
});
