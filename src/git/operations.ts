import { simpleGit } from "simple-git";

/** The slice of simple-git this project drives. */
export interface GitCommandRunner {
  raw(args: string[]): Promise<string>;
}

/**
 * Thin wrapper over simple-git.
 * Queries that git answers with an empty output and a non-zero exit under
 * `-q` come back as `undefined`.
 */
export class GitOperations {
  private git: GitCommandRunner;

  constructor(repoPath: string, git?: GitCommandRunner) {
    this.git = git ?? simpleGit(repoPath);
  }

  private async query(args: string[]): Promise<string | undefined> {
    const out = (await this.git.raw(args)).trim();
    return out.length > 0 ? out : undefined;
  }

  /** Target of a symbolic ref, e.g. "refs/heads/main" for HEAD on a branch. */
  async symbolicRef(ref: string): Promise<string | undefined> {
    return this.query(["symbolic-ref", "-q", ref]);
  }

  /** Commit id a ref resolves to, or undefined when it names no commit (unborn branch). */
  async resolveCommit(ref: string): Promise<string | undefined> {
    return this.query(["rev-parse", "--verify", "-q", `${ref}^{commit}`]);
  }

  async isShallow(): Promise<boolean> {
    return (await this.query(["rev-parse", "--is-shallow-repository"])) === "true";
  }

  /** Number of commits reachable from `rev`. */
  async countCommits(rev: string): Promise<number> {
    const out = await this.query(["rev-list", "--count", rev]);
    const count = out === undefined ? Number.NaN : Number.parseInt(out, 10);
    if (!Number.isInteger(count) || count < 0) {
      throw new Error(`Unexpected output from git rev-list --count: ${out ?? "<empty>"}`);
    }
    return count;
  }
}
